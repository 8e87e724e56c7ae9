// src/ai/providers/openai.ts
import OpenAI from 'openai';
import type { ChatCompletionClient, ChatCompletionParams, ChatCompletionResult } from './index.js';

export interface OpenAIClientOptions {
  baseUrl: string;
  apiKey: string;
}

/**
 * Chat Completions against any OpenAI-compatible endpoint.
 * Retries are disabled: a failing upstream call surfaces on the first attempt.
 */
export class OpenAIChatClient implements ChatCompletionClient {
  private readonly client: OpenAI;

  constructor(options: OpenAIClientOptions) {
    this.client = new OpenAI({
      baseURL: options.baseUrl,
      apiKey: options.apiKey,
      maxRetries: 0,
    });
  }

  async complete(params: ChatCompletionParams): Promise<ChatCompletionResult> {
    const resp = await this.client.chat.completions.create({
      model: params.model,
      messages: params.messages,
      temperature: params.temperature,
    });

    const choice = resp.choices?.[0];

    return {
      text: choice?.message?.content ?? null,
      model: resp.model,
      usage: resp.usage
        ? {
            inputTokens: resp.usage.prompt_tokens,
            outputTokens: resp.usage.completion_tokens,
          }
        : undefined,
    };
  }
}
