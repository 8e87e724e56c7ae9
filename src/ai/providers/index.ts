// src/ai/providers/index.ts
// Shared chat-completion types. Any backend that accepts role-tagged,
// optionally multimodal, messages and returns raw text can implement ChatCompletionClient.

export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string | ChatContentPart[] };

export type ChatCompletionParams = {
  model: string;                  // provider model id
  messages: ChatMessage[];
  temperature: number;
};

export type ChatCompletionResult = {
  text: string | null;            // first choice's message content, verbatim; null when absent
  model?: string;                 // model reported by the endpoint
  usage?: { inputTokens?: number; outputTokens?: number };
};

export interface ChatCompletionClient {
  complete(params: ChatCompletionParams): Promise<ChatCompletionResult>;
}

/** Build a data URI for an inline base64 image part. */
export function toDataUri(contentType: string, base64: string): string {
  return `data:${contentType};base64,${base64}`;
}
