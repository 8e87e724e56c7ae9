// src/invoice/analyzer.ts
// Upload → type check → extract/encode → model → parse → normalize.
// Strictly sequential per request; no state is shared between calls.

import type { Logger } from 'pino';
import type { ChatCompletionClient, ChatMessage } from '../ai/providers/index.js';
import { toDataUri } from '../ai/providers/index.js';
import { extractPdfText, type PdfTextResult } from '../documents/pdfText.js';
import {
  InvalidInputError,
  InvoiceAnalysisError,
  SchemaViolationError,
  UnextractableContentError,
  UpstreamFailureError,
  errorMessage,
} from '../errors.js';
import { createLogger } from '../observability/index.js';
import { normalizeInvoice } from './normalize.js';
import {
  IMAGE_SYSTEM_PROMPT,
  INVOICE_PROMPT,
  PDF_SYSTEM_PROMPT,
  buildPdfUserMessage,
} from './prompt.js';
import { parseInvoiceRecord, type InvoiceRecord } from './schema.js';

export const SUPPORTED_CONTENT_TYPES = ['image/png', 'image/jpeg', 'application/pdf'] as const;
export type SupportedContentType = (typeof SUPPORTED_CONTENT_TYPES)[number];

export const UNSUPPORTED_TYPE_MESSAGE = 'Unsupported file type';
export const NO_PDF_TEXT_MESSAGE = 'No readable text found in PDF (possibly scanned)';

/** Sampling temperature for both paths. */
export const EXTRACTION_TEMPERATURE = 0;

export type AnalysisStage =
  | 'received'
  | 'type_checked'
  | 'content_extracted'
  | 'model_queried'
  | 'response_parsed'
  | 'normalized'
  | 'returned';

export interface InvoiceUpload {
  bytes: Uint8Array;
  contentType: string;
  filename?: string;
}

export interface InvoiceAnalyzerDeps {
  client: ChatCompletionClient;
  model: string;
  extractText?: (bytes: Uint8Array) => Promise<PdfTextResult>;
  logger?: Logger;
}

export interface InvoiceAnalyzer {
  analyze(upload: InvoiceUpload, log?: Logger): Promise<InvoiceRecord>;
}

export function isSupportedContentType(contentType: string): contentType is SupportedContentType {
  return SUPPORTED_CONTENT_TYPES.some((type) => type === contentType);
}

/**
 * Client errors pass through untouched; everything else becomes a 500
 * carrying the original message.
 */
export function classifyFailure(err: unknown): InvoiceAnalysisError {
  if (err instanceof InvoiceAnalysisError) return err;
  return new UpstreamFailureError(errorMessage(err), { cause: err });
}

function logStage(
  log: Logger,
  stage: AnalysisStage,
  bindings: Record<string, unknown>,
  msg: string
): void {
  log.debug({ stage, ...bindings }, msg);
}

export function createInvoiceAnalyzer(deps: InvoiceAnalyzerDeps): InvoiceAnalyzer {
  const extractText = deps.extractText ?? extractPdfText;
  const baseLog = deps.logger ?? createLogger('invoice/analyzer');

  async function buildMessages(
    upload: InvoiceUpload & { contentType: SupportedContentType },
    log: Logger
  ): Promise<ChatMessage[]> {
    if (upload.contentType === 'application/pdf') {
      const { text, pages } = await extractText(upload.bytes);
      if (!text) {
        throw new UnextractableContentError(NO_PDF_TEXT_MESSAGE);
      }
      logStage(log, 'content_extracted', { pages, chars: text.length }, 'pdf text extracted');
      return [
        { role: 'system', content: PDF_SYSTEM_PROMPT },
        { role: 'user', content: buildPdfUserMessage(text) },
      ];
    }

    // No dimension or integrity checks: a broken image is for the model endpoint to reject
    const encoded = Buffer.from(upload.bytes).toString('base64');
    logStage(log, 'content_extracted', { bytes: upload.bytes.byteLength }, 'image encoded');
    return [
      { role: 'system', content: IMAGE_SYSTEM_PROMPT },
      {
        role: 'user',
        content: [
          { type: 'text', text: INVOICE_PROMPT },
          { type: 'image_url', image_url: { url: toDataUri(upload.contentType, encoded) } },
        ],
      },
    ];
  }

  async function run(upload: InvoiceUpload, log: Logger): Promise<InvoiceRecord> {
    const { contentType } = upload;
    if (!isSupportedContentType(contentType)) {
      throw new InvalidInputError(UNSUPPORTED_TYPE_MESSAGE);
    }
    logStage(log, 'type_checked', {}, 'content type accepted');

    const messages = await buildMessages({ ...upload, contentType }, log);

    const completion = await deps.client.complete({
      model: deps.model,
      messages,
      temperature: EXTRACTION_TEMPERATURE,
    });
    logStage(
      log,
      'model_queried',
      { model: completion.model ?? deps.model, usage: completion.usage },
      'model responded'
    );

    if (completion.text === null) {
      throw new SchemaViolationError('Model returned no completion content');
    }

    const parsed = parseInvoiceRecord(completion.text);
    logStage(log, 'response_parsed', { valid: parsed.valid }, 'model output validated');

    const record = normalizeInvoice(parsed);
    logStage(log, 'normalized', { amountKind: parsed.total_amount.kind }, 'total amount normalized');
    return record;
  }

  return {
    async analyze(upload, log = baseLog) {
      const reqLog = log.child({ contentType: upload.contentType, filename: upload.filename });
      logStage(reqLog, 'received', { bytes: upload.bytes.byteLength }, 'analysis started');

      try {
        const record = await run(upload, reqLog);
        reqLog.info({ stage: 'returned', valid: record.valid }, 'invoice analyzed');
        return record;
      } catch (err) {
        const failure = classifyFailure(err);
        const level = failure.isClientError ? 'warn' : 'error';
        reqLog[level]({ code: failure.code, err: failure }, 'invoice analysis failed');
        throw failure;
      }
    },
  };
}
