// Shared test fixtures: a scripted chat client, multipart bodies and generated PDFs.
import { PDFDocument, StandardFonts } from 'pdf-lib';
import type {
  ChatCompletionClient,
  ChatCompletionParams,
  ChatCompletionResult,
} from '../ai/providers/index.js';

type Reply = ChatCompletionResult | Error;

/** Chat client that records every call and answers from a script. */
export class FakeChatClient implements ChatCompletionClient {
  readonly calls: ChatCompletionParams[] = [];

  constructor(private reply: Reply = { text: null }) {}

  static returning(text: string): FakeChatClient {
    return new FakeChatClient({ text, model: 'test-model' });
  }

  static failing(error: Error): FakeChatClient {
    return new FakeChatClient(error);
  }

  async complete(params: ChatCompletionParams): Promise<ChatCompletionResult> {
    this.calls.push(params);
    if (this.reply instanceof Error) throw this.reply;
    return this.reply;
  }
}

export const TEST_ENV = {
  BASE_URL: 'https://llm.example.test/v1',
  API_KEY: 'test-secret',
  MODEL_NAME: 'test-model',
} as const;

export interface MultipartPart {
  field: string;
  filename?: string;
  contentType?: string;
  data: Uint8Array | string;
}

const BOUNDARY = '----invoice-analyzer-test-boundary';

export function multipart(parts: MultipartPart[]) {
  const chunks: Buffer[] = [];
  for (const part of parts) {
    let head = `--${BOUNDARY}\r\nContent-Disposition: form-data; name="${part.field}"`;
    if (part.filename !== undefined) head += `; filename="${part.filename}"`;
    head += '\r\n';
    if (part.contentType !== undefined) head += `Content-Type: ${part.contentType}\r\n`;
    head += '\r\n';
    chunks.push(Buffer.from(head));
    chunks.push(typeof part.data === 'string' ? Buffer.from(part.data) : Buffer.from(part.data));
    chunks.push(Buffer.from('\r\n'));
  }
  chunks.push(Buffer.from(`--${BOUNDARY}--\r\n`));

  return {
    payload: Buffer.concat(chunks),
    headers: { 'content-type': `multipart/form-data; boundary=${BOUNDARY}` },
  };
}

export function fileUpload(filename: string, contentType: string, data: Uint8Array | string) {
  return multipart([{ field: 'file', filename, contentType, data }]);
}

/** One entry per page, one string per line. An empty page has no text layer. */
export async function makePdf(pages: string[][]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  const font = await doc.embedFont(StandardFonts.Helvetica);
  for (const lines of pages) {
    const page = doc.addPage([300, 400]);
    lines.forEach((line, i) => {
      page.drawText(line, { x: 24, y: 360 - i * 24, size: 12, font });
    });
  }
  return doc.save();
}
