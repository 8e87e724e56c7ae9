// src/errors.ts
// Error taxonomy for the invoice analysis pipeline.
// Each error carries the HTTP status it surfaces with.

export type InvoiceErrorCode =
  | 'invalid_input'
  | 'unextractable_content'
  | 'upstream_failure'
  | 'schema_violation';

export abstract class InvoiceAnalysisError extends Error {
  abstract readonly code: InvoiceErrorCode;
  abstract readonly statusCode: 400 | 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get isClientError(): boolean {
    return this.statusCode < 500;
  }
}

/** Disallowed content type, or no file in the upload. */
export class InvalidInputError extends InvoiceAnalysisError {
  readonly code = 'invalid_input';
  readonly statusCode = 400;
}

/** PDF parsed but yielded no text (scanned document). No OCR fallback. */
export class UnextractableContentError extends InvoiceAnalysisError {
  readonly code = 'unextractable_content';
  readonly statusCode = 400;
}

/** The model endpoint call, or any other pipeline step, failed. */
export class UpstreamFailureError extends InvoiceAnalysisError {
  readonly code = 'upstream_failure';
  readonly statusCode = 500;
}

/** Model output was not JSON or did not match the invoice schema. */
export class SchemaViolationError extends InvoiceAnalysisError {
  readonly code = 'schema_violation';
  readonly statusCode = 500;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
