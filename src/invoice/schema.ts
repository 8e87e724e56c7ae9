// src/invoice/schema.ts
import { z } from 'zod';
import { SchemaViolationError, errorMessage } from '../errors.js';

const optionalText = z.string().nullish();

/**
 * Shape the model is asked to return.
 * total_amount may arrive as a string or a number; it is tagged here so the
 * normalizer can resolve both to one canonical string.
 */
export const invoiceResponseSchema = z.object({
  vendor: optionalText,
  invoice_number: optionalText,
  invoice_date: optionalText,
  due_date: optionalText,
  total_amount: z
    .union([z.string(), z.number().finite()])
    .refine((v) => typeof v === 'number' || v.trim().length > 0, {
      message: 'total_amount must not be empty',
    })
    .transform((value) =>
      typeof value === 'number'
        ? { kind: 'number' as const, value }
        : { kind: 'string' as const, value }
    ),
  // absent means unspecified; an explicit null is kept
  currency: z.string().nullable().default('USD'),
  valid: z.boolean().default(true),
});

export type ParsedInvoice = z.infer<typeof invoiceResponseSchema>;
export type InvoiceAmount = ParsedInvoice['total_amount'];

/** Record returned to callers once total_amount has been normalized. */
export type InvoiceRecord = Omit<ParsedInvoice, 'total_amount'> & { total_amount: string };

// Expand a failed union into the issues of its branches
function leafIssues(issues: z.ZodIssue[]): z.ZodIssue[] {
  return issues.flatMap((issue) =>
    issue.code === z.ZodIssueCode.invalid_union
      ? leafIssues(issue.unionErrors.flatMap((e) => e.issues))
      : [issue]
  );
}

function formatIssues(error: z.ZodError): string {
  const lines = leafIssues(error.issues).map(
    (issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`
  );
  return [...new Set(lines)].join('; ');
}

/**
 * Strictly parse raw model output. No code-fence stripping, no repair:
 * anything that is not a JSON object matching the schema is a SchemaViolationError.
 */
export function parseInvoiceRecord(raw: string): ParsedInvoice {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new SchemaViolationError(`Model returned invalid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const result = invoiceResponseSchema.safeParse(json);
  if (!result.success) {
    throw new SchemaViolationError(
      `Model output does not match invoice schema: ${formatIssues(result.error)}`,
      { cause: result.error }
    );
  }
  return result.data;
}
