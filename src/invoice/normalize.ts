// src/invoice/normalize.ts
import type { InvoiceAmount, InvoiceRecord, ParsedInvoice } from './schema.js';

// toFixed switches to exponent notation from here on
const FIXED_NOTATION_LIMIT = 1e21;

/**
 * Two decimals in plain notation. Values exactly halfway between two cents
 * round to the even cent; everything else rounds to the nearest cent.
 */
function formatCents(value: number): string {
  const magnitude = Math.abs(value);
  const sign = value < 0 ? '-' : '';

  // Doubles this large are integers
  if (magnitude >= FIXED_NOTATION_LIMIT) return `${BigInt(value)}.00`;

  // A halfway cent is an odd multiple of 1/8; toFixed would round it up
  const eighths = magnitude * 8;
  if (Number.isInteger(eighths) && !Number.isInteger(magnitude * 4)) {
    const lower = (25n * BigInt(eighths) - 1n) / 2n;
    const cents = lower % 2n === 0n ? lower : lower + 1n;
    return `${sign}${cents / 100n}.${(cents % 100n).toString().padStart(2, '0')}`;
  }

  return value.toFixed(2);
}

export function formatAmount(amount: InvoiceAmount): string {
  return amount.kind === 'number' ? formatCents(amount.value) : amount.value;
}

/**
 * Resolve total_amount to its canonical string. Numeric amounts get two
 * decimals; strings pass through untouched. Other fields are not corrected.
 */
export function normalizeInvoice(parsed: ParsedInvoice): InvoiceRecord {
  return {
    ...parsed,
    total_amount: formatAmount(parsed.total_amount),
  };
}
