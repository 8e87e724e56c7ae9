import { describe, it, expect } from 'vitest';
import { formatAmount, normalizeInvoice } from '../normalize.js';
import { parseInvoiceRecord } from '../schema.js';

describe('formatAmount', () => {
  it('fixes numbers at two decimals', () => {
    expect(formatAmount({ kind: 'number', value: 1234.5 })).toBe('1234.50');
    expect(formatAmount({ kind: 'number', value: 250 })).toBe('250.00');
    expect(formatAmount({ kind: 'number', value: 0 })).toBe('0.00');
  });

  it('rounds exact halfway cents to even', () => {
    expect(formatAmount({ kind: 'number', value: 10.125 })).toBe('10.12');
    expect(formatAmount({ kind: 'number', value: 0.375 })).toBe('0.38');
    expect(formatAmount({ kind: 'number', value: -10.125 })).toBe('-10.12');
  });

  it('rounds inexact values by their nearest cent', () => {
    expect(formatAmount({ kind: 'number', value: 1.005 })).toBe('1.00');
    expect(formatAmount({ kind: 'number', value: 99.999 })).toBe('100.00');
  });

  it('never uses exponent notation', () => {
    expect(formatAmount({ kind: 'number', value: 1e21 })).toBe('1000000000000000000000.00');
    expect(formatAmount({ kind: 'number', value: -1e22 })).toBe('-10000000000000000000000.00');
  });

  it('passes strings through unchanged', () => {
    expect(formatAmount({ kind: 'string', value: '1234.50' })).toBe('1234.50');
    expect(formatAmount({ kind: 'string', value: '€ 1.234,5' })).toBe('€ 1.234,5');
  });
});

describe('normalizeInvoice', () => {
  it('turns a numeric total into a 2-decimal string', () => {
    const record = normalizeInvoice(parseInvoiceRecord('{"vendor":"Acme Ltd","total_amount":1234.5}'));
    expect(record).toEqual({
      vendor: 'Acme Ltd',
      total_amount: '1234.50',
      currency: 'USD',
      valid: true,
    });
  });

  it('keeps a string total as-is', () => {
    const record = normalizeInvoice(parseInvoiceRecord('{"total_amount":"1234.50"}'));
    expect(record.total_amount).toBe('1234.50');
  });

  it('keeps an explicit null currency', () => {
    const record = normalizeInvoice(
      parseInvoiceRecord('{"vendor":"Acme Ltd","total_amount":12.5,"currency":null,"valid":true}')
    );
    expect(record).toEqual({ vendor: 'Acme Ltd', total_amount: '12.50', currency: null, valid: true });
  });

  it('does not correct other fields', () => {
    const record = normalizeInvoice(
      parseInvoiceRecord('{"invoice_date":"03/01/2024","total_amount":10,"valid":false}')
    );
    expect(record.invoice_date).toBe('03/01/2024');
    expect(record.valid).toBe(false);
    expect('vendor' in record).toBe(false);
  });

  it('is idempotent', () => {
    const once = normalizeInvoice(
      parseInvoiceRecord('{"vendor":"Acme Ltd","total_amount":99.9,"currency":"EUR","valid":true}')
    );
    const twice = normalizeInvoice(parseInvoiceRecord(JSON.stringify(once)));
    expect(twice).toEqual(once);
    expect(twice.total_amount).toBe('99.90');
  });
});
