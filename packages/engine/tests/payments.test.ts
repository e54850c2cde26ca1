import { describe, it, expect } from 'vitest';
import {
  parsePaymentDate,
  parseAmountCents,
  cleanPaymentRecords,
  normalizePayments,
} from '../src/payments/normalize.js';
import { parsePaymentsCsv } from '../src/payments/csv.js';
import { PaymentImportError } from '../src/ledger/errors.js';

describe('parsePaymentDate', () => {
  it('accepts ISO dates', () => {
    expect(parsePaymentDate('2023-02-28')).toBe('2023-02-28');
    expect(parsePaymentDate('  2023-02-28 ')).toBe('2023-02-28');
  });

  it('drops the time part of ISO datetimes', () => {
    expect(parsePaymentDate('2023-02-28T14:30:00Z')).toBe('2023-02-28');
  });

  it('accepts US month/day/year', () => {
    expect(parsePaymentDate('2/5/2023')).toBe('2023-02-05');
    expect(parsePaymentDate('12/31/2023')).toBe('2023-12-31');
  });

  it('rejects blank and impossible dates', () => {
    expect(parsePaymentDate('')).toBeNull();
    expect(parsePaymentDate('2/30/2023')).toBeNull();
    expect(parsePaymentDate('yesterday')).toBeNull();
  });
});

describe('parseAmountCents', () => {
  it('parses plain decimals', () => {
    expect(parseAmountCents('500')).toBe(50000);
    expect(parseAmountCents('460.27')).toBe(46027);
  });

  it('strips currency symbols, grouping and whitespace', () => {
    expect(parseAmountCents(' $1,234.56 ')).toBe(123456);
  });

  it('reads parenthesised amounts as negative', () => {
    expect(parseAmountCents('(50.00)')).toBe(-5000);
  });

  it('rounds sub-cent amounts half up', () => {
    expect(parseAmountCents('12.345')).toBe(1235);
    expect(parseAmountCents(12.345)).toBe(1235);
  });

  it('accepts numbers', () => {
    expect(parseAmountCents(600)).toBe(60000);
  });

  it('rejects non-numeric input', () => {
    expect(parseAmountCents('abc')).toBeNull();
    expect(parseAmountCents('')).toBeNull();
    expect(parseAmountCents(Number.NaN)).toBeNull();
  });
});

describe('cleanPaymentRecords', () => {
  it('keeps valid rows and reports rejected ones with 1-based row numbers', () => {
    const result = cleanPaymentRecords([
      { date: '2023-02-28', amount: '460.27' },
      { date: 'not a date', amount: '100' },
      { date: '03/31/2023', amount: 'n/a' },
      { date: '2023-04-30', amount: '0' },
      { date: '2023-05-31', amount: '(10)' },
    ]);

    expect(result.payments).toEqual([{ date: '2023-02-28', amountCents: 46027 }]);
    expect(result.rejected.map((r) => [r.row, r.reason])).toEqual([
      [2, 'invalid_date'],
      [3, 'invalid_amount'],
      [4, 'non_positive_amount'],
      [5, 'non_positive_amount'],
    ]);
  });
});

describe('normalizePayments', () => {
  it('sorts by date', () => {
    const events = normalizePayments([
      { date: '2023-03-31', amountCents: 200 },
      { date: '2023-02-28', amountCents: 100 },
    ]);
    expect(events.map((e) => e.date)).toEqual(['2023-02-28', '2023-03-31']);
  });

  it('merges same-day payments into one event', () => {
    const events = normalizePayments([
      { date: '2023-02-10', amountCents: 30000 },
      { date: '2023-02-01', amountCents: 100 },
      { date: '2023-02-10', amountCents: 20000 },
    ]);
    expect(events).toEqual([
      { date: '2023-02-01', amountCents: 100 },
      { date: '2023-02-10', amountCents: 50000 },
    ]);
  });

  it('does not mutate its input', () => {
    const input = [
      { date: '2023-02-10', amountCents: 1 },
      { date: '2023-02-10', amountCents: 2 },
    ];
    normalizePayments(input);
    expect(input[0].amountCents).toBe(1);
  });
});

describe('parsePaymentsCsv', () => {
  it('reads Date and Amount columns in any order', () => {
    const csv = 'Amount,Memo,Date\n460.27,first,2023-02-28\r\n"1,000.00","rent, march",03/31/2023\n';
    expect(parsePaymentsCsv(csv)).toEqual([
      { date: '2023-02-28', amount: '460.27' },
      { date: '03/31/2023', amount: '1,000.00' },
    ]);
  });

  it('accepts a Payment Date header and a byte order mark', () => {
    const csv = '﻿Payment Date,Amount\n2023-02-28,100\n';
    expect(parsePaymentsCsv(csv)).toEqual([{ date: '2023-02-28', amount: '100' }]);
  });

  it('unescapes doubled quotes', () => {
    const csv = 'Date,Amount,Note\n2023-02-28,5,"say ""hi"""\n';
    expect(parsePaymentsCsv(csv)).toEqual([{ date: '2023-02-28', amount: '5' }]);
  });

  it('fills missing cells with empty strings', () => {
    expect(parsePaymentsCsv('Date,Amount\n2023-02-28\n')).toEqual([{ date: '2023-02-28', amount: '' }]);
  });

  it('rejects an empty file', () => {
    expect(() => parsePaymentsCsv('  \n')).toThrow(PaymentImportError);
    expect(() => parsePaymentsCsv('')).toThrow('CSV file is empty');
  });

  it('rejects a file without the required columns', () => {
    expect(() => parsePaymentsCsv('When,How Much\n2023-02-28,5\n')).toThrow(
      'CSV must include columns: Date, Amount (or Payment Date, Amount)',
    );
  });
});
