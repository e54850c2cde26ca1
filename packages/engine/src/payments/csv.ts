import { PaymentImportError } from '../ledger/errors.js';
import type { RawPaymentRecord } from './types.js';

const DATE_HEADERS = ['date', 'payment_date'];

function splitCsvLine(line: string): string[] {
  const cells: string[] = [];
  let cell = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        cell += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        cell += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      cells.push(cell);
      cell = '';
    } else {
      cell += ch;
    }
  }
  cells.push(cell);

  return cells.map((c) => c.trim());
}

function normalizeHeader(header: string): string {
  return header.replace(/^\uFEFF/, '').trim().toLowerCase().replace(/\s+/g, '_');
}

/**
 * Reads a payments CSV with a `Date` (or `Payment Date`) column and an
 * `Amount` column. Values are returned untouched; cleaning happens in
 * `cleanPaymentRecords`.
 */
export function parsePaymentsCsv(text: string): RawPaymentRecord[] {
  const lines = text.split(/\r?\n/).filter((line) => line.trim() !== '');
  if (lines.length === 0) {
    throw new PaymentImportError('CSV file is empty');
  }

  const headers = splitCsvLine(lines[0]).map(normalizeHeader);
  const dateIdx = headers.findIndex((h) => DATE_HEADERS.includes(h));
  const amountIdx = headers.indexOf('amount');
  if (dateIdx === -1 || amountIdx === -1) {
    throw new PaymentImportError('CSV must include columns: Date, Amount (or Payment Date, Amount)');
  }

  return lines.slice(1).map((line) => {
    const cells = splitCsvLine(line);
    return { date: cells[dateIdx] ?? '', amount: cells[amountIdx] ?? '' };
  });
}
