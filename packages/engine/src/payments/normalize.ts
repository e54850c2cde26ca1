import Decimal from 'decimal.js';
import { addCents, roundHalfUp } from '../math/money.js';
import { isIsoDate } from '../scheduler/engine.js';
import type { CleanedPayments, PaymentEvent, RawPaymentRecord, RejectedPaymentRecord } from './types.js';

const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO_DATETIME = /^(\d{4}-\d{2}-\d{2})T[\d:.]+(Z|[+-]\d{2}:?\d{2})?$/;
const DECIMAL_NUMBER = /^[-+]?(\d+(\.\d*)?|\.\d+)$/;

export function parsePaymentDate(raw: string): string | null {
  const value = raw.trim();
  if (!value) return null;

  if (isIsoDate(value)) return value;

  const datetime = ISO_DATETIME.exec(value);
  if (datetime) return isIsoDate(datetime[1]) ? datetime[1] : null;

  const us = US_DATE.exec(value);
  if (!us) return null;

  const [, month, day, year] = us;
  const iso = `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
  return isIsoDate(iso) ? iso : null;
}

export function parseAmountCents(raw: string | number): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? roundHalfUp(new Decimal(raw).times(100)) : null;
  }

  const cleaned = raw
    .trim()
    .replace(/^\((.*)\)$/, '-$1')
    .replace(/[$,\s]/g, '');
  if (!DECIMAL_NUMBER.test(cleaned)) return null;

  return roundHalfUp(new Decimal(cleaned).times(100));
}

export function cleanPaymentRecords(records: RawPaymentRecord[]): CleanedPayments {
  const payments: PaymentEvent[] = [];
  const rejected: RejectedPaymentRecord[] = [];

  records.forEach((record, index) => {
    const row = index + 1;
    const date = parsePaymentDate(String(record.date));
    if (!date) {
      rejected.push({ row, record, reason: 'invalid_date' });
      return;
    }

    const amountCents = parseAmountCents(record.amount);
    if (amountCents === null) {
      rejected.push({ row, record, reason: 'invalid_amount' });
      return;
    }
    if (amountCents <= 0) {
      rejected.push({ row, record, reason: 'non_positive_amount' });
      return;
    }

    payments.push({ date, amountCents });
  });

  return { payments, rejected };
}

/** Sorts by date and pools same-day events into one amount. */
export function normalizePayments(events: readonly PaymentEvent[]): PaymentEvent[] {
  const sorted = [...events].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));

  const pooled: PaymentEvent[] = [];
  for (const event of sorted) {
    const last = pooled[pooled.length - 1];
    if (last && last.date === event.date) {
      last.amountCents = addCents(last.amountCents, event.amountCents);
    } else {
      pooled.push({ date: event.date, amountCents: event.amountCents });
    }
  }

  return pooled;
}
