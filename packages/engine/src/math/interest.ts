import Decimal from 'decimal.js';
import { LedgerError } from '../ledger/errors.js';
import { roundHalfUp } from './money.js';

export const DAYS_IN_YEAR = 365;

// ACT/365 simple interest, rounded half-up to the cent
export function accrueInterest(balanceCents: number, annualRate: Decimal.Value, days: number): number {
  if (days < 0) {
    throw new LedgerError('INVALID_ACCRUAL_SPAN', `Cannot accrue interest over ${days} days`);
  }
  if (days === 0) return 0;

  return roundHalfUp(
    new Decimal(balanceCents).times(annualRate).times(days).dividedBy(DAYS_IN_YEAR),
  );
}

export function bpsToRate(bps: number): number {
  return new Decimal(bps).dividedBy(10000).toNumber();
}
