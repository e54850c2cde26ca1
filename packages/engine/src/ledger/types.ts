import type { PaymentEvent } from '../payments/types.js';

export type LateFeePolicy =
  | { kind: 'fixed'; amountCents: number; graceDays: number }
  | { kind: 'percent_of_cycle_interest'; percent: number; graceDays: number };

export interface LoanTerms {
  principalCents: number;
  originationDate: string;
  /** Decimal fraction: 0.06 for 6% APR. */
  annualRate: number;
  lateFee: LateFeePolicy;
}

export type CycleStatus = 'on_time' | 'late' | 'open';

export interface CycleRecord {
  cycle: number;
  dueDate: string;
  /** Null only while the cycle is open; the due date when no payment was needed. */
  satisfyingPaymentDate: string | null;
  daysLate: number;
  cycleInterestCents: number;
  lateFeeCents: number;
  principalAppliedCents: number;
  amountPostedCents: number;
  endingPrincipalCents: number;
  status: CycleStatus;
}

export interface LedgerOptions {
  /** Only used for days late on a trailing cycle nothing has paid yet. */
  asOfDate: string;
}

export interface LedgerSummary {
  beginningPrincipalCents: number;
  endingPrincipalCents: number;
  totalPostedCents: number;
  totalInterestCents: number;
  totalLateFeesCents: number;
  totalPrincipalAppliedCents: number;
  cycles: number;
  lateCycles: number;
  hasOpenCycle: boolean;
}

export interface Ledger {
  terms: LoanTerms;
  asOfDate: string;
  rows: CycleRecord[];
  /** Payments dated before origination; never posted. */
  excludedPayments: PaymentEvent[];
  carryForwardCents: number;
  summary: LedgerSummary;
}

export type { PaymentEvent };
