import type { loans } from '../db/schema.js';

export type LoanRow = typeof loans.$inferSelect;
export type AllocationPolicy = LoanRow['allocationPolicy'];

export interface StoredPayment {
  id: string;
  loanId: string;
  date: string;
  amountCents: number;
}

export interface LoanSummary {
  id: string;
  name: string;
  lenderName: string | null;
  borrowerName: string | null;
  principalCents: number;
  aprBps: number;
  originationDate: string;
  lateFeeType: LoanRow['lateFeeType'];
  lateFeeCents: number;
  lateFeePercentBps: number;
  graceDays: number;
  penaltyAprBps: number | null;
  allocationPolicy: AllocationPolicy;
  borrowerToken: string;
  note: string | null;
  paymentCount: number;
  lastPaymentDate: string | null;
  currentPrincipalCents: number;
}
