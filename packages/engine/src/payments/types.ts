export interface PaymentEvent {
  date: string;
  amountCents: number;
}

/** A payment row as it arrives from a file or form, before cleaning. */
export interface RawPaymentRecord {
  date: string;
  amount: string | number;
}

export type RejectionReason = 'invalid_date' | 'invalid_amount' | 'non_positive_amount';

export interface RejectedPaymentRecord {
  row: number;
  record: RawPaymentRecord;
  reason: RejectionReason;
}

export interface CleanedPayments {
  payments: PaymentEvent[];
  rejected: RejectedPaymentRecord[];
}
