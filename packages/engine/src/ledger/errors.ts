export type LedgerErrorCode =
  | 'INVALID_TERMS'
  | 'UNORDERED_INTERNAL_STATE'
  | 'INVALID_ACCRUAL_SPAN'
  | 'INVALID_PAYMENT_FILE';

export class LedgerError extends Error {
  constructor(
    public code: LedgerErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}

export class InvalidTermsError extends LedgerError {
  constructor(message: string) {
    super('INVALID_TERMS', message);
    this.name = 'InvalidTermsError';
  }
}

/** Payments reached the cycle loop out of date order. */
export class UnorderedPaymentsError extends LedgerError {
  constructor(
    public previousDate: string,
    public nextDate: string,
  ) {
    super(
      'UNORDERED_INTERNAL_STATE',
      `Payment dated ${nextDate} follows payment dated ${previousDate}`,
    );
    this.name = 'UnorderedPaymentsError';
  }
}

export class PaymentImportError extends LedgerError {
  constructor(message: string) {
    super('INVALID_PAYMENT_FILE', message);
    this.name = 'PaymentImportError';
  }
}
