export { createDb, schema } from './db/index.js';
export type { DB } from './db/index.js';
export { loans, payments } from './db/schema.js';
export { migrate } from './db/migrate.js';

export {
  formatMoney,
  roundHalfUp,
  centsToDecimalString,
  addCents,
  subtractCents,
  percentOfCents,
  sumCents,
} from './math/money.js';
export { accrueInterest, bpsToRate, DAYS_IN_YEAR } from './math/interest.js';

export {
  isIsoDate,
  todayIsoDate,
  lastDayOfMonth,
  addMonths,
  addDays,
  daysBetween,
  nextDueDate,
  dueDateHorizon,
  previousDueDate,
} from './scheduler/engine.js';

export type {
  PaymentEvent,
  RawPaymentRecord,
  RejectionReason,
  RejectedPaymentRecord,
  CleanedPayments,
} from './payments/types.js';
export { parsePaymentDate, parseAmountCents, cleanPaymentRecords, normalizePayments } from './payments/normalize.js';
export { parsePaymentsCsv } from './payments/csv.js';

export type {
  LateFeePolicy,
  LoanTerms,
  CycleStatus,
  CycleRecord,
  LedgerOptions,
  LedgerSummary,
  Ledger,
} from './ledger/types.js';
export {
  LedgerError,
  InvalidTermsError,
  UnorderedPaymentsError,
  PaymentImportError,
} from './ledger/errors.js';
export type { LedgerErrorCode } from './ledger/errors.js';
export {
  computeLedger,
  validateTerms,
  assertChronological,
  attributeSatisfyingPayment,
  summarizeLedger,
} from './ledger/engine.js';
export { assessLateFee } from './ledger/late-fee.js';
export type { WaterfallOptions, WaterfallRow, WaterfallLedger } from './ledger/waterfall.js';
export { computeWaterfallLedger } from './ledger/waterfall.js';

export type { StatementViewer, StatementContext } from './statement/types.js';
export { ROWS_PER_PAGE, formatUsDate, ledgerToCsv, waterfallToCsv, renderStatement } from './statement/engine.js';

export type { LoanRow, AllocationPolicy, StoredPayment, LoanSummary } from './loan/types.js';
export {
  loanTermsFromRow,
  waterfallOptionsFromRow,
  getLoan,
  getLoanByToken,
  regenerateBorrowerToken,
  listLoanPayments,
  getLoanPayments,
  addLoanPayment,
  deleteLoanPayment,
  replaceLoanPayments,
  getLoanLedger,
  getLoanWaterfall,
  getLoanSummary,
} from './loan/engine.js';
