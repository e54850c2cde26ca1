import { Hono, type Context } from 'hono';
import {
  type CycleRecord,
  type DB,
  type Ledger,
  type LoanRow,
  type StatementViewer,
  type WaterfallRow,
  computeLedger,
  computeWaterfallLedger,
  formatMoney,
  formatUsDate,
  getLoan,
  getLoanPayments,
  ledgerToCsv,
  loanTermsFromRow,
  waterfallOptionsFromRow,
  renderStatement,
  todayIsoDate,
  waterfallToCsv,
} from '@loan-ledger/engine';
import { AppError, notFound, validationError } from '../errors.js';
import { resolveAsOf } from '../request.js';

function fileBase(loan: LoanRow): string {
  return loan.name.trim().replace(/[^\w-]+/g, '_') || 'loan';
}

function excludedWarning(loan: LoanRow, ledger: Pick<Ledger, 'excludedPayments'>): string[] {
  const [earliest] = ledger.excludedPayments;
  if (!earliest) return [];
  return [
    `Origination date (${formatUsDate(loan.originationDate)}) is after earliest payment (${formatUsDate(earliest.date)}). ` +
      `${ledger.excludedPayments.length} payment date(s) before origination are excluded from the ledger.`,
  ];
}

function formatCycle(row: CycleRecord, currency: string) {
  return {
    ...row,
    cycleInterestFormatted: formatMoney(row.cycleInterestCents, currency),
    lateFeeFormatted: formatMoney(row.lateFeeCents, currency),
    principalAppliedFormatted: formatMoney(row.principalAppliedCents, currency),
    amountPostedFormatted: formatMoney(row.amountPostedCents, currency),
    endingPrincipalFormatted: formatMoney(row.endingPrincipalCents, currency),
  };
}

function formatWaterfallRow(row: WaterfallRow, currency: string) {
  return {
    ...row,
    amountFormatted: formatMoney(row.amountCents, currency),
    endingPrincipalFormatted: formatMoney(row.endingPrincipalCents, currency),
  };
}

// Borrowers reach a loan through its share token only
function loanIdentity(loan: LoanRow, viewer: StatementViewer) {
  return viewer === 'lender' ? { loanId: loan.id, loanName: loan.name } : { loanName: loan.name };
}

/** Ledger response for one loan; `format=csv` returns a download instead of JSON. */
export function respondWithLedger(
  c: Context,
  db: DB,
  loan: LoanRow,
  viewer: StatementViewer,
  currency: string,
) {
  const asOf = resolveAsOf(c);
  const format = c.req.query('format') ?? 'json';
  if (format !== 'json' && format !== 'csv') {
    throw validationError(`Unknown format '${format}'; use json or csv`);
  }

  const terms = loanTermsFromRow(loan);
  const payments = getLoanPayments(db, loan.id);
  const filename = `ledger_${fileBase(loan)}_${asOf}.csv`;
  const csvHeaders = {
    'Content-Type': 'text/csv; charset=utf-8',
    'Content-Disposition': `attachment; filename="${filename}"`,
  };

  if (loan.allocationPolicy === 'waterfall') {
    const ledger = computeWaterfallLedger(terms, payments, waterfallOptionsFromRow(loan));
    if (format === 'csv') return c.body(waterfallToCsv(ledger), 200, csvHeaders);

    return c.json({
      ...loanIdentity(loan, viewer),
      allocationPolicy: loan.allocationPolicy,
      asOfDate: asOf,
      rows: ledger.rows.map((r) => formatWaterfallRow(r, currency)),
      summary: ledger.summary,
      warnings: excludedWarning(loan, ledger),
    });
  }

  const ledger = computeLedger(terms, payments, { asOfDate: asOf });
  if (format === 'csv') return c.body(ledgerToCsv(ledger), 200, csvHeaders);

  return c.json({
    ...loanIdentity(loan, viewer),
    allocationPolicy: loan.allocationPolicy,
    asOfDate: asOf,
    rows: ledger.rows.map((r) => formatCycle(r, currency)),
    summary: ledger.summary,
    carryForwardCents: ledger.carryForwardCents,
    warnings: excludedWarning(loan, ledger),
  });
}

export function respondWithStatement(
  c: Context,
  db: DB,
  loan: LoanRow,
  viewer: StatementViewer,
  currency: string,
) {
  if (loan.allocationPolicy === 'waterfall') {
    throw new AppError(
      'UNSUPPORTED_POLICY',
      'Statements are only available for loans using the capitalize policy',
      409,
      'Use GET /ledger?format=csv for waterfall loans',
    );
  }

  const asOf = resolveAsOf(c);
  const ledger = computeLedger(loanTermsFromRow(loan), getLoanPayments(db, loan.id), { asOfDate: asOf });
  const text = renderStatement(ledger, {
    loanName: loan.name,
    lenderName: loan.lenderName,
    borrowerName: loan.borrowerName,
    viewer,
    generatedOn: todayIsoDate(),
    currency,
  });

  return c.body(text, 200, { 'Content-Type': 'text/plain; charset=utf-8' });
}

export function ledgerRoutes(db: DB, currency: string) {
  const router = new Hono();

  // GET /:id/ledger?asOf=YYYY-MM-DD&format=json|csv
  router.get('/:id/ledger', (c) => {
    const id = c.req.param('id');
    const loan = getLoan(db, id);
    if (!loan) throw notFound('Loan', id);
    return respondWithLedger(c, db, loan, 'lender', currency);
  });

  // GET /:id/statement?asOf=YYYY-MM-DD
  router.get('/:id/statement', (c) => {
    const id = c.req.param('id');
    const loan = getLoan(db, id);
    if (!loan) throw notFound('Loan', id);
    return respondWithStatement(c, db, loan, 'lender', currency);
  });

  return router;
}
