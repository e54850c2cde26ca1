import Decimal from 'decimal.js';
import { centsToDecimalString, formatMoney, subtractCents } from '../math/money.js';
import type { CycleRecord, LateFeePolicy, Ledger } from '../ledger/types.js';
import type { WaterfallLedger } from '../ledger/waterfall.js';
import type { StatementContext } from './types.js';

export const ROWS_PER_PAGE = 24;

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

export function formatUsDate(date: string | null): string {
  if (!date) return '';
  const [y, m, d] = date.split('-');
  return `${m}/${d}/${y}`;
}

function formatLongDate(date: string): string {
  const [y, m, d] = date.split('-').map(Number);
  return `${MONTHS[m - 1]} ${String(d).padStart(2, '0')}, ${y}`;
}

function describeLateFee(policy: LateFeePolicy, currency: string): string {
  const amount =
    policy.kind === 'fixed' ? `${formatMoney(policy.amountCents, currency)} fixed` : `${policy.percent}% of cycle interest`;
  return `${amount} after ${policy.graceDays} day(s) grace`;
}

const LEDGER_CSV_HEADER = [
  'Due Date',
  'Payment Date',
  'Days Late',
  'Amount Posted',
  'Cycle Interest',
  'Late Fee',
  'Principal Applied',
  'Principal Balance',
  'Status',
];

export function ledgerToCsv(ledger: Ledger): string {
  const lines = ledger.rows.map((r) =>
    [
      formatUsDate(r.dueDate),
      formatUsDate(r.satisfyingPaymentDate),
      String(r.daysLate),
      centsToDecimalString(r.amountPostedCents),
      centsToDecimalString(r.cycleInterestCents),
      centsToDecimalString(r.lateFeeCents),
      centsToDecimalString(r.principalAppliedCents),
      centsToDecimalString(r.endingPrincipalCents),
      r.status,
    ].join(','),
  );
  return [LEDGER_CSV_HEADER.join(','), ...lines].join('\n') + '\n';
}

const WATERFALL_CSV_HEADER = [
  'Payment Date',
  'Due Date',
  'Payment Amount',
  'Interest Due',
  'Penalty Interest Accrued',
  'Late Fee',
  'To Penalty Interest',
  'To Late Fees',
  'To Interest',
  'To Principal',
  'Principal Balance',
  'Late Fees Outstanding',
  'Penalty Interest Outstanding',
];

export function waterfallToCsv(ledger: WaterfallLedger): string {
  const lines = ledger.rows.map((r) =>
    [
      formatUsDate(r.paymentDate),
      formatUsDate(r.dueDate),
      ...[
        r.amountCents,
        r.interestDueCents,
        r.penaltyInterestAccruedCents,
        r.lateFeeCents,
        r.toPenaltyInterestCents,
        r.toLateFeesCents,
        r.toInterestCents,
        r.toPrincipalCents,
        r.endingPrincipalCents,
        r.lateFeesOutstandingCents,
        r.penaltyInterestOutstandingCents,
      ].map(centsToDecimalString),
    ].join(','),
  );
  return [WATERFALL_CSV_HEADER.join(','), ...lines].join('\n') + '\n';
}

function renderTable(rows: readonly CycleRecord[], currency: string): string[] {
  const header = ['Due Date', 'Paid On', 'Days Late', 'Posted', 'Late Fee', 'Interest', 'To Principal', 'Principal (End)'];
  const body = rows.map((r) => [
    formatUsDate(r.dueDate),
    r.satisfyingPaymentDate ? formatUsDate(r.satisfyingPaymentDate) : '-',
    String(r.daysLate),
    formatMoney(r.amountPostedCents, currency),
    formatMoney(r.lateFeeCents, currency),
    formatMoney(r.cycleInterestCents, currency),
    formatMoney(r.principalAppliedCents, currency),
    formatMoney(r.endingPrincipalCents, currency),
  ]);

  const widths = header.map((h, i) => Math.max(h.length, ...body.map((cells) => cells[i].length)));
  // Dates left-aligned, numbers right-aligned
  const line = (cells: string[]) =>
    cells.map((c, i) => (i < 2 ? c.padEnd(widths[i]) : c.padStart(widths[i]))).join('  ').trimEnd();

  return [line(header), widths.map((w) => '-'.repeat(w)).join('  '), ...body.map(line)];
}

export function renderStatement(ledger: Ledger, context: StatementContext): string {
  const currency = context.currency ?? 'USD';
  const { summary, terms } = ledger;
  const apr = new Decimal(terms.annualRate).times(100).toFixed(3);

  const out: string[] = [
    'Loan Statement',
    `${context.loanName} - Generated ${formatLongDate(context.generatedOn)}`,
    '',
    `Lender: ${context.lenderName ?? ''}`,
    `Borrower: ${context.borrowerName ?? ''}`,
    `Origination: ${formatUsDate(terms.originationDate)}`,
    `APR: ${apr}% (ACT/365 simple interest)`,
    `Late Fee: ${describeLateFee(terms.lateFee, currency)}`,
    `As Of: ${formatUsDate(ledger.asOfDate)}`,
    '',
    `Beginning Principal Balance: ${formatMoney(summary.beginningPrincipalCents, currency)}`,
    `Payments Posted (Total): ${formatMoney(summary.totalPostedCents, currency)}`,
    `Accrued Interest (All Cycles): ${formatMoney(summary.totalInterestCents, currency)}`,
    `Late Fees Assessed (Total): ${formatMoney(summary.totalLateFeesCents, currency)}`,
    `Allocated to Principal (Total): ${formatMoney(summary.totalPrincipalAppliedCents, currency)}`,
    `Ending Principal Balance: ${formatMoney(summary.endingPrincipalCents, currency)}`,
  ];

  if (ledger.carryForwardCents > 0) {
    out.push(`Unapplied Credit: ${formatMoney(ledger.carryForwardCents, currency)}`);
  }

  out.push(
    '',
    'Allocation: early payments satisfy the next due interest; principal reduces only when a cycle is satisfied after its due date and that payment exceeds the interest due.',
    'Late fees are capitalized into principal when a cycle is not satisfied by the due date plus grace.',
  );

  if (context.viewer === 'borrower' && summary.hasOpenCycle) {
    const open = ledger.rows[ledger.rows.length - 1];
    const shortfall = subtractCents(open.cycleInterestCents, open.amountPostedCents);
    out.push('', `Amount needed to satisfy the ${formatUsDate(open.dueDate)} cycle: ${formatMoney(shortfall, currency)}`);
  }

  const pages = Math.ceil(ledger.rows.length / ROWS_PER_PAGE);
  for (let page = 0; page < pages; page++) {
    const chunk = ledger.rows.slice(page * ROWS_PER_PAGE, (page + 1) * ROWS_PER_PAGE);
    out.push('', `Payment & Accrual Activity (page ${page + 1} of ${pages})`, ...renderTable(chunk, currency));
  }

  return out.join('\n') + '\n';
}
