import Decimal from 'decimal.js';
import { accrueInterest } from '../math/interest.js';
import { addCents, percentOfCents, roundHalfUp, subtractCents, sumCents } from '../math/money.js';
import { normalizePayments } from '../payments/normalize.js';
import { addDays, daysBetween, previousDueDate } from '../scheduler/engine.js';
import { assertChronological, validateTerms } from './engine.js';
import type { LoanTerms, PaymentEvent } from './types.js';

// Legacy allocation policy: late fees and penalty interest are separate
// receivables paid ahead of loan interest and principal. Never capitalizes.

export interface WaterfallOptions {
  /** Penalty APR on outstanding late fees; the loan rate when absent or zero. */
  penaltyAnnualRate?: number | null;
}

export interface WaterfallRow {
  paymentDate: string;
  dueDate: string;
  amountCents: number;
  interestDueCents: number;
  penaltyInterestAccruedCents: number;
  lateFeeCents: number;
  toPenaltyInterestCents: number;
  toLateFeesCents: number;
  toInterestCents: number;
  toPrincipalCents: number;
  overpaymentCents: number;
  endingPrincipalCents: number;
  unpaidInterestCents: number;
  lateFeesOutstandingCents: number;
  penaltyInterestOutstandingCents: number;
}

export interface WaterfallLedger {
  terms: LoanTerms;
  rows: WaterfallRow[];
  excludedPayments: PaymentEvent[];
  summary: {
    endingPrincipalCents: number;
    unpaidInterestCents: number;
    lateFeesOutstandingCents: number;
    penaltyInterestOutstandingCents: number;
    totalPaidCents: number;
  };
}

function monthlyInterestReference(balanceCents: number, rate: Decimal): number {
  return roundHalfUp(new Decimal(balanceCents).times(rate).dividedBy(12));
}

export function computeWaterfallLedger(
  terms: LoanTerms,
  payments: readonly PaymentEvent[],
  options: WaterfallOptions = {},
): WaterfallLedger {
  validateTerms(terms);

  const normalized = normalizePayments(payments);
  const excludedPayments = normalized.filter((p) => p.date < terms.originationDate);
  const events = normalized.filter((p) => p.date >= terms.originationDate);
  assertChronological(events);

  const rate = new Decimal(terms.annualRate);
  const penaltyRate = options.penaltyAnnualRate ? new Decimal(options.penaltyAnnualRate) : rate;

  const rows: WaterfallRow[] = [];
  let principal = terms.principalCents;
  let unpaidInterest = 0;
  let lateFees = 0;
  let penaltyInterest = 0;
  let lastEventDate = terms.originationDate;
  let lastFeeDueDate: string | null = null;

  for (const event of events) {
    const dueDate = previousDueDate(terms.originationDate, event.date);
    const days = daysBetween(lastEventDate, event.date);

    const interestDue = addCents(accrueInterest(principal, rate, days), unpaidInterest);

    // One fee per missed due date, only once a due date has actually passed
    let lateFeeCents = 0;
    const pastGrace = event.date > addDays(dueDate, terms.lateFee.graceDays);
    if (dueDate !== terms.originationDate && pastGrace && lastFeeDueDate !== dueDate) {
      lateFeeCents =
        terms.lateFee.kind === 'fixed'
          ? terms.lateFee.amountCents
          : percentOfCents(monthlyInterestReference(principal, rate), terms.lateFee.percent);
      lateFees = addCents(lateFees, lateFeeCents);
      lastFeeDueDate = dueDate;
    }

    const penaltyAccrued = accrueInterest(lateFees, penaltyRate, days);
    penaltyInterest = addCents(penaltyInterest, penaltyAccrued);

    let remaining = event.amountCents;
    const toPenaltyInterest = Math.min(remaining, penaltyInterest);
    remaining = subtractCents(remaining, toPenaltyInterest);
    penaltyInterest = subtractCents(penaltyInterest, toPenaltyInterest);

    const toLateFees = Math.min(remaining, lateFees);
    remaining = subtractCents(remaining, toLateFees);
    lateFees = subtractCents(lateFees, toLateFees);

    const toInterest = Math.min(remaining, interestDue);
    remaining = subtractCents(remaining, toInterest);
    unpaidInterest = subtractCents(interestDue, toInterest);

    const toPrincipal = Math.min(remaining, principal);
    remaining = subtractCents(remaining, toPrincipal);
    principal = subtractCents(principal, toPrincipal);

    rows.push({
      paymentDate: event.date,
      dueDate,
      amountCents: event.amountCents,
      interestDueCents: interestDue,
      penaltyInterestAccruedCents: penaltyAccrued,
      lateFeeCents,
      toPenaltyInterestCents: toPenaltyInterest,
      toLateFeesCents: toLateFees,
      toInterestCents: toInterest,
      toPrincipalCents: toPrincipal,
      overpaymentCents: remaining,
      endingPrincipalCents: principal,
      unpaidInterestCents: unpaidInterest,
      lateFeesOutstandingCents: lateFees,
      penaltyInterestOutstandingCents: penaltyInterest,
    });

    lastEventDate = event.date;
  }

  return {
    terms,
    rows,
    excludedPayments,
    summary: {
      endingPrincipalCents: principal,
      unpaidInterestCents: unpaidInterest,
      lateFeesOutstandingCents: lateFees,
      penaltyInterestOutstandingCents: penaltyInterest,
      totalPaidCents: sumCents(rows.map((r) => r.amountCents)),
    },
  };
}
