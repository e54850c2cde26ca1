import Decimal from 'decimal.js';
import { accrueInterest } from '../math/interest.js';
import { addCents, subtractCents, sumCents } from '../math/money.js';
import { normalizePayments } from '../payments/normalize.js';
import { addDays, daysBetween, dueDateHorizon, isIsoDate, nextDueDate } from '../scheduler/engine.js';
import { InvalidTermsError, UnorderedPaymentsError } from './errors.js';
import { assessLateFee } from './late-fee.js';
import type {
  CycleRecord,
  Ledger,
  LedgerOptions,
  LedgerSummary,
  LoanTerms,
  PaymentEvent,
} from './types.js';

export function validateTerms(terms: LoanTerms): void {
  if (!isIsoDate(terms.originationDate)) {
    throw new InvalidTermsError(`Origination date '${terms.originationDate}' is not a YYYY-MM-DD date`);
  }
  if (!Number.isInteger(terms.principalCents) || terms.principalCents < 0) {
    throw new InvalidTermsError('Principal must be a non-negative whole number of cents');
  }
  if (!Number.isFinite(terms.annualRate) || terms.annualRate < 0) {
    throw new InvalidTermsError('Annual rate must be a non-negative decimal fraction');
  }

  const { lateFee } = terms;
  if (!Number.isInteger(lateFee.graceDays) || lateFee.graceDays < 0) {
    throw new InvalidTermsError('Grace period must be a non-negative whole number of days');
  }
  const feeAmount = lateFee.kind === 'fixed' ? lateFee.amountCents : lateFee.percent;
  if (!Number.isFinite(feeAmount) || feeAmount < 0) {
    throw new InvalidTermsError('Late fee amount must be non-negative');
  }
}

export function assertChronological(events: readonly PaymentEvent[]): void {
  for (let i = 1; i < events.length; i++) {
    if (events[i].date < events[i - 1].date) {
      throw new UnorderedPaymentsError(events[i - 1].date, events[i].date);
    }
  }
}

/**
 * Walks consumed payments newest-first, peeling each one off the pool, and
 * returns the date of the first payment whose removal leaves the pool short
 * of `requiredCents`: the payment that completed coverage.
 */
export function attributeSatisfyingPayment(
  consumed: readonly PaymentEvent[],
  poolCents: number,
  requiredCents: number,
): string | null {
  let remaining = poolCents;
  for (let i = consumed.length - 1; i >= 0; i--) {
    remaining = subtractCents(remaining, consumed[i].amountCents);
    if (remaining < requiredCents) return consumed[i].date;
  }
  return null;
}

export function summarizeLedger(principalCents: number, rows: readonly CycleRecord[]): LedgerSummary {
  const last = rows[rows.length - 1];
  return {
    beginningPrincipalCents: principalCents,
    endingPrincipalCents: last ? last.endingPrincipalCents : principalCents,
    totalPostedCents: sumCents(rows.map((r) => r.amountPostedCents)),
    totalInterestCents: sumCents(rows.map((r) => r.cycleInterestCents)),
    totalLateFeesCents: sumCents(rows.map((r) => r.lateFeeCents)),
    totalPrincipalAppliedCents: sumCents(rows.map((r) => r.principalAppliedCents)),
    cycles: rows.length,
    lateCycles: rows.filter((r) => r.status !== 'on_time').length,
    hasOpenCycle: last?.status === 'open',
  };
}

export function computeLedger(
  terms: LoanTerms,
  payments: readonly PaymentEvent[],
  options: LedgerOptions,
): Ledger {
  validateTerms(terms);
  if (!isIsoDate(options.asOfDate)) {
    throw new InvalidTermsError(`As-of date '${options.asOfDate}' is not a YYYY-MM-DD date`);
  }

  const normalized = normalizePayments(payments);
  const excludedPayments = normalized.filter((p) => p.date < terms.originationDate);
  const events = normalized.filter((p) => p.date >= terms.originationDate);
  assertChronological(events);

  const rate = new Decimal(terms.annualRate);
  const lastPayment = events[events.length - 1];
  const horizon = dueDateHorizon(terms.originationDate, lastPayment ? lastPayment.date : null);

  const rows: CycleRecord[] = [];
  let balance = terms.principalCents;
  let pool = 0;
  let cursor = 0;
  let previousDue = terms.originationDate;

  for (let cycle = 1; cycle <= horizon; cycle++) {
    const dueDate = nextDueDate(terms.originationDate, cycle);
    const interest = accrueInterest(balance, rate, daysBetween(previousDue, dueDate));

    while (cursor < events.length && events[cursor].date <= dueDate) {
      pool = addCents(pool, events[cursor].amountCents);
      cursor++;
    }

    if (pool >= interest) {
      // Covered by the due date: surplus stays pooled for later cycles, never principal
      // Nothing owed: the due date itself satisfies the cycle
      const satisfyingPaymentDate =
        (interest > 0 ? attributeSatisfyingPayment(events.slice(0, cursor), pool, interest) : null) ?? dueDate;
      pool = subtractCents(pool, interest);

      rows.push({
        cycle,
        dueDate,
        satisfyingPaymentDate,
        daysLate: 0,
        cycleInterestCents: interest,
        lateFeeCents: 0,
        principalAppliedCents: 0,
        amountPostedCents: interest,
        endingPrincipalCents: balance,
        status: 'on_time',
      });
      previousDue = dueDate;
      continue;
    }

    let satisfying: PaymentEvent | null = null;
    while (pool < interest && cursor < events.length) {
      satisfying = events[cursor];
      pool = addCents(pool, satisfying.amountCents);
      cursor++;
    }

    if (!satisfying || pool < interest) {
      const lateFeeCents = assessLateFee(interest, terms.lateFee);
      balance = addCents(balance, lateFeeCents);

      rows.push({
        cycle,
        dueDate,
        satisfyingPaymentDate: null,
        daysLate: Math.max(0, daysBetween(dueDate, options.asOfDate)),
        cycleInterestCents: interest,
        lateFeeCents,
        principalAppliedCents: 0,
        amountPostedCents: pool,
        endingPrincipalCents: balance,
        status: 'open',
      });
      pool = 0;
      break;
    }

    const graceEnd = addDays(dueDate, terms.lateFee.graceDays);
    const lateFeeCents = satisfying.date > graceEnd ? assessLateFee(interest, terms.lateFee) : 0;
    balance = addCents(balance, lateFeeCents);

    // Only the satisfying payment's overshoot reduces principal; the balance floors at zero
    const excess = subtractCents(pool, interest);
    const principalAppliedCents = Math.min(excess, balance);
    pool = subtractCents(excess, principalAppliedCents);
    balance = subtractCents(balance, principalAppliedCents);

    rows.push({
      cycle,
      dueDate,
      satisfyingPaymentDate: satisfying.date,
      daysLate: daysBetween(dueDate, satisfying.date),
      cycleInterestCents: interest,
      lateFeeCents,
      principalAppliedCents,
      amountPostedCents: addCents(interest, principalAppliedCents),
      endingPrincipalCents: balance,
      status: 'late',
    });
    previousDue = dueDate;
  }

  return {
    terms,
    asOfDate: options.asOfDate,
    rows,
    excludedPayments,
    carryForwardCents: pool,
    summary: summarizeLedger(terms.principalCents, rows),
  };
}
