import { and, asc, eq } from 'drizzle-orm';
import { createId } from '@paralleldrive/cuid2';
import Decimal from 'decimal.js';
import type { DB } from '../db/index.js';
import { loans, payments } from '../db/schema.js';
import { computeLedger } from '../ledger/engine.js';
import type { Ledger, LoanTerms, PaymentEvent } from '../ledger/types.js';
import { computeWaterfallLedger, type WaterfallLedger, type WaterfallOptions } from '../ledger/waterfall.js';
import { bpsToRate } from '../math/interest.js';
import type { LoanRow, LoanSummary, StoredPayment } from './types.js';

/** Stored columns become engine terms here, once; nothing downstream reads the row. */
export function loanTermsFromRow(loan: LoanRow): LoanTerms {
  const graceDays = loan.graceDays;
  return {
    principalCents: loan.principalCents,
    originationDate: loan.originationDate,
    annualRate: bpsToRate(loan.aprBps),
    lateFee:
      loan.lateFeeType === 'percent'
        ? {
            kind: 'percent_of_cycle_interest',
            percent: new Decimal(loan.lateFeePercentBps).dividedBy(100).toNumber(),
            graceDays,
          }
        : { kind: 'fixed', amountCents: loan.lateFeeCents, graceDays },
  };
}

export function waterfallOptionsFromRow(loan: LoanRow): WaterfallOptions {
  return { penaltyAnnualRate: loan.penaltyAprBps === null ? null : bpsToRate(loan.penaltyAprBps) };
}

export function getLoan(db: DB, loanId: string): LoanRow | null {
  const loan = db.select().from(loans).where(eq(loans.id, loanId)).get();
  return loan && loan.isActive ? loan : null;
}

export function getLoanByToken(db: DB, token: string): LoanRow | null {
  const loan = db.select().from(loans).where(eq(loans.borrowerToken, token)).get();
  return loan && loan.isActive ? loan : null;
}

/** Issues a fresh share token; links carrying the old one stop resolving. */
export function regenerateBorrowerToken(db: DB, loanId: string): string | null {
  if (!getLoan(db, loanId)) return null;

  const borrowerToken = createId();
  db.update(loans)
    .set({ borrowerToken, updatedAt: new Date().toISOString() })
    .where(eq(loans.id, loanId))
    .run();
  return borrowerToken;
}

export function listLoanPayments(db: DB, loanId: string): StoredPayment[] {
  return db
    .select({
      id: payments.id,
      loanId: payments.loanId,
      date: payments.date,
      amountCents: payments.amountCents,
    })
    .from(payments)
    .where(eq(payments.loanId, loanId))
    .orderBy(asc(payments.date), asc(payments.createdAt))
    .all();
}

export function getLoanPayments(db: DB, loanId: string): PaymentEvent[] {
  return listLoanPayments(db, loanId).map((p) => ({ date: p.date, amountCents: p.amountCents }));
}

export function addLoanPayment(db: DB, loanId: string, payment: PaymentEvent): StoredPayment {
  const created = db
    .insert(payments)
    .values({ loanId, date: payment.date, amountCents: payment.amountCents })
    .returning()
    .get();
  return { id: created.id, loanId: created.loanId, date: created.date, amountCents: created.amountCents };
}

export function deleteLoanPayment(db: DB, loanId: string, paymentId: string): boolean {
  const result = db
    .delete(payments)
    .where(and(eq(payments.id, paymentId), eq(payments.loanId, loanId)))
    .run();
  return result.changes > 0;
}

/**
 * Swaps a loan's whole payment set in one transaction, so a ledger never
 * sees half of an import.
 */
export function replaceLoanPayments(db: DB, loanId: string, events: readonly PaymentEvent[]): number {
  return db.transaction((tx) => {
    tx.delete(payments).where(eq(payments.loanId, loanId)).run();
    if (events.length === 0) return 0;

    tx.insert(payments)
      .values(events.map((e) => ({ loanId, date: e.date, amountCents: e.amountCents })))
      .run();
    return events.length;
  });
}

export function getLoanLedger(db: DB, loanId: string, asOfDate: string): Ledger | null {
  const loan = getLoan(db, loanId);
  if (!loan) return null;

  return computeLedger(loanTermsFromRow(loan), getLoanPayments(db, loanId), { asOfDate });
}

export function getLoanWaterfall(db: DB, loanId: string): WaterfallLedger | null {
  const loan = getLoan(db, loanId);
  if (!loan) return null;

  return computeWaterfallLedger(loanTermsFromRow(loan), getLoanPayments(db, loanId), waterfallOptionsFromRow(loan));
}

export function getLoanSummary(db: DB, loanId: string, asOfDate: string): LoanSummary | null {
  const loan = getLoan(db, loanId);
  if (!loan) return null;

  const stored = getLoanPayments(db, loanId);
  const terms = loanTermsFromRow(loan);
  const currentPrincipalCents =
    loan.allocationPolicy === 'waterfall'
      ? computeWaterfallLedger(terms, stored, waterfallOptionsFromRow(loan)).summary.endingPrincipalCents
      : computeLedger(terms, stored, { asOfDate }).summary.endingPrincipalCents;

  return {
    id: loan.id,
    name: loan.name,
    lenderName: loan.lenderName,
    borrowerName: loan.borrowerName,
    principalCents: loan.principalCents,
    aprBps: loan.aprBps,
    originationDate: loan.originationDate,
    lateFeeType: loan.lateFeeType,
    lateFeeCents: loan.lateFeeCents,
    lateFeePercentBps: loan.lateFeePercentBps,
    graceDays: loan.graceDays,
    penaltyAprBps: loan.penaltyAprBps,
    allocationPolicy: loan.allocationPolicy,
    borrowerToken: loan.borrowerToken,
    note: loan.note,
    paymentCount: stored.length,
    lastPaymentDate: stored.length > 0 ? stored[stored.length - 1].date : null,
    currentPrincipalCents,
  };
}
