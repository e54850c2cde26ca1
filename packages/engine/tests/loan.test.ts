import { describe, it, expect, beforeEach } from 'vitest';
import { eq } from 'drizzle-orm';
import { createDb, type DB } from '../src/db/index.js';
import { migrate } from '../src/db/migrate.js';
import { loans } from '../src/db/schema.js';
import {
  addLoanPayment,
  deleteLoanPayment,
  getLoan,
  getLoanByToken,
  getLoanLedger,
  getLoanPayments,
  getLoanSummary,
  getLoanWaterfall,
  listLoanPayments,
  loanTermsFromRow,
  regenerateBorrowerToken,
  replaceLoanPayments,
  waterfallOptionsFromRow,
} from '../src/loan/engine.js';

function createAndSeedDb(): DB {
  const db = createDb(':memory:');
  migrate(db);

  db.insert(loans)
    .values({
      id: 'loan-family',
      name: 'Family Loan',
      lenderName: 'Test Lender',
      borrowerName: 'Test Borrower',
      principalCents: 10000000,
      aprBps: 600,
      originationDate: '2023-01-31',
      lateFeeType: 'fixed',
      lateFeeCents: 5000,
      graceDays: 10,
      borrowerToken: 'token-family',
    })
    .run();

  db.insert(loans)
    .values({
      id: 'loan-legacy',
      name: 'Legacy Loan',
      principalCents: 10000000,
      aprBps: 600,
      originationDate: '2023-01-31',
      lateFeeType: 'percent',
      lateFeePercentBps: 1000,
      graceDays: 10,
      penaltyAprBps: 1800,
      allocationPolicy: 'waterfall',
      borrowerToken: 'token-legacy',
    })
    .run();

  db.insert(loans)
    .values({
      id: 'loan-penalty',
      name: 'Penalty Loan',
      principalCents: 1000000,
      aprBps: 600,
      originationDate: '2023-01-15',
      lateFeeType: 'fixed',
      lateFeeCents: 50000,
      graceDays: 0,
      penaltyAprBps: 36000,
      allocationPolicy: 'waterfall',
      borrowerToken: 'token-penalty',
    })
    .run();

  db.insert(loans)
    .values({
      id: 'loan-closed',
      name: 'Closed Loan',
      principalCents: 100000,
      originationDate: '2022-01-01',
      borrowerToken: 'token-closed',
      isActive: false,
    })
    .run();

  return db;
}

describe('Loan repository', () => {
  let db: DB;

  beforeEach(() => {
    db = createAndSeedDb();
  });

  describe('getLoan / getLoanByToken', () => {
    it('finds active loans by id and share token', () => {
      expect(getLoan(db, 'loan-family')?.name).toBe('Family Loan');
      expect(getLoanByToken(db, 'token-family')?.id).toBe('loan-family');
    });

    it('hides deactivated and unknown loans', () => {
      expect(getLoan(db, 'loan-closed')).toBeNull();
      expect(getLoanByToken(db, 'token-closed')).toBeNull();
      expect(getLoan(db, 'nonexistent')).toBeNull();
    });
  });

  describe('loanTermsFromRow', () => {
    it('maps a fixed fee loan', () => {
      const loan = getLoan(db, 'loan-family');
      expect(loan).not.toBeNull();
      expect(loanTermsFromRow(loan!)).toEqual({
        principalCents: 10000000,
        originationDate: '2023-01-31',
        annualRate: 0.06,
        lateFee: { kind: 'fixed', amountCents: 5000, graceDays: 10 },
      });
    });

    it('maps percent basis points to a percentage', () => {
      const loan = getLoan(db, 'loan-legacy');
      expect(loanTermsFromRow(loan!).lateFee).toEqual({
        kind: 'percent_of_cycle_interest',
        percent: 10,
        graceDays: 10,
      });
    });
  });

  describe('waterfallOptionsFromRow', () => {
    it('converts the stored penalty APR', () => {
      expect(waterfallOptionsFromRow(getLoan(db, 'loan-legacy')!)).toEqual({ penaltyAnnualRate: 0.18 });
    });

    it('leaves the penalty rate unset when none is stored', () => {
      expect(waterfallOptionsFromRow(getLoan(db, 'loan-family')!)).toEqual({ penaltyAnnualRate: null });
    });
  });

  describe('regenerateBorrowerToken', () => {
    it('replaces the share token', () => {
      const token = regenerateBorrowerToken(db, 'loan-family');

      expect(token).toEqual(expect.any(String));
      expect(token).not.toBe('token-family');
      expect(getLoanByToken(db, 'token-family')).toBeNull();
      expect(getLoanByToken(db, token!)?.id).toBe('loan-family');
    });

    it('returns null for unknown and deactivated loans', () => {
      expect(regenerateBorrowerToken(db, 'nonexistent')).toBeNull();
      expect(regenerateBorrowerToken(db, 'loan-closed')).toBeNull();
    });
  });

  describe('payments', () => {
    it('adds payments and lists them by date', () => {
      addLoanPayment(db, 'loan-family', { date: '2023-03-31', amountCents: 50959 });
      const first = addLoanPayment(db, 'loan-family', { date: '2023-02-28', amountCents: 46027 });

      expect(first.loanId).toBe('loan-family');
      expect(first.id).toEqual(expect.any(String));
      expect(getLoanPayments(db, 'loan-family')).toEqual([
        { date: '2023-02-28', amountCents: 46027 },
        { date: '2023-03-31', amountCents: 50959 },
      ]);
    });

    it('rejects a payment for a loan that does not exist', () => {
      expect(() => addLoanPayment(db, 'nonexistent', { date: '2023-02-28', amountCents: 1 })).toThrow();
    });

    it('deletes a payment only through its own loan', () => {
      const payment = addLoanPayment(db, 'loan-family', { date: '2023-02-28', amountCents: 46027 });

      expect(deleteLoanPayment(db, 'loan-legacy', payment.id)).toBe(false);
      expect(deleteLoanPayment(db, 'loan-family', payment.id)).toBe(true);
      expect(listLoanPayments(db, 'loan-family')).toEqual([]);
    });

    it('replaces the whole payment set', () => {
      addLoanPayment(db, 'loan-family', { date: '2023-02-28', amountCents: 46027 });

      const count = replaceLoanPayments(db, 'loan-family', [
        { date: '2023-02-10', amountCents: 25000 },
        { date: '2023-02-10', amountCents: 25000 },
      ]);

      expect(count).toBe(2);
      expect(getLoanPayments(db, 'loan-family').map((p) => p.date)).toEqual(['2023-02-10', '2023-02-10']);
      expect(replaceLoanPayments(db, 'loan-family', [])).toBe(0);
      expect(getLoanPayments(db, 'loan-family')).toEqual([]);
    });

    it('leaves other loans untouched on replace', () => {
      addLoanPayment(db, 'loan-legacy', { date: '2023-02-28', amountCents: 100 });
      replaceLoanPayments(db, 'loan-family', []);
      expect(getLoanPayments(db, 'loan-legacy')).toHaveLength(1);
    });
  });

  describe('getLoanLedger', () => {
    it('computes the ledger from stored payments', () => {
      addLoanPayment(db, 'loan-family', { date: '2023-03-15', amountCents: 60000 });

      const ledger = getLoanLedger(db, 'loan-family', '2023-04-15');
      expect(ledger?.rows.map((r) => [r.status, r.endingPrincipalCents])).toEqual([
        ['late', 9991027],
        ['open', 9996027],
      ]);
    });

    it('returns null for unknown loan', () => {
      expect(getLoanLedger(db, 'nonexistent', '2023-04-15')).toBeNull();
    });
  });

  describe('getLoanWaterfall', () => {
    it('applies the stored penalty rate', () => {
      addLoanPayment(db, 'loan-legacy', { date: '2023-03-15', amountCents: 60000 });

      const ledger = getLoanWaterfall(db, 'loan-legacy');
      expect(ledger?.rows[0].penaltyInterestAccruedCents).toBe(106);
      // 10% of a month of interest on 100,000.00 at 6%
      expect(ledger?.rows[0].lateFeeCents).toBe(5000);
    });
  });

  describe('getLoanSummary', () => {
    it('reports the capitalized principal for the default policy', () => {
      addLoanPayment(db, 'loan-family', { date: '2023-03-15', amountCents: 60000 });

      const summary = getLoanSummary(db, 'loan-family', '2023-04-15');
      expect(summary).not.toBeNull();
      expect(summary!.currentPrincipalCents).toBe(9996027);
      expect(summary!.paymentCount).toBe(1);
      expect(summary!.lastPaymentDate).toBe('2023-03-15');
      expect(summary!.borrowerToken).toBe('token-family');
    });

    it('reports the waterfall principal for legacy loans', () => {
      addLoanPayment(db, 'loan-legacy', { date: '2023-02-28', amountCents: 100000 });

      const summary = getLoanSummary(db, 'loan-legacy', '2023-04-15');
      expect(summary!.allocationPolicy).toBe('waterfall');
      expect(summary!.currentPrincipalCents).toBe(9946027);
    });

    it('charges penalty interest at the stored penalty APR', () => {
      addLoanPayment(db, 'loan-penalty', { date: '2023-02-20', amountCents: 100 });
      addLoanPayment(db, 'loan-penalty', { date: '2023-06-20', amountCents: 200000 });

      const summary = getLoanSummary(db, 'loan-penalty', '2023-07-01');
      const waterfall = getLoanWaterfall(db, 'loan-penalty');

      // 360% penalty interest on two 500.00 fees absorbs the whole payment before principal
      expect(waterfall?.summary.endingPrincipalCents).toBe(1000000);
      expect(summary!.currentPrincipalCents).toBe(1000000);
    });

    it('handles a loan without payments', () => {
      const summary = getLoanSummary(db, 'loan-family', '2023-03-10');
      expect(summary!.paymentCount).toBe(0);
      expect(summary!.lastPaymentDate).toBeNull();
      expect(summary!.currentPrincipalCents).toBe(10005000);
    });

    it('returns null for a deactivated loan', () => {
      db.update(loans).set({ isActive: false }).where(eq(loans.id, 'loan-family')).run();
      expect(getLoanSummary(db, 'loan-family', '2023-04-15')).toBeNull();
    });
  });
});
