import { Hono } from 'hono';
import { z } from 'zod';
import { eq } from 'drizzle-orm';
import {
  type DB,
  type LoanSummary,
  loans,
  formatMoney,
  getLoan,
  getLoanSummary,
  isIsoDate,
  regenerateBorrowerToken,
} from '@loan-ledger/engine';
import { notFound } from '../errors.js';
import { parseBody, resolveAsOf } from '../request.js';

const isoDate = z.string().refine(isIsoDate, { message: 'Expected a YYYY-MM-DD date' });

const createLoanSchema = z.object({
  name: z.string().min(1),
  lenderName: z.string().optional(),
  borrowerName: z.string().optional(),
  principalCents: z.number().int().min(0),
  aprBps: z.number().int().min(0).optional(),
  originationDate: isoDate,
  lateFeeType: z.enum(['fixed', 'percent']).optional(),
  lateFeeCents: z.number().int().min(0).optional(),
  lateFeePercentBps: z.number().int().min(0).optional(),
  graceDays: z.number().int().min(0).optional(),
  penaltyAprBps: z.number().int().min(0).nullable().optional(),
  allocationPolicy: z.enum(['capitalize', 'waterfall']).optional(),
  note: z.string().optional(),
});

const updateLoanSchema = z.object({
  name: z.string().min(1).optional(),
  lenderName: z.string().nullable().optional(),
  borrowerName: z.string().nullable().optional(),
  principalCents: z.number().int().min(0).optional(),
  aprBps: z.number().int().min(0).optional(),
  originationDate: isoDate.optional(),
  lateFeeType: z.enum(['fixed', 'percent']).optional(),
  lateFeeCents: z.number().int().min(0).optional(),
  lateFeePercentBps: z.number().int().min(0).optional(),
  graceDays: z.number().int().min(0).optional(),
  penaltyAprBps: z.number().int().min(0).nullable().optional(),
  allocationPolicy: z.enum(['capitalize', 'waterfall']).optional(),
  note: z.string().nullable().optional(),
});

function formatLoan(summary: LoanSummary, currency: string) {
  return {
    ...summary,
    principalFormatted: formatMoney(summary.principalCents, currency),
    lateFeeFormatted: formatMoney(summary.lateFeeCents, currency),
    currentPrincipalFormatted: formatMoney(summary.currentPrincipalCents, currency),
  };
}

export function loanRoutes(db: DB, currency: string) {
  const router = new Hono();

  // GET / — list all active loans
  router.get('/', (c) => {
    const asOf = resolveAsOf(c);
    const allLoans = db.select().from(loans).where(eq(loans.isActive, true)).all();
    const result = allLoans.flatMap((loan) => {
      const summary = getLoanSummary(db, loan.id, asOf);
      return summary ? [formatLoan(summary, currency)] : [];
    });
    return c.json(result);
  });

  // POST / — create loan
  router.post('/', async (c) => {
    const data = await parseBody(c, createLoanSchema);

    const created = db
      .insert(loans)
      .values({
        name: data.name,
        lenderName: data.lenderName ?? null,
        borrowerName: data.borrowerName ?? null,
        principalCents: data.principalCents,
        aprBps: data.aprBps ?? 0,
        originationDate: data.originationDate,
        lateFeeType: data.lateFeeType ?? 'fixed',
        lateFeeCents: data.lateFeeCents ?? 0,
        lateFeePercentBps: data.lateFeePercentBps ?? 0,
        graceDays: data.graceDays ?? 0,
        penaltyAprBps: data.penaltyAprBps ?? null,
        allocationPolicy: data.allocationPolicy ?? 'capitalize',
        note: data.note ?? null,
      })
      .returning()
      .get();

    const summary = getLoanSummary(db, created.id, resolveAsOf(c));
    if (!summary) throw notFound('Loan', created.id);
    return c.json(formatLoan(summary, currency), 201);
  });

  // GET /:id — single loan
  router.get('/:id', (c) => {
    const id = c.req.param('id');
    const summary = getLoanSummary(db, id, resolveAsOf(c));
    if (!summary) throw notFound('Loan', id);
    return c.json(formatLoan(summary, currency));
  });

  // PATCH /:id — update loan terms
  router.patch('/:id', async (c) => {
    const id = c.req.param('id');
    if (!getLoan(db, id)) throw notFound('Loan', id);

    const data = await parseBody(c, updateLoanSchema);

    db.update(loans)
      .set({ ...data, updatedAt: new Date().toISOString() })
      .where(eq(loans.id, id))
      .run();

    const summary = getLoanSummary(db, id, resolveAsOf(c));
    if (!summary) throw notFound('Loan', id);
    return c.json(formatLoan(summary, currency));
  });

  // POST /:id/share-token — revoke the current borrower link
  router.post('/:id/share-token', (c) => {
    const id = c.req.param('id');
    const borrowerToken = regenerateBorrowerToken(db, id);
    if (!borrowerToken) throw notFound('Loan', id);
    return c.json({ id, borrowerToken });
  });

  // DELETE /:id — soft delete
  router.delete('/:id', (c) => {
    const id = c.req.param('id');
    if (!getLoan(db, id)) throw notFound('Loan', id);

    db.update(loans)
      .set({ isActive: false, updatedAt: new Date().toISOString() })
      .where(eq(loans.id, id))
      .run();

    return c.json({ success: true });
  });

  return router;
}
