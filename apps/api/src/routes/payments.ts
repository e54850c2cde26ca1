import { Hono } from 'hono';
import { z } from 'zod';
import {
  type DB,
  type StoredPayment,
  addLoanPayment,
  cleanPaymentRecords,
  deleteLoanPayment,
  formatMoney,
  getLoan,
  getLoanPayments,
  listLoanPayments,
  parsePaymentDate,
  parsePaymentsCsv,
  replaceLoanPayments,
} from '@loan-ledger/engine';
import { AppError, notFound } from '../errors.js';
import { parseBody } from '../request.js';

// Accepts ISO or MM/DD/YYYY and stores ISO
const paymentDate = z.string().transform((value, ctx) => {
  const date = parsePaymentDate(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected YYYY-MM-DD or MM/DD/YYYY' });
    return z.NEVER;
  }
  return date;
});

const paymentSchema = z.object({
  date: paymentDate,
  amountCents: z.number().int().positive(),
});

const replacePaymentsSchema = z.object({
  payments: z.array(paymentSchema),
});

function formatPayment(payment: StoredPayment, currency: string) {
  return { ...payment, amountFormatted: formatMoney(payment.amountCents, currency) };
}

export function paymentRoutes(db: DB, currency: string) {
  const router = new Hono();

  // GET /:id/payments
  router.get('/:id/payments', (c) => {
    const id = c.req.param('id');
    if (!getLoan(db, id)) throw notFound('Loan', id);

    return c.json({
      loanId: id,
      payments: listLoanPayments(db, id).map((p) => formatPayment(p, currency)),
    });
  });

  // POST /:id/payments — add one payment
  router.post('/:id/payments', async (c) => {
    const id = c.req.param('id');
    if (!getLoan(db, id)) throw notFound('Loan', id);

    const data = await parseBody(c, paymentSchema);
    const created = addLoanPayment(db, id, data);
    return c.json(formatPayment(created, currency), 201);
  });

  // PUT /:id/payments — replace the whole payment set
  router.put('/:id/payments', async (c) => {
    const id = c.req.param('id');
    if (!getLoan(db, id)) throw notFound('Loan', id);

    const data = await parseBody(c, replacePaymentsSchema);
    const count = replaceLoanPayments(db, id, data.payments);
    return c.json({ loanId: id, count });
  });

  // POST /:id/payments/import?mode=replace|append — CSV body
  router.post('/:id/payments/import', async (c) => {
    const id = c.req.param('id');
    if (!getLoan(db, id)) throw notFound('Loan', id);

    const mode = c.req.query('mode') ?? 'replace';
    if (mode !== 'replace' && mode !== 'append') {
      throw new AppError('VALIDATION_ERROR', `Unknown import mode '${mode}'`, 400, 'Use mode=replace or mode=append');
    }

    const records = parsePaymentsCsv(await c.req.text());
    const { payments, rejected } = cleanPaymentRecords(records);
    const next = mode === 'append' ? [...getLoanPayments(db, id), ...payments] : payments;
    replaceLoanPayments(db, id, next);

    return c.json({
      loanId: id,
      mode,
      imported: payments.length,
      total: next.length,
      rejected,
    });
  });

  // DELETE /:id/payments/:paymentId
  router.delete('/:id/payments/:paymentId', (c) => {
    const id = c.req.param('id');
    const paymentId = c.req.param('paymentId');
    if (!getLoan(db, id)) throw notFound('Loan', id);
    if (!deleteLoanPayment(db, id, paymentId)) {
      throw notFound('Payment', paymentId, `Use GET /api/v1/loans/${id}/payments to list payment IDs`);
    }

    return c.json({ success: true });
  });

  return router;
}
