import { Hono } from 'hono';
import { type DB, getLoanByToken } from '@loan-ledger/engine';
import { AppError } from '../errors.js';
import { respondWithLedger, respondWithStatement } from './ledger.js';

const shareNotFound = () =>
  new AppError('NOT_FOUND', 'Shared loan not found', 404, 'Ask the lender for a current share link');

// Read-only borrower access by share token; mounted outside API-key auth
export function shareRoutes(db: DB, currency: string) {
  const router = new Hono();

  router.get('/:token', (c) => {
    const loan = getLoanByToken(db, c.req.param('token'));
    if (!loan) throw shareNotFound();
    return c.json({
      name: loan.name,
      lenderName: loan.lenderName,
      borrowerName: loan.borrowerName,
      originationDate: loan.originationDate,
      principalCents: loan.principalCents,
      aprBps: loan.aprBps,
    });
  });

  router.get('/:token/ledger', (c) => {
    const loan = getLoanByToken(db, c.req.param('token'));
    if (!loan) throw shareNotFound();
    return respondWithLedger(c, db, loan, 'borrower', currency);
  });

  router.get('/:token/statement', (c) => {
    const loan = getLoanByToken(db, c.req.param('token'));
    if (!loan) throw shareNotFound();
    return respondWithStatement(c, db, loan, 'borrower', currency);
  });

  return router;
}
