import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { type DB, LedgerError } from '@loan-ledger/engine';
import type { AppConfig } from './config.js';
import { AppError, LEDGER_ERROR_RESPONSES } from './errors.js';
import { loanRoutes } from './routes/loans.js';
import { paymentRoutes } from './routes/payments.js';
import { ledgerRoutes } from './routes/ledger.js';
import { shareRoutes } from './routes/share.js';
import { apiKeyAuth } from './middleware/auth.js';

export function createApp(db: DB, config: Pick<AppConfig, 'apiKey' | 'currency'>) {
  const app = new Hono();

  app.use('*', cors());
  app.use('*', logger());

  app.onError((err, c) => {
    if (err instanceof AppError) {
      return c.json(
        { error: { code: err.code, message: err.message, suggestion: err.suggestion } },
        err.status,
      );
    }

    if (err instanceof LedgerError) {
      const { status, suggestion } = LEDGER_ERROR_RESPONSES[err.code];
      return c.json({ error: { code: err.code, message: err.message, suggestion } }, status);
    }

    console.error(err);
    return c.json(
      { error: { code: 'INTERNAL_ERROR', message: err.message, suggestion: 'Check server logs' } },
      500,
    );
  });

  app.get('/health', (c) => c.json({ status: 'ok', version: '0.1.0' }));

  app.route('/share', shareRoutes(db, config.currency));

  app.use('/api/v1/*', apiKeyAuth(config.apiKey));

  app.route('/api/v1/loans', loanRoutes(db, config.currency));
  app.route('/api/v1/loans', paymentRoutes(db, config.currency));
  app.route('/api/v1/loans', ledgerRoutes(db, config.currency));

  return app;
}
