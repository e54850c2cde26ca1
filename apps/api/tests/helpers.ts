import { createDb, migrate, type DB } from '@loan-ledger/engine';
import { createApp } from '../src/app.js';

export type App = ReturnType<typeof createApp>;

export function createTestDb(): DB {
  const db = createDb(':memory:');
  migrate(db);
  return db;
}

export async function api(app: App, method: string, path: string, body?: unknown, headers: Record<string, string> = {}) {
  const init: RequestInit = {
    method,
    headers: { 'Content-Type': 'application/json', ...headers },
  };
  if (body !== undefined) init.body = JSON.stringify(body);
  const res = await app.request(path, init);
  return { status: res.status, data: await res.json() };
}

export const familyLoan = {
  name: 'Family Loan',
  lenderName: 'Test Lender',
  borrowerName: 'Test Borrower',
  principalCents: 10000000,
  aprBps: 600,
  originationDate: '2023-01-31',
  lateFeeCents: 5000,
  graceDays: 10,
};

export async function createLoan(app: App, overrides: Record<string, unknown> = {}): Promise<{ id: string; borrowerToken: string }> {
  const { status, data } = await api(app, 'POST', '/api/v1/loans?asOf=2023-01-31', { ...familyLoan, ...overrides });
  if (status !== 201) throw new Error(`Loan creation failed with ${status}: ${JSON.stringify(data)}`);
  return data;
}
