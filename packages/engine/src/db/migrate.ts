import type { DB } from './index.js';

const DDL = `
  CREATE TABLE IF NOT EXISTS loans (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    lender_name TEXT,
    borrower_name TEXT,
    principal_cents INTEGER NOT NULL CHECK(principal_cents >= 0),
    apr_bps INTEGER NOT NULL DEFAULT 0 CHECK(apr_bps >= 0),
    origination_date TEXT NOT NULL,
    late_fee_type TEXT NOT NULL DEFAULT 'fixed' CHECK(late_fee_type IN ('fixed', 'percent')),
    late_fee_cents INTEGER NOT NULL DEFAULT 0,
    late_fee_percent_bps INTEGER NOT NULL DEFAULT 0,
    grace_days INTEGER NOT NULL DEFAULT 0 CHECK(grace_days >= 0),
    penalty_apr_bps INTEGER,
    allocation_policy TEXT NOT NULL DEFAULT 'capitalize' CHECK(allocation_policy IN ('capitalize', 'waterfall')),
    borrower_token TEXT NOT NULL UNIQUE,
    note TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_loans_active ON loans(is_active);

  CREATE TABLE IF NOT EXISTS payments (
    id TEXT PRIMARY KEY,
    loan_id TEXT NOT NULL REFERENCES loans(id),
    date TEXT NOT NULL,
    amount_cents INTEGER NOT NULL CHECK(amount_cents > 0),
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_payments_loan_date ON payments(loan_id, date);
`;

/** Creates the schema in place; safe to run on every start. */
export function migrate(db: DB): void {
  db.$client.exec(DDL);
}
