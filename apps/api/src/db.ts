import { createDb, migrate, type DB } from '@loan-ledger/engine';

export function openDb(dbPath: string): DB {
  const db = createDb(dbPath);
  migrate(db);
  return db;
}
