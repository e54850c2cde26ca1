import { serve } from '@hono/node-server';
import { loadConfig } from './config.js';
import { openDb } from './db.js';
import { createApp } from './app.js';

const config = loadConfig();
const app = createApp(openDb(config.dbPath), config);

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`Loan Ledger API v0.1.0 → http://localhost:${info.port}`);
});
