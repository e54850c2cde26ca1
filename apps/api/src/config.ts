import { z } from 'zod';

const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  LOAN_LEDGER_DB_PATH: z.string().min(1).default('./data/loan-ledger.db'),
  LOAN_LEDGER_API_KEY: z.preprocess(blankAsUndefined, z.string().min(1).optional()),
  LOAN_LEDGER_CURRENCY: z.preprocess(blankAsUndefined, z.string().length(3).default('USD')),
});

export interface AppConfig {
  port: number;
  dbPath: string;
  /** Null disables API-key auth (local use). */
  apiKey: string | null;
  currency: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  return {
    port: parsed.data.PORT,
    dbPath: parsed.data.LOAN_LEDGER_DB_PATH,
    apiKey: parsed.data.LOAN_LEDGER_API_KEY ?? null,
    currency: parsed.data.LOAN_LEDGER_CURRENCY.toUpperCase(),
  };
}
