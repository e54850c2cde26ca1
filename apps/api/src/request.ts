import type { Context } from 'hono';
import type { z } from 'zod';
import { isIsoDate, todayIsoDate } from '@loan-ledger/engine';
import { validationError } from './errors.js';

export async function parseBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw validationError('Request body must be valid JSON');
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw validationError(parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join(', '));
  }
  return parsed.data;
}

/** `?asOf=YYYY-MM-DD`, defaulting to today. */
export function resolveAsOf(c: Context): string {
  const asOf = c.req.query('asOf');
  if (asOf === undefined) return todayIsoDate();
  if (!isIsoDate(asOf)) {
    throw validationError(`asOf '${asOf}' must be a YYYY-MM-DD date`);
  }
  return asOf;
}
