import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { LedgerErrorCode } from '@loan-ledger/engine';

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public status: ContentfulStatusCode = 400,
    public suggestion = '',
  ) {
    super(message);
  }
}

export const notFound = (
  entity: string,
  id: string,
  suggestion = `Use GET /api/v1/${entity.toLowerCase()}s to list available IDs`,
) => new AppError('NOT_FOUND', `${entity} '${id}' not found`, 404, suggestion);

export const validationError = (message: string) =>
  new AppError('VALIDATION_ERROR', message, 400, 'Check request body');

export const LEDGER_ERROR_RESPONSES: Record<LedgerErrorCode, { status: ContentfulStatusCode; suggestion: string }> = {
  INVALID_TERMS: {
    status: 422,
    suggestion: 'Fix the loan terms with PATCH /api/v1/loans/:id',
  },
  INVALID_PAYMENT_FILE: {
    status: 400,
    suggestion: 'Upload a CSV with Date and Amount columns',
  },
  INVALID_ACCRUAL_SPAN: {
    status: 500,
    suggestion: 'Check server logs',
  },
  UNORDERED_INTERNAL_STATE: {
    status: 500,
    suggestion: 'Check server logs',
  },
};
