export type StatementViewer = 'lender' | 'borrower';

/**
 * Everything the statement needs beyond the ledger itself. Callers build it
 * per request instead of the renderer reaching for session state.
 */
export interface StatementContext {
  loanName: string;
  lenderName: string | null;
  borrowerName: string | null;
  viewer: StatementViewer;
  generatedOn: string;
  currency?: string;
}
