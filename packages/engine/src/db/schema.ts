import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import { createId } from '@paralleldrive/cuid2';

export const loans = sqliteTable('loans', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  name: text('name').notNull(),
  lenderName: text('lender_name'),
  borrowerName: text('borrower_name'),
  principalCents: integer('principal_cents').notNull(),
  aprBps: integer('apr_bps').notNull().default(0),
  originationDate: text('origination_date').notNull(),
  lateFeeType: text('late_fee_type', {
    enum: ['fixed', 'percent'],
  }).notNull().default('fixed'),
  lateFeeCents: integer('late_fee_cents').notNull().default(0),
  lateFeePercentBps: integer('late_fee_percent_bps').notNull().default(0),
  graceDays: integer('grace_days').notNull().default(0),
  penaltyAprBps: integer('penalty_apr_bps'),
  allocationPolicy: text('allocation_policy', {
    enum: ['capitalize', 'waterfall'],
  }).notNull().default('capitalize'),
  borrowerToken: text('borrower_token').notNull().unique().$defaultFn(() => createId()),
  note: text('note'),
  isActive: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
  updatedAt: text('updated_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  index('idx_loans_active').on(table.isActive),
]);

export const payments = sqliteTable('payments', {
  id: text('id').primaryKey().$defaultFn(() => createId()),
  loanId: text('loan_id').notNull().references(() => loans.id),
  date: text('date').notNull(),
  amountCents: integer('amount_cents').notNull(),
  createdAt: text('created_at').notNull().$defaultFn(() => new Date().toISOString()),
}, (table) => [
  index('idx_payments_loan_date').on(table.loanId, table.date),
]);
