import { sql } from 'drizzle-orm';
import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

export const REPLY_OUTCOMES = ['succeeded', 'failed', 'skipped'] as const;
export type ReplyOutcome = (typeof REPLY_OUTCOMES)[number];

/**
 * Append-only log of reply attempts. A review has at most one settled
 * (succeeded or skipped) record; failed attempts accumulate as history.
 */
export const replyRecords = sqliteTable(
  'reply_records',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    reviewId: text('review_id').notNull(),
    replyText: text('reply_text'),
    outcome: text('outcome', { enum: REPLY_OUTCOMES }).notNull(),
    reason: text('reason'),
    attemptedAt: integer('attempted_at', { mode: 'timestamp' })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (table) => ({
    reviewIdx: index('reply_records_review_idx').on(table.reviewId),
    settledIdx: uniqueIndex('reply_records_settled_review_idx')
      .on(table.reviewId)
      .where(sql`outcome <> 'failed'`),
  }),
);
