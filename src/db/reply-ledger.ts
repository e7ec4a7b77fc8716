import { and, asc, count, eq, ne } from 'drizzle-orm';
import type { InferSelectModel } from 'drizzle-orm';
import type { AppDatabase } from './client.js';
import { replyRecords, type ReplyOutcome } from './schema.js';

export type ReplyRecord = InferSelectModel<typeof replyRecords>;

export type LedgerStats = Record<ReplyOutcome, number>;

/**
 * Durable record of which reviews have been replied to. The seen set is
 * every review with a succeeded record; it only ever grows.
 */
export class ReplyLedger {
  constructor(private readonly db: AppDatabase) {}

  isSeen(reviewId: string): boolean {
    return this.hasOutcome(reviewId, 'succeeded');
  }

  /** True when a terminal rejection took the review out of rotation. */
  isSkipped(reviewId: string): boolean {
    return this.hasOutcome(reviewId, 'skipped');
  }

  /**
   * Append a reply record. Returns false, writing nothing, when the outcome is
   * settled (succeeded or skipped) and the review already has a settled
   * record, so recording the same success twice is a no-op.
   */
  record(
    reviewId: string,
    replyText: string | null,
    outcome: ReplyOutcome,
    reason?: string,
  ): boolean {
    return this.db.transaction((tx) => {
      if (outcome !== 'failed') {
        const settled = tx
          .select({ id: replyRecords.id })
          .from(replyRecords)
          .where(and(eq(replyRecords.reviewId, reviewId), ne(replyRecords.outcome, 'failed')))
          .get();
        if (settled) return false;
      }

      const result = tx
        .insert(replyRecords)
        .values({ reviewId, replyText, outcome, reason: reason ?? null })
        .onConflictDoNothing()
        .run();
      return result.changes > 0;
    });
  }

  history(reviewId: string): ReplyRecord[] {
    return this.db
      .select()
      .from(replyRecords)
      .where(eq(replyRecords.reviewId, reviewId))
      .orderBy(asc(replyRecords.id))
      .all();
  }

  stats(): LedgerStats {
    const rows = this.db
      .select({ outcome: replyRecords.outcome, total: count() })
      .from(replyRecords)
      .groupBy(replyRecords.outcome)
      .all();

    const stats: LedgerStats = { succeeded: 0, failed: 0, skipped: 0 };
    for (const row of rows) {
      stats[row.outcome] = row.total;
    }
    return stats;
  }

  private hasOutcome(reviewId: string, outcome: ReplyOutcome): boolean {
    const row = this.db
      .select({ id: replyRecords.id })
      .from(replyRecords)
      .where(and(eq(replyRecords.reviewId, reviewId), eq(replyRecords.outcome, outcome)))
      .limit(1)
      .get();
    return row !== undefined;
  }
}
