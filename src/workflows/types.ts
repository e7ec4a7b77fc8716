import type { FailureKind } from '../lib/errors.js';
import type { Review } from '../services/gbp/types.js';
import type { PostOutcome } from '../services/gbp/reply-poster.js';
import type { ReplyOutcome } from '../db/schema.js';

export type CycleTrigger = 'scheduled' | 'manual' | 'startup';

export interface CycleFailure {
  /** Absent for failures of the cycle as a whole, e.g. the review fetch. */
  reviewId?: string;
  kind: FailureKind;
  reason?: string;
  message: string;
  retryable: boolean;
}

export interface PostedReply {
  reviewId: string;
  authorName: string;
  rating: number;
  replyText: string;
}

export interface CycleReport {
  trigger: CycleTrigger;
  startedAt: Date;
  finishedAt: Date;
  status: 'completed' | 'aborted';
  abortReason?: FailureKind;
  fetched: number;
  candidates: number;
  replied: number;
  reconciled: number;
  skipped: number;
  deferred: number;
  failed: number;
  failures: CycleFailure[];
  replies: PostedReply[];
}

export interface Notifier {
  notify(report: CycleReport): Promise<void>;
}

export interface ReviewSource {
  fetchReviews(): Promise<Review[]>;
}

export interface ReplyAuthor {
  generate(review: Review): Promise<string>;
}

export interface ReplySubmitter {
  postReply(reviewId: string, replyText: string): Promise<PostOutcome>;
}

export interface SeenReviewTracker {
  isSeen(reviewId: string): boolean;
  isSkipped(reviewId: string): boolean;
  record(reviewId: string, replyText: string | null, outcome: ReplyOutcome, reason?: string): boolean;
}
