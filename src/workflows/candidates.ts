import type { Review } from '../services/gbp/types.js';
import type { SeenReviewTracker } from './types.js';

export interface CandidateOptions {
  /** Reviews created before this instant are never replied to. */
  replySince?: Date;
}

export type ReviewDisposition =
  | { kind: 'settled' }
  | { kind: 'upstream_replied'; replyText: string }
  | { kind: 'before_cutoff' }
  | { kind: 'candidate' };

/**
 * Decide what a cycle should do with one fetched review. Reads the ledger
 * and may throw when it cannot; writes nothing.
 */
export function classifyReview(
  review: Review,
  ledger: Pick<SeenReviewTracker, 'isSeen' | 'isSkipped'>,
  options: CandidateOptions,
): ReviewDisposition {
  if (ledger.isSeen(review.id) || ledger.isSkipped(review.id)) {
    return { kind: 'settled' };
  }
  if (review.existingReply) {
    return { kind: 'upstream_replied', replyText: review.existingReply.text };
  }
  if (options.replySince && review.createdAt < options.replySince) {
    return { kind: 'before_cutoff' };
  }
  return { kind: 'candidate' };
}
