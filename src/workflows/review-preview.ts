import { createChildLogger } from '../lib/logger.js';
import type { Review } from '../services/gbp/types.js';
import { classifyReview, type CandidateOptions } from './candidates.js';
import { toCycleFailure } from './cycle-report.js';
import type { CycleFailure, ReplyAuthor, ReviewSource, SeenReviewTracker } from './types.js';

const log = createChildLogger('review-preview');

export interface PreviewDeps {
  reviews: ReviewSource;
  generator: ReplyAuthor;
  ledger: Pick<SeenReviewTracker, 'isSeen' | 'isSkipped'>;
  options: CandidateOptions & { maxRepliesPerCycle: number };
  now?: () => Date;
}

export interface ReplyPreview {
  reviewId: string;
  authorName: string;
  rating: number;
  body: string;
  replyText: string | null;
  failure?: CycleFailure;
}

export interface PreviewReport {
  generatedAt: Date;
  fetched: number;
  candidates: number;
  /** Candidates past the per-cycle limit, which the next cycle would not reach. */
  deferred: number;
  previews: ReplyPreview[];
  failures: CycleFailure[];
}

/**
 * Draft the replies the next cycle would post, without posting or recording
 * anything. A failed fetch is thrown to the caller.
 */
export async function previewReplies(deps: PreviewDeps): Promise<PreviewReport> {
  const now = deps.now ?? (() => new Date());
  const reviews = await deps.reviews.fetchReviews();

  const failures: CycleFailure[] = [];
  const candidates: Review[] = [];
  for (const review of reviews) {
    try {
      if (classifyReview(review, deps.ledger, deps.options).kind === 'candidate') {
        candidates.push(review);
      }
    } catch (err) {
      log.error({ err, reviewId: review.id }, 'Failed to read ledger state for review');
      failures.push(toCycleFailure(err, review.id));
    }
  }

  const batch = candidates.slice(0, deps.options.maxRepliesPerCycle);
  const previews: ReplyPreview[] = [];

  for (const review of batch) {
    const preview: ReplyPreview = {
      reviewId: review.id,
      authorName: review.authorName,
      rating: review.rating,
      body: review.body,
      replyText: null,
    };
    try {
      preview.replyText = await deps.generator.generate(review);
    } catch (err) {
      log.warn({ err, reviewId: review.id }, 'Preview generation failed');
      preview.failure = toCycleFailure(err, review.id);
    }
    previews.push(preview);
  }

  log.info(
    { fetched: reviews.length, candidates: candidates.length, previewed: previews.length },
    'Reply preview generated',
  );

  return {
    generatedAt: now(),
    fetched: reviews.length,
    candidates: candidates.length,
    deferred: candidates.length - batch.length,
    previews,
    failures,
  };
}
