import type { Logger } from 'pino';
import { AuthExpiredError, PostRejectedError } from '../lib/errors.js';
import { createChildLogger } from '../lib/logger.js';
import type { Review } from '../services/gbp/types.js';
import type { ReplyOutcome } from '../db/schema.js';
import { classifyReview, type CandidateOptions, type ReviewDisposition } from './candidates.js';
import { abortCycleReport, createCycleReport, toCycleFailure } from './cycle-report.js';
import type {
  CycleReport,
  CycleTrigger,
  Notifier,
  ReplyAuthor,
  ReplySubmitter,
  ReviewSource,
  SeenReviewTracker,
} from './types.js';

const log = createChildLogger('review-reply');

export const UPSTREAM_REPLY_DETECTED = 'upstream_reply_detected';

export interface ReconciliationOptions extends CandidateOptions {
  maxRepliesPerCycle: number;
}

export interface ReconciliationDeps {
  reviews: ReviewSource;
  generator: ReplyAuthor;
  poster: ReplySubmitter;
  ledger: SeenReviewTracker;
  notifier: Notifier;
  options: ReconciliationOptions;
  now?: () => Date;
}

type CandidateResult = 'continue' | 'abort';

/**
 * Run one fetch → generate → post → record → report cycle.
 *
 * Per-review failures are isolated and land in the report. A failed fetch or
 * a rejected credential aborts the cycle; the next scheduled run retries.
 * The report always reaches the notifier.
 */
export async function runReconciliationCycle(
  deps: ReconciliationDeps,
  trigger: CycleTrigger,
): Promise<CycleReport> {
  const now = deps.now ?? (() => new Date());
  const report = createCycleReport(trigger, now());
  const cycleLog = log.child({ trigger });

  cycleLog.info('Starting review reply cycle');

  let reviews: Review[];
  try {
    reviews = await deps.reviews.fetchReviews();
  } catch (err) {
    cycleLog.error({ err }, 'Failed to fetch reviews, aborting cycle');
    abortCycleReport(report, toCycleFailure(err));
    return finishCycle(deps, report, now, cycleLog);
  }

  report.fetched = reviews.length;

  const candidates = selectCandidates(reviews, deps, report, cycleLog);
  const batch = candidates.slice(0, deps.options.maxRepliesPerCycle);
  report.candidates = candidates.length;
  report.deferred = candidates.length - batch.length;

  if (report.deferred > 0) {
    cycleLog.info(
      { deferred: report.deferred, limit: deps.options.maxRepliesPerCycle },
      'Per-cycle reply limit reached, deferring remaining reviews',
    );
  }

  for (const [index, review] of batch.entries()) {
    const result = await processCandidate(review, deps, report, cycleLog);
    if (result === 'abort') {
      report.deferred += batch.length - index - 1;
      break;
    }
  }

  return finishCycle(deps, report, now, cycleLog);
}

/**
 * Reviews in the seen or skipped set are ignored. Reviews that already carry
 * an upstream reply are written to the ledger instead of replied to. A review
 * whose ledger state cannot be read is reported and left for the next cycle.
 */
function selectCandidates(
  reviews: Review[],
  deps: ReconciliationDeps,
  report: CycleReport,
  cycleLog: Logger,
): Review[] {
  const { ledger, options } = deps;
  const candidates: Review[] = [];

  for (const review of reviews) {
    let disposition: ReviewDisposition;
    try {
      disposition = classifyReview(review, ledger, options);
    } catch (err) {
      cycleLog.error({ err, reviewId: review.id }, 'Failed to read ledger state for review');
      report.failures.push(toCycleFailure(err, review.id));
      report.failed++;
      continue;
    }

    if (disposition.kind === 'upstream_replied') {
      try {
        if (ledger.record(review.id, disposition.replyText, 'succeeded', UPSTREAM_REPLY_DETECTED)) {
          report.reconciled++;
          cycleLog.info({ reviewId: review.id }, 'Recorded reply found upstream');
        }
      } catch (err) {
        cycleLog.error({ err, reviewId: review.id }, 'Failed to record upstream reply');
        report.failures.push({ ...toCycleFailure(err, review.id), kind: 'record_failed' });
        report.failed++;
      }
      continue;
    }

    if (disposition.kind === 'candidate') {
      candidates.push(review);
    }
  }

  return candidates;
}

async function processCandidate(
  review: Review,
  deps: ReconciliationDeps,
  report: CycleReport,
  cycleLog: Logger,
): Promise<CandidateResult> {
  const reviewLog = cycleLog.child({ reviewId: review.id });

  // The ledger may have moved since the candidates were selected
  let seen: boolean;
  try {
    seen = deps.ledger.isSeen(review.id);
  } catch (err) {
    reviewLog.error({ err }, 'Failed to re-check ledger before posting');
    report.failures.push(toCycleFailure(err, review.id));
    report.failed++;
    return 'continue';
  }
  if (seen) {
    reviewLog.info('Review recorded as replied since selection, skipping');
    return 'continue';
  }

  let replyText: string;
  try {
    replyText = await deps.generator.generate(review);
  } catch (err) {
    reviewLog.warn({ err }, 'Reply generation failed');
    report.failures.push(toCycleFailure(err, review.id));
    report.failed++;
    return 'continue';
  }

  let upstream: { text: string | null } | undefined;
  try {
    const outcome = await deps.poster.postReply(review.id, replyText);
    if (outcome.status === 'already_replied') {
      upstream = { text: outcome.existingReply };
    }
  } catch (err) {
    const failure = toCycleFailure(err, review.id);
    report.failures.push(failure);

    if (err instanceof PostRejectedError && err.terminal) {
      reviewLog.warn({ reason: err.reason }, 'Reply permanently rejected, skipping review');
      recordAttempt(deps, report, reviewLog, review.id, replyText, 'skipped', err.reason);
      report.skipped++;
      return 'continue';
    }

    reviewLog.warn({ err }, 'Posting reply failed');
    recordAttempt(deps, report, reviewLog, review.id, replyText, 'failed', failure.reason ?? failure.kind);
    report.failed++;

    if (err instanceof AuthExpiredError) {
      reviewLog.error('GBP credential rejected while posting, aborting cycle');
      report.status = 'aborted';
      report.abortReason = err.kind;
      return 'abort';
    }
    return 'continue';
  }

  try {
    deps.ledger.record(
      review.id,
      upstream ? upstream.text : replyText,
      'succeeded',
      upstream ? UPSTREAM_REPLY_DETECTED : undefined,
    );
  } catch (err) {
    // The upstream check on the next cycle backfills the missing record
    reviewLog.error({ err }, 'Reply posted but recording it failed');
    report.failures.push({ ...toCycleFailure(err, review.id), kind: 'record_failed' });
    report.failed++;
    return 'continue';
  }

  if (upstream) {
    report.reconciled++;
    return 'continue';
  }

  report.replied++;
  report.replies.push({
    reviewId: review.id,
    authorName: review.authorName,
    rating: review.rating,
    replyText,
  });
  reviewLog.info({ starRating: review.rating }, 'Review replied');
  return 'continue';
}

function recordAttempt(
  deps: ReconciliationDeps,
  report: CycleReport,
  reviewLog: Logger,
  reviewId: string,
  replyText: string,
  outcome: ReplyOutcome,
  reason: string,
): void {
  try {
    deps.ledger.record(reviewId, replyText, outcome, reason);
  } catch (err) {
    reviewLog.error({ err, outcome }, 'Failed to record reply attempt');
    report.failures.push({ ...toCycleFailure(err, reviewId), kind: 'record_failed' });
  }
}

async function finishCycle(
  deps: ReconciliationDeps,
  report: CycleReport,
  now: () => Date,
  cycleLog: Logger,
): Promise<CycleReport> {
  report.finishedAt = now();

  cycleLog.info(
    {
      status: report.status,
      fetched: report.fetched,
      candidates: report.candidates,
      replied: report.replied,
      reconciled: report.reconciled,
      skipped: report.skipped,
      deferred: report.deferred,
      failed: report.failed,
    },
    'Review reply cycle finished',
  );

  try {
    await deps.notifier.notify(report);
  } catch (err) {
    cycleLog.error({ err }, 'Failed to deliver cycle report');
  }

  return report;
}
