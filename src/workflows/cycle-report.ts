import {
  GenerationFailedError,
  PostRejectedError,
  ReplyBotError,
  errorMessage,
} from '../lib/errors.js';
import type { CycleFailure, CycleReport, CycleTrigger } from './types.js';

export function createCycleReport(trigger: CycleTrigger, startedAt: Date): CycleReport {
  return {
    trigger,
    startedAt,
    finishedAt: startedAt,
    status: 'completed',
    fetched: 0,
    candidates: 0,
    replied: 0,
    reconciled: 0,
    skipped: 0,
    deferred: 0,
    failed: 0,
    failures: [],
    replies: [],
  };
}

export function toCycleFailure(err: unknown, reviewId?: string): CycleFailure {
  if (err instanceof ReplyBotError) {
    const reason =
      err instanceof PostRejectedError || err instanceof GenerationFailedError
        ? err.reason
        : undefined;
    return { reviewId, kind: err.kind, reason, message: err.message, retryable: err.retryable };
  }
  return { reviewId, kind: 'internal', message: errorMessage(err), retryable: true };
}

/**
 * Mark the report aborted by a failure of the cycle as a whole.
 */
export function abortCycleReport(report: CycleReport, failure: CycleFailure): void {
  report.status = 'aborted';
  report.abortReason = failure.kind;
  report.failures.push(failure);
}

/** Report for a cycle that threw before it could build its own. */
export function crashedCycleReport(
  trigger: CycleTrigger,
  startedAt: Date,
  err: unknown,
  finishedAt: Date = new Date(),
): CycleReport {
  const report = createCycleReport(trigger, startedAt);
  abortCycleReport(report, toCycleFailure(err));
  report.finishedAt = finishedAt;
  return report;
}

export function hasActivity(report: CycleReport): boolean {
  return (
    report.status === 'aborted' ||
    report.replied > 0 ||
    report.skipped > 0 ||
    report.failures.length > 0
  );
}
