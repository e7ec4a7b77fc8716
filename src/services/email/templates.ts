import type { CycleFailure, CycleReport } from '../../workflows/types.js';

export interface EmailContent {
  subject: string;
  text: string;
}

/**
 * Format a cycle report as a plain-text operator email.
 */
export function formatCycleReport(report: CycleReport, businessName: string): EmailContent {
  const subject =
    report.status === 'aborted'
      ? `[${businessName}] Review replies: cycle aborted (${report.abortReason ?? 'unknown'})`
      : `[${businessName}] Review replies: ${report.replied} posted, ${report.failed} failed`;

  const lines = [
    `Review reply cycle for ${businessName} (${report.trigger})`,
    `Started: ${report.startedAt.toISOString()}`,
    `Finished: ${report.finishedAt.toISOString()}`,
    `Status: ${report.status}${report.abortReason ? ` (${report.abortReason})` : ''}`,
    '',
    `Reviews fetched: ${report.fetched}`,
    `Awaiting a reply: ${report.candidates}`,
    `Replies posted: ${report.replied}`,
    `Already replied upstream: ${report.reconciled}`,
    `Permanently skipped: ${report.skipped}`,
    `Deferred to next cycle: ${report.deferred}`,
    `Failed: ${report.failed}`,
  ];

  if (report.replies.length > 0) {
    lines.push('', 'Replies posted:');
    for (const reply of report.replies) {
      const stars = '⭐'.repeat(reply.rating);
      lines.push(`- ${stars} ${reply.authorName} (${reply.reviewId}): "${reply.replyText}"`);
    }
  }

  if (report.failures.length > 0) {
    lines.push('', 'Failures:');
    for (const failure of report.failures) {
      lines.push(`- ${formatFailure(failure)}`);
    }
  }

  return { subject, text: lines.join('\n') };
}

function formatFailure(failure: CycleFailure): string {
  const subject = failure.reviewId ?? 'cycle';
  const kind = failure.reason ? `${failure.kind}/${failure.reason}` : failure.kind;
  const next = failure.retryable ? 'will retry' : 'will not retry';
  return `${subject} [${kind}, ${next}]: ${failure.message}`;
}
