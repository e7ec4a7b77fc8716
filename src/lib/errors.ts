export type FailureKind =
  | 'auth_expired'
  | 'upstream_unavailable'
  | 'generation_failed'
  | 'post_rejected'
  | 'record_failed'
  | 'internal';

/**
 * Base class for every failure the reconciliation cycle knows how to report.
 * `retryable` tells the cycle whether the next scheduled run should try again.
 */
export abstract class ReplyBotError extends Error {
  abstract readonly kind: FailureKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The GBP credential was rejected or could not be refreshed. */
export class AuthExpiredError extends ReplyBotError {
  readonly kind = 'auth_expired';
  readonly retryable = true;
}

/** Network failure, timeout, 429 or 5xx from an upstream API. */
export class UpstreamUnavailableError extends ReplyBotError {
  readonly kind = 'upstream_unavailable';
  readonly retryable = true;

  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type GenerationFailureReason =
  | 'upstream_error'
  | 'unexpected_output'
  | 'empty_output'
  | 'too_long';

export class GenerationFailedError extends ReplyBotError {
  readonly kind = 'generation_failed';
  readonly retryable = true;

  constructor(
    public readonly reason: GenerationFailureReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * Known reasons the GBP API refuses a reply. Terminal reasons mark the
 * review as permanently skipped; the rest are retried on the next cycle.
 */
export const REJECTION_REASONS = {
  review_not_found: { terminal: true },
  already_replied: { terminal: true },
  invalid_reply: { terminal: false },
  permission_denied: { terminal: false },
  unknown: { terminal: false },
} as const satisfies Record<string, { terminal: boolean }>;

export type RejectionReason = keyof typeof REJECTION_REASONS;

export function rejectionReasonForStatus(statusCode: number): RejectionReason {
  switch (statusCode) {
    case 404:
      return 'review_not_found';
    case 409:
      return 'already_replied';
    case 400:
      return 'invalid_reply';
    case 403:
      return 'permission_denied';
    default:
      return 'unknown';
  }
}

export class PostRejectedError extends ReplyBotError {
  readonly kind = 'post_rejected';
  readonly terminal: boolean;
  readonly retryable: boolean;

  constructor(
    public readonly reason: RejectionReason,
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.terminal = REJECTION_REASONS[reason].terminal;
    this.retryable = !this.terminal;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
