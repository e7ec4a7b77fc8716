import { GBP_API_V4_BASE, GBP_REVIEWS_PAGE_SIZE } from '../../config/constants.js';
import {
  AuthExpiredError,
  PostRejectedError,
  ReplyBotError,
  UpstreamUnavailableError,
  errorMessage,
  rejectionReasonForStatus,
} from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import type { CredentialProvider } from './auth.js';
import { toReview } from './types.js';
import type { GbpLocation, GbpReview, GbpReviewsResponse, Review } from './types.js';

const log = createChildLogger('gbp-reviews');

export class GbpApiError extends Error {
  constructor(
    public statusCode: number,
    public apiError: unknown,
  ) {
    super(`GBP API error ${statusCode}${describeApiError(apiError)}`);
    this.name = 'GbpApiError';
  }
}

function describeApiError(apiError: unknown): string {
  if (typeof apiError === 'object' && apiError !== null && 'error' in apiError) {
    const inner = apiError.error;
    if (typeof inner === 'object' && inner !== null && 'message' in inner) {
      return `: ${String(inner.message)}`;
    }
  }
  return '';
}

export interface GbpReviewsClientOptions {
  location: GbpLocation;
  getAccessToken: CredentialProvider;
  timeoutMs: number;
  baseUrl?: string;
  fetchFn?: typeof fetch;
}

/** Location-level calls list reviews; review-level calls touch one review. */
export type RequestScope = 'location' | 'review';

/**
 * Thin client over the GBP v4 reviews endpoints. Every failure is mapped to
 * the cycle's error taxonomy; nothing is retried here.
 */
export class GbpReviewsClient {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: GbpReviewsClientOptions) {
    this.baseUrl = options.baseUrl ?? GBP_API_V4_BASE;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  get locationPath(): string {
    const { accountId, locationId } = this.options.location;
    return `accounts/${accountId}/locations/${locationId}`;
  }

  /**
   * List one page of reviews for the configured location.
   */
  async listReviews(pageToken?: string): Promise<GbpReviewsResponse> {
    const url = new URL(`${this.baseUrl}/${this.locationPath}/reviews`);
    url.searchParams.set('pageSize', String(GBP_REVIEWS_PAGE_SIZE));
    url.searchParams.set('orderBy', 'updateTime desc');
    if (pageToken) {
      url.searchParams.set('pageToken', pageToken);
    }

    const response = await this.request('GET', url.toString(), 'location');
    return (await response.json()) as GbpReviewsResponse;
  }

  /**
   * Fetch every review of the location, following pagination, in the order
   * the API returns them.
   */
  async fetchReviews(): Promise<Review[]> {
    const reviews: Review[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.listReviews(pageToken);
      for (const review of page.reviews ?? []) {
        reviews.push(toReview(review));
      }
      pageToken = page.nextPageToken;
    } while (pageToken);

    log.debug({ count: reviews.length }, 'Fetched reviews');
    return reviews;
  }

  async getReview(reviewId: string): Promise<Review> {
    const url = `${this.baseUrl}/${this.locationPath}/reviews/${encodeURIComponent(reviewId)}`;
    const response = await this.request('GET', url, 'review');
    return toReview((await response.json()) as GbpReview);
  }

  async putReply(reviewId: string, replyText: string): Promise<void> {
    const url = `${this.baseUrl}/${this.locationPath}/reviews/${encodeURIComponent(reviewId)}/reply`;
    const response = await this.request('PUT', url, 'review', { comment: replyText });
    // The echoed reply is unused; release the body so undici can reuse the connection
    await response.body?.cancel();
  }

  private async request(
    method: 'GET' | 'PUT',
    url: string,
    scope: RequestScope,
    body?: unknown,
  ): Promise<Response> {
    const accessToken = await this.options.getAccessToken();

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method,
        headers: {
          Authorization: `Bearer ${accessToken}`,
          ...(body === undefined ? {} : { 'Content-Type': 'application/json' }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      const reason =
        err instanceof Error && err.name === 'TimeoutError'
          ? `timed out after ${this.options.timeoutMs}ms`
          : errorMessage(err);
      throw new UpstreamUnavailableError(`GBP ${method} failed: ${reason}`, undefined, {
        cause: err,
      });
    }

    if (!response.ok) {
      const error: unknown = await response.json().catch(() => ({}));
      throw classifyGbpFailure(new GbpApiError(response.status, error), scope);
    }

    return response;
  }
}

/**
 * Map a GBP HTTP failure onto the cycle's error kinds. A failed listing is
 * an outage of the whole location; a 4xx on a single review is a rejection
 * of that review's reply.
 */
export function classifyGbpFailure(error: GbpApiError, scope: RequestScope): ReplyBotError {
  const { statusCode } = error;

  if (statusCode === 401 || (scope === 'location' && statusCode === 403)) {
    return new AuthExpiredError(`GBP rejected the credential (${statusCode})`, { cause: error });
  }
  if (statusCode === 429 || statusCode >= 500 || scope === 'location') {
    return new UpstreamUnavailableError(error.message, statusCode, { cause: error });
  }
  return new PostRejectedError(
    rejectionReasonForStatus(statusCode),
    error.message,
    statusCode,
    { cause: error },
  );
}
