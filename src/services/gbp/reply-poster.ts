import { PostRejectedError } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import type { GbpReviewsClient } from './reviews.js';

const log = createChildLogger('gbp-reply-poster');

export type PostOutcome =
  | { status: 'posted' }
  | { status: 'already_replied'; existingReply: string | null };

/**
 * Posts a reply only after confirming with the API that the review still
 * has none. The upstream is the source of truth when the local ledger lags
 * behind, e.g. after a crash between posting and recording.
 */
export class ReplyPoster {
  constructor(private readonly reviews: Pick<GbpReviewsClient, 'getReview' | 'putReply'>) {}

  async postReply(reviewId: string, replyText: string): Promise<PostOutcome> {
    const current = await this.reviews.getReview(reviewId);

    if (current.existingReply) {
      log.info({ reviewId }, 'Review already has a reply upstream, not posting');
      return { status: 'already_replied', existingReply: current.existingReply.text };
    }

    log.info({ reviewId }, 'Posting review reply to GBP');
    try {
      await this.reviews.putReply(reviewId, replyText);
    } catch (err) {
      if (err instanceof PostRejectedError && err.reason === 'already_replied') {
        // A reply landed between the check and the PUT
        log.info({ reviewId }, 'GBP reports an existing reply, not posting');
        return { status: 'already_replied', existingReply: await this.existingReplyText(reviewId) };
      }
      throw err;
    }
    log.info({ reviewId }, 'Review reply posted');

    return { status: 'posted' };
  }

  private async existingReplyText(reviewId: string): Promise<string | null> {
    try {
      const review = await this.reviews.getReview(reviewId);
      return review.existingReply?.text ?? null;
    } catch (err) {
      log.warn({ err, reviewId }, 'Could not read the existing reply');
      return null;
    }
  }
}
