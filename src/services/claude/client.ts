import Anthropic from '@anthropic-ai/sdk';
import { CLAUDE_MAX_TOKENS_REVIEW } from '../../config/constants.js';
import { GenerationFailedError, errorMessage } from '../../lib/errors.js';
import { createChildLogger } from '../../lib/logger.js';
import type { Review } from '../gbp/types.js';
import { buildReviewReplySystemPrompt, buildReviewReplyUserPrompt } from './prompts.js';
import { cleanReplyText, replyLength, truncateReply } from './reply-text.js';
import type { MessageContentBlock, MessagesApi, OverflowPolicy, ReplyStyle } from './types.js';

const log = createChildLogger('claude');

export function createMessagesApi(apiKey: string, timeoutMs: number): MessagesApi {
  // No SDK-level retries: a failed generation is retried by the next cycle.
  const anthropic = new Anthropic({ apiKey, maxRetries: 0, timeout: timeoutMs });
  return anthropic.messages;
}

export interface ReplyGeneratorOptions {
  messages: MessagesApi;
  model: string;
  style: ReplyStyle;
  overflowPolicy: OverflowPolicy;
}

/**
 * Generates an owner reply for one review. The output depends only on the
 * review and the fixed style configuration.
 */
export class ReplyGenerator {
  private readonly systemPrompt: string;

  constructor(private readonly options: ReplyGeneratorOptions) {
    this.systemPrompt = buildReviewReplySystemPrompt(options.style);
  }

  async generate(review: Review): Promise<string> {
    log.info({ reviewId: review.id, starRating: review.rating }, 'Generating review reply');

    let content: MessageContentBlock[];
    try {
      const response = await this.options.messages.create({
        model: this.options.model,
        max_tokens: CLAUDE_MAX_TOKENS_REVIEW,
        system: this.systemPrompt,
        messages: [{ role: 'user', content: buildReviewReplyUserPrompt(review) }],
      });
      content = response.content;
    } catch (err) {
      throw new GenerationFailedError(
        'upstream_error',
        `Claude request failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    const block = content[0];
    if (!block || block.type !== 'text' || typeof block.text !== 'string') {
      throw new GenerationFailedError('unexpected_output', 'Unexpected response type from Claude');
    }

    const text = cleanReplyText(block.text);
    if (!text) {
      throw new GenerationFailedError('empty_output', 'Claude returned an empty reply');
    }

    return this.applyLengthPolicy(review.id, text);
  }

  private applyLengthPolicy(reviewId: string, text: string): string {
    const { maxLength } = this.options.style;
    const length = replyLength(text);
    if (length <= maxLength) return text;

    if (this.options.overflowPolicy === 'reject') {
      throw new GenerationFailedError(
        'too_long',
        `Generated reply is ${length} characters, limit is ${maxLength}`,
      );
    }

    const truncated = truncateReply(text, maxLength);
    log.warn({ reviewId, length, maxLength }, 'Generated reply truncated to length limit');
    return truncated;
  }
}
