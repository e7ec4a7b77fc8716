import type { Review } from '../gbp/types.js';
import type { ReplyStyle } from './types.js';

export function buildReviewReplySystemPrompt(style: ReplyStyle): string {
  const rules = [
    `- Write as the owner of ${style.businessName}, in a ${style.tone} tone`,
    '- Thank the reviewer by their first name when one is given',
    '- Reference specific details from the review to show the reply is personal',
    '- Match tone to star rating:',
    '  - 5 stars: Enthusiastic, grateful',
    '  - 4 stars: Warm, appreciative, gently address any concerns',
    '  - 3 stars: Professional, acknowledge the mixed experience, offer to discuss',
    '  - 1-2 stars: Calm, empathetic, non-defensive, acknowledge the concern, invite offline resolution',
    '- Never be defensive or argumentative on negative reviews',
    '- Never admit fault or liability on negative reviews',
    '- Keep it short: two to four sentences',
    `- Stay under ${style.maxLength} characters (Google reply limit)`,
  ];

  if (style.signOff) {
    rules.push(`- End with the sign-off "${style.signOff}"`);
  }
  if (style.instructions) {
    rules.push(`- ${style.instructions}`);
  }
  rules.push('- Return ONLY the reply text, nothing else');

  return `You write public owner replies to Google reviews for ${style.businessName}.

Rules:
${rules.join('\n')}`;
}

export function buildReviewReplyUserPrompt(review: Review): string {
  const rating = review.rating > 0 ? `${review.rating}-star review` : 'review';
  const body = review.body ? `"${review.body}"` : '(The reviewer left no written comment.)';

  return `${review.authorName} left a ${rating}:
${body}

Write a short, polite reply.`;
}
