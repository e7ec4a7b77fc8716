/**
 * Strip surrounding whitespace and the quotes models like to wrap replies in.
 */
export function cleanReplyText(raw: string): string {
  const trimmed = raw.trim();
  const quoted = /^["“](.*)["”]$/s.exec(trimmed);
  return (quoted ? quoted[1] : trimmed).trim();
}

export function replyLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Cut a reply down to `maxLength` characters (code points). Prefers the last
 * sentence end in the second half of the allowed window, then the last
 * whitespace, then a hard cut.
 */
export function truncateReply(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) return text;

  const window = chars.slice(0, maxLength).join('');
  if (/[.!?]$/.test(window) && /\s/.test(chars[maxLength] ?? '')) {
    return window;
  }

  let sentenceEnd = -1;
  for (const match of window.matchAll(/[.!?](?=\s)/g)) {
    sentenceEnd = match.index ?? sentenceEnd;
  }
  if (sentenceEnd >= 0 && sentenceEnd + 1 >= window.length / 2) {
    return window.slice(0, sentenceEnd + 1);
  }

  const lastSpace = window.search(/\s\S*$/);
  if (lastSpace > 0) {
    return window.slice(0, lastSpace).trimEnd();
  }

  return window;
}
