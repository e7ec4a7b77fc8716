export const GBP_API_V4_BASE = 'https://mybusiness.googleapis.com/v4';
export const GBP_REVIEWS_PAGE_SIZE = 50;
export const GBP_REPLY_MAX_LENGTH = 4096;

export const DEFAULT_CLAUDE_MODEL = 'claude-sonnet-4-20250514';
export const CLAUDE_MAX_TOKENS_REVIEW = 1000;

export const DEFAULT_REVIEWER_NAME = 'Customer';
export const DEFAULT_POLL_INTERVAL_MINUTES = 60;
