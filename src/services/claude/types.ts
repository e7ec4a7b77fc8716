export interface ReplyStyle {
  businessName: string;
  tone: string;
  signOff?: string;
  instructions?: string;
  maxLength: number;
}

export type OverflowPolicy = 'truncate' | 'reject';

export interface MessageContentBlock {
  type: string;
  text?: string;
}

export interface ReviewReplyMessageRequest {
  model: string;
  max_tokens: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

/**
 * The slice of the Anthropic Messages API the reply generator calls.
 * `new Anthropic().messages` satisfies it.
 */
export interface MessagesApi {
  create(request: ReviewReplyMessageRequest): Promise<{ content: MessageContentBlock[] }>;
}
