/**
 * Token estimation utilities
 *
 * Upstreams do not always report usage (streams without a usage event,
 * providers that omit it). These estimates fill usage records in that case.
 */

import type { ChatRequest } from "../types/wire.js";
import { extractMessageContent, type NormalizedMessage } from "./messages.js";

/**
 * Estimate token count from text using a simple heuristic
 *
 * Most LLMs use ~4 characters per token on average for English text.
 * Code and non-Latin scripts tokenize denser, so this underestimates them.
 * Rounded up, so short texts never count as zero tokens.
 */
export const estimateTokens = (text: string): number => {
  if (!text) return 0;
  return Math.ceil(text.length / 4);
};

/**
 * Estimate tokens for one message, including ~4 tokens of role/formatting overhead
 */
export const estimateMessageTokens = (content: string): number =>
  estimateTokens(content) + 4;

/**
 * Estimate total tokens for a conversation, including ~3 tokens of chat overhead
 */
export const estimateChatTokens = (messages: readonly NormalizedMessage[]): number =>
  messages.reduce((sum, msg) => sum + estimateMessageTokens(msg.content), 0) + 3;

/**
 * Estimate input tokens of a request in either wire format
 */
export const estimateRequestTokens = (request: ChatRequest): number =>
  estimateChatTokens(extractMessageContent(request));
