/**
 * Utilities Module
 */

export {
  createConsoleLogger,
  errorMessage,
  getLogger,
  isDebugEnabled,
  noopLogger,
  setDebugEnabled,
} from "./logger.js";
export type { LogFields, LogLevel, Logger } from "./logger.js";

export { extractMessageContent } from "./messages.js";
export type { NormalizedMessage } from "./messages.js";

export {
  estimateChatTokens,
  estimateMessageTokens,
  estimateRequestTokens,
  estimateTokens,
} from "./tokens.js";

export { createMutex, type Mutex } from "./mutex.js";

export { releaseOnClose } from "./generators.js";
