/**
 * Middleware Module
 */

export {
  createRequestContext,
  createResponseContext,
  createStreamChunkContext,
  withChunkUpdates,
  withRequestUpdates,
  withResponseUpdates,
} from "./context.js";
export type {
  Metadata,
  RequestContext,
  RequestContextInit,
  ResponseContext,
  StreamChunkContext,
} from "./context.js";

export { createMiddleware } from "./types.js";
export type { MaybePromise, Middleware, MiddlewareHook } from "./types.js";

export { createMiddlewareChain } from "./chain.js";
export type { MiddlewareChain, StreamItem, StreamSession } from "./chain.js";

export { createUsageMiddleware, USAGE_KEYS } from "./usage.js";
export type { UsageMiddlewareOptions, UsageRecord } from "./usage.js";
