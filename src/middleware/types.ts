import type { Metadata, RequestContext, ResponseContext, StreamChunkContext } from "./context.js";

export type MaybePromise<T> = T | Promise<T>;

/**
 * A request/response/stream interceptor
 *
 * Hooks return a new context instead of mutating their input.
 */
export interface Middleware {
  readonly name: string;
  shouldHandle: (provider: string, model: string) => boolean;
  beforeRequest: (context: RequestContext) => MaybePromise<RequestContext>;
  afterResponse: (context: ResponseContext) => MaybePromise<ResponseContext>;
  onStreamChunk: (context: StreamChunkContext) => MaybePromise<StreamChunkContext>;
  /** Runs once per stream, after the final chunk */
  onStreamComplete: (context: RequestContext, accumulatedMetadata: Metadata) => MaybePromise<void>;
  initialize: () => MaybePromise<void>;
  cleanup: () => MaybePromise<void>;
}

export type MiddlewareHook = Exclude<keyof Middleware, "name">;

/**
 * Build a middleware from the hooks it cares about; the rest pass contexts through
 */
export const createMiddleware = (
  definition: Partial<Middleware> & Pick<Middleware, "name">
): Middleware => ({
  shouldHandle: () => true,
  beforeRequest: (context) => context,
  afterResponse: (context) => context,
  onStreamChunk: (context) => context,
  onStreamComplete: () => undefined,
  initialize: () => undefined,
  cleanup: () => undefined,
  ...definition,
});
