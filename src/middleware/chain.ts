/**
 * Middleware Chain
 *
 * Ordered list of middlewares. For each phase the chain keeps the
 * middlewares whose `shouldHandle` accepts the request's provider and model,
 * then threads the context through their hooks in registration order.
 * A failing hook is logged and rethrown, ending the phase for that request.
 */

import { MiddlewareStateError } from "../types/errors.js";
import type { StreamDelta } from "../types/wire.js";
import { releaseOnClose } from "../utils/generators.js";
import { errorMessage, getLogger, type Logger } from "../utils/logger.js";
import {
  createStreamChunkContext,
  type Metadata,
  type RequestContext,
  type ResponseContext,
  type StreamChunkContext,
} from "./context.js";
import type { MaybePromise, Middleware, MiddlewareHook } from "./types.js";

/**
 * One stream's pass through the chain
 */
export interface StreamSession {
  /** Run `onStreamChunk` hooks; finalizes after the chunk flagged complete */
  processChunk: (delta: StreamDelta, isComplete: boolean) => Promise<StreamChunkContext>;
  /** Run `onStreamComplete` hooks once; later calls do nothing */
  finalize: () => Promise<void>;
  getAccumulatedMetadata: () => Metadata;
  isFinalized: () => boolean;
}

export interface StreamItem {
  delta: StreamDelta;
  isComplete: boolean;
}

export interface MiddlewareChain {
  /** Register a middleware; only before `initialize()` */
  add: (middleware: Middleware) => void;
  names: () => readonly string[];
  initialize: () => Promise<void>;
  cleanup: () => Promise<void>;
  isInitialized: () => boolean;
  processRequest: (context: RequestContext) => Promise<RequestContext>;
  processResponse: (context: ResponseContext) => Promise<ResponseContext>;
  processStreamChunk: (context: StreamChunkContext) => Promise<StreamChunkContext>;
  startStream: (requestContext: RequestContext) => StreamSession;
  /**
   * Drive a stream session over `source`, yielding the deltas returned by
   * the chunk hooks. Completion hooks run even when the consumer stops early.
   */
  wrapStream: (
    source: AsyncIterable<StreamItem>,
    requestContext: RequestContext
  ) => AsyncGenerator<StreamDelta, void, unknown>;
}

type ChainState = "pending" | "initializing" | "initialized" | "closed";

export const createMiddlewareChain = (options: { logger?: Logger } = {}): MiddlewareChain => {
  const logger = options.logger ?? getLogger();
  const middlewares: Middleware[] = [];
  // Only these get `cleanup()`
  const started: Middleware[] = [];
  let state: ChainState = "pending";

  const applicable = (context: RequestContext): Middleware[] =>
    middlewares.filter((middleware) => middleware.shouldHandle(context.provider, context.model));

  const runHook = async <T>(
    middleware: Middleware,
    hook: MiddlewareHook,
    requestContext: RequestContext,
    fn: () => MaybePromise<T>
  ): Promise<T> => {
    try {
      return await fn();
    } catch (error) {
      logger.error("Middleware hook failed", {
        middleware: middleware.name,
        hook,
        provider: requestContext.provider,
        model: requestContext.model,
        requestId: requestContext.requestId,
        error: errorMessage(error),
      });
      throw error;
    }
  };

  const add = (middleware: Middleware): void => {
    if (state !== "pending") {
      throw new MiddlewareStateError(
        `Cannot add middleware "${middleware.name}" after the chain was initialized`
      );
    }
    if (middlewares.some((existing) => existing.name === middleware.name)) {
      throw new MiddlewareStateError(`Middleware "${middleware.name}" is already registered`);
    }
    middlewares.push(middleware);
  };

  const cleanupStarted = async (): Promise<void> => {
    for (const middleware of started.splice(0).reverse()) {
      try {
        await middleware.cleanup();
      } catch (error) {
        logger.error("Middleware cleanup failed", {
          middleware: middleware.name,
          error: errorMessage(error),
        });
      }
    }
  };

  const initialize = async (): Promise<void> => {
    if (state !== "pending") {
      throw new MiddlewareStateError("Middleware chain is already initialized");
    }
    state = "initializing";

    for (const middleware of middlewares) {
      try {
        await middleware.initialize();
      } catch (error) {
        logger.error("Middleware initialization failed", {
          middleware: middleware.name,
          error: errorMessage(error),
        });
        state = "closed";
        await cleanupStarted();
        throw error;
      }
      started.push(middleware);
    }
    state = "initialized";
    logger.debug("Middleware chain initialized", { middlewares: middlewares.map((m) => m.name) });
  };

  const cleanup = async (): Promise<void> => {
    if (state !== "initialized") return;
    state = "closed";
    await cleanupStarted();
  };

  const processRequest = async (context: RequestContext): Promise<RequestContext> => {
    let current = context;
    for (const middleware of applicable(context)) {
      current = await runHook(middleware, "beforeRequest", current, () =>
        middleware.beforeRequest(current)
      );
    }
    return current;
  };

  const processResponse = async (context: ResponseContext): Promise<ResponseContext> => {
    let current = context;
    for (const middleware of applicable(context.requestContext)) {
      current = await runHook(middleware, "afterResponse", current.requestContext, () =>
        middleware.afterResponse(current)
      );
    }
    return current;
  };

  const threadChunk = async (
    context: StreamChunkContext,
    targets: readonly Middleware[]
  ): Promise<StreamChunkContext> => {
    let current = context;
    for (const middleware of targets) {
      current = await runHook(middleware, "onStreamChunk", current.requestContext, () =>
        middleware.onStreamChunk(current)
      );
    }
    return current;
  };

  const processStreamChunk = (context: StreamChunkContext): Promise<StreamChunkContext> =>
    threadChunk(context, applicable(context.requestContext));

  const startStream = (requestContext: RequestContext): StreamSession => {
    const targets = applicable(requestContext);
    let accumulated: Record<string, unknown> = {};
    let finalized = false;

    const finalize = async (): Promise<void> => {
      if (finalized) return;
      finalized = true;
      const snapshot = Object.freeze({ ...accumulated });
      for (const middleware of targets) {
        await runHook(middleware, "onStreamComplete", requestContext, () =>
          middleware.onStreamComplete(requestContext, snapshot)
        );
      }
    };

    const processChunk = async (
      delta: StreamDelta,
      isComplete: boolean
    ): Promise<StreamChunkContext> => {
      if (finalized) {
        throw new MiddlewareStateError("Stream already completed");
      }
      const result = await threadChunk(
        createStreamChunkContext(delta, requestContext, accumulated, isComplete),
        targets
      );
      accumulated = { ...accumulated, ...result.accumulatedMetadata };

      if (isComplete) {
        await finalize();
      }
      return result;
    };

    return {
      processChunk,
      finalize,
      getAccumulatedMetadata: () => Object.freeze({ ...accumulated }),
      isFinalized: () => finalized,
    };
  };

  const wrapStream = (
    source: AsyncIterable<StreamItem>,
    requestContext: RequestContext
  ): AsyncGenerator<StreamDelta, void, unknown> => {
    const session = startStream(requestContext);
    const iterator = source[Symbol.asyncIterator]();
    const items: AsyncIterable<StreamItem> = { [Symbol.asyncIterator]: () => iterator };

    async function* drive(): AsyncGenerator<StreamDelta, void, unknown> {
      try {
        for await (const item of items) {
          const context = await session.processChunk(item.delta, item.isComplete);
          yield context.delta;
        }
      } finally {
        await session.finalize();
      }
    }

    // Closed before the first read: release the source and still complete
    return releaseOnClose(drive(), async () => {
      try {
        await iterator.return?.();
      } finally {
        await session.finalize();
      }
    });
  };

  return {
    add,
    names: () => middlewares.map((middleware) => middleware.name),
    initialize,
    cleanup,
    isInitialized: () => state === "initialized",
    processRequest,
    processResponse,
    processStreamChunk,
    startStream,
    wrapStream,
  };
};
