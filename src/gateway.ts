/**
 * Gateway Module
 *
 * Dispatches chat requests in either wire format to the configured
 * providers:
 * - Model resolution through provider aliases
 * - Credential selection and rotation on auth and quota failures
 * - Middleware over the request, the response and every streamed delta
 * - Body conversion when the provider speaks the other dialect
 */

import type { Result } from "neverthrow";
import type { GatewayConfig, ProviderConfig, ResolvedConfig } from "./types/config.js";
import { resolveConfig } from "./types/config.js";
import type { ChatRequest, ChatResponse, StreamDelta, WireFormat } from "./types/wire.js";
import { withModel, withStreaming } from "./types/wire.js";
import {
  MiddlewareStateError,
  ProviderNotConfiguredError,
  type CircularAliasError,
} from "./types/errors.js";
import { createAliasService, type AliasService } from "./aliases/service.js";
import {
  createAliasTable,
  summarizeAliases,
  summarizeProfiles,
  type AliasTable,
  type AliasSummary,
  type ProfileSummary,
} from "./aliases/table.js";
import type { ProfileSettings, ResolutionResult } from "./aliases/resolvers.js";
import { validateProfiles } from "./aliases/profiles.js";
import type { CacheStats } from "./aliases/cache.js";
import {
  createProviderRegistry,
  validateProviders,
  type AuthParams,
  type ClientAuthError,
  type ProviderRegistry,
} from "./providers/registry.js";
import { createUpstreamClient, type UpstreamClient } from "./providers/upstream.js";
import { toSSEFrames } from "./providers/stream.js";
import { executeWithKeyRotation } from "./routing/executor.js";
import { createMiddlewareChain, type MiddlewareChain, type StreamItem } from "./middleware/chain.js";
import { createRequestContext, createResponseContext, type RequestContext } from "./middleware/context.js";
import type { Middleware } from "./middleware/types.js";
import { createProtocolConverter, type ProtocolConverter } from "./conversion/converter.js";
import type { ConfigSource } from "./config/source.js";
import { releaseOnClose } from "./utils/generators.js";
import { getLogger, type Logger } from "./utils/logger.js";

/**
 * Reported once per request after the model was resolved
 */
export interface ResolvedRequest {
  requestId: string;
  provider: string;
  model: string;
  requestedModel: string;
  wasResolved: boolean;
  profile?: string;
}

/**
 * Result metadata from a dispatched request
 */
export interface DispatchMetadata {
  requestId: string;
  /** Provider that handled the request */
  provider: string;
  /** Model sent upstream */
  model: string;
  /** Model string the client asked for */
  requestedModel: string;
  wasResolved: boolean;
  resolutionPath: readonly string[];
  /** Profile the model string was addressed through */
  profile?: string;
  /** Wire format spoken with the provider */
  upstreamFormat: WireFormat;
  /** Upstream calls made, one per key tried */
  attempts: number;
  /** Request latency in milliseconds */
  latencyMs: number;
}

export type StreamMetadata = Omit<DispatchMetadata, "latencyMs">;

export interface DispatchOptions {
  /** Client's own key, forwarded to passthrough providers */
  clientApiKey?: string;
  /** Scope resolution to this provider */
  provider?: string;
  requestId?: string;
  conversationId?: string;
  metadata?: Record<string, unknown>;
  signal?: AbortSignal;
}

export interface ProviderSummary {
  name: string;
  format: WireFormat;
  baseUrl: string;
  passthrough: boolean;
  keyCount: number;
  timeoutMs: number;
}

export interface GatewayOptions {
  upstream?: UpstreamClient;
  /** Registered in order before the chain initializes */
  middleware?: readonly Middleware[];
  converter?: ProtocolConverter;
  logger?: Logger;
  /** Request tracker hook */
  onResolved?: (request: ResolvedRequest) => void;
}

/**
 * Gateway instance interface
 */
export interface Gateway {
  resolve: (
    model: string,
    explicitProvider?: string
  ) => Result<ResolutionResult, CircularAliasError>;
  getClientAuth: (
    provider: string,
    clientApiKey?: string
  ) => Promise<Result<AuthParams, ClientAuthError>>;
  readonly middleware: MiddlewareChain;
  readonly converter: ProtocolConverter;

  /**
   * Non-streaming dispatch. The response is in the request's wire format.
   */
  createMessage: (
    request: ChatRequest,
    options?: DispatchOptions
  ) => Promise<{ response: ChatResponse; metadata: DispatchMetadata }>;

  /**
   * Streaming dispatch yielding client-format deltas. Resolves once the
   * provider accepted the request.
   */
  streamEvents: (
    request: ChatRequest,
    options?: DispatchOptions
  ) => Promise<{ stream: AsyncGenerator<StreamDelta, void, unknown>; metadata: StreamMetadata }>;

  /**
   * Streaming dispatch yielding client-format SSE frames
   */
  streamMessage: (
    request: ChatRequest,
    options?: DispatchOptions
  ) => Promise<{ frames: AsyncGenerator<string, void, unknown>; metadata: StreamMetadata }>;

  /**
   * Validate a new configuration and swap it in. Invalidates cached
   * resolutions; rotation cursors of unchanged key lists carry over.
   */
  reload: (config: GatewayConfig) => void;
  /** Follow a config source; returns an unsubscribe function */
  watch: (source: ConfigSource) => () => void;

  listProviders: () => ProviderSummary[];
  listAliases: () => AliasSummary;
  /** Profiles sorted by name */
  listProfiles: () => ProfileSummary[];
  getCacheStats: () => CacheStats;

  initialize: () => Promise<void>;
  /**
   * Run middleware cleanup and refuse further requests
   */
  close: () => Promise<void>;
}

interface Snapshot {
  resolved: ResolvedConfig;
  table: AliasTable;
}

interface PreparedRequest {
  context: RequestContext;
  provider: ProviderConfig;
  auth: AuthParams;
  upstreamRequest: ChatRequest;
  requestedModel: string;
  resolution: ResolutionResult;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Pick the default provider, falling back to the first declared one
 */
const selectDefaultProvider = (
  requested: string | undefined,
  providers: readonly string[],
  logger: Logger
): string | undefined => {
  const first = providers[0];
  if (requested === undefined || providers.includes(requested)) {
    return requested ?? first;
  }
  logger.warn("Default provider is not configured, using the first provider", {
    requested,
    provider: first,
  });
  return first;
};

/**
 * Apply a profile's timeout and retries to the provider it resolved to
 */
const withProfileSettings = (
  provider: ProviderConfig,
  profile: ProfileSettings | undefined
): ProviderConfig =>
  profile
    ? {
        ...provider,
        timeoutMs: profile.timeoutMs ?? provider.timeoutMs,
        maxRetries: profile.maxRetries ?? provider.maxRetries,
      }
    : provider;

const buildSnapshot = (config: GatewayConfig, logger: Logger): Snapshot => {
  const resolved = resolveConfig(config);
  validateProviders(resolved.providers);

  const providers = resolved.providers.map((p) => p.name);
  validateProfiles(resolved.profiles, providers, logger);
  const table = createAliasTable({
    providers,
    aliases: resolved.aliases,
    fallbackAliases: resolved.fallbackAliases,
    profiles: resolved.profiles,
    defaultProvider: selectDefaultProvider(resolved.defaultProvider, providers, logger),
  });
  return { resolved, table };
};

// ============================================================================
// Streaming
// ============================================================================

/**
 * Flag the last delta of a stream as complete by holding one delta back
 */
async function* markCompletion(
  deltas: AsyncIterable<StreamDelta>
): AsyncGenerator<StreamItem, void, unknown> {
  let pending: StreamDelta | undefined;
  for await (const delta of deltas) {
    if (pending !== undefined) {
      yield { delta: pending, isComplete: false };
    }
    pending = delta;
  }
  if (pending !== undefined) {
    yield { delta: pending, isComplete: true };
  }
}

// ============================================================================
// Gateway
// ============================================================================

/**
 * Create a gateway instance
 *
 * @throws ConfigurationValidationError when the configuration is invalid
 *
 * @example
 * ```typescript
 * const gateway = createGateway(loadGatewayConfig({ path: "gateway.yml" }));
 * await gateway.initialize();
 *
 * const { response } = await gateway.createMessage({
 *   format: "anthropic",
 *   body: {
 *     model: "openai:fast",
 *     max_tokens: 256,
 *     messages: [{ role: "user", content: "Hello!" }],
 *   },
 * });
 * ```
 */
export const createGateway = (config: GatewayConfig, options: GatewayOptions = {}): Gateway => {
  const logger = options.logger ?? getLogger();
  const upstream = options.upstream ?? createUpstreamClient();
  const converter = options.converter ?? createProtocolConverter();

  let snapshot = buildSnapshot(config, logger);
  let closed = false;

  const registry: ProviderRegistry = createProviderRegistry(snapshot.resolved.providers, {
    logger,
  });
  const aliases: AliasService = createAliasService({
    table: snapshot.table,
    cache: snapshot.resolved.cache,
    maxChainLength: snapshot.resolved.maxAliasChainLength,
    logger,
  });

  const chain = createMiddlewareChain({ logger });
  for (const middleware of options.middleware ?? []) {
    chain.add(middleware);
  }

  /**
   * Resolve, authenticate, run request middleware and convert the body
   */
  const prepare = async (
    request: ChatRequest,
    dispatch: DispatchOptions,
    stream: boolean
  ): Promise<PreparedRequest> => {
    if (closed) {
      throw new MiddlewareStateError("Gateway is closed");
    }

    const requestedModel = request.body.model;
    const resolution = aliases.resolve(requestedModel, dispatch.provider);
    if (resolution.isErr()) throw resolution.error;

    const { resolvedModel, wasResolved } = resolution.value;
    const providerName = resolution.value.provider ?? snapshot.table.defaultProvider;
    if (providerName === undefined) {
      throw new ProviderNotConfiguredError(requestedModel, registry.names());
    }

    const auth = await registry.getClientAuth(providerName, dispatch.clientApiKey);
    if (auth.isErr()) throw auth.error;

    const registered = registry.get(providerName);
    if (!registered) {
      throw new ProviderNotConfiguredError(providerName, registry.names());
    }
    const provider = withProfileSettings(registered, resolution.value.profile);

    const context = await chain.processRequest(
      createRequestContext({
        request: withModel(request, resolvedModel),
        provider: provider.name,
        model: resolvedModel,
        requestId: dispatch.requestId,
        conversationId: dispatch.conversationId,
        metadata: dispatch.metadata,
        clientApiKey: dispatch.clientApiKey,
      })
    );

    options.onResolved?.({
      requestId: context.requestId,
      provider: provider.name,
      model: context.model,
      requestedModel,
      wasResolved,
      ...(resolution.value.profile ? { profile: resolution.value.profile.name } : {}),
    });

    const converted = converter.convertRequest(
      withStreaming(context.request, stream),
      provider.format
    );
    if (converted.isErr()) throw converted.error;

    return {
      context,
      provider,
      auth: auth.value,
      upstreamRequest: converted.value,
      requestedModel,
      resolution: resolution.value,
    };
  };

  const toMetadata = (prepared: PreparedRequest, attempts: number): StreamMetadata => ({
    requestId: prepared.context.requestId,
    provider: prepared.provider.name,
    model: prepared.context.model,
    requestedModel: prepared.requestedModel,
    wasResolved: prepared.resolution.wasResolved,
    resolutionPath: prepared.resolution.resolutionPath,
    ...(prepared.resolution.profile ? { profile: prepared.resolution.profile.name } : {}),
    upstreamFormat: prepared.provider.format,
    attempts,
  });

  const createMessage: Gateway["createMessage"] = async (request, dispatch = {}) => {
    const startTime = Date.now();
    const prepared = await prepare(request, dispatch, false);

    const execution = await executeWithKeyRotation(
      prepared.auth,
      (apiKey) =>
        upstream.complete(
          { provider: prepared.provider, apiKey },
          prepared.upstreamRequest,
          dispatch.signal
        ),
      { logger }
    );

    const responseContext = await chain.processResponse(
      createResponseContext(
        converter.convertResponse(execution.response, request.format),
        prepared.context
      )
    );

    const metadata: DispatchMetadata = {
      ...toMetadata(prepared, execution.attempts),
      latencyMs: Date.now() - startTime,
    };
    logger.debug("Request completed", { ...metadata });
    return { response: responseContext.response, metadata };
  };

  const streamEvents: Gateway["streamEvents"] = async (request, dispatch = {}) => {
    const prepared = await prepare(request, dispatch, true);

    const execution = await executeWithKeyRotation(
      prepared.auth,
      (apiKey) =>
        upstream.stream(
          { provider: prepared.provider, apiKey },
          prepared.upstreamRequest,
          dispatch.signal
        ),
      { logger }
    );

    const translator = converter.createStreamTranslator(
      prepared.provider.format,
      request.format,
      prepared.context.model
    );

    async function* translate(): AsyncGenerator<StreamDelta, void, unknown> {
      for await (const delta of execution.response) {
        yield* translator.push(delta);
      }
      yield* translator.finish();
    }

    const metadata = toMetadata(prepared, execution.attempts);
    logger.debug("Stream opened", { ...metadata });
    return {
      stream: chain.wrapStream(
        releaseOnClose(markCompletion(translate()), () => execution.response.return(undefined)),
        prepared.context
      ),
      metadata,
    };
  };

  const streamMessage: Gateway["streamMessage"] = async (request, dispatch = {}) => {
    const { stream, metadata } = await streamEvents(request, dispatch);
    return {
      frames: releaseOnClose(toSSEFrames(stream, request.format), () => stream.return(undefined)),
      metadata,
    };
  };

  const reload = (next: GatewayConfig): void => {
    const nextSnapshot = buildSnapshot(next, logger);
    registry.replace(nextSnapshot.resolved.providers);
    aliases.publish(nextSnapshot.table);
    snapshot = nextSnapshot;
    logger.info("Gateway configuration reloaded", {
      providers: nextSnapshot.table.providers,
      defaultProvider: nextSnapshot.table.defaultProvider,
    });
  };

  return {
    resolve: aliases.resolve,
    getClientAuth: registry.getClientAuth,
    middleware: chain,
    converter,
    createMessage,
    streamEvents,
    streamMessage,
    reload,
    watch: (source) => source.subscribe(reload),
    listProviders: () =>
      registry.list().map((p) => ({
        name: p.name,
        format: p.format,
        baseUrl: p.baseUrl,
        passthrough: p.passthrough,
        keyCount: p.apiKeys.length,
        timeoutMs: p.timeoutMs,
      })),
    listAliases: () => summarizeAliases(aliases.getTable()),
    listProfiles: () => summarizeProfiles(aliases.getTable()),
    getCacheStats: aliases.getCacheStats,
    initialize: chain.initialize,
    close: async () => {
      closed = true;
      await chain.cleanup();
    },
  };
};
