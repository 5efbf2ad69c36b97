/**
 * Alias Service
 *
 * Public resolution entry point. Holds the current alias table snapshot and
 * the resolution cache; a reload publishes a new snapshot by swapping one
 * reference and invalidating the cache.
 */

import { ok, type Result } from "neverthrow";
import type { CircularAliasError } from "../types/errors.js";
import { getLogger, type Logger } from "../utils/logger.js";
import {
  createResolutionCache,
  resolutionCacheKey,
  type CacheStats,
  type ResolutionCacheOptions,
} from "./cache.js";
import { createResolverChain } from "./chain.js";
import { createResolutionContext, type ResolutionResult } from "./resolvers.js";
import type { AliasTable } from "./table.js";

export interface AliasServiceOptions {
  table: AliasTable;
  cache?: ResolutionCacheOptions;
  maxChainLength?: number;
  logger?: Logger;
}

export interface AliasService {
  /**
   * Resolve a raw model string, optionally scoped to an explicit provider
   */
  resolve: (
    model: string,
    explicitProvider?: string
  ) => Result<ResolutionResult, CircularAliasError>;
  /** Replace the alias table and invalidate cached resolutions */
  publish: (table: AliasTable) => void;
  getTable: () => AliasTable;
  getCacheStats: () => CacheStats;
}

interface Snapshot {
  readonly table: AliasTable;
  readonly generation: number;
}

export const createAliasService = (options: AliasServiceOptions): AliasService => {
  const logger = options.logger ?? getLogger();
  const cache = createResolutionCache<ResolutionResult>(options.cache);
  const chain = createResolverChain({ maxChainLength: options.maxChainLength });

  let snapshot: Snapshot = { table: options.table, generation: cache.getGeneration() };

  const resolve = (
    model: string,
    explicitProvider?: string
  ): Result<ResolutionResult, CircularAliasError> => {
    const { table, generation } = snapshot;
    const key = resolutionCacheKey(model, explicitProvider);

    const cached = cache.get(key);
    if (cached) return ok(cached);

    const result = chain.resolve(createResolutionContext(model, table, explicitProvider));

    if (result.isErr()) {
      logger.warn("Alias resolution failed", {
        model,
        provider: explicitProvider,
        chain: result.error.chain,
      });
      return result;
    }

    const resolved = result.value;
    if (resolved.wasResolved) {
      logger.debug("Alias resolved", {
        model,
        provider: resolved.provider,
        resolvedModel: resolved.resolvedModel,
        path: resolved.resolutionPath,
      });
    }
    cache.put(key, resolved, generation);
    return result;
  };

  const publish = (table: AliasTable): void => {
    cache.invalidateAll();
    snapshot = { table, generation: cache.getGeneration() };
    logger.info("Alias table published, resolution cache invalidated", {
      providers: table.providers,
      defaultProvider: table.defaultProvider,
      generation: snapshot.generation,
    });
  };

  return {
    resolve,
    publish,
    getTable: () => snapshot.table,
    getCacheStats: cache.getStats,
  };
};
