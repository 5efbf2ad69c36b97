/**
 * Resolution Cache
 *
 * Bounded TTL cache in front of the resolver chain. Every entry is stamped
 * with the generation it was computed under; `invalidateAll()` bumps the
 * generation and drops all entries in one synchronous step, so a result
 * computed against a replaced alias table can neither be read nor stored.
 */

import { DEFAULT_CONFIG } from "../types/config.js";

export interface ResolutionCacheOptions {
  /** Entry lifetime in milliseconds. Default: 300000 */
  ttlMs?: number;
  /** Maximum entries; the oldest is evicted when full. Default: 1000 */
  maxSize?: number;
  /** Clock, for tests */
  now?: () => number;
}

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  /** Percentage with two decimals, e.g. "66.67%" */
  hitRate: string;
  generation: number;
}

export interface ResolutionCache<T> {
  get: (key: string) => T | undefined;
  /**
   * Store a value. Returns false, storing nothing, when `generation` is
   * given and is no longer current.
   */
  put: (key: string, value: T, generation?: number) => boolean;
  invalidateAll: () => void;
  /** Drop entries and reset counters and generation */
  clear: () => void;
  getGeneration: () => number;
  getStats: () => CacheStats;
}

interface CacheEntry<T> {
  value: T;
  storedAt: number;
  generation: number;
}

/**
 * Cache key for a resolution request
 */
export const resolutionCacheKey = (model: string, explicitProvider?: string): string =>
  `${explicitProvider?.toLowerCase() ?? ""}|${model}`;

export const createResolutionCache = <T>(
  options: ResolutionCacheOptions = {}
): ResolutionCache<T> => {
  const ttlMs = options.ttlMs ?? DEFAULT_CONFIG.cache.ttlMs;
  const maxSize = options.maxSize ?? DEFAULT_CONFIG.cache.maxSize;
  const now = options.now ?? Date.now;

  // Map iteration order is insertion order, so the first key is the oldest
  const entries = new Map<string, CacheEntry<T>>();
  let generation = 0;
  let hits = 0;
  let misses = 0;

  const get = (key: string): T | undefined => {
    const entry = entries.get(key);
    if (!entry || entry.generation !== generation || now() - entry.storedAt > ttlMs) {
      if (entry) entries.delete(key);
      misses++;
      return undefined;
    }
    hits++;
    return entry.value;
  };

  const put = (key: string, value: T, stampedGeneration = generation): boolean => {
    if (stampedGeneration !== generation || maxSize <= 0) return false;

    entries.delete(key);
    while (entries.size >= maxSize) {
      const oldest = entries.keys().next();
      if (oldest.done) break;
      entries.delete(oldest.value);
    }
    entries.set(key, { value, storedAt: now(), generation });
    return true;
  };

  const invalidateAll = (): void => {
    generation++;
    entries.clear();
  };

  const clear = (): void => {
    entries.clear();
    generation = 0;
    hits = 0;
    misses = 0;
  };

  const getStats = (): CacheStats => {
    const total = hits + misses;
    const rate = total === 0 ? 0 : (hits / total) * 100;
    return {
      size: entries.size,
      maxSize,
      hits,
      misses,
      hitRate: `${rate.toFixed(2)}%`,
      generation,
    };
  };

  return {
    get,
    put,
    invalidateAll,
    clear,
    getGeneration: () => generation,
    getStats,
  };
};
