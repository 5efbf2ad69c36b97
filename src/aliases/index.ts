/**
 * Aliases Module
 *
 * Alias tables, profiles, resolution strategies, the resolution cache and
 * the service that ties them together.
 */

export {
  createAliasTable,
  lookupAlias,
  normalizeAliasName,
  summarizeAliases,
  summarizeProfiles,
} from "./table.js";
export type {
  AliasEntry,
  AliasTable,
  AliasTableInput,
  AliasSummary,
  ProfileEntry,
  ProfileSummary,
  ProviderAliasSummary,
} from "./table.js";

export {
  LITERAL_PREFIX,
  PROVIDER_SEPARATOR,
  createResolutionContext,
  withContextUpdates,
  splitProviderPrefix,
  resolveLiteral,
  resolveProfile,
  findMatches,
  rankMatches,
  followAliasChain,
} from "./resolvers.js";
export type {
  ResolutionContext,
  ResolutionResult,
  Match,
  ProfileResolution,
  ProfileSettings,
} from "./resolvers.js";

export { validateProfiles } from "./profiles.js";

export { createResolverChain } from "./chain.js";
export type { ResolverChain, ResolverChainOptions } from "./chain.js";

export { createResolutionCache, resolutionCacheKey } from "./cache.js";
export type { ResolutionCache, ResolutionCacheOptions, CacheStats } from "./cache.js";

export { createAliasService } from "./service.js";
export type { AliasService, AliasServiceOptions } from "./service.js";
