/**
 * Resolution Strategies
 *
 * The individual steps that turn a raw model string into a provider and a
 * concrete model: literal bypass, profile prefixes, substring matching,
 * match ranking and chained alias following. `createResolverChain` composes
 * them.
 */

import { ok, err, type Result } from "neverthrow";
import { CircularAliasError } from "../types/errors.js";
import {
  lookupAlias,
  normalizeAliasName,
  type AliasTable,
} from "./table.js";

/** Marks a model string that must not go through alias lookup */
export const LITERAL_PREFIX = "!";

/** Separates a provider from a model: `provider:model` */
export const PROVIDER_SEPARATOR = ":";

/**
 * Input to one resolution attempt
 */
export interface ResolutionContext {
  /** Raw model string as the client sent it */
  readonly model: string;
  /** Provider the caller selected explicitly, if any */
  readonly provider?: string;
  readonly defaultProvider?: string;
  readonly table: AliasTable;
}

/**
 * One candidate alias hit
 */
export interface Match {
  readonly provider: string;
  readonly alias: string;
  readonly target: string;
  /** Length of the matched (normalized) alias name */
  readonly length: number;
  readonly isExact: boolean;
}

/**
 * Request settings of the profile a model string was addressed through
 */
export interface ProfileSettings {
  readonly name: string;
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
}

/**
 * Output of a resolution
 */
export interface ResolutionResult {
  readonly resolvedModel: string;
  /** Undefined only when nothing scoped the input and no alias matched */
  readonly provider: string | undefined;
  /** True when at least one alias fired */
  readonly wasResolved: boolean;
  /** Aliases followed, as `provider:alias` */
  readonly resolutionPath: readonly string[];
  /** Ranked candidates, winner first */
  readonly matches: readonly Match[];
  /** Set when the model string carried a profile prefix */
  readonly profile?: ProfileSettings;
}

export const createResolutionContext = (
  model: string,
  table: AliasTable,
  provider?: string
): ResolutionContext =>
  Object.freeze({
    model,
    provider: provider?.toLowerCase(),
    defaultProvider: table.defaultProvider,
    table,
  });

/**
 * Derive a new context; the input context is left untouched
 */
export const withContextUpdates = (
  context: ResolutionContext,
  updates: Partial<ResolutionContext>
): ResolutionContext => Object.freeze({ ...context, ...updates });

export const unresolvedResult = (model: string, provider: string | undefined): ResolutionResult =>
  Object.freeze({
    resolvedModel: model,
    provider,
    wasResolved: false,
    resolutionPath: [],
    matches: [],
  });

/**
 * Split `provider:model`. The provider part is lower-cased; an empty
 * provider part means there is no prefix.
 */
export const splitProviderPrefix = (
  model: string
): { provider: string | undefined; model: string } => {
  const separator = model.indexOf(PROVIDER_SEPARATOR);
  if (separator <= 0) {
    return { provider: undefined, model };
  }
  return {
    provider: model.slice(0, separator).toLowerCase(),
    model: model.slice(separator + 1),
  };
};

// ============================================================================
// Literal bypass
// ============================================================================

/**
 * `!model` or `!provider:model` skips alias lookup entirely.
 * Returns undefined when the input is not a literal.
 */
export const resolveLiteral = (context: ResolutionContext): ResolutionResult | undefined => {
  if (!context.model.startsWith(LITERAL_PREFIX)) return undefined;

  const remainder = context.model.slice(LITERAL_PREFIX.length);
  if (!remainder) return undefined;

  const split = splitProviderPrefix(remainder);
  return unresolvedResult(split.model, split.provider ?? context.provider ?? context.defaultProvider);
};

// ============================================================================
// Profile prefix
// ============================================================================

export interface ProfileResolution {
  readonly profile: ProfileSettings;
  /** Concrete result when the alias is one of the profile's */
  readonly result?: ResolutionResult;
  /** Model string to resolve further when it is not */
  readonly model: string;
}

/**
 * `profile:alias` where the prefix names a profile. A profile alias resolves
 * to its `provider:model` target as is; any other name drops the prefix and
 * goes on to the provider strategies. Undefined when the prefix is not a
 * profile.
 */
export const resolveProfile = (context: ResolutionContext): ProfileResolution | undefined => {
  const split = splitProviderPrefix(context.model);
  if (split.provider === undefined) return undefined;

  const entry = context.table.profiles.get(split.provider);
  if (!entry) return undefined;

  const profile: ProfileSettings = Object.freeze({
    name: entry.name,
    ...(entry.timeoutMs !== undefined ? { timeoutMs: entry.timeoutMs } : {}),
    ...(entry.maxRetries !== undefined ? { maxRetries: entry.maxRetries } : {}),
  });

  const hit = entry.aliases.get(normalizeAliasName(split.model));
  if (!hit) {
    return { profile, model: split.model };
  }

  const target = splitProviderPrefix(hit.target);
  return {
    profile,
    model: split.model,
    result: Object.freeze({
      resolvedModel: target.model,
      provider: target.provider,
      wasResolved: true,
      resolutionPath: [`${entry.name}:${hit.alias}`],
      matches: [],
      profile,
    }),
  };
};

// ============================================================================
// Substring matcher and ranker
// ============================================================================

/**
 * Every alias of the given providers whose normalized name occurs in the
 * normalized model. Providers are scanned in the order given.
 */
export const findMatches = (
  table: AliasTable,
  providers: readonly string[],
  model: string
): Match[] => {
  const needle = normalizeAliasName(model);
  const matches: Match[] = [];

  for (const provider of providers) {
    for (const [name, entry] of table.aliases.get(provider) ?? []) {
      if (needle.includes(name)) {
        matches.push({
          provider,
          alias: entry.alias,
          target: entry.target,
          length: name.length,
          isExact: name === needle,
        });
      }
    }
  }

  return matches;
};

/**
 * Order candidates, best first: exact before substring, then longer match,
 * then provider declaration order, then alias name.
 */
export const rankMatches = (
  matches: readonly Match[],
  providerOrder: readonly string[]
): Match[] => {
  const position = (provider: string): number => {
    const index = providerOrder.indexOf(provider);
    return index === -1 ? providerOrder.length : index;
  };

  return [...matches].sort((a, b) => {
    if (a.isExact !== b.isExact) return a.isExact ? -1 : 1;
    if (a.length !== b.length) return b.length - a.length;
    const byProvider = position(a.provider) - position(b.provider);
    if (byProvider !== 0) return byProvider;
    return a.alias < b.alias ? -1 : a.alias > b.alias ? 1 : 0;
  });
};

// ============================================================================
// Chained alias follow
// ============================================================================

/**
 * Where an alias target points. `p:m` moves to provider `p` only when `p`
 * is declared; otherwise the whole target is a model of the current provider.
 */
const splitTarget = (
  table: AliasTable,
  currentProvider: string,
  target: string
): { provider: string; model: string } => {
  const split = splitProviderPrefix(target);
  if (split.provider !== undefined && table.providers.includes(split.provider)) {
    return { provider: split.provider, model: split.model };
  }
  return { provider: currentProvider, model: target };
};

/**
 * Follow an alias through targets that are themselves aliases.
 *
 * Each hop is an exact lookup. Revisiting an alias, or visiting more than
 * `maxChainLength` aliases, fails with CircularAliasError.
 */
export const followAliasChain = (
  table: AliasTable,
  start: Match,
  maxChainLength: number
): Result<{ provider: string; model: string; path: string[] }, CircularAliasError> => {
  const path = [`${start.provider}:${start.alias}`];
  const seen = new Set(path);
  let next = splitTarget(table, start.provider, start.target);

  while (true) {
    const hit = lookupAlias(table, next.provider, next.model);
    if (!hit) {
      return ok({ provider: next.provider, model: next.model, path });
    }

    const key = `${next.provider}:${hit.alias}`;
    path.push(key);
    if (seen.has(key) || path.length > maxChainLength) {
      return err(new CircularAliasError(path, maxChainLength));
    }
    seen.add(key);
    next = splitTarget(table, next.provider, hit.target);
  }
};

/**
 * Providers whose tables a model string may match against
 */
export const resolutionScope = (
  context: ResolutionContext
): { scope: string | undefined; model: string } => {
  const split = splitProviderPrefix(context.model);
  return {
    scope: split.provider ?? context.provider ?? context.defaultProvider,
    model: split.model,
  };
};
