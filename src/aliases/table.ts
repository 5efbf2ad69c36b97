/**
 * Alias Table
 *
 * Immutable snapshot of per-provider alias definitions and profiles. A new
 * table is built on every configuration reload and published as a whole.
 */

import type { ProfileConfig } from "../types/config.js";

/**
 * Lower-case and treat `_` and `-` as the same character
 */
export const normalizeAliasName = (name: string): string =>
  name.toLowerCase().replace(/_/g, "-");

/**
 * One alias as stored in the table
 */
export interface AliasEntry {
  /** Alias name as declared, lower-cased */
  readonly alias: string;
  /** Target model, or `provider:model` for a cross-provider alias */
  readonly target: string;
  /** True when the alias came from the fallback set */
  readonly fallback: boolean;
}

/**
 * Profile as stored in the table
 */
export interface ProfileEntry {
  readonly name: string;
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
  /** Normalized alias name -> entry; targets are `provider:model` */
  readonly aliases: ReadonlyMap<string, AliasEntry>;
}

export interface AliasTable {
  /** Provider names in declaration order */
  readonly providers: readonly string[];
  /** Provider -> normalized alias name -> entry */
  readonly aliases: ReadonlyMap<string, ReadonlyMap<string, AliasEntry>>;
  /** Lower-cased profile name -> profile */
  readonly profiles: ReadonlyMap<string, ProfileEntry>;
  /** Provider for model strings without a prefix; undefined scans every provider */
  readonly defaultProvider: string | undefined;
}

export interface AliasTableInput {
  providers: readonly string[];
  aliases?: Record<string, Record<string, string>>;
  fallbackAliases?: Record<string, Record<string, string>>;
  profiles?: readonly ProfileConfig[];
  defaultProvider?: string;
}

const addEntries = (
  target: Map<string, AliasEntry>,
  entries: Record<string, string>,
  fallback: boolean
): void => {
  for (const [alias, aliasTarget] of Object.entries(entries)) {
    const name = alias.toLowerCase();
    target.set(normalizeAliasName(name), Object.freeze({ alias: name, target: aliasTarget, fallback }));
  }
};

/**
 * Build a frozen alias table
 *
 * Fallback aliases only apply to declared providers and never replace an
 * explicit alias of the same (normalized) name. A default provider that is
 * not declared is dropped.
 */
export const createAliasTable = (input: AliasTableInput): AliasTable => {
  const providers = Object.freeze([...input.providers]);
  const aliases = new Map<string, ReadonlyMap<string, AliasEntry>>();

  for (const provider of providers) {
    const entries = new Map<string, AliasEntry>();
    addEntries(entries, input.fallbackAliases?.[provider] ?? {}, true);
    addEntries(entries, input.aliases?.[provider] ?? {}, false);
    aliases.set(provider, entries);
  }

  const profiles = new Map<string, ProfileEntry>();
  for (const profile of input.profiles ?? []) {
    const entries = new Map<string, AliasEntry>();
    addEntries(entries, profile.aliases, false);
    const name = profile.name.toLowerCase();
    profiles.set(
      name,
      Object.freeze({
        name,
        ...(profile.timeoutMs !== undefined ? { timeoutMs: profile.timeoutMs } : {}),
        ...(profile.maxRetries !== undefined ? { maxRetries: profile.maxRetries } : {}),
        aliases: entries,
      })
    );
  }

  const defaultProvider =
    input.defaultProvider !== undefined && providers.includes(input.defaultProvider)
      ? input.defaultProvider
      : undefined;

  return Object.freeze({ providers, aliases, profiles, defaultProvider });
};

/**
 * Exact alias lookup within one provider
 */
export const lookupAlias = (
  table: AliasTable,
  provider: string,
  name: string
): AliasEntry | undefined => table.aliases.get(provider)?.get(normalizeAliasName(name));

/**
 * Alias listing for one provider
 */
export interface ProviderAliasSummary {
  provider: string;
  aliasCount: number;
  fallbackCount: number;
  /** Sorted by alias name */
  aliases: Array<{ alias: string; target: string; type: "explicit" | "fallback" }>;
}

export interface AliasSummary {
  totalAliases: number;
  totalFallbacks: number;
  defaultProvider: string | undefined;
  providers: ProviderAliasSummary[];
}

export interface ProfileSummary {
  name: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** Sorted by alias name */
  aliases: Array<{ alias: string; target: string }>;
}

/**
 * Profiles sorted by name
 */
export const summarizeProfiles = (table: AliasTable): ProfileSummary[] =>
  [...table.profiles.values()]
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((profile) => ({
      name: profile.name,
      ...(profile.timeoutMs !== undefined ? { timeoutMs: profile.timeoutMs } : {}),
      ...(profile.maxRetries !== undefined ? { maxRetries: profile.maxRetries } : {}),
      aliases: [...profile.aliases.values()]
        .sort((a, b) => (a.alias < b.alias ? -1 : a.alias > b.alias ? 1 : 0))
        .map((entry) => ({ alias: entry.alias, target: entry.target })),
    }));

/**
 * Summarize a table for display, providers in declaration order
 */
export const summarizeAliases = (table: AliasTable): AliasSummary => {
  const providers = table.providers
    .map((provider): ProviderAliasSummary => {
      const entries = [...(table.aliases.get(provider)?.values() ?? [])].sort((a, b) =>
        a.alias < b.alias ? -1 : a.alias > b.alias ? 1 : 0
      );
      return {
        provider,
        aliasCount: entries.length,
        fallbackCount: entries.filter((e) => e.fallback).length,
        aliases: entries.map((e) => ({
          alias: e.alias,
          target: e.target,
          type: e.fallback ? "fallback" : "explicit",
        })),
      };
    })
    .filter((p) => p.aliasCount > 0);

  return {
    totalAliases: providers.reduce((sum, p) => sum + p.aliasCount, 0),
    totalFallbacks: providers.reduce((sum, p) => sum + p.fallbackCount, 0),
    defaultProvider: table.defaultProvider,
    providers,
  };
};
