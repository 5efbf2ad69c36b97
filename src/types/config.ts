import type { WireFormat } from "./wire.js";

/**
 * Key-list marker that switches a provider to forwarding client keys
 */
export const PASSTHROUGH_SENTINEL = "!PASSTHRU";

/**
 * Configuration for a single provider, as supplied by the caller
 */
export interface ProviderInput {
  /** Provider name, used as the `provider:` prefix in model strings */
  name: string;
  /** Base URL for the provider API */
  baseUrl: string;
  /** Wire format the provider speaks. Default: "openai" */
  format?: WireFormat;
  /** API keys, rotated round-robin. May contain the passthrough sentinel. */
  apiKeys?: readonly string[];
  /** Forward the client's own key instead of managing keys */
  passthrough?: boolean;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** HTTP-level retries performed by the upstream client */
  maxRetries?: number;
  /** Extra headers sent with every request */
  headers?: Record<string, string>;
  /** Alias name -> target model (or `provider:model`) */
  aliases?: Record<string, string>;
}

/**
 * Named bundle of aliases and request settings, addressed as `profile:alias`
 */
export interface ProfileInput {
  name: string;
  /** Overrides the provider's request timeout, in milliseconds */
  timeoutMs?: number;
  /** Overrides the provider's HTTP-level retries */
  maxRetries?: number;
  /** Alias name -> `provider:model` */
  aliases?: Record<string, string>;
}

/**
 * Resolution cache settings
 */
export interface CacheConfig {
  /** Entry lifetime in milliseconds. Default: 300000 */
  ttlMs: number;
  /** Maximum number of entries. Default: 1000 */
  maxSize: number;
}

/**
 * Main configuration for the gateway
 */
export interface GatewayConfig {
  /** Providers in declaration order. Order breaks alias-match ties. */
  providers: ProviderInput[];
  /** Provider used for model strings without a `provider:` prefix */
  defaultProvider?: string;
  /** Per-provider aliases used when the provider declares none of that name */
  fallbackAliases?: Record<string, Record<string, string>>;
  /** Profiles; a profile prefix takes precedence over a provider of the same name */
  profiles?: ProfileInput[];
  /** Resolution cache settings */
  cache?: Partial<CacheConfig>;
  /** Maximum number of aliases followed in one resolution. Default: 8 */
  maxAliasChainLength?: number;
  /** Default provider timeout in milliseconds. Default: 90000 */
  timeoutMs?: number;
  /** Default HTTP-level retries. Default: 2 */
  maxRetries?: number;
}

/**
 * Provider config with defaults resolved
 */
export interface ProviderConfig {
  readonly name: string;
  readonly baseUrl: string;
  readonly format: WireFormat;
  /** Static keys in configured order, sentinel removed */
  readonly apiKeys: readonly string[];
  readonly passthrough: boolean;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Profile with names lower-cased
 */
export interface ProfileConfig {
  readonly name: string;
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
  readonly aliases: Readonly<Record<string, string>>;
}

/**
 * Validated and normalized configuration with defaults applied
 */
export interface ResolvedConfig {
  providers: ProviderConfig[];
  /** Provider -> alias -> target, in provider declaration order */
  aliases: Record<string, Record<string, string>>;
  fallbackAliases: Record<string, Record<string, string>>;
  profiles: ProfileConfig[];
  /** Requested default provider, lower-cased; checked when the alias table is built */
  defaultProvider?: string;
  cache: CacheConfig;
  maxAliasChainLength: number;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  format: "openai" as const,
  cache: {
    ttlMs: 300_000,
    maxSize: 1000,
  },
  maxAliasChainLength: 8,
  timeoutMs: 90_000,
  maxRetries: 2,
} as const;

/**
 * Provider names are matched case-insensitively
 */
export const normalizeProviderName = (name: string): string =>
  name.trim().toLowerCase();

const resolveProvider = (
  input: ProviderInput,
  config: GatewayConfig
): ProviderConfig => {
  const keys = input.apiKeys ?? [];
  const passthrough =
    input.passthrough === true || keys.includes(PASSTHROUGH_SENTINEL);

  return {
    name: normalizeProviderName(input.name),
    baseUrl: input.baseUrl.replace(/\/+$/, ""),
    format: input.format ?? DEFAULT_CONFIG.format,
    apiKeys: keys.filter((key) => key !== PASSTHROUGH_SENTINEL),
    passthrough,
    timeoutMs: input.timeoutMs ?? config.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    maxRetries: input.maxRetries ?? config.maxRetries ?? DEFAULT_CONFIG.maxRetries,
    headers: { ...input.headers },
  };
};

const lowerCaseKeys = (record: Record<string, string>): Record<string, string> =>
  Object.fromEntries(
    Object.entries(record).map(([alias, target]) => [alias.toLowerCase(), target])
  );

/**
 * Resolve configuration with defaults
 *
 * Does not validate credentials; see `validateProviders`.
 */
export function resolveConfig(config: GatewayConfig): ResolvedConfig {
  const providers = config.providers.map((p) => resolveProvider(p, config));

  const aliases: Record<string, Record<string, string>> = {};
  config.providers.forEach((p, i) => {
    const name = providers[i]?.name ?? normalizeProviderName(p.name);
    aliases[name] = lowerCaseKeys(p.aliases ?? {});
  });

  const fallbackAliases: Record<string, Record<string, string>> = {};
  for (const [provider, entries] of Object.entries(config.fallbackAliases ?? {})) {
    fallbackAliases[normalizeProviderName(provider)] = lowerCaseKeys(entries);
  }

  const profiles = (config.profiles ?? []).map(
    (profile): ProfileConfig => ({
      name: normalizeProviderName(profile.name),
      ...(profile.timeoutMs !== undefined ? { timeoutMs: profile.timeoutMs } : {}),
      ...(profile.maxRetries !== undefined ? { maxRetries: profile.maxRetries } : {}),
      aliases: lowerCaseKeys(profile.aliases ?? {}),
    })
  );

  return {
    providers,
    aliases,
    fallbackAliases,
    profiles,
    defaultProvider: config.defaultProvider
      ? normalizeProviderName(config.defaultProvider)
      : undefined,
    cache: {
      ...DEFAULT_CONFIG.cache,
      ...config.cache,
    },
    maxAliasChainLength:
      config.maxAliasChainLength ?? DEFAULT_CONFIG.maxAliasChainLength,
  };
}
