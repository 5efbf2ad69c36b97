/**
 * Configuration Loader
 *
 * Loads the gateway YAML file, checks its shape, converts it to the runtime
 * `GatewayConfig` and applies bundled fallback aliases and the environment
 * overlay.
 */

import { parse } from "yaml";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import type { GatewayConfig, ProfileInput, ProviderInput } from "../types/config.js";
import { normalizeProviderName } from "../types/config.js";
import { ConfigurationValidationError } from "../types/errors.js";
import { isWireFormat } from "../types/wire.js";
import { isRecord, isStringRecord } from "../utils/guards.js";
import { errorMessage, getLogger, type Logger } from "../utils/logger.js";
import type {
  CacheConfigYaml,
  DefaultsConfigYaml,
  Environment,
  GatewayConfigYaml,
  ProfileConfigYaml,
  ProviderConfigYaml,
} from "./schema.js";

// ============================================================================
// Path Resolution
// ============================================================================

/**
 * Get the bundled config directory path
 */
export const getConfigDir = (): string => {
  // In ESM, we need to derive __dirname from import.meta.url
  const currentFile = fileURLToPath(import.meta.url);
  const srcDir = dirname(dirname(currentFile));
  const rootDir = dirname(srcDir);
  return join(rootDir, "config");
};

// ============================================================================
// YAML Parsing
// ============================================================================

/**
 * Parse a YAML file to an unchecked value
 */
const parseYamlFile = (filePath: string): unknown => {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigurationValidationError(
      `Cannot read config file ${filePath}: ${errorMessage(error)}`
    );
  }
  try {
    return parse(content);
  } catch (error) {
    throw new ConfigurationValidationError(`Invalid YAML in ${filePath}: ${errorMessage(error)}`);
  }
};

// ============================================================================
// Shape Checks
// ============================================================================

const fail = (path: string, expected: string): never => {
  throw new ConfigurationValidationError(`${path} must be ${expected}`);
};

const optionalString = (value: unknown, path: string): string | undefined => {
  if (value === undefined || value === null) return undefined;
  return typeof value === "string" ? value : fail(path, "a string");
};

const optionalNumber = (value: unknown, path: string): number | undefined => {
  if (value === undefined || value === null) return undefined;
  return typeof value === "number" && Number.isFinite(value) ? value : fail(path, "a number");
};

const optionalBoolean = (value: unknown, path: string): boolean | undefined => {
  if (value === undefined || value === null) return undefined;
  return typeof value === "boolean" ? value : fail(path, "true or false");
};

const optionalStringRecord = (
  value: unknown,
  path: string
): Record<string, string> | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) return fail(path, "a mapping of strings");
  // YAML reads unquoted numbers as numbers; alias targets and headers are text
  const entries = Object.entries(value).map(([key, entry]): [string, string] => {
    if (typeof entry === "string") return [key, entry];
    if (typeof entry === "number" || typeof entry === "boolean") return [key, String(entry)];
    return fail(`${path}.${key}`, "a string");
  });
  return Object.fromEntries(entries);
};

const checkApiKey = (value: unknown, path: string): string | string[] | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  if (Array.isArray(value) && value.every((key) => typeof key === "string")) {
    return value.map(String);
  }
  return fail(path, "a string or a list of strings");
};

const checkProvider = (value: unknown, index: number): ProviderConfigYaml => {
  const path = `providers[${index}]`;
  if (!isRecord(value)) return fail(path, "a mapping");

  const name = optionalString(value.name, `${path}.name`);
  const baseUrl = optionalString(value.base_url, `${path}.base_url`);
  if (!name) return fail(`${path}.name`, "a non-empty string");
  if (!baseUrl) return fail(`${path}.base_url`, "a non-empty string");

  const rawFormat = value.format;
  const format =
    rawFormat === undefined || rawFormat === null
      ? undefined
      : isWireFormat(rawFormat)
        ? rawFormat
        : fail(`${path}.format`, '"anthropic" or "openai"');

  return {
    name,
    base_url: baseUrl,
    format,
    api_key: checkApiKey(value.api_key, `${path}.api_key`),
    passthrough: optionalBoolean(value.passthrough, `${path}.passthrough`),
    timeout_ms: optionalNumber(value.timeout_ms, `${path}.timeout_ms`),
    max_retries: optionalNumber(value.max_retries, `${path}.max_retries`),
    headers: optionalStringRecord(value.headers, `${path}.headers`),
    aliases: optionalStringRecord(value.aliases, `${path}.aliases`),
  };
};

const checkProfiles = (value: unknown): Record<string, ProfileConfigYaml> | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) return fail("profiles", "a mapping of profile names");

  const profiles: Record<string, ProfileConfigYaml> = {};
  for (const [name, profile] of Object.entries(value)) {
    const path = `profiles.${name}`;
    if (profile === null) {
      profiles[name] = {};
      continue;
    }
    if (!isRecord(profile)) return fail(path, "a mapping");
    profiles[name] = {
      timeout_ms: optionalNumber(profile.timeout_ms, `${path}.timeout_ms`),
      max_retries: optionalNumber(profile.max_retries, `${path}.max_retries`),
      aliases: optionalStringRecord(profile.aliases, `${path}.aliases`),
    };
  }
  return profiles;
};

const checkCache = (value: unknown): CacheConfigYaml | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) return fail("cache", "a mapping");
  return {
    ttl_ms: optionalNumber(value.ttl_ms, "cache.ttl_ms"),
    max_size: optionalNumber(value.max_size, "cache.max_size"),
  };
};

/**
 * Check a parsed gateway config document
 */
export const checkGatewayConfigYaml = (value: unknown): GatewayConfigYaml => {
  if (!isRecord(value)) return fail("Config file", "a mapping");
  if (!Array.isArray(value.providers)) return fail("providers", "a list");

  return {
    default_provider: optionalString(value.default_provider, "default_provider"),
    cache: checkCache(value.cache),
    max_alias_chain_length: optionalNumber(value.max_alias_chain_length, "max_alias_chain_length"),
    timeout_ms: optionalNumber(value.timeout_ms, "timeout_ms"),
    max_retries: optionalNumber(value.max_retries, "max_retries"),
    providers: value.providers.map(checkProvider),
    profiles: checkProfiles(value.profiles),
  };
};

const checkDefaultsYaml = (value: unknown): DefaultsConfigYaml => {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) return fail("defaults.yml", "a mapping");
  const fallback = value.fallback_aliases;
  if (fallback === undefined || fallback === null) return {};
  if (!isRecord(fallback)) return fail("fallback_aliases", "a mapping");

  const fallbackAliases: Record<string, Record<string, string>> = {};
  for (const [provider, aliases] of Object.entries(fallback)) {
    if (!isStringRecord(aliases)) return fail(`fallback_aliases.${provider}`, "a mapping of strings");
    fallbackAliases[provider] = aliases;
  }
  return { fallback_aliases: fallbackAliases };
};

// ============================================================================
// Conversion Functions (YAML -> Runtime types)
// ============================================================================

/**
 * Split a key setting into individual keys
 */
export const parseApiKeys = (value: string | readonly string[] | undefined): string[] => {
  if (value === undefined) return [];
  const raw = typeof value === "string" ? [value] : value;
  return raw.flatMap((entry) => entry.split(/\s+/)).filter((key) => key !== "");
};

const convertProviderConfig = (yaml: ProviderConfigYaml): ProviderInput => ({
  name: yaml.name,
  baseUrl: yaml.base_url,
  format: yaml.format,
  apiKeys: parseApiKeys(yaml.api_key),
  ...(yaml.passthrough !== undefined ? { passthrough: yaml.passthrough } : {}),
  timeoutMs: yaml.timeout_ms,
  maxRetries: yaml.max_retries,
  headers: yaml.headers,
  aliases: yaml.aliases,
});

const convertProfiles = (profiles: Record<string, ProfileConfigYaml>): ProfileInput[] =>
  Object.entries(profiles).map(([name, yaml]) => ({
    name,
    timeoutMs: yaml.timeout_ms,
    maxRetries: yaml.max_retries,
    aliases: yaml.aliases,
  }));

/**
 * Convert the gateway config from YAML to runtime format
 */
export const convertGatewayConfig = (yaml: GatewayConfigYaml): GatewayConfig => ({
  providers: yaml.providers.map(convertProviderConfig),
  ...(yaml.profiles ? { profiles: convertProfiles(yaml.profiles) } : {}),
  defaultProvider: yaml.default_provider,
  cache: yaml.cache
    ? {
        ...(yaml.cache.ttl_ms !== undefined ? { ttlMs: yaml.cache.ttl_ms } : {}),
        ...(yaml.cache.max_size !== undefined ? { maxSize: yaml.cache.max_size } : {}),
      }
    : undefined,
  maxAliasChainLength: yaml.max_alias_chain_length,
  timeoutMs: yaml.timeout_ms,
  maxRetries: yaml.max_retries,
});

// ============================================================================
// Fallback Aliases
// ============================================================================

/**
 * Load bundled fallback aliases from config/defaults.yml
 */
export const loadFallbackAliases = (
  configDir?: string
): Record<string, Record<string, string>> => {
  const dir = configDir ?? getConfigDir();
  const defaults = checkDefaultsYaml(parseYamlFile(join(dir, "defaults.yml")));
  return defaults.fallback_aliases ?? {};
};

// ============================================================================
// Environment Overlay
// ============================================================================

/**
 * Environment variable prefix for a provider: upper-cased, non-alphanumerics as `_`
 */
export const envPrefix = (provider: string): string =>
  normalizeProviderName(provider).toUpperCase().replace(/[^A-Z0-9]/g, "_");

/**
 * Check an alias target from the environment; undefined when it is unusable
 */
const checkEnvAlias = (
  variable: string,
  alias: string,
  target: string,
  logger: Logger
): string | undefined => {
  const trimmed = target.trim();
  if (trimmed === "") {
    logger.warn("Skipping empty alias from environment", { variable });
    return undefined;
  }
  if (trimmed.includes("@")) {
    logger.warn("Rejecting alias target containing '@'", { variable, target: trimmed });
    return undefined;
  }
  if (trimmed.toLowerCase() === alias) {
    logger.warn("Rejecting alias that targets itself", { variable, alias });
    return undefined;
  }
  return trimmed;
};

const overlayProvider = (
  provider: ProviderInput,
  env: Environment,
  logger: Logger
): ProviderInput => {
  const prefix = envPrefix(provider.name);
  const aliasPrefix = `${prefix}_ALIAS_`;
  const next: ProviderInput = { ...provider };

  const apiKey = env[`${prefix}_API_KEY`];
  if (apiKey !== undefined && apiKey.trim() !== "") {
    next.apiKeys = parseApiKeys(apiKey);
  }

  const baseUrl = env[`${prefix}_BASE_URL`];
  if (baseUrl !== undefined && baseUrl.trim() !== "") {
    next.baseUrl = baseUrl.trim();
  }

  const aliases: Record<string, string> = { ...provider.aliases };
  for (const [variable, value] of Object.entries(env)) {
    if (!variable.startsWith(aliasPrefix) || value === undefined) continue;
    const alias = variable.slice(aliasPrefix.length).toLowerCase();
    if (alias === "") continue;
    const target = checkEnvAlias(variable, alias, value, logger);
    if (target !== undefined) aliases[alias] = target;
  }
  next.aliases = aliases;

  return next;
};

/**
 * Apply `<PROVIDER>_API_KEY`, `<PROVIDER>_BASE_URL`, `<PROVIDER>_ALIAS_<NAME>`
 * and `DEFAULT_PROVIDER` to declared providers
 */
export const applyEnvOverlay = (
  config: GatewayConfig,
  env: Environment,
  logger: Logger = getLogger()
): GatewayConfig => {
  const defaultProvider = env.DEFAULT_PROVIDER?.trim();
  return {
    ...config,
    providers: config.providers.map((provider) => overlayProvider(provider, env, logger)),
    defaultProvider: defaultProvider ? defaultProvider : config.defaultProvider,
  };
};

// ============================================================================
// Loader Functions
// ============================================================================

export interface LoadGatewayConfigOptions {
  /** Path of the gateway YAML file */
  path: string;
  /** Environment overlay source (default: process.env) */
  env?: Environment;
  /** Directory holding defaults.yml (default: the bundled config directory) */
  configDir?: string;
  logger?: Logger;
}

/**
 * Load the gateway configuration from a YAML file
 *
 * @throws ConfigurationValidationError on unreadable files or a malformed document
 */
export const loadGatewayConfig = (options: LoadGatewayConfigOptions): GatewayConfig => {
  const logger = options.logger ?? getLogger();
  const yaml = checkGatewayConfigYaml(parseYamlFile(options.path));
  const config = applyEnvOverlay(convertGatewayConfig(yaml), options.env ?? process.env, logger);

  const declared = new Set(config.providers.map((p) => normalizeProviderName(p.name)));
  const fallbackAliases = Object.fromEntries(
    Object.entries(loadFallbackAliases(options.configDir)).filter(([provider]) =>
      declared.has(normalizeProviderName(provider))
    )
  );

  logger.debug("Loaded gateway config", {
    path: options.path,
    providers: [...declared],
  });
  return { ...config, fallbackAliases };
};
