/**
 * Configuration Schema Types
 *
 * TypeScript types representing the YAML configuration structure.
 * Keys are snake_case in YAML and camelCase at runtime.
 */

import type { WireFormat } from "../types/wire.js";

// ============================================================================
// Gateway Config (gateway.yml)
// ============================================================================

/**
 * Provider entry in YAML (snake_case)
 */
export interface ProviderConfigYaml {
  name: string;
  base_url: string;
  format?: WireFormat;
  /** Whitespace-separated keys or a list; "!PASSTHRU" forwards client keys */
  api_key?: string | string[];
  passthrough?: boolean;
  timeout_ms?: number;
  max_retries?: number;
  headers?: Record<string, string>;
  aliases?: Record<string, string>;
}

/**
 * Profile entry, keyed by profile name under `profiles`
 */
export interface ProfileConfigYaml {
  timeout_ms?: number;
  max_retries?: number;
  /** Alias -> "provider:model" */
  aliases?: Record<string, string>;
}

export interface CacheConfigYaml {
  ttl_ms?: number;
  max_size?: number;
}

/**
 * Root structure of the gateway config file
 */
export interface GatewayConfigYaml {
  default_provider?: string;
  cache?: CacheConfigYaml;
  max_alias_chain_length?: number;
  timeout_ms?: number;
  max_retries?: number;
  providers: ProviderConfigYaml[];
  profiles?: Record<string, ProfileConfigYaml>;
}

// ============================================================================
// Defaults (defaults.yml)
// ============================================================================

/**
 * Root structure of config/defaults.yml
 */
export interface DefaultsConfigYaml {
  /** Provider -> alias -> target */
  fallback_aliases?: Record<string, Record<string, string>>;
}

/**
 * Environment variables read by the loader
 */
export type Environment = Readonly<Record<string, string | undefined>>;
