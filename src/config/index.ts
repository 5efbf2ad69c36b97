/**
 * Configuration Module
 *
 * Exports configuration types, the YAML loader and the reloadable source.
 */

// Schema types
export type {
  CacheConfigYaml,
  DefaultsConfigYaml,
  Environment,
  GatewayConfigYaml,
  ProfileConfigYaml,
  ProviderConfigYaml,
} from "./schema.js";

// Loader functions
export {
  applyEnvOverlay,
  checkGatewayConfigYaml,
  convertGatewayConfig,
  envPrefix,
  getConfigDir,
  loadFallbackAliases,
  loadGatewayConfig,
  parseApiKeys,
} from "./loader.js";
export type { LoadGatewayConfigOptions } from "./loader.js";

export { createConfigSource } from "./source.js";
export type { ConfigListener, ConfigSource } from "./source.js";
