/**
 * Config Source
 *
 * Owns the current gateway configuration loaded from a file and re-reads it
 * on demand. Subscribers see each successfully validated config.
 */

import type { GatewayConfig } from "../types/config.js";
import { resolveConfig } from "../types/config.js";
import { validateProfiles } from "../aliases/profiles.js";
import { validateProviders } from "../providers/registry.js";
import { errorMessage, getLogger } from "../utils/logger.js";
import { loadGatewayConfig, type LoadGatewayConfigOptions } from "./loader.js";

export type ConfigListener = (config: GatewayConfig) => void;

export interface ConfigSource {
  current: () => GatewayConfig;
  /**
   * Re-read and validate the file, then notify subscribers.
   * On failure the previous config stays current and the error is rethrown.
   */
  reload: () => GatewayConfig;
  /** Returns an unsubscribe function */
  subscribe: (listener: ConfigListener) => () => void;
}

const loadValidated = (options: LoadGatewayConfigOptions): GatewayConfig => {
  const config = loadGatewayConfig(options);
  const resolved = resolveConfig(config);
  validateProviders(resolved.providers);
  validateProfiles(
    resolved.profiles,
    resolved.providers.map((provider) => provider.name),
    options.logger
  );
  return config;
};

/**
 * Load a config file once and keep it reloadable
 *
 * @throws ConfigurationValidationError when the initial load fails
 */
export const createConfigSource = (options: LoadGatewayConfigOptions): ConfigSource => {
  const logger = options.logger ?? getLogger();
  const listeners = new Set<ConfigListener>();
  let config = loadValidated(options);

  const reload = (): GatewayConfig => {
    let next: GatewayConfig;
    try {
      next = loadValidated(options);
    } catch (error) {
      logger.error("Config reload failed, keeping previous config", {
        path: options.path,
        error: errorMessage(error),
      });
      throw error;
    }

    config = next;
    logger.info("Config reloaded", {
      path: options.path,
      providers: next.providers.length,
    });
    for (const listener of listeners) {
      listener(next);
    }
    return next;
  };

  return {
    current: () => config,
    reload,
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
};
