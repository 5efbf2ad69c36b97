/**
 * Provider Registry
 *
 * Holds one validated ProviderConfig per provider, in declaration order, and
 * owns each provider's key rotator. Validation happens when configs are
 * loaded, never at request time.
 */

import { ok, err, type Result } from "neverthrow";
import type { ProviderConfig } from "../types/config.js";
import { isWireFormat } from "../types/wire.js";
import {
  AllKeysExhaustedError,
  ConfigurationValidationError,
  MissingClientKeyError,
  ProviderNotConfiguredError,
} from "../types/errors.js";
import { getLogger, type Logger } from "../utils/logger.js";
import { createKeyRotator, fingerprintApiKey, type KeyRotator, type NextApiKey } from "./rotation.js";

/**
 * Credentials for one upstream call
 */
export type AuthParams =
  | {
      mode: "static";
      provider: string;
      apiKey: string;
      /** Rotation function over the provider's full key list */
      nextApiKey: NextApiKey;
    }
  | {
      mode: "passthrough";
      provider: string;
      /** The client's own key */
      apiKey: string;
      nextApiKey: null;
    };

export type ClientAuthError =
  | ProviderNotConfiguredError
  | MissingClientKeyError
  | AllKeysExhaustedError;

export interface ProviderRegistry {
  get: (name: string) => ProviderConfig | undefined;
  /** Providers in declaration order */
  list: () => readonly ProviderConfig[];
  names: () => readonly string[];
  getRotator: (name: string) => KeyRotator | undefined;
  getClientAuth: (
    provider: string,
    clientApiKey?: string
  ) => Promise<Result<AuthParams, ClientAuthError>>;
  /** Swap in new configs. Rotation cursors of unchanged key lists carry over. */
  replace: (configs: readonly ProviderConfig[]) => void;
}

// ============================================================================
// Validation
// ============================================================================

const validateProvider = (config: ProviderConfig): void => {
  const label = config.name ? `Provider "${config.name}"` : "Provider";

  if (!config.name) {
    throw new ConfigurationValidationError("provider name must not be empty");
  }
  if (!config.baseUrl) {
    throw new ConfigurationValidationError(`${label} has no base URL`);
  }
  if (!isWireFormat(config.format)) {
    throw new ConfigurationValidationError(
      `${label} has unknown format "${String(config.format)}". Use "anthropic" or "openai".`
    );
  }
  if (!(config.timeoutMs > 0)) {
    throw new ConfigurationValidationError(`${label} timeout must be positive`);
  }
  if (config.apiKeys.some((key) => key.trim() === "")) {
    throw new ConfigurationValidationError(`${label} has an empty API key`);
  }
  if (config.passthrough && config.apiKeys.length > 0) {
    throw new ConfigurationValidationError(
      `${label} mixes passthrough with static API keys. Use one or the other.`
    );
  }
  if (!config.passthrough && config.apiKeys.length === 0) {
    throw new ConfigurationValidationError(`${label} has no API key and is not passthrough`);
  }
  if (new Set(config.apiKeys).size !== config.apiKeys.length) {
    throw new ConfigurationValidationError(`${label} lists the same API key twice`);
  }
};

/**
 * Validate a provider list; throws ConfigurationValidationError on the first problem
 */
export const validateProviders = (configs: readonly ProviderConfig[]): void => {
  if (configs.length === 0) {
    throw new ConfigurationValidationError("At least one provider must be configured");
  }

  const seen = new Set<string>();
  for (const config of configs) {
    validateProvider(config);
    if (seen.has(config.name)) {
      throw new ConfigurationValidationError(`Provider "${config.name}" is declared twice`);
    }
    seen.add(config.name);
  }
};

// ============================================================================
// Registry
// ============================================================================

const sameKeys = (a: readonly string[], b: readonly string[]): boolean =>
  a.length === b.length && a.every((key, i) => key === b[i]);

export const createProviderRegistry = (
  configs: readonly ProviderConfig[],
  options: { logger?: Logger } = {}
): ProviderRegistry => {
  const logger = options.logger ?? getLogger();

  let providers = new Map<string, ProviderConfig>();
  let rotators = new Map<string, KeyRotator>();

  const replace = (next: readonly ProviderConfig[]): void => {
    validateProviders(next);

    const nextProviders = new Map<string, ProviderConfig>();
    const nextRotators = new Map<string, KeyRotator>();

    for (const config of next) {
      nextProviders.set(config.name, Object.freeze({ ...config }));
      if (config.passthrough) continue;

      const previous = rotators.get(config.name);
      if (previous && sameKeys(previous.keys, config.apiKeys)) {
        nextRotators.set(config.name, previous);
      } else {
        nextRotators.set(
          config.name,
          createKeyRotator(config.name, config.apiKeys, {
            startIndex: previous?.getCursor(),
            logger,
          })
        );
      }
    }

    providers = nextProviders;
    rotators = nextRotators;
  };

  const getClientAuth = async (
    provider: string,
    clientApiKey?: string
  ): Promise<Result<AuthParams, ClientAuthError>> => {
    const name = provider.toLowerCase();
    const config = providers.get(name);
    if (!config) {
      return err(new ProviderNotConfiguredError(name, [...providers.keys()]));
    }

    if (config.passthrough) {
      if (!clientApiKey) {
        logger.warn("Passthrough provider called without a client API key", { provider: name });
        return err(new MissingClientKeyError(name));
      }
      const auth: AuthParams = {
        mode: "passthrough",
        provider: name,
        apiKey: clientApiKey,
        nextApiKey: null,
      };
      return ok(auth);
    }

    const rotator = rotators.get(name);
    if (!rotator) {
      return err(new ProviderNotConfiguredError(name, [...providers.keys()]));
    }

    const first = await rotator.next(new Set());
    if (first.isErr()) return err(first.error);

    logger.debug("Selected provider API key", {
      provider: name,
      key: fingerprintApiKey(first.value),
    });
    const auth: AuthParams = {
      mode: "static",
      provider: name,
      apiKey: first.value,
      nextApiKey: rotator.next,
    };
    return ok(auth);
  };

  replace(configs);

  return {
    get: (name) => providers.get(name.toLowerCase()),
    list: () => [...providers.values()],
    names: () => [...providers.keys()],
    getRotator: (name) => rotators.get(name.toLowerCase()),
    getClientAuth,
    replace,
  };
};
