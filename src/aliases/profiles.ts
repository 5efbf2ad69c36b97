/**
 * Profiles
 *
 * A profile bundles aliases with request settings. `profile:alias` resolves
 * through the profile's own aliases, whose targets always name a provider.
 */

import type { ProfileConfig } from "../types/config.js";
import { ConfigurationValidationError } from "../types/errors.js";
import { getLogger, type Logger } from "../utils/logger.js";
import { splitProviderPrefix } from "./resolvers.js";

// ============================================================================
// Validation
// ============================================================================

const validateProfile = (profile: ProfileConfig, providers: readonly string[]): void => {
  if (!profile.name) {
    throw new ConfigurationValidationError("profile name must not be empty");
  }
  const label = `Profile "${profile.name}"`;

  if (profile.timeoutMs !== undefined && !(profile.timeoutMs > 0)) {
    throw new ConfigurationValidationError(`${label} timeout must be positive`);
  }
  if (profile.maxRetries !== undefined && !(profile.maxRetries >= 0)) {
    throw new ConfigurationValidationError(`${label} max retries must not be negative`);
  }

  for (const [alias, target] of Object.entries(profile.aliases)) {
    const { provider, model } = splitProviderPrefix(target);
    if (provider === undefined || model === "") {
      throw new ConfigurationValidationError(
        `${label} alias "${alias}" must target "provider:model", got "${target}"`
      );
    }
    if (!providers.includes(provider)) {
      throw new ConfigurationValidationError(
        `${label} alias "${alias}" targets unknown provider "${provider}". ` +
          `Available providers: ${[...providers].sort().join(", ")}`
      );
    }
  }
};

/**
 * Validate profiles against the declared providers; throws
 * ConfigurationValidationError on the first problem. A profile named like a
 * provider is allowed and logged, since its prefix shadows the provider's.
 */
export const validateProfiles = (
  profiles: readonly ProfileConfig[],
  providers: readonly string[],
  logger: Logger = getLogger()
): void => {
  const seen = new Set<string>();
  for (const profile of profiles) {
    validateProfile(profile, providers);
    if (seen.has(profile.name)) {
      throw new ConfigurationValidationError(`Profile "${profile.name}" is declared twice`);
    }
    seen.add(profile.name);

    if (providers.includes(profile.name)) {
      logger.warn("Profile shares its name with a provider and takes precedence for its prefix", {
        profile: profile.name,
      });
    }
  }
};
