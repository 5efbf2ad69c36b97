/**
 * Key Rotation
 *
 * Per-provider round-robin cursor over the configured API keys. The cursor
 * is shared by every request to the provider and only moves under the
 * provider's mutex.
 */

import { createHash } from "node:crypto";
import { ok, err, type Result } from "neverthrow";
import { AllKeysExhaustedError } from "../types/errors.js";
import { PASSTHROUGH_SENTINEL } from "../types/config.js";
import { createMutex } from "../utils/mutex.js";
import { getLogger, type Logger } from "../utils/logger.js";

/**
 * Returns the next key not in `exclude`
 */
export type NextApiKey = (
  exclude: ReadonlySet<string>
) => Promise<Result<string, AllKeysExhaustedError>>;

export interface KeyRotator {
  readonly provider: string;
  readonly keys: readonly string[];
  next: NextApiKey;
  /** Index of the key the next call starts from */
  getCursor: () => number;
}

export interface KeyRotatorOptions {
  /** Initial cursor, reduced modulo the key count */
  startIndex?: number;
  logger?: Logger;
}

/**
 * Short, stable identifier for a key, safe to log
 */
export const fingerprintApiKey = (apiKey: string): string =>
  apiKey === PASSTHROUGH_SENTINEL
    ? "PASSTHRU"
    : createHash("sha256").update(apiKey).digest("hex").slice(0, 8);

export const createKeyRotator = (
  provider: string,
  keys: readonly string[],
  options: KeyRotatorOptions = {}
): KeyRotator => {
  const logger = options.logger ?? getLogger();
  const mutex = createMutex();
  const frozenKeys = Object.freeze([...keys]);
  let cursor = frozenKeys.length > 0 ? (options.startIndex ?? 0) % frozenKeys.length : 0;

  // One lap from the cursor; the cursor ends just past the key returned
  const takeFirstAllowed = (exclude: ReadonlySet<string>): Promise<string | undefined> =>
    mutex.runExclusive(() => {
      for (let step = 0; step < frozenKeys.length; step++) {
        const key = frozenKeys[cursor];
        cursor = (cursor + 1) % frozenKeys.length;
        if (key !== undefined && !exclude.has(key)) return key;
      }
      return undefined;
    });

  const exhausted = (exclude: ReadonlySet<string>): AllKeysExhaustedError => {
    logger.error("All provider API keys exhausted", {
      provider,
      keyCount: frozenKeys.length,
      excluded: [...exclude].map(fingerprintApiKey),
    });
    return new AllKeysExhaustedError(provider, exclude.size);
  };

  const next: NextApiKey = async (exclude) => {
    if (exclude.size >= frozenKeys.length) {
      return err(exhausted(exclude));
    }

    const key = await takeFirstAllowed(exclude);
    if (key !== undefined) {
      return ok(key);
    }
    return err(exhausted(exclude));
  };

  return {
    provider,
    keys: frozenKeys,
    next,
    getCursor: () => cursor,
  };
};
