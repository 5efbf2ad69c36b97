/**
 * Request Execution Module
 *
 * Runs one upstream call per API key until a call succeeds or the
 * provider's keys are used up. The loop is bounded by the key count: every
 * failed key joins the exclusion set, and the rotator refuses once the set
 * covers all keys.
 */

import type { AuthParams } from "../providers/registry.js";
import { fingerprintApiKey } from "../providers/rotation.js";
import { getLogger, errorMessage, type Logger } from "../utils/logger.js";
import { isKeyRotationError } from "./errors.js";

/**
 * Callback to execute the actual API request with one key
 */
export type ExecuteCallback<T> = (apiKey: string) => Promise<T>;

export interface ExecutionResult<T> {
  response: T;
  /** Key of the successful call */
  apiKey: string;
  /** Number of upstream calls made */
  attempts: number;
  /** Keys that failed, in failure order */
  excludedKeys: readonly string[];
}

export interface ExecutionOptions {
  logger?: Logger;
}

/**
 * Execute a request, rotating to the next API key on auth and quota failures
 *
 * Passthrough credentials are never rotated; their failures are rethrown.
 * Errors that do not signal a key problem are rethrown as they are.
 *
 * @throws AllKeysExhaustedError when every key failed
 */
export const executeWithKeyRotation = async <T>(
  auth: AuthParams,
  execute: ExecuteCallback<T>,
  options: ExecutionOptions = {}
): Promise<ExecutionResult<T>> => {
  const logger = options.logger ?? getLogger();
  const excluded = new Set<string>();
  let apiKey = auth.apiKey;
  let attempts = 0;

  while (true) {
    attempts++;
    try {
      const response = await execute(apiKey);
      return { response, apiKey, attempts, excludedKeys: [...excluded] };
    } catch (error) {
      if (auth.mode === "passthrough" || !isKeyRotationError(error)) {
        throw error;
      }

      excluded.add(apiKey);
      logger.warn("Provider rejected API key, rotating", {
        provider: auth.provider,
        key: fingerprintApiKey(apiKey),
        attempt: attempts,
        error: errorMessage(error),
      });

      const next = await auth.nextApiKey(excluded);
      if (next.isErr()) {
        throw next.error;
      }
      apiKey = next.value;
    }
  }
};
