/**
 * Error Classification
 *
 * Decides which upstream failures move a request on to the provider's next
 * API key.
 */

import { isRecord, readErrorStatus } from "../utils/guards.js";

/** Statuses that mean "this key is not usable right now" */
const ROTATION_STATUSES = new Set([401, 403, 429]);

const QUOTA_PATTERN = /insufficient[_ ]quota|quota exceeded|exceeded your current quota/i;

const readErrorText = (error: unknown): string => {
  if (!isRecord(error)) return "";
  const parts: string[] = [];
  if (typeof error.message === "string") parts.push(error.message);
  if (typeof error.body === "string") parts.push(error.body);
  if (error.error !== undefined) parts.push(JSON.stringify(error.error));
  return parts.join("\n");
};

/**
 * Check if an error should trigger key rotation
 *
 * 401, 403 and 429 always do. Any other 4xx does when its message or body
 * reports an exhausted quota.
 */
export const isKeyRotationError = (error: unknown): boolean => {
  const status = readErrorStatus(error);
  if (status === undefined) return false;
  if (ROTATION_STATUSES.has(status)) return true;
  return status >= 400 && status < 500 && QUOTA_PATTERN.test(readErrorText(error));
};
