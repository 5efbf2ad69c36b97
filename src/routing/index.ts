/**
 * Routing Module
 *
 * Key-rotating request execution.
 */

export { isKeyRotationError } from "./errors.js";
export type { ExecuteCallback, ExecutionOptions, ExecutionResult } from "./executor.js";
export { executeWithKeyRotation } from "./executor.js";
