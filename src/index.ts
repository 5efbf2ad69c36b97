/**
 * switchyard
 *
 * Dispatch core for an LLM gateway that speaks both the Anthropic Messages
 * and the OpenAI Chat Completions wire formats: alias resolution, provider
 * key rotation, a middleware chain and protocol conversion.
 */

export const VERSION = "0.1.0";

// Export all types
export * from "./types/index.js";

// Export alias resolution
export * from "./aliases/index.js";

// Export providers, key rotation and upstream clients
export * from "./providers/index.js";

// Export key-rotating execution
export * from "./routing/index.js";

// Export middleware
export * from "./middleware/index.js";

// Export protocol conversion
export * from "./conversion/index.js";

// Export configuration loading
export * from "./config/index.js";

// Export utilities
export * from "./utils/index.js";

// Export gateway
export { createGateway } from "./gateway.js";
export type {
  DispatchMetadata,
  DispatchOptions,
  Gateway,
  GatewayOptions,
  ProviderSummary,
  ResolvedRequest,
  StreamMetadata,
} from "./gateway.js";
