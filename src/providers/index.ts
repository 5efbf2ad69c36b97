/**
 * Providers Module
 *
 * Provider registry, key rotation and the upstream clients for both wire
 * formats.
 */

export {
  createProviderRegistry,
  validateProviders,
  type AuthParams,
  type ClientAuthError,
  type ProviderRegistry,
} from "./registry.js";
export {
  createKeyRotator,
  fingerprintApiKey,
  type KeyRotator,
  type NextApiKey,
} from "./rotation.js";
export { createUpstreamClient, type UpstreamClient, type UpstreamTarget } from "./upstream.js";
export { createOpenAIUpstream, type OpenAIUpstream } from "./openai.js";
export { postMessages, postMessagesStream, ANTHROPIC_VERSION, type HttpClientConfig } from "./http.js";
export { parseSSEStream, encodeSSE, encodeStreamDelta, toSSEFrames, type SSEEvent } from "./stream.js";
