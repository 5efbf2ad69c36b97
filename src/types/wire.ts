import type {
  AnthropicStreamEvent,
  MessagesRequest,
  MessagesResponse,
} from "./anthropic.js";
import type {
  ChatCompletionChunk,
  ChatCompletionRequest,
  ChatCompletionResponse,
} from "./openai.js";

/**
 * Wire protocols spoken by clients and providers
 */
export type WireFormat = "anthropic" | "openai";

export const WIRE_FORMATS: readonly WireFormat[] = ["anthropic", "openai"];

export const isWireFormat = (value: unknown): value is WireFormat =>
  value === "anthropic" || value === "openai";

/**
 * Request body tagged with its wire format
 */
export type ChatRequest =
  | { format: "anthropic"; body: MessagesRequest }
  | { format: "openai"; body: ChatCompletionRequest };

/**
 * Non-streaming response body tagged with its wire format
 */
export type ChatResponse =
  | { format: "anthropic"; body: MessagesResponse }
  | { format: "openai"; body: ChatCompletionResponse };

/**
 * One incremental streaming event tagged with its wire format
 */
export type StreamDelta =
  | { format: "anthropic"; event: AnthropicStreamEvent }
  | { format: "openai"; event: ChatCompletionChunk };

/**
 * Copy of a request with the model replaced
 */
export const withModel = (request: ChatRequest, model: string): ChatRequest =>
  request.format === "anthropic"
    ? { format: "anthropic", body: { ...request.body, model } }
    : { format: "openai", body: { ...request.body, model } };

/**
 * Copy of a request with the stream flag set
 */
export const withStreaming = (request: ChatRequest, stream: boolean): ChatRequest =>
  request.format === "anthropic"
    ? { format: "anthropic", body: { ...request.body, stream } }
    : { format: "openai", body: { ...request.body, stream } };
