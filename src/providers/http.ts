import type {
  AnthropicStreamEvent,
  MessagesRequest,
  MessagesResponse,
} from "../types/anthropic.js";
import { UpstreamHttpError } from "../types/errors.js";
import { releaseOnClose } from "../utils/generators.js";
import { isRecord } from "../utils/guards.js";
import { parseEventData, parseSSEStream } from "./stream.js";

/** Messages API version header value */
export const ANTHROPIC_VERSION = "2023-06-01";

/**
 * HTTP client configuration
 */
export interface HttpClientConfig {
  /** Provider name, for errors */
  provider: string;
  /** Base URL for the API */
  baseUrl: string;
  /** API key for authentication */
  apiKey: string;
  /** Request timeout in milliseconds (default: 90000) */
  timeoutMs?: number;
  /** Additional headers to include */
  headers?: Record<string, string>;
  /** Caller cancellation */
  signal?: AbortSignal;
}

const STREAM_EVENT_TYPES = new Set([
  "message_start",
  "content_block_start",
  "content_block_delta",
  "content_block_stop",
  "message_delta",
  "message_stop",
  "ping",
  "error",
]);

export const isMessagesResponse = (value: unknown): value is MessagesResponse =>
  isRecord(value) && value.type === "message" && Array.isArray(value.content);

export const isAnthropicStreamEvent = (value: unknown): value is AnthropicStreamEvent =>
  isRecord(value) && typeof value.type === "string" && STREAM_EVENT_TYPES.has(value.type);

/**
 * Create headers for API request
 */
const createHeaders = (
  apiKey: string,
  extraHeaders?: Record<string, string>,
  isStreaming = false
): Record<string, string> => ({
  "Content-Type": "application/json",
  "x-api-key": apiKey,
  "anthropic-version": ANTHROPIC_VERSION,
  Accept: isStreaming ? "text/event-stream" : "application/json",
  ...extraHeaders,
});

/**
 * Pull `error.message` out of an error body, falling back to the status text
 */
const readErrorMessage = (body: string, fallback: string): string => {
  const parsed = parseEventData(body);
  if (isRecord(parsed) && isRecord(parsed.error) && typeof parsed.error.message === "string") {
    return parsed.error.message;
  }
  return fallback;
};

/**
 * POST to /messages; resolves once response headers arrived with a 2xx status
 */
const send = async (
  config: HttpClientConfig,
  request: MessagesRequest,
  isStreaming: boolean
): Promise<Response> => {
  const { provider, baseUrl, apiKey, timeoutMs = 90_000, headers: extraHeaders, signal } = config;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  const onAbort = (): void => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const response = await fetch(`${baseUrl}/messages`, {
      method: "POST",
      headers: createHeaders(apiKey, extraHeaders, isStreaming),
      body: JSON.stringify({ ...request, stream: isStreaming }),
      signal: controller.signal,
    });

    if (!response.ok) {
      const errorBody = await response.text().catch(() => "");
      throw new UpstreamHttpError(
        provider,
        response.status,
        readErrorMessage(errorBody, `API request failed: ${response.status} ${response.statusText}`),
        errorBody
      );
    }

    return response;
  } catch (error) {
    if (error instanceof UpstreamHttpError) {
      throw error;
    }

    if (error instanceof Error && error.name === "AbortError") {
      throw signal?.aborted
        ? new UpstreamHttpError(provider, 0, "Request cancelled")
        : new UpstreamHttpError(provider, 408, "Request timeout");
    }

    throw new UpstreamHttpError(
      provider,
      0,
      `Network error: ${error instanceof Error ? error.message : "Unknown"}`
    );
  } finally {
    // The timeout covers the wait for response headers only
    clearTimeout(timeoutId);
    signal?.removeEventListener("abort", onAbort);
  }
};

/**
 * Make a non-streaming Messages API request
 */
export const postMessages = async (
  config: HttpClientConfig,
  request: MessagesRequest
): Promise<MessagesResponse> => {
  const response = await send(config, request, false);
  const body: unknown = await response.json();

  if (!isMessagesResponse(body)) {
    throw new UpstreamHttpError(config.provider, 502, "Malformed Messages API response");
  }
  return body;
};

/**
 * Yield Messages API stream events from an SSE response.
 * An `error` event ends the stream with an UpstreamHttpError.
 */
export async function* readMessageEvents(
  response: Response,
  provider: string
): AsyncGenerator<AnthropicStreamEvent, void, unknown> {
  for await (const sse of parseSSEStream(response, provider)) {
    const payload = parseEventData(sse.data);
    if (!isAnthropicStreamEvent(payload)) continue;

    if (payload.type === "error") {
      const status = payload.error.type === "overloaded_error" ? 529 : 502;
      throw new UpstreamHttpError(provider, status, payload.error.message, sse.data);
    }
    yield payload;
  }
}

/**
 * Make a streaming Messages API request
 *
 * Resolves once the upstream accepted the request, so status errors surface
 * before the first event is read.
 */
export const postMessagesStream = async (
  config: HttpClientConfig,
  request: MessagesRequest
): Promise<AsyncGenerator<AnthropicStreamEvent, void, unknown>> => {
  const response = await send(config, request, true);
  return releaseOnClose(readMessageEvents(response, config.provider), () =>
    response.body?.cancel()
  );
};
