import { UpstreamHttpError } from "../types/errors.js";
import type { WireFormat, StreamDelta } from "../types/wire.js";

/**
 * One Server-Sent Event
 */
export interface SSEEvent {
  /** Value of the `event:` field, if present */
  event?: string;
  /** Joined `data:` lines */
  data: string;
}

/**
 * Parse Server-Sent Events (SSE) from a fetch Response
 *
 * SSE Format:
 * ```
 * event: content_block_delta
 * data: {"type":"content_block_delta",...}
 *
 * data: [DONE]
 * ```
 *
 * Events are dispatched on a blank line. Comment lines (`:`) are skipped.
 *
 * @param response - Fetch Response with SSE body
 * @param provider - Provider name for errors
 */
export async function* parseSSEStream(
  response: Response,
  provider: string
): AsyncGenerator<SSEEvent, void, unknown> {
  const reader = response.body?.getReader();
  if (!reader) {
    throw new UpstreamHttpError(provider, 0, "Response body is not readable");
  }

  const decoder = new TextDecoder();
  let buffer = "";
  let eventName: string | undefined;
  let dataLines: string[] = [];

  const dispatch = (): SSEEvent | null => {
    if (dataLines.length === 0) {
      eventName = undefined;
      return null;
    }
    const event: SSEEvent = { data: dataLines.join("\n") };
    if (eventName !== undefined) event.event = eventName;
    eventName = undefined;
    dataLines = [];
    return event;
  };

  const consumeLine = (rawLine: string): SSEEvent | null => {
    const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;

    if (line === "") return dispatch();
    if (line.startsWith(":")) return null;

    const colon = line.indexOf(":");
    const field = colon === -1 ? line : line.slice(0, colon);
    const value = colon === -1 ? "" : line.slice(colon + 1).replace(/^ /, "");

    if (field === "event") eventName = value;
    else if (field === "data") dataLines.push(value);
    return null;
  };

  try {
    while (true) {
      const { done, value } = await reader.read();

      if (done) {
        buffer += decoder.decode();
        for (const line of buffer.split("\n")) {
          const event = consumeLine(line);
          if (event) yield event;
        }
        const last = dispatch();
        if (last) yield last;
        break;
      }

      buffer += decoder.decode(value, { stream: true });

      const lines = buffer.split("\n");
      // Keep the last potentially incomplete line in buffer
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        const event = consumeLine(line);
        if (event) yield event;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Parse the JSON payload of an event; undefined for `[DONE]` and malformed JSON
 */
export const parseEventData = (data: string): unknown => {
  if (data === "[DONE]") return undefined;
  try {
    return JSON.parse(data);
  } catch {
    // Malformed payloads are skipped rather than ending the stream
    return undefined;
  }
};

/**
 * Encode one event as an SSE frame
 */
export const encodeSSE = (event: SSEEvent): string =>
  `${event.event !== undefined ? `event: ${event.event}\n` : ""}data: ${event.data}\n\n`;

/**
 * Frame a stream delta the way its wire format frames events
 */
export const encodeStreamDelta = (delta: StreamDelta): string =>
  delta.format === "anthropic"
    ? encodeSSE({ event: delta.event.type, data: JSON.stringify(delta.event) })
    : encodeSSE({ data: JSON.stringify(delta.event) });

/**
 * Turn a delta stream into client SSE frames. OpenAI-format streams are
 * terminated with `data: [DONE]`.
 */
export async function* toSSEFrames(
  deltas: AsyncIterable<StreamDelta>,
  format: WireFormat
): AsyncGenerator<string, void, unknown> {
  for await (const delta of deltas) {
    yield encodeStreamDelta(delta);
  }
  if (format === "openai") {
    yield encodeSSE({ data: "[DONE]" });
  }
}
