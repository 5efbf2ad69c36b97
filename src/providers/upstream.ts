import type { ChatRequest, ChatResponse, StreamDelta } from "../types/wire.js";
import { releaseOnClose } from "../utils/generators.js";
import { postMessages, postMessagesStream } from "./http.js";
import { createOpenAIUpstream, type OpenAIUpstream, type UpstreamTarget } from "./openai.js";

export type { UpstreamTarget } from "./openai.js";

/**
 * Sends a request, already in the provider's wire format, to the provider
 */
export interface UpstreamClient {
  complete: (
    target: UpstreamTarget,
    request: ChatRequest,
    signal?: AbortSignal
  ) => Promise<ChatResponse>;
  /** Resolves once the upstream accepted the request */
  stream: (
    target: UpstreamTarget,
    request: ChatRequest,
    signal?: AbortSignal
  ) => Promise<AsyncGenerator<StreamDelta, void, unknown>>;
}

const tagDeltas = <T>(
  events: AsyncGenerator<T, void, unknown>,
  wrap: (event: T) => StreamDelta
): AsyncGenerator<StreamDelta, void, unknown> => {
  async function* tagged(): AsyncGenerator<StreamDelta, void, unknown> {
    for await (const event of events) {
      yield wrap(event);
    }
  }
  return releaseOnClose(tagged(), () => events.return(undefined));
};

/**
 * Upstream client that speaks both wire formats: Anthropic Messages over
 * fetch, OpenAI chat completions through the SDK
 */
export const createUpstreamClient = (
  options: { openai?: OpenAIUpstream } = {}
): UpstreamClient => {
  const openai = options.openai ?? createOpenAIUpstream();

  const httpConfig = ({ provider, apiKey }: UpstreamTarget, signal?: AbortSignal) => ({
    provider: provider.name,
    baseUrl: provider.baseUrl,
    apiKey,
    timeoutMs: provider.timeoutMs,
    headers: { ...provider.headers },
    signal,
  });

  return {
    complete: async (target, request, signal) => {
      if (request.format === "anthropic") {
        const body = await postMessages(httpConfig(target, signal), request.body);
        return { format: "anthropic", body };
      }
      const body = await openai.complete(target, request.body, signal);
      return { format: "openai", body };
    },

    stream: async (target, request, signal) => {
      if (request.format === "anthropic") {
        const events = await postMessagesStream(httpConfig(target, signal), request.body);
        return tagDeltas(events, (event) => ({ format: "anthropic", event }));
      }
      const chunks = await openai.stream(target, request.body, signal);
      return tagDeltas(chunks, (event) => ({ format: "openai", event }));
    },
  };
};
