/**
 * OpenAI-compatible upstream
 *
 * Uses the official OpenAI SDK for chat completions against any
 * OpenAI-compatible base URL. Bodies are mapped explicitly between the
 * gateway's wire types and the SDK's parameter and response types.
 */

import OpenAI, { type ClientOptions } from "openai";
import type {
  ChatCompletion as SdkChatCompletion,
  ChatCompletionChunk as SdkChatCompletionChunk,
  ChatCompletionContentPart as SdkContentPart,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import type { ProviderConfig } from "../types/config.js";
import type {
  ChatCompletionChunk,
  ChatCompletionDelta,
  ChatCompletionMessage,
  ChatCompletionRequest,
  ChatCompletionResponse,
  CompletionUsage,
  ContentPart,
  FinishReason,
  ToolCall,
  ToolCallDelta,
} from "../types/openai.js";
import { UpstreamHttpError } from "../types/errors.js";
import { isRecord, readErrorStatus } from "../utils/guards.js";
import { releaseOnClose } from "../utils/generators.js";
import { errorMessage } from "../utils/logger.js";

/**
 * Provider plus the key an upstream call authenticates with
 */
export interface UpstreamTarget {
  provider: ProviderConfig;
  apiKey: string;
}

export interface OpenAIUpstream {
  complete: (
    target: UpstreamTarget,
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ) => Promise<ChatCompletionResponse>;
  stream: (
    target: UpstreamTarget,
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ) => Promise<AsyncGenerator<ChatCompletionChunk, void, unknown>>;
}

export interface OpenAIUpstreamOptions {
  /** Client factory, replaced in tests */
  createClient?: (options: ClientOptions) => OpenAI;
}

type SdkParams = Omit<ChatCompletionCreateParamsNonStreaming, "stream">;

// ============================================================================
// Request mapping
// ============================================================================

const textOf = (content: string | ContentPart[] | null): string => {
  if (content === null) return "";
  if (typeof content === "string") return content;
  return content
    .map((part) => (part.type === "text" ? part.text : ""))
    .join("");
};

const toSdkContentParts = (content: string | ContentPart[] | null): string | SdkContentPart[] => {
  if (content === null) return "";
  if (typeof content === "string") return content;
  return content.map((part): SdkContentPart =>
    part.type === "text"
      ? { type: "text", text: part.text }
      : { type: "image_url", image_url: { ...part.image_url } }
  );
};

const toSdkMessage = (message: ChatCompletionMessage): ChatCompletionMessageParam => {
  switch (message.role) {
    case "system":
      return {
        role: "system",
        content: textOf(message.content),
        ...(message.name ? { name: message.name } : {}),
      };
    case "user":
      return {
        role: "user",
        content: toSdkContentParts(message.content),
        ...(message.name ? { name: message.name } : {}),
      };
    case "assistant":
      return {
        role: "assistant",
        content: message.content === null ? null : textOf(message.content),
        ...(message.tool_calls?.length ? { tool_calls: message.tool_calls } : {}),
      };
    case "tool":
      return {
        role: "tool",
        content: textOf(message.content),
        tool_call_id: message.tool_call_id ?? "",
      };
  }
};

export const toSdkParams = (request: ChatCompletionRequest): SdkParams => ({
  model: request.model,
  messages: request.messages.map(toSdkMessage),
  temperature: request.temperature,
  top_p: request.top_p,
  n: request.n,
  stop: request.stop,
  max_tokens: request.max_tokens,
  max_completion_tokens: request.max_completion_tokens,
  presence_penalty: request.presence_penalty,
  frequency_penalty: request.frequency_penalty,
  user: request.user,
  tools: request.tools,
  tool_choice: request.tool_choice,
  response_format: request.response_format
    ? request.response_format.type === "json_object"
      ? { type: "json_object" }
      : { type: "text" }
    : undefined,
  seed: request.seed,
});

// ============================================================================
// Response mapping
// ============================================================================

const toFinishReason = (reason: string | null | undefined): FinishReason | null => {
  switch (reason) {
    case "stop":
    case "length":
    case "tool_calls":
    case "content_filter":
      return reason;
    case "function_call":
      return "tool_calls";
    default:
      return null;
  }
};

const toUsage = (usage: SdkChatCompletion["usage"]): CompletionUsage | undefined =>
  usage
    ? {
        prompt_tokens: usage.prompt_tokens,
        completion_tokens: usage.completion_tokens,
        total_tokens: usage.total_tokens,
      }
    : undefined;

export const fromSdkCompletion = (completion: SdkChatCompletion): ChatCompletionResponse => {
  const usage = toUsage(completion.usage);
  return {
    id: completion.id,
    object: "chat.completion",
    created: completion.created,
    model: completion.model,
    choices: completion.choices.map((choice) => {
      const toolCalls = (choice.message.tool_calls ?? []).map(
        (call): ToolCall => ({
          id: call.id,
          type: "function",
          function: { name: call.function.name, arguments: call.function.arguments },
        })
      );
      const message: ChatCompletionMessage = {
        role: "assistant",
        content: choice.message.content,
      };
      if (toolCalls.length > 0) message.tool_calls = toolCalls;
      return {
        index: choice.index,
        message,
        finish_reason: toFinishReason(choice.finish_reason),
      };
    }),
    ...(usage ? { usage } : {}),
  };
};

const fromSdkDelta = (delta: SdkChatCompletionChunk.Choice.Delta): ChatCompletionDelta => {
  const result: ChatCompletionDelta = {};
  if (delta.role === "assistant") result.role = "assistant";
  if (delta.content !== undefined) result.content = delta.content;
  if (delta.tool_calls) {
    result.tool_calls = delta.tool_calls.map(
      (call): ToolCallDelta => ({
        index: call.index,
        ...(call.id ? { id: call.id } : {}),
        ...(call.type ? { type: call.type } : {}),
        ...(call.function
          ? { function: { name: call.function.name, arguments: call.function.arguments } }
          : {}),
      })
    );
  }
  return result;
};

export const fromSdkChunk = (chunk: SdkChatCompletionChunk): ChatCompletionChunk => {
  const usage = toUsage(chunk.usage ?? undefined);
  return {
    id: chunk.id,
    object: "chat.completion.chunk",
    created: chunk.created,
    model: chunk.model,
    choices: chunk.choices.map((choice) => ({
      index: choice.index,
      delta: fromSdkDelta(choice.delta),
      finish_reason: toFinishReason(choice.finish_reason),
    })),
    ...(usage ? { usage } : {}),
  };
};

// ============================================================================
// Errors
// ============================================================================

const readErrorBody = (error: unknown): string | undefined =>
  isRecord(error) && error.error !== undefined ? JSON.stringify(error.error) : undefined;

/**
 * Normalize SDK errors to UpstreamHttpError. Errors without an HTTP exchange
 * (connection failures, timeouts) get status 0 and 408.
 */
export const toUpstreamError = (provider: string, error: unknown): unknown => {
  if (error instanceof UpstreamHttpError) return error;
  if (!(error instanceof Error)) return error;

  if (error.name === "APIUserAbortError") {
    return new UpstreamHttpError(provider, 0, "Request cancelled");
  }
  if (error.name === "APIConnectionTimeoutError") {
    return new UpstreamHttpError(provider, 408, "Request timeout");
  }

  const status = readErrorStatus(error);
  if (status === undefined) {
    return error.name === "APIConnectionError"
      ? new UpstreamHttpError(provider, 0, `Network error: ${error.message}`)
      : error;
  }
  return new UpstreamHttpError(provider, status, errorMessage(error), readErrorBody(error));
};

// ============================================================================
// Upstream
// ============================================================================

export const createOpenAIUpstream = (options: OpenAIUpstreamOptions = {}): OpenAIUpstream => {
  const createClient = options.createClient ?? ((clientOptions) => new OpenAI(clientOptions));
  const clients = new Map<string, OpenAI>();

  const clientOptionsFor = ({ provider, apiKey }: UpstreamTarget): ClientOptions => ({
    apiKey,
    baseURL: provider.baseUrl,
    timeout: provider.timeoutMs,
    maxRetries: provider.maxRetries,
    defaultHeaders: { ...provider.headers },
  });

  /**
   * Clients for static keys are reused. Client-supplied keys get a fresh
   * client per call so the cache cannot grow with arbitrary keys.
   */
  const getClient = (target: UpstreamTarget): OpenAI => {
    if (target.provider.passthrough) {
      return createClient(clientOptionsFor(target));
    }
    const { provider, apiKey } = target;
    const cacheKey = [
      provider.name,
      provider.baseUrl,
      provider.timeoutMs,
      provider.maxRetries,
      apiKey,
    ].join("|");
    let client = clients.get(cacheKey);
    if (!client) {
      client = createClient(clientOptionsFor(target));
      clients.set(cacheKey, client);
    }
    return client;
  };

  const complete = async (
    target: UpstreamTarget,
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<ChatCompletionResponse> => {
    try {
      const completion = await getClient(target).chat.completions.create(
        { ...toSdkParams(request), stream: false },
        { signal }
      );
      return fromSdkCompletion(completion);
    } catch (error) {
      throw toUpstreamError(target.provider.name, error);
    }
  };

  const stream = async (
    target: UpstreamTarget,
    request: ChatCompletionRequest,
    signal?: AbortSignal
  ): Promise<AsyncGenerator<ChatCompletionChunk, void, unknown>> => {
    const provider = target.provider.name;
    // Follows the caller's signal; also aborted when the stream is closed unread
    const controller = new AbortController();
    const abort = () => controller.abort();
    if (signal?.aborted) abort();
    signal?.addEventListener("abort", abort, { once: true });

    let sdkStream: AsyncIterable<SdkChatCompletionChunk>;
    try {
      sdkStream = await getClient(target).chat.completions.create(
        {
          ...toSdkParams(request),
          stream: true,
          ...(request.stream_options ? { stream_options: request.stream_options } : {}),
        },
        { signal: controller.signal }
      );
    } catch (error) {
      signal?.removeEventListener("abort", abort);
      throw toUpstreamError(provider, error);
    }

    async function* chunks(): AsyncGenerator<ChatCompletionChunk, void, unknown> {
      try {
        for await (const chunk of sdkStream) {
          yield fromSdkChunk(chunk);
        }
      } catch (error) {
        throw toUpstreamError(provider, error);
      } finally {
        signal?.removeEventListener("abort", abort);
      }
    }

    return releaseOnClose(chunks(), () => {
      signal?.removeEventListener("abort", abort);
      abort();
    });
  };

  return { complete, stream };
};
