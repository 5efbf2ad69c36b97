/**
 * Usage Middleware
 *
 * Reports one usage record per request. Token counts come from the
 * upstream's usage fields when present and are estimated otherwise.
 */

import type { ChatResponse, StreamDelta } from "../types/wire.js";
import { estimateRequestTokens, estimateTokens } from "../utils/tokens.js";
import { withChunkUpdates, type Metadata, type RequestContext } from "./context.js";
import { createMiddleware, type MaybePromise, type Middleware } from "./types.js";

export interface UsageRecord {
  requestId: string;
  provider: string;
  model: string;
  conversationId?: string;
  inputTokens: number;
  outputTokens: number;
  /** True when either count is an estimate */
  estimated: boolean;
  streamed: boolean;
  /** Stream chunks seen; 0 for non-streaming requests */
  chunks: number;
}

export interface UsageMiddlewareOptions {
  name?: string;
  onUsage: (record: UsageRecord) => MaybePromise<void>;
  shouldHandle?: (provider: string, model: string) => boolean;
}

/** Accumulated metadata keys written by this middleware */
export const USAGE_KEYS = {
  chunks: "usage.chunks",
  outputChars: "usage.outputChars",
  inputTokens: "usage.inputTokens",
  outputTokens: "usage.outputTokens",
} as const;

interface ReportedUsage {
  input?: number;
  output?: number;
}

interface DeltaUsage extends ReportedUsage {
  text: string;
}

const readNumber = (metadata: Metadata, key: string): number | undefined => {
  const value = metadata[key];
  return typeof value === "number" ? value : undefined;
};

const responseUsage = (response: ChatResponse): ReportedUsage & { text: string } => {
  if (response.format === "anthropic") {
    const { body } = response;
    return {
      input: body.usage.input_tokens,
      output: body.usage.output_tokens,
      text: body.content
        .map((block) => (block.type === "text" ? block.text : JSON.stringify(block.input)))
        .join(""),
    };
  }
  const { body } = response;
  return {
    input: body.usage?.prompt_tokens,
    output: body.usage?.completion_tokens,
    text: body.choices
      .map((choice) => {
        const { content } = choice.message;
        return typeof content === "string" ? content : "";
      })
      .join(""),
  };
};

const deltaUsage = (delta: StreamDelta): DeltaUsage => {
  if (delta.format === "anthropic") {
    const { event } = delta;
    switch (event.type) {
      case "message_start":
        return { input: event.message.usage.input_tokens, text: "" };
      case "content_block_delta":
        return {
          text: event.delta.type === "text_delta" ? event.delta.text : event.delta.partial_json,
        };
      case "message_delta":
        return {
          input: event.usage.input_tokens,
          output: event.usage.output_tokens,
          text: "",
        };
      default:
        return { text: "" };
    }
  }

  const { event } = delta;
  const text = event.choices
    .map((choice) => {
      const toolText = (choice.delta.tool_calls ?? [])
        .map((call) => call.function?.arguments ?? "")
        .join("");
      return (choice.delta.content ?? "") + toolText;
    })
    .join("");
  return {
    input: event.usage?.prompt_tokens,
    output: event.usage?.completion_tokens,
    text,
  };
};

const baseRecord = (context: RequestContext) => ({
  requestId: context.requestId,
  provider: context.provider,
  model: context.model,
  ...(context.conversationId ? { conversationId: context.conversationId } : {}),
});

export const createUsageMiddleware = (options: UsageMiddlewareOptions): Middleware =>
  createMiddleware({
    name: options.name ?? "usage",
    shouldHandle: options.shouldHandle ?? (() => true),

    afterResponse: async (context) => {
      const usage = responseUsage(context.response);
      const inputTokens = usage.input ?? estimateRequestTokens(context.requestContext.request);
      const outputTokens = usage.output ?? estimateTokens(usage.text);

      await options.onUsage({
        ...baseRecord(context.requestContext),
        inputTokens,
        outputTokens,
        estimated: usage.input === undefined || usage.output === undefined,
        streamed: false,
        chunks: 0,
      });
      return context;
    },

    onStreamChunk: (context) => {
      const previous = context.accumulatedMetadata;
      const usage = deltaUsage(context.delta);

      const updates: Record<string, unknown> = {
        [USAGE_KEYS.chunks]: (readNumber(previous, USAGE_KEYS.chunks) ?? 0) + 1,
        [USAGE_KEYS.outputChars]:
          (readNumber(previous, USAGE_KEYS.outputChars) ?? 0) + usage.text.length,
      };
      if (usage.input !== undefined) updates[USAGE_KEYS.inputTokens] = usage.input;
      if (usage.output !== undefined) updates[USAGE_KEYS.outputTokens] = usage.output;

      return withChunkUpdates(context, {
        accumulatedMetadata: { ...previous, ...updates },
      });
    },

    onStreamComplete: async (context, accumulated) => {
      const reportedInput = readNumber(accumulated, USAGE_KEYS.inputTokens);
      const reportedOutput = readNumber(accumulated, USAGE_KEYS.outputTokens);
      const outputChars = readNumber(accumulated, USAGE_KEYS.outputChars) ?? 0;

      await options.onUsage({
        ...baseRecord(context),
        inputTokens: reportedInput ?? estimateRequestTokens(context.request),
        outputTokens: reportedOutput ?? Math.ceil(outputChars / 4),
        estimated: reportedInput === undefined || reportedOutput === undefined,
        streamed: true,
        chunks: readNumber(accumulated, USAGE_KEYS.chunks) ?? 0,
      });
    },
  });
