/**
 * Protocol Converter
 *
 * Converts requests, responses and stream events between the Anthropic
 * Messages and OpenAI Chat Completions wire formats. When source and target
 * format are the same every operation passes its input through untouched.
 */

import { randomUUID } from "node:crypto";
import { ok, type Result } from "neverthrow";
import type { ProtocolConversionError } from "../types/errors.js";
import type { ChatRequest, ChatResponse, StreamDelta, WireFormat } from "../types/wire.js";
import { anthropicToOpenAIRequest, openAIToAnthropicRequest } from "./requests.js";
import { anthropicToOpenAIResponse, openAIToAnthropicResponse } from "./responses.js";
import {
  createAnthropicToOpenAITranslator,
  createOpenAIToAnthropicTranslator,
} from "./streams.js";

/**
 * Translates one upstream stream into client-format deltas
 */
export interface StreamTranslator {
  push: (delta: StreamDelta) => StreamDelta[];
  /** Deltas that close the client stream after the upstream ended */
  finish: () => StreamDelta[];
}

export interface ProtocolConverter {
  convertRequest: (
    request: ChatRequest,
    target: WireFormat
  ) => Result<ChatRequest, ProtocolConversionError>;
  convertResponse: (response: ChatResponse, target: WireFormat) => ChatResponse;
  createStreamTranslator: (
    source: WireFormat,
    target: WireFormat,
    model: string
  ) => StreamTranslator;
}

export interface ProtocolConverterOptions {
  /** Clock in milliseconds */
  now?: () => number;
  /** Ids for synthesized messages */
  generateId?: () => string;
}

const passthroughTranslator = (): StreamTranslator => ({
  push: (delta) => [delta],
  finish: () => [],
});

export const createProtocolConverter = (
  options: ProtocolConverterOptions = {}
): ProtocolConverter => {
  const now = options.now ?? Date.now;
  const generateId = options.generateId ?? (() => randomUUID().replace(/-/g, ""));
  const unixSeconds = (): number => Math.floor(now() / 1000);

  const convertRequest = (
    request: ChatRequest,
    target: WireFormat
  ): Result<ChatRequest, ProtocolConversionError> => {
    if (request.format === target) return ok(request);

    if (request.format === "anthropic") {
      return ok({ format: "openai", body: anthropicToOpenAIRequest(request.body) });
    }
    return openAIToAnthropicRequest(request.body).map(
      (body): ChatRequest => ({ format: "anthropic", body })
    );
  };

  const convertResponse = (response: ChatResponse, target: WireFormat): ChatResponse => {
    if (response.format === target) return response;

    return response.format === "anthropic"
      ? { format: "openai", body: anthropicToOpenAIResponse(response.body, unixSeconds()) }
      : { format: "anthropic", body: openAIToAnthropicResponse(response.body) };
  };

  const createStreamTranslator = (
    source: WireFormat,
    target: WireFormat,
    model: string
  ): StreamTranslator => {
    if (source === target) return passthroughTranslator();

    const translatorOptions = { model, created: unixSeconds() };

    if (source === "openai") {
      const translator = createOpenAIToAnthropicTranslator({
        ...translatorOptions,
        messageId: `msg_${generateId()}`,
      });
      return {
        push: (delta) =>
          delta.format === "openai"
            ? translator.push(delta.event).map((event): StreamDelta => ({ format: "anthropic", event }))
            : [delta],
        finish: () =>
          translator.finish().map((event): StreamDelta => ({ format: "anthropic", event })),
      };
    }

    const translator = createAnthropicToOpenAITranslator({
      ...translatorOptions,
      messageId: `chatcmpl-${generateId()}`,
    });
    return {
      push: (delta) =>
        delta.format === "anthropic"
          ? translator.push(delta.event).map((event): StreamDelta => ({ format: "openai", event }))
          : [delta],
      finish: () => translator.finish().map((event): StreamDelta => ({ format: "openai", event })),
    };
  };

  return { convertRequest, convertResponse, createStreamTranslator };
};
