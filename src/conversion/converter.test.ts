import { describe, it, expect } from "vitest";
import { createProtocolConverter } from "./converter.js";
import type { ChatRequest, ChatResponse, StreamDelta } from "../types/wire.js";

const converter = createProtocolConverter({
  now: () => 1_700_000_000_500,
  generateId: () => "abc",
});

const anthropicRequest: ChatRequest = {
  format: "anthropic",
  body: {
    model: "claude-test",
    max_tokens: 100,
    messages: [{ role: "user", content: "Hi" }],
  },
};

const anthropicResponse: ChatResponse = {
  format: "anthropic",
  body: {
    id: "msg_1",
    type: "message",
    role: "assistant",
    model: "claude-test",
    content: [
      { type: "text", text: "Sure." },
      { type: "tool_use", id: "toolu_1", name: "lookup", input: { q: "x" } },
    ],
    stop_reason: "tool_use",
    stop_sequence: null,
    usage: { input_tokens: 10, output_tokens: 4 },
  },
};

describe("createProtocolConverter", () => {
  // ─────────────────────────────────────────────────────────────────
  // Pass-through
  // ─────────────────────────────────────────────────────────────────

  describe("matching formats", () => {
    it("returns the request, response and stream events untouched", () => {
      const delta: StreamDelta = { format: "anthropic", event: { type: "ping" } };
      const translator = converter.createStreamTranslator("anthropic", "anthropic", "m");

      expect(converter.convertRequest(anthropicRequest, "anthropic")._unsafeUnwrap()).toBe(
        anthropicRequest
      );
      expect(converter.convertResponse(anthropicResponse, "anthropic")).toBe(anthropicResponse);
      expect(translator.push(delta)).toEqual([delta]);
      expect(translator.push(delta)[0]).toBe(delta);
      expect(translator.finish()).toEqual([]);
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Conversion
  // ─────────────────────────────────────────────────────────────────

  describe("convertRequest", () => {
    it("converts an Anthropic request for an OpenAI provider", () => {
      const converted = converter.convertRequest(anthropicRequest, "openai")._unsafeUnwrap();

      expect(converted).toEqual({
        format: "openai",
        body: {
          model: "claude-test",
          max_tokens: 100,
          messages: [{ role: "user", content: "Hi" }],
        },
      });
    });

    it("surfaces conversion failures as errors", () => {
      const result = converter.convertRequest(
        { format: "openai", body: { model: "gpt", messages: [] } },
        "anthropic"
      );

      expect(result.isErr()).toBe(true);
    });
  });

  describe("convertResponse", () => {
    it("converts an Anthropic response for an OpenAI client", () => {
      expect(converter.convertResponse(anthropicResponse, "openai")).toEqual({
        format: "openai",
        body: {
          id: "msg_1",
          object: "chat.completion",
          created: 1_700_000_000,
          model: "claude-test",
          choices: [
            {
              index: 0,
              message: {
                role: "assistant",
                content: "Sure.",
                tool_calls: [
                  {
                    id: "toolu_1",
                    type: "function",
                    function: { name: "lookup", arguments: '{"q":"x"}' },
                  },
                ],
              },
              finish_reason: "tool_calls",
            },
          ],
          usage: { prompt_tokens: 10, completion_tokens: 4, total_tokens: 14 },
        },
      });
    });

    it("converts an OpenAI response for an Anthropic client", () => {
      const converted = converter.convertResponse(
        {
          format: "openai",
          body: {
            id: "chatcmpl-1",
            object: "chat.completion",
            created: 1,
            model: "gpt-test",
            choices: [
              { index: 0, message: { role: "assistant", content: "Done" }, finish_reason: "length" },
            ],
            usage: { prompt_tokens: 3, completion_tokens: 5, total_tokens: 8 },
          },
        },
        "anthropic"
      );

      expect(converted).toEqual({
        format: "anthropic",
        body: {
          id: "chatcmpl-1",
          type: "message",
          role: "assistant",
          model: "gpt-test",
          content: [{ type: "text", text: "Done" }],
          stop_reason: "max_tokens",
          stop_sequence: null,
          usage: { input_tokens: 3, output_tokens: 5 },
        },
      });
    });
  });

  describe("createStreamTranslator", () => {
    it("tags translated events with the client format", () => {
      const translator = converter.createStreamTranslator("openai", "anthropic", "client-model");

      const closing = translator.finish();

      expect(closing.every((delta) => delta.format === "anthropic")).toBe(true);
      expect(closing[0]).toMatchObject({
        format: "anthropic",
        event: { type: "message_start", message: { id: "msg_abc", model: "client-model" } },
      });
    });

    it("uses a generated chat completion id for Anthropic upstreams", () => {
      const translator = converter.createStreamTranslator("anthropic", "openai", "client-model");

      expect(translator.finish()).toEqual([
        {
          format: "openai",
          event: {
            id: "chatcmpl-abc",
            object: "chat.completion.chunk",
            created: 1_700_000_000,
            model: "client-model",
            choices: [{ index: 0, delta: {}, finish_reason: "stop" }],
          },
        },
      ]);
    });
  });
});
