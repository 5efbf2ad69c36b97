import { describe, it, expect } from "vitest";
import {
  createAnthropicToOpenAITranslator,
  createOpenAIToAnthropicTranslator,
} from "./streams.js";
import type { AnthropicStreamEvent } from "../types/anthropic.js";
import type { ChatCompletionChunk, ChatCompletionDelta, FinishReason } from "../types/openai.js";

const options = { model: "client-model", messageId: "msg_fixed", created: 1700000000 };

const chunk = (
  delta: ChatCompletionDelta,
  finishReason: FinishReason | null = null
): ChatCompletionChunk => ({
  id: "chatcmpl-up",
  object: "chat.completion.chunk",
  created: 1,
  model: "upstream-model",
  choices: [{ index: 0, delta, finish_reason: finishReason }],
});

const types = (events: AnthropicStreamEvent[]): string[] => events.map((e) => e.type);

describe("createOpenAIToAnthropicTranslator", () => {
  it("emits a complete text message", () => {
    const translator = createOpenAIToAnthropicTranslator(options);

    const events = [
      ...translator.push(chunk({ role: "assistant", content: "" })),
      ...translator.push(chunk({ content: "Hel" })),
      ...translator.push(chunk({ content: "lo" }, "stop")),
      ...translator.push({
        ...chunk({}),
        choices: [],
        usage: { prompt_tokens: 5, completion_tokens: 2, total_tokens: 7 },
      }),
      ...translator.finish(),
    ];

    expect(types(events)).toEqual([
      "message_start",
      "content_block_start",
      "content_block_delta",
      "content_block_delta",
      "content_block_stop",
      "message_delta",
      "message_stop",
    ]);
    expect(events[0]).toMatchObject({
      type: "message_start",
      message: { id: "chatcmpl-up", model: "client-model", role: "assistant" },
    });
    expect(events[2]).toEqual({
      type: "content_block_delta",
      index: 0,
      delta: { type: "text_delta", text: "Hel" },
    });
    expect(events[5]).toEqual({
      type: "message_delta",
      delta: { stop_reason: "end_turn", stop_sequence: null },
      usage: { output_tokens: 2, input_tokens: 5 },
    });
  });

  it("opens one tool_use block per tool call index", () => {
    const translator = createOpenAIToAnthropicTranslator(options);

    const events = [
      ...translator.push(chunk({ content: "Let me check." })),
      ...translator.push(
        chunk({
          tool_calls: [
            { index: 0, id: "call_a", type: "function", function: { name: "a", arguments: "" } },
          ],
        })
      ),
      ...translator.push(chunk({ tool_calls: [{ index: 0, function: { arguments: '{"x":' } }] })),
      ...translator.push(chunk({ tool_calls: [{ index: 0, function: { arguments: "1}" } }] })),
      ...translator.push(
        chunk({
          tool_calls: [
            { index: 1, id: "call_b", type: "function", function: { name: "b", arguments: "{}" } },
          ],
        })
      ),
      ...translator.push(chunk({}, "tool_calls")),
      ...translator.finish(),
    ];

    expect(events.filter((e) => e.type === "content_block_start")).toEqual([
      { type: "content_block_start", index: 0, content_block: { type: "text", text: "" } },
      {
        type: "content_block_start",
        index: 1,
        content_block: { type: "tool_use", id: "call_a", name: "a", input: {} },
      },
      {
        type: "content_block_start",
        index: 2,
        content_block: { type: "tool_use", id: "call_b", name: "b", input: {} },
      },
    ]);
    expect(
      events.filter((e) => e.type === "content_block_delta" && e.delta.type === "input_json_delta")
    ).toEqual([
      { type: "content_block_delta", index: 1, delta: { type: "input_json_delta", partial_json: '{"x":' } },
      { type: "content_block_delta", index: 1, delta: { type: "input_json_delta", partial_json: "1}" } },
      { type: "content_block_delta", index: 2, delta: { type: "input_json_delta", partial_json: "{}" } },
    ]);
    expect(events.filter((e) => e.type === "content_block_stop")).toEqual([
      { type: "content_block_stop", index: 0 },
      { type: "content_block_stop", index: 1 },
      { type: "content_block_stop", index: 2 },
    ]);
    expect(events.at(-2)).toMatchObject({ delta: { stop_reason: "tool_use" } });
  });

  it("closes a stream that ended without a finish reason with end_turn", () => {
    const translator = createOpenAIToAnthropicTranslator(options);
    translator.push(chunk({ content: "partial" }));

    const closing = translator.finish();

    expect(types(closing)).toEqual(["content_block_stop", "message_delta", "message_stop"]);
    expect(closing[1]).toMatchObject({ delta: { stop_reason: "end_turn" } });
    expect(translator.finish()).toEqual([]);
  });

  it("produces a well-formed message for an empty stream", () => {
    const translator = createOpenAIToAnthropicTranslator(options);

    const events = translator.finish();

    expect(types(events)).toEqual(["message_start", "message_delta", "message_stop"]);
    expect(events[0]).toMatchObject({ message: { id: "msg_fixed" } });
  });
});

describe("createAnthropicToOpenAITranslator", () => {
  const events: AnthropicStreamEvent[] = [
    {
      type: "message_start",
      message: {
        id: "msg_up",
        type: "message",
        role: "assistant",
        model: "claude-up",
        content: [],
        stop_reason: null,
        stop_sequence: null,
        usage: { input_tokens: 11, output_tokens: 1 },
      },
    },
    { type: "ping" },
    { type: "content_block_start", index: 0, content_block: { type: "text", text: "" } },
    { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "Hi" } },
    { type: "content_block_stop", index: 0 },
    {
      type: "content_block_start",
      index: 1,
      content_block: { type: "tool_use", id: "toolu_1", name: "lookup", input: {} },
    },
    { type: "content_block_delta", index: 1, delta: { type: "input_json_delta", partial_json: '{"q":1}' } },
    { type: "content_block_stop", index: 1 },
    {
      type: "message_delta",
      delta: { stop_reason: "tool_use", stop_sequence: null },
      usage: { output_tokens: 9 },
    },
    { type: "message_stop" },
  ];

  it("translates a full message stream", () => {
    const translator = createAnthropicToOpenAITranslator(options);

    const chunks = [...events.flatMap((event) => translator.push(event)), ...translator.finish()];

    expect(chunks.map((c) => c.choices[0]?.delta)).toEqual([
      { role: "assistant", content: "" },
      { content: "Hi" },
      {
        tool_calls: [
          { index: 0, id: "toolu_1", type: "function", function: { name: "lookup", arguments: "" } },
        ],
      },
      { tool_calls: [{ index: 0, function: { arguments: '{"q":1}' } }] },
      {},
    ]);
    expect(chunks.every((c) => c.id === "msg_up" && c.model === "client-model")).toBe(true);
    expect(chunks.at(-1)).toMatchObject({
      choices: [{ finish_reason: "tool_calls" }],
      usage: { prompt_tokens: 11, completion_tokens: 9, total_tokens: 20 },
    });
  });

  it("sends a finish chunk when the upstream never reported a stop reason", () => {
    const translator = createAnthropicToOpenAITranslator(options);
    translator.push({ type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "x" } });

    const closing = translator.finish();

    expect(closing).toEqual([
      {
        id: "msg_fixed",
        object: "chat.completion.chunk",
        created: 1700000000,
        model: "client-model",
        choices: [{ index: 0, delta: {}, finish_reason: "stop" }],
      },
    ]);
  });
});
