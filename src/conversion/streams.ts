/**
 * Stream translation
 *
 * Each translator takes upstream events one at a time and returns the
 * events to send the client in their place (zero or more). `finish()`
 * closes the client stream once the upstream stream has ended.
 */

import type {
  AnthropicStreamEvent,
  ContentBlockStartEvent,
  StopReason,
} from "../types/anthropic.js";
import type { ChatCompletionChunk, ChatCompletionDelta, FinishReason } from "../types/openai.js";
import { toFinishReason, toStopReason } from "./responses.js";

export interface EventTranslator<In, Out> {
  push: (event: In) => Out[];
  finish: () => Out[];
}

export interface TranslatorOptions {
  /** Model name reported to the client */
  model: string;
  /** Id used when the upstream supplies none */
  messageId: string;
  /** Unix seconds for OpenAI `created` fields */
  created: number;
}

// ============================================================================
// OpenAI chunks -> Anthropic events
// ============================================================================

type OpenBlock = { kind: "text"; index: number } | { kind: "tool"; index: number; toolIndex: number };

/**
 * Builds the Messages event sequence from Chat Completions chunks:
 * `message_start`, one content block per run of text or per tool call,
 * `content_block_stop` for every opened block, then `message_delta` and
 * `message_stop`. A stream without a finish reason ends with `end_turn`.
 */
export const createOpenAIToAnthropicTranslator = (
  options: TranslatorOptions
): EventTranslator<ChatCompletionChunk, AnthropicStreamEvent> => {
  let started = false;
  let finished = false;
  let nextBlockIndex = 0;
  let current: OpenBlock | undefined;
  let stopReason: StopReason | undefined;
  let inputTokens: number | undefined;
  let outputTokens: number | undefined;

  const start = (id: string): AnthropicStreamEvent[] => {
    if (started) return [];
    started = true;
    return [
      {
        type: "message_start",
        message: {
          id,
          type: "message",
          role: "assistant",
          model: options.model,
          content: [],
          stop_reason: null,
          stop_sequence: null,
          usage: { input_tokens: 0, output_tokens: 0 },
        },
      },
    ];
  };

  const closeCurrent = (): AnthropicStreamEvent[] => {
    if (!current) return [];
    const index = current.index;
    current = undefined;
    return [{ type: "content_block_stop", index }];
  };

  const open = (
    block: OpenBlock,
    contentBlock: ContentBlockStartEvent["content_block"]
  ): AnthropicStreamEvent[] => {
    const events = closeCurrent();
    current = block;
    events.push({ type: "content_block_start", index: block.index, content_block: contentBlock });
    return events;
  };

  const push = (chunk: ChatCompletionChunk): AnthropicStreamEvent[] => {
    if (finished) return [];
    const events = start(chunk.id || options.messageId);

    if (chunk.usage) {
      inputTokens = chunk.usage.prompt_tokens;
      outputTokens = chunk.usage.completion_tokens;
    }

    const choice = chunk.choices.find((c) => c.index === 0);
    if (!choice) return events;
    const { delta } = choice;

    if (delta.content) {
      if (current?.kind !== "text") {
        events.push(...open({ kind: "text", index: nextBlockIndex++ }, { type: "text", text: "" }));
      }
      if (current) {
        events.push({
          type: "content_block_delta",
          index: current.index,
          delta: { type: "text_delta", text: delta.content },
        });
      }
    }

    for (const call of delta.tool_calls ?? []) {
      if (current?.kind !== "tool" || current.toolIndex !== call.index) {
        events.push(
          ...open(
            { kind: "tool", index: nextBlockIndex++, toolIndex: call.index },
            {
              type: "tool_use",
              id: call.id ?? `toolu_${options.messageId}_${call.index}`,
              name: call.function?.name ?? "",
              input: {},
            }
          )
        );
      }
      const args = call.function?.arguments;
      if (args && current) {
        events.push({
          type: "content_block_delta",
          index: current.index,
          delta: { type: "input_json_delta", partial_json: args },
        });
      }
    }

    if (choice.finish_reason) {
      stopReason = toStopReason(choice.finish_reason);
    }
    return events;
  };

  const finish = (): AnthropicStreamEvent[] => {
    if (finished) return [];
    finished = true;
    const events = start(options.messageId);
    events.push(...closeCurrent());
    events.push({
      type: "message_delta",
      delta: { stop_reason: stopReason ?? "end_turn", stop_sequence: null },
      usage: {
        output_tokens: outputTokens ?? 0,
        ...(inputTokens !== undefined ? { input_tokens: inputTokens } : {}),
      },
    });
    events.push({ type: "message_stop" });
    return events;
  };

  return { push, finish };
};

// ============================================================================
// Anthropic events -> OpenAI chunks
// ============================================================================

/**
 * Builds Chat Completions chunks from Messages events: a role chunk on
 * `message_start`, content and tool call deltas, and a finish chunk carrying
 * usage on `message_delta`. Pings are dropped.
 */
export const createAnthropicToOpenAITranslator = (
  options: TranslatorOptions
): EventTranslator<AnthropicStreamEvent, ChatCompletionChunk> => {
  let id = options.messageId;
  let inputTokens = 0;
  let finishSent = false;
  let nextToolIndex = 0;
  const toolIndexByBlock = new Map<number, number>();

  const chunk = (
    delta: ChatCompletionDelta,
    finishReason: FinishReason | null = null
  ): ChatCompletionChunk => ({
    id,
    object: "chat.completion.chunk",
    created: options.created,
    model: options.model,
    choices: [{ index: 0, delta, finish_reason: finishReason }],
  });

  const push = (event: AnthropicStreamEvent): ChatCompletionChunk[] => {
    switch (event.type) {
      case "message_start":
        id = event.message.id || id;
        inputTokens = event.message.usage.input_tokens;
        return [chunk({ role: "assistant", content: "" })];

      case "content_block_start": {
        const block = event.content_block;
        if (block.type === "text") {
          return block.text ? [chunk({ content: block.text })] : [];
        }
        const toolIndex = nextToolIndex++;
        toolIndexByBlock.set(event.index, toolIndex);
        return [
          chunk({
            tool_calls: [
              {
                index: toolIndex,
                id: block.id,
                type: "function",
                function: { name: block.name, arguments: "" },
              },
            ],
          }),
        ];
      }

      case "content_block_delta": {
        if (event.delta.type === "text_delta") {
          return [chunk({ content: event.delta.text })];
        }
        const toolIndex = toolIndexByBlock.get(event.index);
        if (toolIndex === undefined) return [];
        return [
          chunk({
            tool_calls: [{ index: toolIndex, function: { arguments: event.delta.partial_json } }],
          }),
        ];
      }

      case "message_delta": {
        finishSent = true;
        const input = event.usage.input_tokens ?? inputTokens;
        const output = event.usage.output_tokens;
        return [
          {
            ...chunk({}, toFinishReason(event.delta.stop_reason)),
            usage: {
              prompt_tokens: input,
              completion_tokens: output,
              total_tokens: input + output,
            },
          },
        ];
      }

      default:
        return [];
    }
  };

  const finish = (): ChatCompletionChunk[] => {
    if (finishSent) return [];
    finishSent = true;
    return [chunk({}, "stop")];
  };

  return { push, finish };
};
