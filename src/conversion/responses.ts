/**
 * Response conversion and the stop/finish reason mapping shared with streams
 */

import type { MessagesResponse, StopReason, TextBlock, ToolUseBlock } from "../types/anthropic.js";
import type { ChatCompletionResponse, FinishReason, ToolCall } from "../types/openai.js";
import { parseToolArguments } from "./requests.js";

export const toFinishReason = (reason: StopReason | null): FinishReason => {
  switch (reason) {
    case "tool_use":
      return "tool_calls";
    case "max_tokens":
      return "length";
    default:
      return "stop";
  }
};

export const toStopReason = (reason: FinishReason | null): StopReason => {
  switch (reason) {
    case "tool_calls":
      return "tool_use";
    case "length":
      return "max_tokens";
    default:
      return "end_turn";
  }
};

/**
 * Convert a Messages response to a Chat Completions response
 */
export const anthropicToOpenAIResponse = (
  body: MessagesResponse,
  created: number
): ChatCompletionResponse => {
  const text = body.content
    .filter((block): block is TextBlock => block.type === "text")
    .map((block) => block.text)
    .join("");
  const toolCalls = body.content
    .filter((block): block is ToolUseBlock => block.type === "tool_use")
    .map(
      (block): ToolCall => ({
        id: block.id,
        type: "function",
        function: { name: block.name, arguments: JSON.stringify(block.input) },
      })
    );

  const { input_tokens, output_tokens } = body.usage;
  return {
    id: body.id,
    object: "chat.completion",
    created,
    model: body.model,
    choices: [
      {
        index: 0,
        message: {
          role: "assistant",
          content: text === "" ? null : text,
          ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
        },
        finish_reason: toFinishReason(body.stop_reason),
      },
    ],
    usage: {
      prompt_tokens: input_tokens,
      completion_tokens: output_tokens,
      total_tokens: input_tokens + output_tokens,
    },
  };
};

/**
 * Convert a Chat Completions response to a Messages response. Only the
 * first choice is kept.
 */
export const openAIToAnthropicResponse = (body: ChatCompletionResponse): MessagesResponse => {
  const choice = body.choices[0];
  const content: Array<TextBlock | ToolUseBlock> = [];

  const message = choice?.message;
  if (message) {
    const text =
      typeof message.content === "string"
        ? message.content
        : (message.content ?? [])
            .map((part) => (part.type === "text" ? part.text : ""))
            .join("");
    if (text !== "") content.push({ type: "text", text });

    for (const call of message.tool_calls ?? []) {
      content.push({
        type: "tool_use",
        id: call.id,
        name: call.function.name,
        input: parseToolArguments(call.function.arguments) ?? {},
      });
    }
  }

  return {
    id: body.id,
    type: "message",
    role: "assistant",
    model: body.model,
    content,
    stop_reason: toStopReason(choice?.finish_reason ?? null),
    stop_sequence: null,
    usage: {
      input_tokens: body.usage?.prompt_tokens ?? 0,
      output_tokens: body.usage?.completion_tokens ?? 0,
    },
  };
};
