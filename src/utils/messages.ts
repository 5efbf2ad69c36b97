/**
 * Message utilities for extracting text from request bodies of either wire
 * format. Used for token estimation, where plain text is all that matters.
 */

import type { ContentBlock } from "../types/anthropic.js";
import type { ContentPart } from "../types/openai.js";
import type { ChatRequest } from "../types/wire.js";

/**
 * Normalized message with string content
 */
export type NormalizedMessage = {
  content: string;
};

const blockText = (block: ContentBlock): string => {
  switch (block.type) {
    case "text":
      return block.text;
    case "tool_use":
      return JSON.stringify(block.input);
    case "tool_result":
      return typeof block.content === "string"
        ? block.content
        : (block.content ?? []).map((b) => b.text).join("");
    default:
      return "";
  }
};

const anthropicContentText = (content: string | ContentBlock[]): string =>
  typeof content === "string" ? content : content.map(blockText).join("");

const openAIContentText = (content: string | ContentPart[] | null): string => {
  if (content === null) return "";
  if (typeof content === "string") return content;
  return content.map((part) => (part.type === "text" ? part.text : "")).join("");
};

/**
 * Extract one text entry per message, system prompt first.
 * Images contribute no text; tool calls contribute their JSON arguments.
 */
export const extractMessageContent = (request: ChatRequest): NormalizedMessage[] => {
  if (request.format === "anthropic") {
    const { system, messages } = request.body;
    const systemEntry = system === undefined ? [] : [{ content: anthropicContentText(system) }];
    return [
      ...systemEntry,
      ...messages.map((m) => ({ content: anthropicContentText(m.content) })),
    ];
  }

  return request.body.messages.map((m) => ({
    content:
      openAIContentText(m.content) +
      (m.tool_calls ?? []).map((call) => call.function.arguments).join(""),
  }));
};
