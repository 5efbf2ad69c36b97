/**
 * Request conversion between the Messages and Chat Completions schemas
 */

import { ok, err, type Result } from "neverthrow";
import type {
  AnthropicMessage,
  AnthropicTool,
  AnthropicToolChoice,
  ContentBlock,
  ImageBlock,
  MessagesRequest,
  TextBlock,
  ToolResultBlock,
  ToolUseBlock,
} from "../types/anthropic.js";
import type {
  ChatCompletionMessage,
  ChatCompletionRequest,
  ContentPart,
  Tool,
  ToolCall,
  ToolChoice,
} from "../types/openai.js";
import { ProtocolConversionError } from "../types/errors.js";
import { isRecord } from "../utils/guards.js";

const DATA_URL_PATTERN = /^data:([^;,]+);base64,(.*)$/s;

const EMPTY_SCHEMA: Record<string, unknown> = { type: "object", properties: {} };

// ============================================================================
// Anthropic -> OpenAI
// ============================================================================

const joinTextBlocks = (blocks: readonly TextBlock[]): string =>
  blocks.map((block) => block.text).join("\n");

const imageToPart = (block: ImageBlock): ContentPart => ({
  type: "image_url",
  image_url: {
    url:
      block.source.type === "base64"
        ? `data:${block.source.media_type};base64,${block.source.data}`
        : block.source.url,
  },
});

const toolResultText = (block: ToolResultBlock): string =>
  typeof block.content === "string" ? block.content : joinTextBlocks(block.content ?? []);

const toolUseToCall = (block: ToolUseBlock): ToolCall => ({
  id: block.id,
  type: "function",
  function: { name: block.name, arguments: JSON.stringify(block.input) },
});

/**
 * Text and images of a message; plain string content when there are no images
 */
const userContent = (blocks: readonly ContentBlock[]): string | ContentPart[] | null => {
  const parts: ContentPart[] = [];
  for (const block of blocks) {
    if (block.type === "text") parts.push({ type: "text", text: block.text });
    else if (block.type === "image") parts.push(imageToPart(block));
  }
  if (parts.length === 0) return null;
  if (parts.every((part) => part.type === "text")) {
    return parts.map((part) => (part.type === "text" ? part.text : "")).join("\n");
  }
  return parts;
};

const convertAnthropicMessage = (message: AnthropicMessage): ChatCompletionMessage[] => {
  if (typeof message.content === "string") {
    return [{ role: message.role, content: message.content }];
  }
  const blocks = message.content;

  if (message.role === "assistant") {
    const text = joinTextBlocks(blocks.filter((b): b is TextBlock => b.type === "text"));
    const toolCalls = blocks
      .filter((b): b is ToolUseBlock => b.type === "tool_use")
      .map(toolUseToCall);
    const converted: ChatCompletionMessage = {
      role: "assistant",
      content: text === "" && toolCalls.length > 0 ? null : text,
    };
    if (toolCalls.length > 0) converted.tool_calls = toolCalls;
    return [converted];
  }

  // Tool results answer the preceding assistant turn, so they come first
  const results: ChatCompletionMessage[] = blocks
    .filter((b): b is ToolResultBlock => b.type === "tool_result")
    .map(
      (block): ChatCompletionMessage => ({
        role: "tool",
        tool_call_id: block.tool_use_id,
        content: toolResultText(block),
      })
    );
  const content = userContent(blocks);

  return content === null ? results : [...results, { role: "user", content }];
};

const toOpenAITool = (tool: AnthropicTool): Tool => ({
  type: "function",
  function: {
    name: tool.name,
    ...(tool.description !== undefined ? { description: tool.description } : {}),
    parameters: tool.input_schema,
  },
});

const toOpenAIToolChoice = (choice: AnthropicToolChoice): ToolChoice => {
  switch (choice.type) {
    case "auto":
      return "auto";
    case "any":
      return "required";
    case "none":
      return "none";
    case "tool":
      return { type: "function", function: { name: choice.name } };
  }
};

/**
 * Convert a Messages request to a Chat Completions request
 *
 * Streaming requests ask for usage in the final chunk.
 */
export const anthropicToOpenAIRequest = (body: MessagesRequest): ChatCompletionRequest => {
  const messages: ChatCompletionMessage[] = [];
  if (body.system !== undefined) {
    const system = typeof body.system === "string" ? body.system : joinTextBlocks(body.system);
    if (system !== "") messages.push({ role: "system", content: system });
  }
  for (const message of body.messages) {
    messages.push(...convertAnthropicMessage(message));
  }

  const request: ChatCompletionRequest = {
    model: body.model,
    messages,
    max_tokens: body.max_tokens,
  };
  if (body.temperature !== undefined) request.temperature = body.temperature;
  if (body.top_p !== undefined) request.top_p = body.top_p;
  if (body.stop_sequences?.length) request.stop = body.stop_sequences;
  if (body.tools?.length) request.tools = body.tools.map(toOpenAITool);
  if (body.tool_choice) request.tool_choice = toOpenAIToolChoice(body.tool_choice);
  if (body.metadata?.user_id) request.user = body.metadata.user_id;
  if (body.stream) {
    request.stream = true;
    request.stream_options = { include_usage: true };
  }
  return request;
};

// ============================================================================
// OpenAI -> Anthropic
// ============================================================================

const textOf = (content: string | ContentPart[] | null): string => {
  if (content === null) return "";
  if (typeof content === "string") return content;
  return content
    .map((part) => (part.type === "text" ? part.text : ""))
    .join("");
};

const partToBlock = (part: ContentPart): TextBlock | ImageBlock => {
  if (part.type === "text") return { type: "text", text: part.text };
  const match = DATA_URL_PATTERN.exec(part.image_url.url);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return { type: "image", source: { type: "base64", media_type: match[1], data: match[2] } };
  }
  return { type: "image", source: { type: "url", url: part.image_url.url } };
};

const contentBlocks = (content: string | ContentPart[] | null): ContentBlock[] => {
  if (content === null || content === "") return [];
  if (typeof content === "string") return [{ type: "text", text: content }];
  return content.map(partToBlock);
};

/**
 * Parse tool call arguments; an empty string stands for no arguments
 */
export const parseToolArguments = (args: string): Record<string, unknown> | undefined => {
  if (args.trim() === "") return {};
  try {
    const parsed: unknown = JSON.parse(args);
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
};

const toAnthropicTool = (tool: Tool): AnthropicTool => ({
  name: tool.function.name,
  description: tool.function.description ?? "",
  input_schema: tool.function.parameters ?? EMPTY_SCHEMA,
});

const toAnthropicToolChoice = (choice: ToolChoice): AnthropicToolChoice => {
  if (typeof choice !== "string") return { type: "tool", name: choice.function.name };
  switch (choice) {
    case "auto":
      return { type: "auto" };
    case "required":
      return { type: "any" };
    case "none":
      return { type: "none" };
  }
};

/**
 * Convert a Chat Completions request to a Messages request
 *
 * Fails when the request sets neither `max_tokens` nor
 * `max_completion_tokens`, or when a tool call carries arguments that are
 * not a JSON object.
 */
export const openAIToAnthropicRequest = (
  body: ChatCompletionRequest
): Result<MessagesRequest, ProtocolConversionError> => {
  const conversionError = (message: string) =>
    err(new ProtocolConversionError("openai", "anthropic", message));

  const maxTokens = body.max_tokens ?? body.max_completion_tokens;
  if (maxTokens === undefined) {
    return conversionError("max_tokens is required");
  }

  const systemParts: string[] = [];
  const messages: AnthropicMessage[] = [];
  let pendingResults: ToolResultBlock[] = [];

  const flushResults = (): void => {
    if (pendingResults.length === 0) return;
    messages.push({ role: "user", content: pendingResults });
    pendingResults = [];
  };

  for (const message of body.messages) {
    if (message.role === "tool") {
      pendingResults.push({
        type: "tool_result",
        tool_use_id: message.tool_call_id ?? "",
        content: textOf(message.content),
      });
      continue;
    }
    flushResults();

    if (message.role === "system") {
      const text = textOf(message.content);
      if (text !== "") systemParts.push(text);
      continue;
    }

    const blocks = contentBlocks(message.content);
    if (message.role === "assistant") {
      for (const call of message.tool_calls ?? []) {
        const input = parseToolArguments(call.function.arguments);
        if (input === undefined) {
          return conversionError(`arguments of tool call "${call.id}" are not a JSON object`);
        }
        blocks.push({ type: "tool_use", id: call.id, name: call.function.name, input });
      }
    }
    if (blocks.length > 0) {
      messages.push({ role: message.role, content: blocks });
    }
  }
  flushResults();

  const request: MessagesRequest = {
    model: body.model,
    messages,
    max_tokens: maxTokens,
  };
  if (systemParts.length > 0) request.system = systemParts.join("\n\n");
  if (body.temperature !== undefined) request.temperature = body.temperature;
  if (body.top_p !== undefined) request.top_p = body.top_p;
  if (body.stop !== undefined) {
    request.stop_sequences = typeof body.stop === "string" ? [body.stop] : body.stop;
  }
  if (body.tools?.length) request.tools = body.tools.map(toAnthropicTool);
  if (body.tool_choice !== undefined) request.tool_choice = toAnthropicToolChoice(body.tool_choice);
  if (body.user) request.metadata = { user_id: body.user };
  if (body.stream) request.stream = true;
  return ok(request);
};
