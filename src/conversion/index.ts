/**
 * Conversion Module
 */

export { createProtocolConverter } from "./converter.js";
export type {
  ProtocolConverter,
  ProtocolConverterOptions,
  StreamTranslator,
} from "./converter.js";
export {
  anthropicToOpenAIRequest,
  openAIToAnthropicRequest,
  parseToolArguments,
} from "./requests.js";
export {
  anthropicToOpenAIResponse,
  openAIToAnthropicResponse,
  toFinishReason,
  toStopReason,
} from "./responses.js";
export {
  createAnthropicToOpenAITranslator,
  createOpenAIToAnthropicTranslator,
  type EventTranslator,
  type TranslatorOptions,
} from "./streams.js";
