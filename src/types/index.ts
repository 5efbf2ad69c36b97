// OpenAI-compatible types
export type {
  ChatCompletionRole,
  TextContentPart,
  ImageContentPart,
  ContentPart,
  ChatCompletionMessage,
  ToolCall,
  Tool,
  ToolChoice,
  ResponseFormat,
  ChatCompletionRequest,
  FinishReason,
  ChatCompletionChoice,
  CompletionUsage,
  ChatCompletionResponse,
  ToolCallDelta,
  ChatCompletionDelta,
  ChatCompletionChunkChoice,
  ChatCompletionChunk,
} from "./openai.js";

// Anthropic Messages types
export type {
  AnthropicRole,
  TextBlock,
  ImageBlock,
  ToolUseBlock,
  ToolResultBlock,
  ContentBlock,
  AnthropicMessage,
  AnthropicTool,
  AnthropicToolChoice,
  MessagesRequest,
  StopReason,
  AnthropicUsage,
  MessagesResponse,
  MessageStartEvent,
  ContentBlockStartEvent,
  ContentBlockDelta,
  ContentBlockDeltaEvent,
  ContentBlockStopEvent,
  MessageDeltaEvent,
  MessageStopEvent,
  PingEvent,
  ErrorEvent,
  AnthropicStreamEvent,
} from "./anthropic.js";

// Wire format tagging
export {
  type WireFormat,
  type ChatRequest,
  type ChatResponse,
  type StreamDelta,
  WIRE_FORMATS,
  isWireFormat,
  withModel,
  withStreaming,
} from "./wire.js";

// Configuration types
export {
  type ProviderInput,
  type ProfileInput,
  type ProfileConfig,
  type CacheConfig,
  type GatewayConfig,
  type ProviderConfig,
  type ResolvedConfig,
  PASSTHROUGH_SENTINEL,
  DEFAULT_CONFIG,
  normalizeProviderName,
  resolveConfig,
} from "./config.js";

// Error types
export {
  type ErrorCategory,
  SwitchyardError,
  CircularAliasError,
  ProviderNotConfiguredError,
  MissingClientKeyError,
  AllKeysExhaustedError,
  ConfigurationValidationError,
  ProtocolConversionError,
  UpstreamHttpError,
  MiddlewareStateError,
  type AnthropicErrorBody,
  type OpenAIErrorBody,
  type ErrorResponse,
  toErrorResponse,
} from "./errors.js";
