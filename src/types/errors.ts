import type { WireFormat } from "./wire.js";

/**
 * Stable error categories surfaced to clients.
 *
 * Clients use the category to tell "try another key or provider" apart from
 * "fix the request".
 */
export type ErrorCategory =
  | "resolution"
  | "not_found"
  | "unauthorized"
  | "rate_limited"
  | "configuration"
  | "invalid_request"
  | "upstream";

/**
 * Base error class for switchyard errors
 */
export class SwitchyardError extends Error {
  /** Stable category for client-facing error mapping */
  readonly category: ErrorCategory;
  /** HTTP status code the error maps to */
  readonly statusCode: number;

  constructor(message: string, category: ErrorCategory, statusCode: number) {
    super(message);
    this.name = "SwitchyardError";
    this.category = category;
    this.statusCode = statusCode;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Error thrown when a chained alias revisits an alias or exceeds the hop bound
 */
export class CircularAliasError extends SwitchyardError {
  /** Aliases visited, as `provider:alias`, in resolution order */
  readonly chain: readonly string[];
  /** Maximum number of hops allowed */
  readonly hopLimit: number;

  constructor(chain: readonly string[], hopLimit: number) {
    super(
      `Alias chain did not terminate within ${hopLimit} hops: ${chain.join(" -> ")}`,
      "resolution",
      400
    );
    this.name = "CircularAliasError";
    this.chain = chain;
    this.hopLimit = hopLimit;
  }
}

/**
 * Error thrown when a request targets a provider that is not configured
 */
export class ProviderNotConfiguredError extends SwitchyardError {
  readonly provider: string;
  readonly availableProviders: readonly string[];

  constructor(provider: string, availableProviders: readonly string[]) {
    const available = availableProviders.length
      ? ` Available: ${availableProviders.join(", ")}`
      : "";
    super(`Provider "${provider}" is not configured.${available}`, "not_found", 404);
    this.name = "ProviderNotConfiguredError";
    this.provider = provider;
    this.availableProviders = availableProviders;
  }
}

/**
 * Error thrown when a passthrough provider receives no client API key
 */
export class MissingClientKeyError extends SwitchyardError {
  readonly provider: string;

  constructor(provider: string) {
    super(
      `Provider "${provider}" forwards client credentials but the request carried no API key`,
      "unauthorized",
      401
    );
    this.name = "MissingClientKeyError";
    this.provider = provider;
  }
}

/**
 * Error thrown when every configured API key of a provider has been excluded
 */
export class AllKeysExhaustedError extends SwitchyardError {
  readonly provider: string;
  /** Number of keys that were tried within the request */
  readonly attempted: number;

  constructor(provider: string, attempted: number) {
    super(
      `All provider API keys exhausted for "${provider}" (${attempted} tried)`,
      "rate_limited",
      429
    );
    this.name = "AllKeysExhaustedError";
    this.provider = provider;
    this.attempted = attempted;
  }
}

/**
 * Error thrown when configuration is invalid. Raised at startup or reload only.
 */
export class ConfigurationValidationError extends SwitchyardError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, "configuration", 500);
    this.name = "ConfigurationValidationError";
  }
}

/**
 * Error thrown when a body cannot be converted between wire formats
 */
export class ProtocolConversionError extends SwitchyardError {
  readonly from: WireFormat;
  readonly to: WireFormat;

  constructor(from: WireFormat, to: WireFormat, message: string) {
    super(`Cannot convert ${from} request to ${to}: ${message}`, "invalid_request", 400);
    this.name = "ProtocolConversionError";
    this.from = from;
    this.to = to;
  }
}

/**
 * Error thrown when an upstream provider answers with an error status
 */
export class UpstreamHttpError extends SwitchyardError {
  /** Provider that returned the error */
  readonly provider: string;
  /** Upstream HTTP status (0 when the request never got a response) */
  readonly status: number;
  /** Raw error body from the provider */
  readonly body?: string;

  constructor(provider: string, status: number, message: string, body?: string) {
    super(
      `Provider ${provider} error (${status}): ${message}`,
      "upstream",
      status >= 400 ? status : 502
    );
    this.name = "UpstreamHttpError";
    this.provider = provider;
    this.status = status;
    this.body = body;
  }
}

/**
 * Error thrown when the middleware chain is used out of lifecycle order
 */
export class MiddlewareStateError extends SwitchyardError {
  constructor(message: string) {
    super(message, "configuration", 500);
    this.name = "MiddlewareStateError";
  }
}

// ============================================================================
// Client-facing error bodies
// ============================================================================

export interface AnthropicErrorBody {
  type: "error";
  error: { type: string; message: string };
}

export interface OpenAIErrorBody {
  error: { message: string; type: string; code: string | null };
}

export type ErrorResponse =
  | { status: number; format: "anthropic"; body: AnthropicErrorBody }
  | { status: number; format: "openai"; body: OpenAIErrorBody };

const errorTypeForStatus = (status: number): string => {
  switch (status) {
    case 400:
      return "invalid_request_error";
    case 401:
      return "authentication_error";
    case 403:
      return "permission_error";
    case 404:
      return "not_found_error";
    case 429:
      return "rate_limit_error";
    case 529:
      return "overloaded_error";
    default:
      return "api_error";
  }
};

/**
 * Render any error as a client-facing body in the client's wire format
 */
export const toErrorResponse = (error: unknown, format: WireFormat): ErrorResponse => {
  const isKnown = error instanceof SwitchyardError;
  const status = isKnown ? error.statusCode : 500;
  const message = error instanceof Error ? error.message : String(error);
  const type = errorTypeForStatus(status);

  if (format === "anthropic") {
    return { status, format, body: { type: "error", error: { type, message } } };
  }
  return {
    status,
    format,
    body: { error: { message, type, code: isKnown ? error.category : null } },
  };
};
