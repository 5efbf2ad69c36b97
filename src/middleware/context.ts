/**
 * Middleware Contexts
 *
 * Immutable values threaded through middleware hooks. A hook returns a new
 * context built with one of the `with*Updates` helpers; inputs are frozen.
 * Request bodies are copied and frozen throughout, so a hook that wants a
 * different body builds a new one.
 */

import { randomUUID } from "node:crypto";
import type { ChatRequest, ChatResponse, StreamDelta } from "../types/wire.js";

export type Metadata = Readonly<Record<string, unknown>>;

export interface RequestContext {
  /** Client-native request body, tagged with its wire format */
  readonly request: ChatRequest;
  readonly provider: string;
  /** Resolved model name */
  readonly model: string;
  readonly requestId: string;
  readonly conversationId?: string;
  readonly metadata: Metadata;
  /** Key supplied by the client, forwarded to passthrough providers */
  readonly clientApiKey?: string;
}

export interface ResponseContext {
  /** Client-native response body */
  readonly response: ChatResponse;
  readonly requestContext: RequestContext;
  readonly isStreaming: boolean;
  readonly metadata: Metadata;
}

export interface StreamChunkContext {
  /** Client-native stream event */
  readonly delta: StreamDelta;
  readonly requestContext: RequestContext;
  /** Metadata gathered over the stream so far */
  readonly accumulatedMetadata: Metadata;
  /** True on the final delta of the stream */
  readonly isComplete: boolean;
}

export interface RequestContextInit {
  request: ChatRequest;
  provider: string;
  model: string;
  requestId?: string;
  conversationId?: string;
  metadata?: Record<string, unknown>;
  clientApiKey?: string;
}

const freezeMetadata = (metadata: Record<string, unknown> | undefined): Metadata =>
  Object.freeze({ ...metadata });

const deepFreeze = <T>(value: T): T => {
  if (typeof value === "object" && value !== null) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    children.forEach(deepFreeze);
  }
  return value;
};

const freezeRequest = (request: ChatRequest): ChatRequest => deepFreeze(structuredClone(request));

export const createRequestContext = (init: RequestContextInit): RequestContext =>
  Object.freeze({
    ...init,
    request: freezeRequest(init.request),
    requestId: init.requestId ?? randomUUID(),
    metadata: freezeMetadata(init.metadata),
  });

export const withRequestUpdates = (
  context: RequestContext,
  updates: Partial<RequestContext>
): RequestContext =>
  Object.freeze({
    ...context,
    ...updates,
    request: updates.request ? freezeRequest(updates.request) : context.request,
    metadata: freezeMetadata(updates.metadata ?? context.metadata),
  });

export const createResponseContext = (
  response: ChatResponse,
  requestContext: RequestContext,
  options: { isStreaming?: boolean; metadata?: Record<string, unknown> } = {}
): ResponseContext =>
  Object.freeze({
    response,
    requestContext,
    isStreaming: options.isStreaming ?? false,
    metadata: freezeMetadata(options.metadata),
  });

export const withResponseUpdates = (
  context: ResponseContext,
  updates: Partial<ResponseContext>
): ResponseContext =>
  Object.freeze({
    ...context,
    ...updates,
    metadata: freezeMetadata(updates.metadata ?? context.metadata),
  });

export const createStreamChunkContext = (
  delta: StreamDelta,
  requestContext: RequestContext,
  accumulatedMetadata: Record<string, unknown>,
  isComplete: boolean
): StreamChunkContext =>
  Object.freeze({
    delta,
    requestContext,
    accumulatedMetadata: freezeMetadata(accumulatedMetadata),
    isComplete,
  });

export const withChunkUpdates = (
  context: StreamChunkContext,
  updates: Partial<StreamChunkContext>
): StreamChunkContext =>
  Object.freeze({
    ...context,
    ...updates,
    accumulatedMetadata: freezeMetadata(
      updates.accumulatedMetadata ?? context.accumulatedMetadata
    ),
  });
