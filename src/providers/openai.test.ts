import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ProviderConfig } from "../types/config.js";
import type { ChatCompletionChunk, ChatCompletionRequest } from "../types/openai.js";
import { UpstreamHttpError } from "../types/errors.js";
import { isRecord } from "../utils/guards.js";

const { mockCreate, constructorOptions } = vi.hoisted(() => {
  const constructorOptions: unknown[] = [];
  return { mockCreate: vi.fn(), constructorOptions };
});

// Mock OpenAI at module level
vi.mock("openai", () => {
  class MockOpenAI {
    chat = {
      completions: {
        create: mockCreate,
      },
    };

    constructor(options: unknown) {
      constructorOptions.push(options);
    }
  }

  return {
    default: MockOpenAI,
  };
});

// Import after mocking
import { createOpenAIUpstream, toSdkParams, toUpstreamError } from "./openai.js";

const provider = (overrides: Partial<ProviderConfig> = {}): ProviderConfig => ({
  name: "openai",
  baseUrl: "https://api.test.com/v1",
  format: "openai",
  apiKeys: ["k1"],
  passthrough: false,
  timeoutMs: 5000,
  maxRetries: 1,
  headers: { "x-team": "core" },
  ...overrides,
});

const request: ChatCompletionRequest = {
  model: "gpt-test",
  messages: [
    { role: "system", content: "Be brief" },
    { role: "user", content: "Hi" },
  ],
  max_tokens: 32,
};

const sdkCompletion = {
  id: "chatcmpl-1",
  object: "chat.completion",
  created: 1700000000,
  model: "gpt-test",
  choices: [
    {
      index: 0,
      message: { role: "assistant", content: "Hello!", refusal: null },
      finish_reason: "stop",
      logprobs: null,
    },
  ],
  usage: { prompt_tokens: 7, completion_tokens: 2, total_tokens: 9 },
};

const requestSignal = (call: number): AbortSignal | undefined => {
  const options: unknown = mockCreate.mock.calls[call]?.[1];
  return isRecord(options) && options.signal instanceof AbortSignal ? options.signal : undefined;
};

async function* sdkStream(chunks: unknown[]): AsyncGenerator<unknown, void, unknown> {
  for (const chunk of chunks) yield chunk;
}

describe("openai upstream", () => {
  beforeEach(() => {
    mockCreate.mockReset();
    constructorOptions.length = 0;
  });

  // ─────────────────────────────────────────────────────────────────
  // Request Mapping
  // ─────────────────────────────────────────────────────────────────

  describe("toSdkParams", () => {
    it("maps messages, tools and response format", () => {
      const params = toSdkParams({
        model: "gpt-test",
        messages: [
          {
            role: "user",
            content: [
              { type: "text", text: "Describe" },
              { type: "image_url", image_url: { url: "https://img.test/a.png" } },
            ],
          },
          {
            role: "assistant",
            content: null,
            tool_calls: [
              { id: "call_1", type: "function", function: { name: "lookup", arguments: "{}" } },
            ],
          },
          { role: "tool", content: "42", tool_call_id: "call_1" },
        ],
        tool_choice: "auto",
        response_format: { type: "json_object" },
      });

      expect(params.messages).toEqual([
        {
          role: "user",
          content: [
            { type: "text", text: "Describe" },
            { type: "image_url", image_url: { url: "https://img.test/a.png" } },
          ],
        },
        {
          role: "assistant",
          content: null,
          tool_calls: [
            { id: "call_1", type: "function", function: { name: "lookup", arguments: "{}" } },
          ],
        },
        { role: "tool", content: "42", tool_call_id: "call_1" },
      ]);
      expect(params.tool_choice).toBe("auto");
      expect(params.response_format).toEqual({ type: "json_object" });
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Completions
  // ─────────────────────────────────────────────────────────────────

  describe("complete", () => {
    it("configures the SDK client from the provider", async () => {
      mockCreate.mockResolvedValueOnce(sdkCompletion);
      const upstream = createOpenAIUpstream();

      await upstream.complete({ provider: provider(), apiKey: "k1" }, request);

      expect(constructorOptions).toEqual([
        {
          apiKey: "k1",
          baseURL: "https://api.test.com/v1",
          timeout: 5000,
          maxRetries: 1,
          defaultHeaders: { "x-team": "core" },
        },
      ]);
      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({ model: "gpt-test", stream: false, max_tokens: 32 }),
        { signal: undefined }
      );
    });

    it("maps the SDK completion to the wire response", async () => {
      mockCreate.mockResolvedValueOnce(sdkCompletion);
      const upstream = createOpenAIUpstream();

      const response = await upstream.complete({ provider: provider(), apiKey: "k1" }, request);

      expect(response).toEqual({
        id: "chatcmpl-1",
        object: "chat.completion",
        created: 1700000000,
        model: "gpt-test",
        choices: [
          {
            index: 0,
            message: { role: "assistant", content: "Hello!" },
            finish_reason: "stop",
          },
        ],
        usage: { prompt_tokens: 7, completion_tokens: 2, total_tokens: 9 },
      });
    });

    it("reuses clients per static key", async () => {
      mockCreate.mockResolvedValue(sdkCompletion);
      const upstream = createOpenAIUpstream();

      await upstream.complete({ provider: provider(), apiKey: "k1" }, request);
      await upstream.complete({ provider: provider(), apiKey: "k1" }, request);
      await upstream.complete({ provider: provider(), apiKey: "k2" }, request);

      expect(constructorOptions).toHaveLength(2);
    });

    it("does not cache clients for passthrough keys", async () => {
      mockCreate.mockResolvedValue(sdkCompletion);
      const upstream = createOpenAIUpstream();
      const poe = provider({ name: "poe", apiKeys: [], passthrough: true });

      await upstream.complete({ provider: poe, apiKey: "client-key" }, request);
      await upstream.complete({ provider: poe, apiKey: "client-key" }, request);

      expect(constructorOptions).toHaveLength(2);
    });

    it("wraps SDK status errors in UpstreamHttpError", async () => {
      const apiError = Object.assign(new Error("Rate limited"), {
        status: 429,
        error: { message: "Rate limited" },
      });
      mockCreate.mockRejectedValueOnce(apiError);
      const upstream = createOpenAIUpstream();

      const error = await upstream
        .complete({ provider: provider(), apiKey: "k1" }, request)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UpstreamHttpError);
      expect(error).toMatchObject({
        provider: "openai",
        status: 429,
        body: '{"message":"Rate limited"}',
      });
    });
  });

  // ─────────────────────────────────────────────────────────────────
  // Streaming
  // ─────────────────────────────────────────────────────────────────

  describe("stream", () => {
    it("maps chunks and forwards stream options", async () => {
      mockCreate.mockResolvedValueOnce(
        sdkStream([
          {
            id: "chatcmpl-1",
            object: "chat.completion.chunk",
            created: 1700000000,
            model: "gpt-test",
            choices: [
              { index: 0, delta: { role: "assistant", content: "He" }, finish_reason: null },
            ],
          },
          {
            id: "chatcmpl-1",
            object: "chat.completion.chunk",
            created: 1700000000,
            model: "gpt-test",
            choices: [{ index: 0, delta: { content: "llo" }, finish_reason: "stop" }],
            usage: null,
          },
        ])
      );
      const upstream = createOpenAIUpstream();

      const chunks: ChatCompletionChunk[] = [];
      const stream = await upstream.stream({ provider: provider(), apiKey: "k1" }, {
        ...request,
        stream_options: { include_usage: true },
      });
      for await (const chunk of stream) chunks.push(chunk);

      expect(mockCreate).toHaveBeenCalledWith(
        expect.objectContaining({ stream: true, stream_options: { include_usage: true } }),
        { signal: expect.any(AbortSignal) }
      );
      expect(chunks.map((c) => c.choices[0]?.delta)).toEqual([
        { role: "assistant", content: "He" },
        { content: "llo" },
      ]);
      expect(chunks[1]?.choices[0]?.finish_reason).toBe("stop");
      expect(chunks[1]?.usage).toBeUndefined();
    });
    it("aborts the request when the stream is closed before the first read", async () => {
      mockCreate.mockResolvedValueOnce(sdkStream([]));
      const upstream = createOpenAIUpstream();

      const stream = await upstream.stream({ provider: provider(), apiKey: "k1" }, request);
      await stream.return(undefined);

      expect(requestSignal(0)?.aborted).toBe(true);
    });

    it("follows the caller's abort signal", async () => {
      mockCreate.mockResolvedValueOnce(sdkStream([]));
      const upstream = createOpenAIUpstream();
      const caller = new AbortController();

      await upstream.stream({ provider: provider(), apiKey: "k1" }, request, caller.signal);
      caller.abort();

      expect(requestSignal(0)?.aborted).toBe(true);
    });
  });

  describe("toUpstreamError", () => {
    it("maps timeouts to 408 and leaves unrelated errors alone", () => {
      const timeout = new Error("timed out");
      timeout.name = "APIConnectionTimeoutError";
      const plain = new Error("bug");

      expect(toUpstreamError("openai", timeout)).toMatchObject({ status: 408 });
      expect(toUpstreamError("openai", plain)).toBe(plain);
    });
  });
});
