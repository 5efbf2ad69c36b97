import { describe, it, expect, vi } from "vitest";
import { createKeyRotator, fingerprintApiKey } from "./rotation.js";
import { AllKeysExhaustedError } from "../types/errors.js";
import { noopLogger } from "../utils/logger.js";

const keys = ["k1", "k2", "k3"];

const nextKey = async (rotator: ReturnType<typeof createKeyRotator>, exclude: string[] = []) =>
  (await rotator.next(new Set(exclude)))._unsafeUnwrap();

describe("createKeyRotator", () => {
  it("cycles keys round-robin in configured order", async () => {
    const rotator = createKeyRotator("openai", keys, { logger: noopLogger });

    const results: string[] = [];
    for (let i = 0; i < 4; i++) {
      results.push(await nextKey(rotator));
    }

    expect(results).toEqual(["k1", "k2", "k3", "k1"]);
  });

  it("hands out keys in call order under concurrency", async () => {
    const rotator = createKeyRotator("openai", keys, { logger: noopLogger });

    const results = await Promise.all(
      Array.from({ length: 6 }, () => nextKey(rotator))
    );

    expect(results).toEqual(["k1", "k2", "k3", "k1", "k2", "k3"]);
  });

  it("skips excluded keys", async () => {
    const rotator = createKeyRotator("openai", keys, { logger: noopLogger });

    for (let i = 0; i < 5; i++) {
      expect(await nextKey(rotator, ["k1", "k3"])).toBe("k2");
    }
  });

  it("returns one of the remaining keys for any strict subset", async () => {
    const rotator = createKeyRotator("openai", keys, { logger: noopLogger });
    const subsets = [[], ["k1"], ["k2"], ["k3"], ["k1", "k2"], ["k2", "k3"], ["k1", "k3"]];

    for (const subset of subsets) {
      const key = await nextKey(rotator, subset);
      expect(keys).toContain(key);
      expect(subset).not.toContain(key);
    }
  });

  it("leaves the cursor just past the key it returns", async () => {
    const rotator = createKeyRotator("openai", keys, { logger: noopLogger });

    expect(await nextKey(rotator, ["k1"])).toBe("k2");
    expect(rotator.getCursor()).toBe(2);
    expect(await nextKey(rotator)).toBe("k3");
  });

  it("finds the remaining key while other requests rotate the same cursor", async () => {
    const rotator = createKeyRotator("openai", keys, { logger: noopLogger });
    const yieldTimes = async (count: number) => {
      for (let i = 0; i < count; i++) await Promise.resolve();
    };

    for (const spacing of [1, 2, 3]) {
      const restricted = rotator.next(new Set(["k1", "k2"]));
      const others: Promise<unknown>[] = [];
      for (let i = 0; i < 30; i++) {
        others.push(rotator.next(new Set()));
        await yieldTimes(spacing);
      }

      const result = await restricted;
      await Promise.all(others);

      expect(result._unsafeUnwrap()).toBe("k3");
    }
  });

  it("fails with AllKeysExhaustedError when every key is excluded", async () => {
    const logger = { ...noopLogger, error: vi.fn() };
    const rotator = createKeyRotator("openai", keys, { logger });

    const result = await rotator.next(new Set(keys));

    expect(result.isErr()).toBe(true);
    const error = result._unsafeUnwrapErr();
    expect(error).toBeInstanceOf(AllKeysExhaustedError);
    expect(error.statusCode).toBe(429);
    expect(error.attempted).toBe(3);
    expect(logger.error).toHaveBeenCalledWith("All provider API keys exhausted", {
      provider: "openai",
      keyCount: 3,
      excluded: keys.map(fingerprintApiKey),
    });
  });

  it("does not move the cursor when exhausted", async () => {
    const rotator = createKeyRotator("openai", keys, { logger: noopLogger });
    await rotator.next(new Set(keys));

    expect(rotator.getCursor()).toBe(0);
  });

  it("starts from the given cursor, modulo the key count", async () => {
    const rotator = createKeyRotator("openai", keys, { startIndex: 4, logger: noopLogger });

    expect(await nextKey(rotator)).toBe("k2");
  });
});

describe("fingerprintApiKey", () => {
  it("returns 8 hex characters", () => {
    expect(fingerprintApiKey("test-key")).toMatch(/^[0-9a-f]{8}$/);
    expect(fingerprintApiKey("test-key")).toBe(fingerprintApiKey("test-key"));
  });

  it("labels the passthrough sentinel", () => {
    expect(fingerprintApiKey("!PASSTHRU")).toBe("PASSTHRU");
  });
});
