import { describe, it, expect, vi } from "vitest";
import { createAliasService } from "./service.js";
import { createAliasTable, summarizeAliases, summarizeProfiles } from "./table.js";
import { noopLogger } from "../utils/logger.js";

const tableV1 = createAliasTable({
  providers: ["poe"],
  defaultProvider: "poe",
  aliases: { poe: { fast: "gemini-flash" } },
});

const tableV2 = createAliasTable({
  providers: ["poe"],
  defaultProvider: "poe",
  aliases: { poe: { fast: "gemini-pro" } },
});

describe("createAliasService", () => {
  it("caches resolutions", () => {
    const service = createAliasService({ table: tableV1, logger: noopLogger });

    service.resolve("poe:fast");
    service.resolve("poe:fast");

    expect(service.getCacheStats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
  });

  it("does not cache failed resolutions", () => {
    const service = createAliasService({
      table: createAliasTable({
        providers: ["poe"],
        defaultProvider: "poe",
        aliases: { poe: { a: "b", b: "a" } },
      }),
      logger: noopLogger,
    });

    expect(service.resolve("a").isErr()).toBe(true);
    expect(service.getCacheStats().size).toBe(0);
  });

  it("resolves against the new table after publish", () => {
    const service = createAliasService({ table: tableV1, logger: noopLogger });
    expect(service.resolve("fast")._unsafeUnwrap().resolvedModel).toBe("gemini-flash");

    service.publish(tableV2);

    expect(service.getTable()).toBe(tableV2);
    expect(service.resolve("fast")._unsafeUnwrap().resolvedModel).toBe("gemini-pro");
    expect(service.getCacheStats().generation).toBe(1);
  });

  it("logs cache invalidation on publish", () => {
    const logger = { ...noopLogger, info: vi.fn() };
    const service = createAliasService({ table: tableV1, logger });

    service.publish(tableV2);

    expect(logger.info).toHaveBeenCalledWith(
      "Alias table published, resolution cache invalidated",
      { providers: ["poe"], defaultProvider: "poe", generation: 1 }
    );
  });

  it("keys the cache by explicit provider", () => {
    const table = createAliasTable({
      providers: ["poe", "openai"],
      defaultProvider: "poe",
      aliases: { poe: { fast: "gemini-flash" }, openai: { fast: "gpt-4o-mini" } },
    });
    const service = createAliasService({ table, logger: noopLogger });

    expect(service.resolve("fast")._unsafeUnwrap().resolvedModel).toBe("gemini-flash");
    expect(service.resolve("fast", "openai")._unsafeUnwrap().resolvedModel).toBe("gpt-4o-mini");
  });
});

describe("createAliasTable", () => {
  it("lets explicit aliases override fallbacks", () => {
    const table = createAliasTable({
      providers: ["openai"],
      aliases: { openai: { Haiku: "my-haiku" } },
      fallbackAliases: { openai: { haiku: "gpt-4o-mini", sonnet: "gpt-4o" }, unknown: { x: "y" } },
    });

    expect(summarizeAliases(table)).toEqual({
      totalAliases: 2,
      totalFallbacks: 1,
      defaultProvider: undefined,
      providers: [
        {
          provider: "openai",
          aliasCount: 2,
          fallbackCount: 1,
          aliases: [
            { alias: "haiku", target: "my-haiku", type: "explicit" },
            { alias: "sonnet", target: "gpt-4o", type: "fallback" },
          ],
        },
      ],
    });
  });

  it("drops an undeclared default provider", () => {
    const table = createAliasTable({ providers: ["poe"], defaultProvider: "openai" });

    expect(table.defaultProvider).toBeUndefined();
  });

  it("lists profiles by name with their aliases sorted", () => {
    const table = createAliasTable({
      providers: ["openai"],
      profiles: [
        { name: "Work", timeoutMs: 30000, aliases: { Quick: "openai:gpt-4o-mini", deep: "openai:gpt-4o" } },
        { name: "batch", maxRetries: 0, aliases: {} },
      ],
    });

    expect(summarizeProfiles(table)).toEqual([
      { name: "batch", maxRetries: 0, aliases: [] },
      {
        name: "work",
        timeoutMs: 30000,
        aliases: [
          { alias: "deep", target: "openai:gpt-4o" },
          { alias: "quick", target: "openai:gpt-4o-mini" },
        ],
      },
    ]);
  });

  it("swaps profiles with the table", () => {
    const withProfile = createAliasTable({
      providers: ["poe"],
      defaultProvider: "poe",
      profiles: [{ name: "work", aliases: { fast: "poe:gemini-pro" } }],
    });
    const service = createAliasService({ table: tableV1, logger: noopLogger });

    expect(service.resolve("work:fast")._unsafeUnwrap()).toMatchObject({
      provider: "work",
      resolvedModel: "fast",
      wasResolved: false,
    });

    service.publish(withProfile);

    expect(service.resolve("work:fast")._unsafeUnwrap()).toMatchObject({
      resolvedModel: "gemini-pro",
      profile: { name: "work" },
    });
  });

  it("is frozen", () => {
    expect(Object.isFrozen(tableV1)).toBe(true);
    expect(Object.isFrozen(tableV1.providers)).toBe(true);
  });
});
