import { describe, it, expect } from "vitest";
import { createMutex } from "./mutex.js";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("createMutex", () => {
  it("runs callers one at a time in arrival order", async () => {
    const mutex = createMutex();
    const events: string[] = [];

    const first = mutex.runExclusive(async () => {
      events.push("first:start");
      await tick();
      events.push("first:end");
      return 1;
    });
    const second = mutex.runExclusive(() => {
      events.push("second");
      return 2;
    });

    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
  });

  it("keeps running after a caller fails", async () => {
    const mutex = createMutex();

    const failed = mutex.runExclusive(() => {
      throw new Error("boom");
    });
    const next = mutex.runExclusive(() => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});
