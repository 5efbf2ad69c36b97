import { describe, it, expect, vi, afterEach } from "vitest";
import {
  createConsoleLogger,
  errorMessage,
  getLogger,
  isDebugEnabled,
  setDebugEnabled,
} from "./logger.js";

describe("logger", () => {
  afterEach(() => {
    setDebugEnabled(false);
    vi.restoreAllMocks();
  });

  describe("createConsoleLogger", () => {
    it("writes entries at or above the level with a prefix", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
      const logger = createConsoleLogger({ level: "info" });

      logger.debug("hidden");
      logger.info("Cache invalidated", { generation: 2 });
      logger.warn("Rotating");

      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith("[Switchyard]", "Cache invalidated", { generation: 2 });
      expect(warn).toHaveBeenCalledWith("[Switchyard]", "Rotating");
    });

    it("routes errors to console.error", () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      const logger = createConsoleLogger({ level: "error" });

      logger.warn("dropped");
      logger.error("Hook failed", { middleware: "usage" });

      expect(error).toHaveBeenCalledWith("[Switchyard]", "Hook failed", { middleware: "usage" });
    });
  });

  describe("default logger", () => {
    it("writes debug output only while debug is enabled", () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});
      const logger = getLogger();

      logger.debug("before");
      setDebugEnabled(true);
      logger.debug("after");

      expect(isDebugEnabled()).toBe(true);
      expect(log).toHaveBeenCalledTimes(1);
      expect(log).toHaveBeenCalledWith("[Switchyard]", "after");
    });

    it("always writes warnings", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

      getLogger().warn("Config warning");

      expect(warn).toHaveBeenCalledWith("[Switchyard]", "Config warning");
    });
  });

  it("extracts messages from thrown values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
