import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLogger, parseLogLevel } from "../../src/logging/logger.js";

describe("parseLogLevel", () => {
  it("parses level names case-insensitively", () => {
    expect(parseLogLevel("debug")).toBe(2);
    expect(parseLogLevel(" WARN ")).toBe(4);
  });

  it("clamps numeric levels", () => {
    expect(parseLogLevel("3")).toBe(3);
    expect(parseLogLevel("42")).toBe(6);
    expect(parseLogLevel("-1")).toBe(0);
  });

  it("returns undefined for empty or unknown values", () => {
    expect(parseLogLevel(undefined)).toBeUndefined();
    expect(parseLogLevel("  ")).toBeUndefined();
    expect(parseLogLevel("loud")).toBeUndefined();
  });
});

describe("createLogger", () => {
  const originalLevel = process.env.FS_SANDBOX_LOG_LEVEL;

  beforeEach(() => {
    delete process.env.FS_SANDBOX_LOG_LEVEL;
  });

  afterEach(() => {
    if (originalLevel === undefined) {
      delete process.env.FS_SANDBOX_LOG_LEVEL;
    } else {
      process.env.FS_SANDBOX_LOG_LEVEL = originalLevel;
    }
  });

  it("uses warn, pretty output and the library name by default", () => {
    const logger = createLogger();
    expect(logger.settings.minLevel).toBe(4);
    expect(logger.settings.type).toBe("pretty");
    expect(logger.settings.name).toBe("fs-sandbox");
  });

  it("reads the level from the environment", () => {
    process.env.FS_SANDBOX_LOG_LEVEL = "debug";
    expect(createLogger().settings.minLevel).toBe(2);
  });

  it("prefers explicit options over the environment", () => {
    process.env.FS_SANDBOX_LOG_LEVEL = "debug";
    const logger = createLogger({ minLevel: 5, type: "json", name: "uploads" });
    expect(logger.settings.minLevel).toBe(5);
    expect(logger.settings.type).toBe("json");
    expect(logger.settings.name).toBe("uploads");
  });
});
