import { describe, it, expect, vi, afterEach } from "vitest";
import { ConsoleLogger, parseLogLevel } from "./logger.js";

describe("parseLogLevel", () => {
  it("accepts known levels case-insensitively", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel(" warn ")).toBe("warn");
  });

  it("falls back for unknown or missing values", () => {
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose", "error")).toBe("error");
  });
});

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes messages with the scope", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    new ConsoleLogger("mapping", "info").info("merged", { cells: 3 });
    expect(log).toHaveBeenCalledWith("[wayfinder:mapping] merged", { cells: 3 });
  });

  it("sanitizes control characters in the scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    new ConsoleLogger("bad\nscope", "info").warn("x");
    expect(warn).toHaveBeenCalledWith("[wayfinder:bad_scope] x", "");
  });

  it("drops messages below the minimum level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = new ConsoleLogger("kernel", "warn");
    logger.debug("hidden");
    logger.info("hidden");
    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });

  it("child loggers nest the scope and keep the level", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const child = new ConsoleLogger("kernel", "info").child("settle");
    child.info("ok");
    expect(log).toHaveBeenCalledWith("[wayfinder:kernel/settle] ok", "");
  });
});
