// Unit tests for the console logger

import { describe, it, expect, afterEach, vi } from "vitest";
import { createConsoleLogger, errorMessage, parseLogLevel } from "./logger.js";

describe("createConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes lines with level, timestamp and component", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    createConsoleLogger("Server").info("listening", 8765);

    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^\[INFO\] \[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[Server\] listening$/);
    expect(log.mock.calls[0][1]).toBe(8765);
  });

  it("drops messages below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    const logger = createConsoleLogger("Classifier", "WARNING");
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(debug).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("parseLogLevel", () => {
  it("normalizes case and aliases", () => {
    expect(parseLogLevel(" error ")).toBe("ERROR");
    expect(parseLogLevel("Warn")).toBe("WARNING");
    expect(parseLogLevel("trace")).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});
