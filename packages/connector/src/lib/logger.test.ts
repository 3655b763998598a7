import { describe, it, expect, vi, beforeEach } from "vitest";
import { setupLogger, setLogLevel, getLogLevel, isLogLevel } from "./logger.js";

describe("logger", () => {
  beforeEach(() => {
    setLogLevel("info");
  });

  it("should log messages with level and module name", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const logger = setupLogger("local-store");

    logger.info("Wrote 3 records");

    expect(consoleSpy).toHaveBeenCalledTimes(1);
    const logOutput = String(consoleSpy.mock.calls[0][0]);
    expect(logOutput).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] INFO  \[local-store\] Wrote 3 records$/);
  });

  it("should drop messages below the current level", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    setLogLevel("warn");
    const logger = setupLogger("test");

    logger.debug("debug message");
    logger.info("info message");
    logger.warn("warn message");
    logger.error("error message");

    expect(consoleSpy).toHaveBeenCalledTimes(2);
    expect(getLogLevel()).toBe("warn");
  });

  it("should emit every level at debug", () => {
    const consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    setLogLevel("debug");
    const logger = setupLogger("test");

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(consoleSpy).toHaveBeenCalledTimes(4);
  });

  it("should recognize valid level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });

  it("should not accept inherited object keys as levels", () => {
    expect(isLogLevel("toString")).toBe(false);
    expect(isLogLevel("constructor")).toBe(false);
    expect(isLogLevel("__proto__")).toBe(false);
  });
});
