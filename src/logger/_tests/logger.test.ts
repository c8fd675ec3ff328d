import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { logger, setLogLevel, getLogLevel, isLogLevel } from "../../logger";

describe("logger", () => {
  const origLevel = getLogLevel();
  beforeEach(() => {
    setLogLevel("trace");
  });
  afterEach(() => {
    setLogLevel(origLevel);
    vi.restoreAllMocks();
  });

  it("respects log levels and formats output", () => {
    const spy = vi.spyOn(console, "log").mockImplementation(() => { /* no-op */ });
    logger.info("hello", 123);
    expect(spy).toHaveBeenCalledTimes(1);
    const line = String(spy.mock.calls[0][0]);
    expect(line).toContain("[INFO]");
    expect(line).toContain("hello 123");
  });

  it("can silence lower levels", () => {
    setLogLevel("error");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => { /* no-op */ });
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => { /* no-op */ });
    logger.debug("nope");
    logger.error("boom");
    expect(logSpy).not.toHaveBeenCalled();
    expect(errSpy).toHaveBeenCalledTimes(1);
  });

  it("routes warnings to console.warn", () => {
    setLogLevel("warn");
    const warnSpy = vi.spyOn(console, "warn").mockImplementation(() => { /* no-op */ });
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => { /* no-op */ });
    logger.warn("careful");
    logger.info("hidden");
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(String(warnSpy.mock.calls[0][0])).toContain("[WARN] careful");
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("prints the stack of Error arguments", () => {
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => { /* no-op */ });
    const err = new Error("device unplugged");
    logger.error("Échec:", err);
    expect(String(errSpy.mock.calls[0][0])).toContain("Error: device unplugged");
  });

  it("child loggers prefix their scope and delegate to the parent", () => {
    const warnSpy = vi.spyOn(logger, "warn");
    const consoleSpy = vi.spyOn(console, "warn").mockImplementation(() => { /* no-op */ });
    logger.child("breathe").warn("careful", 1);
    expect(warnSpy).toHaveBeenCalledWith("[breathe] careful", 1);
    expect(String(consoleSpy.mock.calls[0][0])).toContain("[WARN] [breathe] careful 1");
  });

  it("nested child scopes are joined with ':'", () => {
    const infoSpy = vi.spyOn(logger, "info").mockImplementation(() => { /* no-op */ });
    logger.child("refill").child("fill").info("pass");
    expect(infoSpy).toHaveBeenCalledWith("[refill:fill] pass");
  });

  it("isLogLevel accepts known levels only", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});
