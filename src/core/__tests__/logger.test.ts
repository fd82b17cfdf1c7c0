import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import Logger from "../logger";

describe("Logger", () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.ROOTSTAKE_LOG_LEVEL;
    delete process.env.LOG_LEVEL;
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
  });

  it("stays quiet below warn by default", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new Logger("test");

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown", 42);

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/^\[.+\] \[test\] \[WARN\]$/);
    expect(warn.mock.calls[0].slice(1)).toEqual(["shown", 42]);
  });

  it("honours the requested level and ignores unknown ones", () => {
    process.env.ROOTSTAKE_LOG_LEVEL = "debug";
    expect(new Logger().logLevel).toBe("debug");

    process.env.ROOTSTAKE_LOG_LEVEL = "";
    process.env.LOG_LEVEL = "ERROR";
    expect(new Logger().logLevel).toBe("error");

    process.env.LOG_LEVEL = "chatty";
    expect(new Logger().logLevel).toBe("warn");
  });

  it("nests namespaces", () => {
    expect(new Logger("rootstake").child("resolver").namespace).toBe("rootstake:resolver");
  });
});
