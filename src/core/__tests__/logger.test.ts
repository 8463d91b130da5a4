import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger, getLogLevel, setLogLevel } from "../logger";

describe("createLogger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it("prefixes lines with the scope", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    createLogger("parser").warn("odd record", 42);
    expect(warn).toHaveBeenCalledWith("[parser]", "odd record", 42);
  });

  it("drops lines below the current level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const log = createLogger("test");

    setLogLevel("info");
    log.debug("hidden");
    log.info("shown");
    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledTimes(1);

    setLogLevel("silent");
    log.info("hidden");
    expect(info).toHaveBeenCalledTimes(1);
  });
});
