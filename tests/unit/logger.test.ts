import { afterEach, describe, expect, it, vi } from "vitest";
import { logger, setLogLevel } from "../../src/lib/logger";

describe("logger", () => {
  afterEach(() => {
    setLogLevel("error");
    vi.restoreAllMocks();
  });

  it("writes one JSON line with level, message and context", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    setLogLevel("info");

    logger.info("Upload stored", { rfp_id: 7 });

    expect(info).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(info.mock.calls[0]?.[0]));
    expect(entry).toMatchObject({ level: "info", msg: "Upload stored", rfp_id: 7 });
    expect(typeof entry.ts).toBe("string");
  });

  it("drops entries below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    setLogLevel("warn");

    logger.debug("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
