import { describe, it, expect, afterEach, vi } from "vitest";
import { formatLogLine, logger } from "./logs.js";

describe("logger", () => {
  afterEach(() => {
    logger.setLevel(undefined);
    logger.setEnabled(true);
    vi.restoreAllMocks();
  });

  it("formatLogLine should skip absent fields", () => {
    expect(
      formatLogLine({
        timestamp: "2026-10-18T00:00:00.000Z",
        level: "warn",
        event: "crumb.malformed",
        path: "/t/crumbs/x.json",
        message: "bad name",
      })
    ).toBe("[2026-10-18T00:00:00.000Z] [WARN] [crumb.malformed] /t/crumbs/x.json bad name");
  });

  it("formatLogLine should append details as JSON", () => {
    expect(
      formatLogLine({
        timestamp: "2026-10-18T00:00:00.000Z",
        level: "info",
        event: "trail.cleared",
        details: { forgotten: 2 },
      })
    ).toBe('[2026-10-18T00:00:00.000Z] [INFO] [trail.cleared] {"forgotten":2}');
  });

  it("should write warnings with console.warn and the rest to stderr", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.warn("a.warning");
    logger.info("an.info");
    logger.error("an.error");

    expect(warn).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledTimes(2);
    expect(error.mock.calls[0]?.[0]).toContain("[INFO] [an.info]");
  });

  it("should drop entries below the level", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    logger.setLevel("error");

    logger.info("quiet.info");
    logger.error("loud.error");

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]?.[0]).toContain("[loud.error]");
  });

  it("should write debug entries only at debug level", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.setLevel("info");
    logger.debug("hidden");
    logger.setLevel("debug");
    logger.debug("shown");

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]?.[0]).toContain("[DEBUG] [shown]");
  });

  it("should write nothing while disabled", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    logger.setEnabled(false);

    logger.error("ignored");

    expect(error).not.toHaveBeenCalled();
  });
});
