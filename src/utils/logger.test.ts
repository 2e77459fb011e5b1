/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * logger.test.ts: Tests for console log routing and run prefixes.
 */
import { LOG, setConsoleLogging, setDebugLogging } from "./logger.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runWithRunContext } from "./runContext.js";

describe("LOG in console mode", () => {

  beforeEach(() => {

    setConsoleLogging(true);
  });

  afterEach(() => {

    setConsoleLogging(false);
    setDebugLogging(false);
    vi.restoreAllMocks();
  });

  it("formats arguments and prefixes the run ID inside a run", async () => {

    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    LOG.info("Assigned channel %d to %s.", 3, "/a");

    await runWithRunContext({ runId: "run-9" }, async () => {

      LOG.info("Assigned channel %d to %s.", 4, "/b");

      return Promise.resolve();
    });

    expect(spy.mock.calls).toEqual([ ["Assigned channel 3 to /a."], [ "[%s] %s", "run-9", "Assigned channel 4 to /b." ] ]);
  });

  it("sends errors to stderr in red", () => {

    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    LOG.error("Broken: %s.", "map");

    expect(spy).toHaveBeenCalledWith("%s%s%s", "\x1b[31m", "Broken: map.", "\x1b[0m");
  });

  it("drops debug output unless its category is enabled", () => {

    const spy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    LOG.debug("store", "hidden");
    setDebugLogging(true);
    LOG.debug("store", "shown");

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith("%s%s%s", "\x1b[36m", "shown", "\x1b[0m");
  });
});
