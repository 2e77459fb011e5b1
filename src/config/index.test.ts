/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * index.test.ts: Tests for configuration merging and validation.
 */
import { DEFAULTS, getNestedValue, mergeConfiguration } from "./userConfig.js";
import { collectConfigurationErrors, validatePositiveInt } from "./index.js";
import { describe, expect, it } from "vitest";

describe("mergeConfiguration", () => {

  it("returns the defaults for an empty config and environment", () => {

    expect(mergeConfiguration({}, {})).toEqual(DEFAULTS);
  });

  it("lets environment variables override the config file", () => {

    const config = mergeConfiguration({ ledger: { firstNumber: 100 }, server: { port: 6000 } }, { PLAYLIST_ENABLED: "no", PORT: "7000" });

    expect(config.ledger.firstNumber).toBe(100);
    expect(config.server.port).toBe(7000);
    expect(config.playlist.enabled).toBe(false);
  });

  it("restores a path default from an empty environment variable", () => {

    const config = mergeConfiguration({ ledger: { mapFile: "/srv/map.json" } }, { CHANLEDGER_MAP_FILE: "" });

    expect(config.ledger.mapFile).toBeNull();
  });

  it("ignores unparseable numbers and unknown settings", () => {

    expect(mergeConfiguration({ server: { extra: true }, unknown: 1 }, { PORT: "not-a-port" })).toEqual(DEFAULTS);
  });

  it("does not modify the defaults", () => {

    mergeConfiguration({ server: { port: 6000 } }, {});

    expect(DEFAULTS.server.port).toBe(5590);
  });
});

describe("getNestedValue", () => {

  it("reads own properties only", () => {

    expect(getNestedValue({ server: { port: 1 } }, "server.port")).toBe(1);
    expect(getNestedValue({ server: {} }, "server.toString")).toBeUndefined();
  });
});

describe("collectConfigurationErrors", () => {

  it("accepts the defaults", () => {

    expect(collectConfigurationErrors(DEFAULTS)).toEqual([]);
  });

  it("reports every invalid setting", () => {

    const config = mergeConfiguration({

      ledger: { firstNumber: 1000000, mapFile: "relative/map.json" },
      logging: { httpLogLevel: "loud" },
      playlist: { enabled: "yes" },
      server: { port: 0 }
    }, {});

    expect(collectConfigurationErrors(config)).toEqual([
      "CHANLEDGER_MAP_FILE must be an absolute path, got: relative/map.json",
      "CHANLEDGER_FIRST_NUMBER must be at most 999999, got: 1000000",
      "HTTP_LOG_LEVEL must be one of none, errors, all, got: loud",
      "PLAYLIST_ENABLED must be true or false, got: yes",
      "PORT must be a positive integer, got: 0"
    ]);
  });
});

describe("validatePositiveInt", () => {

  it("checks type and range", () => {

    expect(validatePositiveInt("N", 5, 1, 10)).toBeNull();
    expect(validatePositiveInt("N", 2.5)).toBe("N must be a positive integer, got: 2.5");
    expect(validatePositiveInt("N", 3, 5)).toBe("N must be at least 5, got: 3");
  });
});
