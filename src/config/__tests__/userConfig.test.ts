/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * userConfig.test.ts: Tests for configuration merging and environment parsing.
 */
import { CONFIG_METADATA, DEFAULTS, getNestedValue, mergeConfiguration, parseEnvValue } from "../userConfig.js";

const ENV_VARS = Object.values(CONFIG_METADATA).flat().flatMap((setting) => (setting.envVar ? [setting.envVar] : []));

describe("mergeConfiguration", () => {

  const saved = new Map<string, string | undefined>();

  beforeEach(() => {

    for(const name of ENV_VARS) {

      saved.set(name, process.env[name]);
      delete process.env[name];
    }
  });

  afterEach(() => {

    for(const [ name, value ] of saved) {

      if(value === undefined) {

        delete process.env[name];
      } else {

        process.env[name] = value;
      }
    }
  });

  it("returns the defaults for an empty config file", () => {

    expect(mergeConfiguration({})).toEqual(DEFAULTS);
  });

  it("takes values from the config file", () => {

    const config = mergeConfiguration({ player: { kind: "MPV" }, playback: { stationIds: ["KEXP"] }, status: { port: 8080 } });

    expect(config.player.kind).toBe("mpv");
    expect(config.playback.stationIds).toEqual(["KEXP"]);
    expect(config.status.port).toBe(8080);
  });

  it("lets environment variables override the config file", () => {

    process.env.ICYTUNE_STATUS_PORT = "9000";
    process.env.ICYTUNE_STATION_IDS = "SomaFM, Promo ,,";
    process.env.ICYTUNE_NOTIFY = "yes";

    const config = mergeConfiguration({ notifications: { enabled: false }, status: { port: 8080 } });

    expect(config.status.port).toBe(9000);
    expect(config.playback.stationIds).toEqual([ "SomaFM", "Promo" ]);
    expect(config.notifications.enabled).toBe(true);
  });

  it("falls back to the config file when an environment value does not parse", () => {

    process.env.ICYTUNE_STATUS_PORT = "abc";

    expect(mergeConfiguration({ status: { port: 8080 } }).status.port).toBe(8080);
  });

  it("ignores values of the wrong type", () => {

    const config = mergeConfiguration({ playback: { stationIds: "SomaFM" }, status: { port: "eighty" }, tracks: { enabled: "no" } });

    expect(config.status.port).toBe(5590);
    expect(config.tracks.enabled).toBe(true);
    expect(config.playback.stationIds).toEqual(["SomaFM"]);
  });

  it("treats blank and unknown optional values as unset", () => {

    process.env.ICYTUNE_NOTIFY_COMMAND = "  ";

    const config = mergeConfiguration({ notifications: { command: "scrobble" }, player: { kind: "vlc" } });

    expect(config.notifications.command).toBeNull();
    expect(config.player.kind).toBeNull();
  });
});

describe("parseEnvValue", () => {

  it("parses each setting type", () => {

    expect(parseEnvValue("TRUE", "boolean")).toBe(true);
    expect(parseEnvValue("off", "boolean")).toBe(false);
    expect(parseEnvValue("5590", "port")).toBe(5590);
    expect(parseEnvValue("soon", "integer")).toBeUndefined();
    expect(parseEnvValue("a,b", "list")).toEqual([ "a", "b" ]);
    expect(parseEnvValue("0.0.0.0", "host")).toBe("0.0.0.0");
  });
});

describe("getNestedValue", () => {

  it("follows dotted paths through own properties", () => {

    expect(getNestedValue({ status: { port: 1 } }, "status.port")).toBe(1);
    expect(getNestedValue({ status: { port: 1 } }, "status.host")).toBeUndefined();
    expect(getNestedValue({ status: null }, "status.port")).toBeUndefined();
    expect(getNestedValue({}, "toString")).toBeUndefined();
  });
});
