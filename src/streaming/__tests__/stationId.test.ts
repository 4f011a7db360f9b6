/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * stationId.test.ts: Tests for station identification detection.
 */
import { isStationId } from "../stationId.js";

describe("isStationId", () => {

  it("matches known IDs case-insensitively as substrings", () => {

    expect(isStationId("somafm station id", [ "SomaFM" ])).toBe(true);
    expect(isStationId("SomaFM - Groove Salad", [ "somafm" ])).toBe(true);
  });

  it("does not match ordinary titles", () => {

    expect(isStationId("a normal song", [ "SomaFM" ])).toBe(false);
  });

  it("ignores empty IDs", () => {

    expect(isStationId("anything", [""])).toBe(false);
    expect(isStationId("anything", [])).toBe(false);
  });

  it("accepts any iterable of IDs", () => {

    expect(isStationId("Station ID: KEXP", new Set([ "Promo", "kexp" ]))).toBe(true);
  });
});
