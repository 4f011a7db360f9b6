/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * match.test.ts: Tests for fuzzy channel name matching.
 */
import { fuzzyMatch, levenshtein, rankByDistance } from "../match.js";

describe("levenshtein", () => {

  it("counts single-character edits", () => {

    expect(levenshtein("kitten", "sitting")).toBe(3);
    expect(levenshtein("", "lush")).toBe(4);
    expect(levenshtein("lush", "lush")).toBe(0);
  });
});

describe("fuzzyMatch", () => {

  const titles = [ "Groove Salad Classic", "Groove Salad", "Drone Zone", "Salad Days" ];

  it("prefers prefixes, then the shortest candidate", () => {

    expect(fuzzyMatch("groove", titles)).toBe("Groove Salad");
    expect(fuzzyMatch("SALAD", titles)).toBe("Salad Days");
  });

  it("forgives small typos", () => {

    expect(fuzzyMatch("dron zone", titles)).toBe("Drone Zone");
  });

  it("rejects distant names and empty queries", () => {

    expect(fuzzyMatch("xyz", ["Lush"])).toBeUndefined();
    expect(fuzzyMatch("   ", titles)).toBeUndefined();
  });
});

describe("rankByDistance", () => {

  it("returns the closest candidates first", () => {

    expect(rankByDistance("lsh", [ "Groove Salad", "Lush", "Drone Zone" ], 1)).toEqual(["Lush"]);
    expect(rankByDistance("lush", [ "Lush", "Bush" ], 5)).toEqual([ "Lush", "Bush" ]);
  });
});
