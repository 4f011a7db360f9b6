/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.test.ts: Tests for debug category filtering.
 */
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "../debugFilter.js";

describe("debug filter", () => {

  afterEach(() => {

    initDebugFilter("");
  });

  it("is off by default and for an empty pattern", () => {

    initDebugFilter(" , ");

    expect(isAnyDebugEnabled()).toBe(false);
    expect(isCategoryEnabled("session")).toBe(false);
  });

  it("enables listed categories and their sub-categories", () => {

    initDebugFilter("player, session");

    expect(isCategoryEnabled("player")).toBe(true);
    expect(isCategoryEnabled("player:spawn")).toBe(true);
    expect(isCategoryEnabled("playerx")).toBe(false);
    expect(isCategoryEnabled("catalog")).toBe(false);
  });

  it("applies exclusions over the wildcard", () => {

    initDebugFilter("*,-catalog");

    expect(isAnyDebugEnabled()).toBe(true);
    expect(isCategoryEnabled("tracks")).toBe(true);
    expect(isCategoryEnabled("catalog")).toBe(false);
    expect(isCategoryEnabled("catalog:icons")).toBe(false);
  });
});
