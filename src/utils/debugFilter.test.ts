/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.test.ts: Tests for category-based debug filtering.
 */
import { afterEach, describe, expect, it } from "vitest";
import { initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";

describe("debug filter", () => {

  afterEach(() => {

    initDebugFilter("");
  });

  it("is off until configured", () => {

    expect(isAnyDebugEnabled()).toBe(false);
    expect(isCategoryEnabled("store")).toBe(false);
  });

  it("matches exact categories and their sub-categories", () => {

    initDebugFilter("store, http");

    expect(isCategoryEnabled("store")).toBe(true);
    expect(isCategoryEnabled("http:assign")).toBe(true);
    expect(isCategoryEnabled("storefront")).toBe(false);
    expect(isCategoryEnabled("allocator")).toBe(false);
  });

  it("lets exclusions win over the wildcard", () => {

    initDebugFilter("*,-http");

    expect(isCategoryEnabled("allocator")).toBe(true);
    expect(isCategoryEnabled("http")).toBe(false);
    expect(isCategoryEnabled("http:events")).toBe(false);
  });

  it("replaces the previous configuration", () => {

    initDebugFilter("store");
    initDebugFilter("allocator");

    expect(isCategoryEnabled("store")).toBe(false);
    expect(isCategoryEnabled("allocator")).toBe(true);
  });
});
