/**
 * tidewatch — tests/lib/lruCache.test.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { LRUCache } from "../../src/lib/lruCache.js";

describe("LRUCache", () => {
  it("evicts the least recently used entry", () => {
    const cache = new LRUCache<string, number>(2, 60_000);
    cache.set("a", 1);
    cache.set("b", 2);
    expect(cache.get("a")).toBe(1);
    cache.set("c", 3);

    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe(1);
    expect(cache.get("c")).toBe(3);
    expect(cache.size).toBe(2);
  });

  it("expires entries after the ttl", () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const cache = new LRUCache<string, number>(5, 1_000);
    cache.set("a", 1);

    vi.setSystemTime(1_000);
    expect(cache.get("a")).toBe(1);
    vi.setSystemTime(2_001);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("rejects non-positive limits", () => {
    expect(() => new LRUCache(0, 1)).toThrow("LRUCache maxSize must be a positive number");
    expect(() => new LRUCache(1, 0)).toThrow("LRUCache ttlMs must be a positive number");
  });
});
