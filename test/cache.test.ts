import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { PriceCache, cacheKey } from "../src/price/cache.js";

const query = { symbol: "AAPL", currency: "USD", assetType: "stock" };

describe("PriceCache", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2024-05-10T08:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("keys by symbol, currency and asset type", () => {
    expect(cacheKey(query)).toBe("AAPL|USD|stock");
  });

  it("returns an entry until the TTL has passed", () => {
    const cache = new PriceCache(30_000);
    cache.set(query, 187.5, "Yahoo Finance");

    vi.advanceTimersByTime(30_000);
    expect(cache.get(query)).toEqual({ price: 187.5, source: "Yahoo Finance", observedAt: Date.now() - 30_000 });

    vi.advanceTimersByTime(1);
    expect(cache.get(query)).toBeNull();
    expect(cache.size).toBe(1);
  });

  it("does not share entries across asset types", () => {
    const cache = new PriceCache(30_000);
    cache.set(query, 187.5, "Yahoo Finance");
    expect(cache.get({ ...query, assetType: "etf" })).toBeNull();
  });

  it("hands out copies", () => {
    const cache = new PriceCache(30_000);
    cache.set(query, 187.5, "Yahoo Finance");
    const entry = cache.get(query);
    if (entry) entry.price = 1;
    expect(cache.get(query)?.price).toBe(187.5);
  });

  it("replaces a stale entry on the next write", () => {
    const cache = new PriceCache(1_000);
    cache.set(query, 100, "Yahoo Finance");
    vi.advanceTimersByTime(5_000);
    cache.set(query, 101, "Sina Finance");
    expect(cache.get(query)?.source).toBe("Sina Finance");
    expect(cache.size).toBe(1);
  });
});
