import type { PriceQuery } from "./types.js";

export type CacheEntry = {
  price: number;
  source: string;
  observedAt: number;
};

export function cacheKey(query: PriceQuery): string {
  return `${query.symbol}|${query.currency}|${query.assetType}`;
}

/**
 * TTL price cache. Entries are never evicted; a stale one is ignored on read
 * and replaced by the next successful fetch.
 */
export class PriceCache {
  private entries = new Map<string, CacheEntry>();

  constructor(private ttlMs: number) {}

  get(query: PriceQuery): CacheEntry | null {
    const entry = this.entries.get(cacheKey(query));
    if (!entry) return null;
    if (Date.now() - entry.observedAt > this.ttlMs) return null;
    return { ...entry };
  }

  set(query: PriceQuery, price: number, source: string): void {
    this.entries.set(cacheKey(query), { price, source, observedAt: Date.now() });
  }

  get size(): number {
    return this.entries.size;
  }
}
