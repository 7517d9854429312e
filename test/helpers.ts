import pino from "pino";

import { TransportError } from "../src/price/errors.js";
import type { HttpClient } from "../src/price/http.js";
import type { OperationLogEntry, PriceStore, RefreshableSymbol } from "../src/price/types.js";

export const silentLogger = pino({ level: "silent" });

type Route = { match: string; body?: string; error?: Error };

export type RecordedRequest = { url: string; headers: Record<string, string> };

/** Answers by the first route whose `match` is a substring of the URL. */
export class FakeHttp implements HttpClient {
  readonly requests: RecordedRequest[] = [];
  private routes: Route[] = [];

  on(match: string, body: string): this {
    this.routes.push({ match, body });
    return this;
  }

  fail(match: string, error: Error): this {
    this.routes.push({ match, error });
    return this;
  }

  get urls(): string[] {
    return this.requests.map((req) => req.url);
  }

  async get(url: string, headers: Record<string, string> = {}): Promise<string> {
    this.requests.push({ url, headers });
    const route = this.routes.find((r) => url.includes(r.match));
    if (!route) throw new TransportError("http status 404");
    if (route.error) throw route.error;
    return route.body ?? "";
  }
}

export type RecordedPrice = { symbol: string; currency: string; price: number };

export class MemoryStore implements PriceStore {
  readonly prices: RecordedPrice[] = [];
  readonly logs: OperationLogEntry[] = [];
  failLogs = false;

  constructor(private holdings: Record<string, RefreshableSymbol[]> = {}) {}

  listRefreshableSymbols(currency: string): RefreshableSymbol[] {
    return this.holdings[currency] ?? [];
  }

  recordLatestPrice(symbol: string, currency: string, price: number): void {
    this.prices.push({ symbol, currency, price });
  }

  appendOperationLog(entry: OperationLogEntry): void {
    if (this.failLogs) throw new Error("disk full");
    this.logs.push(entry);
  }
}

export function holding(symbol: string, overrides: Partial<RefreshableSymbol> = {}): RefreshableSymbol {
  return { symbol, assetType: "stock", autoUpdate: true, lastPriceUpdatedAt: null, ...overrides };
}

export function yahooChart(price: number): string {
  return JSON.stringify({ chart: { result: [{ meta: { regularMarketPrice: price } }] } });
}

export function eastmoneyQuote(f43: number | string): string {
  return JSON.stringify({ rc: 0, data: { f43 } });
}

/** SQLite `CURRENT_TIMESTAMP` format for a moment `ago` ms in the past. */
export function sqliteTimestamp(agoMs: number): string {
  return new Date(Date.now() - agoMs).toISOString().slice(0, 19).replace("T", " ");
}
