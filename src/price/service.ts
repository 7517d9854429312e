import { logger as defaultLogger, type Logger } from "../logger.js";
import { normalizeCurrency, normalizeSymbol } from "./classify.js";
import { InvalidPriceError, NoHoldingsError, PriceError, errorMessage } from "./errors.js";
import { runPool } from "./pool.js";
import type { PriceResolver } from "./resolver.js";
import type { OperationLogEntry, PriceStore, RefreshSummary, RefreshableSymbol, ResolutionResult } from "./types.js";

export type PriceServiceOptions = {
  resolver: PriceResolver;
  store: PriceStore;
  refreshWorkers?: number;
  recentUpdateMs?: number;
  logger?: Logger;
};

type UpdateOutcome = {
  symbol: string;
  updated: boolean;
  message: string;
  error?: PriceError;
};

/** Parses a SQLite `CURRENT_TIMESTAMP` (UTC, `YYYY-MM-DD HH:MM:SS`). */
export function parseStoreTimestamp(value: string | null): number | null {
  if (!value) return null;
  const match = value.trim().match(/^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2}:\d{2})$/);
  if (!match) return null;
  const ms = Date.parse(`${match[1]}T${match[2]}Z`);
  return Number.isNaN(ms) ? null : ms;
}

export function recentlyUpdated(updatedAt: string | null, windowMs: number, now = Date.now()): boolean {
  const ts = parseStoreTimestamp(updatedAt);
  if (ts === null) return false;
  return now - ts < windowMs;
}

export class PriceService {
  private resolver: PriceResolver;
  private store: PriceStore;
  private refreshWorkers: number;
  private recentUpdateMs: number;
  private logger: Logger;

  constructor(opts: PriceServiceOptions) {
    this.resolver = opts.resolver;
    this.store = opts.store;
    this.refreshWorkers = opts.refreshWorkers ?? 4;
    this.recentUpdateMs = opts.recentUpdateMs ?? 5 * 60_000;
    this.logger = opts.logger ?? defaultLogger;
  }

  resolve(symbol: string, currency: string, assetType: string): Promise<ResolutionResult> {
    return this.resolver.resolve(symbol, currency, assetType);
  }

  async updatePrice(symbol: string, currency: string, assetType: string): Promise<ResolutionResult> {
    const result = await this.resolver.resolve(symbol, currency, assetType);
    const code = normalizeSymbol(symbol);
    const cur = normalizeCurrency(currency);
    if (result.ok) {
      this.store.recordLatestPrice(code, cur, result.price);
      this.log({
        operation: "PRICE_UPDATE",
        symbol: code,
        currency: cur,
        details: result.message,
        priceFetched: result.price,
      });
      return result;
    }
    this.log({ operation: "PRICE_UPDATE_FAILED", symbol: code, currency: cur, details: result.message });
    return result;
  }

  applyManualOverride(symbol: string, currency: string, price: number): void {
    if (!Number.isFinite(price) || price <= 0) {
      throw new InvalidPriceError(price);
    }
    const code = normalizeSymbol(symbol);
    const cur = normalizeCurrency(currency);
    this.store.recordLatestPrice(code, cur, price);
    this.log({
      operation: "MANUAL_PRICE_UPDATE",
      symbol: code,
      currency: cur,
      details: "Manual price update",
      priceFetched: price,
    });
  }

  async refreshAll(currency: string): Promise<RefreshSummary> {
    const cur = normalizeCurrency(currency);
    const holdings = this.store.listRefreshableSymbols(cur);
    if (holdings.length === 0) {
      throw new NoHoldingsError(cur);
    }

    const now = Date.now();
    const jobs = holdings.filter(
      (item) => item.autoUpdate && !recentlyUpdated(item.lastPriceUpdatedAt, this.recentUpdateMs, now),
    );
    if (jobs.length === 0) {
      return { updated: 0, errors: [] };
    }

    const outcomes = await runPool(jobs, this.refreshWorkers, (job) => this.refreshOne(job, cur));

    let updated = 0;
    const errors: string[] = [];
    for (const outcome of outcomes) {
      if (outcome.updated) {
        updated += 1;
      } else {
        errors.push(`${outcome.symbol}: ${outcome.message}`);
      }
    }
    this.logger.info(
      { currency: cur, candidates: holdings.length, jobs: jobs.length, updated, failed: errors.length },
      "Price refresh finished",
    );
    return { updated, errors };
  }

  private async refreshOne(job: RefreshableSymbol, currency: string): Promise<UpdateOutcome> {
    try {
      const result = await this.updatePrice(job.symbol, currency, job.assetType);
      if (result.ok) {
        return { symbol: job.symbol, updated: true, message: result.message };
      }
      return { symbol: job.symbol, updated: false, message: result.message, error: result.error };
    } catch (err) {
      // A store write failing for one symbol must not stop the others.
      this.logger.error({ err, symbol: job.symbol, currency }, "Price update failed");
      return { symbol: job.symbol, updated: false, message: errorMessage(err) };
    }
  }

  private log(entry: OperationLogEntry): void {
    try {
      this.store.appendOperationLog(entry);
    } catch (err) {
      this.logger.warn({ err, operation: entry.operation, symbol: entry.symbol }, "Operation log write failed");
    }
  }
}
