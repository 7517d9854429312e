import { logger as defaultLogger, type Logger } from "../logger.js";
import { PriceCache } from "./cache.js";
import { buildChain } from "./chain.js";
import { classify, normalizeQuery } from "./classify.js";
import {
  AllProvidersFailedError,
  CircuitOpenError,
  InvalidSymbolError,
  NoDataError,
  PriceError,
  TransportError,
  UnsupportedInstrumentError,
  errorMessage,
} from "./errors.js";
import { HealthTracker } from "./health.js";
import { FetchHttpClient, type HttpClient } from "./http.js";
import type { FetchContext, PriceAttempt, RateResolver, ResolutionResult } from "./types.js";

export const DEFAULT_USD_CNY_RATE = 7.2;
export const DEFAULT_HKD_CNY_RATE = 0.92;

export type PriceResolverOptions = {
  cacheTtlMs?: number;
  failThreshold?: number;
  failWindowMs?: number;
  cooldownMs?: number;
  httpTimeoutMs?: number;
  http?: HttpClient;
  usdToCnyRate?: number;
  hkdToCnyRate?: number;
  rateResolver?: RateResolver;
  chainBuilder?: ChainBuilder;
  logger?: Logger;
};

export type ChainBuilder = typeof buildChain;

/**
 * Resolves a price through the per-category provider chain. Providers are
 * asked one at a time and the first to answer wins; the cache and the
 * circuit breaker are only touched inside that loop.
 */
export class PriceResolver {
  private cache: PriceCache;
  private health: HealthTracker;
  private http: HttpClient;
  private logger: Logger;
  private fallbackRates: Record<string, number>;
  private rateResolver?: RateResolver;
  private chainBuilder: ChainBuilder;

  constructor(opts: PriceResolverOptions = {}) {
    this.cache = new PriceCache(opts.cacheTtlMs ?? 30_000);
    this.health = new HealthTracker({
      failThreshold: opts.failThreshold ?? 3,
      failWindowMs: opts.failWindowMs ?? 60_000,
      cooldownMs: opts.cooldownMs ?? 120_000,
    });
    this.http = opts.http ?? new FetchHttpClient(opts.httpTimeoutMs ?? 10_000);
    this.logger = opts.logger ?? defaultLogger;
    this.fallbackRates = {
      USD: positiveOr(opts.usdToCnyRate, DEFAULT_USD_CNY_RATE),
      HKD: positiveOr(opts.hkdToCnyRate, DEFAULT_HKD_CNY_RATE),
    };
    this.rateResolver = opts.rateResolver;
    this.chainBuilder = opts.chainBuilder ?? buildChain;
  }

  get healthTracker(): Pick<HealthTracker, "isAvailable" | "snapshot"> {
    return this.health;
  }

  async resolve(symbol: string, currency: string, assetType: string): Promise<ResolutionResult> {
    const query = normalizeQuery(symbol, currency, assetType);

    const cached = this.cache.get(query);
    if (cached) {
      return {
        ok: true,
        price: cached.price,
        source: cached.source,
        message: `价格获取成功 (缓存, 来源: ${cached.source})`,
        notes: [],
      };
    }

    const category = classify(query.symbol, query.currency, query.assetType);
    this.logger.info({ ...query, category }, "Fetching price");

    if (category === "bond") {
      const error = new UnsupportedInstrumentError("债券价格暂不支持自动获取");
      return { ok: false, message: error.message, error, notes: [] };
    }
    if (category === "cash") {
      return { ok: true, price: 1.0, source: "cash", message: "现金价格固定为 1.0", notes: [] };
    }
    if (category === "unknown") {
      const error = new InvalidSymbolError(query.symbol);
      return { ok: false, message: error.message, error, notes: [] };
    }

    const chain = this.chainBuilder(category, query.symbol, query.currency, query.assetType);
    const notes: string[] = [];
    for (const attempt of chain) {
      if (!this.health.isAvailable(attempt.name)) {
        notes.push(new CircuitOpenError(attempt.name).message);
        continue;
      }

      let price: number | null;
      try {
        price = await this.execute(attempt);
      } catch (err) {
        const failure = asPriceError(err);
        notes.push(`${attempt.name}: ${failure.message}`);
        const state = this.health.recordFailure(attempt.name);
        this.logger.warn(
          { err: failure, provider: attempt.name, symbol: query.symbol, failures: state.failureCount },
          "Price provider failed",
        );
        continue;
      }

      if (price === null) {
        notes.push(new NoDataError(attempt.name).message);
        const state = this.health.recordFailure(attempt.name);
        this.logger.info(
          { provider: attempt.name, symbol: query.symbol, failures: state.failureCount },
          "Price provider returned no data",
        );
        continue;
      }

      this.health.recordSuccess(attempt.name);
      this.cache.set(query, price, attempt.name);
      return {
        ok: true,
        price,
        source: attempt.name,
        message: `价格获取成功 (来源: ${attempt.name})`,
        notes,
      };
    }

    const detail = notes.length > 0 ? notes.join("; ") : "所有数据源均不可用";
    const message = `价格获取失败: ${detail}`;
    return { ok: false, message, error: new AllProvidersFailedError(message, [...notes]), notes };
  }

  private async execute(attempt: PriceAttempt): Promise<number | null> {
    const ctx: FetchContext = {
      http: this.http,
      rateToCny: (fromCurrency) => this.rateToCny(fromCurrency),
    };
    const price = await attempt.fetch(ctx, attempt.symbol, attempt.currency);
    if (price === null || !attempt.quoteCurrency) return price;
    const rate = await this.rateToCny(attempt.quoteCurrency);
    return price * rate;
  }

  async rateToCny(fromCurrency: string): Promise<number> {
    const currency = fromCurrency.trim().toUpperCase();
    if (currency === "CNY") return 1;
    const fallback = this.fallbackRates[currency];
    if (this.rateResolver) {
      try {
        const rate = await this.rateResolver(currency);
        if (Number.isFinite(rate) && rate > 0) return rate;
        this.logger.debug({ currency, rate, fallback }, "Rate resolver returned an unusable rate");
      } catch (err) {
        this.logger.debug({ err, currency, fallback }, "Rate resolver failed; using fallback rate");
      }
    }
    if (fallback === undefined) {
      throw new TransportError(`no exchange rate for ${currency}/CNY`);
    }
    return fallback;
  }
}

function positiveOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value > 0 ? value : fallback;
}

function asPriceError(err: unknown): PriceError {
  if (err instanceof PriceError) return err;
  return new TransportError(errorMessage(err), { cause: err });
}
