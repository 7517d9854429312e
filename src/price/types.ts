import type { HttpClient } from "./http.js";
import type { PriceError } from "./errors.js";

export type InstrumentCategory =
  | "a_share"
  | "etf"
  | "hk_connect"
  | "hk_stock"
  | "us_stock"
  | "gold"
  | "cash"
  | "bond"
  | "unknown";

export type PriceQuery = {
  symbol: string;
  currency: string;
  assetType: string;
};

export type ResolutionResult =
  | {
      ok: true;
      price: number;
      source: string;
      message: string;
      notes: string[];
    }
  | {
      ok: false;
      message: string;
      error: PriceError;
      notes: string[];
    };

/** Resolves how many CNY one unit of `fromCurrency` is worth. */
export type RateResolver = (fromCurrency: string) => Promise<number>;

export type FetchContext = {
  http: HttpClient;
  rateToCny: (fromCurrency: string) => Promise<number>;
};

/**
 * A provider fetch: a number on success, null when the provider answered but
 * had nothing usable, and a thrown error on transport or parse failure.
 */
export type ProviderFetch = (ctx: FetchContext, symbol: string, currency: string) => Promise<number | null>;

export type PriceAttempt = {
  name: string;
  category: InstrumentCategory;
  symbol: string;
  currency: string;
  fetch: ProviderFetch;
  // Set when the provider quotes in a foreign currency that must be converted to CNY.
  quoteCurrency?: string;
};

export type RefreshableSymbol = {
  symbol: string;
  assetType: string;
  autoUpdate: boolean;
  lastPriceUpdatedAt: string | null;
};

export type OperationLogEntry = {
  operation: "PRICE_UPDATE" | "PRICE_UPDATE_FAILED" | "MANUAL_PRICE_UPDATE";
  symbol: string;
  currency: string;
  details: string;
  priceFetched?: number;
};

export interface PriceStore {
  /** Every holding of the currency; an empty list means the currency has none. */
  listRefreshableSymbols(currency: string): RefreshableSymbol[];
  recordLatestPrice(symbol: string, currency: string, price: number): void;
  appendOperationLog(entry: OperationLogEntry): void;
}

export type RefreshSummary = {
  updated: number;
  errors: string[];
};
