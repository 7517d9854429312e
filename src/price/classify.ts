import type { InstrumentCategory, PriceQuery } from "./types.js";

const SIX_DIGIT = /^\d{6}$/;
const HK_STOCK = /^0\d{4}$/;
const HK_CONNECT = /^H\d{5}$/;
const US_TICKER = /^[A-Z]+$/;

// Shenzhen main board & SME, ChiNext, Shanghai main board, STAR market.
export const A_SHARE_PREFIXES = [
  "000", "001", "002", "003",
  "300", "301",
  "600", "601", "603", "605",
  "688", "689",
];

// Shanghai ETF/LOF, then Shenzhen ETF/LOF.
export const ETF_LOF_PREFIXES = [
  "510", "513", "588", "501", "502",
  "159", "160", "161", "162", "163", "164", "165", "166",
];

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export function normalizeCurrency(currency: string): string {
  return currency.trim().toUpperCase();
}

export function normalizeAssetType(assetType: string): string {
  return assetType.trim().toLowerCase() || "stock";
}

export function normalizeQuery(symbol: string, currency: string, assetType: string): PriceQuery {
  return {
    symbol: normalizeSymbol(symbol),
    currency: normalizeCurrency(currency),
    assetType: normalizeAssetType(assetType),
  };
}

function hasAnyPrefix(value: string, prefixes: string[]): boolean {
  return prefixes.some((prefix) => value.startsWith(prefix));
}

/**
 * Maps a symbol to the category that decides which providers are asked for
 * its price. Rules are checked in order and the first match wins, so a
 * six-digit CNY code never reaches the ticker rule and the gold, cash and
 * bond markers are seen before the USD catch-all.
 */
export function classify(symbol: string, currency: string, assetType: string): InstrumentCategory {
  const query = normalizeQuery(symbol, currency, assetType);
  const code = query.symbol;

  if (code.startsWith("SH") || code.startsWith("SZ")) {
    return "a_share";
  }

  if (query.currency === "CNY" && SIX_DIGIT.test(code)) {
    if (query.assetType === "etf" || query.assetType === "fund") return "etf";
    if (hasAnyPrefix(code, ETF_LOF_PREFIXES)) return "etf";
    if (hasAnyPrefix(code, A_SHARE_PREFIXES)) return "a_share";
    // Most unlisted six-digit codes are OTC funds.
    return "etf";
  }

  if (HK_CONNECT.test(code)) return "hk_connect";
  if (query.currency === "HKD" || HK_STOCK.test(code)) return "hk_stock";
  if (code.includes("AU") || code.includes("GOLD")) return "gold";
  if (code === "CASH") return "cash";
  if (query.currency === "USD" || US_TICKER.test(code)) return "us_stock";
  if (code.includes("BOND")) return "bond";
  return "unknown";
}

export function isSixDigitCode(code: string): boolean {
  return SIX_DIGIT.test(code);
}
