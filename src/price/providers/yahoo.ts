import { isSixDigitCode, normalizeCurrency, normalizeSymbol } from "../classify.js";
import { BROWSER_USER_AGENT } from "../http.js";
import type { FetchContext } from "../types.js";
import { isRecord, parseJson, parseNumericField } from "./parse.js";

const CHART_URL = "https://query1.finance.yahoo.com/v8/finance/chart";
const GOLD_FUTURES = "GC=F";
export const GRAMS_PER_TROY_OUNCE = 31.1035;

export function buildYahooSymbol(symbol: string, currency: string): string {
  let code = normalizeSymbol(symbol);
  const cur = normalizeCurrency(currency);
  if (cur === "CNY") {
    if (code.startsWith("SH") || code.startsWith("SZ")) {
      code = code.slice(2);
    }
    if (code.startsWith("6")) return `${code}.SS`;
    if (isSixDigitCode(code)) return `${code}.SZ`;
    return code;
  }
  if (cur === "HKD") {
    if (code.startsWith("HK")) code = code.slice(2);
    return `${code.padStart(4, "0")}.HK`;
  }
  return code;
}

export function parseYahooChart(body: string): number | null {
  const payload = parseJson(body);
  if (!isRecord(payload) || !isRecord(payload.chart)) return null;
  const results = payload.chart.result;
  if (!Array.isArray(results) || results.length === 0) return null;
  const result: unknown = results[0];
  if (!isRecord(result)) return null;

  // A malformed market price is skipped in favour of the last close.
  if (isRecord(result.meta)) {
    const market = result.meta.regularMarketPrice;
    if (typeof market === "number" && Number.isFinite(market) && market > 0) return market;
  }

  if (!isRecord(result.indicators)) return null;
  const quotes = result.indicators.quote;
  if (!Array.isArray(quotes) || quotes.length === 0) return null;
  const quote: unknown = quotes[0];
  if (!isRecord(quote) || !Array.isArray(quote.close) || quote.close.length === 0) return null;
  return parseNumericField(quote.close[quote.close.length - 1]);
}

export async function fetchYahooStock(ctx: FetchContext, symbol: string, currency: string): Promise<number | null> {
  const yahooSymbol = buildYahooSymbol(symbol, currency);
  if (!yahooSymbol) return null;
  const url = `${CHART_URL}/${yahooSymbol}?interval=1d&range=1d`;
  const body = await ctx.http.get(url, { "User-Agent": BROWSER_USER_AGENT });
  return parseYahooChart(body);
}

export function ouncePriceToCnyPerGram(pricePerOunce: number, usdToCny: number): number {
  return Math.round((pricePerOunce / GRAMS_PER_TROY_OUNCE) * usdToCny * 100) / 100;
}

/** COMEX gold in USD per troy ounce, returned as CNY per gram. */
export async function fetchYahooGold(ctx: FetchContext): Promise<number | null> {
  const perOunce = await fetchYahooStock(ctx, GOLD_FUTURES, "USD");
  if (perOunce === null || perOunce <= 0) return null;
  const rate = await ctx.rateToCny("USD");
  return ouncePriceToCnyPerGram(perOunce, rate);
}
