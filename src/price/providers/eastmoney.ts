import { isSixDigitCode, normalizeSymbol } from "../classify.js";
import { BROWSER_USER_AGENT } from "../http.js";
import type { FetchContext } from "../types.js";
import { isRecord, parseJson, parseNumericField } from "./parse.js";

const QUOTE_URL = "http://push2.eastmoney.com/api/qt/stock/get";
const UT = "fa5fd1943c7b386f172d6893dbfba10b";
const HEADERS = { "User-Agent": BROWSER_USER_AGENT, Referer: "http://quote.eastmoney.com/" };

// A-share f43 comes back in fen for most listings.
const SCALE_THRESHOLD = 1000;
const SCALE_FACTOR = 100;
// HK Connect f43 is always the HKD price times 1000.
const HK_CONNECT_SCALE = 1000;
const HK_CONNECT_MARKET = 128;

export type SecId = { market: number; code: string };

export function eastmoneySecId(symbol: string): SecId | null {
  let code = normalizeSymbol(symbol);
  let market = 1;
  if (code.startsWith("SH") || code.startsWith("SZ")) {
    market = code.startsWith("SH") ? 1 : 0;
    code = code.slice(2);
  } else if (code.startsWith("6")) {
    market = 1;
  }
  if (!isSixDigitCode(code)) return null;
  return { market, code };
}

export function eastmoneyQuoteUrl(secId: SecId): string {
  return `${QUOTE_URL}?secid=${secId.market}.${secId.code}&fields=f43&ut=${UT}`;
}

/** Raw `data.f43` of a push2 quote payload, unscaled. */
export function parseEastmoneyQuote(body: string): number | null {
  const payload = parseJson(body);
  if (!isRecord(payload)) return null;
  const data = payload.data;
  if (!isRecord(data)) return null;
  return parseNumericField(data.f43);
}

export async function fetchEastmoneyAShare(ctx: FetchContext, symbol: string): Promise<number | null> {
  const secId = eastmoneySecId(symbol);
  if (!secId) return null;
  const body = await ctx.http.get(eastmoneyQuoteUrl(secId), HEADERS);
  const price = parseEastmoneyQuote(body);
  if (price === null) return null;
  return price > SCALE_THRESHOLD ? price / SCALE_FACTOR : price;
}

/** Returns the HKD price; conversion to CNY is left to the caller. */
export async function fetchEastmoneyHKConnect(ctx: FetchContext, hkCode: string): Promise<number | null> {
  const url = eastmoneyQuoteUrl({ market: HK_CONNECT_MARKET, code: normalizeSymbol(hkCode) });
  const body = await ctx.http.get(url, HEADERS);
  const price = parseEastmoneyQuote(body);
  if (price === null) return null;
  return price / HK_CONNECT_SCALE;
}
