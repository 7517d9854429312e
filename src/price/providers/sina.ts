import { normalizeSymbol } from "../classify.js";
import type { FetchContext } from "../types.js";
import { padCode, parseNumericField, splitQuotedFields } from "./parse.js";

const HEADERS = { Referer: "http://finance.sina.com.cn" };

// Position of the last price in each market's comma-separated record.
const A_SHARE_FIELD = 3;
const HK_FIELD = 6;
const US_FIELD = 1;

export function exchangePrefix(symbol: string): { prefix: string; code: string } {
  const code = normalizeSymbol(symbol);
  if (code.startsWith("SH") || code.startsWith("SZ")) {
    return { prefix: code.slice(0, 2).toLowerCase(), code: code.slice(2) };
  }
  return { prefix: code.startsWith("6") ? "sh" : "sz", code };
}

export function parseSinaField(body: string, index: number): number | null {
  const fields = splitQuotedFields(body);
  if (!fields || fields.length <= index) return null;
  return parseNumericField(fields[index]);
}

async function fetchSina(ctx: FetchContext, listCode: string, index: number): Promise<number | null> {
  const body = await ctx.http.get(`http://hq.sinajs.cn/list=${listCode}`, HEADERS);
  return parseSinaField(body, index);
}

export async function fetchSinaAShare(ctx: FetchContext, symbol: string): Promise<number | null> {
  const { prefix, code } = exchangePrefix(symbol);
  return fetchSina(ctx, `${prefix}${code}`, A_SHARE_FIELD);
}

export async function fetchSinaHKStock(ctx: FetchContext, symbol: string): Promise<number | null> {
  return fetchSina(ctx, `hk${padCode(normalizeSymbol(symbol), 5)}`, HK_FIELD);
}

export async function fetchSinaUSStock(ctx: FetchContext, symbol: string): Promise<number | null> {
  return fetchSina(ctx, `gb_${symbol.trim().toLowerCase()}`, US_FIELD);
}
