import { normalizeSymbol } from "../classify.js";
import { BROWSER_USER_AGENT } from "../http.js";
import type { FetchContext } from "../types.js";
import { padCode, parseNumericField } from "./parse.js";
import { exchangePrefix } from "./sina.js";

const PRICE_FIELD = 3;

/** `v_sh600000="1~name~600000~10.50~..."`: the price is the fourth `~` field. */
export function parseTencentQuote(body: string): number | null {
  const parts = body.split("~");
  if (parts.length <= PRICE_FIELD) return null;
  return parseNumericField(parts[PRICE_FIELD]);
}

async function fetchTencent(ctx: FetchContext, code: string): Promise<number | null> {
  const body = await ctx.http.get(`http://qt.gtimg.cn/q=${code}`, { "User-Agent": BROWSER_USER_AGENT });
  return parseTencentQuote(body);
}

export async function fetchTencentAShare(ctx: FetchContext, symbol: string): Promise<number | null> {
  const { prefix, code } = exchangePrefix(symbol);
  return fetchTencent(ctx, `${prefix}${code}`);
}

export async function fetchTencentHKStock(ctx: FetchContext, symbol: string): Promise<number | null> {
  return fetchTencent(ctx, `hk${padCode(normalizeSymbol(symbol), 5)}`);
}

export async function fetchTencentUSStock(ctx: FetchContext, symbol: string): Promise<number | null> {
  return fetchTencent(ctx, `us${normalizeSymbol(symbol)}`);
}
