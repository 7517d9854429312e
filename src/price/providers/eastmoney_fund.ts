import { isSixDigitCode, normalizeSymbol } from "../classify.js";
import { ParseError } from "../errors.js";
import { BROWSER_USER_AGENT } from "../http.js";
import type { FetchContext } from "../types.js";
import { isRecord, parseJson, parseNumericField } from "./parse.js";

const HEADERS = { "User-Agent": BROWSER_USER_AGENT, Referer: "http://fund.eastmoney.com/" };
const NET_WORTH_MARKER = "var Data_netWorthTrend =";
const LSJZ_ROW = /<td[^>]*>\d{4}-\d{2}-\d{2}<\/td>\s*<td[^>]*>([\d.]+)<\/td>/;

/** `jsonpgz({...});` estimate payload: live estimate `gsz`, else last NAV `dwjz`. */
export function parseFundEstimate(body: string): number | null {
  const start = body.indexOf("(");
  const end = body.lastIndexOf(")");
  if (start === -1 || end === -1 || end <= start) return null;
  const inner = body.slice(start + 1, end).trim();
  if (!inner) return null;
  const data = parseJson(inner);
  if (!isRecord(data)) return null;
  const estimate = parseNumericField(data.gsz);
  if (estimate !== null) return estimate;
  return parseNumericField(data.dwjz);
}

/** Last point of the `Data_netWorthTrend` array in a pingzhongdata script. */
export function parseNetWorthTrend(body: string): number | null {
  const idx = body.indexOf(NET_WORTH_MARKER);
  if (idx === -1) return null;
  const tail = body.slice(idx);
  const open = tail.indexOf("[");
  const close = tail.indexOf("];");
  if (open === -1 || close === -1 || close < open) return null;

  const points = parseJson(tail.slice(open, close + 1));
  if (!Array.isArray(points)) throw new ParseError("net worth trend is not an array");
  if (points.length === 0) return null;

  const last: unknown = points[points.length - 1];
  if (isRecord(last)) return parseNumericField(last.y);
  if (Array.isArray(last) && last.length >= 2) return parseNumericField(last[1]);
  return null;
}

export function parseFundHistoryTable(body: string): number | null {
  const match = body.match(LSJZ_ROW);
  if (!match) return null;
  return parseNumericField(match[1]);
}

function fundCode(symbol: string): string | null {
  const code = normalizeSymbol(symbol);
  return isSixDigitCode(code) ? code : null;
}

export async function fetchFundEstimate(ctx: FetchContext, symbol: string): Promise<number | null> {
  const code = fundCode(symbol);
  if (!code) return null;
  const body = await ctx.http.get(`http://fundgz.1234567.com.cn/js/${code}.js`, HEADERS);
  return parseFundEstimate(body);
}

export async function fetchFundNetWorth(ctx: FetchContext, symbol: string): Promise<number | null> {
  const code = fundCode(symbol);
  if (!code) return null;
  const body = await ctx.http.get(`http://fund.eastmoney.com/pingzhongdata/${code}.js`, HEADERS);
  return parseNetWorthTrend(body);
}

export async function fetchFundHistory(ctx: FetchContext, symbol: string): Promise<number | null> {
  const code = fundCode(symbol);
  if (!code) return null;
  const url = `http://fund.eastmoney.com/f10/F10DataApi.aspx?type=lsjz&code=${code}&page=1&per=1`;
  const body = await ctx.http.get(url, HEADERS);
  return parseFundHistoryTable(body);
}
