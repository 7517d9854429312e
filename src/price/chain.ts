import { fetchEastmoneyAShare, fetchEastmoneyHKConnect } from "./providers/eastmoney.js";
import { fetchFundEstimate, fetchFundHistory, fetchFundNetWorth } from "./providers/eastmoney_fund.js";
import { fetchSinaAShare, fetchSinaHKStock, fetchSinaUSStock } from "./providers/sina.js";
import { fetchTencentAShare, fetchTencentHKStock, fetchTencentUSStock } from "./providers/tencent.js";
import { fetchYahooGold, fetchYahooStock } from "./providers/yahoo.js";
import type { InstrumentCategory, PriceAttempt, ProviderFetch } from "./types.js";

type ProviderEntry = {
  name: string;
  fetch: ProviderFetch;
};

const EASTMONEY: ProviderEntry = { name: "Eastmoney", fetch: fetchEastmoneyAShare };
const EASTMONEY_FUND: ProviderEntry = { name: "Eastmoney Fund", fetch: fetchFundEstimate };
const TENCENT_A: ProviderEntry = { name: "Tencent Finance", fetch: fetchTencentAShare };
const SINA_A: ProviderEntry = { name: "Sina Finance", fetch: fetchSinaAShare };
const YAHOO: ProviderEntry = { name: "Yahoo Finance", fetch: fetchYahooStock };

const A_SHARE_EQUITY_FIRST = [EASTMONEY, TENCENT_A, SINA_A, EASTMONEY_FUND, YAHOO];
const A_SHARE_FUND_FIRST = [EASTMONEY_FUND, EASTMONEY, TENCENT_A, SINA_A, YAHOO];

const ETF: ProviderEntry[] = [
  { name: "Eastmoney Fund GZ", fetch: fetchFundEstimate },
  { name: "Eastmoney Fund PZ", fetch: fetchFundNetWorth },
  { name: "Eastmoney Fund LSJZ", fetch: fetchFundHistory },
  EASTMONEY,
];

const HK_CONNECT: ProviderEntry[] = [
  { name: "Eastmoney HK Connect", fetch: fetchEastmoneyHKConnect },
  { name: "Yahoo Finance (HK Connect)", fetch: fetchYahooStock },
  { name: "Sina Finance (HK Connect)", fetch: fetchSinaHKStock },
  { name: "Tencent Finance (HK Connect)", fetch: fetchTencentHKStock },
];

const HK_STOCK: ProviderEntry[] = [
  YAHOO,
  { name: "Sina Finance", fetch: fetchSinaHKStock },
  { name: "Tencent Finance", fetch: fetchTencentHKStock },
];

const US_STOCK: ProviderEntry[] = [
  YAHOO,
  { name: "Sina Finance", fetch: fetchSinaUSStock },
  { name: "Tencent Finance", fetch: fetchTencentUSStock },
];

const GOLD: ProviderEntry[] = [{ name: "Yahoo Finance", fetch: fetchYahooGold }];

/** A non-stock hint on an A-share code means the caller knows it is really a fund. */
export function preferFundFirst(assetType: string): boolean {
  const hint = assetType.trim().toLowerCase();
  return hint !== "" && hint !== "stock";
}

/** "H00700" -> "00700" */
export function hkConnectToHKCode(symbol: string): string {
  if (symbol.length > 1 && (symbol[0] === "H" || symbol[0] === "h")) {
    return symbol.slice(1);
  }
  return symbol;
}

function attempts(
  category: InstrumentCategory,
  entries: ProviderEntry[],
  symbol: string,
  currency: string,
  quoteCurrency?: string,
): PriceAttempt[] {
  return entries.map((entry) => ({
    name: entry.name,
    category,
    symbol,
    currency,
    fetch: entry.fetch,
    ...(quoteCurrency ? { quoteCurrency } : {}),
  }));
}

export function buildChain(
  category: InstrumentCategory,
  symbol: string,
  currency: string,
  assetType: string,
): PriceAttempt[] {
  switch (category) {
    case "a_share":
      return attempts(
        category,
        preferFundFirst(assetType) ? A_SHARE_FUND_FIRST : A_SHARE_EQUITY_FIRST,
        symbol,
        currency,
      );
    case "etf":
      return attempts(category, ETF, symbol, currency);
    case "hk_connect":
      // Connect listings quote in HKD; every entry is converted back to CNY.
      return attempts(category, HK_CONNECT, hkConnectToHKCode(symbol), "HKD", "HKD");
    case "hk_stock":
      return attempts(category, HK_STOCK, symbol, currency);
    case "us_stock":
      return attempts(category, US_STOCK, symbol, currency);
    case "gold":
      return attempts(category, GOLD, symbol, currency);
    case "bond":
    case "cash":
    case "unknown":
      return [];
  }
}
