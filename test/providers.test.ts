import { describe, expect, it } from "vitest";

import { ParseError } from "../src/price/errors.js";
import {
  eastmoneySecId,
  fetchEastmoneyAShare,
  fetchEastmoneyHKConnect,
  parseEastmoneyQuote,
} from "../src/price/providers/eastmoney.js";
import {
  fetchFundEstimate,
  parseFundEstimate,
  parseFundHistoryTable,
  parseNetWorthTrend,
} from "../src/price/providers/eastmoney_fund.js";
import { parseNumericField, splitQuotedFields } from "../src/price/providers/parse.js";
import { fetchSinaHKStock, fetchSinaUSStock, parseSinaField } from "../src/price/providers/sina.js";
import { fetchTencentAShare, fetchTencentHKStock, parseTencentQuote } from "../src/price/providers/tencent.js";
import {
  buildYahooSymbol,
  fetchYahooGold,
  fetchYahooStock,
  ouncePriceToCnyPerGram,
  parseYahooChart,
} from "../src/price/providers/yahoo.js";
import type { FetchContext } from "../src/price/types.js";
import { FakeHttp, eastmoneyQuote, yahooChart } from "./helpers.js";

function context(http: FakeHttp, usdRate = 7.2): FetchContext {
  return { http, rateToCny: async () => usdRate };
}

describe("parseNumericField", () => {
  it("reads numbers and numeric strings", () => {
    expect(parseNumericField(10.5)).toBe(10.5);
    expect(parseNumericField(" 10.50 ")).toBe(10.5);
  });

  it("maps placeholders to null", () => {
    for (const value of [null, undefined, "", "-", "--"]) {
      expect(parseNumericField(value)).toBeNull();
    }
  });

  it("rejects anything else", () => {
    expect(() => parseNumericField("abc")).toThrow(ParseError);
    expect(() => parseNumericField({})).toThrow("unsupported value type: object");
  });
});

describe("splitQuotedFields", () => {
  it("splits the quoted payload", () => {
    expect(splitQuotedFields('var hq_str_sh600000="a,b,c";')).toEqual(["a", "b", "c"]);
    expect(splitQuotedFields('var hq_str_sh600000="";')).toBeNull();
    expect(splitQuotedFields("no payload")).toBeNull();
  });
});

describe("Eastmoney", () => {
  it("builds the secid from the exchange", () => {
    expect(eastmoneySecId("600000")).toEqual({ market: 1, code: "600000" });
    expect(eastmoneySecId("sz000001")).toEqual({ market: 0, code: "000001" });
    expect(eastmoneySecId("AAPL")).toBeNull();
  });

  it("parses f43", () => {
    expect(parseEastmoneyQuote(eastmoneyQuote(1050))).toBe(1050);
    expect(parseEastmoneyQuote('{"rc":0,"data":null}')).toBeNull();
    expect(parseEastmoneyQuote(eastmoneyQuote("-"))).toBeNull();
    expect(() => parseEastmoneyQuote("<html>")).toThrow("invalid json");
  });

  it("scales large A-share quotes from fen", async () => {
    const http = new FakeHttp().on("secid=1.600000", eastmoneyQuote(1550));
    await expect(fetchEastmoneyAShare(context(http), "600000")).resolves.toBe(15.5);
    expect(http.requests[0]).toEqual({
      url: "http://push2.eastmoney.com/api/qt/stock/get?secid=1.600000&fields=f43&ut=fa5fd1943c7b386f172d6893dbfba10b",
      headers: { "User-Agent": "Mozilla/5.0", Referer: "http://quote.eastmoney.com/" },
    });
  });

  it("leaves small A-share quotes alone", async () => {
    const http = new FakeHttp().on("secid=0.000001", eastmoneyQuote(899));
    await expect(fetchEastmoneyAShare(context(http), "SZ000001")).resolves.toBe(899);
  });

  it("skips symbols without a six-digit code", async () => {
    const http = new FakeHttp();
    await expect(fetchEastmoneyAShare(context(http), "SHABC")).resolves.toBeNull();
    expect(http.urls).toEqual([]);
  });

  it("reads HK Connect quotes on market 128 in thousandths", async () => {
    const http = new FakeHttp().on("secid=128.00700", eastmoneyQuote(412600));
    await expect(fetchEastmoneyHKConnect(context(http), "00700")).resolves.toBe(412.6);
  });
});

describe("Eastmoney funds", () => {
  it("prefers the live estimate", () => {
    expect(parseFundEstimate('jsonpgz({"fundcode":"161725","dwjz":"1.2000","gsz":"1.2345"});')).toBe(1.2345);
  });

  it("falls back to the last NAV", () => {
    expect(parseFundEstimate('jsonpgz({"fundcode":"161725","dwjz":"1.2000","gsz":""});')).toBe(1.2);
  });

  it("treats an empty callback as no data", () => {
    expect(parseFundEstimate("jsonpgz();")).toBeNull();
    expect(parseFundEstimate("")).toBeNull();
  });

  it("reads the last net worth point in either shape", () => {
    const objects = 'var fS_name = "x";var Data_netWorthTrend = [{"x":1,"y":1.01},{"x":2,"y":1.02}];var other = [];';
    expect(parseNetWorthTrend(objects)).toBe(1.02);
    const pairs = "var Data_netWorthTrend = [[1,1.5],[2,1.6]];";
    expect(parseNetWorthTrend(pairs)).toBe(1.6);
    expect(parseNetWorthTrend("var Data_netWorthTrend = [];")).toBeNull();
    expect(parseNetWorthTrend("var nothing = 1;")).toBeNull();
  });

  it("reads the first row of the history table", () => {
    const html = '<table><tr><td>2024-05-10</td><td class="tor bold">1.2345</td><td>1.2345</td></tr></table>';
    expect(parseFundHistoryTable(html)).toBe(1.2345);
    expect(parseFundHistoryTable("<table></table>")).toBeNull();
  });

  it("requests the estimate with the fund referer", async () => {
    const http = new FakeHttp().on("fundgz.1234567.com.cn", 'jsonpgz({"gsz":"0.9876"});');
    await expect(fetchFundEstimate(context(http), "161725")).resolves.toBe(0.9876);
    expect(http.requests[0]).toEqual({
      url: "http://fundgz.1234567.com.cn/js/161725.js",
      headers: { "User-Agent": "Mozilla/5.0", Referer: "http://fund.eastmoney.com/" },
    });
  });
});

describe("Yahoo Finance", () => {
  it("maps symbols to Yahoo tickers", () => {
    expect(buildYahooSymbol("600000", "CNY")).toBe("600000.SS");
    expect(buildYahooSymbol("SZ000001", "CNY")).toBe("000001.SZ");
    expect(buildYahooSymbol("700", "HKD")).toBe("0700.HK");
    expect(buildYahooSymbol("HK9988", "HKD")).toBe("9988.HK");
    expect(buildYahooSymbol("aapl", "USD")).toBe("AAPL");
  });

  it("prefers the market price over the last close", () => {
    expect(parseYahooChart(yahooChart(187.5))).toBe(187.5);
    const closes = JSON.stringify({
      chart: { result: [{ meta: { regularMarketPrice: 0 }, indicators: { quote: [{ close: [1, 2, 3.5] }] } }] },
    });
    expect(parseYahooChart(closes)).toBe(3.5);
    expect(parseYahooChart('{"chart":{"result":null}}')).toBeNull();
  });

  it("falls back to the last close when the market price is malformed", () => {
    for (const bad of [true, { raw: 187.5 }, "n/a"]) {
      const body = JSON.stringify({
        chart: { result: [{ meta: { regularMarketPrice: bad }, indicators: { quote: [{ close: [180, 186.25] }] } }] },
      });
      expect(parseYahooChart(body)).toBe(186.25);
    }
  });

  it("requests the chart endpoint", async () => {
    const http = new FakeHttp().on("/chart/AAPL?", yahooChart(187.5));
    await expect(fetchYahooStock(context(http), "aapl", "USD")).resolves.toBe(187.5);
    expect(http.urls).toEqual(["https://query1.finance.yahoo.com/v8/finance/chart/AAPL?interval=1d&range=1d"]);
  });

  it("converts gold to CNY per gram", async () => {
    const http = new FakeHttp().on("/chart/GC=F?", yahooChart(2000));
    const expected = Math.round((2000 / 31.1035) * 7.2 * 100) / 100;
    await expect(fetchYahooGold(context(http, 7.2))).resolves.toBe(expected);
    expect(ouncePriceToCnyPerGram(2000, 7.2)).toBe(expected);
  });

  it("treats a missing gold quote as no data", async () => {
    const http = new FakeHttp().on("/chart/GC=F?", '{"chart":{"result":[]}}');
    await expect(fetchYahooGold(context(http))).resolves.toBeNull();
  });
});

describe("Sina Finance", () => {
  it("reads the field for the market", () => {
    const aShare = 'var hq_str_sh600000="浦发银行,10.20,10.15,10.33,10.40";';
    expect(parseSinaField(aShare, 3)).toBe(10.33);
    expect(parseSinaField(aShare, 9)).toBeNull();
    expect(parseSinaField('var hq_str_sh600000="";', 3)).toBeNull();
  });

  it("uses the gb_ list for US tickers", async () => {
    const http = new FakeHttp().on("list=gb_aapl", 'var hq_str_gb_aapl="苹果,187.5000,0.52";');
    await expect(fetchSinaUSStock(context(http), "AAPL")).resolves.toBe(187.5);
    expect(http.requests[0]?.headers).toEqual({ Referer: "http://finance.sina.com.cn" });
  });

  it("pads HK codes to five digits", async () => {
    const http = new FakeHttp().on("list=hk00700", 'var hq_str_hk00700="TENCENT,腾讯控股,410.0,405.0,415.0,409.0,412.6";');
    await expect(fetchSinaHKStock(context(http), "700")).resolves.toBe(412.6);
  });
});

describe("Tencent Finance", () => {
  it("reads the fourth ~ field", () => {
    expect(parseTencentQuote('v_sh600000="1~浦发银行~600000~10.33~10.15";')).toBe(10.33);
    expect(parseTencentQuote('v_pv_none_match="1";')).toBeNull();
  });

  it("prefixes the exchange", async () => {
    const http = new FakeHttp()
      .on("q=sz000001", 'v_sz000001="51~平安银行~000001~11.02~10.98";')
      .on("q=hk00700", 'v_hk00700="100~腾讯控股~00700~412.60~409.00";');
    await expect(fetchTencentAShare(context(http), "000001")).resolves.toBe(11.02);
    await expect(fetchTencentHKStock(context(http), "700")).resolves.toBe(412.6);
    expect(http.urls).toEqual(["http://qt.gtimg.cn/q=sz000001", "http://qt.gtimg.cn/q=hk00700"]);
  });
});
