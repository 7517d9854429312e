import { logger } from "../logger.js";
import { errorMessage } from "../price/errors.js";
import type { HttpClient } from "../price/http.js";
import { isRecord, parseJson } from "../price/providers/parse.js";
import type { RateResolver } from "../price/types.js";
import { getRateToCNY, setExchangeRate } from "../store/db.js";

export const REFRESHED_PAIRS: Array<[string, string]> = [
  ["USD", "CNY"],
  ["HKD", "CNY"],
];

const HEADERS = { "User-Agent": "quotechain/1.0" };

type RateProvider = {
  name: string;
  fetch: (http: HttpClient, from: string, to: string) => Promise<number>;
};

function readRate(payload: unknown, to: string): number {
  if (!isRecord(payload) || !isRecord(payload.rates)) {
    throw new Error("rates missing in response");
  }
  const rate = payload.rates[to];
  if (typeof rate !== "number" || !(rate > 0)) {
    throw new Error("rate missing in response");
  }
  return rate;
}

const PROVIDERS: RateProvider[] = [
  {
    name: "frankfurter",
    fetch: async (http, from, to) => {
      const body = await http.get(`https://api.frankfurter.app/latest?from=${from}&to=${to}`, HEADERS);
      return readRate(parseJson(body), to);
    },
  },
  {
    name: "open_er_api",
    fetch: async (http, from, to) => {
      const body = await http.get(`https://open.er-api.com/v6/latest/${from}`, HEADERS);
      const payload = parseJson(body);
      if (isRecord(payload) && typeof payload.result === "string" && payload.result.toLowerCase() !== "success") {
        throw new Error(`provider status: ${payload.result}`);
      }
      return readRate(payload, to);
    },
  },
];

export async function fetchExchangeRate(
  http: HttpClient,
  from: string,
  to: string,
): Promise<{ rate: number; provider: string }> {
  const errors: string[] = [];
  for (const provider of PROVIDERS) {
    try {
      const rate = await provider.fetch(http, from, to);
      return { rate, provider: provider.name };
    } catch (err) {
      errors.push(`${provider.name}: ${errorMessage(err)}`);
    }
  }
  throw new Error(`all providers failed (${errors.join("; ")})`);
}

export async function refreshExchangeRates(http: HttpClient): Promise<{ updated: number; errors: string[] }> {
  let updated = 0;
  const errors: string[] = [];
  for (const [from, to] of REFRESHED_PAIRS) {
    try {
      const { rate, provider } = await fetchExchangeRate(http, from, to);
      setExchangeRate(from, to, rate, "auto_fetch");
      logger.info({ from, to, rate, provider }, "Exchange rate refreshed");
      updated += 1;
    } catch (err) {
      errors.push(`${from}/${to}: ${errorMessage(err)}`);
    }
  }
  return { updated, errors };
}

/** Rates maintained in the store, refreshed above or set by hand. */
export const storeRateResolver: RateResolver = async (fromCurrency) => getRateToCNY(fromCurrency);
