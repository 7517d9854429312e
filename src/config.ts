import "./env.js";
import path from "path";

export const PROJECT_ROOT = process.cwd();
export const DATA_DIR = path.resolve(PROJECT_ROOT, process.env.DATA_DIR || "data");
export const DB_PATH = process.env.DB_PATH || path.join(DATA_DIR, "quotechain.db");

export const LOG_LEVEL = process.env.LOG_LEVEL || "info";

export const PRICE_CACHE_TTL_MS = Number(process.env.PRICE_CACHE_TTL_MS || 30_000);
export const PRICE_FAIL_THRESHOLD = Number(process.env.PRICE_FAIL_THRESHOLD || 3);
export const PRICE_FAIL_WINDOW_MS = Number(process.env.PRICE_FAIL_WINDOW_MS || 60_000);
export const PRICE_COOLDOWN_MS = Number(process.env.PRICE_COOLDOWN_MS || 120_000);
export const PRICE_HTTP_TIMEOUT_MS = Number(process.env.PRICE_HTTP_TIMEOUT_MS || 10_000);
export const PRICE_USD_CNY_RATE = Number(process.env.PRICE_USD_CNY_RATE || 7.2);
export const PRICE_HKD_CNY_RATE = Number(process.env.PRICE_HKD_CNY_RATE || 0.92);

export const PRICE_REFRESH_WORKERS = Number(process.env.PRICE_REFRESH_WORKERS || 4);
export const PRICE_RECENT_UPDATE_MS = Number(process.env.PRICE_RECENT_UPDATE_MS || 300_000);
export const PRICE_REFRESH_CURRENCIES = parseList(
  process.env.PRICE_REFRESH_CURRENCIES || "CNY,USD,HKD",
).map((item) => item.toUpperCase());
// 0 disables the periodic refresh.
export const PRICE_REFRESH_INTERVAL_MS = Number(process.env.PRICE_REFRESH_INTERVAL_MS || 0);
export const FX_REFRESH_ENABLED = parseFlag(process.env.FX_REFRESH_ENABLED, true);

export const HTTP_API_ENABLED = parseFlag(process.env.HTTP_API_ENABLED, true);
export const HTTP_API_HOST = process.env.HTTP_API_HOST || "127.0.0.1";
export const HTTP_API_PORT = Number(process.env.HTTP_API_PORT || 8787);
export const HTTP_API_TOKEN = process.env.HTTP_API_TOKEN || "";

function parseList(raw: string): string[] {
  return raw
    .split(/[\n,]/)
    .map((item) => item.trim())
    .filter(Boolean);
}

function parseFlag(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") return fallback;
  return !["false", "0", "no"].includes(raw.trim().toLowerCase());
}
