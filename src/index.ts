import {
  DB_PATH,
  FX_REFRESH_ENABLED,
  PRICE_CACHE_TTL_MS,
  PRICE_COOLDOWN_MS,
  PRICE_FAIL_THRESHOLD,
  PRICE_FAIL_WINDOW_MS,
  PRICE_HKD_CNY_RATE,
  PRICE_HTTP_TIMEOUT_MS,
  PRICE_RECENT_UPDATE_MS,
  PRICE_REFRESH_CURRENCIES,
  PRICE_REFRESH_INTERVAL_MS,
  PRICE_REFRESH_WORKERS,
  PRICE_USD_CNY_RATE,
} from "./config.js";
import { storeRateResolver } from "./fx/rates.js";
import { startHttpApi } from "./http_api.js";
import { logger } from "./logger.js";
import { FetchHttpClient } from "./price/http.js";
import { PriceResolver } from "./price/resolver.js";
import { PriceService } from "./price/service.js";
import { startPriceScheduler, type PriceScheduler } from "./scheduler/prices.js";
import { closeDatabase, initDatabase, sqliteStore } from "./store/db.js";

async function main(): Promise<void> {
  initDatabase(DB_PATH, { USD: PRICE_USD_CNY_RATE, HKD: PRICE_HKD_CNY_RATE });
  logger.info({ path: DB_PATH }, "Database initialized");

  const http = new FetchHttpClient(PRICE_HTTP_TIMEOUT_MS);
  const resolver = new PriceResolver({
    http,
    cacheTtlMs: PRICE_CACHE_TTL_MS,
    failThreshold: PRICE_FAIL_THRESHOLD,
    failWindowMs: PRICE_FAIL_WINDOW_MS,
    cooldownMs: PRICE_COOLDOWN_MS,
    usdToCnyRate: PRICE_USD_CNY_RATE,
    hkdToCnyRate: PRICE_HKD_CNY_RATE,
    rateResolver: storeRateResolver,
  });
  const service = new PriceService({
    resolver,
    store: sqliteStore,
    refreshWorkers: PRICE_REFRESH_WORKERS,
    recentUpdateMs: PRICE_RECENT_UPDATE_MS,
  });

  const server = startHttpApi(service);

  let scheduler: PriceScheduler | null = null;
  if (PRICE_REFRESH_INTERVAL_MS > 0) {
    scheduler = startPriceScheduler(service, {
      currencies: PRICE_REFRESH_CURRENCIES,
      intervalMs: PRICE_REFRESH_INTERVAL_MS,
      http,
      refreshRates: FX_REFRESH_ENABLED,
    });
    logger.info(
      { currencies: PRICE_REFRESH_CURRENCIES, intervalMs: PRICE_REFRESH_INTERVAL_MS },
      "Price scheduler started",
    );
  }

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    scheduler?.stop();
    if (!server) {
      closeDatabase();
      process.exit(0);
    }
    server.close(() => {
      closeDatabase();
      process.exit(0);
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  logger.error({ err }, "Fatal error");
  process.exit(1);
});
