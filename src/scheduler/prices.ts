import { refreshExchangeRates } from "../fx/rates.js";
import { logger } from "../logger.js";
import type { HttpClient } from "../price/http.js";
import type { PriceService } from "../price/service.js";

export type PriceScheduler = {
  stop: () => void;
};

export type PriceSchedulerOptions = {
  currencies: string[];
  intervalMs: number;
  http: HttpClient;
  refreshRates: boolean;
  initialDelayMs?: number;
};

export function startPriceScheduler(service: PriceService, opts: PriceSchedulerOptions): PriceScheduler {
  let running = false;

  const tick = () => {
    if (running) {
      logger.debug("Previous price refresh still running; skipping tick");
      return;
    }
    running = true;
    void runRefresh(service, opts).finally(() => {
      running = false;
    });
  };

  const timer = setInterval(tick, opts.intervalMs);
  const kickoff = setTimeout(tick, opts.initialDelayMs ?? 3_000);

  return {
    stop: () => {
      clearInterval(timer);
      clearTimeout(kickoff);
    },
  };
}

export async function runRefresh(service: PriceService, opts: PriceSchedulerOptions): Promise<void> {
  if (opts.refreshRates) {
    try {
      const rates = await refreshExchangeRates(opts.http);
      if (rates.errors.length > 0) {
        logger.warn({ errors: rates.errors }, "Exchange rate refresh incomplete");
      }
    } catch (err) {
      logger.warn({ err }, "Exchange rate refresh failed");
    }
  }

  for (const currency of opts.currencies) {
    try {
      const { updated, errors } = await service.refreshAll(currency);
      if (errors.length > 0) {
        logger.warn({ currency, updated, errors }, "Price refresh finished with errors");
      }
    } catch (err) {
      logger.warn({ err, currency }, "Price refresh failed");
    }
  }
}
