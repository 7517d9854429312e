import http from "http";

import { HTTP_API_ENABLED, HTTP_API_HOST, HTTP_API_PORT, HTTP_API_TOKEN } from "./config.js";
import { logger } from "./logger.js";
import { PriceError } from "./price/errors.js";
import { isRecord } from "./price/providers/parse.js";
import type { PriceService } from "./price/service.js";
import { getLatestPrice, listExchangeRates, listOperationLogs } from "./store/db.js";

const MAX_BODY_BYTES = 1024 * 1024;

export type HttpApiOptions = {
  token?: string;
};

class PayloadTooLargeError extends Error {}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = "";
    req.on("data", (chunk: Buffer) => {
      data += chunk.toString();
      if (data.length > MAX_BODY_BYTES) {
        req.destroy();
        reject(new PayloadTooLargeError("payload too large"));
      }
    });
    req.on("end", () => resolve(data));
    req.on("error", reject);
  });
}

function parseAuth(req: http.IncomingMessage): string {
  const auth = String(req.headers.authorization || "");
  if (!auth) return "";
  if (auth.toLowerCase().startsWith("bearer ")) {
    return auth.slice(7).trim();
  }
  return auth.trim();
}

function json(res: http.ServerResponse, status: number, data: unknown): void {
  const body = JSON.stringify(data);
  res.writeHead(status, {
    "Content-Type": "application/json; charset=utf-8",
    "Content-Length": Buffer.byteLength(body),
  });
  res.end(body);
}

async function readJson(req: http.IncomingMessage, res: http.ServerResponse): Promise<Record<string, unknown> | null> {
  let body = "";
  try {
    body = await readBody(req);
  } catch (err) {
    if (err instanceof PayloadTooLargeError) {
      json(res, 413, { ok: false, error: "payload_too_large" });
    } else {
      logger.warn({ err }, "HTTP body read failed");
      json(res, 400, { ok: false, error: "bad_request" });
    }
    return null;
  }
  let payload: unknown;
  try {
    payload = JSON.parse(body || "{}");
  } catch {
    json(res, 400, { ok: false, error: "invalid_json" });
    return null;
  }
  if (!isRecord(payload)) {
    json(res, 400, { ok: false, error: "invalid_json" });
    return null;
  }
  return payload;
}

async function handlePrice(service: PriceService, url: URL, res: http.ServerResponse): Promise<void> {
  const symbol = (url.searchParams.get("symbol") || "").trim();
  const currency = (url.searchParams.get("currency") || "").trim();
  const assetType = url.searchParams.get("asset_type") || "";
  if (!symbol || !currency) {
    json(res, 400, { ok: false, error: "symbol_or_currency_missing" });
    return;
  }
  const result = await service.resolve(symbol, currency, assetType);
  if (result.ok) {
    json(res, 200, { ok: true, price: result.price, source: result.source, message: result.message });
    return;
  }
  json(res, 404, { ok: false, error: result.error.kind, message: result.message });
}

function handleLatest(url: URL, res: http.ServerResponse): void {
  const symbol = (url.searchParams.get("symbol") || "").trim();
  const currency = (url.searchParams.get("currency") || "").trim();
  if (!symbol || !currency) {
    json(res, 400, { ok: false, error: "symbol_or_currency_missing" });
    return;
  }
  const latest = getLatestPrice(symbol, currency);
  if (!latest) {
    json(res, 404, { ok: false, error: "not_found" });
    return;
  }
  json(res, 200, { ok: true, ...latest });
}

function parseCount(raw: string | null, fallback: number): number {
  const value = Number(raw ?? "");
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function handleLogs(url: URL, res: http.ServerResponse): void {
  const limit = Math.min(parseCount(url.searchParams.get("limit"), 50), 500);
  const offset = parseCount(url.searchParams.get("offset"), 0);
  json(res, 200, { ok: true, logs: listOperationLogs(limit, offset) });
}

async function handleRefresh(service: PriceService, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  const payload = await readJson(req, res);
  if (!payload) return;
  const currency = String(payload.currency ?? "").trim();
  if (!currency) {
    json(res, 400, { ok: false, error: "currency_missing" });
    return;
  }
  try {
    const { updated, errors } = await service.refreshAll(currency);
    json(res, 200, { ok: true, updated, errors });
  } catch (err) {
    if (err instanceof PriceError && err.kind === "no_holdings") {
      json(res, 404, { ok: false, error: err.kind, message: err.message });
      return;
    }
    throw err;
  }
}

async function handleManual(service: PriceService, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  const payload = await readJson(req, res);
  if (!payload) return;
  const symbol = String(payload.symbol ?? "").trim();
  const currency = String(payload.currency ?? "").trim();
  const price = typeof payload.price === "number" ? payload.price : Number(payload.price);
  if (!symbol || !currency) {
    json(res, 400, { ok: false, error: "symbol_or_currency_missing" });
    return;
  }
  try {
    service.applyManualOverride(symbol, currency, price);
  } catch (err) {
    if (err instanceof PriceError && err.kind === "invalid_price") {
      json(res, 400, { ok: false, error: err.kind, message: err.message });
      return;
    }
    throw err;
  }
  json(res, 200, { ok: true });
}

async function route(
  service: PriceService,
  opts: HttpApiOptions,
  req: http.IncomingMessage,
  res: http.ServerResponse,
): Promise<void> {
  const url = new URL(req.url || "/", "http://localhost");
  const method = req.method || "GET";

  if (url.pathname === "/health") {
    json(res, 200, { ok: true });
    return;
  }
  if (!url.pathname.startsWith("/api/")) {
    json(res, 404, { ok: false, error: "not_found" });
    return;
  }
  if (opts.token) {
    const token = parseAuth(req);
    if (!token || token !== opts.token) {
      json(res, 401, { ok: false, error: "unauthorized" });
      return;
    }
  }

  if (url.pathname === "/api/price" && method === "GET") {
    await handlePrice(service, url, res);
    return;
  }
  if (url.pathname === "/api/prices/latest" && method === "GET") {
    handleLatest(url, res);
    return;
  }
  if (url.pathname === "/api/logs" && method === "GET") {
    handleLogs(url, res);
    return;
  }
  if (url.pathname === "/api/exchange-rates" && method === "GET") {
    json(res, 200, { ok: true, rates: listExchangeRates() });
    return;
  }
  if (url.pathname === "/api/prices/refresh" && method === "POST") {
    await handleRefresh(service, req, res);
    return;
  }
  if (url.pathname === "/api/prices/manual" && method === "POST") {
    await handleManual(service, req, res);
    return;
  }
  json(res, 404, { ok: false, error: "not_found" });
}

export function createHttpApi(service: PriceService, opts: HttpApiOptions = {}): http.Server {
  return http.createServer((req, res) => {
    route(service, opts, req, res).catch((err: unknown) => {
      logger.error({ err, url: req.url }, "HTTP request failed");
      if (!res.headersSent) {
        json(res, 500, { ok: false, error: "internal_error" });
      }
    });
  });
}

export function startHttpApi(service: PriceService): http.Server | null {
  if (!HTTP_API_ENABLED) return null;
  const server = createHttpApi(service, { token: HTTP_API_TOKEN });
  server.listen(HTTP_API_PORT, HTTP_API_HOST, () => {
    logger.info(
      { host: HTTP_API_HOST, port: HTTP_API_PORT, token: HTTP_API_TOKEN ? "set" : "unset" },
      "HTTP API listening",
    );
  });
  return server;
}
