import fs from "fs";
import path from "path";
import Database from "better-sqlite3";

import { DB_PATH, PRICE_HKD_CNY_RATE, PRICE_USD_CNY_RATE } from "../config.js";
import type { OperationLogEntry, PriceStore, RefreshableSymbol } from "../price/types.js";

export type LatestPrice = {
  symbol: string;
  currency: string;
  price: number;
  updatedAt: string;
};

export type OperationLogRecord = {
  id: number;
  operation: string;
  symbol: string | null;
  currency: string | null;
  details: string | null;
  priceFetched: number | null;
  createdAt: string;
};

export type ExchangeRateSetting = {
  fromCurrency: string;
  toCurrency: string;
  rate: number;
  source: string;
  updatedAt: string;
};

const SUPPORTED_RATE_SOURCES = ["USD", "HKD"];

export type DefaultRates = { USD: number; HKD: number };

let db: Database.Database | null = null;

function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized");
  }
  return db;
}

/**
 * Opens the database and creates the schema. Rows still sourced `default`
 * follow `defaultRates` on every start; fetched or manual rates are left alone.
 */
export function initDatabase(
  dbPath = DB_PATH,
  defaultRates: DefaultRates = { USD: PRICE_USD_CNY_RATE, HKD: PRICE_HKD_CNY_RATE },
): void {
  if (db) db.close();
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  db = new Database(dbPath);
  if (dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("busy_timeout = 5000");

  db.exec(`
    CREATE TABLE IF NOT EXISTS symbols (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      symbol TEXT NOT NULL UNIQUE,
      name TEXT,
      asset_type TEXT NOT NULL DEFAULT 'stock',
      auto_update INTEGER NOT NULL DEFAULT 1
    );
    CREATE TABLE IF NOT EXISTS holdings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      symbol TEXT NOT NULL,
      currency TEXT NOT NULL,
      quantity REAL NOT NULL DEFAULT 0,
      UNIQUE(symbol, currency)
    );
    CREATE TABLE IF NOT EXISTS latest_prices (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      symbol TEXT NOT NULL,
      currency TEXT NOT NULL,
      price REAL NOT NULL,
      updated_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      UNIQUE(symbol, currency)
    );
    CREATE TABLE IF NOT EXISTS operation_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      operation_type TEXT NOT NULL,
      symbol TEXT,
      currency TEXT,
      details TEXT,
      price_fetched REAL,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP
    );
    CREATE TABLE IF NOT EXISTS exchange_rates (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      from_currency TEXT NOT NULL,
      to_currency TEXT NOT NULL,
      rate REAL NOT NULL,
      source TEXT NOT NULL DEFAULT 'default',
      updated_at DATETIME DEFAULT CURRENT_TIMESTAMP,
      UNIQUE(from_currency, to_currency)
    );
  `);

  const seed = db.prepare(
    `INSERT INTO exchange_rates (from_currency, to_currency, rate, source) VALUES (?, 'CNY', ?, 'default')
     ON CONFLICT(from_currency, to_currency) DO UPDATE SET
       rate = excluded.rate,
       updated_at = CURRENT_TIMESTAMP
     WHERE exchange_rates.source = 'default'`,
  );
  for (const [from, rate] of Object.entries(defaultRates)) {
    if (!Number.isFinite(rate) || rate <= 0) {
      throw new Error(`invalid default rate for ${from}/CNY: ${rate}`);
    }
    seed.run(from, rate);
  }
}

export function closeDatabase(): void {
  if (!db) return;
  db.close();
  db = null;
}

export function upsertSymbol(symbol: string, assetType = "stock", autoUpdate = true, name?: string): void {
  getDb()
    .prepare(
      `INSERT INTO symbols (symbol, name, asset_type, auto_update) VALUES (?, ?, ?, ?)
       ON CONFLICT(symbol) DO UPDATE SET
         name = COALESCE(excluded.name, symbols.name),
         asset_type = excluded.asset_type,
         auto_update = excluded.auto_update`,
    )
    .run(normalize(symbol), name ?? null, assetType.trim().toLowerCase() || "stock", autoUpdate ? 1 : 0);
}

export function setHolding(symbol: string, currency: string, quantity: number): void {
  getDb()
    .prepare(
      `INSERT INTO holdings (symbol, currency, quantity) VALUES (?, ?, ?)
       ON CONFLICT(symbol, currency) DO UPDATE SET quantity = excluded.quantity`,
    )
    .run(normalize(symbol), normalize(currency), quantity);
}

type RefreshableRow = {
  symbol: string;
  asset_type: string | null;
  auto_update: number | null;
  updated_at: string | null;
};

export function listRefreshableSymbols(currency: string): RefreshableSymbol[] {
  const rows = getDb()
    .prepare<[string], RefreshableRow>(
      `SELECT h.symbol AS symbol, s.asset_type AS asset_type, s.auto_update AS auto_update, lp.updated_at AS updated_at
       FROM holdings h
       LEFT JOIN symbols s ON s.symbol = h.symbol
       LEFT JOIN latest_prices lp ON lp.symbol = h.symbol AND lp.currency = h.currency
       WHERE h.currency = ? AND h.quantity > 0
       ORDER BY h.symbol`,
    )
    .all(normalize(currency));
  return rows.map((row) => ({
    symbol: row.symbol,
    assetType: row.asset_type || "stock",
    autoUpdate: row.auto_update === null ? true : row.auto_update !== 0,
    lastPriceUpdatedAt: row.updated_at,
  }));
}

export function recordLatestPrice(symbol: string, currency: string, price: number): void {
  getDb()
    .prepare(
      `INSERT INTO latest_prices (symbol, currency, price, updated_at)
       VALUES (?, ?, ?, CURRENT_TIMESTAMP)
       ON CONFLICT(symbol, currency) DO UPDATE SET
         price = excluded.price,
         updated_at = CURRENT_TIMESTAMP`,
    )
    .run(normalize(symbol), normalize(currency), price);
}

type LatestPriceRow = { symbol: string; currency: string; price: number; updated_at: string };

export function getLatestPrice(symbol: string, currency: string): LatestPrice | null {
  const row = getDb()
    .prepare<[string, string], LatestPriceRow>(
      "SELECT symbol, currency, price, updated_at FROM latest_prices WHERE symbol = ? AND currency = ?",
    )
    .get(normalize(symbol), normalize(currency));
  if (!row) return null;
  return { symbol: row.symbol, currency: row.currency, price: row.price, updatedAt: row.updated_at };
}

export function appendOperationLog(entry: OperationLogEntry): number {
  const info = getDb()
    .prepare(
      `INSERT INTO operation_logs (operation_type, symbol, currency, details, price_fetched)
       VALUES (?, ?, ?, ?, ?)`,
    )
    .run(entry.operation, entry.symbol, entry.currency, entry.details, entry.priceFetched ?? null);
  return Number(info.lastInsertRowid);
}

type OperationLogRow = {
  id: number;
  operation_type: string;
  symbol: string | null;
  currency: string | null;
  details: string | null;
  price_fetched: number | null;
  created_at: string;
};

export function listOperationLogs(limit = 50, offset = 0): OperationLogRecord[] {
  const rows = getDb()
    .prepare<[number, number], OperationLogRow>(
      `SELECT id, operation_type, symbol, currency, details, price_fetched, created_at
       FROM operation_logs ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?`,
    )
    .all(limit > 0 ? limit : 50, offset > 0 ? offset : 0);
  return rows.map((row) => ({
    id: row.id,
    operation: row.operation_type,
    symbol: row.symbol,
    currency: row.currency,
    details: row.details,
    priceFetched: row.price_fetched,
    createdAt: row.created_at,
  }));
}

function validateRatePair(fromCurrency: string, toCurrency: string): void {
  if (toCurrency !== "CNY") {
    throw new Error(`invalid to_currency: ${toCurrency}`);
  }
  if (!SUPPORTED_RATE_SOURCES.includes(fromCurrency)) {
    throw new Error(`invalid from_currency: ${fromCurrency}`);
  }
}

export function setExchangeRate(fromCurrency: string, toCurrency: string, rate: number, source = ""): void {
  const from = normalize(fromCurrency);
  const to = normalize(toCurrency);
  validateRatePair(from, to);
  if (!Number.isFinite(rate) || rate <= 0) {
    throw new Error("rate must be greater than 0");
  }
  getDb()
    .prepare(
      `INSERT INTO exchange_rates (from_currency, to_currency, rate, source, updated_at)
       VALUES (?, ?, ?, ?, CURRENT_TIMESTAMP)
       ON CONFLICT(from_currency, to_currency) DO UPDATE SET
         rate = excluded.rate,
         source = excluded.source,
         updated_at = CURRENT_TIMESTAMP`,
    )
    .run(from, to, rate, source.trim().toLowerCase() || "manual");
}

type ExchangeRateRow = {
  from_currency: string;
  to_currency: string;
  rate: number;
  source: string;
  updated_at: string;
};

export function listExchangeRates(): ExchangeRateSetting[] {
  const rows = getDb()
    .prepare<[], ExchangeRateRow>(
      `SELECT from_currency, to_currency, rate, source, updated_at FROM exchange_rates
       ORDER BY CASE from_currency WHEN 'USD' THEN 1 WHEN 'HKD' THEN 2 ELSE 99 END, to_currency`,
    )
    .all();
  return rows.map((row) => ({
    fromCurrency: row.from_currency,
    toCurrency: row.to_currency,
    rate: row.rate,
    source: row.source,
    updatedAt: row.updated_at,
  }));
}

export function getRateToCNY(currency: string): number {
  const from = normalize(currency);
  if (from === "CNY") return 1;
  validateRatePair(from, "CNY");
  const row = getDb()
    .prepare<[string], { rate: number }>("SELECT rate FROM exchange_rates WHERE from_currency = ? AND to_currency = 'CNY'")
    .get(from);
  if (!row) {
    throw new Error(`exchange rate not found for ${from}/CNY`);
  }
  if (row.rate <= 0) {
    throw new Error(`invalid exchange rate for ${from}/CNY`);
  }
  return row.rate;
}

export const sqliteStore: PriceStore = {
  listRefreshableSymbols,
  recordLatestPrice,
  appendOperationLog: (entry) => {
    appendOperationLog(entry);
  },
};

function normalize(value: string): string {
  return value.trim().toUpperCase();
}
