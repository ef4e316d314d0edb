/**
 * Table definitions for the collected snapshots.
 *
 * Each store calls `ensureTable` before writing; the statement runs once per
 * Kysely instance. Reads never create tables.
 */

import { sql, type Kysely, type RawBuilder } from 'kysely';
import type { Database } from '../db/types.js';
import { isUndefinedTableError } from '../lib/errors.js';

export type TableName = keyof Database;

const TABLE_DDL: Record<TableName, RawBuilder<unknown>> = {
  earnings_reports: sql`
    CREATE TABLE IF NOT EXISTS earnings_reports (
      ticker VARCHAR(20) NOT NULL,
      report_date VARCHAR(10) NOT NULL,
      time_of_day VARCHAR(50) NOT NULL,
      eps_estimate VARCHAR(50) NOT NULL,
      reported_eps VARCHAR(50) NOT NULL,
      revenue_forecast VARCHAR(50) NOT NULL,
      reported_revenue VARCHAR(50) NOT NULL,
      market_cap VARCHAR(50) NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (ticker, report_date, time_of_day)
    )
  `,
  economic_events: sql`
    CREATE TABLE IF NOT EXISTS economic_events (
      event_timestamp VARCHAR(40) NOT NULL,
      event_time_label VARCHAR(50) NOT NULL,
      country VARCHAR(100) NOT NULL,
      event_name VARCHAR(255) NOT NULL,
      actual VARCHAR(50) NOT NULL,
      forecast VARCHAR(50) NOT NULL,
      "prior" VARCHAR(50) NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (event_timestamp, country, event_name)
    )
  `,
  sentiment_readings: sql`
    CREATE TABLE IF NOT EXISTS sentiment_readings (
      captured_at TIMESTAMPTZ NOT NULL,
      "value" INTEGER NOT NULL,
      category VARCHAR(20) NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (captured_at)
    )
  `,
  market_holidays: sql`
    CREATE TABLE IF NOT EXISTS market_holidays (
      "name" VARCHAR(255) NOT NULL,
      holiday_date VARCHAR(10) NOT NULL,
      status VARCHAR(50) NOT NULL,
      exchange VARCHAR(50) NOT NULL,
      "year" INTEGER NOT NULL,
      open_time VARCHAR(40),
      close_time VARCHAR(40),
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY ("name", holiday_date, exchange)
    )
  `,
  premarket_movers: sql`
    CREATE TABLE IF NOT EXISTS premarket_movers (
      symbol VARCHAR(20) NOT NULL,
      price DOUBLE PRECISION NOT NULL,
      "change" DOUBLE PRECISION NOT NULL,
      change_percent DOUBLE PRECISION NOT NULL,
      volume DOUBLE PRECISION NOT NULL,
      direction VARCHAR(10) NOT NULL,
      as_of_date VARCHAR(10) NOT NULL,
      updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      PRIMARY KEY (symbol, as_of_date)
    )
  `,
};

export const TABLE_NAMES: readonly TableName[] = [
  'earnings_reports',
  'economic_events',
  'sentiment_readings',
  'market_holidays',
  'premarket_movers',
];

const ensured = new WeakMap<Kysely<Database>, Map<TableName, Promise<void>>>();

export function ensureTable(db: Kysely<Database>, table: TableName): Promise<void> {
  const tables = ensured.get(db) ?? new Map<TableName, Promise<void>>();
  ensured.set(db, tables);
  const existing = tables.get(table);
  if (existing) return existing;

  const pending = TABLE_DDL[table]
    .execute(db)
    .then(() => undefined)
    .catch((err: unknown) => {
      // Forget the failure so the next write tries again.
      tables.delete(table);
      throw err;
    });
  tables.set(table, pending);
  return pending;
}

export async function ensureAllTables(db: Kysely<Database>): Promise<void> {
  for (const table of TABLE_NAMES) {
    await ensureTable(db, table);
  }
  console.log(`[db] Ensured ${TABLE_NAMES.length} tables`);
}

/** Collapses rows sharing a natural key to the last occurrence, keeping first-seen order. */
export function dedupeByKey<T>(rows: readonly T[], keyOf: (row: T) => string): T[] {
  const byKey = new Map<string, T>();
  for (const row of rows) {
    byKey.set(keyOf(row), row);
  }
  return Array.from(byKey.values());
}

/** Runs a read; a table that no write has created yet reads as empty. */
export async function readOrEmpty<T>(table: TableName, read: () => Promise<T[]>): Promise<T[]> {
  try {
    return await read();
  } catch (err: unknown) {
    if (isUndefinedTableError(err)) {
      console.warn(`[db] ${table} does not exist yet; returning no rows`);
      return [];
    }
    throw err;
  }
}
