/**
 * Database operations for exchange holidays.
 * Table: market_holidays
 */

import { sql, type Kysely } from 'kysely';
import type { MarketHoliday } from '../../shared/api-types.js';
import type { Database } from '../db/types.js';
import { currentEtDateString } from '../lib/dateUtils.js';
import { describeError } from '../lib/errors.js';
import { dedupeByKey, ensureTable, readOrEmpty } from './schema.js';

export interface HolidayWriteResult {
  stored: number;
  failed: number;
}

/**
 * Writes one statement per holiday, so a row the database rejects is logged
 * and counted without losing the others.
 */
export async function upsertMarketHolidays(
  db: Kysely<Database>,
  holidays: readonly MarketHoliday[],
): Promise<HolidayWriteResult> {
  if (holidays.length === 0) return { stored: 0, failed: 0 };
  await ensureTable(db, 'market_holidays');

  let stored = 0;
  let failed = 0;
  for (const h of dedupeByKey(holidays, (x) => `${x.name}|${x.date}|${x.exchange}`)) {
    try {
      await db
        .insertInto('market_holidays')
        .values({
          name: h.name,
          holiday_date: h.date,
          status: h.status,
          exchange: h.exchange,
          year: h.year,
          open_time: h.openTime,
          close_time: h.closeTime,
        })
        .onConflict((oc) =>
          oc.columns(['name', 'holiday_date', 'exchange']).doUpdateSet((eb) => ({
            status: eb.ref('excluded.status'),
            year: eb.ref('excluded.year'),
            open_time: eb.ref('excluded.open_time'),
            close_time: eb.ref('excluded.close_time'),
            updated_at: sql`NOW()`,
          })),
        )
        .execute();
      stored += 1;
    } catch (err: unknown) {
      failed += 1;
      console.error(`[db] Failed to store holiday ${h.name} (${h.exchange}, ${h.date}): ${describeError(err)}`);
    }
  }

  console.log(`[db] Stored ${stored} market holiday(s), ${failed} failed`);
  return { stored, failed };
}

/** Holidays on or after `today`, soonest first. */
export async function getUpcomingMarketHolidays(
  db: Kysely<Database>,
  limit: number,
  today: string = currentEtDateString(),
): Promise<MarketHoliday[]> {
  const rows = await readOrEmpty('market_holidays', () =>
    db
      .selectFrom('market_holidays')
      .selectAll()
      .where('holiday_date', '>=', today)
      .orderBy('holiday_date', 'asc')
      .orderBy('exchange', 'asc')
      .limit(limit)
      .execute(),
  );
  return rows.map((row) => ({
    name: row.name,
    date: row.holiday_date,
    status: row.status,
    exchange: row.exchange,
    year: Number(row.year),
    openTime: row.open_time,
    closeTime: row.close_time,
  }));
}
