/**
 * Database operations for economic calendar events.
 * Table: economic_events
 */

import { sql, type Kysely } from 'kysely';
import type { EconomicEvent } from '../../shared/api-types.js';
import type { Database } from '../db/types.js';
import { dedupeByKey, ensureTable, readOrEmpty } from './schema.js';

// `YYYY-MM-DD HH:MM:SS`; sentinels and raw source strings sort after it.
const PARSED_TIMESTAMP_PATTERN = '____-__-__ __:__:__';

export async function upsertEconomicEvents(db: Kysely<Database>, events: readonly EconomicEvent[]): Promise<number> {
  if (events.length === 0) return 0;
  await ensureTable(db, 'economic_events');

  const values = dedupeByKey(events, (e) => `${e.eventTimestamp}|${e.country}|${e.eventName}`).map((e) => ({
    event_timestamp: e.eventTimestamp,
    event_time_label: e.eventTimeLabel,
    country: e.country,
    event_name: e.eventName,
    actual: e.actual,
    forecast: e.forecast,
    prior: e.prior,
  }));

  await db
    .insertInto('economic_events')
    .values(values)
    .onConflict((oc) =>
      oc.columns(['event_timestamp', 'country', 'event_name']).doUpdateSet((eb) => ({
        event_time_label: eb.ref('excluded.event_time_label'),
        actual: eb.ref('excluded.actual'),
        forecast: eb.ref('excluded.forecast'),
        prior: eb.ref('excluded.prior'),
        updated_at: sql`NOW()`,
      })),
    )
    .execute();

  console.log(`[db] Stored ${values.length} economic event(s)`);
  return values.length;
}

export async function getLatestEconomicEvents(db: Kysely<Database>, limit: number): Promise<EconomicEvent[]> {
  const rows = await readOrEmpty('economic_events', () =>
    db
      .selectFrom('economic_events')
      .selectAll()
      .orderBy(sql`CASE WHEN ${sql.ref('event_timestamp')} LIKE ${sql.lit(PARSED_TIMESTAMP_PATTERN)} THEN 0 ELSE 1 END`, 'asc')
      .orderBy('event_timestamp', 'desc')
      .orderBy('country', 'asc')
      .orderBy('event_name', 'asc')
      .limit(limit)
      .execute(),
  );
  return rows.map((row) => ({
    eventTimestamp: row.event_timestamp,
    eventTimeLabel: row.event_time_label,
    country: row.country,
    eventName: row.event_name,
    actual: row.actual,
    forecast: row.forecast,
    prior: row.prior,
  }));
}
