/**
 * Database operations for Fear & Greed readings.
 * Table: sentiment_readings
 */

import { sql, type Kysely } from 'kysely';
import type { SentimentReading } from '../../shared/api-types.js';
import { SENTIMENT_CATEGORIES } from '../../shared/constants.js';
import type { Database } from '../db/types.js';
import { categorizeSentiment } from '../scrapers/sentimentScraper.js';
import { dedupeByKey, ensureTable, readOrEmpty } from './schema.js';

/** One row per captured hour; a second reading within the same hour overwrites the first. */
export async function upsertSentimentReadings(
  db: Kysely<Database>,
  readings: readonly SentimentReading[],
): Promise<number> {
  if (readings.length === 0) return 0;
  await ensureTable(db, 'sentiment_readings');

  const values = dedupeByKey(readings, (r) => r.capturedAt.toISOString()).map((r) => ({
    captured_at: r.capturedAt,
    value: r.value,
    category: r.category,
  }));

  await db
    .insertInto('sentiment_readings')
    .values(values)
    .onConflict((oc) =>
      oc.column('captured_at').doUpdateSet((eb) => ({
        value: eb.ref('excluded.value'),
        category: eb.ref('excluded.category'),
        updated_at: sql`NOW()`,
      })),
    )
    .execute();

  console.log(`[db] Stored ${values.length} fear & greed reading(s)`);
  return values.length;
}

export async function getLatestSentiment(db: Kysely<Database>, limit: number): Promise<SentimentReading[]> {
  const rows = await readOrEmpty('sentiment_readings', () =>
    db
      .selectFrom('sentiment_readings')
      .selectAll()
      .orderBy('captured_at', 'desc')
      .limit(limit)
      .execute(),
  );
  return rows.map((row) => {
    const value = Number(row.value);
    return {
      capturedAt: new Date(row.captured_at),
      value,
      category: SENTIMENT_CATEGORIES.find((c) => c === row.category) ?? categorizeSentiment(value),
    };
  });
}
