/**
 * Database operations for pre-market gainers and losers.
 * Table: premarket_movers
 */

import { sql, type Kysely, type Selectable } from 'kysely';
import type { MoverDirection, PremarketMover, PremarketSnapshot } from '../../shared/api-types.js';
import type { Database, PremarketMovers } from '../db/types.js';
import { dedupeByKey, ensureTable, readOrEmpty } from './schema.js';

function toPremarketMover(row: Selectable<PremarketMovers>): PremarketMover {
  return {
    symbol: row.symbol,
    price: Number(row.price),
    change: Number(row.change),
    changePercent: Number(row.change_percent),
    volume: Number(row.volume),
    direction: row.direction === 'loser' ? 'loser' : 'gainer',
    asOfDate: row.as_of_date,
  };
}

/** Upserts on (symbol, as_of_date); a symbol listed on both sides keeps its last entry. */
export async function upsertPremarketMovers(db: Kysely<Database>, movers: readonly PremarketMover[]): Promise<number> {
  if (movers.length === 0) return 0;
  await ensureTable(db, 'premarket_movers');

  const values = dedupeByKey(movers, (m) => `${m.symbol}|${m.asOfDate}`).map((m) => ({
    symbol: m.symbol,
    price: m.price,
    change: m.change,
    change_percent: m.changePercent,
    volume: m.volume,
    direction: m.direction,
    as_of_date: m.asOfDate,
  }));

  await db
    .insertInto('premarket_movers')
    .values(values)
    .onConflict((oc) =>
      oc.columns(['symbol', 'as_of_date']).doUpdateSet((eb) => ({
        price: eb.ref('excluded.price'),
        change: eb.ref('excluded.change'),
        change_percent: eb.ref('excluded.change_percent'),
        volume: eb.ref('excluded.volume'),
        direction: eb.ref('excluded.direction'),
        updated_at: sql`NOW()`,
      })),
    )
    .execute();

  console.log(`[db] Stored ${values.length} pre-market mover(s)`);
  return values.length;
}

async function getLatestMoverDate(db: Kysely<Database>): Promise<string | null> {
  const rows = await readOrEmpty('premarket_movers', () =>
    db.selectFrom('premarket_movers').select('as_of_date').orderBy('as_of_date', 'desc').limit(1).execute(),
  );
  return rows[0]?.as_of_date ?? null;
}

async function getMoversForDate(
  db: Kysely<Database>,
  asOfDate: string,
  direction: MoverDirection,
  limit: number,
): Promise<PremarketMover[]> {
  const rows = await readOrEmpty('premarket_movers', () =>
    db
      .selectFrom('premarket_movers')
      .selectAll()
      .where('as_of_date', '=', asOfDate)
      .where('direction', '=', direction)
      // Biggest move first on each side.
      .orderBy('change_percent', direction === 'gainer' ? 'desc' : 'asc')
      .orderBy('symbol', 'asc')
      .limit(limit)
      .execute(),
  );
  return rows.map(toPremarketMover);
}

/** Gainers and losers of the most recent `as_of_date` only, each side limited separately. */
export async function getLatestPremarketMovers(db: Kysely<Database>, limit: number): Promise<PremarketSnapshot> {
  const latest = await getLatestMoverDate(db);
  if (!latest) return { gainers: [], losers: [] };
  const gainers = await getMoversForDate(db, latest, 'gainer', limit);
  const losers = await getMoversForDate(db, latest, 'loser', limit);
  return { gainers, losers };
}
