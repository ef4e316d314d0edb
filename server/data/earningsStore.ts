/**
 * Database operations for earnings calendar rows.
 * Table: earnings_reports
 */

import { sql, type Kysely, type Selectable } from 'kysely';
import type { EarningsReport } from '../../shared/api-types.js';
import type { Database, EarningsReports } from '../db/types.js';
import { currentEtDateString, nextWeekStartDateKey } from '../lib/dateUtils.js';
import { dedupeByKey, ensureTable, readOrEmpty } from './schema.js';

function toEarningsReport(row: Selectable<EarningsReports>): EarningsReport {
  return {
    ticker: row.ticker,
    reportDate: row.report_date,
    timeOfDay: row.time_of_day,
    epsEstimate: row.eps_estimate,
    reportedEps: row.reported_eps,
    revenueForecast: row.revenue_forecast,
    reportedRevenue: row.reported_revenue,
    marketCap: row.market_cap,
  };
}

/** Upserts on (ticker, report_date, time_of_day). Returns the number of rows written. */
export async function upsertEarningsReports(db: Kysely<Database>, reports: readonly EarningsReport[]): Promise<number> {
  if (reports.length === 0) return 0;
  await ensureTable(db, 'earnings_reports');

  const values = dedupeByKey(reports, (r) => `${r.ticker}|${r.reportDate}|${r.timeOfDay}`).map((r) => ({
    ticker: r.ticker,
    report_date: r.reportDate,
    time_of_day: r.timeOfDay,
    eps_estimate: r.epsEstimate,
    reported_eps: r.reportedEps,
    revenue_forecast: r.revenueForecast,
    reported_revenue: r.reportedRevenue,
    market_cap: r.marketCap,
  }));

  await db
    .insertInto('earnings_reports')
    .values(values)
    .onConflict((oc) =>
      oc.columns(['ticker', 'report_date', 'time_of_day']).doUpdateSet((eb) => ({
        eps_estimate: eb.ref('excluded.eps_estimate'),
        reported_eps: eb.ref('excluded.reported_eps'),
        revenue_forecast: eb.ref('excluded.revenue_forecast'),
        reported_revenue: eb.ref('excluded.reported_revenue'),
        market_cap: eb.ref('excluded.market_cap'),
        updated_at: sql`NOW()`,
      })),
    )
    .execute();

  console.log(`[db] Stored ${values.length} earnings report(s)`);
  return values.length;
}

export async function getLatestEarnings(db: Kysely<Database>, limit: number): Promise<EarningsReport[]> {
  const rows = await readOrEmpty('earnings_reports', () =>
    db
      .selectFrom('earnings_reports')
      .selectAll()
      .orderBy('report_date', 'desc')
      .orderBy('ticker', 'asc')
      .orderBy('time_of_day', 'asc')
      .limit(limit)
      .execute(),
  );
  return rows.map(toEarningsReport);
}

/** Reports dated on or after the Monday following `today`, soonest first. */
export async function getNextWeekEarnings(
  db: Kysely<Database>,
  limit: number,
  today: string = currentEtDateString(),
): Promise<EarningsReport[]> {
  const weekStart = nextWeekStartDateKey(today);
  const rows = await readOrEmpty('earnings_reports', () =>
    db
      .selectFrom('earnings_reports')
      .selectAll()
      .where('report_date', '>=', weekStart)
      .orderBy('report_date', 'asc')
      .orderBy('ticker', 'asc')
      .orderBy('time_of_day', 'asc')
      .limit(limit)
      .execute(),
  );
  return rows.map(toEarningsReport);
}
