/**
 * Domain jobs: one scrape followed by one persist per data domain.
 *
 * A job never throws. Scrape and persist failures both come back as a failed
 * `JobRunSummary`, so one domain failing never stops the others.
 */

import type { Kysely } from 'kysely';
import type { JobRunSummary, ScrapeDomain, TriggerResult } from '../../shared/api-types.js';
import type { PageDriver } from '../browser/pageDriver.js';
import { upsertEarningsReports } from '../data/earningsStore.js';
import { upsertEconomicEvents } from '../data/economicEventsStore.js';
import { upsertMarketHolidays } from '../data/holidaysStore.js';
import { upsertPremarketMovers } from '../data/premarketStore.js';
import { upsertSentimentReadings } from '../data/sentimentStore.js';
import type { Database } from '../db/types.js';
import { describeError } from '../lib/errors.js';
import type { ScrapeJob } from '../scrapers/browserJob.js';
import { createEarningsScraper } from '../scrapers/earningsScraper.js';
import { createEconomicCalendarScraper } from '../scrapers/economicCalendarScraper.js';
import { createMarketHolidaysFetcher } from '../scrapers/marketHolidays.js';
import { createPremarketMoversFetcher } from '../scrapers/premarketMovers.js';
import { createSentimentScraper } from '../scrapers/sentimentScraper.js';
import type { DataApiClient } from './dataApi.js';

export interface DomainJob {
  id: ScrapeDomain;
  name: string;
  run(): Promise<JobRunSummary>;
}

export interface DomainJobDeps {
  db: Kysely<Database>;
  driver: PageDriver;
  dataApi: DataApiClient;
  clock?: () => Date;
}

/** Display names, in the order `createDomainJobs` returns the jobs. */
export const DOMAIN_JOB_NAMES: Record<ScrapeDomain, string> = {
  economic_data: 'Economic calendar',
  fear_index: 'Fear & Greed index',
  earnings: 'Earnings (this week)',
  next_week_earnings: 'Earnings (next week)',
  market_holidays: 'Market holidays',
  premarket_movers: 'Pre-market movers',
};

export async function runDomainJob<T>(
  id: ScrapeDomain,
  scraper: ScrapeJob<T>,
  persist: (records: T[]) => Promise<number>,
  clock: () => Date = () => new Date(),
): Promise<JobRunSummary> {
  const startedAt = clock();
  const finish = (fields: Pick<JobRunSummary, 'status' | 'recordCount' | 'skippedCount' | 'error'>): JobRunSummary => {
    const finishedAt = clock();
    return {
      ...fields,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
    };
  };

  const outcome = await scraper.scrape();
  if (!outcome.ok) {
    console.error(`[jobs:${id}] scrape failed: ${outcome.error}`);
    return finish({ status: 'failed', recordCount: 0, skippedCount: outcome.skipped.length, error: outcome.error });
  }

  try {
    const stored = await persist(outcome.records);
    console.log(`[jobs:${id}] stored ${stored} record(s)`);
    return finish({ status: 'success', recordCount: stored, skippedCount: outcome.skipped.length, error: null });
  } catch (err: unknown) {
    const error = `persist failed: ${describeError(err)}`;
    console.error(`[jobs:${id}] ${error}`);
    return finish({ status: 'failed', recordCount: 0, skippedCount: outcome.skipped.length, error });
  }
}

export function createDomainJobs(deps: DomainJobDeps): DomainJob[] {
  const { db, driver, dataApi, clock = () => new Date() } = deps;

  const define = <T>(id: ScrapeDomain, scraper: ScrapeJob<T>, persist: (records: T[]) => Promise<number>): DomainJob => ({
    id,
    name: DOMAIN_JOB_NAMES[id],
    run: () => runDomainJob(id, scraper, persist, clock),
  });

  return [
    define('economic_data', createEconomicCalendarScraper({ driver }), (records) => upsertEconomicEvents(db, records)),
    define('fear_index', createSentimentScraper({ driver, clock }), (records) => upsertSentimentReadings(db, records)),
    define('earnings', createEarningsScraper({ driver, week: 'this_week' }), (records) =>
      upsertEarningsReports(db, records),
    ),
    define('next_week_earnings', createEarningsScraper({ driver, week: 'next_week' }), (records) =>
      upsertEarningsReports(db, records),
    ),
    define('market_holidays', createMarketHolidaysFetcher({ client: dataApi, clock }), async (records) => {
      const { stored, failed } = await upsertMarketHolidays(db, records);
      if (failed > 0) {
        throw new Error(`${failed} of ${stored + failed} holidays rejected`);
      }
      return stored;
    }),
    define('premarket_movers', createPremarketMoversFetcher({ client: dataApi, clock }), (records) =>
      upsertPremarketMovers(db, records),
    ),
  ];
}

export function toTriggerResult(summary: JobRunSummary): TriggerResult {
  return summary.status === 'success' ? 'success' : `failed: ${summary.error ?? 'unknown error'}`;
}
