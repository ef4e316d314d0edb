/**
 * Upcoming exchange holidays from the Data API.
 */

import type { MarketHoliday } from '../../shared/api-types.js';
import { MarketHolidaysResponseSchema, validateApiResponse, type MarketHolidayEntry } from '../lib/apiSchemas.js';
import { currentEtDateString, isValidDateKey } from '../lib/dateUtils.js';
import { DataApiError } from '../lib/errors.js';
import type { DataApiClient } from '../services/dataApi.js';
import { runApiFetch } from './apiJob.js';
import { defineScrapeJob, type ScrapeJob } from './browserJob.js';
import type { SkippedRow } from './extract.js';

export const MARKET_HOLIDAYS_PATH = '/v1/marketstatus/upcoming';

/** Provider entries without a status or exchange are full-day NYSE closures. */
export const DEFAULT_HOLIDAY_STATUS = 'closed';
export const DEFAULT_HOLIDAY_EXCHANGE = 'NYSE';

export interface MarketHolidaysOptions {
  client: DataApiClient;
  clock?: () => Date;
}

export function toMarketHoliday(entry: MarketHolidayEntry, year: number): MarketHoliday | string {
  const name = String(entry.name ?? '').trim();
  const date = String(entry.date ?? '').trim();
  if (!name) return 'missing name';
  if (!date || !isValidDateKey(date)) return `missing or malformed date "${date}" for ${name}`;
  return {
    name,
    date,
    status: String(entry.status ?? '').trim() || DEFAULT_HOLIDAY_STATUS,
    exchange: String(entry.exchange ?? '').trim() || DEFAULT_HOLIDAY_EXCHANGE,
    year,
    openTime: entry.open ?? null,
    closeTime: entry.close ?? null,
  };
}

export function createMarketHolidaysFetcher(options: MarketHolidaysOptions): ScrapeJob<MarketHoliday> {
  const { client, clock = () => new Date() } = options;
  const label = 'market-holidays';

  return defineScrapeJob(label, () =>
    runApiFetch<MarketHoliday>({
      label,
      fetch: async () => {
        const payload = await client.getJson(MARKET_HOLIDAYS_PATH);
        const entries = validateApiResponse(MarketHolidaysResponseSchema, payload, 'market holidays');
        if (!entries) throw new DataApiError('Unexpected market holidays payload');

        const year = Number(currentEtDateString(clock()).slice(0, 4));
        const records: MarketHoliday[] = [];
        const skipped: SkippedRow[] = [];
        entries.forEach((entry, index) => {
          const result = toMarketHoliday(entry, year);
          if (typeof result === 'string') {
            console.warn(`[scraper:${label}] Skipped entry ${index}: ${result}`);
            skipped.push({ index, reason: result });
          } else {
            records.push(result);
          }
        });
        return { records, skipped };
      },
    }),
  );
}
