/**
 * Economic-events calendar scraper (high importance, current week).
 */

import type { EconomicEvent } from '../../shared/api-types.js';
import { MISSING_VALUE } from '../../shared/constants.js';
import type { FilterAction, PageDriver, PageTarget, RowHandle } from '../browser/pageDriver.js';
import { ECONOMIC_CALENDAR_URL } from '../config.js';
import { defineScrapeJob, runBrowserScrape, type ScrapeJob } from './browserJob.js';
import { cleanText, extractRows, formatEventTimestamp, readField, recordOf, type RowResult } from './extract.js';

export const ECONOMIC_SELECTORS = {
  row: "div[data-name*='economic-calendar-item']",
  timestamp: 'time',
  timeLabel: 'span[class*=eventTime]',
  country: "span[class*='countryName']",
  title: "span[class*='titleText']",
  values: "span[class*='valueWithUnit']",
  importanceButton: 'button',
  weekButton: 'button',
} as const;

export const ECONOMIC_FILTERS: readonly FilterAction[] = [
  {
    label: 'High Importance',
    selector: ECONOMIC_SELECTORS.importanceButton,
    hasText: 'Importance',
    scrollIntoView: true,
    settleMs: 1_000,
  },
  {
    label: 'This Week',
    selector: ECONOMIC_SELECTORS.weekButton,
    hasText: 'This week',
    scrollIntoView: true,
    settleMs: 1_000,
  },
];

export async function extractEconomicEventRow(row: RowHandle): Promise<RowResult<EconomicEvent>> {
  const rawTimestamp = cleanText(await row.attribute(ECONOMIC_SELECTORS.timestamp, 'datetime'));
  const values = (await row.texts(ECONOMIC_SELECTORS.values)).map((value) => cleanText(value));
  const valueAt = (index: number): string => values[index] || MISSING_VALUE;

  return recordOf<EconomicEvent>({
    eventTimestamp: rawTimestamp ? formatEventTimestamp(rawTimestamp) : MISSING_VALUE,
    eventTimeLabel: await readField(row, ECONOMIC_SELECTORS.timeLabel),
    country: await readField(row, ECONOMIC_SELECTORS.country),
    eventName: await readField(row, ECONOMIC_SELECTORS.title),
    actual: valueAt(0),
    forecast: valueAt(1),
    prior: valueAt(2),
  });
}

export interface EconomicCalendarScraperOptions {
  driver: PageDriver;
  url?: string;
  rowWaitTimeoutMs?: number;
  settleAfterFiltersMs?: number;
}

export function createEconomicCalendarScraper(options: EconomicCalendarScraperOptions): ScrapeJob<EconomicEvent> {
  const { driver, url = ECONOMIC_CALENDAR_URL, rowWaitTimeoutMs = 10_000, settleAfterFiltersMs = 2_000 } = options;
  const label = 'economic-events';
  const target: PageTarget = { url, readySelector: ECONOMIC_SELECTORS.row };

  return defineScrapeJob(label, () =>
    runBrowserScrape<EconomicEvent>({
      label,
      driver,
      target,
      filters: ECONOMIC_FILTERS,
      settleAfterFiltersMs,
      collect: async (session) => {
        if (!(await session.waitFor(ECONOMIC_SELECTORS.row, rowWaitTimeoutMs))) {
          console.warn(`[scraper:${label}] No economic calendar data available after filtering; skipping`);
          return { records: [], skipped: [] };
        }
        const rows = await session.rows(ECONOMIC_SELECTORS.row);
        if (rows.length === 0) {
          console.warn(`[scraper:${label}] No economic calendar rows found; skipping`);
          return { records: [], skipped: [] };
        }
        console.log(`[scraper:${label}] Scraping ${rows.length} events`);
        return extractRows(rows, extractEconomicEventRow, label);
      },
    }),
  );
}
