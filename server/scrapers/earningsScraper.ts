/**
 * Earnings calendar scraper (this week / next week).
 */

import type { EarningsReport, EarningsWeek } from '../../shared/api-types.js';
import { UNKNOWN_VALUE } from '../../shared/constants.js';
import type { FilterAction, PageDriver, PageTarget, RowHandle } from '../browser/pageDriver.js';
import { EARNINGS_CALENDAR_URL } from '../config.js';
import { defineScrapeJob, runBrowserScrape, type ScrapeJob } from './browserJob.js';
import {
  extractRows,
  normalizeEarningsTicker,
  normalizeReportDate,
  readAmountField,
  readAttribute,
  recordOf,
  skipRow,
  type RowResult,
} from './extract.js';

export const EARNINGS_SELECTORS = {
  table: '.tv-data-table',
  row: '.tv-data-table__row',
  loadMore: '.tv-load-more__btn',
  weekTab: "//div[contains(@class, 'itemContent-')]",
  ticker: "[data-field-key='name']",
  marketCap: "[data-field-key='market_cap_basic']",
  epsEstimate: "[data-field-key='earnings_per_share_forecast_next_fq']",
  reportedEps: "[data-field-key='earnings_per_share_fq']",
  revenueForecast: "[data-field-key='revenue_forecast_next_fq']",
  reportedRevenue: "[data-field-key='revenue_fq']",
  time: "[data-field-key='earnings_release_next_time']",
  date: "[data-field-key='earnings_release_next_date']",
} as const;

const WEEK_TAB_LABELS: Record<EarningsWeek, string> = {
  this_week: 'This Week',
  next_week: 'Next Week',
};

export async function extractEarningsRow(row: RowHandle): Promise<RowResult<EarningsReport>> {
  const ticker = normalizeEarningsTicker(await row.text(EARNINGS_SELECTORS.ticker));
  if (!ticker) return skipRow<EarningsReport>('missing ticker');

  const rawDate = await row.text(EARNINGS_SELECTORS.date);
  const reportDate = normalizeReportDate(rawDate);
  if (!reportDate) return skipRow<EarningsReport>(`unreadable report date "${rawDate ?? ''}" for ${ticker}`);

  return recordOf<EarningsReport>({
    ticker,
    reportDate,
    timeOfDay: await readAttribute(row, EARNINGS_SELECTORS.time, 'title', UNKNOWN_VALUE),
    epsEstimate: await readAmountField(row, EARNINGS_SELECTORS.epsEstimate),
    reportedEps: await readAmountField(row, EARNINGS_SELECTORS.reportedEps),
    revenueForecast: await readAmountField(row, EARNINGS_SELECTORS.revenueForecast),
    reportedRevenue: await readAmountField(row, EARNINGS_SELECTORS.reportedRevenue),
    marketCap: await readAmountField(row, EARNINGS_SELECTORS.marketCap),
  });
}

export interface EarningsScraperOptions {
  driver: PageDriver;
  week: EarningsWeek;
  url?: string;
  loadMoreSettleMs?: number;
  maxLoadMoreClicks?: number;
}

export function earningsWeekFilter(week: EarningsWeek): FilterAction {
  return {
    label: WEEK_TAB_LABELS[week],
    selector: EARNINGS_SELECTORS.weekTab,
    hasText: WEEK_TAB_LABELS[week],
    settleMs: 2_000,
  };
}

export function createEarningsScraper(options: EarningsScraperOptions): ScrapeJob<EarningsReport> {
  const { driver, week, url = EARNINGS_CALENDAR_URL, loadMoreSettleMs = 1_000, maxLoadMoreClicks } = options;
  const label = week === 'this_week' ? 'earnings' : 'next-week-earnings';
  const target: PageTarget = { url, readySelector: EARNINGS_SELECTORS.table };

  return defineScrapeJob(label, () =>
    runBrowserScrape<EarningsReport>({
      label,
      driver,
      target,
      filters: [earningsWeekFilter(week)],
      collect: async (session) => {
        await session.waitFor(EARNINGS_SELECTORS.table, 10_000);
        const clicks = await session.loadAll(EARNINGS_SELECTORS.loadMore, {
          settleMs: loadMoreSettleMs,
          maxClicks: maxLoadMoreClicks,
        });
        const rows = await session.rows(EARNINGS_SELECTORS.row);
        console.log(`[scraper:${label}] Scraping earnings for ${rows.length} stocks after ${clicks} "load more" click(s)`);
        return extractRows(rows, extractEarningsRow, label);
      },
    }),
  );
}
