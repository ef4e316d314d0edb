/**
 * Pre-market gainers and losers from the Data API snapshot endpoints.
 */

import type { MoverDirection, PremarketMover } from '../../shared/api-types.js';
import { PREMARKET_MAX_MOVERS } from '../config.js';
import { MoversSnapshotResponseSchema, validateApiResponse, type SnapshotTicker } from '../lib/apiSchemas.js';
import { currentEtDateString } from '../lib/dateUtils.js';
import { DataApiError } from '../lib/errors.js';
import type { DataApiClient } from '../services/dataApi.js';
import { runApiFetch } from './apiJob.js';
import { defineScrapeJob, type ScrapeJob } from './browserJob.js';
import type { SkippedRow } from './extract.js';

const SNAPSHOT_PATHS: Record<MoverDirection, string> = {
  gainer: '/v2/snapshot/locale/us/markets/stocks/gainers',
  loser: '/v2/snapshot/locale/us/markets/stocks/losers',
};

function positiveOrNull(value: number | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : null;
}

/** Before the open the day bar is still zeroed; the last trade or minute bar carries the pre-market price. */
export function resolveMoverPrice(ticker: SnapshotTicker): number | null {
  return positiveOrNull(ticker.day?.c) ?? positiveOrNull(ticker.lastTrade?.p) ?? positiveOrNull(ticker.min?.c);
}

export function toPremarketMover(
  ticker: SnapshotTicker,
  direction: MoverDirection,
  asOfDate: string,
): PremarketMover | string {
  const symbol = ticker.ticker.trim();
  if (!symbol) return 'missing ticker';
  const price = resolveMoverPrice(ticker);
  if (price === null) return `no price for ${symbol}`;
  if (typeof ticker.todaysChange !== 'number' || typeof ticker.todaysChangePerc !== 'number') {
    return `missing change data for ${symbol}`;
  }
  return {
    symbol,
    price,
    change: ticker.todaysChange,
    changePercent: ticker.todaysChangePerc,
    volume: ticker.day?.v || ticker.min?.v || 0,
    direction,
    asOfDate,
  };
}

export interface PremarketMoversOptions {
  client: DataApiClient;
  maxMovers?: number;
  clock?: () => Date;
}

export function createPremarketMoversFetcher(options: PremarketMoversOptions): ScrapeJob<PremarketMover> {
  const { client, maxMovers = PREMARKET_MAX_MOVERS, clock = () => new Date() } = options;
  const label = 'premarket-movers';

  async function fetchSide(direction: MoverDirection, asOfDate: string, skipped: SkippedRow[]): Promise<PremarketMover[]> {
    const payload = await client.getJson(SNAPSHOT_PATHS[direction], { include_otc: false, session: 'pre-market' });
    const snapshot = validateApiResponse(MoversSnapshotResponseSchema, payload, `${direction} snapshot`);
    if (!snapshot) throw new DataApiError(`Unexpected ${direction} snapshot payload`);

    const movers: PremarketMover[] = [];
    snapshot.tickers.forEach((ticker, index) => {
      const result = toPremarketMover(ticker, direction, asOfDate);
      if (typeof result === 'string') {
        console.warn(`[scraper:${label}] Skipped ${direction} ${index}: ${result}`);
        skipped.push({ index, reason: result });
      } else {
        movers.push(result);
      }
    });
    return movers.slice(0, maxMovers);
  }

  return defineScrapeJob(label, () =>
    runApiFetch<PremarketMover>({
      label,
      fetch: async () => {
        const asOfDate = currentEtDateString(clock());
        const skipped: SkippedRow[] = [];
        const gainers = await fetchSide('gainer', asOfDate, skipped);
        const losers = await fetchSide('loser', asOfDate, skipped);
        console.log(`[scraper:${label}] ${gainers.length} gainer(s) and ${losers.length} loser(s) for ${asOfDate}`);
        return { records: [...gainers, ...losers], skipped };
      },
    }),
  );
}
