import type { Kysely } from 'kysely';
import type {
  EarningsReport,
  EconomicEvent,
  MarketHoliday,
  PremarketSnapshot,
  SentimentReading,
} from '../../shared/api-types.js';
import { getLatestEarnings, getNextWeekEarnings } from '../data/earningsStore.js';
import { getLatestEconomicEvents } from '../data/economicEventsStore.js';
import { getUpcomingMarketHolidays } from '../data/holidaysStore.js';
import { getLatestPremarketMovers } from '../data/premarketStore.js';
import { getLatestSentiment } from '../data/sentimentStore.js';
import type { Database } from '../db/types.js';
import { currentEtDateString } from '../lib/dateUtils.js';

/** Read side of the Read API; routes depend on this instead of the stores. */
export interface MarketDataReader {
  latestEarnings(limit: number): Promise<EarningsReport[]>;
  nextWeekEarnings(limit: number): Promise<EarningsReport[]>;
  latestEconomicEvents(limit: number): Promise<EconomicEvent[]>;
  latestSentiment(limit: number): Promise<SentimentReading[]>;
  upcomingHolidays(limit: number): Promise<MarketHoliday[]>;
  latestPremarketMovers(limit: number): Promise<PremarketSnapshot>;
}

export function createMarketDataReader(db: Kysely<Database>, clock: () => Date = () => new Date()): MarketDataReader {
  const today = () => currentEtDateString(clock());
  return {
    latestEarnings: (limit) => getLatestEarnings(db, limit),
    nextWeekEarnings: (limit) => getNextWeekEarnings(db, limit, today()),
    latestEconomicEvents: (limit) => getLatestEconomicEvents(db, limit),
    latestSentiment: (limit) => getLatestSentiment(db, limit),
    upcomingHolidays: (limit) => getUpcomingMarketHolidays(db, limit, today()),
    latestPremarketMovers: (limit) => getLatestPremarketMovers(db, limit),
  };
}
