// Shared API types: the contract between the collector and the read API.

import type {
  EARNINGS_WEEKS,
  MOVER_DIRECTIONS,
  SCRAPE_DOMAINS,
  SENTIMENT_CATEGORIES,
} from './constants.js';

export type ScrapeDomain = (typeof SCRAPE_DOMAINS)[number];
export type EarningsWeek = (typeof EARNINGS_WEEKS)[number];
export type MoverDirection = (typeof MOVER_DIRECTIONS)[number];
export type SentimentCategory = (typeof SENTIMENT_CATEGORIES)[number];

// --- Domain records ---

export interface EarningsReport {
  ticker: string;
  /** YYYY-MM-DD */
  reportDate: string;
  timeOfDay: string;
  epsEstimate: string;
  reportedEps: string;
  revenueForecast: string;
  reportedRevenue: string;
  marketCap: string;
}

export interface EconomicEvent {
  /** `YYYY-MM-DD HH:MM:SS` (UTC) or the raw source value when it could not be parsed. */
  eventTimestamp: string;
  eventTimeLabel: string;
  country: string;
  eventName: string;
  actual: string;
  forecast: string;
  prior: string;
}

export interface SentimentReading {
  capturedAt: Date;
  value: number;
  category: SentimentCategory;
}

export interface MarketHoliday {
  name: string;
  /** YYYY-MM-DD */
  date: string;
  status: string;
  exchange: string;
  year: number;
  openTime: string | null;
  closeTime: string | null;
}

export interface PremarketMover {
  symbol: string;
  price: number;
  change: number;
  changePercent: number;
  volume: number;
  direction: MoverDirection;
  /** YYYY-MM-DD */
  asOfDate: string;
}

export interface PremarketSnapshot {
  gainers: PremarketMover[];
  losers: PremarketMover[];
}

// --- Read API payloads ---

export interface SuccessPayload<T> {
  status: 'success';
  data: T;
}

export interface ErrorPayload {
  status: 'error';
  error: string;
}

export type TriggerResult = 'success' | `failed: ${string}`;

export interface TriggerPayload {
  status: 'completed';
  results: Partial<Record<ScrapeDomain, TriggerResult>>;
}

export interface JobRunSummary {
  status: 'success' | 'failed';
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  recordCount: number;
  skippedCount: number;
  error: string | null;
}

export interface SchedulerJobState {
  id: ScrapeDomain;
  name: string;
  cadence: string;
  /** Longest expected gap between two scheduled runs. */
  intervalMs: number;
  running: boolean;
  nextRunUtc: string | null;
  lastRun: JobRunSummary | null;
  lastSuccessAt: string | null;
}

export interface SchedulerState {
  enabledByConfig: boolean;
  enabled: boolean;
  jobs: SchedulerJobState[];
}

export interface JobFreshness {
  id: ScrapeDomain;
  lastSuccessAt: string | null;
  /** Seconds since the last success; null when the job has not succeeded since startup. */
  ageSeconds: number | null;
  stale: boolean;
}

export interface FreshnessPayload {
  status: 'fresh' | 'stale';
  jobs: JobFreshness[];
}
