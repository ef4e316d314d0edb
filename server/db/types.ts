import type { ColumnType, Generated } from 'kysely';

export type Timestamp = ColumnType<Date, Date | string, Date | string>;

/** pg returns `double precision` as number, but some drivers hand back strings. */
export type Float = ColumnType<number | string, number, number>;

export interface EarningsReports {
  ticker: string;
  report_date: string;
  time_of_day: string;
  eps_estimate: string;
  reported_eps: string;
  revenue_forecast: string;
  reported_revenue: string;
  market_cap: string;
  updated_at: Generated<Timestamp>;
}

export interface EconomicEvents {
  event_timestamp: string;
  event_time_label: string;
  country: string;
  event_name: string;
  actual: string;
  forecast: string;
  prior: string;
  updated_at: Generated<Timestamp>;
}

export interface SentimentReadings {
  captured_at: Timestamp;
  value: number;
  category: string;
  updated_at: Generated<Timestamp>;
}

export interface MarketHolidays {
  name: string;
  holiday_date: string;
  status: string;
  exchange: string;
  year: number;
  open_time: string | null;
  close_time: string | null;
  updated_at: Generated<Timestamp>;
}

export interface PremarketMovers {
  symbol: string;
  price: Float;
  change: Float;
  change_percent: Float;
  volume: Float;
  direction: string;
  as_of_date: string;
  updated_at: Generated<Timestamp>;
}

export interface Database {
  earnings_reports: EarningsReports;
  economic_events: EconomicEvents;
  sentiment_readings: SentimentReadings;
  market_holidays: MarketHolidays;
  premarket_movers: PremarketMovers;
}
