// Shared constants used by both the collector and the read API.

export const SCRAPE_DOMAINS = [
  'economic_data',
  'fear_index',
  'earnings',
  'next_week_earnings',
  'market_holidays',
  'premarket_movers',
] as const;

export const EARNINGS_WEEKS = ['this_week', 'next_week'] as const;

export const MOVER_DIRECTIONS = ['gainer', 'loser'] as const;

export const SENTIMENT_CATEGORIES = ['Extreme Fear', 'Fear', 'Neutral', 'Greed', 'Extreme Greed', 'Unknown'] as const;

/** Placeholder stored when a value cell is absent from a scraped row. */
export const MISSING_VALUE = 'N/A';

/** Placeholder stored when a label (earnings time of day, event time) is absent. */
export const UNKNOWN_VALUE = 'Unknown';
