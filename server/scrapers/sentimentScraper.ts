/**
 * Fear & Greed gauge scraper.
 *
 * The gauge markup drifts often, so the readout is located through an ordered
 * list of strategies; the first one that yields a pure-digit string wins.
 */

import type { SentimentCategory, SentimentReading } from '../../shared/api-types.js';
import type { PageDriver, PageSession } from '../browser/pageDriver.js';
import { SENTIMENT_GAUGE_URL } from '../config.js';
import { truncateToUtcHour } from '../lib/dateUtils.js';
import { describeError } from '../lib/errors.js';
import { defineScrapeJob, runBrowserScrape, type ScrapeJob } from './browserJob.js';

export function categorizeSentiment(value: unknown): SentimentCategory {
  let numeric = Number.NaN;
  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    numeric = Number(value.trim());
  }
  if (!Number.isInteger(numeric)) return 'Unknown';

  if (numeric >= 0 && numeric <= 25) return 'Extreme Fear';
  if (numeric >= 26 && numeric <= 44) return 'Fear';
  if (numeric >= 45 && numeric <= 55) return 'Neutral';
  if (numeric >= 56 && numeric <= 74) return 'Greed';
  if (numeric >= 75 && numeric <= 100) return 'Extreme Greed';
  return 'Unknown';
}

export interface SentimentReadStrategy {
  name: string;
  read(session: PageSession): Promise<string | null>;
}

export function selectorStrategy(selector: string): SentimentReadStrategy {
  return {
    name: selector,
    read: (session) => session.readText(selector),
  };
}

export const DEFAULT_SENTIMENT_SELECTORS = [
  'span.dial-number-value',
  '.market-fng-gauge__dial-number-value',
  "[class*='dial-number-value']",
  "[data-testid='fear-greed-value']",
] as const;

export const DEFAULT_SENTIMENT_STRATEGIES: readonly SentimentReadStrategy[] =
  DEFAULT_SENTIMENT_SELECTORS.map(selectorStrategy);

export interface SentimentValue {
  value: number;
  strategy: string;
}

/** Tries each strategy in order; a strategy that throws is logged and the next one is tried. */
export async function readSentimentValue(
  session: PageSession,
  strategies: readonly SentimentReadStrategy[],
): Promise<SentimentValue | null> {
  for (const strategy of strategies) {
    let text: string | null;
    try {
      text = await strategy.read(session);
    } catch (err: unknown) {
      console.warn(`[scraper:fear-index] Strategy "${strategy.name}" failed: ${describeError(err)}`);
      continue;
    }
    const trimmed = String(text ?? '').trim();
    if (/^\d+$/.test(trimmed)) {
      return { value: Number(trimmed), strategy: strategy.name };
    }
  }
  return null;
}

export interface SentimentScraperOptions {
  driver: PageDriver;
  url?: string;
  strategies?: readonly SentimentReadStrategy[];
  /** Landmark awaited before reading; defaults to any of the default selectors. */
  readySelector?: string;
  clock?: () => Date;
}

export function createSentimentScraper(options: SentimentScraperOptions): ScrapeJob<SentimentReading> {
  const {
    driver,
    url = SENTIMENT_GAUGE_URL,
    strategies = DEFAULT_SENTIMENT_STRATEGIES,
    readySelector = DEFAULT_SENTIMENT_SELECTORS.join(', '),
    clock = () => new Date(),
  } = options;
  const label = 'fear-index';

  return defineScrapeJob(label, () =>
    runBrowserScrape<SentimentReading>({
      label,
      driver,
      target: { url, readySelector, navigationTimeoutMs: 30_000, readyTimeoutMs: 15_000 },
      collect: async (session) => {
        const reading = await readSentimentValue(session, strategies);
        if (!reading) {
          throw new Error(`Unable to locate a numeric gauge value (${strategies.length} strategies tried)`);
        }
        const category = categorizeSentiment(reading.value);
        console.log(`[scraper:${label}] Fear value ${reading.value} (${category}) via "${reading.strategy}"`);
        return {
          records: [{ capturedAt: truncateToUtcHour(clock()), value: reading.value, category }],
          skipped: [],
        };
      },
    }),
  );
}
