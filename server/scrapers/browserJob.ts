/**
 * Shared lifecycle for browser-driven scrapers:
 *
 *   idle → opening → filtering → extracting → closed
 *
 * `closed` is reached on every path. Errors never escape; they come back as a
 * failed `ScrapeOutcome` carrying the phase they happened in. JSON-API jobs
 * report `fetching` instead (see apiJob.ts).
 */

import type { FilterAction, PageDriver, PageSession, PageTarget } from '../browser/pageDriver.js';
import { closeSession } from '../browser/pageDriver.js';
import { describeError } from '../lib/errors.js';
import type { SkippedRow } from './extract.js';

export type ScrapePhase = 'idle' | 'opening' | 'filtering' | 'extracting' | 'fetching' | 'closed';

export type ScrapeOutcome<T> =
  | { ok: true; records: T[]; skipped: SkippedRow[]; durationMs: number }
  | { ok: false; records: []; skipped: SkippedRow[]; error: string; phase: ScrapePhase; durationMs: number };

export interface ScrapeJob<T> {
  readonly label: string;
  scrape(): Promise<ScrapeOutcome<T>>;
  /** Records of `scrape()`; an empty list when the scrape failed. */
  run(): Promise<T[]>;
}

export interface CollectResult<T> {
  records: T[];
  skipped: SkippedRow[];
}

export interface BrowserScrapeOptions<T> {
  label: string;
  driver: PageDriver;
  target: PageTarget;
  filters?: readonly FilterAction[];
  /** Delay after the last filter so the page can settle before extraction. */
  settleAfterFiltersMs?: number;
  collect: (session: PageSession) => Promise<CollectResult<T>>;
  now?: () => number;
  /** Called on every lifecycle transition, ending with `closed`. */
  onPhase?: (phase: ScrapePhase) => void;
}

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

export async function runBrowserScrape<T>(options: BrowserScrapeOptions<T>): Promise<ScrapeOutcome<T>> {
  const { label, driver, target, filters = [], settleAfterFiltersMs = 0, collect } = options;
  const now = options.now ?? Date.now;
  const startedAt = now();
  let phase: ScrapePhase = 'idle';
  let session: PageSession | null = null;
  const enter = (next: ScrapePhase) => {
    phase = next;
    options.onPhase?.(next);
  };

  try {
    enter('opening');
    session = await driver.open(target);

    enter('filtering');
    for (const filter of filters) {
      await session.applyFilter(filter);
    }
    if (filters.length > 0 && settleAfterFiltersMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, settleAfterFiltersMs));
    }

    enter('extracting');
    const { records, skipped } = await collect(session);
    const durationMs = now() - startedAt;
    console.log(
      `[scraper:${label}] Collected ${records.length} record(s), skipped ${skipped.length} row(s) in ${formatSeconds(durationMs)}`,
    );
    return { ok: true, records, skipped, durationMs };
  } catch (err: unknown) {
    const durationMs = now() - startedAt;
    const error = describeError(err);
    console.error(`[scraper:${label}] Failed while ${phase} after ${formatSeconds(durationMs)}: ${error}`);
    return { ok: false, records: [], skipped: [], error, phase, durationMs };
  } finally {
    if (session) {
      await closeSession(session);
    }
    console.debug(`[scraper:${label}] Session closed after ${phase}`);
    enter('closed');
  }
}

/** Wraps a `scrape` function into the `ScrapeJob` shape. */
export function defineScrapeJob<T>(label: string, scrape: () => Promise<ScrapeOutcome<T>>): ScrapeJob<T> {
  return {
    label,
    scrape,
    async run() {
      const outcome = await scrape();
      return outcome.records;
    },
  };
}
