import { describeError } from '../lib/errors.js';
import { formatSeconds, type CollectResult, type ScrapeOutcome } from './browserJob.js';

export interface ApiFetchOptions<T> {
  label: string;
  fetch: () => Promise<CollectResult<T>>;
  now?: () => number;
}

/** Same outcome contract as `runBrowserScrape`, for jobs that read a JSON API instead of a page. */
export async function runApiFetch<T>(options: ApiFetchOptions<T>): Promise<ScrapeOutcome<T>> {
  const { label, fetch } = options;
  const now = options.now ?? Date.now;
  const startedAt = now();
  try {
    const { records, skipped } = await fetch();
    const durationMs = now() - startedAt;
    console.log(
      `[scraper:${label}] Fetched ${records.length} record(s), skipped ${skipped.length} in ${formatSeconds(durationMs)}`,
    );
    return { ok: true, records, skipped, durationMs };
  } catch (err: unknown) {
    const durationMs = now() - startedAt;
    const error = describeError(err);
    console.error(`[scraper:${label}] Fetch failed after ${formatSeconds(durationMs)}: ${error}`);
    return { ok: false, records: [], skipped: [], error, phase: 'fetching', durationMs };
  }
}
