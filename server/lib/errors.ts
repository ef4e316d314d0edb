/**
 * Error types and pure error-classification predicates.
 *
 * Kept in lib/ so the browser driver, the data API client and the stores can
 * share them without depending on each other.
 */

/** The target page never reached a scrapeable state (navigation or readiness wait failed). */
export class SourceUnavailableError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`Source unavailable (${url}): ${describeError(cause)}`, { cause });
    this.name = 'SourceUnavailableError';
    this.url = url;
  }
}

/** Non-2xx response, transport failure or unexpected payload from the JSON data provider. */
export class DataApiError extends Error {
  readonly httpStatus: number | null;
  readonly isTimeout: boolean;

  constructor(message: string, options: { httpStatus?: number | null; isTimeout?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'DataApiError';
    this.httpStatus = options.httpStatus ?? null;
    this.isTimeout = options.isTimeout ?? false;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

/**
 * Returns true for Playwright `TimeoutError`s, `AbortSignal.timeout()` rejections
 * and anything whose message says it timed out.
 */
function fieldOf(err: object, key: string): string {
  const value: unknown = Reflect.get(err, key);
  return value === undefined || value === null ? '' : String(value);
}

export function isTimeoutError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  if (fieldOf(err, 'name') === 'TimeoutError') return true;
  if (err instanceof DataApiError && err.isTimeout) return true;
  return /timed?\s*out|timeout \d+ms exceeded/i.test(fieldOf(err, 'message'));
}

/** Postgres "relation does not exist": a read that ran before the first write created the table. */
export function isUndefinedTableError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  if (fieldOf(err, 'code') === '42P01') return true;
  return /relation .* does not exist/i.test(fieldOf(err, 'message'));
}
