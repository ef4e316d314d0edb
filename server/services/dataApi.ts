/**
 * Data API HTTP client: URL construction, API-key redaction, JSON fetching
 * and error classification for the market-data provider that serves the
 * holiday calendar and the pre-market mover snapshots.
 *
 * One attempt per call, bounded by a timeout; non-2xx responses and transport
 * failures surface as `DataApiError`.
 */

import { DATA_API_BASE, DATA_API_KEY, DATA_API_TIMEOUT_MS } from '../config.js';
import { DataApiError, describeError, isTimeoutError } from '../lib/errors.js';

export type QueryParams = Record<string, string | number | boolean | undefined | null>;

export type FetchLike = (input: string, init?: { signal?: AbortSignal; headers?: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

export interface DataApiClientOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export interface DataApiClient {
  getJson(path: string, params?: QueryParams): Promise<unknown>;
}

// ---------------------------------------------------------------------------
// URL building
// ---------------------------------------------------------------------------

export function buildDataApiUrl(baseUrl: string, path: string, params: QueryParams = {}): string {
  const normalizedBase = String(baseUrl || '').replace(/\/+$/, '');
  const normalizedPath = String(path || '').replace(/^\/+/, '');
  const url = new URL(`${normalizedBase}/${normalizedPath}`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null && value !== '') {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

export function sanitizeDataApiUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.searchParams.has('apiKey')) parsed.searchParams.set('apiKey', '***');
    if (parsed.searchParams.has('apikey')) parsed.searchParams.set('apikey', '***');
    return parsed.toString();
  } catch {
    return url;
  }
}

// ---------------------------------------------------------------------------
// JSON / payload helpers
// ---------------------------------------------------------------------------

export function parseJsonSafe(text: unknown): unknown {
  if (typeof text !== 'string' || !text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function hasErrorStatus(payload: unknown): payload is object {
  if (!payload || typeof payload !== 'object' || Array.isArray(payload)) return false;
  return String(Reflect.get(payload, 'status') || '').toUpperCase() === 'ERROR';
}

export function extractDataApiError(payload: unknown): string | null {
  if (!payload || typeof payload !== 'object' || Array.isArray(payload)) return null;
  const error: unknown = Reflect.get(payload, 'error');
  const message: unknown = Reflect.get(payload, 'message');
  if (hasErrorStatus(payload)) {
    return String(error || message || 'Data API returned ERROR status').trim();
  }
  for (const value of [error, message]) {
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return null;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export function createDataApiClient(options: DataApiClientOptions = {}): DataApiClient {
  const apiKey = options.apiKey ?? DATA_API_KEY;
  const baseUrl = options.baseUrl ?? DATA_API_BASE;
  const timeoutMs = Math.max(1, options.timeoutMs ?? DATA_API_TIMEOUT_MS);
  const fetchImpl: FetchLike = options.fetchImpl ?? ((input, init) => fetch(input, init));

  async function getJson(path: string, params: QueryParams = {}): Promise<unknown> {
    if (!apiKey) {
      throw new DataApiError('DATA_API_KEY is not configured');
    }
    const url = buildDataApiUrl(baseUrl, path, { ...params, apiKey });
    const safeUrl = sanitizeDataApiUrl(url);
    const startedAt = Date.now();

    let response: Awaited<ReturnType<FetchLike>>;
    let body: string;
    try {
      response = await fetchImpl(url, {
        signal: AbortSignal.timeout(timeoutMs),
        headers: { Accept: 'application/json' },
      });
      body = await response.text();
    } catch (err: unknown) {
      const timedOut = isTimeoutError(err);
      throw new DataApiError(
        `Data API request ${timedOut ? `timed out after ${timeoutMs}ms` : 'failed'}: ${safeUrl} (${describeError(err)})`,
        { isTimeout: timedOut, cause: err },
      );
    }

    const payload = parseJsonSafe(body);
    if (!response.ok) {
      const detail = extractDataApiError(payload) || body.slice(0, 200) || 'no body';
      throw new DataApiError(`Data API request failed (${response.status}): ${safeUrl} (${detail})`, {
        httpStatus: response.status,
      });
    }
    if (payload === null) {
      throw new DataApiError(`Data API returned a non-JSON body: ${safeUrl}`, { httpStatus: response.status });
    }
    const apiError = extractDataApiError(payload);
    if (apiError && hasErrorStatus(payload)) {
      throw new DataApiError(`Data API error: ${apiError}`, { httpStatus: response.status });
    }

    console.debug(`[data-api] GET ${safeUrl} ${response.status} in ${Date.now() - startedAt}ms`);
    return payload;
  }

  return { getJson };
}
