/**
 * Field Extractor: turns one row handle into one normalized record.
 *
 * Absent sub-elements become sentinels; anything else that goes wrong inside a
 * row becomes an explicit skip so the remaining rows still get scraped.
 */

import type { RowHandle } from '../browser/pageDriver.js';
import { MISSING_VALUE } from '../../shared/constants.js';
import { dateKeyFromYmdParts, isValidDateKey } from '../lib/dateUtils.js';
import { describeError } from '../lib/errors.js';

export type RowResult<T> = { kind: 'record'; record: T } | { kind: 'skip'; reason: string };

export interface SkippedRow {
  index: number;
  reason: string;
}

export interface ExtractionSummary<T> {
  records: T[];
  skipped: SkippedRow[];
}

export type RowExtractor<T> = (row: RowHandle) => Promise<RowResult<T>>;

export function recordOf<T>(record: T): RowResult<T> {
  return { kind: 'record', record };
}

export function skipRow<T>(reason: string): RowResult<T> {
  return { kind: 'skip', reason };
}

/**
 * Runs `extractor` over every row in order. Thrown errors are logged with the
 * row index and counted as skips; they never abort the remaining rows.
 */
export async function extractRows<T>(
  rows: readonly RowHandle[],
  extractor: RowExtractor<T>,
  label: string,
): Promise<ExtractionSummary<T>> {
  const records: T[] = [];
  const skipped: SkippedRow[] = [];
  for (const row of rows) {
    let result: RowResult<T>;
    try {
      result = await extractor(row);
    } catch (err: unknown) {
      const reason = describeError(err);
      console.error(`[extract:${label}] Error processing row ${row.index}: ${reason}`);
      skipped.push({ index: row.index, reason });
      continue;
    }
    if (result.kind === 'record') {
      records.push(result.record);
    } else {
      console.warn(`[extract:${label}] Skipped row ${row.index}: ${result.reason}`);
      skipped.push({ index: row.index, reason: result.reason });
    }
  }
  return { records, skipped };
}

// ---------------------------------------------------------------------------
// Field lookups
// ---------------------------------------------------------------------------

export function cleanText(value: string | null | undefined): string {
  return String(value ?? '')
    .replace(/[\r\n]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Text of the first `selector` match, cleaned, or `sentinel` when the element is absent or blank. */
export async function readField(row: RowHandle, selector: string, sentinel: string = MISSING_VALUE): Promise<string> {
  const raw = await row.text(selector);
  const value = cleanText(raw);
  return value || sentinel;
}

/** Like `readField`, with the display-only currency unit removed. */
export async function readAmountField(row: RowHandle, selector: string, sentinel: string = MISSING_VALUE): Promise<string> {
  const value = stripCurrencySuffix(await readField(row, selector, sentinel));
  return value || sentinel;
}

export async function readAttribute(
  row: RowHandle,
  selector: string,
  name: string,
  sentinel: string = MISSING_VALUE,
): Promise<string> {
  const value = cleanText(await row.attribute(selector, name));
  return value || sentinel;
}

// ---------------------------------------------------------------------------
// Normalizers
// ---------------------------------------------------------------------------

/**
 * First line of the symbol cell, minus one trailing "D". The earnings calendar
 * appends that marker to flag a listing class; other sources do not.
 */
export function normalizeEarningsTicker(raw: string | null | undefined): string {
  const firstLine = String(raw ?? '')
    .split(/\r?\n/)[0]
    .trim();
  return firstLine.endsWith('D') ? firstLine.slice(0, -1) : firstLine;
}

/** Removes a trailing "USD" unit; the amount itself stays display text ("1.23B"). */
export function stripCurrencySuffix(value: string, unit = 'USD'): string {
  const trimmed = value.replace(/[\u00a0\u202f]/g, ' ').trim();
  if (!trimmed.toUpperCase().endsWith(unit.toUpperCase())) return trimmed;
  return trimmed.slice(0, trimmed.length - unit.length).trim();
}

const MONTHS: Record<string, number> = {
  jan: 1,
  feb: 2,
  mar: 3,
  apr: 4,
  may: 5,
  jun: 6,
  jul: 7,
  aug: 8,
  sep: 9,
  oct: 10,
  nov: 11,
  dec: 12,
};

/** Accepts `YYYY-MM-DD` or `Mon D, YYYY`; returns a date key or null. */
export function normalizeReportDate(raw: string | null | undefined): string | null {
  const value = cleanText(raw);
  if (!value) return null;

  const iso = value.match(/^(\d{4})-(\d{2})-(\d{2})/);
  if (iso) {
    const key = dateKeyFromYmdParts(Number(iso[1]), Number(iso[2]), Number(iso[3]));
    return isValidDateKey(key) ? key : null;
  }

  const display = value.match(/^([A-Za-z]{3})[a-z]*\.?\s+(\d{1,2}),?\s+(\d{4})$/);
  if (display) {
    const month = MONTHS[display[1].toLowerCase()];
    if (!month) return null;
    const key = dateKeyFromYmdParts(Number(display[3]), month, Number(display[2]));
    return isValidDateKey(key) ? key : null;
  }

  return null;
}

/**
 * `2024-03-20T13:30:00.000Z` → `2024-03-20 13:30:00`. Any other input is
 * returned unchanged so the raw value is still stored.
 */
export function formatEventTimestamp(raw: string): string {
  const match = raw.trim().match(/^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})\.\d+Z$/);
  if (!match) return raw;
  const parsed = Date.parse(raw.trim());
  if (!Number.isFinite(parsed)) return raw;
  return `${match[1]} ${match[2]}`;
}
