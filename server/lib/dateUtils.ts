/**
 * Shared date/time utility functions used across backend modules.
 * All functions are pure.
 *
 * Day-level values travel as `YYYY-MM-DD` keys; wall-clock scheduling is done
 * in America/New_York.
 */

const ET_TIME_ZONE = 'America/New_York';

function currentEtDateString(nowUtc: Date = new Date()): string {
  return nowUtc.toLocaleDateString('en-CA', {
    timeZone: ET_TIME_ZONE,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  });
}

function dateKeyFromYmdParts(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

function parseDateKeyToUtcMs(dateKey: string): number {
  const value = String(dateKey || '').trim();
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) return NaN;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const ms = Date.UTC(year, month - 1, day, 0, 0, 0, 0);
  // Rejects rollovers such as 2026-02-30.
  return new Date(ms).getUTCDate() === day ? ms : NaN;
}

function isValidDateKey(dateKey: string): boolean {
  return Number.isFinite(parseDateKeyToUtcMs(dateKey));
}

function addDaysToDateKey(dateKey: string, days: number): string {
  const baseMs = parseDateKeyToUtcMs(dateKey);
  if (!Number.isFinite(baseMs)) return '';
  return new Date(baseMs + days * 24 * 60 * 60 * 1000).toISOString().slice(0, 10);
}

/** 0 = Sunday … 6 = Saturday; NaN for malformed keys. */
function weekdayOfDateKey(dateKey: string): number {
  const ms = parseDateKeyToUtcMs(dateKey);
  return Number.isFinite(ms) ? new Date(ms).getUTCDay() : NaN;
}

/** Monday of the week after the one containing `dateKey`. */
function nextWeekStartDateKey(dateKey: string): string {
  const weekday = weekdayOfDateKey(dateKey);
  if (!Number.isFinite(weekday)) return '';
  const daysUntilMonday = weekday === 0 ? 1 : 8 - weekday;
  return addDaysToDateKey(dateKey, daysUntilMonday);
}

function easternLocalToUtcMs(year: number, month: number, day: number, hour: number, minute: number): number {
  const noonUtc = new Date(Date.UTC(year, month - 1, day, 12, 0, 0));
  const etOffset = noonUtc
    .toLocaleString('en-US', {
      timeZone: ET_TIME_ZONE,
      timeZoneName: 'short',
    })
    .includes('EST')
    ? -5
    : -4;
  return Date.UTC(year, month - 1, day, hour - etOffset, minute, 0);
}

function truncateToUtcHour(date: Date): Date {
  const truncated = new Date(date.getTime());
  truncated.setUTCMinutes(0, 0, 0);
  return truncated;
}

export {
  currentEtDateString,
  dateKeyFromYmdParts,
  parseDateKeyToUtcMs,
  isValidDateKey,
  addDaysToDateKey,
  weekdayOfDateKey,
  nextWeekStartDateKey,
  easternLocalToUtcMs,
  truncateToUtcHour,
};
