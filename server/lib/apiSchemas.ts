/**
 * Zod schemas for external Data API responses.
 *
 * These validate the shape of JSON payloads at the system boundary before
 * they propagate into the rest of the application, so an upstream contract
 * change shows up as a validation warning instead of a bad row.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Upcoming market holidays  (v1/marketstatus/upcoming)
// ---------------------------------------------------------------------------

const MarketHolidayEntrySchema = z
  .object({
    date: z.string().optional(),
    exchange: z.string().optional(),
    name: z.string().optional(),
    status: z.string().optional(),
    open: z.string().optional(), // early-close sessions only
    close: z.string().optional(),
  })
  .passthrough();

export const MarketHolidaysResponseSchema = z.array(MarketHolidayEntrySchema);

export type MarketHolidayEntry = z.infer<typeof MarketHolidayEntrySchema>;

// ---------------------------------------------------------------------------
// Gainers / losers snapshot  (v2/snapshot/locale/us/markets/stocks/…)
// ---------------------------------------------------------------------------

const SnapshotBarSchema = z
  .object({
    c: z.number().optional(), // close
    v: z.number().optional(), // volume
  })
  .passthrough();

const SnapshotTickerSchema = z
  .object({
    ticker: z.string(),
    todaysChange: z.number().optional(),
    todaysChangePerc: z.number().optional(),
    day: SnapshotBarSchema.optional(),
    min: SnapshotBarSchema.optional(),
    prevDay: SnapshotBarSchema.optional(),
    lastTrade: z.object({ p: z.number().optional() }).passthrough().optional(),
  })
  .passthrough();

export const MoversSnapshotResponseSchema = z
  .object({
    tickers: z.array(SnapshotTickerSchema).default([]),
  })
  .passthrough();

export type SnapshotTicker = z.infer<typeof SnapshotTickerSchema>;

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

/**
 * Validate a parsed JSON payload against a Zod schema.
 * Returns the validated data on success, or `null` on failure (with a
 * console warning).
 */
export function validateApiResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, label: string): T | null {
  const result = schema.safeParse(payload);
  if (result.success) return result.data;
  console.warn(`[Zod] ${label}: API response failed validation:`, result.error.issues.slice(0, 3));
  return null;
}
