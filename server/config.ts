import 'dotenv/config';

function readInt(name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const numeric = Math.floor(Number(raw));
  if (!Number.isFinite(numeric)) return fallback;
  return Math.min(max, Math.max(min, numeric));
}

function readFlag(name: string, fallback: boolean): boolean {
  const raw = String(process.env[name] ?? '').trim().toLowerCase();
  if (!raw) return fallback;
  return raw !== 'false' && raw !== '0' && raw !== 'no';
}

// --- Server ---
export const PORT = readInt('PORT', 3000, 1, 65_535);
export const HOST = String(process.env.HOST || '0.0.0.0').trim();
export const CORS_ORIGIN = String(process.env.CORS_ORIGIN || '*').trim();
export const REQUEST_LOG_ENABLED = readFlag('REQUEST_LOG_ENABLED', false);
export const IS_PRODUCTION = process.env.NODE_ENV === 'production';

// --- Database ---
export const DATABASE_URL = String(process.env.DATABASE_URL || process.env.DB_URL || '').trim();
export const DB_SSL_ENABLED = readFlag('DB_SSL_ENABLED', IS_PRODUCTION);
export const DB_SSL_REJECT_UNAUTHORIZED = readFlag('DB_SSL_REJECT_UNAUTHORIZED', IS_PRODUCTION);
export const DB_POOL_MAX = readInt('DB_POOL_MAX', 10, 1, 100);

// --- Data provider (holidays, pre-market movers) ---
export const DATA_API_KEY = String(process.env.DATA_API_KEY || process.env.POLYGON_API_KEY || '').trim();
export const DATA_API_BASE = String(process.env.DATA_API_BASE || 'https://api.polygon.io').trim();
export const DATA_API_TIMEOUT_MS = readInt('DATA_API_TIMEOUT_MS', 15_000, 1_000);
/** Each mover list (gainers, losers) is truncated to this many entries before storage. */
export const PREMARKET_MAX_MOVERS = readInt('PREMARKET_MAX_MOVERS', 20, 1, 100);

// --- Browser ---
export const BROWSER_HEADLESS = readFlag('BROWSER_HEADLESS', true);
export const BROWSER_EXECUTABLE_PATH = String(process.env.BROWSER_EXECUTABLE_PATH || '').trim();
export const BROWSER_CHANNEL = String(process.env.BROWSER_CHANNEL || '').trim();
export const NAVIGATION_TIMEOUT_MS = readInt('NAVIGATION_TIMEOUT_MS', 60_000, 1_000);
export const READY_TIMEOUT_MS = readInt('READY_TIMEOUT_MS', 30_000, 1_000);
export const FILTER_TIMEOUT_MS = readInt('FILTER_TIMEOUT_MS', 10_000, 500);
export const FIELD_TIMEOUT_MS = readInt('FIELD_TIMEOUT_MS', 3_000, 100);

// --- Upstream pages ---
export const EARNINGS_CALENDAR_URL = String(
  process.env.EARNINGS_CALENDAR_URL || 'https://www.tradingview.com/markets/stocks-usa/earnings/',
).trim();
export const ECONOMIC_CALENDAR_URL = String(
  process.env.ECONOMIC_CALENDAR_URL || 'https://www.tradingview.com/symbols/USDCAD/economic-calendar/?exchange=FX_IDC',
).trim();
export const SENTIMENT_GAUGE_URL = String(
  process.env.SENTIMENT_GAUGE_URL || 'https://www.cnn.com/markets/fear-and-greed',
).trim();

// --- Scheduler (all times America/New_York) ---
export const SCHEDULER_ENABLED = readFlag('SCHEDULER_ENABLED', true);
export const ECONOMIC_DATA_HOUR = readInt('ECONOMIC_DATA_HOUR', 12, 0, 23);
export const ECONOMIC_DATA_MINUTE = readInt('ECONOMIC_DATA_MINUTE', 35, 0, 59);
export const FEAR_INDEX_MINUTE = readInt('FEAR_INDEX_MINUTE', 0, 0, 59);
export const EARNINGS_HOUR = readInt('EARNINGS_HOUR', 4, 0, 23);
export const EARNINGS_MINUTE = readInt('EARNINGS_MINUTE', 0, 0, 59);
export const NEXT_WEEK_EARNINGS_DAY = readInt('NEXT_WEEK_EARNINGS_DAY', 1, 0, 6);
export const NEXT_WEEK_EARNINGS_HOUR = readInt('NEXT_WEEK_EARNINGS_HOUR', 12, 0, 23);
export const NEXT_WEEK_EARNINGS_MINUTE = readInt('NEXT_WEEK_EARNINGS_MINUTE', 0, 0, 59);
export const MARKET_HOLIDAYS_DAY = readInt('MARKET_HOLIDAYS_DAY', 0, 0, 6);
export const MARKET_HOLIDAYS_HOUR = readInt('MARKET_HOLIDAYS_HOUR', 18, 0, 23);
export const MARKET_HOLIDAYS_MINUTE = readInt('MARKET_HOLIDAYS_MINUTE', 0, 0, 59);
export const PREMARKET_HOUR = readInt('PREMARKET_HOUR', 9, 0, 23);
export const PREMARKET_MINUTE = readInt('PREMARKET_MINUTE', 0, 0, 59);

// --- Startup validation ---
export interface StartupValidationResult {
  errors: string[];
  warnings: string[];
}

export function collectStartupIssues(env: NodeJS.ProcessEnv = process.env): StartupValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };
  const warnIfInvalidClockField = (name: string, max: number) => {
    const raw = env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isInteger(numeric) || numeric < 0 || numeric > max) {
      warnings.push(`${name} should be an integer between 0 and ${max} (received: ${String(raw)})`);
    }
  };

  if (!String(env.DATABASE_URL || env.DB_URL || '').trim()) {
    errors.push('DATABASE_URL is required');
  }
  if (!String(env.DATA_API_KEY || env.POLYGON_API_KEY || '').trim()) {
    warnings.push('DATA_API_KEY is not set; market holiday and pre-market mover jobs will fail');
  }

  [
    'DATA_API_TIMEOUT_MS',
    'NAVIGATION_TIMEOUT_MS',
    'READY_TIMEOUT_MS',
    'FILTER_TIMEOUT_MS',
    'FIELD_TIMEOUT_MS',
    'PREMARKET_MAX_MOVERS',
    'DB_POOL_MAX',
  ].forEach(warnIfInvalidPositiveNumber);

  const hourFields = [
    'ECONOMIC_DATA_HOUR',
    'EARNINGS_HOUR',
    'NEXT_WEEK_EARNINGS_HOUR',
    'MARKET_HOLIDAYS_HOUR',
    'PREMARKET_HOUR',
  ];
  const minuteFields = [
    'ECONOMIC_DATA_MINUTE',
    'FEAR_INDEX_MINUTE',
    'EARNINGS_MINUTE',
    'NEXT_WEEK_EARNINGS_MINUTE',
    'MARKET_HOLIDAYS_MINUTE',
    'PREMARKET_MINUTE',
  ];
  hourFields.forEach((name) => warnIfInvalidClockField(name, 23));
  minuteFields.forEach((name) => warnIfInvalidClockField(name, 59));
  ['NEXT_WEEK_EARNINGS_DAY', 'MARKET_HOLIDAYS_DAY'].forEach((name) => warnIfInvalidClockField(name, 6));

  return { errors, warnings };
}

export function validateStartupEnvironment(env: NodeJS.ProcessEnv = process.env): void {
  const { errors, warnings } = collectStartupIssues(env);
  for (const warning of warnings) {
    console.warn(`[startup-env] ${warning}`);
  }
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`[startup-env] ${error}`);
    }
    throw new Error('Startup environment validation failed');
  }
}
