import 'dotenv/config';
import path from 'path';

function clampInt(raw: string | undefined, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const numeric = Math.floor(Number(raw));
  if (!Number.isFinite(numeric) || raw === undefined || raw === '') return fallback;
  return Math.min(max, Math.max(min, numeric));
}

// --- Server ---
export const PORT = clampInt(process.env.PORT, 5001, 1, 65_535);
export const HOST = String(process.env.HOST || '0.0.0.0').trim();
export const CORS_ORIGIN = String(process.env.CORS_ORIGIN || '').trim();
export const REQUEST_LOG_ENABLED = String(process.env.REQUEST_LOG_ENABLED || 'false').toLowerCase() === 'true';

// --- Upstream market data ---
export const UPSTREAM_BASE_URL = String(process.env.UPSTREAM_BASE_URL || 'https://query1.finance.yahoo.com').trim();
/** Hard timeout applied to every upstream call. */
export const UPSTREAM_TIMEOUT_MS = clampInt(process.env.UPSTREAM_TIMEOUT_MS, 12_000, 1_000, 60_000);
/** Token-bucket ceiling shared by every upstream call from this process. */
export const UPSTREAM_MAX_REQUESTS_PER_SECOND = clampInt(process.env.UPSTREAM_MAX_REQUESTS_PER_SECOND, 8, 1, 100);

// --- Fetch cycle ---
export const FETCH_CONCURRENCY = clampInt(process.env.FETCH_CONCURRENCY, 8, 1, 32);
/** Total attempts per symbol (initial attempt + retries). */
export const FETCH_MAX_ATTEMPTS = clampInt(process.env.FETCH_MAX_ATTEMPTS, 3, 1, 5);
export const FETCH_RETRY_BASE_MS = clampInt(process.env.FETCH_RETRY_BASE_MS, 500, 0, 10_000);
export const FETCH_BASE_SPACING_MS = clampInt(process.env.FETCH_BASE_SPACING_MS, 100, 0, 10_000);
export const FETCH_JITTER_MS = clampInt(process.env.FETCH_JITTER_MS, 150, 0, 10_000);
export const FETCH_MAX_SPACING_MS = clampInt(process.env.FETCH_MAX_SPACING_MS, 5_000, 0, 60_000);
/** Soft deadline for one whole cycle; unfinished symbols are marked absent. */
export const CYCLE_DEADLINE_MS = clampInt(process.env.CYCLE_DEADLINE_MS, 90_000, 5_000, 15 * 60_000);
export const NOT_FOUND_TTL_MS = clampInt(process.env.NOT_FOUND_TTL_MS, 6 * 60 * 60_000, 0);

// --- Cache / refresh cadence ---
export const CACHE_TTL_MS = clampInt(process.env.CACHE_TTL_MS, 5 * 60_000, 10_000);
export const REFRESH_INTERVAL_MS = clampInt(process.env.REFRESH_INTERVAL_MS, 5 * 60_000, 30_000);
export const OFF_HOURS_REFRESH_INTERVAL_MS = clampInt(process.env.OFF_HOURS_REFRESH_INTERVAL_MS, 30 * 60_000, 60_000);
export const REFRESH_SCHEDULER_ENABLED =
  String(process.env.REFRESH_SCHEDULER_ENABLED || 'true').toLowerCase() !== 'false';

// --- Analytics ---
export const MOVERS_TOP_N = clampInt(process.env.MOVERS_TOP_N, 10, 1, 50);
export const NEWS_MAX_ITEMS = clampInt(process.env.NEWS_MAX_ITEMS, 30, 1, 200);
/** Movers whose headlines are requested in addition to general market news. */
export const NEWS_SYMBOL_LIMIT = clampInt(process.env.NEWS_SYMBOL_LIMIT, 6, 0, 50);
export const EARNINGS_LOOKAHEAD_DAYS = 14;
export const DIVIDEND_LOOKAHEAD_DAYS = 30;

// --- Watchlist source ---
export const NOTION_TOKEN = String(process.env.NOTION_TOKEN || '').trim();
export const NOTION_DATABASE_ID = String(process.env.NOTION_DATABASE_ID || '').trim();
export const WATCHLIST_FILE = path.resolve(process.cwd(), process.env.WATCHLIST_FILE || 'config/watchlist.json');
export const WATCHLIST_CACHE_FILE = path.resolve(
  process.cwd(),
  process.env.WATCHLIST_CACHE_FILE || 'data/last_watchlist.json',
);
export const WATCHLIST_CACHE_MAX_AGE_MS = 24 * 60 * 60_000;

// --- Startup validation ---
export function validateStartupEnvironment(): { warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];
  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };
  const warnIfInvalidNonNegativeNumber = (name: string) => {
    const raw = process.env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric < 0) {
      warnings.push(`${name} should be a non-negative number (received: ${String(raw)})`);
    }
  };

  if (!NOTION_TOKEN) {
    warnings.push('NOTION_TOKEN is not set — watchlist is read from the cache file or static config');
  } else if (!NOTION_DATABASE_ID) {
    errors.push('NOTION_DATABASE_ID must be set when NOTION_TOKEN is set');
  }

  [
    'PORT',
    'UPSTREAM_TIMEOUT_MS',
    'UPSTREAM_MAX_REQUESTS_PER_SECOND',
    'FETCH_CONCURRENCY',
    'FETCH_MAX_ATTEMPTS',
    'CYCLE_DEADLINE_MS',
    'CACHE_TTL_MS',
    'REFRESH_INTERVAL_MS',
    'OFF_HOURS_REFRESH_INTERVAL_MS',
    'MOVERS_TOP_N',
    'NEWS_MAX_ITEMS',
  ].forEach(warnIfInvalidPositiveNumber);
  [
    'FETCH_RETRY_BASE_MS',
    'FETCH_BASE_SPACING_MS',
    'FETCH_JITTER_MS',
    'FETCH_MAX_SPACING_MS',
    'NOT_FOUND_TTL_MS',
    'NEWS_SYMBOL_LIMIT',
  ].forEach(warnIfInvalidNonNegativeNumber);

  for (const warning of warnings) {
    console.warn(`[startup-env] ${warning}`);
  }
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`[startup-env] ${error}`);
    }
    throw new Error('Startup environment validation failed');
  }
  return { warnings };
}
