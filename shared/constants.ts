// Shared constants: single source of truth for values used by the server and dashboard clients.

import type { BenchmarkDefinition } from './api-types.js';

/** Symbols ending with this suffix trade continuously (crypto pairs). */
export const ALWAYS_OPEN_SUFFIX = '-USD';

/** Watchlist statuses that are tracked by refresh cycles. */
export const ACTIVE_WATCHLIST_STATUSES = ['Watching', 'Holding'] as const;

export const ABSENT_REASONS = [
  'not_found',
  'rate_limited',
  'unavailable',
  'timeout',
  'malformed',
  'deadline_exceeded',
  'circuit_open',
] as const;

export const INDEX_DEFINITIONS: readonly BenchmarkDefinition[] = [
  { symbol: '^GSPC', name: 'S&P 500', kind: 'index', displayOrder: 1 },
  { symbol: '^IXIC', name: 'NASDAQ', kind: 'index', displayOrder: 2 },
  { symbol: '^DJI', name: 'Dow Jones', kind: 'index', displayOrder: 3 },
  { symbol: '^VIX', name: 'VIX', kind: 'volatility', displayOrder: 4 },
  { symbol: '^RUT', name: 'Russell 2000', kind: 'index', displayOrder: 5 },
];

export const FUTURES_DEFINITIONS: readonly BenchmarkDefinition[] = [
  { symbol: 'ES=F', name: 'S&P 500 Futures', kind: 'future', displayOrder: 1 },
  { symbol: 'NQ=F', name: 'NASDAQ Futures', kind: 'future', displayOrder: 2 },
  { symbol: 'YM=F', name: 'Dow Futures', kind: 'future', displayOrder: 3 },
  { symbol: 'RTY=F', name: 'Russell 2000 Futures', kind: 'future', displayOrder: 4 },
];

/** Trailing window of daily closes kept per symbol for sparklines. */
export const SPARKLINE_DAYS = 7;
