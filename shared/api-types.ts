// Shared API types: single source of truth for the snapshot contract served to
// the report generator and the dashboard.

import type { ABSENT_REASONS } from './constants.js';

// --- Watchlist ---

export type SymbolKind = 'equity' | 'always-open';

export interface WatchlistEntry {
  symbol: string;
  name: string | null;
  /** Sector label from the watchlist source; never inferred. */
  sector: string | null;
  status: string;
  sentiment: string | null;
  thesis: string | null;
  catalysts: string | null;
  categories: string[];
}

// --- Quotes ---

export interface ExtendedHoursQuote {
  preMarketPrice: number | null;
  preMarketChange: number | null;
  preMarketChangePercent: number | null;
  postMarketPrice: number | null;
  postMarketChange: number | null;
  postMarketChangePercent: number | null;
}

export interface QuoteRecord {
  symbol: string;
  name: string;
  kind: SymbolKind;
  sector: string | null;
  price: number;
  change: number | null;
  changePercent: number | null;
  open: number | null;
  dayHigh: number | null;
  dayLow: number | null;
  previousClose: number | null;
  volume: number | null;
  avgVolume: number | null;
  volumeRatio: number | null;
  marketCap: number | null;
  fiftyTwoWeekHigh: number | null;
  fiftyTwoWeekLow: number | null;
  currency: string;
  /** Oldest → newest. Empty when history failed, otherwise at least two closes. */
  dailyCloses: number[];
  weekChangePercent: number | null;
  /** Only populated for equities. */
  extendedHours: ExtendedHoursQuote | null;
  nextEarningsDate: string | null;
  nextExDividendDate: string | null;
}

export type AbsentReason = (typeof ABSENT_REASONS)[number];

export interface PresentResult {
  status: 'present';
  record: QuoteRecord;
}

export interface AbsentResult {
  status: 'absent';
  symbol: string;
  reason: AbsentReason;
  message: string;
}

export type SymbolResult = PresentResult | AbsentResult;

// --- Indices / futures ---

export type BenchmarkKind = 'index' | 'volatility' | 'future';

export interface BenchmarkDefinition {
  symbol: string;
  name: string;
  kind: BenchmarkKind;
  displayOrder: number;
}

export interface IndexRecord {
  symbol: string;
  name: string;
  kind: BenchmarkKind;
  displayOrder: number;
  price: number;
  change: number | null;
  changePercent: number | null;
  dailyCloses: number[];
  weekChangePercent: number | null;
  display: {
    price: string;
    change: string;
    changePercent: string;
  };
}

// --- Derived views ---

export interface SectorAggregate {
  sector: string;
  averageChangePercent: number;
  count: number;
  /** First constituents in watchlist order, for previews. */
  symbols: string[];
}

export interface MoversList {
  gainers: QuoteRecord[];
  losers: QuoteRecord[];
}

export interface NewsItem {
  title: string;
  source: string;
  publishedAt: string;
  url: string;
  symbol: string | null;
}

export interface EarningsEvent {
  symbol: string;
  name: string;
  date: string;
}

export interface EarningsDay {
  date: string;
  events: EarningsEvent[];
}

export interface DividendEvent {
  symbol: string;
  name: string;
  exDate: string;
}

// --- Snapshot ---

export interface Snapshot {
  cycleId: number;
  /** Epoch ms at which the cycle's results were merged. */
  refreshedAt: number;
  durationMs: number;
  symbolCount: number;
  partialFailureCount: number;
  quotes: Record<string, QuoteRecord>;
  absent: AbsentResult[];
  indices: Record<string, IndexRecord>;
  futures: Record<string, IndexRecord>;
  sectors: SectorAggregate[];
  movers: MoversList;
  news: NewsItem[];
  earnings: EarningsDay[];
  dividends: DividendEvent[];
}

export type SnapshotRead =
  | { ready: false }
  | { ready: true; snapshot: Snapshot; ageSeconds: number; stale: boolean; ttlSeconds: number };

export interface HealthSummary {
  cache_ready: boolean;
  age_seconds: number | null;
  partial_failure_count: number;
  stale: boolean;
  refreshing: boolean;
  last_error: string | null;
}
