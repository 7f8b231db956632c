import type { QuoteRecord, Snapshot, WatchlistEntry } from '../../shared/api-types.js';
import type { RawQuote } from '../../server/services/upstreamClient.js';

export function rawQuote(symbol: string, price: number, previousClose: number | null, overrides: Partial<RawQuote> = {}): RawQuote {
  return {
    symbol,
    name: null,
    price,
    previousClose,
    open: null,
    dayHigh: null,
    dayLow: null,
    volume: null,
    avgVolume: null,
    marketCap: null,
    fiftyTwoWeekHigh: null,
    fiftyTwoWeekLow: null,
    currency: 'USD',
    preMarketPrice: null,
    postMarketPrice: null,
    ...overrides,
  };
}

export function watchlistEntry(symbol: string, overrides: Partial<WatchlistEntry> = {}): WatchlistEntry {
  return {
    symbol,
    name: null,
    sector: null,
    status: 'Watching',
    sentiment: null,
    thesis: null,
    catalysts: null,
    categories: [],
    ...overrides,
  };
}

/** A present equity record with only the fields analytics look at filled in. */
export function quoteRecord(symbol: string, changePercent: number | null, overrides: Partial<QuoteRecord> = {}): QuoteRecord {
  return {
    symbol,
    name: symbol,
    kind: 'equity',
    sector: null,
    price: 100,
    change: changePercent,
    changePercent,
    open: null,
    dayHigh: null,
    dayLow: null,
    previousClose: null,
    volume: null,
    avgVolume: null,
    volumeRatio: null,
    marketCap: null,
    fiftyTwoWeekHigh: null,
    fiftyTwoWeekLow: null,
    currency: 'USD',
    dailyCloses: [],
    weekChangePercent: null,
    extendedHours: null,
    nextEarningsDate: null,
    nextExDividendDate: null,
    ...overrides,
  };
}

export function snapshot(cycleId: number, refreshedAt: number, overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    cycleId,
    refreshedAt,
    durationMs: 0,
    symbolCount: 0,
    partialFailureCount: 0,
    quotes: {},
    absent: [],
    indices: {},
    futures: {},
    sectors: [],
    movers: { gainers: [], losers: [] },
    news: [],
    earnings: [],
    dividends: [],
    ...overrides,
  };
}
