import type { ExtendedHoursQuote, QuoteRecord, WatchlistEntry } from '../../shared/api-types.js';
import { classifySymbol } from './symbolClassifier.js';
import type { CalendarFields, RawQuote } from './upstreamClient.js';

/** `(to - from) / from * 100`, or null when either side is missing or the base is not positive. */
export function percentChange(from: number | null | undefined, to: number | null | undefined): number | null {
  if (typeof from !== 'number' || typeof to !== 'number') return null;
  if (!Number.isFinite(from) || !Number.isFinite(to) || from <= 0) return null;
  return ((to - from) / from) * 100;
}

/** A single close cannot draw a trend line; keep zero or at least two. */
export function normalizeDailyCloses(closes: readonly number[]): number[] {
  const finite = closes.filter((value) => Number.isFinite(value));
  return finite.length >= 2 ? finite : [];
}

export function weekChangeFromCloses(closes: readonly number[]): number | null {
  if (closes.length < 2) return null;
  return percentChange(closes[0], closes[closes.length - 1]);
}

function buildExtendedHours(raw: RawQuote): ExtendedHoursQuote {
  const pre = raw.preMarketPrice;
  const post = raw.postMarketPrice;
  const preChange = pre !== null && raw.previousClose !== null && raw.previousClose > 0 ? pre - raw.previousClose : null;
  const postChange = post !== null && raw.price > 0 ? post - raw.price : null;
  return {
    preMarketPrice: pre,
    preMarketChange: preChange,
    preMarketChangePercent: percentChange(raw.previousClose, pre),
    postMarketPrice: post,
    postMarketChange: postChange,
    postMarketChangePercent: percentChange(raw.price, post),
  };
}

export interface QuoteBuildInput {
  raw: RawQuote;
  entry: Pick<WatchlistEntry, 'symbol' | 'name' | 'sector'> | null;
  dailyCloses: readonly number[];
  calendar: CalendarFields | null;
}

export function buildQuoteRecord({ raw, entry, dailyCloses, calendar }: QuoteBuildInput): QuoteRecord {
  const symbol = entry?.symbol ?? raw.symbol;
  const kind = classifySymbol(symbol);
  const closes = normalizeDailyCloses(dailyCloses);
  const changePercent = percentChange(raw.previousClose, raw.price);
  return {
    symbol,
    name: entry?.name || raw.name || symbol,
    kind,
    sector: entry?.sector ?? null,
    price: raw.price,
    change: changePercent === null || raw.previousClose === null ? null : raw.price - raw.previousClose,
    changePercent,
    open: raw.open,
    dayHigh: raw.dayHigh,
    dayLow: raw.dayLow,
    previousClose: raw.previousClose,
    volume: raw.volume,
    avgVolume: raw.avgVolume,
    volumeRatio: raw.volume !== null && raw.avgVolume !== null && raw.avgVolume > 0 ? raw.volume / raw.avgVolume : null,
    marketCap: raw.marketCap,
    fiftyTwoWeekHigh: raw.fiftyTwoWeekHigh,
    fiftyTwoWeekLow: raw.fiftyTwoWeekLow,
    currency: raw.currency || 'USD',
    dailyCloses: closes,
    weekChangePercent: weekChangeFromCloses(closes),
    extendedHours: kind === 'equity' ? buildExtendedHours(raw) : null,
    nextEarningsDate: kind === 'equity' ? (calendar?.nextEarningsDate ?? null) : null,
    nextExDividendDate: kind === 'equity' ? (calendar?.nextExDividendDate ?? null) : null,
  };
}
