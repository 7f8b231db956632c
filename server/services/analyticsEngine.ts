/**
 * Analytics Engine: pure, deterministic transforms from one cycle's
 * per-symbol results into the derived views served to readers.
 */

import type {
  AbsentResult,
  BenchmarkDefinition,
  DividendEvent,
  EarningsDay,
  EarningsEvent,
  IndexRecord,
  MoversList,
  NewsItem,
  QuoteRecord,
  SectorAggregate,
  Snapshot,
  SymbolResult,
} from '../../shared/api-types.js';
import { isDateKeyWithinDays } from '../lib/dateUtils.js';

const SECTOR_PREVIEW_SIZE = 5;

// ---------------------------------------------------------------------------
// Sectors
// ---------------------------------------------------------------------------

/**
 * Mean change percent per watchlist sector label. Only equities with both a
 * sector and a change contribute; groups sort by mean desc, count desc, then
 * label asc.
 */
export function computeSectorPerformance(records: readonly QuoteRecord[]): SectorAggregate[] {
  const groups = new Map<string, { total: number; changes: number[]; symbols: string[] }>();
  for (const record of records) {
    if (record.kind !== 'equity') continue;
    const sector = record.sector?.trim();
    if (!sector) continue;
    if (record.changePercent === null || !Number.isFinite(record.changePercent)) continue;
    let group = groups.get(sector);
    if (!group) {
      group = { total: 0, changes: [], symbols: [] };
      groups.set(sector, group);
    }
    group.total += record.changePercent;
    group.changes.push(record.changePercent);
    group.symbols.push(record.symbol);
  }

  const aggregates: SectorAggregate[] = [];
  for (const [sector, group] of groups) {
    aggregates.push({
      sector,
      averageChangePercent: group.total / group.changes.length,
      count: group.changes.length,
      symbols: group.symbols.slice(0, SECTOR_PREVIEW_SIZE),
    });
  }
  return aggregates.sort(
    (a, b) =>
      b.averageChangePercent - a.averageChangePercent ||
      b.count - a.count ||
      (a.sector < b.sector ? -1 : a.sector > b.sector ? 1 : 0),
  );
}

// ---------------------------------------------------------------------------
// Movers
// ---------------------------------------------------------------------------

function compareSymbols(a: QuoteRecord, b: QuoteRecord): number {
  return a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0;
}

/** Strictly positive gainers (desc) and strictly negative losers (asc); null changes are never ranked. */
export function computeTopMovers(records: readonly QuoteRecord[], topN: number): MoversList {
  const limit = Math.max(0, Math.floor(topN));
  const ranked = records.filter(
    (record): record is QuoteRecord & { changePercent: number } =>
      record.changePercent !== null && Number.isFinite(record.changePercent),
  );
  const gainers = ranked
    .filter((record) => record.changePercent > 0)
    .sort((a, b) => b.changePercent - a.changePercent || compareSymbols(a, b))
    .slice(0, limit);
  const losers = ranked
    .filter((record) => record.changePercent < 0)
    .sort((a, b) => a.changePercent - b.changePercent || compareSymbols(a, b))
    .slice(0, limit);
  return { gainers, losers };
}

// ---------------------------------------------------------------------------
// News
// ---------------------------------------------------------------------------

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function buildSymbolMatchers(symbols: readonly string[]): Array<{ symbol: string; pattern: RegExp }> {
  return [...new Set(symbols.map((symbol) => symbol.trim().toUpperCase()).filter(Boolean))].map((symbol) => ({
    symbol,
    pattern: new RegExp(`(^|[^A-Za-z0-9])${escapeRegExp(symbol)}(?=$|[^A-Za-z0-9])`),
  }));
}

function publishedMs(item: NewsItem): number {
  const ms = Date.parse(item.publishedAt);
  return Number.isFinite(ms) ? ms : Number.NEGATIVE_INFINITY;
}

/**
 * Collapse identical `(title, source)` pairs keeping the first occurrence, tag
 * untagged items whose title names a watchlist symbol as a whole word, then
 * order newest first (stable) and cap at `maxItems`.
 */
export function dedupeNews(items: readonly NewsItem[], symbols: readonly string[], maxItems = Infinity): NewsItem[] {
  const matchers = buildSymbolMatchers(symbols);
  const seen = new Set<string>();
  const unique: NewsItem[] = [];
  for (const item of items) {
    const title = item.title.trim();
    if (!title) continue;
    const key = `${title}\u0000${item.source.trim()}`;
    if (seen.has(key)) continue;
    seen.add(key);
    const tagged = item.symbol ?? matchers.find(({ pattern }) => pattern.test(title))?.symbol ?? null;
    unique.push({ ...item, title, symbol: tagged });
  }
  const sorted = unique.sort((a, b) => {
    const aMs = publishedMs(a);
    const bMs = publishedMs(b);
    if (aMs === bMs) return 0;
    return bMs > aMs ? 1 : -1;
  });
  return Number.isFinite(maxItems) ? sorted.slice(0, Math.max(0, Math.floor(maxItems))) : sorted;
}

// ---------------------------------------------------------------------------
// Calendars
// ---------------------------------------------------------------------------

export function buildEarningsCalendar(records: readonly QuoteRecord[], today: string, lookaheadDays: number): EarningsEvent[] {
  const seen = new Set<string>();
  const events: EarningsEvent[] = [];
  for (const record of records) {
    const date = record.nextEarningsDate;
    if (record.kind !== 'equity' || !date) continue;
    if (!isDateKeyWithinDays(date, today, lookaheadDays)) continue;
    const key = `${record.symbol}|${date}`;
    if (seen.has(key)) continue;
    seen.add(key);
    events.push({ symbol: record.symbol, name: record.name, date });
  }
  return events.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : a.symbol < b.symbol ? -1 : 1));
}

export function groupEarningsByDate(events: readonly EarningsEvent[]): EarningsDay[] {
  const byDate = new Map<string, EarningsEvent[]>();
  for (const event of events) {
    const bucket = byDate.get(event.date);
    if (bucket) {
      bucket.push(event);
    } else {
      byDate.set(event.date, [event]);
    }
  }
  return [...byDate.keys()].sort().map((date) => ({ date, events: byDate.get(date) ?? [] }));
}

export function buildDividendCalendar(records: readonly QuoteRecord[], today: string, lookaheadDays: number): DividendEvent[] {
  const events: DividendEvent[] = [];
  for (const record of records) {
    const exDate = record.nextExDividendDate;
    if (record.kind !== 'equity' || !exDate) continue;
    if (!isDateKeyWithinDays(exDate, today, lookaheadDays)) continue;
    events.push({ symbol: record.symbol, name: record.name, exDate });
  }
  return events.sort((a, b) =>
    a.exDate < b.exDate ? -1 : a.exDate > b.exDate ? 1 : a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0,
  );
}

// ---------------------------------------------------------------------------
// Indices / futures
// ---------------------------------------------------------------------------

const LEVEL_FORMATTER = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

/** Volatility is a bare level (`18.42`); other benchmarks use thousands grouping (`5,123.45`). */
export function formatIndexLevel(value: number, kind: BenchmarkDefinition['kind']): string {
  if (!Number.isFinite(value)) return 'N/A';
  return kind === 'volatility' ? value.toFixed(2) : LEVEL_FORMATTER.format(value);
}

function formatSigned(value: number | null, formatted: (abs: number) => string): string {
  if (value === null || !Number.isFinite(value)) return 'N/A';
  return `${value >= 0 ? '+' : '-'}${formatted(Math.abs(value))}`;
}

export function buildIndexRecords(
  results: ReadonlyMap<string, SymbolResult>,
  definitions: readonly BenchmarkDefinition[],
): Record<string, IndexRecord> {
  const out: Record<string, IndexRecord> = {};
  const ordered = [...definitions].sort((a, b) => a.displayOrder - b.displayOrder);
  for (const definition of ordered) {
    const result = results.get(definition.symbol);
    if (!result || result.status !== 'present') continue;
    const { record } = result;
    out[definition.symbol] = {
      symbol: definition.symbol,
      name: definition.name,
      kind: definition.kind,
      displayOrder: definition.displayOrder,
      price: record.price,
      change: record.change,
      changePercent: record.changePercent,
      dailyCloses: record.dailyCloses,
      weekChangePercent: record.weekChangePercent,
      display: {
        price: formatIndexLevel(record.price, definition.kind),
        change: formatSigned(record.change, (abs) => formatIndexLevel(abs, definition.kind)),
        changePercent: formatSigned(record.changePercent, (abs) => `${abs.toFixed(2)}%`),
      },
    };
  }
  return out;
}

// ---------------------------------------------------------------------------
// Snapshot
// ---------------------------------------------------------------------------

export interface SnapshotInput {
  cycleId: number;
  refreshedAt: number;
  durationMs: number;
  results: ReadonlyMap<string, SymbolResult>;
  benchmarks: ReadonlyMap<string, SymbolResult>;
  indexDefinitions: readonly BenchmarkDefinition[];
  futuresDefinitions: readonly BenchmarkDefinition[];
  news: readonly NewsItem[];
  today: string;
  moversTopN: number;
  newsMaxItems: number;
  earningsLookaheadDays: number;
  dividendLookaheadDays: number;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function buildSnapshot(input: SnapshotInput): Snapshot {
  const quotes: Record<string, QuoteRecord> = {};
  const present: QuoteRecord[] = [];
  const absent: AbsentResult[] = [];
  for (const result of input.results.values()) {
    if (result.status === 'present') {
      quotes[result.record.symbol] = result.record;
      present.push(result.record);
    } else {
      absent.push(result);
    }
  }
  let benchmarkFailures = 0;
  for (const result of input.benchmarks.values()) {
    if (result.status === 'absent') benchmarkFailures += 1;
  }

  const earnings = buildEarningsCalendar(present, input.today, input.earningsLookaheadDays);
  return deepFreeze({
    cycleId: input.cycleId,
    refreshedAt: input.refreshedAt,
    durationMs: input.durationMs,
    symbolCount: input.results.size,
    partialFailureCount: absent.length + benchmarkFailures,
    quotes,
    absent,
    indices: buildIndexRecords(input.benchmarks, input.indexDefinitions),
    futures: buildIndexRecords(input.benchmarks, input.futuresDefinitions),
    sectors: computeSectorPerformance(present),
    movers: computeTopMovers(present, input.moversTopN),
    news: dedupeNews(input.news, [...input.results.keys()], input.newsMaxItems),
    earnings: groupEarningsByDate(earnings),
    dividends: buildDividendCalendar(present, input.today, input.dividendLookaheadDays),
  });
}
