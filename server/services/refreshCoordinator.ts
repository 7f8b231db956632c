/**
 * Refresh Coordinator: drives one refresh cycle at a time:
 * watchlist → fetch scheduler → news → analytics → atomic cache commit.
 */

import type {
  BenchmarkDefinition,
  HealthSummary,
  NewsItem,
  QuoteRecord,
  SnapshotRead,
  WatchlistEntry,
} from '../../shared/api-types.js';
import { FUTURES_DEFINITIONS, INDEX_DEFINITIONS } from '../../shared/constants.js';
import {
  DIVIDEND_LOOKAHEAD_DAYS,
  EARNINGS_LOOKAHEAD_DAYS,
  MOVERS_TOP_N,
  NEWS_MAX_ITEMS,
  NEWS_SYMBOL_LIMIT,
} from '../config.js';
import type { CircuitInfo } from '../lib/circuitBreaker.js';
import { currentEtDateString } from '../lib/dateUtils.js';
import { errorMessage } from '../lib/errors.js';
import { moduleLogger } from '../logger.js';
import { refreshCycleDurationSeconds, refreshCyclesTotal, symbolFetchFailuresTotal } from '../metrics.js';
import { AggregateCache } from './aggregateCache.js';
import { buildSnapshot } from './analyticsEngine.js';
import { runFetchCycle, type FetchCycleOptions, type FetchCycleResult } from './fetchScheduler.js';
import { getHealth } from './healthService.js';
import type { NewsProvider } from './newsProvider.js';
import { NotFoundRegistry } from './notFoundRegistry.js';
import type { UpstreamClient } from './upstreamClient.js';
import type { WatchlistProvider } from './watchlistProvider.js';

const log = moduleLogger('refresh');

export type RefreshTrigger = 'startup' | 'scheduler' | 'manual';

export type RefreshOutcome =
  | { status: 'committed'; cycleId: number; partialFailureCount: number; durationMs: number }
  | { status: 'rejected'; cycleId: number; reason: string }
  | { status: 'failed'; cycleId: number; error: string }
  | { status: 'already_running' };

export type FetchTuning = Omit<FetchCycleOptions, 'client' | 'watchlist' | 'benchmarks' | 'notFoundRegistry' | 'signal' | 'now'>;

export interface MarketDataServiceOptions {
  client: UpstreamClient;
  watchlistProvider: WatchlistProvider;
  newsProvider?: NewsProvider | null;
  cache?: AggregateCache;
  notFoundRegistry?: NotFoundRegistry;
  fetchTuning?: FetchTuning;
  indexDefinitions?: readonly BenchmarkDefinition[];
  futuresDefinitions?: readonly BenchmarkDefinition[];
  moversTopN?: number;
  newsMaxItems?: number;
  /** Movers whose own headlines are requested next to market news. */
  newsSymbolLimit?: number;
  earningsLookaheadDays?: number;
  dividendLookaheadDays?: number;
  now?: () => number;
}

/** Biggest absolute movers first, so their headlines are requested first. */
function newsPrioritySymbols(result: FetchCycleResult, limit: number): string[] {
  if (limit <= 0) return [];
  const records: Array<QuoteRecord & { changePercent: number }> = [];
  for (const entry of result.results.values()) {
    if (entry.status !== 'present') continue;
    const { record } = entry;
    if (record.changePercent === null || !Number.isFinite(record.changePercent)) continue;
    records.push({ ...record, changePercent: record.changePercent });
  }
  return records
    .sort((a, b) => Math.abs(b.changePercent) - Math.abs(a.changePercent))
    .slice(0, limit)
    .map((record) => record.symbol);
}

export class MarketDataService {
  readonly cache: AggregateCache;
  private readonly client: UpstreamClient;
  private readonly watchlistProvider: WatchlistProvider;
  private readonly newsProvider: NewsProvider | null;
  private readonly notFoundRegistry: NotFoundRegistry;
  private readonly fetchTuning: FetchTuning;
  private readonly indexDefinitions: readonly BenchmarkDefinition[];
  private readonly futuresDefinitions: readonly BenchmarkDefinition[];
  private readonly moversTopN: number;
  private readonly newsMaxItems: number;
  private readonly newsSymbolLimit: number;
  private readonly earningsLookaheadDays: number;
  private readonly dividendLookaheadDays: number;
  private readonly now: () => number;

  private inFlight: Promise<RefreshOutcome> | null = null;
  private activeController: AbortController | null = null;
  private cycleCounter = 0;
  private stopped = false;

  constructor(options: MarketDataServiceOptions) {
    this.now = options.now ?? Date.now;
    this.cache = options.cache ?? new AggregateCache({ now: this.now });
    this.client = options.client;
    this.watchlistProvider = options.watchlistProvider;
    this.newsProvider = options.newsProvider ?? null;
    this.notFoundRegistry = options.notFoundRegistry ?? new NotFoundRegistry({ now: this.now });
    this.fetchTuning = options.fetchTuning ?? {};
    this.indexDefinitions = options.indexDefinitions ?? INDEX_DEFINITIONS;
    this.futuresDefinitions = options.futuresDefinitions ?? FUTURES_DEFINITIONS;
    this.moversTopN = options.moversTopN ?? MOVERS_TOP_N;
    this.newsMaxItems = options.newsMaxItems ?? NEWS_MAX_ITEMS;
    this.newsSymbolLimit = options.newsSymbolLimit ?? NEWS_SYMBOL_LIMIT;
    this.earningsLookaheadDays = options.earningsLookaheadDays ?? EARNINGS_LOOKAHEAD_DAYS;
    this.dividendLookaheadDays = options.dividendLookaheadDays ?? DIVIDEND_LOOKAHEAD_DAYS;
  }

  getSnapshot(): SnapshotRead {
    return this.cache.currentSnapshot();
  }

  getHealth(): HealthSummary {
    return getHealth(this.cache, this.isRefreshing());
  }

  getCircuitInfo(): CircuitInfo | null {
    return this.client.getCircuitInfo ? this.client.getCircuitInfo() : null;
  }

  isRefreshing(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Run one cycle. Single-flight: while a cycle is running, further calls
   * resolve to `already_running` without starting another.
   */
  refresh(trigger: RefreshTrigger = 'manual'): Promise<RefreshOutcome> {
    if (this.inFlight) {
      return Promise.resolve({ status: 'already_running' });
    }
    const cycle = this.runCycle(trigger).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  /** Start an out-of-band cycle without waiting for it. */
  forceRefresh(): { status: 'started' | 'already_running' } {
    if (this.inFlight) return { status: 'already_running' };
    this.refresh('manual')
      .then((outcome) => {
        log.info({ outcome: outcome.status }, 'Manual refresh finished');
      })
      .catch((err: unknown) => {
        log.error({ err: errorMessage(err) }, 'Manual refresh crashed');
      });
    return { status: 'started' };
  }

  /** Resolves once no cycle is in flight. */
  async waitForIdle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  /** Abort the running cycle and refuse new ones. */
  async stop(): Promise<void> {
    this.stopped = true;
    this.activeController?.abort();
    await this.waitForIdle();
  }

  private async runCycle(trigger: RefreshTrigger): Promise<RefreshOutcome> {
    const cycleId = ++this.cycleCounter;
    const startedAt = this.now();
    if (this.stopped) {
      return { status: 'failed', cycleId, error: 'Service is stopped' };
    }
    const controller = new AbortController();
    this.activeController = controller;
    const cycleLog = log.child({ cycleId, trigger });
    cycleLog.info('Refresh cycle started');

    const finish = (outcome: RefreshOutcome): RefreshOutcome => {
      const durationSeconds = Math.max(0, this.now() - startedAt) / 1000;
      refreshCycleDurationSeconds.observe({ outcome: outcome.status }, durationSeconds);
      refreshCyclesTotal.inc({ outcome: outcome.status, trigger });
      return outcome;
    };

    try {
      let watchlist: WatchlistEntry[];
      try {
        watchlist = await this.watchlistProvider.listWatchlist({ signal: controller.signal });
      } catch (err: unknown) {
        this.cache.recordFailedCycle(err);
        cycleLog.error({ err: errorMessage(err) }, 'Watchlist unavailable; keeping previous snapshot');
        return finish({ status: 'failed', cycleId, error: errorMessage(err) });
      }

      const fetchResult = await runFetchCycle({
        ...this.fetchTuning,
        client: this.client,
        watchlist,
        benchmarks: [...this.indexDefinitions, ...this.futuresDefinitions],
        notFoundRegistry: this.notFoundRegistry,
        signal: controller.signal,
        now: this.now,
      });
      if (controller.signal.aborted) {
        cycleLog.warn('Refresh cycle aborted; nothing committed');
        return finish({ status: 'failed', cycleId, error: 'Refresh cycle aborted' });
      }
      for (const result of [...fetchResult.results.values(), ...fetchResult.benchmarks.values()]) {
        if (result.status === 'absent') symbolFetchFailuresTotal.inc({ reason: result.reason });
      }

      const news = await this.loadNews(fetchResult, controller.signal);
      // Stamps stay strictly increasing across cycles even if the wall clock steps back.
      const refreshedAt = Math.max(this.now(), (this.cache.getRefreshedAt() ?? 0) + 1);
      const snapshot = buildSnapshot({
        cycleId,
        refreshedAt,
        durationMs: Math.max(0, refreshedAt - startedAt),
        results: fetchResult.results,
        benchmarks: fetchResult.benchmarks,
        indexDefinitions: this.indexDefinitions,
        futuresDefinitions: this.futuresDefinitions,
        news,
        today: currentEtDateString(new Date(refreshedAt)),
        moversTopN: this.moversTopN,
        newsMaxItems: this.newsMaxItems,
        earningsLookaheadDays: this.earningsLookaheadDays,
        dividendLookaheadDays: this.dividendLookaheadDays,
      });

      const commit = this.cache.commit(snapshot);
      if (!commit.accepted) {
        cycleLog.warn({ reason: commit.reason }, 'Snapshot commit rejected');
        return finish({ status: 'rejected', cycleId, reason: commit.reason });
      }
      cycleLog.info(
        {
          symbols: snapshot.symbolCount,
          partialFailureCount: snapshot.partialFailureCount,
          durationMs: snapshot.durationMs,
          deadlineExceeded: fetchResult.deadlineExceeded,
        },
        'Snapshot committed',
      );
      return finish({
        status: 'committed',
        cycleId,
        partialFailureCount: snapshot.partialFailureCount,
        durationMs: snapshot.durationMs,
      });
    } catch (err: unknown) {
      this.cache.recordFailedCycle(err);
      cycleLog.error({ err: errorMessage(err) }, 'Refresh cycle failed');
      return finish({ status: 'failed', cycleId, error: errorMessage(err) });
    } finally {
      if (this.activeController === controller) this.activeController = null;
    }
  }

  private async loadNews(result: FetchCycleResult, signal: AbortSignal): Promise<NewsItem[]> {
    if (!this.newsProvider) return [];
    try {
      return await this.newsProvider.fetchNews(newsPrioritySymbols(result, this.newsSymbolLimit), { signal });
    } catch (err: unknown) {
      log.warn({ err: errorMessage(err) }, 'News unavailable for this cycle');
      return [];
    }
  }
}
