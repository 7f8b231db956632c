/**
 * Fetch Scheduler: turns one watchlist plus the benchmark set into a map of
 * per-symbol results within a bounded time budget.
 *
 * One task per symbol runs through a bounded worker pool. Each upstream call
 * is paced (spacing + jitter), retried with exponential backoff when the
 * failure is retryable, and capped by a per-call timeout. A soft cycle
 * deadline stops waiting on stragglers; they are reported as
 * `deadline_exceeded`. Nothing here writes to the cache.
 */

import type { AbsentResult, BenchmarkDefinition, SymbolResult, WatchlistEntry } from '../../shared/api-types.js';
import { SPARKLINE_DAYS } from '../../shared/constants.js';
import {
  CYCLE_DEADLINE_MS,
  FETCH_BASE_SPACING_MS,
  FETCH_CONCURRENCY,
  FETCH_JITTER_MS,
  FETCH_MAX_ATTEMPTS,
  FETCH_MAX_SPACING_MS,
  FETCH_RETRY_BASE_MS,
  UPSTREAM_TIMEOUT_MS,
} from '../config.js';
import { linkAbortSignalToController, runWithAbortAndTimeout, sleepWithAbort } from '../lib/abortUtils.js';
import { classifyUpstreamError, errorMessage, isAbortError, type UpstreamError } from '../lib/errors.js';
import { mapWithConcurrency } from '../lib/mapWithConcurrency.js';
import { RequestPacer } from '../lib/requestPacer.js';
import { moduleLogger } from '../logger.js';
import type { NotFoundRegistry } from './notFoundRegistry.js';
import { buildQuoteRecord } from './quoteBuilder.js';
import { isEquity } from './symbolClassifier.js';
import type { CalendarFields, RawQuote, UpstreamCallOptions, UpstreamClient } from './upstreamClient.js';

const log = moduleLogger('fetch-scheduler');

export interface PacingOptions {
  baseSpacingMs: number;
  jitterMs: number;
  maxSpacingMs: number;
}

export interface FetchCycleOptions {
  client: UpstreamClient;
  watchlist: readonly WatchlistEntry[];
  benchmarks?: readonly BenchmarkDefinition[];
  concurrency?: number;
  /** Total attempts per upstream call, including the first. */
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  perCallTimeoutMs?: number;
  /** Soft deadline for the whole cycle; 0 disables it. */
  cycleDeadlineMs?: number;
  historyDays?: number;
  pacing?: Partial<PacingOptions>;
  notFoundRegistry?: NotFoundRegistry | null;
  random?: () => number;
  now?: () => number;
  signal?: AbortSignal | null;
}

export interface FetchCycleResult {
  /** Watchlist results in watchlist order. */
  results: Map<string, SymbolResult>;
  benchmarks: Map<string, SymbolResult>;
  failureCount: number;
  rateLimitedCount: number;
  /** Inter-request spacing in effect when the cycle ended. */
  spacingMs: number;
  deadlineExceeded: boolean;
  durationMs: number;
}

interface FetchTask {
  symbol: string;
  entry: WatchlistEntry | null;
  group: 'watchlist' | 'benchmark';
}

function absent(symbol: string, err: UpstreamError): AbsentResult {
  return { status: 'absent', symbol, reason: err.kind, message: err.message };
}

function buildTasks(watchlist: readonly WatchlistEntry[], benchmarks: readonly BenchmarkDefinition[]): FetchTask[] {
  const seen = new Set<string>();
  const tasks: FetchTask[] = [];
  for (const entry of watchlist) {
    const key = entry.symbol.toUpperCase();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    tasks.push({ symbol: entry.symbol, entry, group: 'watchlist' });
  }
  for (const benchmark of benchmarks) {
    const key = `benchmark:${benchmark.symbol.toUpperCase()}`;
    if (seen.has(key)) continue;
    seen.add(key);
    tasks.push({ symbol: benchmark.symbol, entry: null, group: 'benchmark' });
  }
  return tasks;
}

export async function runFetchCycle(options: FetchCycleOptions): Promise<FetchCycleResult> {
  const now = options.now ?? Date.now;
  const startedAt = now();
  const client = options.client;
  const concurrency = Math.max(1, Math.min(32, Math.floor(options.concurrency ?? FETCH_CONCURRENCY)));
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? FETCH_MAX_ATTEMPTS));
  const retryBaseDelayMs = Math.max(0, options.retryBaseDelayMs ?? FETCH_RETRY_BASE_MS);
  const perCallTimeoutMs = Math.max(0, options.perCallTimeoutMs ?? UPSTREAM_TIMEOUT_MS);
  const cycleDeadlineMs = Math.max(0, options.cycleDeadlineMs ?? CYCLE_DEADLINE_MS);
  const historyDays = Math.max(2, Math.floor(options.historyDays ?? SPARKLINE_DAYS));
  const registry = options.notFoundRegistry ?? null;
  const pacer = new RequestPacer({
    baseSpacingMs: options.pacing?.baseSpacingMs ?? FETCH_BASE_SPACING_MS,
    jitterMs: options.pacing?.jitterMs ?? FETCH_JITTER_MS,
    maxSpacingMs: options.pacing?.maxSpacingMs ?? FETCH_MAX_SPACING_MS,
    random: options.random,
  });

  const tasks = buildTasks(options.watchlist, options.benchmarks ?? []);
  const controller = new AbortController();
  const unlinkAbort = linkAbortSignalToController(options.signal ?? null, controller);
  const cycleSignal = controller.signal;

  async function callWithRetries<T>(label: string, call: (callOptions: UpstreamCallOptions) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      await pacer.wait(cycleSignal);
      try {
        return await runWithAbortAndTimeout((signal) => call({ signal }), {
          label,
          signal: cycleSignal,
          timeoutMs: perCallTimeoutMs,
        });
      } catch (err: unknown) {
        if (cycleSignal.aborted && isAbortError(err)) throw err;
        const classified = classifyUpstreamError(err);
        if (classified.kind === 'rate_limited') {
          const spacingMs = pacer.backOff();
          log.warn({ label, spacingMs }, 'Upstream rate limit hit; widening request spacing');
        }
        if (!classified.retryable || attempt >= maxAttempts) throw classified;
        const backoffMs = retryBaseDelayMs * 2 ** (attempt - 1);
        log.debug({ label, attempt, maxAttempts, backoffMs, reason: classified.kind }, 'Retrying upstream call');
        await sleepWithAbort(backoffMs, cycleSignal);
      }
    }
  }

  async function optionalCall<T>(label: string, call: (callOptions: UpstreamCallOptions) => Promise<T>): Promise<T | null> {
    try {
      return await callWithRetries(label, call);
    } catch (err: unknown) {
      if (cycleSignal.aborted && isAbortError(err)) throw err;
      log.debug({ label, err: errorMessage(err) }, 'Optional upstream field unavailable');
      return null;
    }
  }

  async function fetchSymbol(task: FetchTask): Promise<SymbolResult> {
    const { symbol } = task;
    const knownMissing = registry?.lookup(symbol) ?? null;
    if (knownMissing !== null) {
      return { status: 'absent', symbol, reason: 'not_found', message: knownMissing };
    }

    let raw: RawQuote;
    try {
      raw = await callWithRetries(`quote ${symbol}`, (opts) => client.fetchQuote(symbol, opts));
    } catch (err: unknown) {
      if (cycleSignal.aborted && isAbortError(err)) {
        return { status: 'absent', symbol, reason: 'deadline_exceeded', message: 'Cycle deadline reached' };
      }
      const classified = classifyUpstreamError(err);
      if (classified.kind === 'not_found') registry?.record(symbol, classified.message);
      return absent(symbol, classified);
    }

    const closes = await optionalCall(`history ${symbol}`, (opts) => client.fetchHistory(symbol, historyDays, opts));
    let calendar: CalendarFields | null = null;
    if (task.group === 'watchlist' && isEquity(symbol)) {
      calendar = await optionalCall(`calendar ${symbol}`, (opts) => client.fetchCalendar(symbol, opts));
    }
    return {
      status: 'present',
      record: buildQuoteRecord({ raw, entry: task.entry, dailyCloses: closes ?? [], calendar }),
    };
  }

  const settled = new Map<number, SymbolResult>();
  let closed = false;
  let deadlineExceeded = false;
  let deadlineTimer: ReturnType<typeof setTimeout> | null = null;
  const deadlinePromise = new Promise<void>((resolve) => {
    if (cycleDeadlineMs <= 0) return;
    deadlineTimer = setTimeout(() => {
      deadlineExceeded = true;
      controller.abort();
      resolve();
    }, cycleDeadlineMs);
    if (typeof deadlineTimer.unref === 'function') deadlineTimer.unref();
  });

  const work = mapWithConcurrency(
    tasks,
    concurrency,
    (task) =>
      fetchSymbol(task).catch(
        (err: unknown): SymbolResult => ({
          status: 'absent',
          symbol: task.symbol,
          reason: cycleSignal.aborted ? 'deadline_exceeded' : classifyUpstreamError(err).kind,
          message: errorMessage(err),
        }),
      ),
    (result, index) => {
      if (closed) return;
      if ('status' in result) settled.set(index, result);
    },
    () => cycleSignal.aborted,
  );

  try {
    await Promise.race([work, deadlinePromise]);
  } finally {
    closed = true;
    if (deadlineTimer) clearTimeout(deadlineTimer);
    unlinkAbort();
  }

  const results = new Map<string, SymbolResult>();
  const benchmarks = new Map<string, SymbolResult>();
  let failureCount = 0;
  tasks.forEach((task, index) => {
    const result: SymbolResult = settled.get(index) ?? {
      status: 'absent',
      symbol: task.symbol,
      reason: 'deadline_exceeded',
      message: deadlineExceeded ? `Cycle deadline of ${cycleDeadlineMs}ms reached` : 'Cycle aborted',
    };
    if (result.status === 'absent') {
      failureCount += 1;
      log.warn({ symbol: task.symbol, reason: result.reason, group: task.group }, result.message);
    }
    (task.group === 'watchlist' ? results : benchmarks).set(task.symbol, result);
  });

  const durationMs = Math.max(0, now() - startedAt);
  log.info(
    {
      symbols: tasks.length,
      failureCount,
      rateLimitedCount: pacer.getRateLimitedCount(),
      spacingMs: pacer.getSpacingMs(),
      deadlineExceeded,
      durationMs,
    },
    'Fetch cycle settled',
  );

  return {
    results,
    benchmarks,
    failureCount,
    rateLimitedCount: pacer.getRateLimitedCount(),
    spacingMs: pacer.getSpacingMs(),
    deadlineExceeded,
    durationMs,
  };
}
