import { UPSTREAM_BASE_URL, UPSTREAM_MAX_REQUESTS_PER_SECOND, UPSTREAM_TIMEOUT_MS } from '../config.js';
import { runWithAbortAndTimeout } from '../lib/abortUtils.js';
import {
  CalendarResponseSchema,
  ChartResponseSchema,
  QuoteResponseSchema,
  parseUpstreamPayload,
} from '../lib/apiSchemas.js';
import { CircuitBreaker, type CircuitInfo } from '../lib/circuitBreaker.js';
import { etDateStringFromUnixSeconds } from '../lib/dateUtils.js';
import {
  UpstreamError,
  classifyUpstreamError,
  isAbortError,
  isInfrastructureError,
  upstreamErrorFromStatus,
} from '../lib/errors.js';
import { TokenBucket } from '../lib/requestPacer.js';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('upstream-client');

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

/** Quote fields as reported by the provider, before derived values are computed. */
export interface RawQuote {
  symbol: string;
  name: string | null;
  price: number;
  previousClose: number | null;
  open: number | null;
  dayHigh: number | null;
  dayLow: number | null;
  volume: number | null;
  avgVolume: number | null;
  marketCap: number | null;
  fiftyTwoWeekHigh: number | null;
  fiftyTwoWeekLow: number | null;
  currency: string | null;
  preMarketPrice: number | null;
  postMarketPrice: number | null;
}

export interface CalendarFields {
  nextEarningsDate: string | null;
  nextExDividendDate: string | null;
}

export interface UpstreamCallOptions {
  signal?: AbortSignal | null;
}

/**
 * Per-symbol market-data primitives. Each call is independently failable and
 * rejects with an {@link UpstreamError} (or an AbortError when the caller's
 * signal fires).
 */
export interface UpstreamClient {
  fetchQuote(symbol: string, options?: UpstreamCallOptions): Promise<RawQuote>;
  /** Most recent `days` daily closes, oldest first. */
  fetchHistory(symbol: string, days: number, options?: UpstreamCallOptions): Promise<number[]>;
  fetchCalendar(symbol: string, options?: UpstreamCallOptions): Promise<CalendarFields>;
  getCircuitInfo?(): CircuitInfo;
}

// ---------------------------------------------------------------------------
// HTTP implementation
// ---------------------------------------------------------------------------

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface YahooUpstreamClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  maxRequestsPerSecond?: number;
  fetchImpl?: FetchLike;
  circuitBreaker?: CircuitBreaker;
}

function finiteOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function parseJsonBody(text: string, label: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw new UpstreamError('malformed', `${label}: response is not valid JSON`, { cause: err });
  }
}

/** History range large enough to cover `days` trading sessions across weekends and holidays. */
function historyRangeFor(days: number): string {
  if (days <= 3) return '5d';
  if (days <= 15) return '1mo';
  if (days <= 45) return '3mo';
  return '1y';
}

export class YahooUpstreamClient implements UpstreamClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly tokenBucket: TokenBucket;

  constructor(options: YahooUpstreamClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? UPSTREAM_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? UPSTREAM_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.tokenBucket = new TokenBucket({ ratePerSecond: options.maxRequestsPerSecond ?? UPSTREAM_MAX_REQUESTS_PER_SECOND });
    this.circuitBreaker =
      options.circuitBreaker ??
      new CircuitBreaker({
        failureThreshold: 5,
        cooldownMs: 30_000,
        isInfraError: isInfrastructureError,
        onStateChange: (from, to) => {
          log.warn({ from, to }, `Upstream circuit ${from} → ${to}`);
        },
      });
  }

  getCircuitInfo(): CircuitInfo {
    return this.circuitBreaker.getInfo();
  }

  async fetchQuote(symbol: string, options: UpstreamCallOptions = {}): Promise<RawQuote> {
    const label = `Quote ${symbol}`;
    const payload = await this.getJson(`/v7/finance/quote?symbols=${encodeURIComponent(symbol)}`, label, options);
    const parsed = parseUpstreamPayload(QuoteResponseSchema, payload, label);
    const result = (parsed.quoteResponse.result ?? []).find((row) => row.symbol.toUpperCase() === symbol.toUpperCase());
    if (!result) {
      throw new UpstreamError('not_found', `${label}: symbol not found`, { httpStatus: 404 });
    }
    const price = finiteOrNull(result.regularMarketPrice);
    if (price === null) {
      throw new UpstreamError('malformed', `${label}: missing regular market price`);
    }
    return {
      symbol: result.symbol,
      name: result.shortName || result.longName || null,
      price,
      previousClose: finiteOrNull(result.regularMarketPreviousClose),
      open: finiteOrNull(result.regularMarketOpen),
      dayHigh: finiteOrNull(result.regularMarketDayHigh),
      dayLow: finiteOrNull(result.regularMarketDayLow),
      volume: finiteOrNull(result.regularMarketVolume),
      avgVolume: finiteOrNull(result.averageDailyVolume3Month ?? result.averageDailyVolume10Day),
      marketCap: finiteOrNull(result.marketCap),
      fiftyTwoWeekHigh: finiteOrNull(result.fiftyTwoWeekHigh),
      fiftyTwoWeekLow: finiteOrNull(result.fiftyTwoWeekLow),
      currency: result.currency || null,
      preMarketPrice: finiteOrNull(result.preMarketPrice),
      postMarketPrice: finiteOrNull(result.postMarketPrice),
    };
  }

  async fetchHistory(symbol: string, days: number, options: UpstreamCallOptions = {}): Promise<number[]> {
    const label = `History ${symbol}`;
    const wanted = Math.max(1, Math.floor(days));
    const path = `/v8/finance/chart/${encodeURIComponent(symbol)}?range=${historyRangeFor(wanted)}&interval=1d`;
    const payload = await this.getJson(path, label, options);
    const parsed = parseUpstreamPayload(ChartResponseSchema, payload, label);
    const chartError = parsed.chart.error;
    if (chartError) {
      const kind = /not\s*found/i.test(chartError.code || '') ? 'not_found' : 'unavailable';
      throw new UpstreamError(kind, `${label}: ${chartError.description || chartError.code || 'chart error'}`);
    }
    const result = parsed.chart.result?.[0];
    if (!result) {
      throw new UpstreamError('not_found', `${label}: no chart data`, { httpStatus: 404 });
    }
    const closes = (result.indicators.quote[0]?.close ?? []).filter(
      (close): close is number => typeof close === 'number' && Number.isFinite(close),
    );
    return closes.slice(-wanted);
  }

  async fetchCalendar(symbol: string, options: UpstreamCallOptions = {}): Promise<CalendarFields> {
    const label = `Calendar ${symbol}`;
    const path = `/v10/finance/quoteSummary/${encodeURIComponent(symbol)}?modules=calendarEvents`;
    const payload = await this.getJson(path, label, options);
    const parsed = parseUpstreamPayload(CalendarResponseSchema, payload, label);
    const summaryError = parsed.quoteSummary.error;
    if (summaryError) {
      const kind = /not\s*found/i.test(summaryError.code || '') ? 'not_found' : 'unavailable';
      throw new UpstreamError(kind, `${label}: ${summaryError.description || summaryError.code || 'summary error'}`);
    }
    const events = parsed.quoteSummary.result?.[0]?.calendarEvents;
    const earningsRaw = events?.earnings?.earningsDate?.[0]?.raw;
    const exDividendRaw = events?.exDividendDate?.raw;
    return {
      nextEarningsDate: typeof earningsRaw === 'number' ? etDateStringFromUnixSeconds(earningsRaw) || null : null,
      nextExDividendDate: typeof exDividendRaw === 'number' ? etDateStringFromUnixSeconds(exDividendRaw) || null : null,
    };
  }

  private async getJson(path: string, label: string, options: UpstreamCallOptions): Promise<unknown> {
    const parentSignal = options.signal ?? null;
    try {
      return await this.circuitBreaker.call(async () => {
        await this.tokenBucket.acquire(parentSignal);
        return runWithAbortAndTimeout(
          async (signal) => {
            const resp = await this.fetchImpl(`${this.baseUrl}${path}`, {
              signal,
              headers: { Accept: 'application/json' },
            });
            const text = await resp.text();
            if (!resp.ok) {
              throw upstreamErrorFromStatus(resp.status, label, text.trim().slice(0, 180));
            }
            return parseJsonBody(text, label);
          },
          { label, signal: parentSignal, timeoutMs: this.timeoutMs },
        );
      });
    } catch (err: unknown) {
      if (isAbortError(err)) throw err;
      throw classifyUpstreamError(err);
    }
  }
}
