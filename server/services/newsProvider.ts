import type { NewsItem } from '../../shared/api-types.js';
import { UPSTREAM_BASE_URL, UPSTREAM_TIMEOUT_MS } from '../config.js';
import { runWithAbortAndTimeout } from '../lib/abortUtils.js';
import { NewsSearchResponseSchema, parseUpstreamPayload } from '../lib/apiSchemas.js';
import { UpstreamError, classifyUpstreamError, errorMessage, upstreamErrorFromStatus } from '../lib/errors.js';
import { mapWithConcurrency } from '../lib/mapWithConcurrency.js';
import { moduleLogger } from '../logger.js';
import type { FetchLike } from './upstreamClient.js';

const log = moduleLogger('news-provider');

/** Broad-market headlines are requested against this benchmark. */
export const MARKET_NEWS_SYMBOL = '^GSPC';

export interface NewsFetchOptions {
  signal?: AbortSignal | null;
}

/**
 * Headlines for the market plus the given symbols, in provider order. Items
 * fetched for a specific symbol carry that symbol; market items carry null.
 * Rejects only when no source could be read at all.
 */
export interface NewsProvider {
  fetchNews(symbols: readonly string[], options?: NewsFetchOptions): Promise<NewsItem[]>;
}

export interface YahooNewsProviderOptions {
  baseUrl?: string;
  timeoutMs?: number;
  marketItems?: number;
  itemsPerSymbol?: number;
  concurrency?: number;
  fetchImpl?: FetchLike;
}

export class YahooNewsProvider implements NewsProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly marketItems: number;
  private readonly itemsPerSymbol: number;
  private readonly concurrency: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: YahooNewsProviderOptions = {}) {
    this.baseUrl = (options.baseUrl ?? UPSTREAM_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? UPSTREAM_TIMEOUT_MS;
    this.marketItems = options.marketItems ?? 10;
    this.itemsPerSymbol = options.itemsPerSymbol ?? 3;
    this.concurrency = options.concurrency ?? 4;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetchNews(symbols: readonly string[], options: NewsFetchOptions = {}): Promise<NewsItem[]> {
    const requests: Array<{ query: string; tag: string | null; count: number }> = [
      { query: MARKET_NEWS_SYMBOL, tag: null, count: this.marketItems },
      ...symbols.map((symbol) => ({ query: symbol, tag: symbol, count: this.itemsPerSymbol })),
    ];

    const settled = await mapWithConcurrency(requests, this.concurrency, (request) =>
      this.search(request.query, request.tag, request.count, options.signal ?? null),
    );

    const items: NewsItem[] = [];
    let failures = 0;
    let lastError: unknown = null;
    settled.forEach((result, index) => {
      if (result === undefined) return;
      if (Array.isArray(result)) {
        items.push(...result);
        return;
      }
      failures += 1;
      lastError = result.error;
      log.warn({ query: requests[index].query, err: errorMessage(result.error) }, 'News request failed');
    });

    if (failures === requests.length) {
      throw classifyUpstreamError(lastError);
    }
    return items;
  }

  private async search(query: string, tag: string | null, count: number, signal: AbortSignal | null): Promise<NewsItem[]> {
    const label = `News ${query}`;
    const url = `${this.baseUrl}/v1/finance/search?q=${encodeURIComponent(query)}&newsCount=${count}&quotesCount=0`;
    const payload = await runWithAbortAndTimeout(
      async (requestSignal) => {
        const resp = await this.fetchImpl(url, { signal: requestSignal, headers: { Accept: 'application/json' } });
        const text = await resp.text();
        if (!resp.ok) throw upstreamErrorFromStatus(resp.status, label, text.trim().slice(0, 180));
        try {
          const body: unknown = JSON.parse(text);
          return body;
        } catch (err: unknown) {
          throw new UpstreamError('malformed', `${label}: response is not valid JSON`, { cause: err });
        }
      },
      { label, signal, timeoutMs: this.timeoutMs },
    );
    const parsed = parseUpstreamPayload(NewsSearchResponseSchema, payload, label);
    return parsed.news.slice(0, count).map((entry) => ({
      title: entry.title,
      source: entry.publisher || 'Yahoo Finance',
      publishedAt:
        typeof entry.providerPublishTime === 'number'
          ? new Date(entry.providerPublishTime * 1000).toISOString()
          : new Date(0).toISOString(),
      url: entry.link,
      symbol: tag,
    }));
  }
}
