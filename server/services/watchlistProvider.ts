/**
 * Watchlist sources. The Notion database is the source of truth; when it is
 * unreachable the last successful result (if under a day old) is used, then
 * the static `config/watchlist.json`.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { WatchlistEntry } from '../../shared/api-types.js';
import { ACTIVE_WATCHLIST_STATUSES } from '../../shared/constants.js';
import {
  NOTION_DATABASE_ID,
  NOTION_TOKEN,
  UPSTREAM_TIMEOUT_MS,
  WATCHLIST_CACHE_FILE,
  WATCHLIST_CACHE_MAX_AGE_MS,
  WATCHLIST_FILE,
} from '../config.js';
import { runWithAbortAndTimeout, sleepWithAbort } from '../lib/abortUtils.js';
import { NotionQueryResponseSchema, parseUpstreamPayload, type NotionPageProperties } from '../lib/apiSchemas.js';
import { UpstreamError, classifyUpstreamError, errorMessage, upstreamErrorFromStatus } from '../lib/errors.js';
import { moduleLogger } from '../logger.js';
import type { FetchLike } from './upstreamClient.js';

const log = moduleLogger('watchlist');

export interface WatchlistProvider {
  /** Actively tracked entries (status Watching or Holding), in source order. */
  listWatchlist(options?: { signal?: AbortSignal | null }): Promise<WatchlistEntry[]>;
}

export type WatchlistSource = 'notion' | 'cache' | 'static';

const ACTIVE_STATUS_SET: ReadonlySet<string> = new Set(ACTIVE_WATCHLIST_STATUSES);

function isActiveStatus(status: string): boolean {
  return ACTIVE_STATUS_SET.has(status);
}

function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

// ---------------------------------------------------------------------------
// Static file
// ---------------------------------------------------------------------------

const optionalText = z
  .string()
  .nullable()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : null));

const WatchlistEntrySchema = z.object({
  symbol: z.string().min(1),
  name: optionalText,
  sector: optionalText,
  status: z.string().default('Watching'),
  sentiment: optionalText,
  thesis: optionalText,
  catalysts: optionalText,
  categories: z.array(z.string()).default([]),
});

/** Entries may be full objects or bare ticker strings. */
const WatchlistFileSchema = z.object({
  watchlist: z.array(z.union([z.string().min(1), WatchlistEntrySchema])),
});

function toEntry(raw: z.infer<typeof WatchlistFileSchema>['watchlist'][number]): WatchlistEntry {
  if (typeof raw === 'string') {
    return {
      symbol: normalizeSymbol(raw),
      name: null,
      sector: null,
      status: 'Watching',
      sentiment: null,
      thesis: null,
      catalysts: null,
      categories: [],
    };
  }
  return { ...raw, symbol: normalizeSymbol(raw.symbol) };
}

async function readJsonFile(filePath: string): Promise<unknown> {
  const text = await fs.readFile(filePath, 'utf8');
  const body: unknown = JSON.parse(text);
  return body;
}

export class FileWatchlistProvider implements WatchlistProvider {
  constructor(private readonly filePath: string = WATCHLIST_FILE) {}

  async listWatchlist(): Promise<WatchlistEntry[]> {
    const parsed = WatchlistFileSchema.parse(await readJsonFile(this.filePath));
    return parsed.watchlist.map(toEntry).filter((entry) => isActiveStatus(entry.status));
  }
}

// ---------------------------------------------------------------------------
// Notion
// ---------------------------------------------------------------------------

const NOTION_API_BASE = 'https://api.notion.com/v1';
const NOTION_VERSION = '2022-06-28';
const NOTION_PAGE_SIZE = 100;

export interface NotionWatchlistProviderOptions {
  token?: string;
  databaseId?: string;
  fetchImpl?: FetchLike;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  timeoutMs?: number;
  baseUrl?: string;
}

function richTextValue(value: Array<{ plain_text?: string; text?: { content?: string } }> | undefined): string | null {
  const first = value?.[0];
  const text = first?.plain_text ?? first?.text?.content ?? '';
  return text.trim() ? text.trim() : null;
}

export function parseNotionPage(properties: NotionPageProperties): WatchlistEntry | null {
  const symbol = richTextValue(properties.Ticker?.title);
  if (!symbol) return null;
  return {
    symbol: normalizeSymbol(symbol),
    name: richTextValue(properties['Company Name']?.rich_text),
    sector: properties.Sector?.select?.name?.trim() || null,
    status: properties.Status?.select?.name?.trim() || '',
    sentiment: properties.Sentiment?.select?.name?.trim() || null,
    thesis: richTextValue(properties['Investment Thesis']?.rich_text),
    catalysts: richTextValue(properties.Catalysts?.rich_text),
    categories: (properties.Category?.multi_select ?? []).map((option) => option.name).filter(Boolean),
  };
}

export class NotionWatchlistProvider implements WatchlistProvider {
  private readonly token: string;
  private readonly databaseId: string;
  private readonly fetchImpl: FetchLike;
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;

  constructor(options: NotionWatchlistProviderOptions = {}) {
    this.token = options.token ?? NOTION_TOKEN;
    this.databaseId = options.databaseId ?? NOTION_DATABASE_ID;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.retryBaseDelayMs = Math.max(0, options.retryBaseDelayMs ?? 5_000);
    this.timeoutMs = options.timeoutMs ?? UPSTREAM_TIMEOUT_MS;
    this.baseUrl = (options.baseUrl ?? NOTION_API_BASE).replace(/\/+$/, '');
  }

  async listWatchlist(options: { signal?: AbortSignal | null } = {}): Promise<WatchlistEntry[]> {
    if (!this.token || !this.databaseId) {
      throw new Error('Notion watchlist is not configured');
    }
    const entries: WatchlistEntry[] = [];
    let cursor: string | null = null;
    do {
      const page = await this.queryPage(cursor, options.signal ?? null);
      for (const row of page.results) {
        const entry = parseNotionPage(row.properties);
        if (entry && isActiveStatus(entry.status)) entries.push(entry);
      }
      cursor = page.has_more && page.next_cursor ? page.next_cursor : null;
    } while (cursor);

    if (entries.length === 0) {
      throw new Error('Notion returned 0 active watchlist entries');
    }
    log.info({ count: entries.length }, 'Fetched watchlist from Notion');
    return entries;
  }

  private async queryPage(cursor: string | null, signal: AbortSignal | null) {
    const body = {
      filter: { or: ACTIVE_WATCHLIST_STATUSES.map((status) => ({ property: 'Status', select: { equals: status } })) },
      page_size: NOTION_PAGE_SIZE,
      ...(cursor ? { start_cursor: cursor } : {}),
    };
    const label = 'Notion watchlist query';
    for (let attempt = 1; ; attempt++) {
      try {
        const payload = await runWithAbortAndTimeout(
          async (requestSignal) => {
            const resp = await this.fetchImpl(`${this.baseUrl}/databases/${encodeURIComponent(this.databaseId)}/query`, {
              method: 'POST',
              signal: requestSignal,
              headers: {
                Authorization: `Bearer ${this.token}`,
                'Content-Type': 'application/json',
                'Notion-Version': NOTION_VERSION,
              },
              body: JSON.stringify(body),
            });
            const text = await resp.text();
            if (resp.status === 401) {
              throw new UpstreamError('unavailable', `${label}: token expired or invalid (401)`, {
                httpStatus: 401,
                retryable: false,
              });
            }
            if (!resp.ok) throw upstreamErrorFromStatus(resp.status, label, text.trim().slice(0, 200));
            const parsedBody: unknown = JSON.parse(text);
            return parsedBody;
          },
          { label, signal, timeoutMs: this.timeoutMs },
        );
        return parseUpstreamPayload(NotionQueryResponseSchema, payload, label);
      } catch (err: unknown) {
        const classified = classifyUpstreamError(err);
        if (!classified.retryable || attempt >= this.maxAttempts || signal?.aborted) throw classified;
        const delayMs = this.retryBaseDelayMs * 2 ** (attempt - 1);
        log.warn({ attempt, maxAttempts: this.maxAttempts, delayMs, err: classified.message }, 'Notion request failed; retrying');
        await sleepWithAbort(delayMs, signal);
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Fallback chain
// ---------------------------------------------------------------------------

const WatchlistCacheSchema = z.object({
  timestamp: z.string(),
  entries: z.array(WatchlistEntrySchema),
});

export interface FallbackWatchlistProviderOptions {
  primary: WatchlistProvider | null;
  cacheFile?: string;
  staticFile?: string;
  cacheMaxAgeMs?: number;
  now?: () => number;
}

export class FallbackWatchlistProvider implements WatchlistProvider {
  private readonly primary: WatchlistProvider | null;
  private readonly cacheFile: string;
  private readonly staticProvider: FileWatchlistProvider;
  private readonly cacheMaxAgeMs: number;
  private readonly now: () => number;
  private lastSource: WatchlistSource | null = null;

  constructor(options: FallbackWatchlistProviderOptions) {
    this.primary = options.primary;
    this.cacheFile = options.cacheFile ?? WATCHLIST_CACHE_FILE;
    this.staticProvider = new FileWatchlistProvider(options.staticFile ?? WATCHLIST_FILE);
    this.cacheMaxAgeMs = options.cacheMaxAgeMs ?? WATCHLIST_CACHE_MAX_AGE_MS;
    this.now = options.now ?? Date.now;
  }

  getLastSource(): WatchlistSource | null {
    return this.lastSource;
  }

  async listWatchlist(options: { signal?: AbortSignal | null } = {}): Promise<WatchlistEntry[]> {
    if (this.primary) {
      try {
        const entries = await this.primary.listWatchlist(options);
        this.lastSource = 'notion';
        await this.saveCache(entries);
        return entries;
      } catch (err: unknown) {
        log.warn({ err: errorMessage(err) }, 'Primary watchlist source failed; falling back');
      }
    }

    const cached = await this.loadCache();
    if (cached && cached.length > 0) {
      this.lastSource = 'cache';
      return cached;
    }

    let fromFile: WatchlistEntry[];
    try {
      fromFile = await this.staticProvider.listWatchlist();
    } catch (err: unknown) {
      throw new Error(`No watchlist source available: ${errorMessage(err)}`, { cause: err });
    }
    if (fromFile.length === 0) {
      throw new Error('No watchlist source available: static watchlist is empty');
    }
    this.lastSource = 'static';
    log.info({ count: fromFile.length }, 'Loaded watchlist from static config');
    return fromFile;
  }

  private async saveCache(entries: WatchlistEntry[]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.cacheFile), { recursive: true });
      const payload = { timestamp: new Date(this.now()).toISOString(), entries };
      await fs.writeFile(this.cacheFile, JSON.stringify(payload, null, 2), 'utf8');
    } catch (err: unknown) {
      log.warn({ err: errorMessage(err), file: this.cacheFile }, 'Could not save watchlist cache');
    }
  }

  private async loadCache(): Promise<WatchlistEntry[] | null> {
    let raw: unknown;
    try {
      raw = await readJsonFile(this.cacheFile);
    } catch (err: unknown) {
      log.debug({ err: errorMessage(err), file: this.cacheFile }, 'No usable watchlist cache');
      return null;
    }
    const parsed = WatchlistCacheSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ file: this.cacheFile }, 'Watchlist cache is malformed; ignoring');
      return null;
    }
    const ageMs = this.now() - Date.parse(parsed.data.timestamp);
    if (!Number.isFinite(ageMs) || ageMs > this.cacheMaxAgeMs) {
      log.warn({ ageHours: Number.isFinite(ageMs) ? Math.round(ageMs / 3_600_000) : null }, 'Watchlist cache too old; ignoring');
      return null;
    }
    log.info({ count: parsed.data.entries.length, ageMinutes: Math.round(ageMs / 60_000) }, 'Loaded watchlist from cache');
    return parsed.data.entries.map((entry) => ({ ...entry, symbol: normalizeSymbol(entry.symbol) }));
  }
}

export function createWatchlistProvider(options: Partial<FallbackWatchlistProviderOptions> = {}): FallbackWatchlistProvider {
  const primary = options.primary !== undefined ? options.primary : NOTION_TOKEN ? new NotionWatchlistProvider() : null;
  return new FallbackWatchlistProvider({ ...options, primary });
}
