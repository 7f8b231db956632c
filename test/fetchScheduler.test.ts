import test from 'node:test';
import assert from 'node:assert/strict';

import type { SymbolResult } from '../shared/api-types.js';
import { UpstreamError } from '../server/lib/errors.js';
import { runFetchCycle, type FetchCycleOptions } from '../server/services/fetchScheduler.js';
import { NotFoundRegistry } from '../server/services/notFoundRegistry.js';
import { FakeUpstreamClient } from './support/fakeUpstream.js';
import { rawQuote, watchlistEntry } from './support/fixtures.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const FAST: Omit<FetchCycleOptions, 'client' | 'watchlist'> = {
  concurrency: 4,
  maxAttempts: 3,
  retryBaseDelayMs: 0,
  perCallTimeoutMs: 1_000,
  cycleDeadlineMs: 0,
  pacing: { baseSpacingMs: 0, jitterMs: 0, maxSpacingMs: 0 },
};

function expectPresent(result: SymbolResult | undefined) {
  assert.ok(result, 'expected a result');
  assert.equal(result.status, 'present');
  if (result.status !== 'present') throw new Error('unreachable');
  return result.record;
}

function expectAbsent(result: SymbolResult | undefined) {
  assert.ok(result, 'expected a result');
  assert.equal(result.status, 'absent');
  if (result.status !== 'absent') throw new Error('unreachable');
  return result;
}

function rateLimited(symbol: string): UpstreamError {
  return new UpstreamError('rate_limited', `Quote ${symbol} rate-limited (429)`, { httpStatus: 429 });
}

// ---------------------------------------------------------------------------
// Per-symbol isolation
// ---------------------------------------------------------------------------

test('one failing symbol does not affect the others', async () => {
  const client = new FakeUpstreamClient({
    quotes: [rawQuote('AAPL', 110, 100, { name: 'Apple Inc.' }), rawQuote('BTC-USD', 95, 100)],
    history: { AAPL: [100, 104, 110], 'BTC-USD': [100, 95] },
    calendar: { AAPL: { nextEarningsDate: '2026-10-29', nextExDividendDate: null } },
  });

  const result = await runFetchCycle({
    ...FAST,
    client,
    watchlist: [watchlistEntry('AAPL', { sector: 'Technology' }), watchlistEntry('ZZZZ'), watchlistEntry('BTC-USD')],
  });

  assert.deepEqual([...result.results.keys()], ['AAPL', 'ZZZZ', 'BTC-USD']);
  assert.equal(result.failureCount, 1);
  assert.equal(result.deadlineExceeded, false);

  const aapl = expectPresent(result.results.get('AAPL'));
  assert.equal(aapl.name, 'Apple Inc.');
  assert.equal(aapl.sector, 'Technology');
  assert.equal(aapl.kind, 'equity');
  assert.equal(aapl.changePercent, 10);
  assert.equal(aapl.change, 10);
  assert.deepEqual(aapl.dailyCloses, [100, 104, 110]);
  assert.equal(aapl.weekChangePercent, 10);
  assert.equal(aapl.nextEarningsDate, '2026-10-29');

  const missing = expectAbsent(result.results.get('ZZZZ'));
  assert.equal(missing.reason, 'not_found');
  assert.equal(missing.message, 'Quote ZZZZ: symbol not found');

  const btc = expectPresent(result.results.get('BTC-USD'));
  assert.equal(btc.kind, 'always-open');
  assert.equal(btc.changePercent, -5);
  assert.equal(btc.extendedHours, null);
  assert.equal(client.countCalls('calendar:BTC-USD'), 0);
});

test('history failure still yields a present record with empty closes', async () => {
  const client = new FakeUpstreamClient({ quotes: [rawQuote('MSFT', 102, 100)] });

  const result = await runFetchCycle({ ...FAST, client, watchlist: [watchlistEntry('MSFT')] });

  const msft = expectPresent(result.results.get('MSFT'));
  assert.deepEqual(msft.dailyCloses, []);
  assert.equal(msft.weekChangePercent, null);
  assert.equal(msft.changePercent, 2);
  assert.equal(client.countCalls('history:MSFT'), 3);
  assert.equal(result.failureCount, 0);
});

test('duplicate watchlist symbols are fetched once', async () => {
  const client = new FakeUpstreamClient({ quotes: [rawQuote('AAPL', 110, 100)], history: { AAPL: [1, 2] } });

  const result = await runFetchCycle({ ...FAST, client, watchlist: [watchlistEntry('AAPL'), watchlistEntry('AAPL')] });

  assert.equal(result.results.size, 1);
  assert.equal(client.countCalls('quote:AAPL'), 1);
});

test('benchmarks land in their own map and skip the calendar', async () => {
  const client = new FakeUpstreamClient({
    quotes: [rawQuote('AAPL', 110, 100), rawQuote('^GSPC', 5100, 5000)],
    history: { AAPL: [1, 2], '^GSPC': [5000, 5100] },
  });

  const result = await runFetchCycle({
    ...FAST,
    client,
    watchlist: [watchlistEntry('AAPL')],
    benchmarks: [{ symbol: '^GSPC', name: 'S&P 500', kind: 'index', displayOrder: 1 }],
  });

  assert.deepEqual([...result.results.keys()], ['AAPL']);
  assert.deepEqual([...result.benchmarks.keys()], ['^GSPC']);
  expectPresent(result.benchmarks.get('^GSPC'));
  assert.equal(client.countCalls('calendar:^GSPC'), 0);
  assert.equal(client.countCalls('calendar:AAPL'), 1);
});

// ---------------------------------------------------------------------------
// Retries and pacing
// ---------------------------------------------------------------------------

test('rate-limited calls are retried and widen the request spacing', async () => {
  const client = new FakeUpstreamClient({
    quotes: [rawQuote('AAPL', 110, 100)],
    quoteFailures: { AAPL: [rateLimited('AAPL'), rateLimited('AAPL')] },
    history: { AAPL: [1, 2] },
  });

  const result = await runFetchCycle({
    ...FAST,
    client,
    watchlist: [watchlistEntry('AAPL')],
    pacing: { baseSpacingMs: 0, jitterMs: 0, maxSpacingMs: 40 },
  });

  expectPresent(result.results.get('AAPL'));
  assert.equal(client.countCalls('quote:AAPL'), 3);
  assert.equal(result.rateLimitedCount, 2);
  assert.equal(result.spacingMs, 40);
});

test('retryable failures give up after maxAttempts', async () => {
  const outage = () => new UpstreamError('unavailable', 'Quote AAPL upstream error (503)', { httpStatus: 503 });
  const client = new FakeUpstreamClient({
    quotes: [rawQuote('AAPL', 110, 100)],
    quoteFailures: { AAPL: [outage(), outage(), outage()] },
  });

  const result = await runFetchCycle({ ...FAST, client, watchlist: [watchlistEntry('AAPL')] });

  const aapl = expectAbsent(result.results.get('AAPL'));
  assert.equal(aapl.reason, 'unavailable');
  assert.equal(aapl.message, 'Quote AAPL upstream error (503)');
  assert.equal(client.countCalls('quote:AAPL'), 3);
});

test('not-found symbols are remembered and skipped on the next cycle', async () => {
  const client = new FakeUpstreamClient({ quotes: [] });
  const registry = new NotFoundRegistry({ ttlMs: 60_000 });

  const first = await runFetchCycle({ ...FAST, client, watchlist: [watchlistEntry('ZZZZ')], notFoundRegistry: registry });
  assert.equal(expectAbsent(first.results.get('ZZZZ')).reason, 'not_found');
  assert.equal(client.countCalls('quote:ZZZZ'), 1);

  const second = await runFetchCycle({ ...FAST, client, watchlist: [watchlistEntry('ZZZZ')], notFoundRegistry: registry });
  const skipped = expectAbsent(second.results.get('ZZZZ'));
  assert.equal(skipped.reason, 'not_found');
  assert.equal(skipped.message, 'Quote ZZZZ: symbol not found');
  assert.equal(client.countCalls('quote:ZZZZ'), 1);
});

// ---------------------------------------------------------------------------
// Deadline and cancellation
// ---------------------------------------------------------------------------

test('soft deadline marks unfinished symbols as deadline_exceeded', async () => {
  const client = new FakeUpstreamClient({
    quotes: [rawQuote('AAPL', 110, 100), rawQuote('SLOW', 10, 10)],
    history: { AAPL: [1, 2] },
    quoteDelayMs: { SLOW: 1_000 },
  });

  const startedAt = Date.now();
  const result = await runFetchCycle({
    ...FAST,
    client,
    watchlist: [watchlistEntry('AAPL'), watchlistEntry('SLOW')],
    cycleDeadlineMs: 50,
  });

  assert.ok(Date.now() - startedAt < 900, 'cycle should not wait for the slow symbol');
  assert.equal(result.deadlineExceeded, true);
  expectPresent(result.results.get('AAPL'));
  assert.equal(expectAbsent(result.results.get('SLOW')).reason, 'deadline_exceeded');
  assert.equal(result.failureCount, 1);
});

test('an already-aborted caller signal reports every symbol absent without calls', async () => {
  const client = new FakeUpstreamClient({ quotes: [rawQuote('AAPL', 110, 100)] });
  const controller = new AbortController();
  controller.abort();

  const result = await runFetchCycle({ ...FAST, client, watchlist: [watchlistEntry('AAPL')], signal: controller.signal });

  const aapl = expectAbsent(result.results.get('AAPL'));
  assert.equal(aapl.reason, 'deadline_exceeded');
  assert.equal(aapl.message, 'Cycle aborted');
  assert.equal(result.deadlineExceeded, false);
  assert.deepEqual(client.calls, []);
});
