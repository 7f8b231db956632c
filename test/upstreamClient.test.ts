import test from 'node:test';
import assert from 'node:assert/strict';

import { CircuitBreaker } from '../server/lib/circuitBreaker.js';
import { UpstreamError, isInfrastructureError } from '../server/lib/errors.js';
import { YahooUpstreamClient, type FetchLike } from '../server/services/upstreamClient.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function createClient(fetchImpl: FetchLike, circuitBreaker?: CircuitBreaker) {
  return new YahooUpstreamClient({
    baseUrl: 'https://quotes.test/',
    timeoutMs: 1_000,
    maxRequestsPerSecond: 100,
    fetchImpl,
    circuitBreaker,
  });
}

const AAPL_QUOTE = {
  quoteResponse: {
    result: [
      {
        symbol: 'AAPL',
        shortName: 'Apple Inc.',
        currency: 'USD',
        regularMarketPrice: 190.5,
        regularMarketPreviousClose: 188,
        regularMarketOpen: 188.4,
        regularMarketDayHigh: 191,
        regularMarketDayLow: 187.9,
        regularMarketVolume: 52_000_000,
        averageDailyVolume3Month: null,
        averageDailyVolume10Day: 48_000_000,
        marketCap: 2_950_000_000_000,
        fiftyTwoWeekHigh: 199.6,
        fiftyTwoWeekLow: 164.1,
        preMarketPrice: 189.2,
      },
    ],
    error: null,
  },
};

// ---------------------------------------------------------------------------
// fetchQuote
// ---------------------------------------------------------------------------

test('fetchQuote requests the quote endpoint and normalizes fields', async () => {
  const urls: string[] = [];
  const client = createClient(async (url) => {
    urls.push(url);
    return jsonResponse(AAPL_QUOTE);
  });

  const quote = await client.fetchQuote('AAPL');

  assert.deepEqual(urls, ['https://quotes.test/v7/finance/quote?symbols=AAPL']);
  assert.deepEqual(quote, {
    symbol: 'AAPL',
    name: 'Apple Inc.',
    price: 190.5,
    previousClose: 188,
    open: 188.4,
    dayHigh: 191,
    dayLow: 187.9,
    volume: 52_000_000,
    avgVolume: 48_000_000,
    marketCap: 2_950_000_000_000,
    fiftyTwoWeekHigh: 199.6,
    fiftyTwoWeekLow: 164.1,
    currency: 'USD',
    preMarketPrice: 189.2,
    postMarketPrice: null,
  });
});

test('fetchQuote reports an empty result as not_found', async () => {
  const client = createClient(async () => jsonResponse({ quoteResponse: { result: [], error: null } }));
  await assert.rejects(client.fetchQuote('ZZZZ'), (err: unknown) => {
    assert.ok(err instanceof UpstreamError);
    assert.equal(err.kind, 'not_found');
    assert.equal(err.retryable, false);
    return true;
  });
});

test('fetchQuote maps HTTP 429 to a retryable rate_limited error', async () => {
  const client = createClient(async () => new Response('Too Many Requests', { status: 429 }));
  await assert.rejects(client.fetchQuote('AAPL'), (err: unknown) => {
    assert.ok(err instanceof UpstreamError);
    assert.equal(err.kind, 'rate_limited');
    assert.equal(err.retryable, true);
    assert.equal(err.httpStatus, 429);
    return true;
  });
});

test('fetchQuote rejects non-JSON and schema-violating bodies as malformed', async () => {
  const htmlClient = createClient(async () => new Response('<html>maintenance</html>', { status: 200 }));
  await assert.rejects(htmlClient.fetchQuote('AAPL'), { name: 'UpstreamError', kind: 'malformed' });

  const badShape = createClient(async () =>
    jsonResponse({ quoteResponse: { result: [{ symbol: 'AAPL', regularMarketPrice: 'n/a' }] } }),
  );
  await assert.rejects(badShape.fetchQuote('AAPL'), { name: 'UpstreamError', kind: 'malformed' });

  const noPrice = createClient(async () => jsonResponse({ quoteResponse: { result: [{ symbol: 'AAPL' }] } }));
  await assert.rejects(noPrice.fetchQuote('AAPL'), {
    kind: 'malformed',
    message: 'Quote AAPL: missing regular market price',
  });
});

test('fetchQuote times out a hanging request', async () => {
  const client = new YahooUpstreamClient({
    baseUrl: 'https://quotes.test',
    timeoutMs: 20,
    maxRequestsPerSecond: 100,
    // Answers long after the client has given up.
    fetchImpl: () =>
      new Promise<Response>((resolve) => {
        setTimeout(() => resolve(jsonResponse(AAPL_QUOTE)), 200);
      }),
  });
  await assert.rejects(client.fetchQuote('AAPL'), { kind: 'timeout' });
});

test('repeated 5xx responses open the circuit and later calls skip the network', async () => {
  let calls = 0;
  const breaker = new CircuitBreaker({ failureThreshold: 2, cooldownMs: 60_000, isInfraError: isInfrastructureError });
  const client = createClient(async () => {
    calls += 1;
    return new Response('bad gateway', { status: 502 });
  }, breaker);

  await assert.rejects(client.fetchQuote('AAPL'), { kind: 'unavailable' });
  await assert.rejects(client.fetchQuote('AAPL'), { kind: 'unavailable' });
  await assert.rejects(client.fetchQuote('AAPL'), { kind: 'circuit_open' });
  assert.equal(calls, 2);
  assert.equal(client.getCircuitInfo().state, 'OPEN');
});

// ---------------------------------------------------------------------------
// fetchHistory
// ---------------------------------------------------------------------------

test('fetchHistory drops null closes and keeps the most recent days', async () => {
  const urls: string[] = [];
  const client = createClient(async (url) => {
    urls.push(url);
    return jsonResponse({
      chart: {
        result: [{ indicators: { quote: [{ close: [100, null, 101, 102, 103, 104, 105, 106, 107] }] } }],
        error: null,
      },
    });
  });

  const closes = await client.fetchHistory('MSFT', 7);

  assert.deepEqual(urls, ['https://quotes.test/v8/finance/chart/MSFT?range=1mo&interval=1d']);
  assert.deepEqual(closes, [101, 102, 103, 104, 105, 106, 107]);
});

test('fetchHistory maps a chart "Not Found" error to not_found', async () => {
  const client = createClient(async () =>
    jsonResponse({ chart: { result: null, error: { code: 'Not Found', description: 'No data found' } } }),
  );
  await assert.rejects(client.fetchHistory('ZZZZ', 7), {
    kind: 'not_found',
    message: 'History ZZZZ: No data found',
  });
});

test('fetchHistory encodes index symbols in the path', async () => {
  const urls: string[] = [];
  const client = createClient(async (url) => {
    urls.push(url);
    return jsonResponse({ chart: { result: [{ indicators: { quote: [{ close: [1, 2] }] } }], error: null } });
  });
  await client.fetchHistory('^GSPC', 2);
  assert.deepEqual(urls, ['https://quotes.test/v8/finance/chart/%5EGSPC?range=5d&interval=1d']);
});

// ---------------------------------------------------------------------------
// fetchCalendar
// ---------------------------------------------------------------------------

test('fetchCalendar converts event timestamps to Eastern date keys', async () => {
  const client = createClient(async () =>
    jsonResponse({
      quoteSummary: {
        result: [
          {
            calendarEvents: {
              earnings: { earningsDate: [{ raw: 1793898000, fmt: '2026-11-05' }] },
              exDividendDate: { raw: 1795185000, fmt: '2026-11-20' },
            },
          },
        ],
        error: null,
      },
    }),
  );

  const calendar = await client.fetchCalendar('AAPL');
  assert.deepEqual(calendar, { nextEarningsDate: '2026-11-05', nextExDividendDate: '2026-11-20' });
});

test('fetchCalendar returns nulls when no events are scheduled', async () => {
  const client = createClient(async () => jsonResponse({ quoteSummary: { result: [{}], error: null } }));
  assert.deepEqual(await client.fetchCalendar('KO'), { nextEarningsDate: null, nextExDividendDate: null });
});
