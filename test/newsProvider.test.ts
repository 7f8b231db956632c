import test from 'node:test';
import assert from 'node:assert/strict';

import { UpstreamError } from '../server/lib/errors.js';
import { YahooNewsProvider } from '../server/services/newsProvider.js';

const BASE_URL = 'https://quotes.test';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

test('market headlines are untagged and symbol headlines carry their symbol', async () => {
  const urls: string[] = [];
  const provider = new YahooNewsProvider({
    baseUrl: `${BASE_URL}/`,
    timeoutMs: 0,
    fetchImpl: async (url) => {
      urls.push(url);
      if (url.includes('q=%5EGSPC')) {
        return jsonResponse({
          news: [{ title: 'Stocks close higher', publisher: 'Wire', link: 'https://news.test/a', providerPublishTime: 1792418400 }],
        });
      }
      return jsonResponse({ news: [{ title: 'Apple unveils chip', link: 'https://news.test/b' }] });
    },
  });

  const items = await provider.fetchNews(['AAPL']);

  assert.deepEqual(urls.sort(), [
    `${BASE_URL}/v1/finance/search?q=%5EGSPC&newsCount=10&quotesCount=0`,
    `${BASE_URL}/v1/finance/search?q=AAPL&newsCount=3&quotesCount=0`,
  ]);
  assert.deepEqual(items, [
    {
      title: 'Stocks close higher',
      source: 'Wire',
      publishedAt: '2026-10-19T14:00:00.000Z',
      url: 'https://news.test/a',
      symbol: null,
    },
    {
      title: 'Apple unveils chip',
      source: 'Yahoo Finance',
      publishedAt: '1970-01-01T00:00:00.000Z',
      url: 'https://news.test/b',
      symbol: 'AAPL',
    },
  ]);
});

test('per-request item limits are applied to the provider response', async () => {
  const provider = new YahooNewsProvider({
    baseUrl: BASE_URL,
    timeoutMs: 0,
    marketItems: 1,
    fetchImpl: async () =>
      jsonResponse({
        news: [
          { title: 'First', link: 'https://news.test/1' },
          { title: 'Second', link: 'https://news.test/2' },
        ],
      }),
  });

  const items = await provider.fetchNews([]);
  assert.deepEqual(
    items.map((item) => item.title),
    ['First'],
  );
});

test('one failing search still returns the other headlines', async () => {
  const provider = new YahooNewsProvider({
    baseUrl: BASE_URL,
    timeoutMs: 0,
    fetchImpl: async (url) => {
      if (url.includes('q=MSFT')) return new Response('boom', { status: 500 });
      return jsonResponse({ news: [{ title: 'Market wrap', link: 'https://news.test/m' }] });
    },
  });

  const items = await provider.fetchNews(['MSFT']);
  assert.deepEqual(
    items.map((item) => [item.title, item.symbol]),
    [['Market wrap', null]],
  );
});

test('every search failing rejects with a classified error', async () => {
  const provider = new YahooNewsProvider({
    baseUrl: BASE_URL,
    timeoutMs: 0,
    fetchImpl: async () => new Response('slow down', { status: 429 }),
  });

  await assert.rejects(provider.fetchNews(['AAPL']), (err: unknown) => {
    assert.ok(err instanceof UpstreamError);
    assert.equal(err.kind, 'rate_limited');
    return true;
  });
});

test('a body that is not JSON is a malformed response', async () => {
  const provider = new YahooNewsProvider({
    baseUrl: BASE_URL,
    timeoutMs: 0,
    fetchImpl: async () => new Response('<html>', { status: 200 }),
  });

  await assert.rejects(provider.fetchNews([]), { kind: 'malformed', message: 'News ^GSPC: response is not valid JSON' });
});
