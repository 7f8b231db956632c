import test from 'node:test';
import assert from 'node:assert/strict';

import { isSettledError, mapWithConcurrency } from '../server/lib/mapWithConcurrency.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ---------------------------------------------------------------------------
// Basic behavior
// ---------------------------------------------------------------------------

test('mapWithConcurrency processes all items and returns correct results', async () => {
  const results = await mapWithConcurrency([1, 2, 3, 4, 5], 3, async (n) => n * 2);
  assert.deepEqual(results, [2, 4, 6, 8, 10]);
});

test('mapWithConcurrency returns empty array for empty input', async () => {
  const results = await mapWithConcurrency([], 4, async (x) => x);
  assert.deepEqual(results, []);
});

test('mapWithConcurrency preserves result order regardless of completion order', async () => {
  // Items with higher index finish faster (smaller delay)
  const results = await mapWithConcurrency([50, 30, 10, 40, 20], 5, async (ms, idx) => {
    await delay(ms);
    return idx;
  });
  assert.deepEqual(results, [0, 1, 2, 3, 4]);
});

// ---------------------------------------------------------------------------
// Concurrency limit
// ---------------------------------------------------------------------------

test('mapWithConcurrency does not exceed specified concurrency', async () => {
  let concurrent = 0;
  let maxConcurrent = 0;
  const concurrency = 3;

  await mapWithConcurrency(
    Array.from({ length: 10 }, (_, i) => i),
    concurrency,
    async () => {
      concurrent++;
      maxConcurrent = Math.max(maxConcurrent, concurrent);
      await delay(5);
      concurrent--;
    },
  );

  assert.ok(maxConcurrent <= concurrency, `maxConcurrent=${maxConcurrent} exceeded limit=${concurrency}`);
  assert.equal(maxConcurrent, concurrency);
});

test('mapWithConcurrency with concurrency=1 processes items serially', async () => {
  const order: number[] = [];

  await mapWithConcurrency([1, 2, 3], 1, async (n) => {
    order.push(n);
    await delay(1);
  });

  assert.deepEqual(order, [1, 2, 3]);
});

test('mapWithConcurrency treats a non-positive concurrency as 1', async () => {
  let concurrent = 0;
  let maxConcurrent = 0;

  await mapWithConcurrency([1, 2, 3], 0, async () => {
    concurrent++;
    maxConcurrent = Math.max(maxConcurrent, concurrent);
    await delay(1);
    concurrent--;
  });

  assert.equal(maxConcurrent, 1);
});

// ---------------------------------------------------------------------------
// onSettled callback
// ---------------------------------------------------------------------------

test('mapWithConcurrency onSettled receives result, index and item', async () => {
  const calls: Array<{ result: unknown; index: number; item: string }> = [];

  await mapWithConcurrency(
    ['a', 'b', 'c'],
    2,
    async (s) => s.toUpperCase(),
    (result, index, item) => calls.push({ result, index, item }),
  );

  assert.equal(calls.length, 3);
  const sorted = calls.sort((a, b) => a.index - b.index);
  assert.deepEqual(sorted[0], { result: 'A', index: 0, item: 'a' });
  assert.deepEqual(sorted[2], { result: 'C', index: 2, item: 'c' });
});

test('mapWithConcurrency error in onSettled does not abort processing', async () => {
  let processedCount = 0;

  const results = await mapWithConcurrency(
    [1, 2, 3],
    2,
    async (n) => n,
    () => {
      processedCount++;
      throw new Error('callback error');
    },
  );

  assert.equal(processedCount, 3);
  assert.deepEqual(results, [1, 2, 3]);
});

// ---------------------------------------------------------------------------
// Worker errors
// ---------------------------------------------------------------------------

test('mapWithConcurrency captures worker exceptions as { error } results', async () => {
  const results = await mapWithConcurrency([1, 2, 3], 2, async (n) => {
    if (n === 2) throw new Error('boom');
    return n * 10;
  });

  assert.equal(results.length, 3);
  assert.equal(results[0], 10);
  const failed = results[1];
  assert.ok(failed !== undefined && isSettledError(failed));
  assert.ok(failed.error instanceof Error);
  assert.equal(failed.error.message, 'boom');
  assert.equal(results[2], 30);
});

test('isSettledError ignores plain results', () => {
  assert.equal(isSettledError(42), false);
  assert.equal(isSettledError({ error: 'x', extra: 1 }), false);
  assert.equal(isSettledError({ error: new Error('x') }), true);
});

// ---------------------------------------------------------------------------
// shouldStop
// ---------------------------------------------------------------------------

test('mapWithConcurrency stops dispatching once shouldStop returns true', async () => {
  let processedCount = 0;

  const results = await mapWithConcurrency(
    Array.from({ length: 10 }, (_, i) => i),
    1,
    async (n) => {
      processedCount++;
      return n;
    },
    undefined,
    () => processedCount >= 3,
  );

  assert.equal(processedCount, 3);
  assert.deepEqual(results.slice(0, 3), [0, 1, 2]);
  assert.equal(results[3], undefined);
  assert.equal(results.length, 10);
});

test('mapWithConcurrency with shouldStop=always-true processes nothing', async () => {
  let processedCount = 0;

  await mapWithConcurrency(
    Array.from({ length: 20 }, (_, i) => i),
    4,
    async () => {
      processedCount++;
    },
    undefined,
    () => true,
  );

  assert.equal(processedCount, 0);
});

test('mapWithConcurrency shouldStop error does not abort processing', async () => {
  let processedCount = 0;

  await mapWithConcurrency(
    [1, 2, 3],
    2,
    async (n) => {
      processedCount++;
      return n;
    },
    undefined,
    () => {
      throw new Error('shouldStop error');
    },
  );

  assert.equal(processedCount, 3);
});
