import test from 'node:test';
import assert from 'node:assert/strict';

import { RequestPacer, TokenBucket } from '../server/lib/requestPacer.js';

// ---------------------------------------------------------------------------
// RequestPacer
// ---------------------------------------------------------------------------

test('nextDelayMs adds jitter below jitterMs to the current spacing', () => {
  const pacer = new RequestPacer({ baseSpacingMs: 100, jitterMs: 50, maxSpacingMs: 1_000, random: () => 0.5 });
  assert.equal(pacer.nextDelayMs(), 125);

  const edge = new RequestPacer({ baseSpacingMs: 100, jitterMs: 50, maxSpacingMs: 1_000, random: () => 0.999 });
  assert.equal(edge.nextDelayMs(), 149);
});

test('backOff doubles spacing up to the cap and counts rate limits', () => {
  const pacer = new RequestPacer({ baseSpacingMs: 200, jitterMs: 0, maxSpacingMs: 1_000 });
  assert.equal(pacer.backOff(), 400);
  assert.equal(pacer.backOff(), 800);
  assert.equal(pacer.backOff(), 1_000);
  assert.equal(pacer.backOff(), 1_000);
  assert.equal(pacer.getSpacingMs(), 1_000);
  assert.equal(pacer.getRateLimitedCount(), 4);
});

test('backOff from zero spacing starts at the minimum backoff step', () => {
  const pacer = new RequestPacer({ baseSpacingMs: 0, jitterMs: 0, maxSpacingMs: 5_000 });
  assert.equal(pacer.backOff(), 250);
  assert.equal(pacer.backOff(), 500);
});

test('wait rejects when the signal is already aborted', async () => {
  const pacer = new RequestPacer({ baseSpacingMs: 0, jitterMs: 0, maxSpacingMs: 0 });
  const controller = new AbortController();
  controller.abort();
  await assert.rejects(pacer.wait(controller.signal), { name: 'AbortError' });
  await pacer.wait(null);
});

// ---------------------------------------------------------------------------
// TokenBucket
// ---------------------------------------------------------------------------

test('TokenBucket allows a burst up to capacity, then refills over time', () => {
  const clock = { now: 0 };
  const bucket = new TokenBucket({ ratePerSecond: 2, now: () => clock.now });
  assert.equal(bucket.tryAcquire(), true);
  assert.equal(bucket.tryAcquire(), true);
  assert.equal(bucket.tryAcquire(), false);

  clock.now = 500;
  assert.equal(bucket.tryAcquire(), true);
  assert.equal(bucket.tryAcquire(), false);
});

test('TokenBucket acquire waits for a slot and honors abort', async () => {
  const bucket = new TokenBucket({ ratePerSecond: 50, capacity: 1 });
  await bucket.acquire();
  const startedAt = Date.now();
  await bucket.acquire();
  assert.ok(Date.now() - startedAt >= 10, 'second acquire should wait for a refill');

  const controller = new AbortController();
  controller.abort();
  await assert.rejects(bucket.acquire(controller.signal), { name: 'AbortError' });
});
