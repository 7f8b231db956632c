import { isAbortError } from './errors.js';
import { moduleLogger } from '../logger.js';

const log = moduleLogger('map-with-concurrency');

export type Settled<R> = R | { error: unknown };

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Results keep
 * input order; a rejected worker leaves `{ error }` in its slot and never stops
 * the others. `shouldStop` ends dispatch of further items, whose slots stay
 * `undefined`.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled?: (result: Settled<R>, index: number, item: T) => void,
  shouldStop?: () => boolean,
): Promise<Array<Settled<R> | undefined>> {
  const list = Array.isArray(items) ? items : [];
  if (list.length === 0) return [];
  const maxConcurrency = Math.max(1, Math.min(list.length, Math.floor(Number(concurrency)) || 1));
  const results: Array<Settled<R> | undefined> = Array.from({ length: list.length }, () => undefined);
  let cursor = 0;
  let cancelled = false;

  const checkStop = (): boolean => {
    if (cancelled) return true;
    if (typeof shouldStop !== 'function') return false;
    try {
      if (shouldStop()) {
        cancelled = true;
        cursor = list.length;
      }
    } catch (err: unknown) {
      log.warn({ err }, 'shouldStop callback threw; continuing');
    }
    return cancelled;
  };

  async function runOneWorker(): Promise<void> {
    while (cursor < list.length) {
      if (checkStop()) break;
      const currentIndex = cursor;
      cursor += 1;
      const item = list[currentIndex];
      let settled: Settled<R>;
      try {
        settled = await worker(item, currentIndex);
      } catch (err: unknown) {
        settled = { error: err };
      }
      results[currentIndex] = settled;
      if (typeof onSettled === 'function') {
        try {
          onSettled(settled, currentIndex, item);
        } catch (err: unknown) {
          log.warn({ err, index: currentIndex }, 'onSettled callback threw');
        }
      }
      if (isSettledError(settled) && isAbortError(settled.error) && checkStop()) break;
    }
  }

  const workers: Array<Promise<void>> = [];
  for (let i = 0; i < maxConcurrency; i++) {
    workers.push(runOneWorker());
  }
  await Promise.all(workers);
  return results;
}

export function isSettledError<R>(value: Settled<R>): value is { error: unknown } {
  return typeof value === 'object' && value !== null && 'error' in value && Object.keys(value).length === 1;
}
