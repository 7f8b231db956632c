import { buildAbortError, UpstreamError } from './errors.js';

export function sleepWithAbort(ms: number, signal?: AbortSignal | null): Promise<void> {
  const waitMs = Math.max(0, Math.ceil(Number(ms) || 0));
  return new Promise((resolve, reject) => {
    let settled = false;
    const done = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (signal) {
        signal.removeEventListener('abort', onAbort);
      }
      fn();
    };
    const onAbort = () => done(() => reject(buildAbortError('Request aborted while waiting')));
    const timer = setTimeout(() => done(resolve), waitMs);
    if (signal) {
      if (signal.aborted) {
        onAbort();
        return;
      }
      signal.addEventListener('abort', onAbort, { once: true });
    }
  });
}

export function linkAbortSignalToController(parentSignal: AbortSignal | null, controller: AbortController): () => void {
  if (!parentSignal) return () => {};
  const forwardAbort = () => {
    controller.abort();
  };
  if (parentSignal.aborted) {
    forwardAbort();
    return () => {};
  }
  parentSignal.addEventListener('abort', forwardAbort);
  return () => {
    parentSignal.removeEventListener('abort', forwardAbort);
  };
}

/**
 * Run `task` with its own AbortSignal that fires when the parent aborts or
 * `timeoutMs` elapses. A timeout rejects with a `timeout` UpstreamError.
 */
export async function runWithAbortAndTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: { label?: string; signal?: AbortSignal | null; timeoutMs?: number } = {},
): Promise<T> {
  const label = String(options.label || 'Task').trim() || 'Task';
  const parentSignal = options.signal || null;
  const timeoutMs = Math.max(0, Math.floor(Number(options.timeoutMs) || 0));
  if (parentSignal && parentSignal.aborted) {
    throw buildAbortError(`${label} aborted`);
  }

  const controller = new AbortController();
  const unlinkAbort = linkAbortSignalToController(parentSignal, controller);
  if (timeoutMs <= 0) {
    try {
      return await task(controller.signal);
    } finally {
      unlinkAbort();
    }
  }

  let timeoutTimer: ReturnType<typeof setTimeout> | null = null;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutTimer = setTimeout(() => {
      controller.abort();
      reject(new UpstreamError('timeout', `${label} timed out after ${timeoutMs}ms`, { httpStatus: 504 }));
    }, timeoutMs);
    if (typeof timeoutTimer.unref === 'function') {
      timeoutTimer.unref();
    }
  });

  try {
    return await Promise.race([task(controller.signal), timeoutPromise]);
  } finally {
    if (timeoutTimer) clearTimeout(timeoutTimer);
    unlinkAbort();
  }
}
