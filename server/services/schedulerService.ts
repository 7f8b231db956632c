import { OFF_HOURS_REFRESH_INTERVAL_MS, REFRESH_INTERVAL_MS, REFRESH_SCHEDULER_ENABLED } from '../config.js';
import { isExtendedMarketSession } from '../lib/dateUtils.js';
import { errorMessage } from '../lib/errors.js';
import { moduleLogger } from '../logger.js';
import type { RefreshOutcome, RefreshTrigger } from './refreshCoordinator.js';

const log = moduleLogger('scheduler');

export interface RefreshTarget {
  refresh(trigger: RefreshTrigger): Promise<RefreshOutcome>;
}

export interface RefreshCadence {
  intervalMs: number;
  offHoursIntervalMs: number;
}

/** Market-hours cadence during the extended session, the slower one otherwise. */
export function getNextRefreshDelayMs(nowUtc: Date = new Date(), cadence: Partial<RefreshCadence> = {}): number {
  const intervalMs = Math.max(1_000, cadence.intervalMs ?? REFRESH_INTERVAL_MS);
  const offHoursIntervalMs = Math.max(1_000, cadence.offHoursIntervalMs ?? OFF_HOURS_REFRESH_INTERVAL_MS);
  return isExtendedMarketSession(nowUtc) ? intervalMs : offHoursIntervalMs;
}

export interface RefreshSchedulerOptions extends Partial<RefreshCadence> {
  target: RefreshTarget;
  enabled?: boolean;
  /** Delay before the warmup cycle; 0 runs it on the next tick. */
  initialDelayMs?: number;
  now?: () => Date;
}

export interface RefreshSchedulerState {
  enabledByConfig: boolean;
  enabled: boolean;
  nextRunUtc: string | null;
  lastOutcome: RefreshOutcome['status'] | null;
  lastRunUtc: string | null;
}

export interface RefreshSchedulerHandle {
  getState(): RefreshSchedulerState;
  setEnabled(enabled: boolean): RefreshSchedulerState;
  stop(): void;
}

/**
 * Timer loop that runs a warmup cycle, then keeps refreshing on the
 * session-dependent cadence. Each run is scheduled only after the previous
 * one settles, so cycles never overlap from here.
 */
export function startRefreshScheduler(options: RefreshSchedulerOptions): RefreshSchedulerHandle {
  const enabledByConfig = options.enabled ?? REFRESH_SCHEDULER_ENABLED;
  const now = options.now ?? (() => new Date());
  const cadence: Partial<RefreshCadence> = { intervalMs: options.intervalMs, offHoursIntervalMs: options.offHoursIntervalMs };
  let enabled = enabledByConfig;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let nextRunUtcMs: number | null = null;
  let lastOutcome: RefreshOutcome['status'] | null = null;
  let lastRunUtcMs: number | null = null;
  let runCount = 0;

  const clearTimer = (): void => {
    if (timer) clearTimeout(timer);
    timer = null;
    nextRunUtcMs = null;
  };

  const getState = (): RefreshSchedulerState => ({
    enabledByConfig,
    enabled,
    nextRunUtc: nextRunUtcMs ? new Date(nextRunUtcMs).toISOString() : null,
    lastOutcome,
    lastRunUtc: lastRunUtcMs ? new Date(lastRunUtcMs).toISOString() : null,
  });

  const scheduleNext = (delayMs: number): void => {
    clearTimer();
    if (!enabled) return;
    nextRunUtcMs = now().getTime() + delayMs;
    const handle = setTimeout(() => {
      timer = null;
      nextRunUtcMs = null;
      const trigger: RefreshTrigger = runCount === 0 ? 'startup' : 'scheduler';
      runCount += 1;
      lastRunUtcMs = now().getTime();
      options.target
        .refresh(trigger)
        .then((outcome) => {
          lastOutcome = outcome.status;
        })
        .catch((err: unknown) => {
          lastOutcome = 'failed';
          log.error({ err: errorMessage(err) }, 'Scheduled refresh crashed');
        })
        .finally(() => {
          if (enabled) scheduleNext(getNextRefreshDelayMs(now(), cadence));
        });
    }, delayMs);
    if (typeof handle.unref === 'function') handle.unref();
    timer = handle;
    log.debug({ delaySeconds: Math.round(delayMs / 1000) }, 'Next refresh scheduled');
  };

  if (enabled) {
    scheduleNext(Math.max(0, options.initialDelayMs ?? 0));
  } else {
    log.info('Refresh scheduler disabled by configuration');
  }

  return {
    getState,
    setEnabled(next: boolean): RefreshSchedulerState {
      const wasEnabled = enabled;
      enabled = Boolean(next);
      if (!enabled) {
        clearTimer();
      } else if (!wasEnabled) {
        scheduleNext(runCount === 0 ? 0 : getNextRefreshDelayMs(now(), cadence));
      }
      return getState();
    },
    stop(): void {
      enabled = false;
      clearTimer();
    },
  };
}
