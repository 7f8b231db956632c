import type { HealthSummary } from '../../shared/api-types.js';
import type { CircuitInfo } from '../lib/circuitBreaker.js';
import type { AggregateCache } from './aggregateCache.js';

/**
 * Readiness summary for dashboard and report callers. Observes the cache
 * only; never triggers a refresh.
 */
function getHealth(cache: AggregateCache, refreshing = false): HealthSummary {
  const read = cache.currentSnapshot();
  const lastError = cache.getLastCycleError();
  if (!read.ready) {
    return {
      cache_ready: false,
      age_seconds: null,
      partial_failure_count: 0,
      stale: false,
      refreshing,
      last_error: lastError ? lastError.message : null,
    };
  }
  return {
    cache_ready: true,
    age_seconds: Math.round(read.ageSeconds),
    partial_failure_count: read.snapshot.partialFailureCount,
    stale: read.stale,
    refreshing,
    last_error: lastError ? lastError.message : null,
  };
}

interface HealthPayloadOptions {
  isShuttingDown: boolean;
  nowIso: string;
  uptimeSeconds: number;
}

function buildHealthPayload(options: HealthPayloadOptions) {
  const { isShuttingDown, nowIso, uptimeSeconds } = options;
  return {
    status: 'ok',
    timestamp: nowIso,
    uptimeSeconds,
    shuttingDown: isShuttingDown,
  };
}

interface ReadyPayloadOptions {
  health: HealthSummary;
  isShuttingDown: boolean;
  circuitBreakerInfo?: CircuitInfo | null;
}

function buildReadyPayload(options: ReadyPayloadOptions) {
  const { health, isShuttingDown, circuitBreakerInfo } = options;
  const ready = !isShuttingDown && health.cache_ready;

  // Degraded checks: serving, but from a reduced-quality snapshot.
  const warnings: string[] = [];
  const cbState = circuitBreakerInfo?.state ?? 'CLOSED';
  if (cbState === 'OPEN') warnings.push('upstream circuit breaker is OPEN — quote requests are failing');
  if (cbState === 'HALF_OPEN') warnings.push('upstream circuit breaker is HALF_OPEN — quote requests are recovering');
  if (health.stale && health.age_seconds !== null) {
    warnings.push(`snapshot is stale — last refresh ${health.age_seconds}s ago`);
  }
  if (health.last_error) warnings.push(`last refresh cycle failed: ${health.last_error}`);
  if (health.partial_failure_count > 0) {
    warnings.push(`${health.partial_failure_count} symbol(s) missing from the current snapshot`);
  }

  const degraded = warnings.length > 0;
  const statusCode = !ready ? 503 : 200;

  return {
    statusCode,
    body: {
      ready,
      degraded,
      shuttingDown: isShuttingDown,
      cacheReady: health.cache_ready,
      ageSeconds: health.age_seconds,
      refreshing: health.refreshing,
      circuitBreaker: cbState,
      warnings: degraded ? warnings : undefined,
    },
  };
}

export { getHealth, buildHealthPayload, buildReadyPayload };
