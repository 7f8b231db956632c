import client from 'prom-client';

/** Process-level metrics (memory, CPU, event loop). Called once from the entry point. */
export function enableDefaultMetrics(): void {
  client.collectDefaultMetrics({
    labels: { app: 'watchlist-market-monitor' },
  });
}

export const httpRequestsTotal = new client.Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status_code'],
});

export const refreshCycleDurationSeconds = new client.Histogram({
  name: 'refresh_cycle_duration_seconds',
  help: 'Wall-clock duration of refresh cycles in seconds',
  labelNames: ['outcome'],
  buckets: [1, 5, 10, 20, 30, 60, 90, 120, 300],
});

export const refreshCyclesTotal = new client.Counter({
  name: 'refresh_cycles_total',
  help: 'Refresh cycles by outcome',
  labelNames: ['outcome', 'trigger'],
});

export const symbolFetchFailuresTotal = new client.Counter({
  name: 'symbol_fetch_failures_total',
  help: 'Symbols reported absent in a cycle, by reason',
  labelNames: ['reason'],
});

export const snapshotAgeSeconds = new client.Gauge({
  name: 'snapshot_age_seconds',
  help: 'Age of the committed snapshot in seconds (-1 while empty)',
});

export const metricsRegistry = client.register;
