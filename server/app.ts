import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { httpRequestsTotal, snapshotAgeSeconds } from './metrics.js';
import { createRequestId, extractSafeRequestMeta, logStructured, shouldLogRequestPath } from './middleware.js';
import { registerDashboardRoutes } from './routes/dashboardRoutes.js';
import { registerHealthRoutes } from './routes/healthRoutes.js';
import { buildHealthPayload, buildReadyPayload } from './services/healthService.js';
import type { MarketDataService } from './services/refreshCoordinator.js';

export interface BuildAppOptions {
  service: Pick<MarketDataService, 'getSnapshot' | 'getHealth' | 'getCircuitInfo' | 'isRefreshing' | 'forceRefresh'>;
  corsOrigin?: string;
  requestLogEnabled?: boolean;
  startedAtMs?: number;
  isShuttingDown?: () => boolean;
}

/** Fastify instance with every route registered; the caller decides whether to listen. */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { service, corsOrigin = '', requestLogEnabled = false } = options;
  const startedAtMs = options.startedAtMs ?? Date.now();
  const isShuttingDown = options.isShuttingDown ?? (() => false);

  const app = Fastify({
    logger: false,
    requestIdHeader: 'x-request-id',
    genReqId: () => createRequestId(),
  });

  // CORS: restrict to configured origin(s), or allow all in dev.
  await app.register(cors, corsOrigin ? { origin: corsOrigin.split(',').map((o) => o.trim()), credentials: true } : {});
  // JSON API only; no documents to protect with a CSP.
  await app.register(helmet, {
    contentSecurityPolicy: false,
    hsts: { maxAge: 31536000, includeSubDomains: true },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  });

  const requestStartedNs = new WeakMap<FastifyRequest, bigint>();

  app.addHook('onRequest', async (request, reply) => {
    reply.header('x-request-id', request.id);
    if (isShuttingDown()) {
      reply.header('Connection', 'close');
      return reply.code(503).send({ error: 'Server is shutting down' });
    }
    const path = request.url.split('?')[0] || '';
    if (requestLogEnabled && shouldLogRequestPath(path)) {
      requestStartedNs.set(request, process.hrtime.bigint());
      logStructured('info', 'request_start', { requestId: request.id, ...extractSafeRequestMeta(request) });
    }
  });

  app.addHook('onResponse', async (request, reply) => {
    httpRequestsTotal.inc({
      method: request.method,
      route: request.routeOptions.url ?? 'unmatched',
      status_code: String(reply.statusCode),
    });
    const startedNs = requestStartedNs.get(request);
    if (startedNs === undefined) return;
    const durationMs = Number(process.hrtime.bigint() - startedNs) / 1e6;
    logStructured('info', 'request_end', {
      requestId: request.id,
      statusCode: reply.statusCode,
      durationMs: Number(durationMs.toFixed(1)),
      ...extractSafeRequestMeta(request),
    });
  });

  registerHealthRoutes({
    app,
    getHealthPayload: () =>
      buildHealthPayload({
        isShuttingDown: isShuttingDown(),
        nowIso: new Date().toISOString(),
        uptimeSeconds: Math.floor((Date.now() - startedAtMs) / 1000),
      }),
    getReadyPayload: async () =>
      buildReadyPayload({
        health: service.getHealth(),
        isShuttingDown: isShuttingDown(),
        circuitBreakerInfo: service.getCircuitInfo(),
      }),
    beforeMetricsScrape: () => {
      const age = service.getHealth().age_seconds;
      snapshotAgeSeconds.set(age ?? -1);
    },
  });

  registerDashboardRoutes(app, service);

  app.get('/', async (_request, reply) => {
    return reply.send({
      name: 'Watchlist Market Monitor API',
      endpoints: {
        '/api/all': 'Every dashboard view from the current snapshot',
        '/api/quotes': 'Watchlist quotes with sparkline closes',
        '/api/quotes/:symbol': 'One watchlist quote',
        '/api/sectors': 'Sector performance aggregated from quotes',
        '/api/movers': 'Top gainers and losers',
        '/api/indices': 'Major indices with display strings',
        '/api/futures': 'Index futures with display strings',
        '/api/news': 'Deduplicated headlines, newest first',
        '/api/earnings': 'Upcoming earnings grouped by date',
        '/api/dividends': 'Upcoming ex-dividend dates',
        '/api/health': 'Cache readiness and staleness',
        '/api/refresh': 'POST: start an out-of-band refresh',
      },
    });
  });

  return app;
}
