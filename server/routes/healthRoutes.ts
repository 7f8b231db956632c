import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { moduleLogger } from '../logger.js';
import { metricsRegistry } from '../metrics.js';

const log = moduleLogger('health-routes');

interface HealthRoutesOptions {
  app: FastifyInstance;
  getHealthPayload: () => Record<string, unknown>;
  getReadyPayload: () => Promise<{ statusCode: number; body: Record<string, unknown> }>;
  /** Refreshes point-in-time gauges right before a scrape. */
  beforeMetricsScrape?: () => void;
}

function registerHealthRoutes(options: HealthRoutesOptions): void {
  const { app, getHealthPayload, getReadyPayload, beforeMetricsScrape } = options;

  if (!app) {
    throw new Error('registerHealthRoutes requires app');
  }

  app.get('/healthz', (_req: FastifyRequest, res: FastifyReply) => {
    return res.code(200).send(getHealthPayload());
  });

  app.get('/readyz', async (_req: FastifyRequest, res: FastifyReply) => {
    try {
      const readyPayload = await getReadyPayload();
      return res.code(readyPayload.statusCode).send(readyPayload.body);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      log.error(`Ready check failed: ${message}`);
      return res.code(503).send({
        ready: false,
        error: 'Ready check failed',
      });
    }
  });

  app.get('/metrics', async (_req: FastifyRequest, res: FastifyReply) => {
    beforeMetricsScrape?.();
    const body = await metricsRegistry.metrics();
    return res.code(200).header('Content-Type', metricsRegistry.contentType).send(body);
  });
}

export { registerHealthRoutes };
