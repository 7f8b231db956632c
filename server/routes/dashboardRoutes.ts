import type { FastifyInstance, FastifyReply } from 'fastify';
import type { HealthSummary, Snapshot, SnapshotRead } from '../../shared/api-types.js';
import { errorMessage } from '../lib/errors.js';
import { moduleLogger } from '../logger.js';
import * as schemas from '../schemas.js';

const log = moduleLogger('dashboard-routes');

export const LOADING_MESSAGE = 'Data is loading, please wait...';

/** What the dashboard routes need from the refresh coordinator. */
export interface DashboardDataSource {
  getSnapshot(): SnapshotRead;
  getHealth(): HealthSummary;
  isRefreshing(): boolean;
  forceRefresh(): { status: 'started' | 'already_running' };
}

type ReadySnapshot = Extract<SnapshotRead, { ready: true }>;

function sendLoading(reply: FastifyReply) {
  return reply.code(202).send({ loading: true, message: LOADING_MESSAGE });
}

/** Quotes in watchlist order (insertion order of the snapshot map). */
function quoteList(snapshot: Snapshot) {
  return Object.values(snapshot.quotes);
}

function indexList(records: Snapshot['indices']) {
  return Object.values(records).sort((a, b) => a.displayOrder - b.displayOrder);
}

export function registerDashboardRoutes(app: FastifyInstance, source: DashboardDataSource): void {
  // Every read route answers 202 until the first snapshot lands.
  const withSnapshot = (handler: (read: ReadySnapshot, reply: FastifyReply) => unknown) => {
    return async (_request: unknown, reply: FastifyReply) => {
      const read = source.getSnapshot();
      if (!read.ready) return sendLoading(reply);
      return handler(read, reply);
    };
  };

  app.get(
    '/api/all',
    withSnapshot((read, reply) => {
      const { snapshot } = read;
      return reply.send({
        quotes: quoteList(snapshot),
        absent: snapshot.absent,
        sectors: snapshot.sectors,
        movers: snapshot.movers,
        indices: indexList(snapshot.indices),
        futures: indexList(snapshot.futures),
        news: snapshot.news,
        earnings: snapshot.earnings,
        dividends: snapshot.dividends,
        cycleId: snapshot.cycleId,
        symbolCount: snapshot.symbolCount,
        partialFailureCount: snapshot.partialFailureCount,
        refreshedAt: new Date(snapshot.refreshedAt).toISOString(),
        ageSeconds: Math.round(read.ageSeconds),
        stale: read.stale,
        loading: source.isRefreshing(),
      });
    }),
  );

  app.get(
    '/api/quotes',
    withSnapshot((read, reply) => reply.send(quoteList(read.snapshot))),
  );

  app.get('/api/quotes/:symbol', async (request, reply) => {
    const parsed = schemas.quoteParams.safeParse(request.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: 'Invalid symbol' });
    }
    const read = source.getSnapshot();
    if (!read.ready) return sendLoading(reply);
    const symbol = parsed.data.symbol.toUpperCase();
    const record = read.snapshot.quotes[symbol];
    if (record) return reply.send(record);
    const absent = read.snapshot.absent.find((entry) => entry.symbol === symbol);
    if (absent) {
      return reply.code(404).send({ error: `No data for ${symbol}`, reason: absent.reason, message: absent.message });
    }
    return reply.code(404).send({ error: `Unknown symbol ${symbol}` });
  });

  app.get(
    '/api/sectors',
    withSnapshot((read, reply) => reply.send(read.snapshot.sectors)),
  );

  app.get(
    '/api/movers',
    withSnapshot((read, reply) => reply.send(read.snapshot.movers)),
  );

  app.get(
    '/api/indices',
    withSnapshot((read, reply) => reply.send(indexList(read.snapshot.indices))),
  );

  app.get(
    '/api/futures',
    withSnapshot((read, reply) => reply.send(indexList(read.snapshot.futures))),
  );

  app.get(
    '/api/news',
    withSnapshot((read, reply) => reply.send(read.snapshot.news)),
  );

  app.get(
    '/api/earnings',
    withSnapshot((read, reply) => reply.send(read.snapshot.earnings)),
  );

  app.get(
    '/api/dividends',
    withSnapshot((read, reply) => reply.send(read.snapshot.dividends)),
  );

  app.get('/api/health', async (_request, reply) => {
    return reply.send(source.getHealth());
  });

  app.post('/api/refresh', async (_request, reply) => {
    try {
      const result = source.forceRefresh();
      return reply.code(result.status === 'started' ? 202 : 200).send(result);
    } catch (err: unknown) {
      log.error({ err: errorMessage(err) }, 'Manual refresh could not be started');
      return reply.code(500).send({ error: 'Failed to start refresh' });
    }
  });
}
