import logger from './server/logger.js';
import {
  CORS_ORIGIN,
  HOST,
  PORT,
  REQUEST_LOG_ENABLED,
  validateStartupEnvironment,
} from './server/config.js';
import { enableDefaultMetrics } from './server/metrics.js';
import { buildApp } from './server/app.js';
import { errorMessage } from './server/lib/errors.js';
import { YahooNewsProvider } from './server/services/newsProvider.js';
import { MarketDataService } from './server/services/refreshCoordinator.js';
import { startRefreshScheduler, type RefreshSchedulerHandle } from './server/services/schedulerService.js';
import { YahooUpstreamClient } from './server/services/upstreamClient.js';
import { createWatchlistProvider } from './server/services/watchlistProvider.js';

try {
  validateStartupEnvironment();
} catch (err: unknown) {
  logger.fatal({ err: errorMessage(err) }, 'Fatal: startup environment is invalid, exiting.');
  process.exit(1);
}

enableDefaultMetrics();

const startedAtMs = Date.now();
let isShuttingDown = false;
let scheduler: RefreshSchedulerHandle | null = null;

const service = new MarketDataService({
  client: new YahooUpstreamClient(),
  watchlistProvider: createWatchlistProvider(),
  newsProvider: new YahooNewsProvider(),
});

const app = await buildApp({
  service,
  corsOrigin: CORS_ORIGIN,
  requestLogEnabled: REQUEST_LOG_ENABLED,
  startedAtMs,
  isShuttingDown: () => isShuttingDown,
});

try {
  await app.listen({ port: PORT, host: HOST });
  logger.info(`Server running on port ${PORT}`);
  scheduler = startRefreshScheduler({ target: service });
} catch (err: unknown) {
  logger.fatal({ err: errorMessage(err) }, 'Fatal: HTTP server failed to start, exiting.');
  process.exit(1);
}

process.on('unhandledRejection', (reason) => {
  logger.error({ err: errorMessage(reason) }, 'Unhandled promise rejection');
});
process.on('uncaughtException', (err) => {
  logger.error({ err: errorMessage(err) }, 'Uncaught exception');
  void shutdownServer('uncaughtException');
});

async function shutdownServer(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info(`Received ${signal}; shutting down gracefully...`);

  scheduler?.stop();
  scheduler = null;

  const forceExitTimer = setTimeout(() => {
    logger.error('Graceful shutdown timed out; forcing exit');
    process.exit(1);
  }, 15000);
  if (typeof forceExitTimer.unref === 'function') {
    forceExitTimer.unref();
  }

  try {
    // Abort the running cycle so it does not hold the process open.
    await service.stop();
    await app.close();
    logger.info('Shutdown complete');
    clearTimeout(forceExitTimer);
    process.exit(0);
  } catch (err: unknown) {
    logger.error(`Graceful shutdown failed: ${errorMessage(err)}`);
    clearTimeout(forceExitTimer);
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  void shutdownServer('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdownServer('SIGTERM');
});
