import crypto from 'crypto';
import type { FastifyRequest } from 'fastify';
import logger from './logger.js';
import * as schemas from './schemas.js';

export function logStructured(level: string, event: string, fields: Record<string, unknown> = {}) {
  const pinoLevel = level === 'error' ? 'error' : level === 'warn' ? 'warn' : 'info';
  logger[pinoLevel]({ event, ...fields });
}

export function createRequestId() {
  if (typeof crypto.randomUUID === 'function') {
    return crypto.randomUUID();
  }
  return crypto.randomBytes(8).toString('hex');
}

export function shouldLogRequestPath(pathname: string) {
  const path = String(pathname || '');
  if (path.startsWith('/api/')) return true;
  return path === '/healthz' || path === '/readyz';
}

export function extractSafeRequestMeta(req: FastifyRequest) {
  const path = String(req.url.split('?')[0] || '');
  const query = req.query;
  const queryKeys = query && typeof query === 'object' ? Object.keys(query) : [];
  const meta = {
    method: req.method,
    path,
    queryKeys,
  };
  if (path.startsWith('/api/quotes/')) {
    const params = schemas.quoteParams.safeParse(req.params);
    return { ...meta, symbol: params.success ? params.data.symbol.toUpperCase() : null };
  }
  return meta;
}

export function isValidTickerSymbol(value: unknown) {
  return schemas.tickerSymbol.safeParse(value).success;
}
