/**
 * Upstream error taxonomy and pure classification predicates.
 *
 * Kept in lib/ so utilities like mapWithConcurrency and the circuit breaker
 * can depend on them without a lib → services dependency cycle.
 */

export type UpstreamErrorKind = 'not_found' | 'rate_limited' | 'timeout' | 'unavailable' | 'malformed' | 'circuit_open';

const RETRYABLE_KINDS: ReadonlySet<UpstreamErrorKind> = new Set(['rate_limited', 'timeout', 'unavailable']);

export class UpstreamError extends Error {
  readonly kind: UpstreamErrorKind;
  readonly retryable: boolean;
  readonly httpStatus: number | null;

  constructor(kind: UpstreamErrorKind, message: string, options: { httpStatus?: number | null; retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'UpstreamError';
    this.kind = kind;
    this.httpStatus = options.httpStatus ?? null;
    this.retryable = options.retryable ?? RETRYABLE_KINDS.has(kind);
  }
}

/** Thrown when the circuit is OPEN and a request is rejected without calling the upstream. */
export class CircuitOpenError extends Error {
  readonly cooldownRemainingMs: number;
  readonly httpStatus = 503;

  constructor(cooldownRemainingMs: number) {
    super(`Circuit breaker is OPEN — upstream requests blocked for ${Math.ceil(cooldownRemainingMs / 1000)}s`);
    this.name = 'CircuitOpenError';
    this.cooldownRemainingMs = cooldownRemainingMs;
  }
}

/**
 * Returns true if `err` represents a request-abort signal: an AbortError by
 * name, an HTTP 499 status, or an error message containing "aborted".
 */
export function isAbortError(err: unknown): boolean {
  if (!err || typeof err !== 'object') return false;
  const e = err as Record<string, unknown>;
  const name = String(e.name || '');
  const message = String(e.message || '');
  return name === 'AbortError' || Number(e.httpStatus) === 499 || /aborted|aborterror/i.test(message);
}

export function buildAbortError(message = 'Request aborted'): Error {
  const err = new Error(message);
  err.name = 'AbortError';
  return err;
}

const NETWORK_ERROR_CODES = /^(ECONNREFUSED|ECONNRESET|ETIMEDOUT|ENOTFOUND|EAI_AGAIN|ENETUNREACH|UND_ERR_CONNECT_TIMEOUT|UND_ERR_SOCKET)$/i;

function readErrorCode(err: Record<string, unknown>): string {
  if (typeof err.code === 'string') return err.code;
  const cause = err.cause;
  if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return '';
}

/** Map an HTTP status from the upstream onto the error taxonomy. */
export function upstreamErrorFromStatus(status: number, label: string, detail = ''): UpstreamError {
  const suffix = detail ? `: ${detail}` : '';
  if (status === 404) return new UpstreamError('not_found', `${label} not found (404)${suffix}`, { httpStatus: status });
  if (status === 429) {
    return new UpstreamError('rate_limited', `${label} rate-limited (429)${suffix}`, { httpStatus: status });
  }
  if (status >= 500) {
    return new UpstreamError('unavailable', `${label} upstream error (${status})${suffix}`, { httpStatus: status });
  }
  // Other 4xx responses will not improve on retry.
  return new UpstreamError('unavailable', `${label} request rejected (${status})${suffix}`, {
    httpStatus: status,
    retryable: false,
  });
}

/** Normalize any thrown value into an UpstreamError. */
export function classifyUpstreamError(err: unknown): UpstreamError {
  if (err instanceof UpstreamError) return err;
  if (err instanceof CircuitOpenError) {
    return new UpstreamError('circuit_open', err.message, { httpStatus: err.httpStatus, cause: err });
  }
  if (!err || typeof err !== 'object') {
    return new UpstreamError('unavailable', String(err || 'Unknown upstream failure'));
  }
  const e = err as Record<string, unknown>;
  const message = String(e.message || 'Unknown upstream failure');
  if (e.isTaskTimeout === true || /timed?\s*out/i.test(message)) {
    return new UpstreamError('timeout', message, { httpStatus: 504, cause: err });
  }
  const status = Number(e.httpStatus);
  if (Number.isFinite(status) && status >= 400 && status !== 499) {
    return upstreamErrorFromStatus(status, 'Upstream request', message);
  }
  if (/Too Many Requests|rate limit/i.test(message)) {
    return new UpstreamError('rate_limited', message, { httpStatus: 429, cause: err });
  }
  if (e.name === 'ZodError' || err instanceof SyntaxError) {
    return new UpstreamError('malformed', message, { cause: err });
  }
  if (NETWORK_ERROR_CODES.test(readErrorCode(e)) || /fetch failed|network/i.test(message)) {
    return new UpstreamError('unavailable', message, { cause: err });
  }
  return new UpstreamError('unavailable', message, { cause: err });
}

/**
 * Infrastructure failures trip the circuit breaker. Rate limits, missing
 * symbols, malformed payloads and aborts are symbol- or caller-level signals.
 */
export function isInfrastructureError(err: unknown): boolean {
  if (isAbortError(err)) return false;
  const classified = classifyUpstreamError(err);
  if (classified.kind === 'timeout') return true;
  if (classified.kind !== 'unavailable') return false;
  return classified.httpStatus === null || classified.httpStatus >= 500;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
