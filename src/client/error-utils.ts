import { errorCode, errorMessage } from '../utils.js';

const RE_CONN_REFUSED = /ECONNREFUSED|fetch failed/i;
const RE_FETCH_FAILED = /fetch failed/i;
const RE_CONN_TIMEOUT = /Connection timeout \(\d+ms\)/i;

export class ClientError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly retryable = false
  ) {
    super(message);
    this.name = 'ClientError';
  }
}

export function makeClientError(msg: string, status?: number, retryable?: boolean): ClientError {
  return new ClientError(msg, status, retryable ?? false);
}

function causeCode(e: unknown): string | undefined {
  if (e instanceof Error) return errorCode(e.cause);
  return undefined;
}

export function isConnRefused(e: unknown): boolean {
  return errorCode(e) === 'ECONNREFUSED' || causeCode(e) === 'ECONNREFUSED' || RE_CONN_REFUSED.test(errorMessage(e));
}

export function isFetchFailed(e: unknown): boolean {
  return RE_FETCH_FAILED.test(errorMessage(e));
}

export function isConnTimeout(e: unknown): boolean {
  return e instanceof ClientError && e.retryable && RE_CONN_TIMEOUT.test(e.message);
}

export function isAbortError(e: unknown): boolean {
  return e instanceof Error && (e.name === 'AbortError' || errorCode(e) === 'ABORT_ERR');
}

export function asError(e: unknown, fallback = 'unknown error'): Error {
  if (e instanceof Error) return e;
  if (e === undefined) return new Error(fallback);
  return new Error(String(e));
}

/** Backoff for retry `attempt` (0-based): base, 2×base, 4×base... */
export function backoffMs(attempt: number, baseMs: number): number {
  return Math.max(0, Math.pow(2, attempt) * baseMs);
}
