import { isRecord } from '../utils.js';

const RE_CONN_REFUSED = /ECONNREFUSED|fetch failed/i;
const RE_FETCH_FAILED = /fetch failed/i;

export class ClientError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'ClientError';
  }
}

export function makeClientError(msg: string, status?: number, retryable?: boolean): ClientError {
  return new ClientError(msg, status, retryable ?? false);
}

function messageOf(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (isRecord(e) && typeof e.message === 'string') return e.message;
  return String(e ?? '');
}

export function isConnRefused(e: unknown): boolean {
  const cause = e instanceof Error ? e.cause : undefined;
  if (isRecord(cause) && cause.code === 'ECONNREFUSED') return true;
  return RE_CONN_REFUSED.test(messageOf(e));
}

export function isFetchFailed(e: unknown): boolean {
  return RE_FETCH_FAILED.test(messageOf(e));
}

export function asError(e: unknown, fallback = 'unknown error'): Error {
  if (e instanceof Error) return e;
  if (e === undefined) return new Error(fallback);
  return new Error(String(e));
}

/** HTTP status carried by a client error, if any. */
export function statusOf(e: unknown): number | undefined {
  if (e instanceof ClientError) return e.status;
  if (isRecord(e) && typeof e.status === 'number') return e.status;
  return undefined;
}
