import { SourceUnavailableError, toError } from '../errors.js';

const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

// Postgres SQLSTATE 57P01-57P03: server shutting down or not accepting connections
const PG_SHUTDOWN_STATES = new Set(['57P01', '57P02', '57P03']);

// pg reports a dropped socket without a code
const PG_TERMINATED = /^Connection terminated|connection error|Connection is closed/i;

/** snowflake-sdk numbers its network failures 401xxx */
const SNOWFLAKE_NETWORK_CODE = /^401\d{3}$/;

function codeOf(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  const { code } = error;
  return typeof code === 'string' || typeof code === 'number' ? String(code) : undefined;
}

function causeOf(error: unknown): unknown {
  if (typeof error !== 'object' || error === null || !('cause' in error)) return undefined;
  return error.cause;
}

/**
 * True when the failure is about the connection, not the statement.
 * Follows `cause` chains, where drivers keep the socket error.
 */
export function isSourceConnectionError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; current !== undefined && depth < 5; depth++) {
    const code = codeOf(current);
    if (code !== undefined) {
      if (NETWORK_ERROR_CODES.has(code)) return true;
      if (code.startsWith('08') && code.length === 5) return true;
      if (PG_SHUTDOWN_STATES.has(code)) return true;
      if (SNOWFLAKE_NETWORK_CODE.test(code)) return true;
    }
    if (current instanceof Error && PG_TERMINATED.test(current.message)) return true;
    current = causeOf(current);
  }
  return false;
}

/**
 * Statement failures stay as they are; connection failures end the run
 */
export function toSourceError(error: unknown, driver: string): Error {
  const cause = toError(error);
  if (isSourceConnectionError(error)) {
    return new SourceUnavailableError(`Lost connection to the ${driver} source: ${cause.message}`, cause);
  }
  return cause;
}
