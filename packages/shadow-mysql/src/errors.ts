// packages/shadow-mysql/src/errors.ts
import {
  CollaboratorUnavailableError,
  ExecutionError,
  ShadowError,
  TimeoutError,
  errorMessage
} from '@shadowsql/core';

// driver / socket level failures: the shadow database itself is out of reach
const UNREACHABLE_CODES = new Set([
  'ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'EHOSTUNREACH', 'ECONNRESET', 'EPIPE',
  'PROTOCOL_CONNECTION_LOST', 'PROTOCOL_ENQUEUE_AFTER_FATAL_ERROR', 'POOL_CLOSED',
  'ER_ACCESS_DENIED_ERROR', 'ER_DBACCESS_DENIED_ERROR', 'ER_BAD_DB_ERROR',
  'ER_CON_COUNT_ERROR', 'ER_SERVER_SHUTDOWN'
]);

const TIMEOUT_CODES = new Set(['ER_QUERY_TIMEOUT', 'PROTOCOL_SEQUENCE_TIMEOUT']);
const ER_QUERY_TIMEOUT_ERRNO = 3024;

function field(e: unknown, key: string): unknown {
  if (typeof e !== 'object' || e === null) return undefined;
  return Reflect.get(e, key);
}

/**
 * Maps a mysql2 error onto the shared taxonomy. Statement-level problems stay
 * recoverable; anything that means the server is unreachable is fatal.
 */
export function classifyMysqlError(e: unknown, operation: string, timeoutMs?: number): ShadowError {
  if (e instanceof ShadowError) return e;

  const code = field(e, 'code');
  const errno = field(e, 'errno');
  const sqlMessage = field(e, 'sqlMessage');
  const message = typeof sqlMessage === 'string' && sqlMessage ? sqlMessage : errorMessage(e);
  const codeStr = typeof code === 'string' ? code : undefined;

  if (errno === ER_QUERY_TIMEOUT_ERRNO || (codeStr && TIMEOUT_CODES.has(codeStr))) {
    return new TimeoutError(operation, timeoutMs ?? 0);
  }
  if ((codeStr && UNREACHABLE_CODES.has(codeStr)) || field(e, 'fatal') === true) {
    return new CollaboratorUnavailableError('database', `${operation}: ${message}`, { code: codeStr });
  }
  return new ExecutionError(message, { operation, code: codeStr, errno: typeof errno === 'number' ? errno : undefined });
}
