import type { PipelineError } from '../../domain/index.js';
import {
  StorageUnavailableError,
  TransactionConflictError,
  TransactionTimeoutError,
} from '../../domain/index.js';

// SQLSTATE classes, see the PostgreSQL "Error Codes" appendix.
const CONFLICT_CODES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '23505', // unique_violation
]);

const TIMEOUT_CODES = new Set([
  '57014', // query_canceled (statement_timeout)
  '55P03', // lock_not_available (lock_timeout)
  '25P03', // idle_in_transaction_session_timeout
]);

/** Error codes postgres.js uses for client-side connection failures. */
const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EPIPE',
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
]);

/** First string `code` found on the error or its `cause` chain. */
export function errorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = 'cause' in current ? current.cause : undefined;
  }
  return undefined;
}

/**
 * Maps a driver error from a merge transaction onto the pipeline taxonomy.
 *
 * Conflicts and timeouts are retryable. Connection loss, server shutdown
 * (class 08, 57P0x), resource exhaustion (class 53) and anything
 * unrecognized are treated as the store being unavailable.
 */
export function classifyStorageError(err: unknown): PipelineError {
  const code = errorCode(err);
  const message = err instanceof Error ? err.message : String(err);

  if (code !== undefined && CONFLICT_CODES.has(code)) {
    return new TransactionConflictError(`Merge transaction conflict (${code}): ${message}`, { cause: err });
  }
  if (code !== undefined && TIMEOUT_CODES.has(code)) {
    return new TransactionTimeoutError(`Merge transaction timed out (${code}): ${message}`, { cause: err });
  }
  if (code !== undefined && (CONNECTION_CODES.has(code) || code.startsWith('08') || code.startsWith('57P') || code.startsWith('53'))) {
    return new StorageUnavailableError(`Transactional store unreachable (${code}): ${message}`, { cause: err });
  }
  return new StorageUnavailableError(`Transactional store failed: ${message}`, { cause: err });
}
