import { COMMIT_FAILURE_KIND } from '../../constants/order.constants';
import { CommitFailure, OrderPlacementError } from './orders.errors';

// SQLSTATE codes, see https://www.postgresql.org/docs/current/errcodes-appendix.html
const SERIALIZATION_FAILURE = '40001';
const DEADLOCK_DETECTED = '40P01';
const CHECK_VIOLATION = '23514';
const UNAVAILABLE_SQLSTATES = new Set(['57014', '57P01', '57P02', '57P03', '53300']);
const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND', 'EHOSTUNREACH']);
const DRIVER_UNAVAILABLE_MESSAGE = /timeout|Connection terminated|Client has encountered a connection error/i;

const errorCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
};

/**
 * Map a driver error to a CommitFailure; other errors pass through unchanged.
 */
export const translateStoreError = (error: unknown, duringCommit: boolean = false): unknown => {
  if (error instanceof CommitFailure || error instanceof OrderPlacementError) {
    return error;
  }

  const code = errorCode(error);

  if (code === SERIALIZATION_FAILURE || code === DEADLOCK_DETECTED) {
    return new CommitFailure(COMMIT_FAILURE_KIND.SERIALIZATION_CONFLICT, 'Concurrent transaction conflict', {
      cause: error,
      details: { sqlState: code },
    });
  }

  if (code === CHECK_VIOLATION) {
    // The statement does not say which row failed; the committer fills in the products it touched
    return new CommitFailure(COMMIT_FAILURE_KIND.INSUFFICIENT_STOCK_AT_COMMIT, 'Stock constraint rejected the decrement', {
      cause: error,
    });
  }

  const unavailable =
    (code !== undefined && (UNAVAILABLE_SQLSTATES.has(code) || code.startsWith('08') || NETWORK_ERROR_CODES.has(code))) ||
    (code === undefined && error instanceof Error && DRIVER_UNAVAILABLE_MESSAGE.test(error.message));

  if (unavailable) {
    return new CommitFailure(COMMIT_FAILURE_KIND.STORE_UNAVAILABLE, 'Order store is unavailable', {
      cause: error,
      commitOutcomeUnknown: duringCommit,
    });
  }

  return error;
};

export const isStoreOutage = (error: unknown): boolean => {
  const translated = translateStoreError(error);
  return translated instanceof CommitFailure && translated.kind === COMMIT_FAILURE_KIND.STORE_UNAVAILABLE;
};
