import { COMMIT_FAILURE_KIND, CommitFailureKind } from '../../constants/order.constants';
import {
  CommitFailure,
  LookupError,
  OrderPlacementError,
  insufficientStock,
  insufficientStockAmong,
  orderConflict,
  storeUnavailable,
} from './orders.errors';

export type FailureResolution =
  | { action: 'retry'; cause: CommitFailureKind | 'lookup_error' }
  | { action: 'fail'; error: unknown; cause: string };

const readNumber = (details: Record<string, unknown> | undefined, key: string): number | undefined => {
  const value = details?.[key];
  return typeof value === 'number' ? value : undefined;
};

const readNumbers = (details: Record<string, unknown> | undefined, key: string): number[] => {
  const value = details?.[key];
  return Array.isArray(value) ? value.filter((item): item is number => typeof item === 'number') : [];
};

const shortageAtCommit = (failure: CommitFailure): OrderPlacementError => {
  const productId = readNumber(failure.details, 'productId');
  const requested = readNumber(failure.details, 'requested');
  const available = readNumber(failure.details, 'available');

  if (productId === undefined || requested === undefined || available === undefined) {
    return insufficientStockAmong(readNumbers(failure.details, 'productIds'));
  }
  return insufficientStock(productId, requested, available);
};

/**
 * Decide what happens after attempt `attempt` (1-based) failed with `error`.
 *
 * Serialization conflicts and stale versions are retried until `maxAttempts`
 * is spent, then surface as CONFLICT. Store outages are retried only when
 * the transaction is known not to have committed. Everything else is final.
 */
export const resolveFailure = (error: unknown, attempt: number, maxAttempts: number): FailureResolution => {
  const budgetLeft = attempt < maxAttempts;

  if (error instanceof OrderPlacementError) {
    return { action: 'fail', error, cause: error.code };
  }

  if (error instanceof LookupError) {
    return budgetLeft
      ? { action: 'retry', cause: 'lookup_error' }
      : { action: 'fail', error: storeUnavailable(attempt, false, error), cause: 'lookup_error' };
  }

  if (!(error instanceof CommitFailure)) {
    return { action: 'fail', error, cause: 'unexpected' };
  }

  switch (error.kind) {
    case COMMIT_FAILURE_KIND.SERIALIZATION_CONFLICT:
    case COMMIT_FAILURE_KIND.STALE_VERSION:
      return budgetLeft
        ? { action: 'retry', cause: error.kind }
        : { action: 'fail', error: orderConflict(attempt, error.kind, error), cause: error.kind };

    case COMMIT_FAILURE_KIND.INSUFFICIENT_STOCK_AT_COMMIT:
      // Same shape as the pre-commit failure; only the logs tell them apart
      return { action: 'fail', error: shortageAtCommit(error), cause: error.kind };

    case COMMIT_FAILURE_KIND.STORE_UNAVAILABLE:
      if (error.commitOutcomeUnknown) {
        return { action: 'fail', error: storeUnavailable(attempt, true, error), cause: error.kind };
      }
      return budgetLeft
        ? { action: 'retry', cause: error.kind }
        : { action: 'fail', error: storeUnavailable(attempt, false, error), cause: error.kind };
  }
};

/**
 * Exponential backoff with equal jitter: half the step is fixed, half random.
 */
export const computeBackoff = (
  attempt: number,
  baseMs: number,
  maxMs: number,
  random: () => number = Math.random
): number => {
  const step = Math.min(maxMs, baseMs * 2 ** (attempt - 1));
  return Math.floor(step / 2 + random() * (step / 2));
};
