import { randomBytes } from 'crypto';

/**
 * Concurrency control applied by the order committer.
 * - serializable: SERIALIZABLE transaction + SELECT ... FOR UPDATE on touched products
 * - optimistic: READ COMMITTED + version-conditioned stock update
 */
export const CONCURRENCY_MODE = {
  SERIALIZABLE: 'serializable',
  OPTIMISTIC: 'optimistic',
} as const;

export type ConcurrencyMode = typeof CONCURRENCY_MODE[keyof typeof CONCURRENCY_MODE];

const CONCURRENCY_MODES: readonly ConcurrencyMode[] = Object.values(CONCURRENCY_MODE);

export const isConcurrencyMode = (value: string): value is ConcurrencyMode =>
  CONCURRENCY_MODES.some(mode => mode === value);

export const ISOLATION_LEVEL = {
  SERIALIZABLE: 'SERIALIZABLE',
  READ_COMMITTED: 'READ COMMITTED',
} as const;

export type IsolationLevel = typeof ISOLATION_LEVEL[keyof typeof ISOLATION_LEVEL];

/**
 * Caller-visible failure codes
 */
export const ORDER_ERROR_CODE = {
  EMPTY_ORDER: 'EMPTY_ORDER',
  INVALID_QUANTITY: 'INVALID_QUANTITY',
  AMBIGUOUS_PRODUCT_NAME: 'AMBIGUOUS_PRODUCT_NAME',
  PRODUCT_NOT_FOUND: 'PRODUCT_NOT_FOUND',
  INSUFFICIENT_STOCK: 'INSUFFICIENT_STOCK',
  CONFLICT: 'CONFLICT',
  UNAVAILABLE: 'UNAVAILABLE',
  CANCELLED: 'CANCELLED',
} as const;

export type OrderErrorCode = typeof ORDER_ERROR_CODE[keyof typeof ORDER_ERROR_CODE];

export const ORDER_ERROR_STATUS: Record<OrderErrorCode, number> = {
  EMPTY_ORDER: 400,
  INVALID_QUANTITY: 400,
  AMBIGUOUS_PRODUCT_NAME: 400,
  PRODUCT_NOT_FOUND: 404,
  INSUFFICIENT_STOCK: 409,
  CONFLICT: 409,
  UNAVAILABLE: 503,
  // Client closed request
  CANCELLED: 499,
};

/**
 * Internal commit failure kinds, resolved into caller-visible codes by the conflict resolver
 */
export const COMMIT_FAILURE_KIND = {
  SERIALIZATION_CONFLICT: 'serialization_conflict',
  STALE_VERSION: 'stale_version',
  INSUFFICIENT_STOCK_AT_COMMIT: 'insufficient_stock_at_commit',
  STORE_UNAVAILABLE: 'store_unavailable',
} as const;

export type CommitFailureKind = typeof COMMIT_FAILURE_KIND[keyof typeof COMMIT_FAILURE_KIND];

/**
 * Stock History Types
 */
export const STOCK_HISTORY_TYPE = {
  IN: 'in',
  OUT: 'out',
  ADJUSTMENT: 'adjustment',
} as const;

/**
 * Order Number Prefix
 */
export const ORDER_NUMBER_PREFIX = 'ORD';

/**
 * Generate Order Number
 */
export const generateOrderNumber = (): string => {
  return `${ORDER_NUMBER_PREFIX}-${Date.now()}-${randomBytes(4).toString('hex').toUpperCase()}`;
};
