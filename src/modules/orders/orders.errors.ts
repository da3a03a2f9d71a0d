import {
  CommitFailureKind,
  ORDER_ERROR_CODE,
  ORDER_ERROR_STATUS,
  OrderErrorCode,
} from '../../constants/order.constants';

/**
 * Terminal, caller-visible failure of an order placement.
 * `status` is the HTTP status the error middleware responds with.
 */
export class OrderPlacementError extends Error {
  readonly code: OrderErrorCode;
  readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(code: OrderErrorCode, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'OrderPlacementError';
    this.code = code;
    this.status = ORDER_ERROR_STATUS[code];
    this.details = details;
  }
}

export interface CommitFailureOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
  // True when the failure hit while COMMIT was in flight
  commitOutcomeUnknown?: boolean;
}

/**
 * Abort of the commit transaction. Never leaves the placement service:
 * the conflict resolver turns it into a retry or an OrderPlacementError.
 */
export class CommitFailure extends Error {
  readonly kind: CommitFailureKind;
  readonly details?: Record<string, unknown>;
  readonly commitOutcomeUnknown: boolean;

  constructor(kind: CommitFailureKind, message: string, options: CommitFailureOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CommitFailure';
    this.kind = kind;
    this.details = options.details;
    this.commitOutcomeUnknown = options.commitOutcomeUnknown ?? false;
  }
}

/**
 * The product snapshot read failed; nothing was written.
 */
export class LookupError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LookupError';
  }
}

export const emptyOrder = (): OrderPlacementError =>
  new OrderPlacementError(ORDER_ERROR_CODE.EMPTY_ORDER, 'Order must contain at least one item');

export const invalidQuantity = (productId: number, quantity: number): OrderPlacementError =>
  new OrderPlacementError(
    ORDER_ERROR_CODE.INVALID_QUANTITY,
    `Quantity for product ${productId} must be a positive integer`,
    { productId, quantity }
  );

export const productNotFound = (reference: { productId: number } | { productName: string }): OrderPlacementError =>
  new OrderPlacementError(
    ORDER_ERROR_CODE.PRODUCT_NOT_FOUND,
    'productId' in reference
      ? `Product ${reference.productId} does not exist`
      : `Product "${reference.productName}" does not exist`,
    { ...reference }
  );

export const ambiguousProductName = (productName: string, candidates: number[]): OrderPlacementError =>
  new OrderPlacementError(
    ORDER_ERROR_CODE.AMBIGUOUS_PRODUCT_NAME,
    `Product name "${productName}" matches ${candidates.length} products, use product_id`,
    { productName, candidates }
  );

export const insufficientStock = (productId: number, requested: number, available: number): OrderPlacementError =>
  new OrderPlacementError(
    ORDER_ERROR_CODE.INSUFFICIENT_STOCK,
    `Insufficient stock for product ${productId}`,
    { productId, requested, available }
  );

export const insufficientStockAmong = (productIds: number[]): OrderPlacementError =>
  new OrderPlacementError(
    ORDER_ERROR_CODE.INSUFFICIENT_STOCK,
    'Insufficient stock for one or more products in the order',
    { productIds }
  );

export const orderConflict = (attempts: number, lastCause: CommitFailureKind, cause?: unknown): OrderPlacementError =>
  new OrderPlacementError(
    ORDER_ERROR_CODE.CONFLICT,
    'Order could not be placed because of concurrent updates, please retry',
    { attempts, lastCause },
    cause
  );

export const storeUnavailable = (attempts: number, outcomeUnknown: boolean, cause?: unknown): OrderPlacementError =>
  new OrderPlacementError(
    ORDER_ERROR_CODE.UNAVAILABLE,
    outcomeUnknown
      ? 'Order store became unavailable while committing, the order may or may not have been placed'
      : 'Order store is unavailable',
    { attempts, outcomeUnknown },
    cause
  );

export const orderCancelled = (): OrderPlacementError =>
  new OrderPlacementError(ORDER_ERROR_CODE.CANCELLED, 'Order placement was cancelled before commit');
