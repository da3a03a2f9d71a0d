import {
  COMMIT_FAILURE_KIND,
  CONCURRENCY_MODE,
  ConcurrencyMode,
  ISOLATION_LEVEL,
  generateOrderNumber,
} from '../../constants/order.constants';
import { OrderPlan, PlannedLine } from './order-pricing';
import { OrderHeader, OrderStore, ProductSnapshot, StockChange } from './order.store';
import { CommitFailure, orderCancelled } from './orders.errors';

export interface CommitRequest {
  userId: string;
  plan: OrderPlan;
  concurrencyMode: ConcurrencyMode;
  signal?: AbortSignal;
}

export interface CommittedOrder {
  order: OrderHeader;
  stockChanges: StockChange[];
}

const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw orderCancelled();
  }
};

const insufficientAtCommit = (line: PlannedLine, available: number): CommitFailure =>
  new CommitFailure(
    COMMIT_FAILURE_KIND.INSUFFICIENT_STOCK_AT_COMMIT,
    `Stock for product ${line.productId} changed before commit`,
    { details: { productId: line.productId, requested: line.quantity, available } }
  );

const staleVersion = (lines: PlannedLine[]): CommitFailure =>
  new CommitFailure(
    COMMIT_FAILURE_KIND.STALE_VERSION,
    'Products changed since the snapshot was taken',
    { details: { productIds: lines.map(line => line.productId) } }
  );

// The stock CHECK constraint names no row; the failed transaction cannot be asked which
const withTouchedProducts = (error: unknown, productIds: number[]): unknown =>
  error instanceof CommitFailure &&
  error.kind === COMMIT_FAILURE_KIND.INSUFFICIENT_STOCK_AT_COMMIT &&
  error.details === undefined
    ? new CommitFailure(error.kind, error.message, { cause: error.cause, details: { productIds } })
    : error;

// A shortage is reported ahead of a version change
const checkAgainstCurrent = (lines: PlannedLine[], current: ProductSnapshot[]): CommitFailure | null => {
  const rows = new Map(current.map(row => [row.id, row]));
  const stale: PlannedLine[] = [];

  for (const line of lines) {
    const row = rows.get(line.productId);
    if (row && row.stockQuantity < line.quantity) {
      return insufficientAtCommit(line, row.stockQuantity);
    }
    if (!row || row.version !== line.version) {
      stale.push(line);
    }
  }

  return stale.length > 0 ? staleVersion(stale) : null;
};

/**
 * Persist the order header, its lines, the stock decrements and the stock
 * history in one transaction. Any failure rolls all of it back.
 */
export const commitOrder = async (store: OrderStore, request: CommitRequest): Promise<CommittedOrder> => {
  const { userId, plan, concurrencyMode, signal } = request;
  throwIfAborted(signal);

  const pessimistic = concurrencyMode === CONCURRENCY_MODE.SERIALIZABLE;
  const isolationLevel = pessimistic ? ISOLATION_LEVEL.SERIALIZABLE : ISOLATION_LEVEL.READ_COMMITTED;
  const productIds = plan.lines.map(line => line.productId);

  return store.withTransaction(isolationLevel, async tx => {
    if (pessimistic) {
      const failure = checkAgainstCurrent(plan.lines, await tx.lockProducts(productIds));
      if (failure) {
        throw failure;
      }
    }

    const order = await tx.insertOrder({
      userId,
      orderNumber: generateOrderNumber(),
      totalAmount: plan.totalAmount,
    });

    await tx.insertOrderItems(
      order.id,
      plan.lines.map(({ productId, quantity, unitPrice, lineTotal }) => ({ productId, quantity, unitPrice, lineTotal }))
    );

    const stockChanges = await tx
      .decrementStock(
        plan.lines.map(line => ({
          productId: line.productId,
          quantity: line.quantity,
          expectedVersion: line.version,
        }))
      )
      .catch((error: unknown) => {
        throw withTouchedProducts(error, productIds);
      });

    if (stockChanges.length !== plan.lines.length) {
      const applied = new Set(stockChanges.map(change => change.productId));
      const missed = plan.lines.filter(line => !applied.has(line.productId));
      const current = await tx.findProductsByIds(missed.map(line => line.productId));
      throw checkAgainstCurrent(missed, current) ?? staleVersion(missed);
    }

    const quantities = new Map(plan.lines.map(line => [line.productId, line.quantity]));
    await tx.insertStockHistory(
      stockChanges.map(change => ({
        productId: change.productId,
        quantity: quantities.get(change.productId) ?? change.previousStock - change.newStock,
        previousStock: change.previousStock,
        newStock: change.newStock,
        reason: `Order #${order.orderNumber}`,
        createdBy: userId,
      }))
    );

    // Last point where cancelling still leaves nothing behind
    throwIfAborted(signal);

    return { order, stockChanges };
  });
};
