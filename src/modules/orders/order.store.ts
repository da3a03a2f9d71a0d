import Decimal from 'decimal.js';
import { IsolationLevel } from '../../constants/order.constants';

export interface ProductSnapshot {
  id: number;
  name: string;
  price: Decimal;
  stockQuantity: number;
  version: number;
}

export interface ProductReference {
  id: number;
  name: string;
}

export interface NewOrder {
  userId: string;
  orderNumber: string;
  totalAmount: Decimal;
}

export interface OrderHeader {
  id: number;
  userId: string;
  orderNumber: string;
  totalAmount: string;
  createdAt: Date;
}

export interface NewOrderItem {
  productId: number;
  quantity: number;
  unitPrice: Decimal;
  lineTotal: Decimal;
}

/**
 * Decrement applied only while the row still carries `expectedVersion`
 * and holds at least `quantity` units.
 */
export interface StockDecrement {
  productId: number;
  quantity: number;
  expectedVersion: number;
}

export interface StockChange {
  productId: number;
  previousStock: number;
  newStock: number;
  version: number;
}

export interface StockHistoryEntry {
  productId: number;
  quantity: number;
  previousStock: number;
  newStock: number;
  reason: string;
  createdBy: string;
}

/**
 * Writes available inside an open transaction. Every method is one statement,
 * whatever the number of products involved.
 */
export interface OrderTransaction {
  /** Re-read and row-lock the products, in ascending id order */
  lockProducts(productIds: readonly number[]): Promise<ProductSnapshot[]>;
  /** Unlocked read inside the transaction */
  findProductsByIds(productIds: readonly number[]): Promise<ProductSnapshot[]>;
  insertOrder(order: NewOrder): Promise<OrderHeader>;
  insertOrderItems(orderId: number, items: readonly NewOrderItem[]): Promise<void>;
  /** Returns one change per decrement that applied; missing entries did not */
  decrementStock(decrements: readonly StockDecrement[]): Promise<StockChange[]>;
  insertStockHistory(entries: readonly StockHistoryEntry[]): Promise<void>;
}

/**
 * Persistence consumed by the order placement pipeline.
 *
 * `withTransaction` commits when `work` resolves and rolls back when it
 * rejects; a rolled back transaction leaves no row behind.
 */
export interface OrderStore {
  findProductsByIds(productIds: readonly number[]): Promise<ProductSnapshot[]>;
  findProductsByNames(names: readonly string[]): Promise<ProductReference[]>;
  withTransaction<T>(isolationLevel: IsolationLevel, work: (tx: OrderTransaction) => Promise<T>): Promise<T>;
}
