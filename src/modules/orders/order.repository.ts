import Decimal from 'decimal.js';
import { Pool, PoolClient } from 'pg';
import { COMMIT_FAILURE_KIND, IsolationLevel, STOCK_HISTORY_TYPE } from '../../constants/order.constants';
import { Order, OrderWithItems } from '../../connections/db/models/order.model';
import { ProductNameRow, ProductStockRow } from '../../connections/db/models/product.model';
import { StockChangeRow } from '../../connections/db/models/stock-history.model';
import { getLogger } from '../../utils/logging';
import {
  NewOrder,
  NewOrderItem,
  OrderHeader,
  OrderStore,
  OrderTransaction,
  ProductReference,
  ProductSnapshot,
  StockChange,
  StockDecrement,
  StockHistoryEntry,
} from './order.store';
import { CommitFailure } from './orders.errors';
import { translateStoreError } from './store-errors';

const logger = getLogger('order-repository');

export interface OrderReader {
  findOrderById(orderId: number): Promise<OrderWithItems | null>;
  findOrdersByUser(userId: string): Promise<OrderWithItems[]>;
}

const PRODUCT_COLUMNS = 'id, name, price, stock_quantity, version';

const ORDER_WITH_ITEMS_SELECT = `
  SELECT o.id, o.user_id, o.order_number, o.total_amount, o.created_at,
  COALESCE((SELECT json_agg(json_build_object(
    'product_id', oi.product_id,
    'quantity', oi.quantity,
    'unit_price', oi.unit_price::text,
    'line_total', oi.line_total::text
  ) ORDER BY oi.id) FROM order_items oi WHERE oi.order_id = o.id), '[]'::json) AS items
  FROM orders o
`;

// Ids beyond the int4 range cannot name a row and would fail the ::int[] cast
const MAX_PRODUCT_ID = 2147483647;

const storableIds = (productIds: readonly number[]): number[] =>
  productIds.filter(id => Number.isInteger(id) && id >= 1 && id <= MAX_PRODUCT_ID);

const toSnapshot = (row: ProductStockRow): ProductSnapshot => ({
  id: row.id,
  name: row.name,
  price: new Decimal(row.price),
  stockQuantity: row.stock_quantity,
  version: row.version,
});

class PgOrderTransaction implements OrderTransaction {
  constructor(private readonly client: PoolClient) {}

  async lockProducts(productIds: readonly number[]): Promise<ProductSnapshot[]> {
    // Ascending id order keeps concurrent lockers from deadlocking
    const result = await this.client.query<ProductStockRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = ANY($1::int[]) ORDER BY id FOR UPDATE`,
      [storableIds(productIds)]
    );
    return result.rows.map(toSnapshot);
  }

  async findProductsByIds(productIds: readonly number[]): Promise<ProductSnapshot[]> {
    const result = await this.client.query<ProductStockRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = ANY($1::int[])`,
      [storableIds(productIds)]
    );
    return result.rows.map(toSnapshot);
  }

  async insertOrder(order: NewOrder): Promise<OrderHeader> {
    const result = await this.client.query<Order>(
      `INSERT INTO orders (user_id, order_number, total_amount)
       VALUES ($1, $2, $3)
       RETURNING id, user_id, order_number, total_amount, created_at`,
      [order.userId, order.orderNumber, order.totalAmount.toFixed(2)]
    );

    const row = result.rows[0];
    return {
      id: row.id,
      userId: row.user_id,
      orderNumber: row.order_number,
      totalAmount: row.total_amount,
      createdAt: row.created_at,
    };
  }

  async insertOrderItems(orderId: number, items: readonly NewOrderItem[]): Promise<void> {
    await this.client.query(
      `INSERT INTO order_items (order_id, product_id, quantity, unit_price, line_total)
       SELECT $1::int, item.product_id, item.quantity, item.unit_price, item.line_total
       FROM unnest($2::int[], $3::int[], $4::numeric[], $5::numeric[])
         AS item(product_id, quantity, unit_price, line_total)`,
      [
        orderId,
        items.map(item => item.productId),
        items.map(item => item.quantity),
        items.map(item => item.unitPrice.toFixed(2)),
        items.map(item => item.lineTotal.toFixed(2)),
      ]
    );
  }

  async decrementStock(decrements: readonly StockDecrement[]): Promise<StockChange[]> {
    const result = await this.client.query<StockChangeRow>(
      `UPDATE products AS p
       SET stock_quantity = p.stock_quantity - d.quantity,
           version = p.version + 1,
           updated_at = CURRENT_TIMESTAMP
       FROM unnest($1::int[], $2::int[], $3::int[]) AS d(product_id, quantity, expected_version)
       WHERE p.id = d.product_id
         AND p.version = d.expected_version
         AND p.stock_quantity >= d.quantity
       RETURNING p.id, p.stock_quantity + d.quantity AS previous_stock, p.stock_quantity AS new_stock, p.version`,
      [
        decrements.map(decrement => decrement.productId),
        decrements.map(decrement => decrement.quantity),
        decrements.map(decrement => decrement.expectedVersion),
      ]
    );

    return result.rows.map(row => ({
      productId: row.id,
      previousStock: row.previous_stock,
      newStock: row.new_stock,
      version: row.version,
    }));
  }

  async insertStockHistory(entries: readonly StockHistoryEntry[]): Promise<void> {
    await this.client.query(
      `INSERT INTO stock_history (product_id, type, quantity, previous_stock, new_stock, reason, created_by)
       SELECT h.product_id, $1::varchar, h.quantity, h.previous_stock, h.new_stock, h.reason, h.created_by
       FROM unnest($2::int[], $3::int[], $4::int[], $5::int[], $6::text[], $7::text[])
         AS h(product_id, quantity, previous_stock, new_stock, reason, created_by)`,
      [
        STOCK_HISTORY_TYPE.OUT,
        entries.map(entry => entry.productId),
        entries.map(entry => entry.quantity),
        entries.map(entry => entry.previousStock),
        entries.map(entry => entry.newStock),
        entries.map(entry => entry.reason),
        entries.map(entry => entry.createdBy),
      ]
    );
  }
}

export class PgOrderStore implements OrderStore, OrderReader {
  constructor(private readonly pool: Pool) {}

  async findProductsByIds(productIds: readonly number[]): Promise<ProductSnapshot[]> {
    const result = await this.pool.query<ProductStockRow>(
      `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = ANY($1::int[])`,
      [storableIds(productIds)]
    );
    return result.rows.map(toSnapshot);
  }

  async findProductsByNames(names: readonly string[]): Promise<ProductReference[]> {
    const result = await this.pool.query<ProductNameRow>(
      'SELECT id, name FROM products WHERE name = ANY($1::text[]) ORDER BY id',
      [names]
    );
    return result.rows.map(row => ({ id: row.id, name: row.name }));
  }

  async withTransaction<T>(isolationLevel: IsolationLevel, work: (tx: OrderTransaction) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw translateStoreError(error);
    }

    let committing = false;
    let brokenConnection: Error | undefined;
    try {
      await client.query(`BEGIN ISOLATION LEVEL ${isolationLevel}`);
      const result = await work(new PgOrderTransaction(client));
      committing = true;
      await client.query('COMMIT');
      return result;
    } catch (error) {
      // A failed COMMIT already ended the transaction server-side
      if (!committing) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackError) {
          brokenConnection = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
          logger.warn('Rollback failed, discarding connection', { error: brokenConnection.message });
        }
      }
      const translated = translateStoreError(error, committing);
      if (translated instanceof CommitFailure && translated.kind === COMMIT_FAILURE_KIND.STORE_UNAVAILABLE) {
        brokenConnection = translated;
      }
      throw translated;
    } finally {
      client.release(brokenConnection);
    }
  }

  async findOrderById(orderId: number): Promise<OrderWithItems | null> {
    const result = await this.pool.query<OrderWithItems>(`${ORDER_WITH_ITEMS_SELECT} WHERE o.id = $1`, [orderId]);
    return result.rows[0] ?? null;
  }

  async findOrdersByUser(userId: string): Promise<OrderWithItems[]> {
    const result = await this.pool.query<OrderWithItems>(
      `${ORDER_WITH_ITEMS_SELECT} WHERE o.user_id = $1 ORDER BY o.created_at DESC, o.id DESC`,
      [userId]
    );
    return result.rows;
  }
}
