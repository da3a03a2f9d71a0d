import Decimal from 'decimal.js';
import { ProductSnapshot } from '../../src/modules/orders/order.store';
import { StoredProduct } from './in-memory-order-store';

export const WIDGET_A = 1;
export const WIDGET_B = 2;
export const LAST_ONE = 3;

// A: 5 in stock at 10.00, B: 2 in stock at 3.50, C: a single unit at 5.00
export const catalog = (): StoredProduct[] => [
  { id: WIDGET_A, name: 'Widget A', price: '10.00', stockQuantity: 5, version: 1 },
  { id: WIDGET_B, name: 'Widget B', price: '3.50', stockQuantity: 2, version: 1 },
  { id: LAST_ONE, name: 'Last One', price: '5.00', stockQuantity: 1, version: 1 },
];

export const snapshotOf = (product: StoredProduct): ProductSnapshot => ({
  id: product.id,
  name: product.name,
  price: new Decimal(product.price),
  stockQuantity: product.stockQuantity,
  version: product.version,
});
