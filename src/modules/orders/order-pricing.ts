import Decimal from 'decimal.js';
import { NormalizedOrder } from './order-normalizer';
import { ProductSnapshotMap } from './order-snapshot';
import { insufficientStock, productNotFound } from './orders.errors';

// Enough significant digits for any NUMERIC(30, 2) amount, so totals never round
const Money = Decimal.clone({ precision: 40 });

export interface PlannedLine {
  productId: number;
  quantity: number;
  unitPrice: Decimal;
  lineTotal: Decimal;
  // Version observed in the snapshot, checked again at commit
  version: number;
}

export interface OrderPlan {
  lines: PlannedLine[];
  totalAmount: Decimal;
}

/**
 * Validate the merged demand against the snapshot and price it.
 * One pass, each product checked once. Pure.
 */
export const priceOrder = (order: NormalizedOrder, snapshot: ProductSnapshotMap): OrderPlan => {
  const lines: PlannedLine[] = [];
  let totalAmount: Decimal = new Money(0);

  for (const [productId, quantity] of order) {
    const product = snapshot.get(productId);
    if (!product) {
      throw productNotFound({ productId });
    }

    if (product.stockQuantity < quantity) {
      throw insufficientStock(productId, quantity, product.stockQuantity);
    }

    const lineTotal = new Money(product.price).times(quantity);
    totalAmount = totalAmount.plus(lineTotal);
    lines.push({
      productId,
      quantity,
      unitPrice: product.price,
      lineTotal,
      version: product.version,
    });
  }

  return { lines, totalAmount };
};
