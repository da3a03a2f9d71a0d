import { emptyOrder, invalidQuantity } from './orders.errors';

export interface OrderLineRequest {
  productId: number;
  quantity: number;
}

/** product id -> merged quantity, every quantity > 0, never empty */
export type NormalizedOrder = ReadonlyMap<number, number>;

/**
 * Merge duplicate lines into one demand per product.
 * Keys keep first-seen order. Pure; never touches the store.
 */
export const normalizeOrder = (lines: readonly OrderLineRequest[] | null | undefined): NormalizedOrder => {
  if (!lines || lines.length === 0) {
    throw emptyOrder();
  }

  const merged = new Map<number, number>();
  for (const { productId, quantity } of lines) {
    // A non-positive line is rejected even when the merged total would be positive
    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      throw invalidQuantity(productId, quantity);
    }

    const total = (merged.get(productId) ?? 0) + quantity;
    if (!Number.isSafeInteger(total)) {
      throw invalidQuantity(productId, total);
    }
    merged.set(productId, total);
  }

  return merged;
};
