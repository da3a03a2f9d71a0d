import { OrderLineRequest } from './order-normalizer';
import { OrderStore, ProductReference } from './order.store';
import { ambiguousProductName, productNotFound, storeUnavailable } from './orders.errors';
import { isStoreOutage } from './store-errors';

export type OrderItemReference =
  | { productId: number; quantity: number }
  | { productName: string; quantity: number };

/**
 * Turn name-based lines into id-based lines with a single lookup.
 * Id-based lines pass through; no query runs when no line uses a name.
 */
export const resolveProductReferences = async (
  store: Pick<OrderStore, 'findProductsByNames'>,
  items: readonly OrderItemReference[]
): Promise<OrderLineRequest[]> => {
  const names = new Set<string>();
  for (const item of items) {
    if ('productName' in item) {
      names.add(item.productName);
    }
  }

  if (names.size === 0) {
    return items.flatMap(item => ('productId' in item ? [{ productId: item.productId, quantity: item.quantity }] : []));
  }

  let found: ProductReference[];
  try {
    found = await store.findProductsByNames(Array.from(names));
  } catch (error) {
    // Nothing was written yet, so the outcome is known
    if (isStoreOutage(error)) {
      throw storeUnavailable(1, false, error);
    }
    throw error;
  }

  const matches = new Map<string, number[]>();
  for (const product of found) {
    matches.set(product.name, [...(matches.get(product.name) ?? []), product.id]);
  }

  return items.map(item => {
    if ('productId' in item) {
      return { productId: item.productId, quantity: item.quantity };
    }

    const candidates = matches.get(item.productName) ?? [];
    if (candidates.length === 0) {
      throw productNotFound({ productName: item.productName });
    }
    if (candidates.length > 1) {
      throw ambiguousProductName(item.productName, candidates);
    }
    return { productId: candidates[0], quantity: item.quantity };
  });
};
