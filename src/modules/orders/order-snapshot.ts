import { NormalizedOrder } from './order-normalizer';
import { OrderStore, ProductSnapshot } from './order.store';
import { LookupError } from './orders.errors';
import { isStoreOutage } from './store-errors';

export type ProductSnapshotMap = ReadonlyMap<number, ProductSnapshot>;

/**
 * One bulk read for every product the order references, however many there are.
 * Store outages surface as LookupError, so the caller may retry; any other
 * failure of the read is rethrown as it is.
 */
export const loadProductSnapshot = async (
  store: Pick<OrderStore, 'findProductsByIds'>,
  order: NormalizedOrder
): Promise<ProductSnapshotMap> => {
  let products: ProductSnapshot[];
  try {
    products = await store.findProductsByIds(Array.from(order.keys()));
  } catch (error) {
    if (isStoreOutage(error)) {
      throw new LookupError('Failed to load products for order', error);
    }
    throw error;
  }

  return new Map(products.map(product => [product.id, product]));
};
