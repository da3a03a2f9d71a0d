import { ConcurrencyMode } from '../src/constants/order.constants';
import {
  OrderPlacementOptions,
  OrderPlacementService,
  PlacementTransition,
} from '../src/modules/orders/order-placement.service';
import { CommitFailure, OrderPlacementError } from '../src/modules/orders/orders.errors';
import { InMemoryOrderStore } from './support/in-memory-order-store';
import { catalog, LAST_ONE, WIDGET_A, WIDGET_B } from './support/fixtures';

const MODES: ConcurrencyMode[] = ['serializable', 'optimistic'];

const setup = (concurrencyMode: ConcurrencyMode, overrides: Partial<OrderPlacementOptions> = {}) => {
  const store = new InMemoryOrderStore(catalog());
  const transitions: PlacementTransition[] = [];
  const service = new OrderPlacementService(store, {
    concurrencyMode,
    maxAttempts: 3,
    backoffBaseMs: 0,
    backoffMaxMs: 0,
    onTransition: transition => transitions.push(transition),
    ...overrides,
  });
  return { store, service, transitions };
};

const serializationConflict = () => new CommitFailure('serialization_conflict', 'could not serialize access');

describe.each(MODES)('OrderPlacementService (%s)', mode => {
  test('places a merged order and decrements stock', async () => {
    const { store, service } = setup(mode);

    const placed = await service.placeOrder('user-1', [
      { productId: WIDGET_A, quantity: 2 },
      { productId: WIDGET_A, quantity: 1 },
      { productId: WIDGET_B, quantity: 2 },
    ]);

    expect(placed).toMatchObject({
      orderId: 1,
      userId: 'user-1',
      totalAmount: '37.00',
      attempts: 1,
      lines: [
        { productId: WIDGET_A, quantity: 3, unitPrice: '10.00', lineTotal: '30.00' },
        { productId: WIDGET_B, quantity: 2, unitPrice: '3.50', lineTotal: '7.00' },
      ],
    });
    expect(store.product(WIDGET_A)).toMatchObject({ stockQuantity: 2, version: 2 });
    expect(store.product(WIDGET_B)).toMatchObject({ stockQuantity: 0, version: 2 });
    expect(store.orders).toHaveLength(1);
    expect(store.orderItems).toEqual([
      { orderId: 1, productId: WIDGET_A, quantity: 3, unitPrice: '10.00', lineTotal: '30.00' },
      { orderId: 1, productId: WIDGET_B, quantity: 2, unitPrice: '3.50', lineTotal: '7.00' },
    ]);
    expect(store.stockHistory).toEqual([
      { productId: WIDGET_A, quantity: 3, previousStock: 5, newStock: 2, reason: `Order #${placed.orderNumber}`, createdBy: 'user-1' },
      { productId: WIDGET_B, quantity: 2, previousStock: 2, newStock: 0, reason: `Order #${placed.orderNumber}`, createdBy: 'user-1' },
    ]);
  });

  test('reads the snapshot exactly once per attempt', async () => {
    const { store, service } = setup(mode);

    await service.placeOrder('user-1', [
      { productId: WIDGET_A, quantity: 1 },
      { productId: WIDGET_B, quantity: 1 },
      { productId: LAST_ONE, quantity: 1 },
    ]);

    expect(store.productReads).toBe(1);
  });

  test('rejects invalid quantities without touching the store', async () => {
    const { store, service } = setup(mode);

    await expect(service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 0 }])).rejects.toMatchObject({
      code: 'INVALID_QUANTITY',
    });
    await expect(service.placeOrder('user-1', [])).rejects.toMatchObject({ code: 'EMPTY_ORDER' });
    expect(store.productReads).toBe(0);
    expect(store.isolationLevels).toEqual([]);
  });

  test('rejects shortages before opening a transaction', async () => {
    const { store, service } = setup(mode);

    await expect(service.placeOrder('user-1', [{ productId: WIDGET_B, quantity: 3 }])).rejects.toMatchObject({
      code: 'INSUFFICIENT_STOCK',
      details: { productId: WIDGET_B, requested: 3, available: 2 },
    });
    expect(store.isolationLevels).toEqual([]);
    expect(store.product(WIDGET_B)).toMatchObject({ stockQuantity: 2, version: 1 });
  });

  test('rejects unknown products', async () => {
    const { store, service } = setup(mode);

    await expect(
      service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 1 }, { productId: 99, quantity: 1 }])
    ).rejects.toMatchObject({ code: 'PRODUCT_NOT_FOUND', status: 404, details: { productId: 99 } });
    expect(store.orders).toEqual([]);
  });

  test('sells the last unit exactly once under concurrent orders', async () => {
    const { store, service } = setup(mode);

    const results = await Promise.allSettled([
      service.placeOrder('user-1', [{ productId: LAST_ONE, quantity: 1 }]),
      service.placeOrder('user-2', [{ productId: LAST_ONE, quantity: 1 }]),
    ]);

    const fulfilled = results.filter(result => result.status === 'fulfilled');
    const rejected = results.flatMap(result => (result.status === 'rejected' ? [result.reason] : []));
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toBeInstanceOf(OrderPlacementError);
    expect(rejected[0]).toMatchObject({
      code: 'INSUFFICIENT_STOCK',
      details: { productId: LAST_ONE, requested: 1, available: 0 },
    });
    expect(store.product(LAST_ONE)).toMatchObject({ stockQuantity: 0, version: 2 });
    expect(store.orders).toHaveLength(1);
    expect(store.stockHistory).toHaveLength(1);
  });

  test('retries the loser of a race when stock remains', async () => {
    const { store, service } = setup(mode);

    const placed = await Promise.all([
      service.placeOrder('user-1', [{ productId: WIDGET_B, quantity: 1 }]),
      service.placeOrder('user-2', [{ productId: WIDGET_B, quantity: 1 }]),
    ]);

    expect(placed.map(order => order.attempts).sort()).toEqual([1, 2]);
    expect(store.product(WIDGET_B)).toMatchObject({ stockQuantity: 0, version: 3 });
    expect(store.orders).toHaveLength(2);
  });

  test('rebuilds the plan when a product changed after the snapshot', async () => {
    const { store, service } = setup(mode, {
      onTransition: transition => {
        // Another writer restocks the product between snapshot and commit
        if (transition.attempt === 1 && transition.to === 'Loaded') {
          store.products.set(WIDGET_A, { id: WIDGET_A, name: 'Widget A', price: '12.00', stockQuantity: 8, version: 2 });
        }
      },
    });

    const placed = await service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 1 }]);

    expect(placed.attempts).toBe(2);
    expect(placed.totalAmount).toBe('12.00');
    expect(store.product(WIDGET_A)).toMatchObject({ stockQuantity: 7, version: 3 });
    expect(store.productReads).toBe(2);
    expect(store.rollbacks).toBe(1);
  });

  test.each(['insertOrderItems', 'decrementStock', 'insertStockHistory'] as const)(
    'leaves no partial writes behind when %s fails',
    async step => {
      const { store, service } = setup(mode);
      const failure = new Error('disk full');
      store.failOn(step, failure);

      await expect(
        service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 1 }, { productId: WIDGET_B, quantity: 1 }])
      ).rejects.toBe(failure);
      expect(store.orders).toEqual([]);
      expect(store.orderItems).toEqual([]);
      expect(store.stockHistory).toEqual([]);
      expect(store.product(WIDGET_A)).toMatchObject({ stockQuantity: 5, version: 1 });
      expect(store.product(WIDGET_B)).toMatchObject({ stockQuantity: 2, version: 1 });
      expect(store.rollbacks).toBe(1);
    }
  );
});

describe('OrderPlacementService retries', () => {
  test('succeeds on the second attempt after a serialization conflict', async () => {
    const { store, service, transitions } = setup('serializable');
    store.failOn('decrementStock', serializationConflict());

    const placed = await service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 1 }]);

    expect(placed.attempts).toBe(2);
    expect(store.productReads).toBe(2);
    expect(store.orders).toHaveLength(1);
    expect(store.product(WIDGET_A)).toMatchObject({ stockQuantity: 4 });
    expect(transitions).toEqual([
      { attempt: 1, from: null, to: 'Normalizing' },
      { attempt: 1, from: 'Normalizing', to: 'Loaded' },
      { attempt: 1, from: 'Loaded', to: 'Validated' },
      { attempt: 1, from: 'Validated', to: 'Committing' },
      { attempt: 1, from: 'Committing', to: 'Aborted', cause: 'serialization_conflict' },
      { attempt: 2, from: 'Aborted', to: 'Normalizing' },
      { attempt: 2, from: 'Normalizing', to: 'Loaded' },
      { attempt: 2, from: 'Loaded', to: 'Validated' },
      { attempt: 2, from: 'Validated', to: 'Committing' },
      { attempt: 2, from: 'Committing', to: 'Committed' },
    ]);
  });

  test('gives up with CONFLICT after the last attempt', async () => {
    const { store, service, transitions } = setup('optimistic');
    store.failOn('decrementStock', serializationConflict(), 3);

    await expect(service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 1 }])).rejects.toMatchObject({
      code: 'CONFLICT',
      status: 409,
      details: { attempts: 3, lastCause: 'serialization_conflict' },
    });
    expect(store.productReads).toBe(3);
    expect(store.orders).toEqual([]);
    expect(store.product(WIDGET_A)).toMatchObject({ stockQuantity: 5, version: 1 });
    expect(transitions.slice(-2)).toEqual([
      { attempt: 3, from: 'Committing', to: 'Aborted', cause: 'serialization_conflict' },
      { attempt: 3, from: 'Aborted', to: 'Failed', cause: 'serialization_conflict' },
    ]);
  });

  test('does not retry when a single attempt is allowed', async () => {
    const { store, service } = setup('serializable', { maxAttempts: 1 });
    store.failOn('lockProducts', serializationConflict());

    await expect(service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 1 }])).rejects.toMatchObject({
      code: 'CONFLICT',
      details: { attempts: 1 },
    });
    expect(store.productReads).toBe(1);
  });

  test('retries an outage that happened before the transaction started', async () => {
    const { store, service } = setup('serializable');
    store.failOn('begin', new CommitFailure('store_unavailable', 'connection refused'));

    const placed = await service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 1 }]);

    expect(placed.attempts).toBe(2);
  });

  test('reports an unknown outcome when COMMIT itself failed', async () => {
    const { store, service } = setup('serializable');
    store.failOn('commit', new CommitFailure('store_unavailable', 'connection lost', { commitOutcomeUnknown: true }));

    await expect(service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 1 }])).rejects.toMatchObject({
      code: 'UNAVAILABLE',
      status: 503,
      details: { attempts: 1, outcomeUnknown: true },
    });
    expect(store.isolationLevels).toHaveLength(1);
  });

  test('surfaces UNAVAILABLE when every snapshot read fails', async () => {
    const { store, service } = setup('optimistic');
    store.failOn('findProductsByIds', Object.assign(new Error('read ECONNRESET'), { code: 'ECONNRESET' }), 3);

    await expect(service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 1 }])).rejects.toMatchObject({
      code: 'UNAVAILABLE',
      details: { attempts: 3, outcomeUnknown: false },
    });
    expect(store.productReads).toBe(3);
    expect(store.isolationLevels).toEqual([]);
  });

  test('does not retry a snapshot read that failed for good', async () => {
    const { store, service } = setup('serializable');
    const outOfRange = Object.assign(new Error('value "2147483648" is out of range for type integer'), { code: '22003' });
    store.failOn('findProductsByIds', outOfRange, 3);

    await expect(service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 1 }])).rejects.toBe(outOfRange);
    expect(store.productReads).toBe(1);
    expect(store.isolationLevels).toEqual([]);
  });

  test('reports an id beyond any stored product as not found', async () => {
    const { service } = setup('serializable');

    await expect(service.placeOrder('user-1', [{ productId: 2147483648, quantity: 1 }])).rejects.toMatchObject({
      code: 'PRODUCT_NOT_FOUND',
      status: 404,
      details: { productId: 2147483648 },
    });
  });
});

describe('OrderPlacementService cancellation', () => {
  test('does not commit once the caller cancelled', async () => {
    const { store, service, transitions } = setup('serializable');
    const controller = new AbortController();
    controller.abort();

    await expect(
      service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 1 }], { signal: controller.signal })
    ).rejects.toMatchObject({ code: 'CANCELLED', status: 499 });
    expect(store.isolationLevels).toEqual([]);
    expect(store.orders).toEqual([]);
    expect(transitions.slice(-2)).toEqual([
      { attempt: 1, from: 'Committing', to: 'Aborted', cause: 'CANCELLED' },
      { attempt: 1, from: 'Aborted', to: 'Failed', cause: 'CANCELLED' },
    ]);
  });

  test('stops retrying when cancelled during backoff', async () => {
    const controller = new AbortController();
    const { store, service, transitions } = setup('optimistic', {
      onTransition: transition => {
        transitions.push(transition);
        if (transition.to === 'Aborted') {
          controller.abort();
        }
      },
    });
    store.failOn('decrementStock', serializationConflict());

    await expect(
      service.placeOrder('user-1', [{ productId: WIDGET_A, quantity: 1 }], { signal: controller.signal })
    ).rejects.toMatchObject({ code: 'CANCELLED' });
    expect(store.productReads).toBe(1);
    expect(store.orders).toEqual([]);
    expect(transitions[transitions.length - 1]).toEqual({ attempt: 1, from: 'Aborted', to: 'Failed', cause: 'cancelled' });
  });
});
