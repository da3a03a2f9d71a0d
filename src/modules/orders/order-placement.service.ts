import { ConcurrencyMode } from '../../constants/order.constants';
import { getLogger } from '../../utils/logging';
import { computeBackoff, resolveFailure } from './conflict-resolver';
import { commitOrder } from './order-committer';
import { OrderLineRequest, normalizeOrder } from './order-normalizer';
import { priceOrder } from './order-pricing';
import { loadProductSnapshot } from './order-snapshot';
import { OrderStore } from './order.store';
import { CommitFailure, OrderPlacementError, orderCancelled } from './orders.errors';

const logger = getLogger('order-placement');

export type PlacementState =
  | 'Normalizing'
  | 'Loaded'
  | 'Validated'
  | 'Committing'
  | 'Committed'
  | 'Aborted'
  | 'Failed';

export interface PlacementTransition {
  attempt: number;
  from: PlacementState | null;
  to: PlacementState;
  cause?: string;
}

export interface OrderPlacementOptions {
  concurrencyMode: ConcurrencyMode;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  onTransition?: (transition: PlacementTransition) => void;
}

export interface PlaceOrderOptions {
  signal?: AbortSignal;
}

export interface PlacedOrderLine {
  productId: number;
  quantity: number;
  unitPrice: string;
  lineTotal: string;
}

export interface PlacedOrder {
  orderId: number;
  orderNumber: string;
  userId: string;
  totalAmount: string;
  createdAt: Date;
  lines: PlacedOrderLine[];
  attempts: number;
}

const sleep = (ms: number): Promise<void> =>
  ms > 0 ? new Promise(resolve => setTimeout(resolve, ms)) : Promise.resolve();

/**
 * Tracks one attempt through Normalizing -> Loaded -> Validated -> Committing
 * and reports every transition.
 */
class AttemptTracker {
  constructor(
    readonly attempt: number,
    public state: PlacementState | null,
    private readonly listener?: (transition: PlacementTransition) => void
  ) {}

  moveTo(to: PlacementState, cause?: string): void {
    const transition: PlacementTransition = { attempt: this.attempt, from: this.state, to, cause };
    this.state = to;
    logger.debug(`Order placement ${transition.from ?? 'start'} -> ${to}`, { attempt: this.attempt, cause });
    this.listener?.(transition);
  }
}

export class OrderPlacementService {
  constructor(
    private readonly store: OrderStore,
    private readonly options: OrderPlacementOptions
  ) {}

  /**
   * Place an order for `userId`. Resolves with the committed order or rejects
   * with an OrderPlacementError carrying a terminal code. Errors that are not
   * part of the placement taxonomy are rethrown unchanged.
   */
  async placeOrder(
    userId: string,
    lines: readonly OrderLineRequest[] | null | undefined,
    { signal }: PlaceOrderOptions = {}
  ): Promise<PlacedOrder> {
    const { maxAttempts, backoffBaseMs, backoffMaxMs } = this.options;
    let previousState: PlacementState | null = null;

    for (let attempt = 1; ; attempt++) {
      const tracker: AttemptTracker = new AttemptTracker(attempt, previousState, this.options.onTransition);
      try {
        return await this.runAttempt(tracker, userId, lines, signal);
      } catch (error) {
        const resolution = resolveFailure(error, attempt, maxAttempts);
        const failedIn = tracker.state;

        if (failedIn === 'Committing') {
          tracker.moveTo('Aborted', resolution.cause);
        }

        if (resolution.action === 'fail') {
          tracker.moveTo('Failed', resolution.cause);
          this.logFailure(userId, attempt, failedIn, error, resolution.error);
          throw resolution.error;
        }

        const delay = computeBackoff(attempt, backoffBaseMs, backoffMaxMs);
        logger.warn('Order placement attempt aborted, retrying', {
          userId,
          attempt,
          maxAttempts,
          cause: resolution.cause,
          delayMs: delay,
        });
        await sleep(delay);
        previousState = tracker.state;

        if (signal?.aborted) {
          tracker.moveTo('Failed', 'cancelled');
          throw orderCancelled();
        }
      }
    }
  }

  private async runAttempt(
    tracker: AttemptTracker,
    userId: string,
    lines: readonly OrderLineRequest[] | null | undefined,
    signal?: AbortSignal
  ): Promise<PlacedOrder> {
    tracker.moveTo('Normalizing');
    const normalized = normalizeOrder(lines);

    const snapshot = await loadProductSnapshot(this.store, normalized);
    tracker.moveTo('Loaded');

    const plan = priceOrder(normalized, snapshot);
    tracker.moveTo('Validated');

    tracker.moveTo('Committing');
    const { order } = await commitOrder(this.store, {
      userId,
      plan,
      concurrencyMode: this.options.concurrencyMode,
      signal,
    });
    tracker.moveTo('Committed');

    logger.info('Order placed', {
      orderId: order.id,
      orderNumber: order.orderNumber,
      userId,
      totalAmount: order.totalAmount,
      products: plan.lines.length,
      attempt: tracker.attempt,
    });

    return {
      orderId: order.id,
      orderNumber: order.orderNumber,
      userId: order.userId,
      totalAmount: order.totalAmount,
      createdAt: order.createdAt,
      lines: plan.lines.map(line => ({
        productId: line.productId,
        quantity: line.quantity,
        unitPrice: line.unitPrice.toFixed(2),
        lineTotal: line.lineTotal.toFixed(2),
      })),
      attempts: tracker.attempt,
    };
  }

  private logFailure(
    userId: string,
    attempt: number,
    failedIn: PlacementState | null,
    original: unknown,
    surfaced: unknown
  ): void {
    if (!(surfaced instanceof OrderPlacementError)) {
      logger.error('Order placement failed unexpectedly', {
        userId,
        attempt,
        failedIn,
        error: original instanceof Error ? original.message : String(original),
        stack: original instanceof Error ? original.stack : undefined,
      });
      return;
    }

    // Commit-time races share the caller-visible shape of validation failures
    logger.warn(`Order placement failed: ${surfaced.code}`, {
      userId,
      attempt,
      failedIn,
      commitFailure: original instanceof CommitFailure ? original.kind : undefined,
      code: surfaced.code,
      details: surfaced.details,
    });
  }
}
