import { NextFunction, Request, Response } from 'express';
import { ResponseHandler } from '../../utils/response';
import { OrderPlacementService, PlacedOrder } from './order-placement.service';
import { OrderReader } from './order.repository';
import { OrderStore } from './order.store';
import { OrderItemReference, resolveProductReferences } from './product-resolver';
import { CreateOrderBody, createOrderSchema, listOrdersQuerySchema, orderIdParamSchema } from './orders.validation';

export interface OrdersControllerDeps {
  placement: Pick<OrderPlacementService, 'placeOrder'>;
  products: Pick<OrderStore, 'findProductsByNames'>;
  orders: OrderReader;
}

const toReference = (item: CreateOrderBody['items'][number]): OrderItemReference =>
  'product_id' in item
    ? { productId: item.product_id, quantity: item.quantity }
    : { productName: item.product_name, quantity: item.quantity };

const toOrderResponse = (order: PlacedOrder) => ({
  id: order.orderId,
  order_number: order.orderNumber,
  user_id: order.userId,
  total_amount: order.totalAmount,
  created_at: order.createdAt,
  items: order.lines.map(line => ({
    product_id: line.productId,
    quantity: line.quantity,
    unit_price: line.unitPrice,
    line_total: line.lineTotal,
  })),
});

export const createOrdersController = ({ placement, products, orders }: OrdersControllerDeps) => {
  // Place an order
  const createOrder = async (req: Request, res: Response, next: NextFunction) => {
    // Client gone before we answered: abort anything not yet committed
    const abort = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) {
        abort.abort();
      }
    });

    try {
      const validated = createOrderSchema.parse(req.body);
      const lines = await resolveProductReferences(products, validated.items.map(toReference));
      const placed = await placement.placeOrder(validated.user_id, lines, { signal: abort.signal });

      return ResponseHandler.created(
        res,
        { order: toOrderResponse(placed) },
        'Order placed successfully',
        { attempts: placed.attempts }
      );
    } catch (error) {
      next(error);
    }
  };

  const getOrderById = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = orderIdParamSchema.parse(req.params);
      const order = await orders.findOrderById(id);

      if (!order) {
        return ResponseHandler.notFound(res, 'Order not found');
      }

      return ResponseHandler.success(res, { order }, 'Order fetched successfully');
    } catch (error) {
      next(error);
    }
  };

  // Orders of one user, newest first
  const getOrders = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { user_id } = listOrdersQuerySchema.parse(req.query);
      const result = await orders.findOrdersByUser(user_id);

      return ResponseHandler.success(res, { orders: result }, 'Orders fetched successfully');
    } catch (error) {
      next(error);
    }
  };

  return { createOrder, getOrderById, getOrders };
};
