import express from 'express';
import { pool, orderConfig } from '../../connections';
import { createOrdersController } from './orders.controller';
import { OrderPlacementService } from './order-placement.service';
import { PgOrderStore } from './order.repository';

const store = new PgOrderStore(pool);

export const orderPlacementService = new OrderPlacementService(store, orderConfig);

const ordersController = createOrdersController({
  placement: orderPlacementService,
  products: store,
  orders: store,
});

const router = express.Router();

router.post('/', ordersController.createOrder);
router.get('/', ordersController.getOrders);
router.get('/:id', ordersController.getOrderById);

export default router;
