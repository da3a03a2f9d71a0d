import express from 'express';
import ordersRoutes from '../modules/orders/orders.routes';

const router = express.Router();

router.use('/orders', ordersRoutes);

export default router;
