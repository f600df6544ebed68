import express, { RequestHandler } from 'express';
import type { OrderController } from '../controllers/orderController';
import { authorize } from '../middleware/auth';
import { validate } from '../middleware/validation';
import {
  validateListAllOrders,
  validateListOrders,
  validateOrderIdParam,
  validateOrderNumberParam,
} from '../validators/orderValidators';

export const createOrdersRouter = (controller: OrderController, authenticate: RequestHandler) => {
  const router = express.Router();

  router.use(authenticate);

  // @route   GET /api/orders
  // @desc    Paginated order history of the caller (admins may pass userId)
  // @access  Private
  router.get('/', validate(validateListOrders), controller.listOrders);

  // @route   GET /api/orders/admin/all
  // @desc    All orders, optionally filtered by status
  // @access  Private (Admin)
  router.get('/admin/all', authorize('admin'), validate(validateListAllOrders), controller.listAllOrders);

  // @route   GET /api/orders/order-number/:orderNumber
  // @desc    Look an order up by its human-readable number
  // @access  Private (owner or admin)
  router.get('/order-number/:orderNumber', validate(validateOrderNumberParam), controller.getOrderByNumber);

  // @route   GET /api/orders/:orderId/status
  // @access  Private (owner or admin)
  router.get('/:orderId/status', validate(validateOrderIdParam), controller.getOrderStatus);

  // @route   GET /api/orders/:orderId
  // @access  Private (owner or admin)
  router.get('/:orderId', validate(validateOrderIdParam), controller.getOrderById);

  // @route   POST /api/orders/:orderId/cancel
  // @access  Private (owner or admin)
  router.post('/:orderId/cancel', validate(validateOrderIdParam), controller.cancelOrder);

  // @route   POST /api/orders/:orderId/refund
  // @access  Private (Admin)
  router.post('/:orderId/refund', authorize('admin'), validate(validateOrderIdParam), controller.refundOrder);

  return router;
};
