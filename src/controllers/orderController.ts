import { NextFunction, Request, Response } from 'express';
import { requireUser } from '../middleware/auth';
import type { CheckoutService } from '../services/checkoutService';
import { ORDER_STATUSES } from '../types/order';
import type { OrderStatus } from '../types/order';

const asQueryString = (value: unknown): string | undefined =>
  typeof value === 'string' && value.length > 0 ? value : undefined;

const asOrderStatus = (value: unknown): OrderStatus | undefined =>
  ORDER_STATUSES.find((status) => status === value);

export const createOrderController = (checkoutService: CheckoutService) => {
  const listOrders = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = requireUser(req);
      const result = await checkoutService.listOrders(
        user,
        { page: Number(req.query.page), limit: Number(req.query.limit) },
        asQueryString(req.query.userId)
      );
      res.json({ data: result.orders, pagination: result.pagination });
    } catch (error) {
      next(error);
    }
  };

  const listAllOrders = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const result = await checkoutService.listAllOrders(
        requireUser(req),
        { page: Number(req.query.page), limit: Number(req.query.limit) },
        asOrderStatus(req.query.status)
      );
      res.json({ data: result.orders, pagination: result.pagination });
    } catch (error) {
      next(error);
    }
  };

  const getOrderById = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const order = await checkoutService.getOrderForUser(req.params.orderId, requireUser(req));
      res.json({ data: order });
    } catch (error) {
      next(error);
    }
  };

  const getOrderByNumber = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const order = await checkoutService.getOrderByNumber(req.params.orderNumber, requireUser(req));
      res.json({ data: order });
    } catch (error) {
      next(error);
    }
  };

  const getOrderStatus = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const status = await checkoutService.getOrderStatus(req.params.orderId, requireUser(req));
      res.json({ data: status });
    } catch (error) {
      next(error);
    }
  };

  const cancelOrder = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const order = await checkoutService.cancelOrder(req.params.orderId, requireUser(req));
      res.json({ data: order });
    } catch (error) {
      next(error);
    }
  };

  const refundOrder = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const order = await checkoutService.refundOrder(req.params.orderId, requireUser(req));
      res.json({ data: order });
    } catch (error) {
      next(error);
    }
  };

  return {
    listOrders,
    listAllOrders,
    getOrderById,
    getOrderByNumber,
    getOrderStatus,
    cancelOrder,
    refundOrder,
  };
};

export type OrderController = ReturnType<typeof createOrderController>;
