import { NextFunction, Request, Response } from 'express';
import { requireUser } from '../middleware/auth';
import type { CheckoutService } from '../services/checkoutService';
import type { CheckoutPayload } from '../validators/checkoutValidators';

export const createCheckoutController = (checkoutService: CheckoutService) => {
  /**
   * POST /api/checkout
   * Creates an order from the caller's cart and returns the client secret of its payment intent.
   */
  const initiateCheckout = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const user = requireUser(req);
      const payload: CheckoutPayload = req.body;
      const result = await checkoutService.initiateCheckout(user.userId, payload);
      res.status(201).json({ data: result });
    } catch (error) {
      next(error);
    }
  };

  // POST /api/checkout/orders/:orderId/resume
  const resumeCheckout = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const result = await checkoutService.resumeCheckout(req.params.orderId, requireUser(req));
      res.json({ data: result });
    } catch (error) {
      next(error);
    }
  };

  return { initiateCheckout, resumeCheckout };
};

export type CheckoutController = ReturnType<typeof createCheckoutController>;
