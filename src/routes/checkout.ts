import express, { RequestHandler } from 'express';
import type { CheckoutController } from '../controllers/checkoutController';
import { validate, validateBody } from '../middleware/validation';
import { checkoutSchema } from '../validators/checkoutValidators';
import { validateOrderIdParam } from '../validators/orderValidators';

// The webhook route is mounted separately in app.ts, ahead of the JSON body parser.
export const createCheckoutRouter = (controller: CheckoutController, authenticate: RequestHandler) => {
  const router = express.Router();

  router.use(authenticate);

  // @route   POST /api/checkout
  // @desc    Create an order from the cart and open its payment intent
  // @access  Private
  router.post('/', validateBody(checkoutSchema), controller.initiateCheckout);

  // @route   POST /api/checkout/orders/:orderId/resume
  // @desc    Resume an abandoned checkout
  // @access  Private (owner or admin)
  router.post('/orders/:orderId/resume', validate(validateOrderIdParam), controller.resumeCheckout);

  return router;
};
