import { Request, Response } from 'express';
import type { WebhookReconciler } from '../services/webhookReconciler';
import { AuthenticationError } from '../utils/errors';

/**
 * POST /api/checkout/webhook. Must be mounted with `bodyParser.raw` so the
 * signature is checked against the exact bytes Stripe sent.
 */
export const createWebhookHandler = (reconciler: WebhookReconciler) => {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const ack = await reconciler.handleWebhook(req.body, req.headers['stripe-signature']);
      res.json(ack);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        res.status(error.status).json({ error: error.message });
        return;
      }
      console.error('[PaymentWebhook] Error handling Stripe webhook', error);
      res.status(500).json({ error: 'Webhook handling error' });
    }
  };
};
