import Stripe from 'stripe';
import type { OrderRecord } from '../types/order';
import { GatewayError } from '../utils/errors';
import { notifyOps } from '../utils/alerting';
import type { OrderStore } from './orderStore';

export interface PaymentIntentHandle {
  clientSecret: string;
  paymentIntentId: string;
}

const describeStripeError = (error: unknown): Record<string, unknown> => {
  if (error instanceof Stripe.errors.StripeError) {
    return { type: error.type, code: error.code, statusCode: error.statusCode, message: error.message };
  }
  return { message: error instanceof Error ? error.message : String(error) };
};

/**
 * Adapter between orders and Stripe PaymentIntents. No call is retried here;
 * a timeout or provider failure surfaces as GatewayError.
 */
export class PaymentGateway {
  constructor(
    private readonly stripe: Stripe,
    private readonly orderStore: OrderStore,
    private readonly opsWebhookUrl?: string
  ) {}

  /**
   * Opens a PaymentIntent for the order and moves it `pending → payment_processing`.
   * If the order cannot take the intent, the intent is cancelled again before
   * the error propagates.
   */
  async createIntent(order: OrderRecord): Promise<PaymentIntentHandle> {
    let intent: Stripe.PaymentIntent;
    try {
      intent = await this.stripe.paymentIntents.create(
        {
          amount: order.amountInMinor,
          currency: order.currency,
          automatic_payment_methods: { enabled: true },
          metadata: {
            orderId: order.id,
            orderNumber: order.orderNumber,
            userId: order.userId,
          },
        },
        // Same key on a user retry returns the intent Stripe may already have created.
        { idempotencyKey: `order-${order.id}-intent` }
      );
    } catch (error) {
      console.error('[PaymentGateway] Failed to create payment intent', {
        orderId: order.id,
        ...describeStripeError(error),
      });
      throw new GatewayError('Payment provider is unavailable, please retry', {
        orderId: order.id,
      });
    }

    if (!intent.client_secret) {
      await this.rollbackIntent(intent.id, order.id);
      throw new GatewayError('Payment provider returned no client secret', { orderId: order.id });
    }

    try {
      await this.orderStore.attachPaymentIntent(order.id, intent.id);
    } catch (error) {
      await this.rollbackIntent(intent.id, order.id);
      throw error;
    }

    return { clientSecret: intent.client_secret, paymentIntentId: intent.id };
  }

  async getClientSecret(paymentIntentId: string): Promise<string> {
    let intent: Stripe.PaymentIntent;
    try {
      intent = await this.stripe.paymentIntents.retrieve(paymentIntentId);
    } catch (error) {
      console.error('[PaymentGateway] Failed to retrieve payment intent', {
        paymentIntentId,
        ...describeStripeError(error),
      });
      throw new GatewayError('Payment provider is unavailable, please retry', { paymentIntentId });
    }

    if (!intent.client_secret) {
      throw new GatewayError('Payment provider returned no client secret', { paymentIntentId });
    }
    return intent.client_secret;
  }

  async cancelIntent(paymentIntentId: string): Promise<void> {
    try {
      await this.stripe.paymentIntents.cancel(paymentIntentId);
    } catch (error) {
      console.error('[PaymentGateway] Failed to cancel payment intent', {
        paymentIntentId,
        ...describeStripeError(error),
      });
      throw new GatewayError('Could not cancel the payment with the provider', { paymentIntentId });
    }
  }

  async refundPayment(paymentIntentId: string): Promise<string> {
    try {
      const refund = await this.stripe.refunds.create({
        payment_intent: paymentIntentId,
        reason: 'requested_by_customer',
      });
      return refund.id;
    } catch (error) {
      console.error('[PaymentGateway] Failed to refund payment', {
        paymentIntentId,
        ...describeStripeError(error),
      });
      throw new GatewayError('Could not refund the payment with the provider', { paymentIntentId });
    }
  }

  private async rollbackIntent(paymentIntentId: string, orderId: string): Promise<void> {
    try {
      await this.stripe.paymentIntents.cancel(paymentIntentId);
      console.warn('[PaymentGateway] Cancelled orphaned payment intent', { orderId, paymentIntentId });
    } catch (error) {
      console.error('[PaymentGateway] Failed to cancel orphaned payment intent', {
        orderId,
        paymentIntentId,
        ...describeStripeError(error),
      });
      await notifyOps(
        'Orphaned payment intent could not be cancelled',
        { orderId, paymentIntentId, ...describeStripeError(error) },
        this.opsWebhookUrl
      );
    }
  }
}
