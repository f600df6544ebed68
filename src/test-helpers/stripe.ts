import Stripe from 'stripe';
import { STRIPE_API_VERSION } from '../stripe';

export const TEST_WEBHOOK_SECRET = 'whsec_test_secret';

export const createTestStripe = (): Stripe =>
  new Stripe('sk_test_placeholder', { apiVersion: STRIPE_API_VERSION, maxNetworkRetries: 0 });

export const fakePaymentIntent = (
  overrides: Partial<Stripe.PaymentIntent> = {}
): Stripe.Response<Stripe.PaymentIntent> =>
  ({
    id: 'pi_test_1',
    object: 'payment_intent',
    client_secret: 'pi_test_1_secret_abc',
    status: 'requires_payment_method',
    ...overrides,
  }) as unknown as Stripe.Response<Stripe.PaymentIntent>;

interface PaymentIntentEventInput {
  eventId: string;
  type: string;
  paymentIntentId: string;
  status?: string;
  lastPaymentError?: string;
}

export const paymentIntentEvent = ({
  eventId,
  type,
  paymentIntentId,
  status,
  lastPaymentError,
}: PaymentIntentEventInput) => ({
  id: eventId,
  object: 'event',
  type,
  data: {
    object: {
      id: paymentIntentId,
      object: 'payment_intent',
      status: status ?? 'succeeded',
      last_payment_error: lastPaymentError ? { type: 'card_error', message: lastPaymentError } : null,
    },
  },
});

export const chargeRefundedEvent = (eventId: string, paymentIntentId: string) => ({
  id: eventId,
  object: 'event',
  type: 'charge.refunded',
  data: {
    object: {
      id: 'ch_test_1',
      object: 'charge',
      status: 'succeeded',
      payment_intent: paymentIntentId,
    },
  },
});

/** Serialises the event and signs it the way Stripe signs webhook deliveries. */
export const signedDelivery = (
  stripe: Stripe,
  event: object,
  secret: string = TEST_WEBHOOK_SECRET
): { payload: Buffer; signature: string } => {
  const payload = JSON.stringify(event);
  const signature = stripe.webhooks.generateTestHeaderString({ payload, secret });
  return { payload: Buffer.from(payload), signature };
};

export const fakeRefund = (id = 're_test_1'): Stripe.Response<Stripe.Refund> =>
  ({ id, object: 'refund', status: 'succeeded' }) as unknown as Stripe.Response<Stripe.Refund>;
