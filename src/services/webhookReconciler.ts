import Stripe from 'stripe';
import { z } from 'zod';
import type { CartStore } from '../types/collaborators';
import type { OrderRecord, PaymentEventKind, PaymentEventRecord, WebhookOutcome } from '../types/order';
import { AuthenticationError, ConflictError } from '../utils/errors';
import { notifyOps } from '../utils/alerting';
import type { OrderStore } from './orderStore';
import { isAlreadyApplied, PAYMENT_EVENT_TRANSITIONS } from './orderTransitions';

export interface WebhookAck {
  received: true;
  outcome: WebhookOutcome;
  orderId?: string;
}

export interface NormalizedPaymentEvent {
  externalEventId: string;
  providerType: string;
  kind: PaymentEventKind | null;
  paymentIntentId?: string;
  observedStatus?: string;
  failureReason?: string;
}

export interface WebhookReconcilerOptions {
  webhookSecret: string;
  opsWebhookUrl?: string;
  now?: () => Date;
}

const EVENT_KINDS: Readonly<Record<string, PaymentEventKind>> = {
  'payment_intent.succeeded': 'payment_succeeded',
  'payment_intent.payment_failed': 'payment_failed',
  'payment_intent.canceled': 'payment_failed',
  'charge.refunded': 'payment_refunded',
};

// Delivered for every checkout but carry nothing the order lifecycle needs.
const harmlessStripeEvents = new Set<string>([
  'payment_intent.created',
  'payment_intent.processing',
  'payment_intent.requires_action',
  'charge.succeeded',
  'charge.failed',
  'charge.updated',
  'payment_method.attached',
  'customer.created',
  'customer.updated',
]);

const stripeEventSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  data: z.object({
    object: z
      .object({
        id: z.string().optional(),
        object: z.string().optional(),
        status: z.string().nullable().optional(),
        payment_intent: z
          .union([z.string(), z.object({ id: z.string() })])
          .nullable()
          .optional(),
        last_payment_error: z
          .object({ message: z.string().optional() })
          .passthrough()
          .nullable()
          .optional(),
      })
      .passthrough(),
  }),
});

/**
 * Maps a verified Stripe event onto the payment events the order lifecycle
 * understands. Unknown types come back with `kind: null`.
 */
export const normalizeStripeEvent = (event: unknown): NormalizedPaymentEvent | null => {
  const parsed = stripeEventSchema.safeParse(event);
  if (!parsed.success) {
    return null;
  }

  const { id, type, data } = parsed.data;
  const object = data.object;
  const linkedIntent = object.payment_intent;
  const paymentIntentId =
    object.object === 'payment_intent' || type.startsWith('payment_intent.')
      ? object.id
      : typeof linkedIntent === 'string'
        ? linkedIntent
        : linkedIntent?.id;

  const kind = EVENT_KINDS[type] ?? null;
  return {
    externalEventId: id,
    providerType: type,
    kind,
    paymentIntentId,
    observedStatus: object.status ?? undefined,
    failureReason: kind === 'payment_failed' ? object.last_payment_error?.message : undefined,
  };
};

/**
 * Applies Stripe webhook deliveries to the order store. Deliveries are
 * at-least-once, so each one is verified, de-duplicated by event id and
 * applied with a compare-and-swap; everything except a bad signature is
 * acknowledged so the provider stops redelivering.
 */
export class WebhookReconciler {
  private readonly now: () => Date;

  constructor(
    private readonly stripe: Stripe,
    private readonly orderStore: OrderStore,
    private readonly cartStore: CartStore,
    private readonly options: WebhookReconcilerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async handleWebhook(rawPayload: unknown, signatureHeader: string | string[] | undefined): Promise<WebhookAck> {
    const verified = this.verify(rawPayload, signatureHeader);

    const event = normalizeStripeEvent(verified);
    if (!event) {
      console.warn('[PaymentWebhook] Verified payload is not a recognisable event');
      await this.alert('Payment webhook payload could not be interpreted', {});
      return { received: true, outcome: 'ignored' };
    }

    if (await this.orderStore.hasProcessedEvent(event.externalEventId)) {
      console.info('[PaymentWebhook] Duplicate event skipped', {
        eventId: event.externalEventId,
        eventType: event.providerType,
      });
      return { received: true, outcome: 'duplicate' };
    }

    if (!event.kind) {
      if (harmlessStripeEvents.has(event.providerType)) {
        console.debug(`[PaymentWebhook] Stripe event ignored: ${event.providerType}`);
      } else {
        console.log(`[PaymentWebhook] Unhandled Stripe event type: ${event.providerType}`);
      }
      return this.finish(event, 'ignored');
    }

    if (!event.paymentIntentId) {
      console.warn('[PaymentWebhook] Event carries no payment intent', {
        eventId: event.externalEventId,
        eventType: event.providerType,
      });
      await this.alert('Payment webhook without payment intent', {
        eventId: event.externalEventId,
        eventType: event.providerType,
      });
      return this.finish(event, 'unmatched');
    }

    const order = await this.orderStore.findByPaymentIntentId(event.paymentIntentId);
    if (!order) {
      console.warn('[PaymentWebhook] No order matches payment intent', {
        eventId: event.externalEventId,
        eventType: event.providerType,
        paymentIntentId: event.paymentIntentId,
      });
      await this.alert('Payment webhook could not match order', {
        eventId: event.externalEventId,
        eventType: event.providerType,
        paymentIntentId: event.paymentIntentId,
      });
      return this.finish(event, 'unmatched');
    }

    return this.applyTransition(event, event.kind, order);
  }

  private verify(rawPayload: unknown, signatureHeader: string | string[] | undefined): Stripe.Event {
    if (!signatureHeader) {
      throw new AuthenticationError('Missing stripe-signature header', 400);
    }
    if (!Buffer.isBuffer(rawPayload) && typeof rawPayload !== 'string') {
      throw new AuthenticationError('Webhook payload must be the raw request body', 400);
    }

    try {
      return this.stripe.webhooks.constructEvent(rawPayload, signatureHeader, this.options.webhookSecret);
    } catch (error) {
      console.error('[PaymentWebhook] Signature verification failed', {
        message: error instanceof Error ? error.message : String(error),
      });
      throw new AuthenticationError('Webhook signature verification failed', 400);
    }
  }

  private async applyTransition(
    event: NormalizedPaymentEvent,
    kind: PaymentEventKind,
    order: OrderRecord
  ): Promise<WebhookAck> {
    const { from, to } = PAYMENT_EVENT_TRANSITIONS[kind];

    try {
      const result = await this.orderStore.applyPaymentEvent(
        order.id,
        from,
        to,
        this.toRecord(event, 'applied', order.id)
      );

      if (result === 'duplicate') {
        console.info('[PaymentWebhook] Duplicate event skipped', {
          eventId: event.externalEventId,
          orderId: order.id,
        });
        return { received: true, outcome: 'duplicate', orderId: order.id };
      }

      console.log('[PaymentWebhook] Order updated', {
        eventId: event.externalEventId,
        orderId: order.id,
        status: to,
      });
      if (kind === 'payment_succeeded') {
        await this.clearCart(order);
      }
      return { received: true, outcome: 'applied', orderId: order.id };
    } catch (error) {
      if (!(error instanceof ConflictError)) {
        throw error;
      }
      return this.resolveConflict(event, kind, order.id);
    }
  }

  // Lost the compare-and-swap: either a concurrent delivery already applied this
  // transition, or the order moved somewhere this event cannot follow.
  private async resolveConflict(
    event: NormalizedPaymentEvent,
    kind: PaymentEventKind,
    orderId: string
  ): Promise<WebhookAck> {
    const current = await this.orderStore.getOrder(orderId);

    if (isAlreadyApplied(kind, current.status)) {
      console.info('[PaymentWebhook] Transition already applied', {
        eventId: event.externalEventId,
        orderId,
        status: current.status,
      });
      return this.finish(event, 'already_applied', orderId);
    }

    console.warn('[PaymentWebhook] Event conflicts with order state', {
      eventId: event.externalEventId,
      eventType: event.providerType,
      orderId,
      status: current.status,
    });
    await this.alert('Payment webhook conflicts with order state, manual review required', {
      eventId: event.externalEventId,
      eventType: event.providerType,
      orderId,
      orderStatus: current.status,
    });
    return this.finish(event, 'conflict', orderId);
  }

  private async finish(
    event: NormalizedPaymentEvent,
    outcome: WebhookOutcome,
    orderId?: string
  ): Promise<WebhookAck> {
    const recorded = await this.orderStore.recordEvent(this.toRecord(event, outcome, orderId));
    if (!recorded) {
      return { received: true, outcome: 'duplicate', orderId };
    }
    return { received: true, outcome, orderId };
  }

  private async clearCart(order: OrderRecord): Promise<void> {
    try {
      await this.cartStore.clearCart(order.userId);
    } catch (error) {
      console.error('[PaymentWebhook] Failed to clear cart after payment', {
        orderId: order.id,
        userId: order.userId,
        error,
      });
      await this.alert('Cart could not be cleared after payment', {
        orderId: order.id,
        userId: order.userId,
      });
    }
  }

  private toRecord(event: NormalizedPaymentEvent, outcome: WebhookOutcome, orderId?: string): PaymentEventRecord {
    return {
      externalEventId: event.externalEventId,
      providerType: event.providerType,
      kind: event.kind,
      paymentIntentId: event.paymentIntentId,
      observedStatus: event.observedStatus,
      failureReason: event.failureReason,
      orderId,
      outcome,
      receivedAt: this.now(),
    };
  }

  private alert(message: string, context: Record<string, unknown>): Promise<void> {
    return notifyOps(message, context, this.options.opsWebhookUrl);
  }
}
