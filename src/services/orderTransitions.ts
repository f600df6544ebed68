import type { OrderStatus, PaymentEventKind } from '../types/order';

/**
 * Legal status edges. `paid` can only be reached from `payment_processing`, and
 * `payment_processing` only through {@link OrderStore.attachPaymentIntent}, so a
 * client can never move an order straight from `pending` to `paid`.
 */
export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
  pending: ['payment_processing', 'cancelled'],
  payment_processing: ['paid', 'failed', 'cancelled'],
  paid: ['refunded'],
  failed: [],
  cancelled: [],
  refunded: [],
};

export const canTransition = (from: OrderStatus, to: OrderStatus): boolean =>
  ORDER_TRANSITIONS[from].includes(to);

export const PAYMENT_EVENT_TRANSITIONS: Readonly<
  Record<PaymentEventKind, { from: OrderStatus; to: OrderStatus }>
> = {
  payment_succeeded: { from: 'payment_processing', to: 'paid' },
  payment_failed: { from: 'payment_processing', to: 'failed' },
  payment_refunded: { from: 'paid', to: 'refunded' },
};

// A redelivered success can find the order already refunded, and the
// `payment_intent.canceled` that follows a local cancel finds it cancelled.
const SATISFIED_BY: Readonly<Record<PaymentEventKind, readonly OrderStatus[]>> = {
  payment_succeeded: ['paid', 'refunded'],
  payment_failed: ['failed', 'cancelled'],
  payment_refunded: ['refunded'],
};

export const isAlreadyApplied = (kind: PaymentEventKind, current: OrderStatus): boolean =>
  SATISFIED_BY[kind].includes(current);
