import type {
  NewOrderRecord,
  OrderRecord,
  OrderStatus,
  PageRequest,
  PageResult,
  PaymentEventRecord,
} from '../types/order';

export interface StatusChange {
  orderId: string;
  from: OrderStatus;
  to: OrderStatus;
}

export type EventTransitionResult =
  | { kind: 'applied'; order: OrderRecord }
  | { kind: 'duplicate' }
  | { kind: 'conflict'; current: OrderRecord | null };

export interface OrderListFilter {
  userId?: string;
  status?: OrderStatus;
}

/**
 * Persistence boundary of the order store. Every status write is a
 * compare-and-swap on the stored status.
 */
export interface OrderRepository {
  insert(order: NewOrderRecord): Promise<OrderRecord>;
  findById(orderId: string): Promise<OrderRecord | null>;
  findByPaymentIntentId(paymentIntentId: string): Promise<OrderRecord | null>;
  findByOrderNumber(orderNumber: string): Promise<OrderRecord | null>;
  list(filter: OrderListFilter, page: PageRequest): Promise<PageResult<OrderRecord>>;
  findStalePending(createdBefore: Date, limit: number): Promise<OrderRecord[]>;
  /** Returns null when the order is missing or its status is no longer `from`. */
  compareAndSetStatus(change: StatusChange): Promise<OrderRecord | null>;
  /** `pending` without an intent → `payment_processing` with the given intent, in one write. */
  attachPaymentIntent(orderId: string, paymentIntentId: string): Promise<OrderRecord | null>;
  hasProcessedEvent(externalEventId: string): Promise<boolean>;
  /** Returns false when the event id was already recorded. */
  recordEvent(event: PaymentEventRecord): Promise<boolean>;
  /**
   * Records the event and applies the status change atomically; nothing is
   * written on conflict. The event's `failureReason`, when present, is copied
   * onto the order.
   */
  recordEventWithTransition(event: PaymentEventRecord, change: StatusChange): Promise<EventTransitionResult>;
}

export const normalizePage = (page?: Partial<PageRequest>): PageRequest => {
  const rawPage = Number(page?.page);
  const rawLimit = Number(page?.limit);
  return {
    page: Number.isInteger(rawPage) && rawPage > 0 ? rawPage : 1,
    limit: Number.isFinite(rawLimit) ? Math.min(Math.max(Math.trunc(rawLimit), 1), 50) : 20,
  };
};

export const toPageResult = <T>(items: T[], total: number, page: PageRequest): PageResult<T> => ({
  orders: items,
  pagination: {
    total,
    page: page.page,
    limit: page.limit,
    pages: Math.ceil(total / page.limit),
  },
});
