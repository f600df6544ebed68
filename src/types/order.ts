export const ORDER_STATUSES = [
  'pending',
  'payment_processing',
  'paid',
  'failed',
  'cancelled',
  'refunded',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export interface OrderLineItem {
  productId: string;
  productName?: string;
  quantity: number;
  /** Catalog price at the moment the order was created, in major units. */
  unitPrice: number;
}

export interface ShippingAddress {
  line1: string;
  line2?: string;
  city: string;
  state: string;
  postalCode: string;
  country: string;
}

export interface CheckoutDetails {
  shippingAddress?: ShippingAddress;
  customerNotes?: string;
}

export interface OrderRecord {
  id: string;
  orderNumber: string;
  userId: string;
  lineItems: OrderLineItem[];
  totalAmount: number;
  amountInMinor: number;
  currency: string;
  status: OrderStatus;
  paymentIntentId?: string;
  shippingAddress?: ShippingAddress;
  customerNotes?: string;
  lastPaymentEventId?: string;
  lastPaymentEventType?: string;
  /** Provider message of the last payment error, set when the order moves to `failed`. */
  failureReason?: string;
  createdAt: Date;
  updatedAt: Date;
}

export type NewOrderRecord = Omit<
  OrderRecord,
  | 'id'
  | 'status'
  | 'paymentIntentId'
  | 'lastPaymentEventId'
  | 'lastPaymentEventType'
  | 'failureReason'
  | 'createdAt'
  | 'updatedAt'
>;

export type PaymentEventKind = 'payment_succeeded' | 'payment_failed' | 'payment_refunded';

export type WebhookOutcome =
  | 'applied'
  | 'duplicate'
  | 'ignored'
  | 'already_applied'
  | 'conflict'
  | 'unmatched';

export interface PaymentEventRecord {
  externalEventId: string;
  providerType: string;
  kind: PaymentEventKind | null;
  paymentIntentId?: string;
  observedStatus?: string;
  failureReason?: string;
  orderId?: string;
  outcome: WebhookOutcome;
  receivedAt: Date;
}

export interface PageRequest {
  page: number;
  limit: number;
}

export interface PageResult<T> {
  orders: T[];
  pagination: {
    total: number;
    page: number;
    limit: number;
    pages: number;
  };
}
