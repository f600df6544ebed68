import { randomUUID } from 'crypto';
import type { CatalogService } from '../types/collaborators';
import type {
  CheckoutDetails,
  OrderLineItem,
  OrderRecord,
  OrderStatus,
  PageRequest,
  PageResult,
  PaymentEventRecord,
} from '../types/order';
import { normalizePage, OrderRepository } from '../repositories/orderRepository';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { canTransition } from './orderTransitions';

export interface LineItemRequest {
  productId: string;
  quantity: number;
}

export interface OrderStoreOptions {
  currency: string;
  now?: () => Date;
}

export const toMinorUnits = (amount: number): number => Math.round(amount * 100);

export const generateOrderNumber = (now: Date = new Date()): string => {
  const datePart = now.toISOString().slice(0, 10).replace(/-/g, '');
  const uniquePart = randomUUID().replace(/-/g, '').slice(0, 8).toUpperCase();
  return `ORD-${datePart}-${uniquePart}`;
};

/**
 * Source of truth for orders. Every status change goes through a
 * compare-and-swap on the stored status.
 */
export class OrderStore {
  private readonly now: () => Date;

  constructor(
    private readonly repository: OrderRepository,
    private readonly catalog: CatalogService,
    private readonly options: OrderStoreOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async createOrder(
    userId: string,
    lineItems: LineItemRequest[],
    details: CheckoutDetails = {}
  ): Promise<OrderRecord> {
    if (!userId) {
      throw new ValidationError('userId is required');
    }
    if (lineItems.length === 0) {
      throw new ValidationError('Order must contain at least one item');
    }

    const snapshot: OrderLineItem[] = [];
    const unavailable: string[] = [];

    for (const item of lineItems) {
      if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
        throw new ValidationError(`Invalid quantity for product ${item.productId}`, {
          productId: item.productId,
          quantity: item.quantity,
        });
      }

      const product = await this.catalog.getProduct(item.productId);
      if (!product || !product.available) {
        unavailable.push(item.productId);
        continue;
      }

      snapshot.push({
        productId: item.productId,
        productName: product.name,
        quantity: item.quantity,
        unitPrice: product.price,
      });
    }

    if (unavailable.length > 0) {
      throw new ValidationError('Some items are unavailable', { unavailable });
    }

    const amountInMinor = snapshot.reduce(
      (sum, item) => sum + toMinorUnits(item.unitPrice) * item.quantity,
      0
    );
    if (amountInMinor <= 0) {
      // The provider refuses zero-amount intents.
      throw new ValidationError('Order total must be greater than zero', { amountInMinor });
    }

    const order = await this.repository.insert({
      orderNumber: generateOrderNumber(this.now()),
      userId,
      lineItems: snapshot,
      amountInMinor,
      totalAmount: amountInMinor / 100,
      currency: this.options.currency,
      shippingAddress: details.shippingAddress,
      customerNotes: details.customerNotes,
    });

    console.log('[OrderStore] Order created', {
      orderId: order.id,
      orderNumber: order.orderNumber,
      userId,
      totalAmount: order.totalAmount,
    });
    return order;
  }

  async getOrder(orderId: string): Promise<OrderRecord> {
    const order = await this.repository.findById(orderId);
    if (!order) {
      throw new NotFoundError('Order not found');
    }
    return order;
  }

  async getOrderByNumber(orderNumber: string): Promise<OrderRecord> {
    const order = await this.repository.findByOrderNumber(orderNumber);
    if (!order) {
      throw new NotFoundError('Order not found');
    }
    return order;
  }

  async findByPaymentIntentId(paymentIntentId: string): Promise<OrderRecord | null> {
    return this.repository.findByPaymentIntentId(paymentIntentId);
  }

  async transitionStatus(orderId: string, fromExpected: OrderStatus, to: OrderStatus): Promise<OrderRecord> {
    this.assertTransition(fromExpected, to);
    if (to === 'payment_processing') {
      throw new ValidationError('payment_processing is only entered by attaching a payment intent');
    }

    const updated = await this.repository.compareAndSetStatus({ orderId, from: fromExpected, to });
    if (updated) {
      console.log('[OrderStore] Status transition', { orderId, from: fromExpected, to });
      return updated;
    }

    const current = await this.getOrder(orderId);
    throw new ConflictError(`Order is ${current.status}, expected ${fromExpected}`, {
      orderId,
      expected: fromExpected,
      actual: current.status,
    });
  }

  async attachPaymentIntent(orderId: string, paymentIntentId: string): Promise<OrderRecord> {
    const updated = await this.repository.attachPaymentIntent(orderId, paymentIntentId);
    if (updated) {
      console.log('[OrderStore] Payment intent attached', { orderId, paymentIntentId });
      return updated;
    }

    const current = await this.getOrder(orderId);
    throw new ConflictError('Order is no longer awaiting a payment intent', {
      orderId,
      actual: current.status,
      paymentIntentId: current.paymentIntentId,
    });
  }

  async listOrdersForUser(userId: string, page?: Partial<PageRequest>): Promise<PageResult<OrderRecord>> {
    return this.repository.list({ userId }, normalizePage(page));
  }

  async listAllOrders(
    page?: Partial<PageRequest>,
    status?: OrderStatus
  ): Promise<PageResult<OrderRecord>> {
    return this.repository.list({ status }, normalizePage(page));
  }

  async findStalePendingOrders(createdBefore: Date, limit: number): Promise<OrderRecord[]> {
    return this.repository.findStalePending(createdBefore, limit);
  }

  async hasProcessedEvent(externalEventId: string): Promise<boolean> {
    return this.repository.hasProcessedEvent(externalEventId);
  }

  async recordEvent(event: PaymentEventRecord): Promise<boolean> {
    return this.repository.recordEvent(event);
  }

  /**
   * Records the payment event and applies `from → to` as one unit. A stale
   * `from` raises ConflictError and leaves the event unrecorded.
   */
  async applyPaymentEvent(
    orderId: string,
    fromExpected: OrderStatus,
    to: OrderStatus,
    event: PaymentEventRecord
  ): Promise<'applied' | 'duplicate'> {
    this.assertTransition(fromExpected, to);

    const result = await this.repository.recordEventWithTransition(event, { orderId, from: fromExpected, to });
    if (result.kind === 'conflict') {
      throw new ConflictError(
        result.current ? `Order is ${result.current.status}, expected ${fromExpected}` : 'Order not found',
        { orderId, expected: fromExpected, actual: result.current?.status }
      );
    }
    if (result.kind === 'applied') {
      console.log('[OrderStore] Status transition', {
        orderId,
        from: fromExpected,
        to,
        eventId: event.externalEventId,
      });
    }
    return result.kind;
  }

  private assertTransition(from: OrderStatus, to: OrderStatus): void {
    if (!canTransition(from, to)) {
      throw new ValidationError(`Cannot transition order from ${from} to ${to}`, { from, to });
    }
  }
}
