import { randomBytes } from 'crypto';
import type {
  EventTransitionResult,
  OrderListFilter,
  OrderRepository,
  StatusChange,
} from '../repositories/orderRepository';
import { toPageResult } from '../repositories/orderRepository';
import type { CartEntry, CartStore, CatalogProduct, CatalogService } from '../types/collaborators';
import type {
  NewOrderRecord,
  OrderRecord,
  PageRequest,
  PageResult,
  PaymentEventRecord,
} from '../types/order';

const objectIdLike = (): string => randomBytes(12).toString('hex');

/**
 * In-process stand-in for MongoOrderRepository. Each method does its
 * read-check-write without awaiting in between, which gives the same
 * compare-and-swap guarantees as a single MongoDB update.
 */
export class InMemoryOrderRepository implements OrderRepository {
  readonly orders = new Map<string, OrderRecord>();
  readonly events = new Map<string, PaymentEventRecord>();
  private clock: () => Date;

  constructor(clock: () => Date = () => new Date()) {
    this.clock = clock;
  }

  setClock(clock: () => Date): void {
    this.clock = clock;
  }

  async insert(order: NewOrderRecord): Promise<OrderRecord> {
    const now = this.clock();
    const record: OrderRecord = {
      ...order,
      lineItems: order.lineItems.map((item) => ({ ...item })),
      id: objectIdLike(),
      status: 'pending',
      createdAt: now,
      updatedAt: now,
    };
    this.orders.set(record.id, record);
    return { ...record };
  }

  async findById(orderId: string): Promise<OrderRecord | null> {
    const order = this.orders.get(orderId);
    return order ? { ...order } : null;
  }

  async findByPaymentIntentId(paymentIntentId: string): Promise<OrderRecord | null> {
    for (const order of this.orders.values()) {
      if (order.paymentIntentId === paymentIntentId) {
        return { ...order };
      }
    }
    return null;
  }

  async findByOrderNumber(orderNumber: string): Promise<OrderRecord | null> {
    for (const order of this.orders.values()) {
      if (order.orderNumber === orderNumber) {
        return { ...order };
      }
    }
    return null;
  }

  async list(filter: OrderListFilter, page: PageRequest): Promise<PageResult<OrderRecord>> {
    const matching = [...this.orders.values()]
      .filter((order) => (filter.userId ? order.userId === filter.userId : true))
      .filter((order) => (filter.status ? order.status === filter.status : true))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

    const start = (page.page - 1) * page.limit;
    return toPageResult(
      matching.slice(start, start + page.limit).map((order) => ({ ...order })),
      matching.length,
      page
    );
  }

  async findStalePending(createdBefore: Date, limit: number): Promise<OrderRecord[]> {
    return [...this.orders.values()]
      .filter((order) => order.status === 'pending' && order.createdAt < createdBefore)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(0, limit)
      .map((order) => ({ ...order }));
  }

  async compareAndSetStatus(change: StatusChange): Promise<OrderRecord | null> {
    const order = this.orders.get(change.orderId);
    if (!order || order.status !== change.from) {
      return null;
    }
    order.status = change.to;
    order.updatedAt = this.clock();
    return { ...order };
  }

  async attachPaymentIntent(orderId: string, paymentIntentId: string): Promise<OrderRecord | null> {
    const order = this.orders.get(orderId);
    if (!order || order.status !== 'pending' || order.paymentIntentId) {
      return null;
    }
    order.status = 'payment_processing';
    order.paymentIntentId = paymentIntentId;
    order.updatedAt = this.clock();
    return { ...order };
  }

  async hasProcessedEvent(externalEventId: string): Promise<boolean> {
    return this.events.has(externalEventId);
  }

  async recordEvent(event: PaymentEventRecord): Promise<boolean> {
    if (this.events.has(event.externalEventId)) {
      return false;
    }
    this.events.set(event.externalEventId, { ...event });
    return true;
  }

  async recordEventWithTransition(
    event: PaymentEventRecord,
    change: StatusChange
  ): Promise<EventTransitionResult> {
    if (this.events.has(event.externalEventId)) {
      return { kind: 'duplicate' };
    }

    const order = this.orders.get(change.orderId);
    if (!order || order.status !== change.from) {
      return { kind: 'conflict', current: order ? { ...order } : null };
    }

    order.status = change.to;
    order.updatedAt = this.clock();
    order.lastPaymentEventId = event.externalEventId;
    order.lastPaymentEventType = event.providerType;
    if (event.failureReason) {
      order.failureReason = event.failureReason;
    }
    this.events.set(event.externalEventId, { ...event, orderId: change.orderId });
    return { kind: 'applied', order: { ...order } };
  }
}

export class FakeCatalog implements CatalogService {
  readonly products = new Map<string, CatalogProduct>();

  constructor(products: Record<string, CatalogProduct> = {}) {
    for (const [id, product] of Object.entries(products)) {
      this.products.set(id, product);
    }
  }

  async getProduct(productId: string): Promise<CatalogProduct | null> {
    return this.products.get(productId) ?? null;
  }
}

export class FakeCartStore implements CartStore {
  readonly carts = new Map<string, CartEntry[]>();

  constructor(carts: Record<string, CartEntry[]> = {}) {
    for (const [userId, entries] of Object.entries(carts)) {
      this.carts.set(userId, entries);
    }
  }

  async getCart(userId: string): Promise<CartEntry[]> {
    return (this.carts.get(userId) ?? []).map((entry) => ({ ...entry }));
  }

  async clearCart(userId: string): Promise<void> {
    this.carts.set(userId, []);
  }
}
