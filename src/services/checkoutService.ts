import type { AuthUser } from '../types/auth';
import type { CartStore } from '../types/collaborators';
import type {
  CheckoutDetails,
  OrderRecord,
  OrderStatus,
  PageRequest,
  PageResult,
} from '../types/order';
import { AuthorizationError, ConflictError, ValidationError } from '../utils/errors';
import type { OrderStore } from './orderStore';
import type { PaymentGateway } from './paymentGateway';

export interface CheckoutResult {
  orderId: string;
  orderNumber: string;
  clientSecret: string;
  paymentIntentId: string;
  totalAmount: number;
  currency: string;
}

export interface OrderStatusView {
  orderId: string;
  orderNumber: string;
  status: OrderStatus;
  updatedAt: Date;
}

const isAdmin = (user: AuthUser): boolean => user.role === 'admin';

/**
 * User-facing entry point: cart → order → payment intent, plus the order
 * queries and the cancel/refund paths.
 */
export class CheckoutService {
  constructor(
    private readonly cartStore: CartStore,
    private readonly orderStore: OrderStore,
    private readonly gateway: PaymentGateway
  ) {}

  /**
   * If the intent cannot be created the order stays `pending` and the caller
   * may resume it later; the user is never charged without an intent.
   */
  async initiateCheckout(userId: string, details: CheckoutDetails = {}): Promise<CheckoutResult> {
    const cart = await this.cartStore.getCart(userId);
    if (cart.length === 0) {
      throw new ValidationError('Cart is empty');
    }

    const order = await this.orderStore.createOrder(
      userId,
      cart.map((entry) => ({ productId: entry.productId, quantity: entry.quantity })),
      details
    );

    const intent = await this.gateway.createIntent(order);
    console.log('[Checkout] Payment intent created', {
      orderId: order.id,
      paymentIntentId: intent.paymentIntentId,
    });

    return {
      orderId: order.id,
      orderNumber: order.orderNumber,
      clientSecret: intent.clientSecret,
      paymentIntentId: intent.paymentIntentId,
      totalAmount: order.totalAmount,
      currency: order.currency,
    };
  }

  async getOrderStatus(orderId: string, requester: AuthUser): Promise<OrderStatusView> {
    const order = await this.getOrderForUser(orderId, requester);
    return {
      orderId: order.id,
      orderNumber: order.orderNumber,
      status: order.status,
      updatedAt: order.updatedAt,
    };
  }

  async getOrderForUser(orderId: string, requester: AuthUser): Promise<OrderRecord> {
    const order = await this.orderStore.getOrder(orderId);
    this.assertCanAccess(order, requester);
    return order;
  }

  async getOrderByNumber(orderNumber: string, requester: AuthUser): Promise<OrderRecord> {
    const order = await this.orderStore.getOrderByNumber(orderNumber);
    this.assertCanAccess(order, requester);
    return order;
  }

  async listOrders(
    requester: AuthUser,
    page?: Partial<PageRequest>,
    userId?: string
  ): Promise<PageResult<OrderRecord>> {
    if (userId && userId !== requester.userId && !isAdmin(requester)) {
      throw new AuthorizationError('Only administrators can list other users\' orders');
    }
    return this.orderStore.listOrdersForUser(userId ?? requester.userId, page);
  }

  async listAllOrders(
    requester: AuthUser,
    page?: Partial<PageRequest>,
    status?: OrderStatus
  ): Promise<PageResult<OrderRecord>> {
    if (!isAdmin(requester)) {
      throw new AuthorizationError();
    }
    return this.orderStore.listAllOrders(page, status);
  }

  /** Picks an abandoned checkout back up without opening a second intent. */
  async resumeCheckout(orderId: string, requester: AuthUser): Promise<CheckoutResult> {
    const order = await this.getOrderForUser(orderId, requester);

    if (order.status === 'pending') {
      const intent = await this.gateway.createIntent(order);
      return this.toCheckoutResult(order, intent.clientSecret, intent.paymentIntentId);
    }

    if (order.status === 'payment_processing' && order.paymentIntentId) {
      const clientSecret = await this.gateway.getClientSecret(order.paymentIntentId);
      return this.toCheckoutResult(order, clientSecret, order.paymentIntentId);
    }

    throw new ConflictError(`Order is ${order.status} and no longer awaiting payment`, {
      orderId,
      status: order.status,
    });
  }

  async cancelOrder(orderId: string, requester: AuthUser): Promise<OrderRecord> {
    const order = await this.getOrderForUser(orderId, requester);

    if (order.status === 'pending') {
      return this.orderStore.transitionStatus(order.id, 'pending', 'cancelled');
    }

    if (order.status === 'payment_processing' && order.paymentIntentId) {
      // Stripe will not confirm a cancelled intent, so no success webhook can follow.
      await this.gateway.cancelIntent(order.paymentIntentId);
      try {
        return await this.orderStore.transitionStatus(order.id, 'payment_processing', 'cancelled');
      } catch (error) {
        // The payment_intent.canceled webhook can land before this write and fail the order.
        const current = await this.orderStore.getOrder(order.id);
        if (error instanceof ConflictError && (current.status === 'failed' || current.status === 'cancelled')) {
          return current;
        }
        throw error;
      }
    }

    throw new ConflictError(`Order is ${order.status} and cannot be cancelled`, {
      orderId,
      status: order.status,
    });
  }

  async refundOrder(orderId: string, requester: AuthUser): Promise<OrderRecord> {
    if (!isAdmin(requester)) {
      throw new AuthorizationError('Only administrators can refund orders');
    }

    const order = await this.orderStore.getOrder(orderId);
    if (order.status !== 'paid' || !order.paymentIntentId) {
      throw new ConflictError(`Order is ${order.status} and cannot be refunded`, {
        orderId,
        status: order.status,
      });
    }

    const refundId = await this.gateway.refundPayment(order.paymentIntentId);
    console.log('[Checkout] Refund issued', { orderId, refundId, adminId: requester.userId });

    try {
      return await this.orderStore.transitionStatus(order.id, 'paid', 'refunded');
    } catch (error) {
      // The charge.refunded webhook can land before this write.
      const current = await this.orderStore.getOrder(order.id);
      if (error instanceof ConflictError && current.status === 'refunded') {
        return current;
      }
      throw error;
    }
  }

  private assertCanAccess(order: OrderRecord, requester: AuthUser): void {
    if (order.userId !== requester.userId && !isAdmin(requester)) {
      throw new AuthorizationError('You do not have permission to view this order');
    }
  }

  private toCheckoutResult(order: OrderRecord, clientSecret: string, paymentIntentId: string): CheckoutResult {
    return {
      orderId: order.id,
      orderNumber: order.orderNumber,
      clientSecret,
      paymentIntentId,
      totalAmount: order.totalAmount,
      currency: order.currency,
    };
  }
}
