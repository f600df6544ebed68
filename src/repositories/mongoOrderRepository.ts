import mongoose from 'mongoose';
import { Order, IOrder } from '../models/Order';
import { PaymentEvent } from '../models/PaymentEvent';
import type {
  NewOrderRecord,
  OrderRecord,
  PageRequest,
  PageResult,
  PaymentEventRecord,
} from '../types/order';
import {
  EventTransitionResult,
  OrderListFilter,
  OrderRepository,
  StatusChange,
  toPageResult,
} from './orderRepository';

const isObjectId = (value: string): boolean => mongoose.Types.ObjectId.isValid(value);

const isDuplicateKeyError = (error: unknown): boolean =>
  error instanceof mongoose.mongo.MongoServerError && error.code === 11000;

class TransitionConflict extends Error {}

export const toOrderRecord = (doc: IOrder): OrderRecord => ({
  id: String(doc._id),
  orderNumber: doc.orderNumber,
  userId: doc.userId,
  lineItems: doc.lineItems.map((item) => ({
    productId: item.productId,
    productName: item.productName ?? undefined,
    quantity: item.quantity,
    unitPrice: item.unitPrice,
  })),
  totalAmount: doc.totalAmount,
  amountInMinor: doc.amountInMinor,
  currency: doc.currency,
  status: doc.status,
  paymentIntentId: doc.paymentIntentId ?? undefined,
  shippingAddress: doc.shippingAddress ?? undefined,
  customerNotes: doc.customerNotes ?? undefined,
  lastPaymentEventId: doc.lastPaymentEventId ?? undefined,
  lastPaymentEventType: doc.lastPaymentEventType ?? undefined,
  failureReason: doc.failureReason ?? undefined,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

/**
 * MongoDB-backed order repository. Status changes go through
 * `findOneAndUpdate({ _id, status })` so concurrent writers on different service
 * instances cannot both win; the event + transition pair runs in a transaction
 * (requires a replica set).
 */
export class MongoOrderRepository implements OrderRepository {
  async insert(order: NewOrderRecord): Promise<OrderRecord> {
    const created = await Order.create({ ...order, status: 'pending' });
    return toOrderRecord(created);
  }

  async findById(orderId: string): Promise<OrderRecord | null> {
    if (!isObjectId(orderId)) {
      return null;
    }
    const doc = await Order.findById(orderId);
    return doc ? toOrderRecord(doc) : null;
  }

  async findByPaymentIntentId(paymentIntentId: string): Promise<OrderRecord | null> {
    const doc = await Order.findOne({ paymentIntentId });
    return doc ? toOrderRecord(doc) : null;
  }

  async findByOrderNumber(orderNumber: string): Promise<OrderRecord | null> {
    const doc = await Order.findOne({ orderNumber });
    return doc ? toOrderRecord(doc) : null;
  }

  async list(filter: OrderListFilter, page: PageRequest): Promise<PageResult<OrderRecord>> {
    const query: Record<string, unknown> = {};
    if (filter.userId) {
      query.userId = filter.userId;
    }
    if (filter.status) {
      query.status = filter.status;
    }

    const [docs, total] = await Promise.all([
      Order.find(query)
        .sort({ createdAt: -1 })
        .skip((page.page - 1) * page.limit)
        .limit(page.limit),
      Order.countDocuments(query),
    ]);

    return toPageResult(docs.map(toOrderRecord), total, page);
  }

  async findStalePending(createdBefore: Date, limit: number): Promise<OrderRecord[]> {
    const docs = await Order.find({ status: 'pending', createdAt: { $lt: createdBefore } })
      .sort({ createdAt: 1 })
      .limit(limit);
    return docs.map(toOrderRecord);
  }

  async compareAndSetStatus(change: StatusChange): Promise<OrderRecord | null> {
    if (!isObjectId(change.orderId)) {
      return null;
    }
    const updated = await Order.findOneAndUpdate(
      { _id: change.orderId, status: change.from },
      { $set: { status: change.to } },
      { new: true }
    );
    return updated ? toOrderRecord(updated) : null;
  }

  async attachPaymentIntent(orderId: string, paymentIntentId: string): Promise<OrderRecord | null> {
    if (!isObjectId(orderId)) {
      return null;
    }
    const updated = await Order.findOneAndUpdate(
      { _id: orderId, status: 'pending', paymentIntentId: { $exists: false } },
      { $set: { status: 'payment_processing', paymentIntentId } },
      { new: true }
    );
    return updated ? toOrderRecord(updated) : null;
  }

  async hasProcessedEvent(externalEventId: string): Promise<boolean> {
    const existing = await PaymentEvent.exists({ externalEventId });
    return existing !== null;
  }

  async recordEvent(event: PaymentEventRecord): Promise<boolean> {
    try {
      await PaymentEvent.create(event);
      return true;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return false;
      }
      throw error;
    }
  }

  async recordEventWithTransition(
    event: PaymentEventRecord,
    change: StatusChange
  ): Promise<EventTransitionResult> {
    if (!isObjectId(change.orderId)) {
      return { kind: 'conflict', current: null };
    }

    const session = await mongoose.startSession();
    try {
      let result: EventTransitionResult = { kind: 'duplicate' };

      await session.withTransaction(async () => {
        const seen = await PaymentEvent.exists({ externalEventId: event.externalEventId }).session(session);
        if (seen) {
          result = { kind: 'duplicate' };
          return;
        }

        const updated = await Order.findOneAndUpdate(
          { _id: change.orderId, status: change.from },
          {
            $set: {
              status: change.to,
              lastPaymentEventId: event.externalEventId,
              lastPaymentEventType: event.providerType,
              ...(event.failureReason ? { failureReason: event.failureReason } : {}),
            },
          },
          { new: true, session }
        );
        if (!updated) {
          // Aborts the transaction so the event stays unrecorded.
          throw new TransitionConflict();
        }

        await PaymentEvent.create([{ ...event, orderId: change.orderId }], { session });
        result = { kind: 'applied', order: toOrderRecord(updated) };
      });

      return result;
    } catch (error) {
      if (error instanceof TransitionConflict) {
        return { kind: 'conflict', current: await this.findById(change.orderId) };
      }
      if (isDuplicateKeyError(error)) {
        return { kind: 'duplicate' };
      }
      throw error;
    } finally {
      await session.endSession();
    }
  }
}
