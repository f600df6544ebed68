import mongoose, { Document, Schema } from 'mongoose';
import { ORDER_STATUSES } from '../types/order';
import type { OrderLineItem, OrderStatus, ShippingAddress } from '../types/order';

export interface IOrder extends Document {
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
  failureReason?: string;
  createdAt: Date;
  updatedAt: Date;
}

const LineItemSchema = new Schema<OrderLineItem>({
  productId: { type: String, required: true },
  productName: { type: String },
  quantity: { type: Number, required: true, min: 1 },
  unitPrice: { type: Number, required: true, min: 0 },
}, { _id: false });

const ShippingAddressSchema = new Schema<ShippingAddress>({
  line1: { type: String, required: true },
  line2: { type: String },
  city: { type: String, required: true },
  state: { type: String, required: true },
  postalCode: { type: String, required: true },
  country: { type: String, required: true },
}, { _id: false });

const OrderSchema = new Schema<IOrder>({
  orderNumber: { type: String, required: true, unique: true },
  // Weak reference: users live in the auth service.
  userId: { type: String, required: true },
  lineItems: { type: [LineItemSchema], required: true },
  totalAmount: { type: Number, required: true, immutable: true },
  amountInMinor: { type: Number, required: true, immutable: true },
  currency: { type: String, required: true, default: 'usd' },
  status: { type: String, enum: ORDER_STATUSES, default: 'pending' },
  paymentIntentId: { type: String },
  shippingAddress: { type: ShippingAddressSchema },
  customerNotes: { type: String, trim: true },
  lastPaymentEventId: { type: String },
  lastPaymentEventType: { type: String },
  failureReason: { type: String },
}, { timestamps: true });

OrderSchema.index({ userId: 1, createdAt: -1 });
OrderSchema.index({ paymentIntentId: 1 }, { unique: true, sparse: true });
OrderSchema.index({ status: 1, createdAt: 1 });

export const Order = mongoose.model<IOrder>('Order', OrderSchema);
