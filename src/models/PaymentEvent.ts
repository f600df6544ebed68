import mongoose, { Document, Schema } from 'mongoose';
import type { PaymentEventKind, WebhookOutcome } from '../types/order';

export interface IPaymentEvent extends Document {
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

const PaymentEventSchema = new Schema<IPaymentEvent>({
  externalEventId: { type: String, required: true },
  providerType: { type: String, required: true },
  kind: {
    type: String,
    enum: ['payment_succeeded', 'payment_failed', 'payment_refunded', null],
    default: null,
  },
  paymentIntentId: { type: String },
  observedStatus: { type: String },
  failureReason: { type: String },
  orderId: { type: String },
  outcome: {
    type: String,
    enum: ['applied', 'duplicate', 'ignored', 'already_applied', 'conflict', 'unmatched'],
    required: true,
  },
  receivedAt: { type: Date, required: true },
});

// The unique index is what makes webhook processing idempotent.
PaymentEventSchema.index({ externalEventId: 1 }, { unique: true });
PaymentEventSchema.index({ paymentIntentId: 1, receivedAt: -1 });

export const PaymentEvent = mongoose.model<IPaymentEvent>('PaymentEvent', PaymentEventSchema);
