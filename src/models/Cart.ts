import mongoose, { Document, Schema } from 'mongoose';

export interface ICartItem {
  productId: string;
  quantity: number;
}

export interface ICart extends Document {
  userId: string;
  items: ICartItem[];
  updatedAt: Date;
}

const CartSchema = new Schema<ICart>({
  userId: { type: String, required: true, unique: true },
  items: [{
    _id: false,
    productId: { type: String, required: true },
    quantity: { type: Number, required: true },
  }],
}, { timestamps: true, collection: 'carts' });

export const Cart = mongoose.model<ICart>('Cart', CartSchema);
