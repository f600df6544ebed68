import mongoose, { Document, Schema } from 'mongoose';

export interface IProduct extends Document {
  name: string;
  sku?: string;
  price: number;
  isActive: boolean;
  inventoryQuantity: number;
}

const ProductSchema = new Schema<IProduct>({
  name: { type: String, required: true, trim: true },
  sku: { type: String, trim: true },
  price: { type: Number, required: true, min: 0 },
  isActive: { type: Boolean, default: true },
  inventoryQuantity: { type: Number, default: 0 },
}, { timestamps: true, collection: 'products' });

export const Product = mongoose.model<IProduct>('Product', ProductSchema);
