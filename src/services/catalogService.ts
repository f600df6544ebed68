import mongoose from 'mongoose';
import { Product } from '../models/Product';
import type { CatalogProduct, CatalogService } from '../types/collaborators';

/** Read-only view of the catalog's `products` collection. */
export class MongoCatalogService implements CatalogService {
  async getProduct(productId: string): Promise<CatalogProduct | null> {
    if (!mongoose.Types.ObjectId.isValid(productId)) {
      return null;
    }

    const product = await Product.findById(productId);
    if (!product) {
      return null;
    }

    return {
      name: product.name,
      price: product.price,
      available: product.isActive && product.inventoryQuantity > 0,
    };
  }
}
