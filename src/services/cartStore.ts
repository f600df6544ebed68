import { Cart } from '../models/Cart';
import type { CartEntry, CartStore } from '../types/collaborators';

export class MongoCartStore implements CartStore {
  async getCart(userId: string): Promise<CartEntry[]> {
    const cart = await Cart.findOne({ userId });
    if (!cart) {
      return [];
    }
    return cart.items.map((item) => ({ productId: item.productId, quantity: item.quantity }));
  }

  async clearCart(userId: string): Promise<void> {
    await Cart.updateOne({ userId }, { $set: { items: [] } });
  }
}
