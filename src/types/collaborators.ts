export interface CartEntry {
  productId: string;
  quantity: number;
}

export interface CatalogProduct {
  price: number;
  available: boolean;
  name?: string;
}

/** Read access to the shopping cart owned by the cart service. */
export interface CartStore {
  getCart(userId: string): Promise<CartEntry[]>;
  clearCart(userId: string): Promise<void>;
}

export interface CatalogService {
  getProduct(productId: string): Promise<CatalogProduct | null>;
}
