import type { Product, ProductId, ProductPayload, Quantity, StockPayload } from '../core/types';

export interface ProductService {
  getProduct(id: ProductId): Promise<Product>;
  getStock(id: ProductId): Promise<Quantity>;
  addProduct(payload: ProductPayload): Promise<Product>;
  updateProduct(id: ProductId, payload: ProductPayload): Promise<Product>;
  addQuantity(id: ProductId, payload: StockPayload): Promise<Product>;
  offloadQuantity(id: ProductId, payload: StockPayload): Promise<Product>;
  removeProduct(id: ProductId): Promise<Product>;
}
