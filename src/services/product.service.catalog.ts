import { DEFAULT_CATEGORY, type Product, type ProductId, type ProductPayload, type Quantity } from '../core/types';
import { NotFoundError } from '../core/errors';
import type { ProductRepository } from '../repositories/product.repo';
import type { IdAllocator } from '../repositories/id.allocator';
import { validateProductPayload } from './product.service.validate';
import { logger } from '../core/logger';

export class ProductCatalogService {
  constructor(
    private readonly repository: ProductRepository,
    private readonly allocator: IdAllocator
  ) {}

  async getProduct(id: ProductId): Promise<Product> {
    return this.repository.get(id);
  }

  async getStock(id: ProductId): Promise<Quantity> {
    const product = await this.repository.get(id);
    return product.quantity;
  }

  /**
   * Validate, encode the record under the next id, then commit the id and insert.
   * A payload that fails validation or encoding leaves the counter untouched.
   */
  async addProduct(payload: ProductPayload): Promise<Product> {
    validateProductPayload(payload);

    const id = await this.allocator.peekNextId();
    const product: Product = {
      id,
      name: payload.name,
      category: payload.category ?? DEFAULT_CATEGORY,
      quantity: payload.quantity,
      createdAt: new Date(),
    };

    const bytes = this.repository.encode(product);

    await this.allocator.commit(id);
    await this.repository.insert(product, bytes);
    logger.info({ id, name: product.name, category: product.category, quantity: product.quantity }, 'Product created');
    return product;
  }

  async updateProduct(id: ProductId, payload: ProductPayload): Promise<Product> {
    const current = await this.repository.find(id);
    if (!current) {
      throw NotFoundError.productUpdate(id);
    }
    validateProductPayload(payload);

    const updated: Product = {
      ...current,
      name: payload.name,
      category: payload.category ?? DEFAULT_CATEGORY,
      quantity: payload.quantity,
      updatedAt: new Date(),
    };

    await this.repository.insert(updated);
    logger.info({ id, previousQuantity: current.quantity, quantity: updated.quantity }, 'Product updated');
    return updated;
  }

  async removeProduct(id: ProductId): Promise<Product> {
    const removed = await this.repository.remove(id);
    logger.info({ id, name: removed.name }, 'Product removed');
    return removed;
  }
}
