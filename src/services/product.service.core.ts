import type { Product, ProductId, ProductPayload, Quantity, StockPayload } from '../core/types';
import { DomainError } from '../core/errors';
import type { ProductRepository } from '../repositories/product.repo';
import type { IdAllocator } from '../repositories/id.allocator';
import { PerKeyMutex } from '../utils/perKeyMutex';
import { ProductCatalogService } from './product.service.catalog';
import { StockAdjustmentService } from './product.service.stock';
import type { ProductService } from './product.service.types';
import { logger } from '../core/logger';

// Every operation shares one lane: the store is a single owned unit of state
const STORE_LANE = 'product-store';

export class ProductServiceImpl implements ProductService {
  private readonly catalogService: ProductCatalogService;
  private readonly adjustmentService: StockAdjustmentService;
  private readonly lane = new PerKeyMutex();

  constructor(repository: ProductRepository, allocator: IdAllocator) {
    this.catalogService = new ProductCatalogService(repository, allocator);
    this.adjustmentService = new StockAdjustmentService(repository);
  }

  getProduct(id: ProductId): Promise<Product> {
    return this.run('getProduct', { id }, () => this.catalogService.getProduct(id));
  }

  getStock(id: ProductId): Promise<Quantity> {
    return this.run('getStock', { id }, () => this.catalogService.getStock(id));
  }

  addProduct(payload: ProductPayload): Promise<Product> {
    return this.run('addProduct', { name: payload.name }, () => this.catalogService.addProduct(payload));
  }

  updateProduct(id: ProductId, payload: ProductPayload): Promise<Product> {
    return this.run('updateProduct', { id }, () => this.catalogService.updateProduct(id, payload));
  }

  addQuantity(id: ProductId, payload: StockPayload): Promise<Product> {
    return this.run('addQuantity', { id, amount: payload.amount }, () =>
      this.adjustmentService.addQuantity(id, payload)
    );
  }

  offloadQuantity(id: ProductId, payload: StockPayload): Promise<Product> {
    return this.run('offloadQuantity', { id, amount: payload.amount }, () =>
      this.adjustmentService.offloadQuantity(id, payload)
    );
  }

  removeProduct(id: ProductId): Promise<Product> {
    return this.run('removeProduct', { id }, () => this.catalogService.removeProduct(id));
  }

  private async run<T>(
    operation: string,
    context: Record<string, unknown>,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await this.lane.acquire(STORE_LANE, fn);
    } catch (error) {
      if (error instanceof DomainError) {
        logger.warn({ ...context, operation, code: error.code, reason: error.message }, 'Product operation rejected');
      } else {
        logger.error({ ...context, operation, error }, 'Product operation failed');
      }
      throw error;
    }
  }
}
