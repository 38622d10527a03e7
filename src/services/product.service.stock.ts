import { MAX_QUANTITY, type Product, type ProductId, type StockPayload } from '../core/types';
import { InvalidOperationError, NotFoundError, QuantityOverflowError } from '../core/errors';
import type { ProductRepository } from '../repositories/product.repo';
import { validateStockPayload } from './product.service.validate';
import { logger } from '../core/logger';

export class StockAdjustmentService {
  constructor(private readonly repository: ProductRepository) {}

  /**
   * Add stock. Going past MAX_QUANTITY is fatal rather than a wraparound.
   */
  async addQuantity(id: ProductId, payload: StockPayload): Promise<Product> {
    const current = await this.repository.find(id);
    if (!current) {
      throw NotFoundError.productRestock(id);
    }
    validateStockPayload(payload);

    const newQuantity = current.quantity + payload.amount;
    if (newQuantity > MAX_QUANTITY) {
      throw new QuantityOverflowError(id, current.quantity, payload.amount);
    }

    return this.persistQuantity(current, newQuantity, payload.amount);
  }

  /**
   * Remove stock. Both guards run before the subtraction; quantity never drops below 0.
   */
  async offloadQuantity(id: ProductId, payload: StockPayload): Promise<Product> {
    const current = await this.repository.find(id);
    if (!current) {
      throw NotFoundError.productOffload(id);
    }
    validateStockPayload(payload);

    if (current.quantity === 0) {
      throw InvalidOperationError.emptyStock(id);
    }
    if (payload.amount > current.quantity) {
      throw InvalidOperationError.insufficientStock(id, current.quantity, payload.amount);
    }

    return this.persistQuantity(current, current.quantity - payload.amount, -payload.amount);
  }

  private async persistQuantity(current: Product, quantity: number, delta: number): Promise<Product> {
    const updated: Product = {
      ...current,
      quantity,
      updatedAt: new Date(),
    };

    await this.repository.insert(updated);
    logger.info({ id: current.id, delta, previousQuantity: current.quantity, quantity }, 'Stock adjusted');
    return updated;
  }
}
