import type { DurableBackend } from './backend.types';
import type { ProductId } from '../core/types';
import { StoreFailureError } from '../core/errors';
import { logger } from '../core/logger';

/**
 * Hands out strictly increasing product ids backed by the persistent counter.
 * The counter is only ever written here.
 */
export class IdAllocator {
  constructor(private readonly backend: DurableBackend) {}

  async nextId(): Promise<ProductId> {
    const id = await this.peekNextId();
    await this.commit(id);
    return id;
  }

  /**
   * The id the next commit will hand out. Nothing is persisted, so a caller that
   * fails before committing leaves the counter where it was.
   */
  async peekNextId(): Promise<ProductId> {
    try {
      const current = await this.backend.readCounter();
      if (current >= Number.MAX_SAFE_INTEGER) {
        throw new StoreFailureError(`Id counter exhausted at ${current}`);
      }
      return current + 1;
    } catch (error) {
      throw this.wrap(error);
    }
  }

  async commit(id: ProductId): Promise<void> {
    try {
      const current = await this.backend.readCounter();
      if (id !== current + 1) {
        throw new StoreFailureError(`Id ${id} does not follow the counter at ${current}`);
      }
      await this.backend.writeCounter(id);
      logger.debug({ id }, 'Product id allocated');
    } catch (error) {
      throw this.wrap(error);
    }
  }

  private wrap(error: unknown): StoreFailureError {
    if (error instanceof StoreFailureError) {
      return error;
    }
    return new StoreFailureError('Cannot increment id counter', { cause: error });
  }
}
