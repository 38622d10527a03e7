import type { DurableBackend } from './backend.types';
import { ProductCodec } from './product.codec';
import type { Product, ProductId } from '../core/types';
import { NotFoundError } from '../core/errors';
import { logger } from '../core/logger';

/**
 * Product records keyed by id. Every read decodes a fresh copy, so callers
 * never hold a reference into the store. Payload validation happens upstream.
 */
export class ProductRepository {
  constructor(
    private readonly backend: DurableBackend,
    private readonly codec: ProductCodec = new ProductCodec()
  ) {}

  async find(id: ProductId): Promise<Product | undefined> {
    const bytes = await this.backend.readEntry(id);
    return bytes ? this.codec.decode(bytes) : undefined;
  }

  async get(id: ProductId): Promise<Product> {
    const product = await this.find(id);
    if (!product) {
      throw NotFoundError.product(id);
    }
    return product;
  }

  /**
   * Encode without writing; throws RecordTooLargeError for a record over the size bound
   */
  encode(product: Product): Uint8Array {
    return this.codec.encode(product);
  }

  /**
   * Insert or overwrite the record stored at product.id
   */
  async insert(product: Product, bytes: Uint8Array = this.codec.encode(product)): Promise<void> {
    await this.backend.writeEntry(product.id, bytes);
    logger.debug({ id: product.id, bytes: bytes.byteLength }, 'Product record written');
  }

  async remove(id: ProductId): Promise<Product> {
    const bytes = await this.backend.deleteEntry(id);
    if (!bytes) {
      throw NotFoundError.productRemoval(id);
    }
    logger.debug({ id }, 'Product record removed');
    return this.codec.decode(bytes);
  }
}
