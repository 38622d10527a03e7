import { type Product, ProductSchema } from '../core/types';
import { RecordDecodeError, RecordTooLargeError } from '../core/errors';

export const DEFAULT_RECORD_MAX_BYTES = 1024;

/**
 * Encodes products as UTF-8 JSON, bounded to a maximum size per record.
 */
export class ProductCodec {
  constructor(readonly maxBytes: number = DEFAULT_RECORD_MAX_BYTES) {}

  encode(product: Product): Buffer {
    // Dates serialize as ISO strings; an absent updatedAt is left out
    const bytes = Buffer.from(JSON.stringify(product), 'utf8');
    if (bytes.byteLength > this.maxBytes) {
      throw new RecordTooLargeError(product.id, bytes.byteLength, this.maxBytes);
    }
    return bytes;
  }

  decode(bytes: Uint8Array): Product {
    let raw: unknown;
    try {
      raw = JSON.parse(Buffer.from(bytes).toString('utf8'));
    } catch (error) {
      throw new RecordDecodeError('Stored product is not valid JSON', { cause: error });
    }

    const parsed = ProductSchema.safeParse(raw);
    if (!parsed.success) {
      throw new RecordDecodeError(`Stored product failed validation: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}
