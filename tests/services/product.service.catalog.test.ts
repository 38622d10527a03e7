import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ProductCatalogService } from '../../src/services/product.service.catalog';
import { ProductRepository } from '../../src/repositories/product.repo';
import { IdAllocator } from '../../src/repositories/id.allocator';
import { MemoryBackend } from '../../src/repositories/memory.backend';
import { InvalidOperationError, NotFoundError, RecordTooLargeError } from '../../src/core/errors';
import { ProductCodec } from '../../src/repositories/product.codec';
import { freezeNow, restoreNow, advanceTime } from '../helpers/time';

describe('ProductCatalogService', () => {
  let backend: MemoryBackend;
  let repository: ProductRepository;
  let service: ProductCatalogService;

  beforeEach(() => {
    freezeNow('2025-01-01T00:00:00Z');
    backend = new MemoryBackend();
    repository = new ProductRepository(backend);
    service = new ProductCatalogService(repository, new IdAllocator(backend));
  });

  afterEach(() => {
    restoreNow();
  });

  describe('addProduct', () => {
    it('should create a product with the next id and no updatedAt', async () => {
      const product = await service.addProduct({ name: 'Bread', quantity: 10, category: 'Bakery' });

      expect(product).toEqual({
        id: 1,
        name: 'Bread',
        category: 'Bakery',
        quantity: 10,
        createdAt: new Date('2025-01-01T00:00:00Z'),
      });
      expect('updatedAt' in product).toBe(false);
    });

    it('should default the category to Bakery', async () => {
      const product = await service.addProduct({ name: 'Rolls', quantity: 3 });
      expect(product.category).toBe('Bakery');
    });

    it('should store exactly what it returns', async () => {
      const created = await service.addProduct({ name: 'Eclair', quantity: 4, category: 'Cake' });
      expect(await service.getProduct(created.id)).toEqual(created);
    });

    it('should reject an empty name without touching the counter', async () => {
      await expect(service.addProduct({ name: '', quantity: 5, category: 'Cake' })).rejects.toThrow(
        InvalidOperationError
      );

      expect(await backend.readCounter()).toBe(0);
      expect(backend.size).toBe(0);
    });

    it('should leave the counter untouched when the record is too large to store', async () => {
      const tight = new ProductCatalogService(
        new ProductRepository(backend, new ProductCodec(128)),
        new IdAllocator(backend)
      );

      await expect(tight.addProduct({ name: 'x'.repeat(200), quantity: 1 })).rejects.toThrow(RecordTooLargeError);
      expect(await backend.readCounter()).toBe(0);
      expect(backend.size).toBe(0);

      const next = await tight.addProduct({ name: 'Bun', quantity: 1 });
      expect(next.id).toBe(1);
    });

    it('should reject a zero quantity', async () => {
      await expect(service.addProduct({ name: 'Bread', quantity: 0 })).rejects.toThrow(
        'Product quantity must be greater than zero.'
      );
      expect(await backend.readCounter()).toBe(0);
    });
  });

  describe('getProduct / getStock', () => {
    it('should report NotFound on an empty store', async () => {
      await expect(service.getProduct(999)).rejects.toThrow('A product with id=999 was not found');
      await expect(service.getStock(999)).rejects.toThrow(NotFoundError);
    });

    it('should return the current quantity', async () => {
      const created = await service.addProduct({ name: 'Cookies', quantity: 12, category: 'Cookies' });
      expect(await service.getStock(created.id)).toBe(12);
    });
  });

  describe('updateProduct', () => {
    it('should overwrite fields, keep createdAt and stamp updatedAt', async () => {
      const created = await service.addProduct({ name: 'Bread', quantity: 10 });
      advanceTime(60_000);

      const updated = await service.updateProduct(created.id, { name: 'Sourdough', quantity: 7, category: 'Bakery' });

      expect(updated).toEqual({
        id: 1,
        name: 'Sourdough',
        category: 'Bakery',
        quantity: 7,
        createdAt: new Date('2025-01-01T00:00:00Z'),
        updatedAt: new Date('2025-01-01T00:01:00Z'),
      });
      expect(await service.getProduct(1)).toEqual(updated);
    });

    it('should reset an omitted category to the default', async () => {
      const created = await service.addProduct({ name: 'Tart', quantity: 2, category: 'Cake' });
      const updated = await service.updateProduct(created.id, { name: 'Tart', quantity: 2 });
      expect(updated.category).toBe('Bakery');
    });

    it('should report NotFound before validating the payload', async () => {
      await expect(service.updateProduct(7, { name: '', quantity: 0 })).rejects.toThrow(
        "Couldn't update a product with id=7. Product not found"
      );
    });

    it('should validate like addProduct', async () => {
      const created = await service.addProduct({ name: 'Bread', quantity: 10 });

      await expect(service.updateProduct(created.id, { name: '  ', quantity: 3 })).rejects.toThrow(
        'Product name cannot be empty.'
      );
      await expect(service.updateProduct(created.id, { name: 'Bread', quantity: 0 })).rejects.toThrow(
        'Product quantity must be greater than zero.'
      );
      expect(await service.getProduct(created.id)).toEqual(created);
    });
  });

  describe('removeProduct', () => {
    it('should return the removed product and retire its id', async () => {
      const first = await service.addProduct({ name: 'Bread', quantity: 10 });
      expect(await service.removeProduct(first.id)).toEqual(first);

      await expect(service.removeProduct(first.id)).rejects.toThrow(
        "Couldn't delete a product with id=1. Product not found"
      );

      const second = await service.addProduct({ name: 'Bread', quantity: 10 });
      expect(second.id).toBe(2);
    });
  });
});
