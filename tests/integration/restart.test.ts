import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileBackend } from '../../src/repositories/file.backend';
import { createProductStore } from '../../src/store';
import { createTempDataDir } from '../helpers/test-store';

describe('File-backed store across restarts', () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await createTempDataDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it('should keep records and never reuse ids after a restart', async () => {
    const first = createProductStore({ backend: new FileBackend(dir) });
    const bread = await first.service.addProduct({ name: 'Bread', quantity: 10, category: 'Bakery' });
    const cake = await first.service.addProduct({ name: 'Cheesecake', quantity: 2, category: 'Cake' });
    await first.service.offloadQuantity(bread.id, { amount: 4 });
    await first.service.removeProduct(cake.id);

    const second = createProductStore({ backend: new FileBackend(dir) });

    const reloaded = await second.service.getProduct(bread.id);
    expect(reloaded.quantity).toBe(6);
    expect(reloaded.createdAt).toEqual(bread.createdAt);
    expect(reloaded.updatedAt).toBeInstanceOf(Date);

    await expect(second.service.getProduct(cake.id)).rejects.toThrow(
      `A product with id=${cake.id} was not found`
    );

    const cookies = await second.service.addProduct({ name: 'Cookies', quantity: 24, category: 'Cookies' });
    expect(cookies.id).toBe(3);
  });

  it('should honour the record size bound on disk', async () => {
    const store = createProductStore({ backend: new FileBackend(dir), recordMaxBytes: 128 });

    await expect(store.service.addProduct({ name: 'x'.repeat(200), quantity: 1 })).rejects.toThrow(
      'exceeding the 128 byte limit'
    );

    expect(await store.backend.readCounter()).toBe(0);

    const reopened = createProductStore({ backend: new FileBackend(dir), recordMaxBytes: 128 });
    const next = await reopened.service.addProduct({ name: 'Bun', quantity: 1 });
    expect(next.id).toBe(1);
  });
});
