import { config as defaultConfig, type StoreConfig } from './core/config';
import type { DurableBackend } from './repositories/backend.types';
import { MemoryBackend } from './repositories/memory.backend';
import { FileBackend } from './repositories/file.backend';
import { ProductCodec } from './repositories/product.codec';
import { IdAllocator } from './repositories/id.allocator';
import { ProductRepository } from './repositories/product.repo';
import { ProductServiceImpl } from './services/product.service.core';
import type { ProductService } from './services/product.service.types';

/**
 * The owned state of one running store. Built once per process and handed to
 * the transport; nothing else reaches the backend directly.
 */
export interface ProductStore {
  readonly backend: DurableBackend;
  readonly repository: ProductRepository;
  readonly allocator: IdAllocator;
  readonly service: ProductService;
}

export interface ProductStoreOptions {
  backend?: DurableBackend;
  recordMaxBytes?: number;
}

export function createBackend(storeConfig: StoreConfig = defaultConfig): DurableBackend {
  switch (storeConfig.STORE_BACKEND) {
    case 'memory':
      return new MemoryBackend();
    case 'file':
      return new FileBackend(storeConfig.DATA_DIR);
  }
}

export function createProductStore(options: ProductStoreOptions = {}): ProductStore {
  const backend = options.backend ?? createBackend();
  const codec = new ProductCodec(options.recordMaxBytes ?? defaultConfig.RECORD_MAX_BYTES);
  const repository = new ProductRepository(backend, codec);
  const allocator = new IdAllocator(backend);
  const service = new ProductServiceImpl(repository, allocator);

  return { backend, repository, allocator, service };
}
