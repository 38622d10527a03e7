import type { StoreBackendKind } from '../core/config.types';

/**
 * Durable key-value storage consumed by the allocator and the product repository.
 *
 * Holds one scalar counter cell and one map from integer key to opaque bytes.
 * Implementations must make every write durable before the returned promise
 * resolves, and must hand out copies so callers cannot alias stored bytes.
 */
export interface DurableBackend {
  readonly kind: StoreBackendKind;

  readCounter(): Promise<number>;
  writeCounter(value: number): Promise<void>;

  readEntry(key: number): Promise<Uint8Array | undefined>;
  writeEntry(key: number, bytes: Uint8Array): Promise<void>;
  /** Removes the entry and returns its previous bytes, if any. */
  deleteEntry(key: number): Promise<Uint8Array | undefined>;
}
