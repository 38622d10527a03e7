import type { DurableBackend } from './backend.types';

// In-process backend; durable only for the lifetime of the process
export class MemoryBackend implements DurableBackend {
  readonly kind = 'memory' as const;
  private counter = 0;
  private entries = new Map<number, Uint8Array>();

  async readCounter(): Promise<number> {
    return this.counter;
  }

  async writeCounter(value: number): Promise<void> {
    this.counter = value;
  }

  async readEntry(key: number): Promise<Uint8Array | undefined> {
    const bytes = this.entries.get(key);
    return bytes ? Uint8Array.from(bytes) : undefined;
  }

  async writeEntry(key: number, bytes: Uint8Array): Promise<void> {
    this.entries.set(key, Uint8Array.from(bytes));
  }

  async deleteEntry(key: number): Promise<Uint8Array | undefined> {
    const bytes = this.entries.get(key);
    this.entries.delete(key);
    return bytes;
  }

  get size(): number {
    return this.entries.size;
  }
}
