import { join } from 'path';
import { z } from 'zod';
import type { DurableBackend } from './backend.types';
import { StoreFailureError } from '../core/errors';
import { readJsonFile, writeJsonAtomic, ensureDir, fileExists } from '../utils/fsSafe';
import { logger } from '../core/logger';

// On-disk layout: the counter cell plus base64-encoded entries keyed by id
interface FileStoreState {
  counter: number;
  entries: Record<string, string>;
}

const FileStoreStateSchema = z.object({
  counter: z.number().int().min(0),
  entries: z.record(z.string()),
});

export const DEFAULT_STORE_FILE = 'product-store.json';

/**
 * Backend persisting the whole store as one JSON document.
 *
 * The document is loaded once and every mutation rewrites it atomically before
 * the in-memory copy is replaced, so a failed write leaves both untouched.
 */
export class FileBackend implements DurableBackend {
  readonly kind = 'file' as const;
  readonly filePath: string;
  private state: FileStoreState | null = null;

  constructor(private readonly dataDir: string, fileName = DEFAULT_STORE_FILE) {
    this.filePath = join(dataDir, fileName);
  }

  async readCounter(): Promise<number> {
    const state = await this.load();
    return state.counter;
  }

  async writeCounter(value: number): Promise<void> {
    const state = await this.load();
    await this.commit({ ...state, counter: value });
  }

  async readEntry(key: number): Promise<Uint8Array | undefined> {
    const state = await this.load();
    const encoded = state.entries[String(key)];
    return encoded === undefined ? undefined : Buffer.from(encoded, 'base64');
  }

  async writeEntry(key: number, bytes: Uint8Array): Promise<void> {
    const state = await this.load();
    await this.commit({
      ...state,
      entries: { ...state.entries, [String(key)]: Buffer.from(bytes).toString('base64') },
    });
  }

  async deleteEntry(key: number): Promise<Uint8Array | undefined> {
    const state = await this.load();
    const id = String(key);
    const encoded = state.entries[id];
    if (encoded === undefined) {
      return undefined;
    }

    const { [id]: _removed, ...entries } = state.entries;
    await this.commit({ ...state, entries });
    return Buffer.from(encoded, 'base64');
  }

  private async load(): Promise<FileStoreState> {
    if (this.state) {
      return this.state;
    }

    try {
      await ensureDir(this.dataDir);
      if (!(await fileExists(this.filePath))) {
        logger.info({ filePath: this.filePath }, 'No store file found, starting empty');
        this.state = { counter: 0, entries: {} };
        return this.state;
      }

      const raw = await readJsonFile(this.filePath);
      const parsed = FileStoreStateSchema.safeParse(raw);
      if (!parsed.success) {
        throw new StoreFailureError(`Store file ${this.filePath} is corrupt: ${parsed.error.message}`);
      }

      this.state = parsed.data;
      logger.info(
        { filePath: this.filePath, counter: this.state.counter, entries: Object.keys(this.state.entries).length },
        'Store file loaded'
      );
      return this.state;
    } catch (error) {
      if (error instanceof StoreFailureError) {
        throw error;
      }
      throw new StoreFailureError(`Failed to load store file ${this.filePath}`, { cause: error });
    }
  }

  private async commit(next: FileStoreState): Promise<void> {
    try {
      await writeJsonAtomic(this.filePath, next);
    } catch (error) {
      throw new StoreFailureError(`Failed to persist store file ${this.filePath}`, { cause: error });
    }
    this.state = next;
  }
}
