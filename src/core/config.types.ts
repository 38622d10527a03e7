export type StoreBackendKind = 'file' | 'memory';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface StoreConfig {
  // HTTP
  readonly PORT: number;

  // Persistence
  readonly STORE_BACKEND: StoreBackendKind;
  readonly DATA_DIR: string;
  readonly RECORD_MAX_BYTES: number;

  // Logging
  readonly LOG_LEVEL: LogLevel;
}
