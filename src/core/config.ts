/**
 * Store configuration
 *
 * Environment-driven configuration with typed defaults. Invalid values are
 * reported on stderr and replaced by the default.
 */

import type { LogLevel, StoreBackendKind, StoreConfig } from './config.types';
import { type Env, parseNonEmptyString, parseOneOf, parsePositiveInt } from './config.utils';

export type { LogLevel, StoreBackendKind, StoreConfig } from './config.types';

export const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];
export const STORE_BACKENDS: readonly StoreBackendKind[] = ['file', 'memory'];

const MAX_PORT = 65535;

function defaultLogLevel(env: Env): LogLevel {
  // Keep test output clean unless a level is asked for
  return env['VITEST'] === 'true' || env['NODE_ENV'] === 'test' ? 'silent' : 'info';
}

/**
 * Build a frozen configuration from an environment map
 */
export function loadConfig(env: Env = process.env): StoreConfig {
  return Object.freeze({
    PORT: parsePositiveInt(env, 'PORT', 3000, MAX_PORT),

    STORE_BACKEND: parseOneOf(env, 'STORE_BACKEND', 'file', STORE_BACKENDS),
    DATA_DIR: parseNonEmptyString(env, 'DATA_DIR', 'data'),
    RECORD_MAX_BYTES: parsePositiveInt(env, 'RECORD_MAX_BYTES', 1024),

    LOG_LEVEL: parseOneOf(env, 'LOG_LEVEL', defaultLogLevel(env), LOG_LEVELS),
  });
}

export const config: StoreConfig = loadConfig();

/**
 * Get configuration value by key
 */
export function getConfigValue<K extends keyof StoreConfig>(key: K): StoreConfig[K] {
  return config[key];
}

/**
 * Check a configuration for values the parsers cannot rule out on their own
 */
export function validateConfig(candidate: StoreConfig = config): string[] {
  const issues: string[] = [];

  if (candidate.RECORD_MAX_BYTES < 64) {
    issues.push('RECORD_MAX_BYTES must be at least 64');
  }

  if (candidate.STORE_BACKEND === 'file' && candidate.DATA_DIR.length === 0) {
    issues.push('DATA_DIR is required for the file backend');
  }

  return issues;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(candidate: StoreConfig = config): Record<string, unknown> {
  return {
    http: {
      port: candidate.PORT,
    },
    storage: {
      backend: candidate.STORE_BACKEND,
      dataDir: candidate.STORE_BACKEND === 'file' ? candidate.DATA_DIR : undefined,
      recordMaxBytes: candidate.RECORD_MAX_BYTES,
    },
    logging: {
      level: candidate.LOG_LEVEL,
    },
  };
}
