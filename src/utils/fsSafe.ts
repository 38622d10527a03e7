import { promises as fs } from 'fs';
import { join, dirname } from 'path';
import { randomUUID } from 'crypto';
import { logger } from '../core/logger';

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// JSON file read; parse failures propagate to the caller
export async function readJsonFile(filePath: string): Promise<unknown> {
  const data = await fs.readFile(filePath, 'utf8');
  return JSON.parse(data);
}

// Atomic JSON file write: temp file in the same directory, then rename over the target
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const jsonData = JSON.stringify(data, null, 2);
  const tempPath = join(dirname(filePath), `.${randomUUID()}.tmp`);

  try {
    await fs.writeFile(tempPath, jsonData, 'utf8');
    await fs.rename(tempPath, filePath);
    logger.debug({ filePath }, 'File written atomically');
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw error;
  }
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}
