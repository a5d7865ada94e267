/**
 * JSON file primitives for the stores.
 *
 * Writes go to a temporary sibling, are synced to disk and then renamed
 * over the target, so a reader sees either the old file or the new one.
 */

import { mkdir, open, readFile, rename, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { z } from 'zod';
import { isErrnoException } from '../ledger/ledger.js';
import { StoreError, StoreErrorCode } from './types.js';

/**
 * Read and validate a JSON file. Returns null when the file does not exist.
 */
export async function readJsonFile<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S
): Promise<z.output<S> | null> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw StoreError.fromError(error, StoreErrorCode.READ_FAILED, filePath);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new StoreError(
      `${filePath} is not valid JSON`,
      StoreErrorCode.CORRUPT_DATA,
      error instanceof Error ? { filePath, cause: error } : { filePath }
    );
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new StoreError(
      `${filePath} does not match the expected layout: ${result.error.message}`,
      StoreErrorCode.CORRUPT_DATA,
      { filePath }
    );
  }
  return result.data;
}

/**
 * Write JSON atomically (temp file, fsync, rename)
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;

  try {
    await mkdir(dirname(filePath), { recursive: true });

    const handle = await open(tempPath, 'w');
    try {
      await handle.writeFile(`${JSON.stringify(data, null, 2)}\n`, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    await rename(tempPath, filePath);
  } catch (error) {
    await removeFile(tempPath).catch(() => false);
    throw StoreError.fromError(error, StoreErrorCode.WRITE_FAILED, filePath);
  }
}

/**
 * Delete a file. Returns false when it did not exist.
 */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await unlink(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw StoreError.fromError(error, StoreErrorCode.WRITE_FAILED, filePath);
  }
}
