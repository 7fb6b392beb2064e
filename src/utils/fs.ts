/**
 * File system utilities with atomic write support
 */

import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { randomUUID } from 'crypto';

/**
 * Atomic write: write to temp file then rename
 * Readers never observe a half-written snapshot
 */
export async function atomicWriteFile(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tmpPath = join(dir, `.${randomUUID()}.tmp`);
  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    // Clean up temp file on error
    await fs.rm(tmpPath, { force: true });
    throw error;
  }
}

/**
 * Read file safely, return null if not found
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * True for ENOENT errors
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
