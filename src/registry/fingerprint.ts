/**
 * Content fingerprinting
 *
 * Streams a file through SHA-256 in fixed-size blocks so memory use does
 * not grow with the file.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { IOError, errorMessage } from '../errors.js';

/** Read block size: 1 MiB */
export const HASH_BLOCK_SIZE = 1024 * 1024;

/**
 * Calculate the SHA-256 digest of a file
 * Returns full 64-char hex string
 */
export async function fingerprintFile(
  filePath: string,
  blockSize: number = HASH_BLOCK_SIZE
): Promise<string> {
  const hash = createHash('sha256');
  const stream = createReadStream(filePath, { highWaterMark: blockSize });

  try {
    for await (const chunk of stream) {
      hash.update(chunk);
    }
  } catch (err) {
    throw new IOError(filePath, `Failed to read ${filePath}: ${errorMessage(err)}`, { cause: err });
  }

  return hash.digest('hex');
}
