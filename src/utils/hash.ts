/**
 * Hash Utilities
 *
 * Content hashing for document identifiers, dedup signatures and stable
 * chunk identifiers. SHA-256 hashes use the format 'sha256:' + 64 lowercase
 * hex characters.
 *
 * @module utils/hash
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';

/**
 * Hash prefix used for all SHA-256 hashes in this system
 */
const HASH_PREFIX = 'sha256:';

/**
 * Compute SHA-256 hash of content
 *
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  return HASH_PREFIX + crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Strip the 'sha256:' prefix, leaving the hex digest
 */
export function hashHex(hash: string): string {
  return hash.startsWith(HASH_PREFIX) ? hash.slice(HASH_PREFIX.length) : hash;
}

/**
 * SHA-1 hex digest, used only for short content fingerprints in identifiers
 */
export function computeSha1Hex(content: string): string {
  return crypto.createHash('sha1').update(content).digest('hex');
}

/**
 * Compute SHA-256 hash of a file using streaming
 *
 * @param filePath - Absolute path to file
 * @returns Hash in format 'sha256:' + 64-char hex string
 * @throws Error if file doesn't exist, path is not absolute, or can't be read
 */
export async function hashFile(filePath: string): Promise<string> {
  if (!path.isAbsolute(filePath)) {
    throw new Error(`Path must be absolute: ${filePath}`);
  }

  try {
    await fs.promises.access(filePath, fs.constants.R_OK);
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    if (code === 'EACCES') {
      throw new Error(`Permission denied: ${filePath}`);
    }
    throw new Error(
      `Cannot access file: ${filePath} - ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const stats = await fs.promises.stat(filePath);
  if (!stats.isFile()) {
    throw new Error(`Path is not a file: ${filePath}`);
  }

  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve(HASH_PREFIX + hash.digest('hex'));
    });

    stream.on('error', (error: NodeJS.ErrnoException) => {
      stream.destroy();
      if (error.code === 'ENOENT') {
        reject(new Error(`File not found: ${filePath}`));
      } else if (error.code === 'EACCES') {
        reject(new Error(`Permission denied: ${filePath}`));
      } else {
        reject(new Error(`Error reading file: ${filePath} - ${error.message}`));
      }
    });
  });
}
