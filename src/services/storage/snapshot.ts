/**
 * Chunk snapshots
 *
 * Writes the chunks produced for one file to `<dir>/<file stem>.json` so a
 * run can be inspected without querying the index. A later run over a file
 * with the same stem replaces the snapshot.
 *
 * @module services/storage/snapshot
 */

import { existsSync, mkdirSync } from 'fs';
import { writeFile } from 'fs/promises';
import path from 'path';
import { IndexError, IndexErrorCode } from './types.js';
import type { Chunk } from '../../models/chunk.js';

export function snapshotPath(dir: string, sourcePath: string): string {
  const stem = path.basename(sourcePath, path.extname(sourcePath));
  return path.join(path.resolve(dir), `${stem}.json`);
}

/**
 * @returns Absolute path of the written snapshot
 * @throws IndexError SNAPSHOT_WRITE_FAILED when the file cannot be written
 */
export async function saveChunks(dir: string, sourcePath: string, chunks: Chunk[]): Promise<string> {
  const outputPath = snapshotPath(dir, sourcePath);

  try {
    const parent = path.dirname(outputPath);
    if (!existsSync(parent)) {
      mkdirSync(parent, { recursive: true });
    }
    await writeFile(outputPath, JSON.stringify(chunks, null, 2), 'utf-8');
  } catch (error) {
    throw new IndexError(
      `Failed to write chunk snapshot: ${outputPath}`,
      IndexErrorCode.SNAPSHOT_WRITE_FAILED,
      error
    );
  }

  return outputPath;
}
