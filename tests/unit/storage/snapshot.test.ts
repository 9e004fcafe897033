/**
 * Unit tests for per-file chunk snapshots
 *
 * @module tests/unit/storage/snapshot
 */

import { describe, it, expect, afterAll } from 'vitest';
import { readFileSync, rmSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { saveChunks, snapshotPath } from '../../../src/services/storage/snapshot.js';
import { IndexError, IndexErrorCode } from '../../../src/services/storage/types.js';
import { createTestDir, makeChunk } from '../helpers.js';

describe('snapshotPath', () => {
  it('names the snapshot after the source file stem', () => {
    expect(snapshotPath('data/chunks', '/docs/Annual Report.pdf')).toBe(resolve('data/chunks', 'Annual Report.json'));
  });
});

describe('saveChunks', () => {
  const dir = createTestDir('snapshot');

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the directory and writes the chunks as indented JSON', async () => {
    const chunks = [makeChunk({ page: 1 }), makeChunk({ page: 2, text: 'Second page.' })];
    const target = join(dir, 'out', 'nested');

    const written = await saveChunks(target, '/docs/handbook.pdf', chunks);

    expect(written).toBe(join(target, 'handbook.json'));
    const content = readFileSync(written, 'utf-8');
    expect(content).toBe(JSON.stringify(chunks, null, 2));
  });

  it('overwrites an earlier snapshot of the same stem', async () => {
    await saveChunks(dir, '/a/notes.txt', [makeChunk({ text: 'first' })]);
    const written = await saveChunks(dir, '/b/notes.md', [makeChunk({ text: 'second' })]);

    expect(JSON.parse(readFileSync(written, 'utf-8'))).toEqual([makeChunk({ text: 'second' })]);
  });

  it('raises SNAPSHOT_WRITE_FAILED when the directory cannot be created', async () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory');

    const error = await saveChunks(join(blocker, 'sub'), '/docs/x.pdf', []).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IndexError);
    if (error instanceof IndexError) expect(error.code).toBe(IndexErrorCode.SNAPSHOT_WRITE_FAILED);
  });
});
