/**
 * Duplicate Signatures
 *
 * Canonical forms of text spans, hashed to fixed-length signatures, and a
 * seen-set that rejects repeats. Used per page/slide inside one document and
 * per emitted chunk as a final safety net.
 *
 * @module services/dedup/signature
 */

import { computeHash } from '../../utils/hash.js';
import type { Chunk } from '../../models/chunk.js';

/** Page-number-only line: "12", "Page 3", "page3" */
const PAGE_NUMBER_LINE = /^\s*(page\s*\d+|\d+)\s*$/i;

/**
 * Lower-cased canonical form: page-number-only and blank lines removed,
 * one trailing period stripped per line, lines joined with ". ", horizontal
 * whitespace collapsed.
 */
export function canonicalizeForHash(text: string): string {
  const lines: string[] = [];
  for (const raw of text.split(/\r\n|\r|\n/)) {
    const line = raw.trim();
    if (!line || PAGE_NUMBER_LINE.test(line)) continue;
    lines.push(line.endsWith('.') ? line.slice(0, -1) : line);
  }
  return lines.join('. ').replace(/[ \t]+/g, ' ').trim().toLowerCase();
}

export function signature(text: string): string {
  return computeHash(canonicalizeForHash(text));
}

/**
 * Insert-if-absent check: true when the signature was already seen,
 * otherwise records it and returns false.
 */
export function isDuplicate(digest: string, seen: Set<string>): boolean {
  if (seen.has(digest)) return true;
  seen.add(digest);
  return false;
}

/**
 * Signature tracker for one document or one run.
 * Units with an empty canonical form are rejected without being recorded.
 */
export class DuplicateTracker {
  private readonly seen = new Set<string>();

  /**
   * @returns false when the unit should be skipped (empty or already seen)
   */
  accept(text: string): boolean {
    const canonical = canonicalizeForHash(text);
    if (!canonical) return false;
    return !isDuplicate(computeHash(canonical), this.seen);
  }

  get size(): number {
    return this.seen.size;
  }
}

/**
 * Corpus-level safety net: drops chunks whose canonical text was already
 * emitted within the same sequence.
 */
export async function* dedupChunks(chunks: AsyncIterable<Chunk>): AsyncGenerator<Chunk> {
  const tracker = new DuplicateTracker();
  for await (const chunk of chunks) {
    if (tracker.accept(chunk.text)) yield chunk;
  }
}
