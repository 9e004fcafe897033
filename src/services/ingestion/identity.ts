/**
 * Document and chunk identity
 *
 * Document ids come from the file bytes, titles from the file name, and
 * stable chunk ids from (document, source type, locator, content) so that
 * re-ingesting an unchanged unit overwrites its index entry.
 *
 * @module services/ingestion/identity
 */

import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { computeSha1Hex, hashFile, hashHex } from '../../utils/hash.js';
import { chunkLocator, type Chunk, type ChunkLocation, type SourceType } from '../../models/chunk.js';
import type { SourceDocument } from '../../models/document.js';

const DOC_ID_LENGTH = 32;
const CONTENT_FINGERPRINT_LENGTH = 12;

/**
 * First 32 hex characters of the SHA-256 of the file bytes
 */
export async function documentIdFromFile(filePath: string): Promise<string> {
  return hashHex(await hashFile(filePath)).slice(0, DOC_ID_LENGTH);
}

/**
 * "quarterly_sales-report.pdf" -> "Quarterly Sales Report"
 */
export function titleFromPath(filePath: string): string {
  const stem = path.parse(filePath).name.replace(/[_-]/g, ' ').trim();
  return stem
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, lead: string, letter: string) => lead + letter.toUpperCase());
}

/**
 * `<docId>:<source>:<locator>:<sha1(locator|text) prefix>`
 */
export function stableChunkId(chunk: Chunk): string {
  const locator = chunkLocator(chunk);
  const fingerprint = computeSha1Hex(`${locator}|${chunk.text}`).slice(0, CONTENT_FINGERPRINT_LENGTH);
  return `${chunk.doc_id}:${chunk.source}:${locator}:${fingerprint}`;
}

/**
 * Document identifier embedded in a stable chunk id (prefix before the first ':')
 */
export function documentIdOf(stableId: string): string {
  const separator = stableId.indexOf(':');
  return separator === -1 ? stableId : stableId.slice(0, separator);
}

/**
 * Build one chunk record for an emitted text
 */
export function createChunk(
  document: SourceDocument,
  source: SourceType,
  text: string,
  location: ChunkLocation = {}
): Chunk {
  return {
    doc_id: document.docId,
    chunk_id: uuidv4(),
    source,
    title: document.title,
    page: location.page ?? null,
    slide: location.slide ?? null,
    timecode: location.timecode ?? null,
    section: location.section ?? null,
    text,
    caption: location.caption ?? null,
    confidence: location.confidence ?? null,
    created_at: new Date().toISOString(),
  };
}
