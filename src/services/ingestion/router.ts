/**
 * Format Pipeline Router
 *
 * Maps a file extension to one closed set of document formats and runs that
 * format's pipeline. Every format except video is wrapped in the
 * chunk-level dedup pass, scoped to the one document.
 *
 * @module services/ingestion/router
 */

import fs from 'fs';
import path from 'path';
import { dedupChunks } from '../dedup/signature.js';
import { documentIdFromFile, titleFromPath } from './identity.js';
import { IngestionError, UnsupportedFormatError } from './errors.js';
import { pdfChunks } from './pdf.js';
import { slideChunks } from './slides.js';
import { docxChunks } from './docx.js';
import { transcriptChunks } from './transcript.js';
import { videoChunks } from './video.js';
import type { IngestionContext } from './context.js';
import type { Chunk, ChunkingConfig } from '../../models/chunk.js';
import type { SourceDocument } from '../../models/document.js';

export type DocumentFormat = 'paginated' | 'slides' | 'word' | 'plain' | 'video';

const EXTENSION_FORMATS: Readonly<Record<string, DocumentFormat>> = {
  '.pdf': 'paginated',
  '.pptx': 'slides',
  '.docx': 'word',
  '.txt': 'plain',
  '.md': 'plain',
  '.mp4': 'video',
};

export const SUPPORTED_EXTENSIONS = Object.keys(EXTENSION_FORMATS);

/**
 * @throws UnsupportedFormatError for any extension outside the supported set
 */
export function detectFormat(filePath: string): DocumentFormat {
  const extension = path.extname(filePath).toLowerCase();
  const format = Object.hasOwn(EXTENSION_FORMATS, extension) ? EXTENSION_FORMATS[extension] : undefined;
  if (!format) throw new UnsupportedFormatError(filePath, extension);
  return format;
}

type Pipeline = (
  document: SourceDocument,
  budget: ChunkingConfig,
  ctx: IngestionContext
) => AsyncGenerator<Chunk>;

function pipelineFor(format: DocumentFormat): Pipeline {
  switch (format) {
    case 'paginated':
      return pdfChunks;
    case 'slides':
      return slideChunks;
    case 'word':
      return docxChunks;
    case 'plain':
      return transcriptChunks;
    case 'video':
      return videoChunks;
    default: {
      const unreachable: never = format;
      throw new Error(`Unhandled document format: ${String(unreachable)}`);
    }
  }
}

async function openDocument(filePath: string): Promise<SourceDocument> {
  const absolute = path.resolve(filePath);
  try {
    const stats = await fs.promises.stat(absolute);
    if (!stats.isFile()) {
      throw new IngestionError(`Path is not a file: ${absolute}`, 'FILE_NOT_FOUND', absolute);
    }
  } catch (error) {
    if (error instanceof IngestionError) throw error;
    throw new IngestionError(`File not found: ${absolute}`, 'FILE_NOT_FOUND', absolute, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  return {
    path: absolute,
    docId: await documentIdFromFile(absolute),
    title: titleFromPath(absolute),
  };
}

/**
 * Lazily produce the chunks of one file.
 *
 * The extension is checked before the file is touched, so an unsupported
 * file yields nothing.
 */
export async function* processFile(
  filePath: string,
  budget: ChunkingConfig,
  ctx: IngestionContext
): AsyncGenerator<Chunk> {
  const format = detectFormat(filePath);
  const document = await openDocument(filePath);
  const chunks = pipelineFor(format)(document, budget, ctx);

  console.error(`[router] ${path.basename(document.path)} -> ${format} (doc ${document.docId})`);

  if (format === 'video') {
    yield* chunks;
  } else {
    yield* dedupChunks(chunks);
  }
}
