/**
 * Paginated document pipeline
 *
 * Pass 1 reads every page for boilerplate detection and collects tables per
 * page. Pass 2 walks pages in order: boilerplate removal, recognition
 * fallback for sparse pages, page-level dedup, prose chunking, then the
 * page's tables, which are chunked whatever the prose dedup decided.
 *
 * @module services/ingestion/pdf
 */

import { countWords, normalizeText } from '../chunking/text-normalizer.js';
import { dropBoilerplate, findBoilerplate } from '../dedup/boilerplate.js';
import { DuplicateTracker } from '../dedup/signature.js';
import { createChunk } from './identity.js';
import {
  chunkUnit,
  PAGE_PROSE_MIN_WORDS,
  TABLE_MIN_WORDS,
  type IngestionContext,
} from './context.js';
import type { Chunk, ChunkingConfig } from '../../models/chunk.js';
import type { PageTables, SourceDocument } from '../../models/document.js';
import type { RecognitionResult } from '../recognition/recognizer.js';

/**
 * Recognize one rendered page. Returns null when recognition fails, yields
 * no text, or is not confident enough.
 */
async function recognizePage(
  document: SourceDocument,
  pageNumber: number,
  ctx: IngestionContext
): Promise<RecognitionResult | null> {
  try {
    const image = await ctx.extractor.renderPdfPage(document.path, pageNumber);
    const result = await ctx.recognizer.recognize(image);
    if (!result.text.trim()) return null;
    if (result.confidence === null || result.confidence <= ctx.settings.ocrConfidenceFloor) return null;
    return result;
  } catch (error) {
    console.error(
      `[pipeline/pdf] Recognition failed for page ${pageNumber} of ${document.title}:`,
      error instanceof Error ? error.message : String(error)
    );
    return null;
  }
}

async function readTables(document: SourceDocument, ctx: IngestionContext): Promise<PageTables> {
  try {
    return await ctx.extractor.readPdfTables(document.path);
  } catch (error) {
    console.error(
      `[pipeline/pdf] Table extraction failed for ${document.title}, continuing without tables:`,
      error instanceof Error ? error.message : String(error)
    );
    return new Map();
  }
}

export async function* pdfChunks(
  document: SourceDocument,
  budget: ChunkingConfig,
  ctx: IngestionContext
): AsyncGenerator<Chunk> {
  const { settings } = ctx;
  const pages = await ctx.extractor.readPdfPages(document.path);
  const boilerplate = findBoilerplate(
    pages.map((p) => p.text),
    settings.pdfBoilerplateFraction,
    settings.boilerplateMaxLineLength
  );
  const tables = await readTables(document, ctx);
  const seenPages = new DuplicateTracker();

  console.error(
    `[pipeline/pdf] ${document.title}: ${pages.length} pages, ${boilerplate.size} boilerplate lines`
  );

  for (const page of pages) {
    let text = normalizeText(dropBoilerplate(page.text, boilerplate));
    let caption: 'ocr' | null = null;
    let confidence: number | null = null;

    if (countWords(text) < settings.ocrFallbackWordThreshold) {
      const recognized = await recognizePage(document, page.pageNumber, ctx);
      if (recognized) {
        const candidate = normalizeText(dropBoilerplate(recognized.text, boilerplate));
        if (countWords(candidate) > countWords(text)) {
          text = candidate;
          caption = 'ocr';
          confidence = recognized.confidence;
        }
      }
    }

    if (seenPages.accept(text) && countWords(text) >= PAGE_PROSE_MIN_WORDS) {
      for (const piece of chunkUnit(text, budget, settings)) {
        yield createChunk(document, 'pdf', piece, { page: page.pageNumber, caption, confidence });
      }
    }

    for (const table of tables.get(page.pageNumber) ?? []) {
      const tableText = normalizeText(table);
      if (countWords(tableText) < TABLE_MIN_WORDS) continue;
      for (const piece of chunkUnit(tableText, budget, settings)) {
        yield createChunk(document, 'pdf', piece, { page: page.pageNumber, caption: 'table' });
      }
    }
  }
}
