/**
 * Word-processor document pipeline
 *
 * Blocks are fed one at a time to a SectionSegmenter, which groups prose
 * into sections on heading and formatting boundaries and reports tables and
 * large images as they arrive. The pipeline turns its events into chunks.
 *
 * @module services/ingestion/docx
 */

import { countWords, normalizeText } from '../chunking/text-normalizer.js';
import { recognizeImages } from '../recognition/recognizer.js';
import { createChunk } from './identity.js';
import { chunkUnit, type IngestionContext } from './context.js';
import {
  imageArea,
  type DocxBlock,
  type DocxBlockKind,
  type ImageRef,
  type SourceDocument,
} from '../../models/document.js';
import type { Chunk, ChunkingConfig } from '../../models/chunk.js';

/** Blocks accumulated after a reset before formatting boundaries are trusted */
export const WARMUP_BLOCKS = 3;

/** Headings at this level or above (numerically at or below) open a section */
export const MAX_SECTION_HEADING_LEVEL = 3;

const FORMATTING_BOUNDARIES = new Set<DocxBlockKind>([
  'bigger_font',
  'underline',
  'bold',
  'italic',
  'paragraph_break',
]);

export type SegmenterEvent =
  | { type: 'prose'; section: string; chunks: string[] }
  | { type: 'table'; chunks: string[] }
  | { type: 'image'; image: ImageRef };

/**
 * Section state machine for word-processor blocks.
 *
 * Holds the prose buffer, the current section label and the number of
 * blocks since the last reset. While fewer than WARMUP_BLOCKS blocks have
 * been buffered no boundary is honoured; the first block after a reset
 * seeds the section label.
 */
export class SectionSegmenter {
  private buffer: string[] = [];
  private label = 'paragraph';
  private blockCount = 0;

  constructor(
    private readonly chunk: (text: string) => string[],
    private readonly largeImageArea: number
  ) {}

  get section(): string {
    return this.label;
  }

  get buffered(): number {
    return this.buffer.length;
  }

  feed(block: DocxBlock): SegmenterEvent[] {
    if (block.kind === 'table') {
      const events = this.flushEvents();
      const markdown = normalizeText(block.markdown);
      if (markdown) events.push({ type: 'table', chunks: this.chunk(markdown) });
      this.blockCount = 0;
      return events;
    }

    if (block.kind === 'image') {
      if (imageArea(block.image) <= this.largeImageArea) return [];
      const events = this.flushEvents();
      events.push({ type: 'image', image: block.image });
      this.blockCount = 0;
      return events;
    }

    const text = block.text.trim() ? block.text : '';

    if (this.blockCount < WARMUP_BLOCKS) {
      if (this.blockCount === 0) this.label = block.kind;
      this.append(text);
      return [];
    }

    if (this.opensSection(block)) {
      const events = this.flushEvents();
      this.label = block.kind;
      this.append(text);
      return events;
    }

    this.append(text);
    return [];
  }

  /**
   * Chunk and clear the prose buffer. An empty buffer leaves state untouched.
   */
  flush(): string[] {
    if (this.buffer.length === 0) return [];
    const text = normalizeText(this.buffer.join('\n'));
    this.buffer = [];
    this.blockCount = 0;
    return text ? this.chunk(text) : [];
  }

  /**
   * End of block stream: flush whatever prose remains
   */
  finish(): SegmenterEvent[] {
    return this.flushEvents();
  }

  private opensSection(block: DocxBlock): boolean {
    if (block.kind === 'heading') return block.level <= MAX_SECTION_HEADING_LEVEL;
    return FORMATTING_BOUNDARIES.has(block.kind) && block.kind !== this.label;
  }

  private append(text: string): void {
    if (!text) return;
    this.buffer.push(text);
    this.blockCount++;
  }

  private flushEvents(): SegmenterEvent[] {
    const section = this.label;
    const chunks = this.flush();
    return chunks.length > 0 ? [{ type: 'prose', section, chunks }] : [];
  }
}

async function* eventChunks(
  events: SegmenterEvent[],
  document: SourceDocument,
  budget: ChunkingConfig,
  ctx: IngestionContext
): AsyncGenerator<Chunk> {
  for (const event of events) {
    switch (event.type) {
      case 'prose':
        for (const piece of event.chunks) {
          yield createChunk(document, 'docx', piece, { section: event.section });
        }
        break;
      case 'table':
        for (const piece of event.chunks) {
          yield createChunk(document, 'docx', piece, { section: 'table', caption: 'table' });
        }
        break;
      case 'image': {
        const recognized = await recognizeImages(
          ctx.recognizer,
          [event.image],
          ctx.settings.ocrConfidenceFloor
        );
        const text = normalizeText(recognized.text);
        if (countWords(text) < ctx.settings.ocrMinWords) break;
        for (const piece of chunkUnit(text, budget, ctx.settings)) {
          yield createChunk(document, 'docx', piece, {
            section: 'image',
            caption: 'ocr',
            confidence: recognized.confidence,
          });
        }
        break;
      }
    }
  }
}

export async function* docxChunks(
  document: SourceDocument,
  budget: ChunkingConfig,
  ctx: IngestionContext
): AsyncGenerator<Chunk> {
  const blocks = await ctx.extractor.readDocxBlocks(document.path);
  const segmenter = new SectionSegmenter(
    (text) => chunkUnit(text, budget, ctx.settings),
    ctx.settings.largeImageArea
  );

  console.error(`[pipeline/docx] ${document.title}: ${blocks.length} blocks`);

  for (const block of blocks) {
    yield* eventChunks(segmenter.feed(block), document, budget, ctx);
  }
  yield* eventChunks(segmenter.finish(), document, budget, ctx);
}
