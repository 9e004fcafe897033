/**
 * Document extraction adapters
 *
 * Raw per-unit content for the format pipelines: page text, page tables as
 * markdown, page renders, slides, word-processor blocks and plain text.
 * Container parsing runs in python/extract_worker.py; payloads are validated
 * with zod before they reach the pipelines.
 *
 * @module services/extraction/extractor
 */

import fs from 'fs';
import { z } from 'zod';
import { runPythonWorker, WorkerError, type WorkerRunOptions } from '../python/worker.js';
import type { DocxBlock, ImageRef, PageTables, PdfPage, Slide } from '../../models/document.js';

export interface DocumentExtractor {
  readPdfPages(filePath: string): Promise<PdfPage[]>;
  readPdfTables(filePath: string): Promise<PageTables>;
  /** Raster render of one 1-based page, for recognition */
  renderPdfPage(filePath: string, pageNumber: number): Promise<ImageRef>;
  readSlides(filePath: string): Promise<Slide[]>;
  /** Blocks in document body order */
  readDocxBlocks(filePath: string): Promise<DocxBlock[]>;
  readPlainText(filePath: string): Promise<string>;
}

// ═══════════════════════════════════════════════════════════════════════════════
// WORKER PAYLOAD SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const ImageSchema = z.object({
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
  data: z.string(),
});

const PagesPayload = z.object({
  pages: z.array(z.object({ page: z.number().int().positive(), text: z.string() })),
});

const TablesPayload = z.object({
  tables: z.array(z.object({ page: z.number().int().positive(), markdown: z.string() })),
});

const RenderPayload = z.object({ image: ImageSchema });

const SlidesPayload = z.object({
  slides: z.array(
    z.object({
      slide: z.number().int().positive(),
      text: z.string(),
      tables: z.array(z.string()),
      images: z.array(ImageSchema),
    })
  ),
});

const BlockSchema = z.union([
  z.object({ kind: z.literal('heading'), level: z.number().int(), text: z.string() }),
  z.object({
    kind: z.enum(['bigger_font', 'underline', 'bold', 'italic', 'paragraph_break', 'paragraph']),
    text: z.string(),
  }),
  z.object({ kind: z.literal('table'), markdown: z.string() }),
  z.object({ kind: z.literal('image'), image: ImageSchema }),
]);

const BlocksPayload = z.object({ blocks: z.array(BlockSchema) });

const EXTRACT_SCRIPT = 'extract_worker.py';

function parsePayload<T>(schema: z.ZodSchema<T>, payload: unknown, operation: string): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new WorkerError(`Malformed ${operation} payload from ${EXTRACT_SCRIPT}`, 'PARSE_ERROR', {
      issues: result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`),
    });
  }
  return result.data;
}

/**
 * Extractor backed by python/extract_worker.py
 */
export class PythonDocumentExtractor implements DocumentExtractor {
  constructor(private readonly options: WorkerRunOptions) {}

  private async run<T>(schema: z.ZodSchema<T>, operation: string, args: string[]): Promise<T> {
    const payload = await runPythonWorker(
      EXTRACT_SCRIPT,
      ['--op', operation, ...args],
      undefined,
      this.options
    );
    return parsePayload(schema, payload, operation);
  }

  async readPdfPages(filePath: string): Promise<PdfPage[]> {
    const { pages } = await this.run(PagesPayload, 'pdf_pages', ['--path', filePath]);
    return pages.map((p) => ({ pageNumber: p.page, text: p.text }));
  }

  async readPdfTables(filePath: string): Promise<PageTables> {
    const { tables } = await this.run(TablesPayload, 'pdf_tables', ['--path', filePath]);
    const byPage: PageTables = new Map();
    for (const table of tables) {
      const list = byPage.get(table.page) ?? [];
      list.push(table.markdown);
      byPage.set(table.page, list);
    }
    return byPage;
  }

  async renderPdfPage(filePath: string, pageNumber: number): Promise<ImageRef> {
    const { image } = await this.run(RenderPayload, 'pdf_render', [
      '--path',
      filePath,
      '--page',
      String(pageNumber),
    ]);
    return image;
  }

  async readSlides(filePath: string): Promise<Slide[]> {
    const { slides } = await this.run(SlidesPayload, 'pptx_slides', ['--path', filePath]);
    return slides.map((s) => ({
      slideNumber: s.slide,
      text: s.text,
      tables: s.tables,
      images: s.images,
    }));
  }

  async readDocxBlocks(filePath: string): Promise<DocxBlock[]> {
    const { blocks } = await this.run(BlocksPayload, 'docx_blocks', ['--path', filePath]);
    return blocks;
  }

  async readPlainText(filePath: string): Promise<string> {
    // Invalid UTF-8 sequences decode to U+FFFD
    const buffer = await fs.promises.readFile(filePath);
    return buffer.toString('utf8');
  }
}
