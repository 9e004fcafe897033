/**
 * Shared fixtures and in-process stand-ins for unit tests
 *
 * @module tests/unit/helpers
 */

import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { TEMP_DIR_PREFIX } from '../global-teardown.js';
import type { Chunk } from '../../src/models/chunk.js';
import type {
  DocxBlock,
  ImageRef,
  PageTables,
  PdfPage,
  Slide,
  SourceDocument,
  TimedText,
} from '../../src/models/document.js';
import type { FusedResult, IndexedChunk, SearchHit } from '../../src/models/search.js';
import type { DocumentExtractor } from '../../src/services/extraction/extractor.js';
import type {
  ImageRecognizer,
  RecognitionResult,
  SpeechRecognizer,
  TranscriptionResult,
} from '../../src/services/recognition/recognizer.js';
import type { VideoSegments, VideoTools } from '../../src/services/ingestion/video-tools.js';
import type { IngestionContext, IngestionSettings } from '../../src/services/ingestion/context.js';
import type { EmbeddingProvider } from '../../src/services/embedding/embedder.js';
import type { AnswerGenerator } from '../../src/services/generation/answer.js';

// ═══════════════════════════════════════════════════════════════════════════════
// FILESYSTEM
// ═══════════════════════════════════════════════════════════════════════════════

export function createTestDir(label: string): string {
  return mkdtempSync(join(tmpdir(), `${TEMP_DIR_PREFIX}${label}-`));
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECORD FACTORIES
// ═══════════════════════════════════════════════════════════════════════════════

export const TEST_DOCUMENT: SourceDocument = {
  path: '/data/handbook.pdf',
  docId: 'd0c5d0c5d0c5d0c5d0c5d0c5d0c5d0c5',
  title: 'Handbook',
};

export function makeChunk(overrides: Partial<Chunk> = {}): Chunk {
  return {
    doc_id: TEST_DOCUMENT.docId,
    chunk_id: '00000000-0000-4000-8000-000000000001',
    source: 'pdf',
    title: TEST_DOCUMENT.title,
    page: 1,
    slide: null,
    timecode: null,
    section: null,
    text: 'Employees accrue vacation days monthly.',
    caption: null,
    confidence: null,
    created_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function makeIndexed(id: string, overrides: Partial<Chunk> = {}): IndexedChunk {
  return { ...makeChunk(overrides), id };
}

export function makeHit(id: string, score = 1, overrides: Partial<SearchHit> = {}): SearchHit {
  return { ...makeIndexed(id), score, snippet: null, ...overrides };
}

export function makeFused(id: string, overrides: Partial<FusedResult> = {}): FusedResult {
  return {
    ...makeHit(id),
    fused_score: 0.05,
    vector_rank: 1,
    lexical_rank: null,
    ...overrides,
  };
}

export function makeImage(width: number, height: number, data = 'aW1n'): ImageRef {
  return { width, height, data };
}

/** N distinct lowercase words: "w1 w2 ... wN" with a given prefix */
export function words(count: number, prefix = 'w'): string {
  return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`).join(' ');
}

// ═══════════════════════════════════════════════════════════════════════════════
// INGESTION STAND-INS
// ═══════════════════════════════════════════════════════════════════════════════

export const TEST_SETTINGS: IngestionSettings = {
  tokenHeadroom: 64,
  pdfBoilerplateFraction: 0.6,
  slideBoilerplateFraction: 0.7,
  boilerplateMaxLineLength: 120,
  ocrFallbackWordThreshold: 10,
  ocrConfidenceFloor: 95,
  ocrMinWords: 8,
  largeImageArea: 150_000,
  blockMaxSecs: 60,
  blockMaxChars: 1200,
  blockGapSecs: 1.5,
};

export const TEST_BUDGET = { maxTokens: 512, overlapTokens: 120 };

export interface FakeExtractorContent {
  pages?: PdfPage[];
  tables?: PageTables | Error;
  renders?: Map<number, ImageRef>;
  slides?: Slide[];
  blocks?: DocxBlock[];
  text?: string;
}

export class FakeExtractor implements DocumentExtractor {
  readonly rendered: number[] = [];

  constructor(private readonly content: FakeExtractorContent = {}) {}

  async readPdfPages(_filePath: string): Promise<PdfPage[]> {
    return this.content.pages ?? [];
  }

  async readPdfTables(_filePath: string): Promise<PageTables> {
    const tables = this.content.tables;
    if (tables instanceof Error) throw tables;
    return tables ?? new Map();
  }

  async renderPdfPage(_filePath: string, pageNumber: number): Promise<ImageRef> {
    this.rendered.push(pageNumber);
    return this.content.renders?.get(pageNumber) ?? makeImage(1700, 2200, `page-${pageNumber}`);
  }

  async readSlides(_filePath: string): Promise<Slide[]> {
    return this.content.slides ?? [];
  }

  async readDocxBlocks(_filePath: string): Promise<DocxBlock[]> {
    return this.content.blocks ?? [];
  }

  async readPlainText(_filePath: string): Promise<string> {
    return this.content.text ?? '';
  }
}

/**
 * Recognizer answering by image data; unknown images throw
 */
export class FakeRecognizer implements ImageRecognizer {
  readonly seen: string[] = [];

  constructor(private readonly results: Record<string, RecognitionResult> = {}) {}

  async recognize(image: ImageRef): Promise<RecognitionResult> {
    this.seen.push(image.data);
    const result = this.results[image.data];
    if (!result) throw new Error(`no recognition result for ${image.data}`);
    return result;
  }
}

export class FakeSpeech implements SpeechRecognizer {
  readonly transcribed: string[] = [];

  constructor(private readonly byPath: Record<string, TimedText[]> = {}) {}

  async transcribe(mediaPath: string): Promise<TranscriptionResult> {
    this.transcribed.push(mediaPath);
    return { segments: this.byPath[mediaPath] ?? [], language: 'en' };
  }
}

export class FakeVideoTools implements VideoTools {
  released = 0;

  constructor(
    private readonly durations: Record<string, number>,
    private readonly segmentPaths: string[] | null = null
  ) {}

  async probeDuration(filePath: string): Promise<number> {
    const duration = this.durations[filePath];
    if (duration === undefined) throw new Error(`no duration for ${filePath}`);
    return duration;
  }

  async splitBySize(filePath: string): Promise<VideoSegments> {
    return {
      paths: this.segmentPaths ?? [filePath],
      release: async () => {
        this.released++;
      },
    };
  }
}

export function makeContext(overrides: Partial<IngestionContext> = {}): IngestionContext {
  return {
    extractor: new FakeExtractor(),
    recognizer: new FakeRecognizer(),
    speech: new FakeSpeech(),
    video: new FakeVideoTools({}),
    settings: { ...TEST_SETTINGS },
    ...overrides,
  };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICE STAND-INS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Deterministic 4-dimensional embedder: texts mentioning a keyword point
 * along that keyword's axis.
 */
export class KeywordEmbedder implements EmbeddingProvider {
  readonly calls: string[][] = [];

  constructor(private readonly axes: string[] = ['vacation', 'expense', 'security', 'travel']) {}

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => {
      const lower = text.toLowerCase();
      const vector = this.axes.map((axis) => (lower.includes(axis) ? 1 : 0));
      return vector.some((v) => v > 0) ? vector : this.axes.map(() => 0.5);
    });
  }
}

export class FakeGenerator implements AnswerGenerator {
  readonly calls: Array<{ query: string; contexts: FusedResult[] }> = [];

  constructor(private readonly answer = 'Vacation accrues monthly [Handbook, p.1].') {}

  async generate(query: string, contexts: FusedResult[]): Promise<string> {
    this.calls.push({ query, contexts });
    return this.answer;
  }
}
