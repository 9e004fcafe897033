/**
 * Extracted document units for docsift
 *
 * Shapes produced by the extraction adapters and consumed by the format
 * pipelines: pages, slides, word-processor blocks and transcript segments.
 */

/**
 * Raster image handed to the recognizer
 */
export interface ImageRef {
  width: number;
  height: number;
  /** Base64-encoded image bytes (PNG or the container's native format) */
  data: string;
}

export function imageArea(image: ImageRef): number {
  return image.width * image.height;
}

/**
 * Native text of one page of a paginated document
 */
export interface PdfPage {
  /** 1-based */
  pageNumber: number;
  text: string;
}

/**
 * Tables located per page, already rendered as markdown
 */
export type PageTables = Map<number, string[]>;

export interface Slide {
  /** 1-based */
  slideNumber: number;
  /** Concatenated shape text */
  text: string;
  /** Tabular shapes as markdown */
  tables: string[];
  images: ImageRef[];
}

/**
 * Formatting kinds that open a new section in a word-processor document
 */
export type FormattingKind = 'bigger_font' | 'underline' | 'bold' | 'italic' | 'paragraph_break';

/**
 * One block of a word-processor document, in body order
 */
export type DocxBlock =
  | { kind: 'heading'; level: number; text: string }
  | { kind: FormattingKind; text: string }
  | { kind: 'paragraph'; text: string }
  | { kind: 'table'; markdown: string }
  | { kind: 'image'; image: ImageRef };

export type DocxBlockKind = DocxBlock['kind'];

/**
 * Speech-recognition segment or merged time block (seconds)
 */
export interface TimedText {
  text: string;
  start: number;
  end: number;
}

/**
 * Source file identity shared by every pipeline
 */
export interface SourceDocument {
  /** Absolute path */
  path: string;
  docId: string;
  title: string;
}
