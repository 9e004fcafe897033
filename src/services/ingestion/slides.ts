/**
 * Slide deck pipeline
 *
 * Boilerplate is detected across all slides first. Each slide's shape text,
 * tables and recognized large-image text are combined into one signature so
 * a repeated slide is skipped before any of its chunks are emitted.
 *
 * @module services/ingestion/slides
 */

import { countWords, normalizeText } from '../chunking/text-normalizer.js';
import { dropBoilerplate, findBoilerplate } from '../dedup/boilerplate.js';
import { DuplicateTracker } from '../dedup/signature.js';
import { recognizeImages, type CombinedRecognition } from '../recognition/recognizer.js';
import { createChunk } from './identity.js';
import { chunkUnit, SLIDE_TEXT_MIN_WORDS, type IngestionContext } from './context.js';
import { imageArea, type Slide, type SourceDocument } from '../../models/document.js';
import type { Chunk, ChunkingConfig } from '../../models/chunk.js';

const NO_RECOGNITION: CombinedRecognition = { text: '', confidence: null };

async function recognizeSlide(
  slide: Slide,
  document: SourceDocument,
  ctx: IngestionContext
): Promise<CombinedRecognition> {
  const large = slide.images.filter((image) => imageArea(image) > ctx.settings.largeImageArea);
  if (large.length === 0) return NO_RECOGNITION;
  const combined = await recognizeImages(ctx.recognizer, large, ctx.settings.ocrConfidenceFloor);
  if (combined.text) {
    console.error(
      `[pipeline/slides] ${document.title} slide ${slide.slideNumber}: recognized ${large.length} images`
    );
  }
  return { text: normalizeText(combined.text), confidence: combined.confidence };
}

export async function* slideChunks(
  document: SourceDocument,
  budget: ChunkingConfig,
  ctx: IngestionContext
): AsyncGenerator<Chunk> {
  const { settings } = ctx;
  const slides = await ctx.extractor.readSlides(document.path);
  const boilerplate = findBoilerplate(
    slides.map((s) => s.text),
    settings.slideBoilerplateFraction,
    settings.boilerplateMaxLineLength
  );
  const seenSlides = new DuplicateTracker();

  console.error(
    `[pipeline/slides] ${document.title}: ${slides.length} slides, ${boilerplate.size} boilerplate lines`
  );

  for (const slide of slides) {
    const text = normalizeText(dropBoilerplate(slide.text, boilerplate));
    const tableMarkdown = slide.tables.join('\n\n').trim();
    const recognized = await recognizeSlide(slide, document, ctx);

    const combined = [text, tableMarkdown, recognized.text].filter(Boolean).join('\n');
    if (!seenSlides.accept(combined)) continue;

    const location = { slide: slide.slideNumber };

    if (countWords(text) >= SLIDE_TEXT_MIN_WORDS) {
      for (const piece of chunkUnit(text, budget, settings)) {
        yield createChunk(document, 'pptx', piece, location);
      }
    }

    if (tableMarkdown) {
      for (const piece of chunkUnit(normalizeText(tableMarkdown), budget, settings)) {
        yield createChunk(document, 'pptx', piece, { ...location, caption: 'table' });
      }
    }

    if (countWords(recognized.text) >= settings.ocrMinWords) {
      for (const piece of chunkUnit(recognized.text, budget, settings)) {
        yield createChunk(document, 'pptx', piece, {
          ...location,
          caption: 'ocr',
          confidence: recognized.confidence,
        });
      }
    }
  }
}
