/**
 * Recognition services
 *
 * Image-to-text and speech-to-text collaborators. The OCR model is an owned
 * resource: constructed on first use, and inference runs under a mutex so
 * concurrent callers never share model state mid-call.
 *
 * @module services/recognition/recognizer
 */

import { Mutex } from '../../utils/mutex.js';
import type { ImageRef, TimedText } from '../../models/document.js';

export class RecognitionError extends Error {
  constructor(
    message: string,
    public readonly code: 'OCR_FAILED' | 'ASR_FAILED' | 'INVALID_OUTPUT',
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RecognitionError';
    Error.captureStackTrace?.(this, RecognitionError);
  }
}

export interface RecognitionResult {
  text: string;
  /** 0-100, null when the model reports none */
  confidence: number | null;
}

export interface ImageRecognizer {
  recognize(image: ImageRef): Promise<RecognitionResult>;
}

export interface TranscriptionResult {
  segments: TimedText[];
  language: string | null;
}

export interface SpeechRecognizer {
  transcribe(mediaPath: string): Promise<TranscriptionResult>;
}

/**
 * Loaded OCR model
 */
export interface OcrModel {
  infer(image: ImageRef): Promise<RecognitionResult>;
  close(): void;
}

/**
 * ImageRecognizer over a lazily constructed OcrModel.
 * Construction happens outside the lock; only inference is serialized.
 */
export class OcrEngine implements ImageRecognizer {
  private model: OcrModel | null = null;
  private readonly lock = new Mutex();

  constructor(private readonly createModel: () => OcrModel) {}

  private acquireModel(): OcrModel {
    if (!this.model) {
      console.error('[OcrEngine] Loading OCR model');
      this.model = this.createModel();
    }
    return this.model;
  }

  get loaded(): boolean {
    return this.model !== null;
  }

  async recognize(image: ImageRef): Promise<RecognitionResult> {
    const model = this.acquireModel();
    return this.lock.runExclusive(() => model.infer(image));
  }

  close(): void {
    this.model?.close();
    this.model = null;
  }
}

/**
 * Accepted recognition text for a set of images
 */
export interface CombinedRecognition {
  text: string;
  /** Mean confidence of accepted results, null when none were accepted */
  confidence: number | null;
}

/**
 * Recognize each image and keep results with text and confidence strictly
 * above the floor. Accepted texts are joined with newlines. A failure on one
 * image is logged and that image contributes nothing.
 */
export async function recognizeImages(
  recognizer: ImageRecognizer,
  images: ImageRef[],
  confidenceFloor: number
): Promise<CombinedRecognition> {
  const texts: string[] = [];
  const confidences: number[] = [];

  for (const image of images) {
    let result: RecognitionResult;
    try {
      result = await recognizer.recognize(image);
    } catch (error) {
      console.error(
        '[Recognition] Image recognition failed, skipping image:',
        error instanceof Error ? error.message : String(error)
      );
      continue;
    }
    const text = result.text.trim();
    if (text && result.confidence !== null && result.confidence > confidenceFloor) {
      texts.push(text);
      confidences.push(result.confidence);
    }
  }

  if (texts.length === 0) return { text: '', confidence: null };
  const mean = confidences.reduce((sum, c) => sum + c, 0) / confidences.length;
  return { text: texts.join('\n'), confidence: mean };
}
