/**
 * Recognition backed by python workers
 *
 * python/ocr_worker.py runs as a persistent process so the OCR model loads
 * once; python/asr_worker.py is started per media file.
 *
 * @module services/recognition/python-recognizers
 */

import { z } from 'zod';
import { PersistentPythonWorker, runPythonWorker, type WorkerRunOptions } from '../python/worker.js';
import {
  RecognitionError,
  type OcrModel,
  type RecognitionResult,
  type SpeechRecognizer,
  type TranscriptionResult,
} from './recognizer.js';
import type { ImageRef } from '../../models/document.js';

const OcrPayload = z.object({
  text: z.string(),
  confidence: z.number().min(0).max(100).nullable(),
});

const AsrPayload = z.object({
  language: z.string().nullable(),
  segments: z.array(z.object({ text: z.string(), start: z.number(), end: z.number() })),
});

export class PythonOcrModel implements OcrModel {
  private readonly worker: PersistentPythonWorker;

  constructor(options: WorkerRunOptions) {
    this.worker = new PersistentPythonWorker('ocr_worker.py', options);
  }

  async infer(image: ImageRef): Promise<RecognitionResult> {
    const payload = await this.worker.request({ image: image.data });
    const parsed = OcrPayload.safeParse(payload);
    if (!parsed.success) {
      throw new RecognitionError('ocr_worker.py returned malformed output', 'INVALID_OUTPUT', {
        issues: parsed.error.errors.map((e) => e.message),
      });
    }
    return parsed.data;
  }

  close(): void {
    this.worker.close();
  }
}

export class PythonSpeechRecognizer implements SpeechRecognizer {
  constructor(private readonly options: WorkerRunOptions) {}

  async transcribe(mediaPath: string): Promise<TranscriptionResult> {
    const payload = await runPythonWorker('asr_worker.py', ['--path', mediaPath], undefined, this.options);
    const parsed = AsrPayload.safeParse(payload);
    if (!parsed.success) {
      throw new RecognitionError(`asr_worker.py returned malformed output for ${mediaPath}`, 'INVALID_OUTPUT', {
        issues: parsed.error.errors.map((e) => e.message),
      });
    }
    return { segments: parsed.data.segments, language: parsed.data.language };
  }
}
