/**
 * Ingestion Error Classes
 *
 * Fatal for the file being ingested. Per-unit extraction and recognition
 * failures are not raised through these; the pipelines log and skip them.
 */

type IngestionErrorCode =
  | 'UNSUPPORTED_EXTENSION'
  | 'FILE_NOT_FOUND'
  | 'VIDEO_TOOL_MISSING'
  | 'VIDEO_PROBE_FAILED'
  | 'VIDEO_SPLIT_FAILED';

export class IngestionError extends Error {
  constructor(
    message: string,
    public readonly code: IngestionErrorCode,
    public readonly filePath: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'IngestionError';
    Error.captureStackTrace?.(this, IngestionError);
  }
}

export class UnsupportedFormatError extends IngestionError {
  constructor(
    filePath: string,
    public readonly extension: string
  ) {
    super(`Unsupported file type "${extension || '(none)'}": ${filePath}`, 'UNSUPPORTED_EXTENSION', filePath);
    this.name = 'UnsupportedFormatError';
  }
}

export class VideoToolError extends IngestionError {
  constructor(
    message: string,
    code: Extract<IngestionErrorCode, `VIDEO_${string}`>,
    filePath: string,
    public readonly tool: 'ffprobe' | 'ffmpeg',
    details?: Record<string, unknown>
  ) {
    super(message, code, filePath, details);
    this.name = 'VideoToolError';
  }
}
