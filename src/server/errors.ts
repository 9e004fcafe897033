/**
 * MCP Server Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * At the tool boundary every error becomes an MCPError with a category and
 * a recovery hint naming the tool to call next.
 *
 * @module server/errors
 */

import { IngestionError } from '../services/ingestion/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for MCP tool errors
 */
export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Ingestion errors
  | 'UNSUPPORTED_FORMAT'
  | 'PATH_NOT_FOUND'
  | 'VIDEO_TOOLING_ERROR'
  | 'EXTRACTION_FAILED'
  | 'RECOGNITION_FAILED'

  // Service errors
  | 'EMBEDDING_FAILED'
  | 'GENERATION_FAILED'

  // Index errors
  | 'INDEX_ERROR'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to MCPError categories.
 * IngestionError and its subclasses are resolved by code in categorize().
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  WorkerError: 'EXTRACTION_FAILED',
  RecognitionError: 'RECOGNITION_FAILED',
  EmbeddingError: 'EMBEDDING_FAILED',
  GenerationError: 'GENERATION_FAILED',
  IndexError: 'INDEX_ERROR',
};

function categorize(error: Error, defaultCategory: ErrorCategory): ErrorCategory {
  if (error instanceof IngestionError) {
    switch (error.code) {
      case 'UNSUPPORTED_EXTENSION':
        return 'UNSUPPORTED_FORMAT';
      case 'FILE_NOT_FOUND':
        return 'PATH_NOT_FOUND';
      case 'VIDEO_TOOL_MISSING':
      case 'VIDEO_PROBE_FAILED':
      case 'VIDEO_SPLIT_FAILED':
        return 'VIDEO_TOOLING_ERROR';
    }
  }
  return ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MCP ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * MCPError - Structured error class for all MCP tool failures
 */
export class MCPError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPError';
    this.category = category;
    this.details = details;

    // Preserve stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, MCPError);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): MCPError {
    if (error instanceof MCPError) {
      return error;
    }

    if (error instanceof Error) {
      // Preserve diagnostic properties carried by the custom error classes
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      const details =
        'details' in error && typeof error.details === 'object' && error.details !== null
          ? error.details
          : undefined;
      const filePath = error instanceof IngestionError ? error.filePath : undefined;

      return new MCPError(categorize(error, defaultCategory), error.message, {
        originalName: error.name,
        ...(code && { errorCode: code }),
        ...(filePath && { filePath }),
        ...(details && { errorDetails: details }),
      });
    }

    return new MCPError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Recovery hint for AI agents to self-correct after errors.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: { tool: 'docsift_config_get', hint: 'Check parameter types, ranges and required fields' },
  UNSUPPORTED_FORMAT: {
    tool: 'docsift_ingest',
    hint: 'Only .pdf, .pptx, .docx, .txt, .md and .mp4 files can be ingested',
  },
  PATH_NOT_FOUND: { tool: 'docsift_ingest', hint: 'Verify the file path exists on the filesystem' },
  VIDEO_TOOLING_ERROR: {
    tool: 'docsift_ingest',
    hint: 'Install ffmpeg and ffprobe and make sure both are on PATH',
  },
  EXTRACTION_FAILED: {
    tool: 'docsift_config_set',
    hint: 'Check the python interpreter (pythonPath) and that the extraction packages are installed',
  },
  RECOGNITION_FAILED: {
    tool: 'docsift_config_set',
    hint: 'Check the OCR and speech recognition packages, or raise workerTimeoutMs',
  },
  EMBEDDING_FAILED: {
    tool: 'docsift_config_get',
    hint: 'Check that the embedding service at embeddingBaseUrl is running and serves embeddingModel',
  },
  GENERATION_FAILED: {
    tool: 'docsift_config_get',
    hint: 'Check that the chat service at generationBaseUrl is running and serves generationModel',
  },
  INDEX_ERROR: {
    tool: 'docsift_index_stats',
    hint: 'Inspect the index; a dimension mismatch means the embedding model changed, so clear and re-ingest',
  },
  CONFIGURATION_ERROR: {
    tool: 'docsift_config_get',
    hint: 'Check DOCSIFT_* environment variables or set values with docsift_config_set',
  },
  INTERNAL_ERROR: { tool: 'docsift_index_stats', hint: 'Check the server log (stderr) for details' },
};

/**
 * Get recovery hint for an error category.
 */
export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format MCPError for tool response
 * ALWAYS includes category, message, recovery hint, and optional details.
 */
export function formatErrorResponse(error: MCPError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

/**
 * Create validation error
 */
export function validationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('VALIDATION_ERROR', message, details);
}

/**
 * Create configuration error
 */
export function configurationError(message: string, details?: Record<string, unknown>): MCPError {
  return new MCPError('CONFIGURATION_ERROR', message, details);
}
