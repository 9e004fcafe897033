/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for server configuration and state.
 *
 * @module server/types
 */

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server configuration options
 */
export interface ServerConfig {
  /** SQLite index file (default: ~/.docsift/index.db) */
  indexPath: string;

  /** Directory receiving one JSON chunk snapshot per ingested file */
  snapshotDir: string;

  /** Chunk budget before headroom (default: 512) */
  maxTokens: number;

  /** Tokens repeated between consecutive chunks (default: 120) */
  overlapTokens: number;

  /** Tokens reserved below maxTokens (default: 64) */
  tokenHeadroom: number;

  /** Page fraction a line must reach to count as pdf boilerplate (default: 0.6) */
  pdfBoilerplateFraction: number;

  /** Slide fraction a line must reach to count as deck boilerplate (default: 0.7) */
  slideBoilerplateFraction: number;

  /** Longer lines are never boilerplate (default: 120) */
  boilerplateMaxLineLength: number;

  /** Pdf pages with fewer native words are rendered and recognized (default: 10) */
  ocrFallbackWordThreshold: number;

  /** Recognition confidence (0-100) that must be exceeded (default: 95) */
  ocrConfidenceFloor: number;

  /** Minimum words for recognized image text (default: 8) */
  ocrMinWords: number;

  /** Embedded images above this pixel area are recognized (default: 150000) */
  largeImageArea: number;

  /** Videos larger than this are split before transcription (default: 100 MiB) */
  videoSegmentLimitBytes: number;

  /** Segment length when the bitrate is unknown (default: 300) */
  videoFallbackSegmentSecs: number;

  /** Transcript time block limits */
  blockMaxSecs: number;
  blockMaxChars: number;
  blockGapSecs: number;

  /** Ollama-compatible embedding endpoint */
  embeddingBaseUrl: string;
  embeddingModel: string;

  /** Texts per embedding request (default: 16) */
  embeddingBatchSize: number;

  /** Chunks per embed-and-upsert round (default: 32) */
  indexBatchSize: number;

  /** Ollama-compatible chat endpoint */
  generationBaseUrl: string;
  generationModel: string;
  generationTemperature: number;
  generationMaxTokens: number;

  /** Timeout for embedding and generation requests (default: 60000) */
  requestTimeoutMs: number;

  /** Timeout for one python worker run (default: 600000) */
  workerTimeoutMs: number;

  /** Hits taken from each retriever before fusion (default: 20) */
  searchCandidates: number;

  /** Default number of fused results (default: 6) */
  topK: number;

  /** Fused scores at or below this are dropped (default: 0.03) */
  minScore: number;

  /** Fused results allowed per document (default: 2) */
  perDocumentCap: number;

  /** Python interpreter for the extraction and recognition workers */
  pythonPath?: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Server state
 */
export interface ServerState {
  /** Server configuration */
  config: ServerConfig;
}
