/**
 * MCP Server State Management
 *
 * Holds the server configuration and the lazily built services that tools
 * run against. Services are rebuilt from the current configuration after
 * every configuration change.
 *
 * @module server/state
 */

import { homedir } from 'os';
import path from 'path';
import { IndexStore } from '../services/storage/index-store.js';
import { PythonDocumentExtractor } from '../services/extraction/extractor.js';
import { OcrEngine } from '../services/recognition/recognizer.js';
import { PythonOcrModel, PythonSpeechRecognizer } from '../services/recognition/python-recognizers.js';
import { FfmpegVideoTools } from '../services/ingestion/video-tools.js';
import { OllamaEmbeddingClient, type EmbeddingProvider } from '../services/embedding/embedder.js';
import { OllamaAnswerGenerator, type AnswerGenerator } from '../services/generation/answer.js';
import { configFromEnv, validateInput, ServerConfigSchema } from '../utils/validation.js';
import { configurationError } from './errors.js';
import type { IngestionContext, IngestionSettings } from '../services/ingestion/context.js';
import type { HybridSearchOptions } from '../services/search/hybrid.js';
import type { ServerState, ServerConfig } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

const OLLAMA_BASE_URL = 'http://localhost:11434';

/**
 * Default server configuration
 */
export const defaultConfig: ServerConfig = {
  indexPath: path.join(homedir(), '.docsift', 'index.db'),
  snapshotDir: path.join('data', 'chunks'),
  maxTokens: 512,
  overlapTokens: 120,
  tokenHeadroom: 64,
  pdfBoilerplateFraction: 0.6,
  slideBoilerplateFraction: 0.7,
  boilerplateMaxLineLength: 120,
  ocrFallbackWordThreshold: 10,
  ocrConfidenceFloor: 95,
  ocrMinWords: 8,
  largeImageArea: 150_000,
  videoSegmentLimitBytes: 100 * 1024 * 1024,
  videoFallbackSegmentSecs: 300,
  blockMaxSecs: 60,
  blockMaxChars: 1200,
  blockGapSecs: 1.5,
  embeddingBaseUrl: OLLAMA_BASE_URL,
  embeddingModel: 'nomic-embed-text',
  embeddingBatchSize: 16,
  indexBatchSize: 32,
  generationBaseUrl: OLLAMA_BASE_URL,
  generationModel: 'llama3.1',
  generationTemperature: 0,
  generationMaxTokens: 350,
  requestTimeoutMs: 60_000,
  workerTimeoutMs: 600_000,
  searchCandidates: 20,
  topK: 6,
  minScore: 0.03,
  perDocumentCap: 2,
};

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Global server state
 */
export const state: ServerState = {
  config: { ...defaultConfig },
};

/**
 * Everything a tool needs to ingest, search and answer
 */
export interface ServiceSet {
  index: IndexStore;
  embedder: EmbeddingProvider;
  generator: AnswerGenerator;
  ingestion: IngestionContext;
}

let _services: ServiceSet | null = null;

/** OCR engine owned by the current service set; holds a worker process once loaded */
let _ocrEngine: OcrEngine | null = null;

/**
 * Active operation counter. Configuration changes and service teardown are
 * refused while any tracked operation is in flight.
 */
let _activeOperations = 0;

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get current configuration
 */
export function getConfig(): ServerConfig {
  return { ...state.config };
}

/**
 * Validate and apply configuration changes. Services built from the old
 * configuration are closed and rebuilt on next use.
 *
 * @throws ValidationError if the merged configuration is invalid
 * @throws MCPError CONFIGURATION_ERROR while operations are in flight
 */
export function updateConfig(updates: Partial<Record<keyof ServerConfig, unknown>>): ServerConfig {
  if (_activeOperations > 0) {
    throw configurationError(
      `Cannot change configuration while ${_activeOperations} operation(s) are in progress`
    );
  }
  state.config = validateInput(ServerConfigSchema, { ...state.config, ...updates });
  closeServices();
  return getConfig();
}

/**
 * Load DOCSIFT_* environment overrides on top of the defaults
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  state.config = configFromEnv(defaultConfig, env);
  closeServices();
  return getConfig();
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  state.config = { ...defaultConfig };
  closeServices();
}

export function ingestionSettings(config: ServerConfig): IngestionSettings {
  return {
    tokenHeadroom: config.tokenHeadroom,
    pdfBoilerplateFraction: config.pdfBoilerplateFraction,
    slideBoilerplateFraction: config.slideBoilerplateFraction,
    boilerplateMaxLineLength: config.boilerplateMaxLineLength,
    ocrFallbackWordThreshold: config.ocrFallbackWordThreshold,
    ocrConfidenceFloor: config.ocrConfidenceFloor,
    ocrMinWords: config.ocrMinWords,
    largeImageArea: config.largeImageArea,
    blockMaxSecs: config.blockMaxSecs,
    blockMaxChars: config.blockMaxChars,
    blockGapSecs: config.blockGapSecs,
  };
}

export function searchOptions(
  config: ServerConfig,
  overrides: { limit?: number; minScore?: number } = {}
): HybridSearchOptions {
  return {
    limit: overrides.limit ?? config.topK,
    minScore: overrides.minScore ?? config.minScore,
    candidates: config.searchCandidates,
    perDocumentCap: config.perDocumentCap,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

function buildServices(config: ServerConfig): ServiceSet {
  const workerOptions = { pythonPath: config.pythonPath, timeoutMs: config.workerTimeoutMs };
  const ocr = new OcrEngine(() => new PythonOcrModel(workerOptions));
  const index = IndexStore.open(config.indexPath);
  _ocrEngine = ocr;

  return {
    index,
    embedder: new OllamaEmbeddingClient({
      baseUrl: config.embeddingBaseUrl,
      model: config.embeddingModel,
      batchSize: config.embeddingBatchSize,
      timeoutMs: config.requestTimeoutMs,
    }),
    generator: new OllamaAnswerGenerator({
      baseUrl: config.generationBaseUrl,
      model: config.generationModel,
      timeoutMs: config.requestTimeoutMs,
      temperature: config.generationTemperature,
      maxOutputTokens: config.generationMaxTokens,
    }),
    ingestion: {
      extractor: new PythonDocumentExtractor(workerOptions),
      recognizer: ocr,
      speech: new PythonSpeechRecognizer(workerOptions),
      video: new FfmpegVideoTools({
        segmentLimitBytes: config.videoSegmentLimitBytes,
        fallbackSegmentSecs: config.videoFallbackSegmentSecs,
      }),
      settings: ingestionSettings(config),
    },
  };
}

/**
 * Get the services for the current configuration, opening the index on
 * first use.
 *
 * @throws IndexError if the index cannot be opened
 */
export function requireServices(): ServiceSet {
  if (!_services) {
    _services = buildServices(state.config);
  }
  return _services;
}

/**
 * Install a prebuilt service set (in-process stand-ins in tests)
 */
export function setServices(services: ServiceSet): void {
  closeServices();
  _services = services;
}

/**
 * Close the index and stop the OCR worker, if running
 */
export function closeServices(): void {
  _ocrEngine?.close();
  _ocrEngine = null;
  if (_services) {
    const { index } = _services;
    _services = null;
    index.close();
  }
}

/**
 * Run an async tool operation against the current services, tracked so the
 * configuration cannot change underneath it.
 */
export async function withServices<T>(fn: (services: ServiceSet) => Promise<T>): Promise<T> {
  const services = requireServices();
  _activeOperations++;
  try {
    return await fn(services);
  } finally {
    _activeOperations--;
  }
}

/**
 * Get the number of active operations (for diagnostics/testing).
 */
export function getActiveOperationCount(): number {
  return _activeOperations;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  _activeOperations = 0;
  resetConfig();
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS EXIT CLEANUP
// ═══════════════════════════════════════════════════════════════════════════════

process.on('exit', () => {
  try {
    closeServices();
  } catch (error) {
    console.error('[state] service close on exit failed:', error instanceof Error ? error.message : String(error));
  }
});
