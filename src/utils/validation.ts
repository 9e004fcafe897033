/**
 * docsift - Zod Validation Schemas
 *
 * Input validation for MCP tool inputs and for the server configuration.
 * Each schema carries its constraints and defaults; validateInput turns a
 * failed parse into a ValidationError listing every offending field.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import type { ServerConfig } from '../server/types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const fraction = z.coerce.number().gt(0).max(1);
const positiveInt = z.coerce.number().int().positive();
const httpUrl = z.string().url().regex(/^https?:\/\//, 'Must be an http(s) URL');

/**
 * Field constraints of ServerConfig. Numbers are coerced so environment
 * strings validate through the same schema as tool input.
 */
export const ServerConfigFields = z.object({
  indexPath: z.string().min(1),
  snapshotDir: z.string().min(1),
  maxTokens: z.coerce.number().int().min(16).max(8192),
  overlapTokens: z.coerce.number().int().min(0),
  tokenHeadroom: z.coerce.number().int().min(0),
  pdfBoilerplateFraction: fraction,
  slideBoilerplateFraction: fraction,
  boilerplateMaxLineLength: positiveInt,
  ocrFallbackWordThreshold: z.coerce.number().int().min(0),
  ocrConfidenceFloor: z.coerce.number().min(0).max(100),
  ocrMinWords: z.coerce.number().int().min(0),
  largeImageArea: z.coerce.number().int().min(0),
  videoSegmentLimitBytes: positiveInt,
  videoFallbackSegmentSecs: z.coerce.number().positive(),
  blockMaxSecs: z.coerce.number().positive(),
  blockMaxChars: positiveInt,
  blockGapSecs: z.coerce.number().positive(),
  embeddingBaseUrl: httpUrl,
  embeddingModel: z.string().min(1),
  embeddingBatchSize: positiveInt.max(512),
  indexBatchSize: positiveInt.max(1024),
  generationBaseUrl: httpUrl,
  generationModel: z.string().min(1),
  generationTemperature: z.coerce.number().min(0).max(2),
  generationMaxTokens: positiveInt,
  requestTimeoutMs: z.coerce.number().int().min(1000),
  workerTimeoutMs: z.coerce.number().int().min(1000),
  searchCandidates: positiveInt.max(500),
  topK: positiveInt.max(100),
  minScore: z.coerce.number().min(0),
  perDocumentCap: positiveInt,
  pythonPath: z.string().min(1).optional(),
});

export const ServerConfigSchema: z.ZodType<ServerConfig, z.ZodTypeDef, unknown> = ServerConfigFields.superRefine(
  (config, ctx) => {
    const budget = config.maxTokens - config.tokenHeadroom;
    if (budget < 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tokenHeadroom'],
        message: `tokenHeadroom (${config.tokenHeadroom}) must be below maxTokens (${config.maxTokens})`,
      });
    } else if (config.overlapTokens >= budget) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['overlapTokens'],
        message: `overlapTokens (${config.overlapTokens}) must be below the chunk budget (${budget})`,
      });
    }
  }
);

/**
 * Configuration keys that can be read or set
 */
export const ConfigKey = ServerConfigFields.keyof();
export type ConfigKey = z.infer<typeof ConfigKey>;

/**
 * Environment variable carrying a setting: indexPath -> DOCSIFT_INDEX_PATH
 */
export function configEnvName(key: ConfigKey): string {
  return `DOCSIFT_${key.replace(/([A-Z])/g, '_$1').toUpperCase()}`;
}

/**
 * Overlay DOCSIFT_* environment values on defaults and validate the result
 *
 * @throws ValidationError naming each invalid setting
 */
export function configFromEnv(defaults: ServerConfig, env: NodeJS.ProcessEnv): ServerConfig {
  const overrides: Record<string, string> = {};
  for (const key of ConfigKey.options) {
    const value = env[configEnvName(key)];
    if (value !== undefined && value.trim() !== '') {
      overrides[key] = value.trim();
    }
  }
  return validateInput(ServerConfigSchema, { ...defaults, ...overrides });
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for ingesting files into the index
 */
export const IngestFilesInput = z.object({
  file_paths: z
    .array(z.string().min(1, 'File path cannot be empty'))
    .min(1, 'At least one file path is required'),
  max_tokens: z.number().int().min(16).max(8192).optional(),
  overlap_tokens: z.number().int().min(0).optional(),
});

/**
 * Schema for hybrid search
 */
export const SearchInput = z.object({
  query: z.string().trim().min(1, 'Query is required').max(2000),
  limit: z.number().int().min(1).max(100).optional(),
  min_score: z.number().min(0).optional(),
});

/**
 * Schema for question answering
 */
export const AskInput = z.object({
  question: z.string().trim().min(1, 'Question is required').max(2000),
  limit: z.number().int().min(1).max(50).optional(),
});

/**
 * Schema for clearing the index
 */
export const IndexClearInput = z.object({
  confirm: z.literal(true, {
    errorMap: () => ({ message: 'Set confirm to true to delete every indexed chunk' }),
  }),
});

/**
 * Schema for getting configuration
 */
export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

/**
 * Schema for setting configuration
 */
export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.union([z.string(), z.number()]),
});
