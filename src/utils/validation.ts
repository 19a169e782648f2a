/**
 * Semantic Page Chunker - Zod Validation Schemas
 *
 * Input validation for MCP tool inputs, chunking configuration and the
 * metadata.json input contract.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import type { ChunkingConfig } from '../models/chunk.js';

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
 * Format zod issues as "path: message" joined by "; "
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(formatZodIssues(result.error));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CHUNKING CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

const SizeValue = z.number().int().positive();

/**
 * Wire form of chunking overrides (all optional, snake_case)
 */
export const ChunkingConfigOverrides = z.object({
  target_size: SizeValue.optional(),
  min_size: SizeValue.optional(),
  max_size: SizeValue.optional(),
  enable_merging: z.boolean().optional(),
});

export type ChunkingConfigOverrides = z.infer<typeof ChunkingConfigOverrides>;

/**
 * Throw unless minSize <= targetSize <= maxSize
 */
export function assertSizeOrdering(config: ChunkingConfig): void {
  if (config.minSize > config.targetSize || config.targetSize > config.maxSize) {
    throw new ValidationError(
      `Chunk sizes must satisfy min_size <= target_size <= max_size ` +
        `(got min_size=${config.minSize}, target_size=${config.targetSize}, max_size=${config.maxSize})`
    );
  }
}

/**
 * Apply wire-form overrides to a base configuration and check the result.
 *
 * @throws ValidationError when the merged sizes are out of order
 */
export function resolveChunkingConfig(
  base: ChunkingConfig,
  overrides: ChunkingConfigOverrides = {}
): ChunkingConfig {
  const config: ChunkingConfig = {
    targetSize: overrides.target_size ?? base.targetSize,
    minSize: overrides.min_size ?? base.minSize,
    maxSize: overrides.max_size ?? base.maxSize,
    enableMerging: overrides.enable_merging ?? base.enableMerging,
  };
  assertSizeOrdering(config);
  return config;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT CONTRACT (metadata.json)
// ═══════════════════════════════════════════════════════════════════════════════

const PageEntry = z
  .object({
    page_number: z.number().int().positive(),
    file_name: z.string().min(1).optional(),
    file: z.string().min(1).optional(),
  })
  .passthrough()
  .superRefine((page, ctx) => {
    if (page.file_name === undefined && page.file === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'file_name is required',
        path: ['file_name'],
      });
    }
  })
  .transform((page) => ({
    page_number: page.page_number,
    file_name: page.file_name ?? page.file ?? '',
  }));

/**
 * metadata.json written by the extraction stage. `file` is accepted as a
 * legacy name for `file_name`; pages come back sorted by page_number.
 */
export const DocumentMetadataSchema = z
  .object({
    document: z.string().optional(),
    document_name: z.string().optional(),
    pages: z.array(PageEntry),
  })
  .passthrough()
  .transform((meta) => ({
    document: meta.document ?? meta.document_name ?? null,
    pages: [...meta.pages].sort((a, b) => a.page_number - b.page_number),
  }));

// ═══════════════════════════════════════════════════════════════════════════════
// CHUNKING TOOL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DocumentProcessInput = z.object({
  input_dir: z.string().min(1, 'input_dir is required'),
  config: ChunkingConfigOverrides.optional(),
  output_path: z.string().min(1).optional(),
  write_output: z.boolean().default(true),
  include_chunks: z.boolean().default(false),
});

export const PageChunkInput = z.object({
  text: z.string(),
  page_number: z.number().int().positive().default(1),
  source: z.string().min(1).default('page.md'),
  config: ChunkingConfigOverrides.optional(),
});

export const ContinuationDetectInput = z.object({
  previous_text: z.string(),
  next_text: z.string(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Configuration keys that can be read or changed at runtime
 */
export const ConfigKey = z.enum(['target_size', 'min_size', 'max_size', 'enable_merging', 'verbose']);

export type ConfigKey = z.infer<typeof ConfigKey>;

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
  value: z.union([z.string(), z.number(), z.boolean()]),
});
