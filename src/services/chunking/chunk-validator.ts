/**
 * Chunk Validator & Deduplicator
 *
 * Gatekeeps every chunk draft before it joins a page's chunk list:
 * structural checks first, then an id comparison against the most recently
 * accepted chunks.
 *
 * @module services/chunking/chunk-validator
 */

import { z } from 'zod';
import {
  DEDUP_WINDOW,
  OVERSIZE_WARNING_FACTOR,
  type Chunk,
  type ChunkingConfig,
  type ChunkingCounters,
} from '../../models/chunk.js';
import { shortHash } from '../../utils/hash.js';
import type { Logger } from '../../utils/logger.js';

const ChunkMetadataShape = z
  .object({
    source: z.string(),
    page_number: z.number().int(),
    type: z.enum(['text', 'table', 'image', 'code']),
    breadcrumbs: z.array(z.string()),
  })
  .passthrough();

/**
 * Required shape of a chunk draft. Fields beyond these are not checked.
 */
export const ChunkDraftSchema = z
  .object({
    id: z.string().min(1),
    text: z.string(),
    content_only: z.string(),
    metadata: ChunkMetadataShape,
  })
  .passthrough();

export interface ChunkValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Hard checks: required fields, required metadata fields, non-empty content.
 */
export function validateChunk(draft: unknown): ChunkValidationResult {
  const parsed = ChunkDraftSchema.safeParse(draft);
  if (!parsed.success) {
    return {
      valid: false,
      errors: parsed.error.errors.map((e) =>
        e.path.length > 0 ? `${e.path.join('.')}: ${e.message}` : e.message
      ),
    };
  }
  if (parsed.data.content_only.trim().length === 0) {
    return { valid: false, errors: ['content_only: empty after trimming'] };
  }
  return { valid: true, errors: [] };
}

/**
 * True when a chunk with the same id is among the last DEDUP_WINDOW accepted.
 * Duplicates further back are not detected.
 */
export function isRecentDuplicate(id: string, accepted: readonly Chunk[]): boolean {
  return accepted.slice(-DEDUP_WINDOW).some((chunk) => chunk.id === id);
}

/**
 * Validate a draft and append it to `accepted` unless it is invalid or a
 * recent duplicate. Counters are updated in place.
 *
 * @returns Whether the draft was appended
 */
export function acceptChunk(
  draft: Chunk,
  accepted: Chunk[],
  config: ChunkingConfig,
  counters: ChunkingCounters,
  logger: Logger
): boolean {
  const validation = validateChunk(draft);
  if (!validation.valid) {
    counters.validationFailures++;
    logger.warn(`Rejected chunk ${shortHash(draft.id)}: ${validation.errors.join('; ')}`);
    return false;
  }

  if (draft.metadata.char_count > config.maxSize * OVERSIZE_WARNING_FACTOR) {
    counters.oversizedChunks++;
    logger.warn(
      `Chunk exceeds max size: ${draft.metadata.char_count} chars ` +
        `(${draft.metadata.type}, page ${draft.metadata.page_number})`
    );
  }

  if (isRecentDuplicate(draft.id, accepted)) {
    counters.duplicatesPrevented++;
    logger.debug(`Duplicate detected: ${shortHash(draft.id)}`);
    return false;
  }

  accepted.push(draft);
  return true;
}
