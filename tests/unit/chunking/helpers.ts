/**
 * Shared fixtures for chunking engine tests
 */

import { vi, type Mock } from 'vitest';
import type { ChunkingConfig, PageContext } from '../../../src/models/chunk.js';
import type { ProcessingStats } from '../../../src/models/document.js';
import type { Logger } from '../../../src/utils/logger.js';

export const PAGE: PageContext = { source: 'page_001.md', pageNumber: 1 };

export function smallConfig(overrides: Partial<ChunkingConfig> = {}): ChunkingConfig {
  return { targetSize: 30, minSize: 10, maxSize: 60, enableMerging: true, ...overrides };
}

export type SpyLogger = { [K in keyof Logger]: Mock<Logger[K]> };

export function createSpyLogger(): SpyLogger {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  };
}

export function emptyProcessingStats(overrides: Partial<ProcessingStats> = {}): ProcessingStats {
  return {
    total_pages: 0,
    total_chunks: 0,
    duplicates_prevented: 0,
    validation_failures: 0,
    merged_boundaries: 0,
    protected_blocks: 0,
    oversized_chunks: 0,
    failed_pages: 0,
    page_errors: [],
    continuation_signals: {},
    ...overrides,
  };
}
