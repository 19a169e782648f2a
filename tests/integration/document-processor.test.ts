/**
 * Document processing integration tests
 *
 * Runs the full pipeline on extraction output directories written to a
 * temporary directory: load -> chunk -> merge -> statistics -> write.
 *
 * @see src/services/document-processor.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import path from 'path';
import {
  OUTPUT_FILE_NAME,
  chunkDocument,
  processDocument,
  writeChunkingOutput,
} from '../../src/services/document-processor.js';
import { DEFAULT_CHUNKING_CONFIG, type ChunkingConfig } from '../../src/models/chunk.js';
import type { ChunkingOutput, LoadedPage } from '../../src/models/document.js';
import { silentLogger } from '../../src/utils/logger.js';
import {
  REPORT_PAGES,
  cleanupTempDir,
  createTempDir,
  writeDocumentFixture,
} from '../fixtures/document-fixture.js';
import { createSpyLogger } from '../unit/chunking/helpers.js';

const TABLE =
  '| Component | Owner |\n|-----------|-------|\n| Ingestion | Team A |\n| Storage | Team B |';

describe('processDocument', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it('merges a sentence that runs across pages', async () => {
    writeDocumentFixture(dir, REPORT_PAGES, { document: 'ops-report' });
    const output = await processDocument(dir, DEFAULT_CHUNKING_CONFIG, { logger: silentLogger });

    expect(output.document).toBe('ops-report');
    expect(output.total_pages).toBe(3);
    expect(output.total_chunks).toBe(4);
    expect(output.chunks.map((c) => [c.metadata.page_number, c.metadata.type])).toEqual([
      [1, 'text'],
      [2, 'table'],
      [2, 'text'],
      [3, 'text'],
    ]);

    const [merged, table, operations, appendix] = output.chunks;
    expect(merged.content_only).toBe(
      'The platform has three components: data ingestion, processing, and\n\n' +
        'storage handles persistence.'
    );
    expect(merged.metadata).toMatchObject({
      breadcrumbs: ['Architecture'],
      merged_from_pages: [1, 2],
      is_merged: true,
      source: 'page_001.md',
    });
    expect(table.content_only).toBe(TABLE);
    expect(operations.text).toBe('Context: Operations\n\nDeployments run weekly.');
    expect(appendix.metadata.breadcrumbs).toEqual(['Appendix']);
  });

  it('reports processing statistics', async () => {
    writeDocumentFixture(dir, REPORT_PAGES);
    const output = await processDocument(dir, DEFAULT_CHUNKING_CONFIG, { logger: silentLogger });
    const stats = output.detailed_statistics;

    expect(stats.processing_stats).toEqual({
      total_pages: 3,
      total_chunks: 4,
      duplicates_prevented: 0,
      validation_failures: 0,
      merged_boundaries: 1,
      protected_blocks: 1,
      oversized_chunks: 0,
      failed_pages: 0,
      page_errors: [],
      continuation_signals: {
        conjunction: 1,
        no_punctuation: 1,
        numbered_list: 0,
        bullet_list: 0,
        table: 0,
        header: 0,
      },
    });
    expect(stats.chunks_per_page).toEqual({ '1': 1, '2': 2, '3': 1 });
    expect(stats.type_distribution).toEqual({ text: 3, table: 1 });
    expect(stats.avg_chunks_per_page).toBe(1.33);
    expect(output.chunking_config).toEqual({
      target_size: 1500,
      min_size: 800,
      max_size: 2500,
      merging_enabled: true,
    });
  });

  it('keeps page boundaries when merging is disabled', async () => {
    writeDocumentFixture(dir, REPORT_PAGES);
    const config: ChunkingConfig = { ...DEFAULT_CHUNKING_CONFIG, enableMerging: false };
    const output = await processDocument(dir, config, { logger: silentLogger });

    expect(output.total_chunks).toBe(5);
    expect(output.chunks.some((c) => c.metadata.is_merged)).toBe(false);
    expect(output.detailed_statistics.processing_stats.merged_boundaries).toBe(0);
    expect(output.detailed_statistics.processing_stats.continuation_signals.conjunction).toBe(0);
  });

  it('names the document after its directory when metadata has no name', async () => {
    writeDocumentFixture(dir, REPORT_PAGES);
    const output = await processDocument(dir, DEFAULT_CHUNKING_CONFIG, { logger: silentLogger });

    expect(output.document).toBe(path.basename(dir));
  });

  it('gives every chunk a well-formed id and a consistent char_count', async () => {
    writeDocumentFixture(dir, REPORT_PAGES);
    const output = await processDocument(dir, DEFAULT_CHUNKING_CONFIG, { logger: silentLogger });

    for (const chunk of output.chunks) {
      expect(chunk.id).toMatch(/^sha256:[a-f0-9]{64}$/);
      expect(chunk.metadata.char_count).toBe(chunk.content_only.length);
    }
  });

  it('is deterministic', async () => {
    writeDocumentFixture(dir, REPORT_PAGES);
    const first = await processDocument(dir, DEFAULT_CHUNKING_CONFIG, { logger: silentLogger });
    const second = await processDocument(dir, DEFAULT_CHUNKING_CONFIG, { logger: silentLogger });

    expect(second).toEqual(first);
  });

  it('rejects out-of-order sizes before reading anything', async () => {
    const config: ChunkingConfig = { ...DEFAULT_CHUNKING_CONFIG, minSize: 2000 };
    writeDocumentFixture(dir, REPORT_PAGES);

    await expect(processDocument(dir, config, { logger: silentLogger })).rejects.toThrow(
      'Chunk sizes must satisfy'
    );
  });

  it('logs progress to stderr with the processor prefix', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    writeDocumentFixture(dir, REPORT_PAGES, { document: 'ops-report' });

    await processDocument(dir, DEFAULT_CHUNKING_CONFIG);

    expect(errorSpy).toHaveBeenCalledWith('[processor] Processing "ops-report": 3 pages');
    errorSpy.mockRestore();
  });
});

describe('chunkDocument', () => {
  it('handles a document with no pages', () => {
    const output = chunkDocument('empty', [], DEFAULT_CHUNKING_CONFIG);

    expect(output.total_chunks).toBe(0);
    expect(output.detailed_statistics.avg_chunks_per_page).toBe(0);
    expect(output.detailed_statistics.size_distribution.max).toBe(0);
  });

  it('isolates a page that fails inside the engine', () => {
    let reads = 0;
    const failing: LoadedPage = {
      page_number: 3,
      file_name: 'page_003.md',
      get text(): string {
        reads++;
        if (reads === 1) throw new Error('page text unavailable');
        return REPORT_PAGES[2].text;
      },
    };
    const pages: LoadedPage[] = [
      { page_number: 1, file_name: 'page_001.md', text: REPORT_PAGES[0].text },
      { page_number: 2, file_name: 'page_002.md', text: REPORT_PAGES[1].text },
      failing,
    ];
    const logger = createSpyLogger();

    const output = chunkDocument('ops-report', pages, DEFAULT_CHUNKING_CONFIG, () => logger);
    const stats = output.detailed_statistics;

    expect(output.total_pages).toBe(3);
    expect(output.chunks.map((c) => [c.metadata.page_number, c.metadata.type])).toEqual([
      [1, 'text'],
      [2, 'table'],
      [2, 'text'],
    ]);
    expect(output.chunks[0].metadata.merged_from_pages).toEqual([1, 2]);
    expect(stats.chunks_per_page).toEqual({ '1': 1, '2': 2 });
    expect(stats.processing_stats).toMatchObject({
      total_chunks: 3,
      merged_boundaries: 1,
      failed_pages: 1,
      page_errors: [{ page_number: 3, message: 'page text unavailable' }],
    });
    expect(logger.error).toHaveBeenCalledWith(
      'Page 3 (page_003.md) failed: page text unavailable'
    );
  });

  it('skips blank pages without breaking the boundary', () => {
    const output = chunkDocument(
      'gaps',
      [
        { page_number: 1, file_name: 'page_001.md', text: 'Opening and' },
        { page_number: 2, file_name: 'page_002.md', text: '   ' },
        { page_number: 3, file_name: 'page_003.md', text: 'Closing.' },
      ],
      DEFAULT_CHUNKING_CONFIG
    );

    expect(output.chunks.map((c) => c.content_only)).toEqual(['Opening and', 'Closing.']);
    expect(output.detailed_statistics.chunks_per_page).toEqual({ '1': 1, '3': 1 });
    expect(output.detailed_statistics.avg_chunks_per_page).toBe(1);
  });
});

describe('writeChunkingOutput', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  function readOutput(file: string): ChunkingOutput {
    return JSON.parse(fs.readFileSync(file, 'utf-8'));
  }

  it('writes 2-space JSON beside the input by default', async () => {
    const output = chunkDocument('doc', [{ page_number: 1, file_name: 'p.md', text: 'Hello.' }], DEFAULT_CHUNKING_CONFIG);
    const written = await writeChunkingOutput(output, dir);

    expect(written).toBe(path.join(dir, OUTPUT_FILE_NAME));
    expect(fs.readFileSync(written, 'utf-8')).toBe(JSON.stringify(output, null, 2));
    expect(readOutput(written).chunks[0].content_only).toBe('Hello.');
  });

  it('creates parent directories for an explicit path', async () => {
    const output = chunkDocument('doc', [], DEFAULT_CHUNKING_CONFIG);
    const target = path.join(dir, 'nested', 'out', 'chunks.json');

    expect(await writeChunkingOutput(output, dir, target)).toBe(target);
    expect(readOutput(target).document).toBe('doc');
  });
});
