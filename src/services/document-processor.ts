/**
 * Document processing
 *
 * Runs the chunking engine over one extraction output directory:
 * load -> chunk every page -> merge across pages -> statistics.
 *
 * A page that throws inside the engine is logged, counted and skipped;
 * it never aborts the rest of the document.
 *
 * @module services/document-processor
 */

import fs from 'fs';
import path from 'path';
import {
  createChunkingCounters,
  type Chunk,
  type ChunkingConfig,
  type ChunkingOutput,
  type LoadedPage,
  type PageError,
  type ProcessingStats,
} from '../models/index.js';
import { createLogger, silentLogger, type Logger } from '../utils/logger.js';
import { assertSizeOrdering } from '../utils/validation.js';
import { chunkPage } from './chunking/chunker.js';
import { emptySignalCounts, mergeAcrossPages, type PageChunks } from './chunking/page-merger.js';
import { calculateStatistics } from './chunking/statistics.js';
import { assertInputDirectory, loadMetadata, loadPages } from './document-loader.js';

/** Default output file, written inside the input directory */
export const OUTPUT_FILE_NAME = 'semantic_chunks.json';

/** Builds the logger for one component ('processor', 'chunker', 'merger') */
export type LoggerFactory = (component: string) => Logger;

export interface ProcessDocumentOptions {
  /** Write debug lines to stderr. Ignored when `logger` is given. */
  verbose?: boolean;
  /** Logger used for every component instead of per-component stderr loggers */
  logger?: Logger;
}

/**
 * Chunk already-loaded pages and assemble the output document.
 *
 * Pages must be sorted by page number.
 */
export function chunkDocument(
  documentName: string,
  pages: LoadedPage[],
  config: ChunkingConfig,
  loggerFor: LoggerFactory = () => silentLogger
): ChunkingOutput {
  assertSizeOrdering(config);
  const logger = loggerFor('processor');
  const chunkerLogger = loggerFor('chunker');

  const counters = createChunkingCounters();
  const pageErrors: PageError[] = [];
  const chunkedPages: PageChunks[] = [];

  for (const page of pages) {
    let chunks: Chunk[] = [];
    try {
      chunks = chunkPage(
        page.text,
        { source: page.file_name, pageNumber: page.page_number },
        config,
        counters,
        chunkerLogger
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Page ${page.page_number} (${page.file_name}) failed: ${message}`);
      pageErrors.push({ page_number: page.page_number, message });
    }
    logger.debug(`Page ${page.page_number}: ${chunks.length} chunks`);
    chunkedPages.push({ pageNumber: page.page_number, text: page.text, chunks });
  }

  let finalChunks: Chunk[];
  let signalCounts = emptySignalCounts();
  if (config.enableMerging) {
    const merged = mergeAcrossPages(chunkedPages, counters, loggerFor('merger'));
    finalChunks = merged.chunks;
    signalCounts = merged.signalCounts;
  } else {
    finalChunks = chunkedPages.flatMap((p) => p.chunks);
  }

  const processing: ProcessingStats = {
    total_pages: pages.length,
    total_chunks: finalChunks.length,
    duplicates_prevented: counters.duplicatesPrevented,
    validation_failures: counters.validationFailures,
    merged_boundaries: counters.mergedBoundaries,
    protected_blocks: counters.protectedBlocks,
    oversized_chunks: counters.oversizedChunks,
    failed_pages: pageErrors.length,
    page_errors: pageErrors,
    continuation_signals: signalCounts,
  };

  return {
    document: documentName,
    total_pages: pages.length,
    total_chunks: finalChunks.length,
    chunking_config: {
      target_size: config.targetSize,
      min_size: config.minSize,
      max_size: config.maxSize,
      merging_enabled: config.enableMerging,
    },
    detailed_statistics: calculateStatistics(finalChunks, processing),
    chunks: finalChunks,
  };
}

/**
 * Process one extraction output directory.
 *
 * @param inputDir - Directory holding metadata.json and pages/
 * @param config - Explicit chunking configuration for this run
 * @throws ValidationError when the sizes are out of order
 * @throws MCPError for missing or malformed input (fatal for this document)
 */
export async function processDocument(
  inputDir: string,
  config: ChunkingConfig,
  options: ProcessDocumentOptions = {}
): Promise<ChunkingOutput> {
  assertSizeOrdering(config);
  const shared = options.logger;
  const loggerFor: LoggerFactory = shared
    ? () => shared
    : (component) => createLogger(component, options.verbose ?? false);
  const logger = loggerFor('processor');
  const resolvedDir = path.resolve(inputDir);

  await assertInputDirectory(resolvedDir);
  const metadata = await loadMetadata(resolvedDir);
  const pages = await loadPages(resolvedDir, metadata);
  const documentName = metadata.document ?? path.basename(resolvedDir);

  logger.info(`Processing "${documentName}": ${pages.length} pages`);
  const output = chunkDocument(documentName, pages, config, loggerFor);
  logger.info(
    `Finished "${documentName}": ${output.total_chunks} chunks, ` +
      `${output.detailed_statistics.processing_stats.merged_boundaries} merged boundaries, ` +
      `${output.detailed_statistics.processing_stats.failed_pages} failed pages`
  );
  return output;
}

/**
 * Write the output document as 2-space-indented JSON.
 *
 * @param outputPath - Target file; defaults to `<inputDir>/semantic_chunks.json`
 * @returns Absolute path written
 */
export async function writeChunkingOutput(
  output: ChunkingOutput,
  inputDir: string,
  outputPath?: string
): Promise<string> {
  const target = path.resolve(outputPath ?? path.join(inputDir, OUTPUT_FILE_NAME));
  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  await fs.promises.writeFile(target, JSON.stringify(output, null, 2), 'utf-8');
  return target;
}
