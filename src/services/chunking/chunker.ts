/**
 * Chunk Accumulator & Splitter
 *
 * Greedily accumulates consolidated sections into chunks bounded by
 * minSize / targetSize / maxSize. Protected blocks always become their own
 * chunk; oversized text buffers are split at sentence boundaries.
 *
 * `chunkPage` runs the whole single-page pipeline:
 * detector -> parser -> consolidator -> accumulator -> validator/dedup.
 *
 * @module services/chunking/chunker
 */

import type { Chunk, ChunkingConfig, ChunkingCounters, PageContext } from '../../models/chunk.js';
import { isProtectedKind, type SemanticSection } from '../../models/section.js';
import type { Logger } from '../../utils/logger.js';
import { createChunk } from './chunk-factory.js';
import { acceptChunk } from './chunk-validator.js';
import { consolidateParagraphs, PARAGRAPH_SEPARATOR } from './paragraph-consolidator.js';
import { SENTENCE_SPLIT_REGEX } from './patterns.js';
import { detectProtectedRegions } from './protected-regions.js';
import { parseSections } from './section-parser.js';

/** Separator used to rejoin sentences of a split buffer */
export const SENTENCE_JOINER = ' ';

interface Accumulator {
  parts: string[];
  /** Length of parts joined with PARAGRAPH_SEPARATOR */
  length: number;
}

function createEmptyAccumulator(): Accumulator {
  return { parts: [], length: 0 };
}

function addToAccumulator(acc: Accumulator, content: string): void {
  if (acc.parts.length > 0) {
    acc.length += PARAGRAPH_SEPARATOR.length;
  }
  acc.parts.push(content);
  acc.length += content.length;
}

/**
 * Split text at sentence boundaries into pieces of roughly targetSize.
 *
 * A piece is closed once the next sentence would push it past targetSize
 * and it already holds minSize characters. A single sentence longer than
 * maxSize stays whole. Joining the pieces with SENTENCE_JOINER gives back
 * the input with inter-sentence whitespace collapsed to one space.
 */
export function splitAtSentences(text: string, config: ChunkingConfig): string[] {
  const sentences = text.split(SENTENCE_SPLIT_REGEX).filter((s) => s.length > 0);
  const pieces: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const sentence of sentences) {
    if (currentLength + sentence.length > config.targetSize && currentLength >= config.minSize) {
      pieces.push(current.join(SENTENCE_JOINER));
      current = [sentence];
      currentLength = sentence.length;
    } else {
      current.push(sentence);
      currentLength += sentence.length;
    }
  }

  if (current.length > 0) {
    pieces.push(current.join(SENTENCE_JOINER));
  }
  return pieces;
}

/**
 * Convert consolidated sections of one page into accepted chunks.
 *
 * Major headers flush the buffer only once it holds minSize characters;
 * shorter content carries forward under the new header's breadcrumbs.
 * Lists flush a buffer of at least minSize before they are appended.
 */
export function buildChunks(
  sections: SemanticSection[],
  page: PageContext,
  config: ChunkingConfig,
  counters: ChunkingCounters,
  logger: Logger
): Chunk[] {
  const chunks: Chunk[] = [];
  let accumulator = createEmptyAccumulator();
  let currentBreadcrumbs: string[] = [];

  function flushAccumulator(): void {
    const fullText = accumulator.parts.join(PARAGRAPH_SEPARATOR).trim();
    accumulator = createEmptyAccumulator();
    if (fullText.length === 0) {
      return;
    }

    logger.debug(`Flushing buffer: ${fullText.length} chars`);
    if (fullText.length <= config.maxSize) {
      acceptChunk(
        createChunk(fullText, currentBreadcrumbs, 'text', page),
        chunks,
        config,
        counters,
        logger
      );
      return;
    }

    const pieces = splitAtSentences(fullText, config);
    for (const piece of pieces) {
      acceptChunk(createChunk(piece, currentBreadcrumbs, 'text', page), chunks, config, counters, logger);
    }
    logger.debug(`Split ${fullText.length} chars into ${pieces.length} sub-chunks`);
  }

  function appendText(content: string): void {
    addToAccumulator(accumulator, content);
    if (accumulator.length >= config.targetSize) {
      flushAccumulator();
    }
  }

  for (const section of sections) {
    if (isProtectedKind(section.kind)) {
      flushAccumulator();
      const draft = createChunk(section.content, section.breadcrumbs, section.kind, page);
      if (acceptChunk(draft, chunks, config, counters, logger)) {
        counters.protectedBlocks++;
      }
      continue;
    }

    switch (section.kind) {
      case 'major_header':
        if (accumulator.length >= config.minSize) {
          flushAccumulator();
        }
        currentBreadcrumbs = section.breadcrumbs;
        break;
      case 'minor_header':
        currentBreadcrumbs = section.breadcrumbs;
        break;
      case 'list':
        if (accumulator.length >= config.minSize) {
          flushAccumulator();
        }
        appendText(section.content);
        break;
      case 'text':
        appendText(section.content);
        break;
    }
  }

  flushAccumulator();
  return chunks;
}

/**
 * Chunk one page of raw markdown.
 *
 * @param text - Page markdown
 * @param page - Source file name and page number stamped on every chunk
 * @param counters - Shared document counters, updated in place
 */
export function chunkPage(
  text: string,
  page: PageContext,
  config: ChunkingConfig,
  counters: ChunkingCounters,
  logger: Logger
): Chunk[] {
  const regions = detectProtectedRegions(text);
  const sections = consolidateParagraphs(parseSections(text, regions));
  const chunks = buildChunks(sections, page, config, counters, logger);

  logger.debug(
    `Page ${page.pageNumber}: ${regions.length} protected regions, ` +
      `${sections.length} sections -> ${chunks.length} chunks`
  );
  return chunks;
}
