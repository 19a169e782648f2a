/**
 * Cross-Page Merger
 *
 * Joins the last chunk of page N with the first chunk of page N+1 when the
 * continuation detector says the content runs on. Only text chunks are
 * merged; a table, image or code chunk on either side blocks the merge.
 *
 * Boundaries are processed serially in page order.
 *
 * @module services/chunking/page-merger
 */

import type { Chunk, ChunkingCounters } from '../../models/chunk.js';
import type { Logger } from '../../utils/logger.js';
import { createChunk } from './chunk-factory.js';
import { detectContinuation, type ContinuationSignal } from './continuation.js';
import { PARAGRAPH_SEPARATOR } from './paragraph-consolidator.js';

/** Chunked page as handed to the merger */
export interface PageChunks {
  pageNumber: number;
  /** Raw page markdown, used for boundary inspection */
  text: string;
  chunks: Chunk[];
}

export interface PageMergeResult {
  /** All chunks in page order, boundary pairs replaced by merged chunks */
  chunks: Chunk[];
  /** Boundaries at which each signal fired */
  signalCounts: Record<ContinuationSignal, number>;
}

export function emptySignalCounts(): Record<ContinuationSignal, number> {
  return {
    conjunction: 0,
    no_punctuation: 0,
    numbered_list: 0,
    bullet_list: 0,
    table: 0,
    header: 0,
  };
}

/**
 * Merge two boundary chunks into a new chunk.
 *
 * The deeper breadcrumb path wins (the earlier chunk's on a tie). The new
 * chunk keeps the earlier chunk's source and page number.
 */
export function mergeBoundaryChunks(
  previous: Chunk,
  next: Chunk,
  pages: [number, number]
): Chunk {
  const breadcrumbs =
    next.metadata.breadcrumbs.length > previous.metadata.breadcrumbs.length
      ? next.metadata.breadcrumbs
      : previous.metadata.breadcrumbs;

  return createChunk(
    `${previous.content_only}${PARAGRAPH_SEPARATOR}${next.content_only}`,
    breadcrumbs,
    'text',
    { source: previous.metadata.source, pageNumber: previous.metadata.page_number },
    { mergedFromPages: pages }
  );
}

/**
 * Apply continuation merging to every adjacent page pair.
 *
 * @param pages - Chunked pages sorted by page number. Their chunk arrays are not modified.
 */
export function mergeAcrossPages(
  pages: PageChunks[],
  counters: ChunkingCounters,
  logger: Logger
): PageMergeResult {
  const lists = pages.map((page) => [...page.chunks]);
  const signalCounts = emptySignalCounts();

  for (let i = 0; i + 1 < pages.length; i++) {
    const current = pages[i];
    const following = pages[i + 1];
    const detection = detectContinuation(current.text, following.text);

    for (const signal of detection.signals) {
      signalCounts[signal]++;
    }
    if (!detection.continues) {
      logger.debug(`Pages ${current.pageNumber}->${following.pageNumber}: no continuation`);
      continue;
    }
    logger.debug(
      `Pages ${current.pageNumber}->${following.pageNumber}: continuation (${detection.signals.join(', ')})`
    );

    const previousList = lists[i];
    const nextList = lists[i + 1];
    if (previousList.length === 0 || nextList.length === 0) {
      continue;
    }

    const last = previousList[previousList.length - 1];
    const first = nextList[0];
    if (last.metadata.type !== 'text' || first.metadata.type !== 'text') {
      logger.debug(
        `Skipping merge at page ${current.pageNumber}: ` +
          `${last.metadata.type} -> ${first.metadata.type} boundary`
      );
      continue;
    }

    previousList[previousList.length - 1] = mergeBoundaryChunks(last, first, [
      current.pageNumber,
      following.pageNumber,
    ]);
    nextList.shift();
    counters.mergedBoundaries++;
  }

  return { chunks: lists.flat(), signalCounts };
}
