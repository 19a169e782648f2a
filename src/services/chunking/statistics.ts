/**
 * Detailed statistics over a document's final chunk list
 *
 * @module services/chunking/statistics
 */

import type { Chunk } from '../../models/chunk.js';
import type {
  ContentAnalysis,
  DetailedStatistics,
  ProcessingStats,
  SizeDistribution,
} from '../../models/document.js';
import { roundTo, safeMax, safeMin, sum } from '../../utils/math.js';

const EMPTY_SIZE_DISTRIBUTION: SizeDistribution = {
  min: 0,
  max: 0,
  mean: 0,
  median: 0,
  std_dev: 0,
  percentile_25: 0,
  percentile_75: 0,
};

/**
 * Size distribution of chunk content lengths.
 *
 * Median and percentiles are the element at index floor(n/2), floor(n/4)
 * and floor(3n/4) of the sorted sizes (no interpolation). Standard
 * deviation is the population form.
 */
export function calculateSizeDistribution(sizes: number[]): SizeDistribution {
  if (sizes.length === 0) {
    return { ...EMPTY_SIZE_DISTRIBUTION };
  }

  const n = sizes.length;
  const sorted = [...sizes].sort((a, b) => a - b);
  const mean = sum(sizes) / n;
  const variance = sum(sizes.map((size) => (size - mean) ** 2)) / n;

  return {
    min: safeMin(sizes) ?? 0,
    max: safeMax(sizes) ?? 0,
    mean: roundTo(mean, 1),
    median: sorted[Math.floor(n / 2)],
    std_dev: roundTo(Math.sqrt(variance), 1),
    percentile_25: sorted[Math.floor(n / 4)],
    percentile_75: sorted[Math.floor((3 * n) / 4)],
  };
}

function countBy(chunks: Chunk[], key: (chunk: Chunk) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const chunk of chunks) {
    const k = key(chunk);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

export function calculateContentAnalysis(chunks: Chunk[]): ContentAnalysis {
  const metrics = chunks.map((c) => c.metadata.quality_metrics);
  const totalWords = sum(metrics.map((m) => m.word_count));

  return {
    total_words: totalWords,
    total_sentences: sum(metrics.map((m) => m.sentence_count)),
    avg_words_per_chunk: chunks.length > 0 ? roundTo(totalWords / chunks.length, 1) : 0,
    chunks_with_numerical_data: metrics.filter((m) => m.has_numerical_data).length,
    chunks_with_dates: metrics.filter((m) => m.has_dates).length,
    chunks_with_entities: metrics.filter((m) => m.has_named_entities).length,
    chunks_with_exhibits: metrics.filter((m) => m.has_exhibits).length,
    chunks_with_citations: chunks.filter((c) => c.metadata.has_citations).length,
  };
}

/**
 * Build the detailed_statistics block of the output document.
 *
 * `avg_chunks_per_page` divides by the number of pages that produced at
 * least one chunk.
 *
 * @param chunks - Final chunk list (after cross-page merging)
 * @param processing - Counters collected while processing
 */
export function calculateStatistics(
  chunks: Chunk[],
  processing: ProcessingStats
): DetailedStatistics {
  const chunksPerPage = countBy(chunks, (c) => String(c.metadata.page_number));
  const pagesWithChunks = Object.keys(chunksPerPage).length;

  return {
    size_distribution: calculateSizeDistribution(chunks.map((c) => c.content_only.length)),
    type_distribution: countBy(chunks, (c) => c.metadata.type),
    chunks_per_page: chunksPerPage,
    avg_chunks_per_page: pagesWithChunks > 0 ? roundTo(chunks.length / pagesWithChunks, 2) : 0,
    content_analysis: calculateContentAnalysis(chunks),
    processing_stats: processing,
  };
}
