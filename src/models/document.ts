/**
 * Document interfaces for the Semantic Page Chunker
 *
 * Covers the input contract written by the extraction stage
 * (metadata.json + pages/) and the output document this engine produces.
 */

import type { Chunk } from './chunk.js';

/**
 * One page entry of metadata.json
 */
export interface PageDocument {
  /** 1-indexed page number */
  page_number: number;

  /** Markdown file name under pages/ */
  file_name: string;
}

/**
 * Parsed metadata.json
 */
export interface DocumentMetadata {
  /** Document name, when the extractor recorded one */
  document: string | null;

  pages: PageDocument[];
}

/**
 * A page with its markdown loaded into memory
 */
export interface LoadedPage extends PageDocument {
  text: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT DOCUMENT
// ═══════════════════════════════════════════════════════════════════════════════

export interface SizeDistribution {
  min: number;
  max: number;
  mean: number;
  median: number;
  std_dev: number;
  percentile_25: number;
  percentile_75: number;
}

export interface ContentAnalysis {
  total_words: number;
  total_sentences: number;
  avg_words_per_chunk: number;
  chunks_with_numerical_data: number;
  chunks_with_dates: number;
  chunks_with_entities: number;
  chunks_with_exhibits: number;
  chunks_with_citations: number;
}

export interface PageError {
  page_number: number;
  message: string;
}

export interface ProcessingStats {
  total_pages: number;
  total_chunks: number;
  duplicates_prevented: number;
  validation_failures: number;
  merged_boundaries: number;
  protected_blocks: number;
  oversized_chunks: number;
  failed_pages: number;
  page_errors: PageError[];
  /** Signal name -> number of page boundaries where it fired */
  continuation_signals: Record<string, number>;
}

export interface DetailedStatistics {
  size_distribution: SizeDistribution;
  type_distribution: Record<string, number>;
  /** Page number (as string key) -> chunk count */
  chunks_per_page: Record<string, number>;
  avg_chunks_per_page: number;
  content_analysis: ContentAnalysis;
  processing_stats: ProcessingStats;
}

/**
 * Wire form of the chunking configuration
 */
export interface ChunkingConfigSummary {
  target_size: number;
  min_size: number;
  max_size: number;
  merging_enabled: boolean;
}

/**
 * Self-contained result of one invocation over one document
 */
export interface ChunkingOutput {
  document: string;
  total_pages: number;
  total_chunks: number;
  chunking_config: ChunkingConfigSummary;
  detailed_statistics: DetailedStatistics;
  chunks: Chunk[];
}
