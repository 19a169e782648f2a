/**
 * Chunk interfaces for the Semantic Page Chunker
 *
 * Represents the bounded, context-enriched text units handed to the
 * downstream embedding stage.
 */

/**
 * Configuration for page chunking
 */
export interface ChunkingConfig {
  /** Buffer length that triggers a flush (default: 1500) */
  targetSize: number;

  /** Minimum buffer length before a major header may flush it (default: 800) */
  minSize: number;

  /** Hard limit before sentence-level splitting kicks in (default: 2500) */
  maxSize: number;

  /** Merge boundary chunks across pages when continuation is detected (default: true) */
  enableMerging: boolean;
}

/**
 * Default chunking configuration
 */
export const DEFAULT_CHUNKING_CONFIG: ChunkingConfig = {
  targetSize: 1500,
  minSize: 800,
  maxSize: 2500,
  enableMerging: true,
};

/**
 * Factor applied to maxSize above which a chunk is reported as oversized.
 * Oversized chunks are still accepted: protected blocks cannot be shrunk.
 */
export const OVERSIZE_WARNING_FACTOR = 1.5;

/** Number of most recently accepted chunks checked for duplicate ids */
export const DEDUP_WINDOW = 5;

/** Kind of content a chunk carries */
export type ChunkType = 'text' | 'table' | 'image' | 'code';

/**
 * Breadcrumb path expanded into numbered levels.
 * `level_1` is the outermost section.
 */
export type HierarchicalContext = {
  full_path: string;
  depth: number;
} & {
  [level: `level_${number}`]: string;
};

/**
 * Content-quality signals computed for every chunk
 */
export interface QualityMetrics {
  word_count: number;
  sentence_count: number;
  avg_sentence_length: number;
  has_numerical_data: boolean;
  has_dates: boolean;
  has_named_entities: boolean;
  has_exhibits: boolean;
}

export interface ChunkMetadata {
  /** Page file name the chunk came from (e.g. "page_005.md") */
  source: string;

  /** 1-indexed page number */
  page_number: number;

  type: ChunkType;

  /** Section path active when the chunk was flushed, outermost first */
  breadcrumbs: string[];

  hierarchical_context: HierarchicalContext;

  /** First `figures/*.png` link target in the content */
  image_path: string | null;

  /** Text following a "Source:" label */
  source_attribution: string | null;

  has_citations: boolean;

  /** Always equal to content_only.length */
  char_count: number;

  quality_metrics: QualityMetrics;

  /** [N, N+1] when this chunk joins the boundary chunks of two pages */
  merged_from_pages: [number, number] | null;

  is_merged: boolean;
}

/**
 * A finished chunk, ready for embedding
 */
export interface Chunk {
  /** SHA-256 of `text` (format: 'sha256:...') */
  id: string;

  /** "Context: <path>\n\n<content>" when breadcrumbs are present, else the content */
  text: string;

  /** Raw content without the injected context header */
  content_only: string;

  metadata: ChunkMetadata;
}

/**
 * Page identity stamped onto every chunk built from that page
 */
export interface PageContext {
  source: string;
  pageNumber: number;
}

/**
 * Counters updated while chunks are built, validated and merged.
 * One instance is shared by all pages of a document.
 */
export interface ChunkingCounters {
  duplicatesPrevented: number;
  validationFailures: number;
  protectedBlocks: number;
  oversizedChunks: number;
  mergedBoundaries: number;
}

export function createChunkingCounters(): ChunkingCounters {
  return {
    duplicatesPrevented: 0,
    validationFailures: 0,
    protectedBlocks: 0,
    oversizedChunks: 0,
    mergedBoundaries: 0,
  };
}
