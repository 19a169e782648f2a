/**
 * Chunk rendering and metadata extraction
 *
 * Turns a piece of content plus its breadcrumb path into a finished Chunk:
 * the context-prefixed text used for embedding, the content hash id, and
 * the per-chunk quality metrics.
 *
 * @module services/chunking/chunk-factory
 */

import type {
  Chunk,
  ChunkType,
  HierarchicalContext,
  PageContext,
  QualityMetrics,
} from '../../models/chunk.js';
import { computeHash } from '../../utils/hash.js';
import { roundTo } from '../../utils/math.js';
import {
  DATE_REGEX,
  DIGIT_REGEX,
  EXHIBIT_REGEX,
  IMAGE_PATH_REGEX,
  NAMED_ENTITY_REGEX,
  SENTENCE_END_REGEX,
  SOURCE_ATTRIBUTION_REGEX,
} from './patterns.js';

/** Separator between breadcrumb entries in rendered paths */
export const BREADCRUMB_SEPARATOR = ' > ';

export interface CreateChunkOptions {
  /** Set only by the cross-page merger */
  mergedFromPages?: [number, number];
}

/**
 * Render the text handed to the embedding stage.
 * Content without breadcrumbs is returned unchanged.
 */
export function renderChunkText(content: string, breadcrumbs: string[]): string {
  if (breadcrumbs.length === 0) {
    return content;
  }
  return `Context: ${breadcrumbs.join(BREADCRUMB_SEPARATOR)}\n\n${content}`;
}

function levelKey(level: number): `level_${number}` {
  return `level_${level}`;
}

export function buildHierarchicalContext(breadcrumbs: string[]): HierarchicalContext {
  const context: HierarchicalContext = {
    full_path: breadcrumbs.join(BREADCRUMB_SEPARATOR),
    depth: breadcrumbs.length,
  };
  breadcrumbs.forEach((crumb, i) => {
    context[levelKey(i + 1)] = crumb;
  });
  return context;
}

/**
 * Word/sentence counts and content feature flags.
 * Sentence count is at least 1 so the average is always defined.
 */
export function extractQualityMetrics(content: string): QualityMetrics {
  const wordCount = content.split(/\s+/).filter((w) => w.length > 0).length;
  const sentenceCount = Math.max(1, [...content.matchAll(SENTENCE_END_REGEX)].length);

  return {
    word_count: wordCount,
    sentence_count: sentenceCount,
    avg_sentence_length: roundTo(wordCount / sentenceCount, 1),
    has_numerical_data: DIGIT_REGEX.test(content),
    has_dates: DATE_REGEX.test(content),
    has_named_entities: NAMED_ENTITY_REGEX.test(content),
    has_exhibits: EXHIBIT_REGEX.test(content),
  };
}

export function extractImagePath(content: string): string | null {
  const match = IMAGE_PATH_REGEX.exec(content);
  return match ? match[1] : null;
}

export function extractSourceAttribution(content: string): string | null {
  const match = SOURCE_ATTRIBUTION_REGEX.exec(content);
  if (!match) return null;
  const attribution = match[1].trim();
  return attribution.length > 0 ? attribution : null;
}

/**
 * Build a complete chunk draft. The draft still has to pass validation
 * and deduplication before it is accepted.
 *
 * @param content - Raw chunk content (becomes content_only)
 * @param breadcrumbs - Section path, outermost first
 * @param type - Content kind
 * @param page - Source file name and page number
 */
export function createChunk(
  content: string,
  breadcrumbs: string[],
  type: ChunkType,
  page: PageContext,
  options: CreateChunkOptions = {}
): Chunk {
  const text = renderChunkText(content, breadcrumbs);
  const sourceAttribution = extractSourceAttribution(content);

  return {
    id: computeHash(text),
    text,
    content_only: content,
    metadata: {
      source: page.source,
      page_number: page.pageNumber,
      type,
      breadcrumbs: [...breadcrumbs],
      hierarchical_context: buildHierarchicalContext(breadcrumbs),
      image_path: extractImagePath(content),
      source_attribution: sourceAttribution,
      has_citations: sourceAttribution !== null,
      char_count: content.length,
      quality_metrics: extractQualityMetrics(content),
      merged_from_pages: options.mergedFromPages ?? null,
      is_merged: options.mergedFromPages !== undefined,
    },
  };
}
