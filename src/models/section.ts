/**
 * Structural units produced while parsing a page
 *
 * @module models/section
 */

/** Kinds of content that must never be split */
export type RegionKind = 'table' | 'image' | 'code';

/**
 * A span of the page text that has to land whole in exactly one chunk
 */
export interface ProtectedRegion {
  /** Offset of the first character */
  start: number;
  /** Offset one past the last character */
  end: number;
  kind: RegionKind;
  /** text.slice(start, end) */
  rawContent: string;
}

/** Classification of a parsed section */
export type SectionKind = 'major_header' | 'minor_header' | 'text' | 'list' | RegionKind;

/**
 * One classified unit of page structure
 */
export interface SemanticSection {
  kind: SectionKind;
  content: string;
  /** Header path active at this section, outermost first */
  breadcrumbs: string[];
  start: number;
  end: number;
  /** 1-6 for headers, null otherwise */
  headingLevel: number | null;
}

export function isProtectedKind(kind: SectionKind): kind is RegionKind {
  return kind === 'table' || kind === 'image' || kind === 'code';
}
