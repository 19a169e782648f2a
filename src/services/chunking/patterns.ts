/**
 * Compiled patterns for the page chunking pipeline
 *
 * All regular expressions are module-owned constants. Global (`g`) patterns
 * are never exec'd directly: callers go through `matchAll`, which clones the
 * regex, so no lastIndex state leaks between calls.
 *
 * @module services/chunking/patterns
 */

// ═══════════════════════════════════════════════════════════════════════════════
// PROTECTED REGIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Lookahead that ends an image/figure block: the next level 1-2 header,
 * a horizontal rule line, or end of text. Never consumed.
 */
const BLOCK_BOUNDARY = String.raw`(?=\n#{1,2}\s|\n[ \t]*(?:-{3,}|\*{3,}|_{3,})[ \t]*(?:\n|$)|$)`;

/** Start of a line, without the `m` flag (so `$` above still means end of text) */
const LINE_START = String.raw`(?<![^\n])`;

/**
 * Alternative image/figure conventions emitted by the extraction stage.
 * Each one runs lazily up to BLOCK_BOUNDARY.
 */
const IMAGE_ALTERNATIVES: readonly string[] = [
  // "**Images on this page:**" batch banner
  String.raw`\*\*Images? on this page[^\n]*`,
  // "**Image 3:** ..." numbered blocks, optionally followed by an AI description
  String.raw`\*\*Image \d+[^\n]*`,
  // "**Visual Content**" banner
  String.raw`\*\*Visual Content[^\n]*`,
  // "**Complete Page Visual Analysis**" banner
  String.raw`\*\*Complete Page Visual Analysis[^\n]*`,
  // "> **Figure 2**" blockquote entries
  String.raw`>[ \t]*\*\*Figure \d+[^\n]*`,
];

export const IMAGE_BLOCK_PATTERNS: readonly RegExp[] = IMAGE_ALTERNATIVES.map(
  (alt) => new RegExp(`${LINE_START}${alt}[\\s\\S]*?${BLOCK_BOUNDARY}`, 'g')
);

/** Stops an optional table tail: blank line, header, or a sibling table/image marker */
const TABLE_TAIL_LINE = String.raw`(?!\s*\n)(?!#)(?!\*{0,2}(?:Table|Image) \d+)`;

/**
 * Pipe table: header row, separator row, one or more data rows, then an
 * optional "Table N:" caption and an optional "Table N Summary:" line.
 */
export const TABLE_PATTERN = new RegExp(
  [
    LINE_START,
    String.raw`[ \t]*\|[^\n]*\|[ \t]*\n`,
    String.raw`[ \t]*\|[-:| \t]*-[-:| \t]*(?:\n|$)`,
    String.raw`(?:[ \t]*\|[^\n]*(?:\n|$))+`,
    String.raw`(?:\*{0,2}Table \d+:[^\n]*(?:\n${TABLE_TAIL_LINE}[^\n]+)*(?:\n|$))?`,
    String.raw`(?:\*{0,2}Table \d+ Summary:[^\n]*(?:\n${TABLE_TAIL_LINE}[^\n]+)*(?:\n|$))?`,
  ].join(''),
  'g'
);

/** Fenced code, non-greedy so adjacent fences stay separate */
export const CODE_BLOCK_PATTERN = /```[\s\S]*?```/g;

// ═══════════════════════════════════════════════════════════════════════════════
// LINE CLASSIFICATION
// ═══════════════════════════════════════════════════════════════════════════════

/** ATX heading: 1-6 hash marks, whitespace, title */
export const HEADING_REGEX = /^(#{1,6})\s+(.+)$/;

/** Level-1 headings like "Page 12" are pagination artifacts */
export const PAGE_ARTIFACT_REGEX = /^Page\s+\d+\s*$/i;

/** List item: unordered (- * +) or ordered (digits.) */
export const LIST_ITEM_REGEX = /^(\s*[-*+]\s|\s*\d+\.\s)/;

/** Whole-line HTML comment */
export const HTML_COMMENT_REGEX = /^\s*<!--.*-->\s*$/;

// ═══════════════════════════════════════════════════════════════════════════════
// SENTENCES
// ═══════════════════════════════════════════════════════════════════════════════

/** Whitespace following a sentence terminator */
export const SENTENCE_SPLIT_REGEX = /(?<=[.!?])\s+/;

/** Sentence terminator followed by whitespace or end of text */
export const SENTENCE_END_REGEX = /[.!?](?=\s|$)/g;

// ═══════════════════════════════════════════════════════════════════════════════
// CHUNK METADATA
// ═══════════════════════════════════════════════════════════════════════════════

export const IMAGE_PATH_REGEX = /\((figures\/[^)\s]+\.png)\)/;

export const SOURCE_ATTRIBUTION_REGEX = /Source:[ \t]*([^\n]+)/;

export const DIGIT_REGEX = /\d/;

/** "Jan 15, 2024", "February 5 2025" */
export const DATE_REGEX =
  /\b(?:Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\.?\s+\d{1,2},?\s+\d{4}\b/;

/** Any capitalised word, optionally followed by more */
export const NAMED_ENTITY_REGEX = /\b[A-Z][a-z]+(?:\s+[A-Z][a-z]+)*\b/;

/** "Exhibit 7:", "figure 1:", "TABLE 3:" */
export const EXHIBIT_REGEX = /(?:Exhibit|Figure|Table)\s+\d+:/i;

// ═══════════════════════════════════════════════════════════════════════════════
// CONTINUATION SIGNALS
// ═══════════════════════════════════════════════════════════════════════════════

/** Words that cannot end a complete sentence */
export const CONTINUATION_WORDS: ReadonlySet<string> = new Set([
  'and',
  'or',
  'but',
  'nor',
  'the',
  'a',
  'an',
  'of',
  'to',
  'in',
  'for',
  'with',
  'by',
  'on',
  'at',
  'from',
  'as',
  'that',
  'which',
]);

/** Terminal punctuation or a trailing horizontal rule */
export const TERMINAL_PUNCTUATION_REGEX = /(?:[.!?:]|-{3,})$/;

export const NUMBERED_LIST_START_REGEX = /^\d+\.\s/;

export const BULLET_LIST_START_REGEX = /^[-*+]\s/;

export const TABLE_ROW_END_REGEX = /\|[^\n]*\|$/;

export const TABLE_ROW_START_REGEX = /^\|/;

export const HEADER_LINE_END_REGEX = /(?<![^\n])#{1,6}[ \t]+[^\n]+$/;
