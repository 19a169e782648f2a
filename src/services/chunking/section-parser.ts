/**
 * Semantic Section Parser
 *
 * Walks page text with a cursor, jumping over protected regions as single
 * units and classifying every other line as a header, list item or plain
 * text while tracking the breadcrumb (section hierarchy) stack.
 *
 * @module services/chunking/section-parser
 */

import type { ProtectedRegion, SemanticSection } from '../../models/section.js';
import {
  HEADING_REGEX,
  HTML_COMMENT_REGEX,
  LIST_ITEM_REGEX,
  PAGE_ARTIFACT_REGEX,
} from './patterns.js';

/** Headers at or above this level are major semantic boundaries */
const MAJOR_HEADER_MAX_LEVEL = 2;

interface ListBuffer {
  lines: string[];
  start: number;
  end: number;
}

/**
 * Parse page text into ordered semantic sections.
 *
 * Only blank lines and whole-line HTML comments are dropped. Level-1 headers
 * that read "Page N" are pagination artifacts and neither emit a section nor
 * touch the breadcrumbs.
 *
 * @param text - Raw page markdown
 * @param regions - Output of detectProtectedRegions for the same text
 */
export function parseSections(text: string, regions: ProtectedRegion[]): SemanticSection[] {
  const sections: SemanticSection[] = [];
  let breadcrumbs: string[] = [];
  let list: ListBuffer | null = null;
  let cursor = 0;
  let regionIndex = 0;

  const flushList = (): void => {
    if (list === null) return;
    sections.push({
      kind: 'list',
      content: list.lines.join('').trimEnd(),
      breadcrumbs: [...breadcrumbs],
      start: list.start,
      end: list.end,
      headingLevel: null,
    });
    list = null;
  };

  while (cursor < text.length) {
    const region = regionIndex < regions.length ? regions[regionIndex] : undefined;

    if (region !== undefined && cursor >= region.start) {
      flushList();
      sections.push({
        kind: region.kind,
        content: region.rawContent.trim(),
        breadcrumbs: [...breadcrumbs],
        start: region.start,
        end: region.end,
        headingLevel: null,
      });
      cursor = Math.max(cursor, region.end);
      regionIndex++;
      continue;
    }

    // A line never runs into the next protected region
    const limit = region !== undefined ? region.start : text.length;
    const newline = text.indexOf('\n', cursor);
    const lineEnd = newline === -1 || newline >= limit ? limit : newline;
    const nextCursor = lineEnd === newline ? newline + 1 : lineEnd;
    const line = text.slice(cursor, lineEnd);
    const trimmed = line.trim();
    const lineStart = cursor;
    cursor = nextCursor;

    if (trimmed.length === 0 || HTML_COMMENT_REGEX.test(trimmed)) {
      continue;
    }

    const heading = HEADING_REGEX.exec(trimmed);
    if (heading) {
      flushList();
      const level = heading[1].length;
      const title = heading[2].trim();
      if (level === 1 && PAGE_ARTIFACT_REGEX.test(title)) {
        continue;
      }
      breadcrumbs = [...breadcrumbs.slice(0, level - 1), title];
      sections.push({
        kind: level <= MAJOR_HEADER_MAX_LEVEL ? 'major_header' : 'minor_header',
        content: title,
        breadcrumbs: [...breadcrumbs],
        start: lineStart,
        end: lineEnd,
        headingLevel: level,
      });
      continue;
    }

    if (LIST_ITEM_REGEX.test(line)) {
      if (list === null) {
        list = { lines: [], start: lineStart, end: lineEnd };
      }
      list.lines.push(`${line}\n`);
      list.end = lineEnd;
      continue;
    }

    flushList();
    sections.push({
      kind: 'text',
      content: trimmed,
      breadcrumbs: [...breadcrumbs],
      start: lineStart,
      end: lineEnd,
      headingLevel: null,
    });
  }

  flushList();
  return sections;
}
