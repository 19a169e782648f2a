/**
 * Paragraph Consolidator
 *
 * The parser emits every plain line as its own text section. This pass joins
 * runs of consecutive text sections into one paragraph group so single
 * sentences do not end up as their own chunk.
 *
 * @module services/chunking/paragraph-consolidator
 */

import type { SemanticSection } from '../../models/section.js';
import { LIST_ITEM_REGEX } from './patterns.js';

/** Separator placed between the joined lines of one paragraph group */
export const PARAGRAPH_SEPARATOR = '\n\n';

function isParagraphText(section: SemanticSection): boolean {
  return section.kind === 'text' && !LIST_ITEM_REGEX.test(section.content);
}

/**
 * Group maximal runs of plain text sections.
 *
 * Headers, lists and protected blocks pass through unchanged and close the
 * current run. A group takes the breadcrumbs of its first member, which all
 * members share since only headers change them.
 */
export function consolidateParagraphs(sections: SemanticSection[]): SemanticSection[] {
  const result: SemanticSection[] = [];
  let run: SemanticSection[] = [];

  const flushRun = (): void => {
    if (run.length === 0) return;
    const first = run[0];
    const last = run[run.length - 1];
    result.push({
      kind: 'text',
      content: run.map((s) => s.content).join(PARAGRAPH_SEPARATOR),
      breadcrumbs: first.breadcrumbs,
      start: first.start,
      end: last.end,
      headingLevel: null,
    });
    run = [];
  };

  for (const section of sections) {
    if (isParagraphText(section)) {
      run.push(section);
      continue;
    }
    flushRun();
    result.push(section);
  }
  flushRun();

  return result;
}
