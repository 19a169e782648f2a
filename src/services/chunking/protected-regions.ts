/**
 * Protected-Region Detector
 *
 * Finds tables, image/figure blocks and fenced code in raw page text and
 * returns them as sorted, non-overlapping intervals. Content inside a
 * protected region is never split across chunks.
 *
 * @module services/chunking/protected-regions
 */

import type { ProtectedRegion, RegionKind } from '../../models/section.js';
import { CODE_BLOCK_PATTERN, IMAGE_BLOCK_PATTERNS, TABLE_PATTERN } from './patterns.js';

const PATTERN_FAMILIES: ReadonlyArray<{ kind: RegionKind; patterns: readonly RegExp[] }> = [
  { kind: 'image', patterns: IMAGE_BLOCK_PATTERNS },
  { kind: 'table', patterns: [TABLE_PATTERN] },
  { kind: 'code', patterns: [CODE_BLOCK_PATTERN] },
];

/**
 * Detect all protected regions in a page.
 *
 * Empty matches are ignored. Overlapping matches from different families are
 * merged into the widest enclosing region; the merged region keeps the kind
 * of the match that starts first.
 */
export function detectProtectedRegions(text: string): ProtectedRegion[] {
  if (text.length === 0) {
    return [];
  }

  const matches: ProtectedRegion[] = [];
  for (const family of PATTERN_FAMILIES) {
    for (const pattern of family.patterns) {
      for (const match of text.matchAll(pattern)) {
        const start = match.index ?? 0;
        const end = start + match[0].length;
        if (end > start) {
          matches.push({ start, end, kind: family.kind, rawContent: match[0] });
        }
      }
    }
  }

  return mergeRegions(matches, text);
}

/**
 * Sort regions by start offset and merge overlapping or contained ones.
 *
 * Ties on start put the longer region first so that a nested match is
 * absorbed instead of extending anything. Applying this to its own output
 * returns an equal list.
 */
export function mergeRegions(regions: ProtectedRegion[], text: string): ProtectedRegion[] {
  const sorted = [...regions].sort((a, b) => a.start - b.start || b.end - a.end);
  const merged: ProtectedRegion[] = [];

  for (const region of sorted) {
    const last = merged.length > 0 ? merged[merged.length - 1] : undefined;

    if (last === undefined || region.start >= last.end) {
      merged.push({ ...region });
      continue;
    }

    // Contained: nothing to do
    if (region.end <= last.end) {
      continue;
    }

    last.end = region.end;
    last.rawContent = text.slice(last.start, last.end);
  }

  return merged;
}
