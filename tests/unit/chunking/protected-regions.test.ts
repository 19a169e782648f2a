/**
 * Protected-Region Detector Tests
 *
 * @see src/services/chunking/protected-regions.ts
 */

import { describe, it, expect } from 'vitest';
import {
  detectProtectedRegions,
  mergeRegions,
} from '../../../src/services/chunking/protected-regions.js';
import type { ProtectedRegion } from '../../../src/models/section.js';

const MIXED_PAGE = [
  '## Results',
  '',
  'Revenue grew this year.',
  '',
  '| Year | Revenue |',
  '|------|---------|',
  '| 2022 | 10 |',
  '| 2023 | 12 |',
  'Table 1: Revenue by year',
  '',
  '```python',
  'print("hi")',
  '```',
  '',
  '**Image 1:** Bar chart',
  'The chart shows growth.',
  '',
  '## Outlook',
  'Stable.',
].join('\n');

describe('detectProtectedRegions', () => {
  it('returns nothing for empty text', () => {
    expect(detectProtectedRegions('')).toEqual([]);
  });

  it('returns nothing for plain prose', () => {
    expect(detectProtectedRegions('Just a paragraph.\n\nAnd another one.')).toEqual([]);
  });

  it('captures a pipe table with its caption', () => {
    const text = 'Intro line.\n\n| A | B |\n|---|---|\n| 1 | 2 |\nTable 1: Revenue\n\nAfter.';
    const regions = detectProtectedRegions(text);

    expect(regions).toHaveLength(1);
    expect(regions[0].kind).toBe('table');
    expect(regions[0].rawContent).toBe('| A | B |\n|---|---|\n| 1 | 2 |\nTable 1: Revenue\n');
    expect(regions[0].start).toBe(text.indexOf('| A |'));
  });

  it('requires a separator row for a table', () => {
    expect(detectProtectedRegions('| not | a table |\n| just | pipes |')).toEqual([]);
  });

  it('captures fenced code', () => {
    const text = 'Before\n```ts\nconst x = 1;\n```\nAfter';
    const regions = detectProtectedRegions(text);

    expect(regions).toHaveLength(1);
    expect(regions[0].kind).toBe('code');
    expect(regions[0].rawContent).toBe('```ts\nconst x = 1;\n```');
  });

  it('keeps adjacent code fences separate', () => {
    const text = '```\na\n```\n\n```\nb\n```';
    const regions = detectProtectedRegions(text);

    expect(regions.map((r) => r.rawContent)).toEqual(['```\na\n```', '```\nb\n```']);
  });

  it('runs an image block up to the next level 1-2 header', () => {
    const text = '**Image 1:** Chart of sales\nAI description: bars.\n\n## Next Section\nBody';
    const regions = detectProtectedRegions(text);

    expect(regions).toHaveLength(1);
    expect(regions[0].kind).toBe('image');
    expect(regions[0].rawContent).toBe('**Image 1:** Chart of sales\nAI description: bars.\n');
  });

  it('runs an image block up to a horizontal rule', () => {
    const text = '**Visual Content**\nA diagram of the pipeline\n---\nafter';
    const regions = detectProtectedRegions(text);

    expect(regions).toHaveLength(1);
    expect(regions[0].rawContent).toBe('**Visual Content**\nA diagram of the pipeline');
  });

  it('recognises blockquoted figure entries', () => {
    const text = 'Text\n> **Figure 2** Network layout';
    const regions = detectProtectedRegions(text);

    expect(regions).toHaveLength(1);
    expect(regions[0].kind).toBe('image');
    expect(regions[0].rawContent).toBe('> **Figure 2** Network layout');
  });

  it('ignores image markers that do not start a line', () => {
    expect(detectProtectedRegions('See **Image 1:** above')).toEqual([]);
  });

  it('absorbs a table nested in an image block', () => {
    const text = '**Image 2:** Figure\n| A | B |\n|---|---|\n| 1 | 2 |\n\nText after';
    const regions = detectProtectedRegions(text);

    expect(regions).toHaveLength(1);
    expect(regions[0]).toEqual({ start: 0, end: text.length, kind: 'image', rawContent: text });
  });

  it('returns sorted, non-overlapping regions whose content matches the text', () => {
    const regions = detectProtectedRegions(MIXED_PAGE);

    expect(regions.map((r) => r.kind)).toEqual(['table', 'code', 'image']);
    for (let i = 0; i < regions.length; i++) {
      expect(MIXED_PAGE.slice(regions[i].start, regions[i].end)).toBe(regions[i].rawContent);
      if (i > 0) {
        expect(regions[i].start).toBeGreaterThanOrEqual(regions[i - 1].end);
      }
    }
  });

  it('gives the same result on repeated calls', () => {
    expect(detectProtectedRegions(MIXED_PAGE)).toEqual(detectProtectedRegions(MIXED_PAGE));
  });
});

describe('mergeRegions', () => {
  const text = 'abcdefghijklmnopqrstuvwxyz0123';

  function region(start: number, end: number): ProtectedRegion {
    return { start, end, kind: 'table', rawContent: text.slice(start, end) };
  }

  it('extends a region that overlaps the next one', () => {
    expect(mergeRegions([region(0, 10), region(5, 20)], text)).toEqual([region(0, 20)]);
  });

  it('drops a region contained in another', () => {
    expect(mergeRegions([region(2, 8), region(0, 10)], text)).toEqual([region(0, 10)]);
  });

  it('keeps touching regions apart', () => {
    expect(mergeRegions([region(10, 20), region(0, 10)], text)).toEqual([
      region(0, 10),
      region(10, 20),
    ]);
  });

  it('is idempotent', () => {
    const once = mergeRegions([region(0, 10), region(5, 20), region(22, 25), region(23, 24)], text);
    expect(mergeRegions(once, text)).toEqual(once);
  });

  it('does not modify its input', () => {
    const input = [region(0, 10), region(5, 20)];
    mergeRegions(input, text);
    expect(input).toEqual([region(0, 10), region(5, 20)]);
  });
});
