/**
 * Semantic Section Parser Tests
 *
 * @see src/services/chunking/section-parser.ts
 */

import { describe, it, expect } from 'vitest';
import { parseSections } from '../../../src/services/chunking/section-parser.js';
import { detectProtectedRegions } from '../../../src/services/chunking/protected-regions.js';

function parse(text: string) {
  return parseSections(text, detectProtectedRegions(text));
}

describe('parseSections', () => {
  it('returns no sections for empty or blank text', () => {
    expect(parse('')).toEqual([]);
    expect(parse('\n\n   \n')).toEqual([]);
  });

  it('classifies headers, text and lists in order', () => {
    const text = [
      '# Page 3',
      '## Overview',
      'Intro text here.',
      '<!-- note -->',
      '### Details',
      '- one',
      '- two',
      'Closing line.',
    ].join('\n');

    const sections = parse(text);

    expect(sections.map((s) => s.kind)).toEqual([
      'major_header',
      'text',
      'minor_header',
      'list',
      'text',
    ]);
    expect(sections[0]).toMatchObject({
      content: 'Overview',
      breadcrumbs: ['Overview'],
      headingLevel: 2,
    });
    expect(sections[3]).toMatchObject({
      content: '- one\n- two',
      breadcrumbs: ['Overview', 'Details'],
      headingLevel: null,
    });
    expect(sections[4].content).toBe('Closing line.');
  });

  it('drops "Page N" level-1 headers without touching breadcrumbs', () => {
    const sections = parse('# Intro\nText.\n# Page 12\nMore.');

    expect(sections.map((s) => s.content)).toEqual(['Intro', 'Text.', 'More.']);
    expect(sections[2].breadcrumbs).toEqual(['Intro']);
  });

  it('keeps "Page N" headers below level 1', () => {
    const sections = parse('## Page 4');

    expect(sections).toHaveLength(1);
    expect(sections[0].breadcrumbs).toEqual(['Page 4']);
  });

  it('truncates breadcrumbs to the header level', () => {
    const sections = parse('# A\n## B\n### C\n## D\nBody.');
    const body = sections[sections.length - 1];

    expect(body.breadcrumbs).toEqual(['A', 'D']);
  });

  it('appends to a shallower path when a level is skipped', () => {
    const sections = parse('# A\n### C\nBody.');

    expect(sections[2].breadcrumbs).toEqual(['A', 'C']);
  });

  it('treats ordered list items as list lines', () => {
    const sections = parse('1. first\n2. second');

    expect(sections).toHaveLength(1);
    expect(sections[0]).toMatchObject({ kind: 'list', content: '1. first\n2. second' });
  });

  it('emits a protected region as one section and resumes after it', () => {
    const text = 'Intro\n```\ncode\n```\nOutro';
    const sections = parse(text);

    expect(sections.map((s) => s.kind)).toEqual(['text', 'code', 'text']);
    expect(sections[1]).toMatchObject({
      content: '```\ncode\n```',
      start: 6,
      end: 18,
    });
    expect(sections[2].content).toBe('Outro');
  });

  it('closes an open list before a protected region', () => {
    const text = '- a\n- b\n\n| X | Y |\n|---|---|\n| 1 | 2 |';
    const sections = parse(text);

    expect(sections.map((s) => s.kind)).toEqual(['list', 'table']);
    expect(sections[0].content).toBe('- a\n- b');
    expect(sections[1].content).toBe('| X | Y |\n|---|---|\n| 1 | 2 |');
  });

  it('stamps protected regions with the active breadcrumbs', () => {
    const sections = parse('## Data\n\n```\nx\n```');

    expect(sections[1]).toMatchObject({ kind: 'code', breadcrumbs: ['Data'] });
  });

  it('keeps every non-blank, non-comment line', () => {
    const text = 'Alpha.\n\nBeta.\n<!-- skip -->\nGamma.';
    expect(parse(text).map((s) => s.content)).toEqual(['Alpha.', 'Beta.', 'Gamma.']);
  });
});
