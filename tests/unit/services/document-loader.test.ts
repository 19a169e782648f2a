/**
 * Input contract loading tests
 *
 * @see src/services/document-loader.ts
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import {
  assertInputDirectory,
  loadMetadata,
  loadPages,
  resolvePagePath,
} from '../../../src/services/document-loader.js';
import { MCPError } from '../../../src/server/errors.js';
import { detectProtectedRegions } from '../../../src/services/chunking/protected-regions.js';
import {
  REPORT_PAGES,
  cleanupTempDir,
  createTempDir,
  writeDocumentFixture,
} from '../../fixtures/document-fixture.js';

async function categoryOf(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof MCPError) return error.category;
    throw error;
  }
  throw new Error('expected a rejection');
}

describe('document loader', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(dir);
  });

  it('resolves page files under pages/', () => {
    expect(resolvePagePath('/data/doc', 'page_001.md')).toBe(
      path.join('/data/doc', 'pages', 'page_001.md')
    );
    expect(resolvePagePath('/data/doc', 'sub/../page_002.md')).toBe(
      path.join('/data/doc', 'pages', 'page_002.md')
    );
  });

  it('rejects page files outside pages/', () => {
    for (const fileName of ['../../x', '../metadata.json', '/etc/hosts', '.']) {
      expect(() => resolvePagePath('/data/doc', fileName), fileName).toThrow(
        `page file "${fileName}" is outside pages/`
      );
    }
  });

  describe('assertInputDirectory', () => {
    it('accepts a directory with metadata.json', async () => {
      writeDocumentFixture(dir, REPORT_PAGES);
      await expect(assertInputDirectory(dir)).resolves.toBeUndefined();
    });

    it('rejects a missing path', async () => {
      expect(await categoryOf(assertInputDirectory(path.join(dir, 'missing')))).toBe(
        'PATH_NOT_FOUND'
      );
    });

    it('rejects a file path', async () => {
      const file = path.join(dir, 'file.txt');
      fs.writeFileSync(file, 'x');
      expect(await categoryOf(assertInputDirectory(file))).toBe('PATH_NOT_DIRECTORY');
    });

    it('rejects a directory without metadata.json', async () => {
      expect(await categoryOf(assertInputDirectory(dir))).toBe('METADATA_NOT_FOUND');
    });
  });

  describe('loadMetadata', () => {
    it('parses and sorts pages', async () => {
      writeDocumentFixture(dir, [...REPORT_PAGES].reverse(), { document: 'ops-report' });
      const metadata = await loadMetadata(dir);

      expect(metadata.document).toBe('ops-report');
      expect(metadata.pages.map((p) => p.page_number)).toEqual([1, 2, 3]);
    });

    it('rejects unparseable JSON', async () => {
      fs.writeFileSync(path.join(dir, 'metadata.json'), '{ not json');
      expect(await categoryOf(loadMetadata(dir))).toBe('METADATA_INVALID');
    });

    it('rejects a metadata file without pages', async () => {
      fs.writeFileSync(path.join(dir, 'metadata.json'), JSON.stringify({ document: 'x' }));
      await expect(loadMetadata(dir)).rejects.toThrow('pages: Required');
    });
  });

  describe('loadPages', () => {
    it('reads every page in order', async () => {
      writeDocumentFixture(dir, REPORT_PAGES);
      const pages = await loadPages(dir, await loadMetadata(dir));

      expect(pages.map((p) => p.file_name)).toEqual(['page_001.md', 'page_002.md', 'page_003.md']);
      expect(pages[2].text).toBe(REPORT_PAGES[2].text);
    });

    it('normalizes CRLF line endings', async () => {
      writeDocumentFixture(dir, [
        { page_number: 1, file_name: 'page_001.md', text: '| a | b |\r\n|---|---|\r\n| 1 | 2 |\r\n' },
      ]);
      const [page] = await loadPages(dir, await loadMetadata(dir));

      expect(page.text).toBe('| a | b |\n|---|---|\n| 1 | 2 |\n');
      expect(detectProtectedRegions(page.text)).toHaveLength(1);
    });

    it('rejects metadata that points outside pages/', async () => {
      writeDocumentFixture(dir, REPORT_PAGES);
      fs.writeFileSync(
        path.join(dir, 'metadata.json'),
        JSON.stringify({ pages: [{ page_number: 1, file_name: '../metadata.json' }] }),
        'utf-8'
      );

      expect(await categoryOf(loadPages(dir, await loadMetadata(dir)))).toBe('METADATA_INVALID');
    });

    it('fails with PAGE_NOT_FOUND for a missing page file', async () => {
      writeDocumentFixture(dir, REPORT_PAGES);
      fs.rmSync(path.join(dir, 'pages', 'page_002.md'));

      expect(await categoryOf(loadPages(dir, await loadMetadata(dir)))).toBe('PAGE_NOT_FOUND');
    });
  });
});
