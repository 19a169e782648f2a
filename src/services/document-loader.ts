/**
 * Input contract loading
 *
 * Reads `metadata.json` and the page markdown files under `pages/` from an
 * extraction output directory. Any missing or malformed input is fatal for
 * the document and raised as a categorized MCPError.
 *
 * @module services/document-loader
 */

import fs from 'fs';
import path from 'path';
import type { DocumentMetadata, LoadedPage } from '../models/document.js';
import {
  metadataInvalidError,
  metadataNotFoundError,
  pageNotFoundError,
  pathNotDirectoryError,
  pathNotFoundError,
} from '../server/errors.js';
import { DocumentMetadataSchema, formatZodIssues } from '../utils/validation.js';

export const METADATA_FILE_NAME = 'metadata.json';
export const PAGES_DIR_NAME = 'pages';

/**
 * Resolve a page file path: `<inputDir>/pages/<fileName>`
 *
 * @throws MCPError METADATA_INVALID when the name escapes pages/
 */
export function resolvePagePath(inputDir: string, fileName: string): string {
  const pagesDir = path.resolve(inputDir, PAGES_DIR_NAME);
  const resolved = path.resolve(pagesDir, fileName);
  if (fileName.includes('\0') || !resolved.startsWith(pagesDir + path.sep)) {
    throw metadataInvalidError(
      path.join(inputDir, METADATA_FILE_NAME),
      `page file "${fileName}" is outside ${PAGES_DIR_NAME}/`
    );
  }
  return resolved;
}

async function statOrNull(target: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.stat(target);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Check that inputDir is an existing directory holding metadata.json.
 *
 * @throws MCPError PATH_NOT_FOUND, PATH_NOT_DIRECTORY or METADATA_NOT_FOUND
 */
export async function assertInputDirectory(inputDir: string): Promise<void> {
  const dirStat = await statOrNull(inputDir);
  if (dirStat === null) {
    throw pathNotFoundError(inputDir);
  }
  if (!dirStat.isDirectory()) {
    throw pathNotDirectoryError(inputDir);
  }
  const metadataPath = path.join(inputDir, METADATA_FILE_NAME);
  const metaStat = await statOrNull(metadataPath);
  if (metaStat === null || !metaStat.isFile()) {
    throw metadataNotFoundError(metadataPath);
  }
}

/**
 * Parse and validate metadata.json. Pages are returned sorted by page number.
 *
 * @throws MCPError METADATA_NOT_FOUND or METADATA_INVALID
 */
export async function loadMetadata(inputDir: string): Promise<DocumentMetadata> {
  const metadataPath = path.join(inputDir, METADATA_FILE_NAME);

  let raw: string;
  try {
    raw = await fs.promises.readFile(metadataPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw metadataNotFoundError(metadataPath);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw metadataInvalidError(
      metadataPath,
      error instanceof Error ? error.message : String(error)
    );
  }

  const result = DocumentMetadataSchema.safeParse(parsed);
  if (!result.success) {
    throw metadataInvalidError(metadataPath, formatZodIssues(result.error));
  }
  return result.data;
}

/**
 * Load every page listed in the metadata, in page order.
 *
 * @throws MCPError PAGE_NOT_FOUND for the first missing page file
 */
export async function loadPages(inputDir: string, metadata: DocumentMetadata): Promise<LoadedPage[]> {
  const pages: LoadedPage[] = [];
  for (const page of metadata.pages) {
    const pagePath = resolvePagePath(inputDir, page.file_name);
    let text: string;
    try {
      text = await fs.promises.readFile(pagePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw pageNotFoundError(page.page_number, pagePath);
      }
      throw error;
    }
    pages.push({ ...page, text: text.replace(/\r\n?/g, '\n') });
  }
  return pages;
}
