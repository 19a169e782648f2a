/**
 * Unit tests for shared tool utilities
 *
 * @see src/tools/shared.ts
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { MAX_RESPONSE_BYTES, formatResponse, handleError } from '../../../src/tools/shared.js';
import { successResult } from '../../../src/server/types.js';
import { pathNotFoundError } from '../../../src/server/errors.js';
import { parseResponse } from './helpers.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatResponse', () => {
  it('serializes small results unchanged', () => {
    const result = successResult({ total_chunks: 2 });

    expect(formatResponse(result)).toEqual({
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
    });
  });

  it('cuts large arrays down to fit and records their length', () => {
    const chunks = Array.from({ length: 2000 }, (_, i) => ({ index: i, text: 'x'.repeat(500) }));
    const response = parseResponse(formatResponse(successResult({ document: 'big', chunks })));

    expect(response.data?.document).toBe('big');
    expect(response.data?.chunks).toHaveLength(50);
    expect(response.data?._chunks_total).toBe(2000);
    expect(response.data?._response_truncated).toMatchObject({
      truncated_fields: ['chunks (2000 → 50)'],
    });
  });

  it('stays within the size limit after truncation', () => {
    const chunks = Array.from({ length: 2000 }, () => 'y'.repeat(500));
    const response = formatResponse(successResult({ chunks }));

    expect(response.content[0].text.length).toBeLessThanOrEqual(MAX_RESPONSE_BYTES);
  });
});

describe('handleError', () => {
  it('returns a categorized error response', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const result = handleError(pathNotFoundError('/missing'));

    expect(result.isError).toBe(true);
    expect(parseResponse(result)).toMatchObject({
      success: false,
      error: { category: 'PATH_NOT_FOUND', message: 'Path does not exist: /missing' },
    });
    expect(console.error).toHaveBeenCalledWith('[ERROR] PATH_NOT_FOUND: Path does not exist: /missing');
  });
});
