/**
 * Shared Tool Utilities
 *
 * Common types, formatters, and error handlers used across all tool modules.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/shared
 */

import { z } from 'zod';
import { MCPError, formatErrorResponse } from '../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** MCP tool response format */
export type ToolResponse = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

/** Tool handler function signature */
type ToolHandler = (params: Record<string, unknown>) => Promise<ToolResponse>;

/** Tool definition with description, schema, and handler */
export interface ToolDefinition {
  description: string;
  inputSchema: Record<string, z.ZodTypeAny>;
  handler: ToolHandler;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/** Max response size in bytes before truncation (700KB) */
export const MAX_RESPONSE_BYTES = 700 * 1024;

/** Items kept from an array that is cut down to fit */
const TRUNCATED_ARRAY_CAP = 50;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Format tool result as MCP content response.
 *
 * If the serialized JSON exceeds MAX_RESPONSE_BYTES, the largest arrays of
 * the result's `data` object are cut to TRUNCATED_ARRAY_CAP items, their
 * original length is recorded as `_<name>_total`, and a `_response_truncated`
 * note is added.
 */
export function formatResponse(result: unknown): ToolResponse {
  const json = JSON.stringify(result, null, 2);
  if (json.length <= MAX_RESPONSE_BYTES || !isRecord(result) || !isRecord(result.data)) {
    return { content: [{ type: 'text', text: json }] };
  }

  const data: Record<string, unknown> = { ...result.data };
  const arrays = Object.entries(data)
    .filter((entry): entry is [string, unknown[]] => Array.isArray(entry[1]))
    .sort((a, b) => JSON.stringify(b[1]).length - JSON.stringify(a[1]).length);

  const truncatedFields: string[] = [];
  for (const [key, arr] of arrays) {
    if (JSON.stringify({ ...result, data }, null, 2).length <= MAX_RESPONSE_BYTES) break;
    if (arr.length <= TRUNCATED_ARRAY_CAP) continue;
    data[key] = arr.slice(0, TRUNCATED_ARRAY_CAP);
    data[`_${key}_total`] = arr.length;
    truncatedFields.push(`${key} (${arr.length} → ${TRUNCATED_ARRAY_CAP})`);
  }

  data._response_truncated = {
    reason: `Response exceeded ${Math.round(MAX_RESPONSE_BYTES / 1024)}KB limit`,
    truncated_fields: truncatedFields,
    suggestion: 'Read the full output file written by chunker_document_process',
  };
  return { content: [{ type: 'text', text: JSON.stringify({ ...result, data }, null, 2) }] };
}

/**
 * Handle errors uniformly
 */
export function handleError(error: unknown): ToolResponse {
  const mcpError = MCPError.fromUnknown(error);
  console.error(`[ERROR] ${mcpError.category}: ${mcpError.message}`);
  return {
    content: [{ type: 'text', text: JSON.stringify(formatErrorResponse(mcpError), null, 2) }],
    isError: true,
  };
}
