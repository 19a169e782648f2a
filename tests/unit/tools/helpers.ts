/**
 * Shared helpers for tool handler tests
 */

import type { ToolResponse } from '../../../src/tools/shared.js';

export interface ParsedToolResponse {
  success: boolean;
  data?: Record<string, unknown>;
  error?: {
    category: string;
    message: string;
    recovery?: { tool: string; hint: string };
    details?: Record<string, unknown>;
  };
}

export function parseResponse(response: ToolResponse): ParsedToolResponse {
  return JSON.parse(response.content[0].text);
}
