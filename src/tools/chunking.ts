/**
 * Chunking MCP Tools
 *
 * Tools: chunker_document_process, chunker_page_chunk, chunker_continuation_detect
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/chunking
 */

import { z } from 'zod';
import { createChunkingCounters } from '../models/chunk.js';
import { getChunkingDefaults, getConfig, recordDocumentProcessed } from '../server/state.js';
import { successResult } from '../server/types.js';
import { chunkPage } from '../services/chunking/chunker.js';
import { detectContinuation } from '../services/chunking/continuation.js';
import { processDocument, writeChunkingOutput } from '../services/document-processor.js';
import { createLogger } from '../utils/logger.js';
import {
  validateInput,
  resolveChunkingConfig,
  ChunkingConfigOverrides,
  ContinuationDetectInput,
  DocumentProcessInput,
  PageChunkInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CHUNKING TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleDocumentProcess(
  params: Record<string, unknown>
): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentProcessInput, params);
    const config = resolveChunkingConfig(getChunkingDefaults(), input.config);

    const output = await processDocument(input.input_dir, config, {
      verbose: getConfig().verbose,
    });
    const outputPath = input.write_output
      ? await writeChunkingOutput(output, input.input_dir, input.output_path)
      : null;
    recordDocumentProcessed();

    return formatResponse(
      successResult({
        document: output.document,
        total_pages: output.total_pages,
        total_chunks: output.total_chunks,
        output_path: outputPath,
        chunking_config: output.chunking_config,
        detailed_statistics: output.detailed_statistics,
        ...(input.include_chunks ? { chunks: output.chunks } : {}),
        next_steps: [
          { tool: 'chunker_page_chunk', description: 'Inspect how a single page is chunked' },
          { tool: 'chunker_config_set', description: 'Tune size limits and re-run' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handlePageChunk(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(PageChunkInput, params);
    const config = resolveChunkingConfig(getChunkingDefaults(), input.config);
    const counters = createChunkingCounters();

    const chunks = chunkPage(
      input.text,
      { source: input.source, pageNumber: input.page_number },
      config,
      counters,
      createLogger('chunker', getConfig().verbose)
    );

    return formatResponse(
      successResult({
        source: input.source,
        page_number: input.page_number,
        total_chunks: chunks.length,
        duplicates_prevented: counters.duplicatesPrevented,
        validation_failures: counters.validationFailures,
        protected_blocks: counters.protectedBlocks,
        oversized_chunks: counters.oversizedChunks,
        chunks,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleContinuationDetect(
  params: Record<string, unknown>
): Promise<ToolResponse> {
  try {
    const input = validateInput(ContinuationDetectInput, params);
    const result = detectContinuation(input.previous_text, input.next_text);

    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const chunkingTools: Record<string, ToolDefinition> = {
  chunker_document_process: {
    description:
      '[PROCESSING] Use to chunk an extraction output directory (metadata.json + pages/*.md) into context-enriched chunks. Writes semantic_chunks.json and returns statistics.',
    inputSchema: {
      input_dir: z.string().min(1).describe('Directory containing metadata.json and pages/'),
      config: ChunkingConfigOverrides.optional().describe(
        'Overrides for target_size, min_size, max_size, enable_merging'
      ),
      output_path: z
        .string()
        .min(1)
        .optional()
        .describe('Output file (default: <input_dir>/semantic_chunks.json)'),
      write_output: z.boolean().default(true).describe('Write the output JSON file'),
      include_chunks: z
        .boolean()
        .default(false)
        .describe('Include the chunk list in the response'),
    },
    handler: handleDocumentProcess,
  },
  chunker_page_chunk: {
    description:
      '[ANALYSIS] Use to chunk one page of raw markdown without any file I/O. Returns the chunks with metadata and per-page counters.',
    inputSchema: {
      text: z.string().describe('Page markdown'),
      page_number: z.number().int().positive().default(1).describe('1-indexed page number'),
      source: z.string().min(1).default('page.md').describe('Source file name stamped on chunks'),
      config: ChunkingConfigOverrides.optional().describe(
        'Overrides for target_size, min_size, max_size'
      ),
    },
    handler: handlePageChunk,
  },
  chunker_continuation_detect: {
    description:
      '[ANALYSIS] Use to check whether content runs on from one page to the next. Returns each continuation signal that fired.',
    inputSchema: {
      previous_text: z.string().describe('Markdown of page N'),
      next_text: z.string().describe('Markdown of page N+1'),
    },
    handler: handleContinuationDetect,
  },
};
