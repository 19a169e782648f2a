/**
 * Command-line chunking
 *
 * `semantic-page-chunker --input-dir <dir>` chunks one extraction output
 * directory and writes semantic_chunks.json. Progress and errors go to
 * stderr; the final summary goes to stdout. Any failure sets exit code 1.
 *
 * @module cli/chunk-command
 */

import { Command } from 'commander';
import { z } from 'zod';
import type { ChunkingConfig } from '../models/chunk.js';
import type { ChunkingOutput } from '../models/document.js';
import { MCPError } from '../server/errors.js';
import { processDocument, writeChunkingOutput } from '../services/document-processor.js';
import { createLogger, silentLogger } from '../utils/logger.js';
import { ValidationError, formatZodIssues, resolveChunkingConfig } from '../utils/validation.js';

const CliSize = z.coerce.number().int().positive();

/**
 * Raw commander options (sizes arrive as strings)
 */
export const CHUNK_OPTIONS_SCHEMA = z.object({
  inputDir: z.string().min(1),
  targetSize: CliSize.optional(),
  minSize: CliSize.optional(),
  maxSize: CliSize.optional(),
  merging: z.boolean().default(true),
  output: z.string().min(1).optional(),
  quiet: z.boolean().default(false),
  verbose: z.boolean().default(false),
});

export type ChunkOptions = z.infer<typeof CHUNK_OPTIONS_SCHEMA>;

export function parseChunkOptions(raw: unknown): ChunkOptions {
  const result = CHUNK_OPTIONS_SCHEMA.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid options: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}

export interface ChunkRunResult {
  output: ChunkingOutput;
  outputPath: string;
}

/**
 * Chunk the input directory and write the output file.
 *
 * @param defaults - Configuration used for every size the options leave out
 */
export async function runChunk(
  options: ChunkOptions,
  defaults: ChunkingConfig & { verbose: boolean }
): Promise<ChunkRunResult> {
  const config = resolveChunkingConfig(defaults, {
    target_size: options.targetSize,
    min_size: options.minSize,
    max_size: options.maxSize,
    enable_merging: options.merging && defaults.enableMerging,
  });

  const output = await processDocument(
    options.inputDir,
    config,
    options.quiet ? { logger: silentLogger } : { verbose: options.verbose || defaults.verbose }
  );
  const outputPath = await writeChunkingOutput(output, options.inputDir, options.output);
  return { output, outputPath };
}

export function formatSummary(result: ChunkRunResult): string {
  const { output, outputPath } = result;
  const stats = output.detailed_statistics.processing_stats;
  return [
    `Document: ${output.document}`,
    `Pages: ${output.total_pages}`,
    `Chunks: ${output.total_chunks}`,
    `Merged boundaries: ${stats.merged_boundaries}`,
    `Failed pages: ${stats.failed_pages}`,
    `Output: ${outputPath}`,
  ].join('\n');
}

/**
 * Build the commander program.
 *
 * @param getDefaults - Read at action time so environment overrides apply
 */
export function buildProgram(getDefaults: () => ChunkingConfig & { verbose: boolean }): Command {
  const program = new Command();

  program
    .name('semantic-page-chunker')
    .description('Split page-by-page markdown into context-enriched chunks for retrieval')
    .version('1.0.0')
    .requiredOption('-i, --input-dir <dir>', 'Directory containing metadata.json and pages/')
    .option('--target-size <n>', 'Buffer length that triggers a flush')
    .option('--min-size <n>', 'Minimum buffer length before a major header flushes it')
    .option('--max-size <n>', 'Length above which a buffer is split at sentences')
    .option('--no-merging', 'Disable cross-page continuation merging')
    .option('-o, --output <file>', 'Output file (default: <input-dir>/semantic_chunks.json)')
    .option('-q, --quiet', 'Suppress progress output', false)
    .option('-v, --verbose', 'Enable debug output', false)
    .action(async (rawOptions: unknown) => {
      try {
        const options = parseChunkOptions(rawOptions);
        const result = await runChunk(options, getDefaults());
        console.log(formatSummary(result));
      } catch (e: unknown) {
        const err = MCPError.fromUnknown(e);
        createLogger('cli').error(err.message);
        process.exitCode = 1;
      }
    });

  return program;
}
