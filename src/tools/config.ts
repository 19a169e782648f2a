/**
 * Configuration Management MCP Tools
 *
 * Tools: chunker_config_get, chunker_config_set
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { DEDUP_WINDOW } from '../models/chunk.js';
import { getConfig, state, updateConfig } from '../server/state.js';
import { successResult, type ServerConfig } from '../server/types.js';
import {
  validateInput,
  assertSizeOrdering,
  ConfigGetInput,
  ConfigSetInput,
  ConfigKey,
} from '../utils/validation.js';
import { validationError } from '../server/errors.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Map config keys to their state property names */
const CONFIG_KEY_MAP = {
  target_size: 'targetSize',
  min_size: 'minSize',
  max_size: 'maxSize',
  enable_merging: 'enableMerging',
  verbose: 'verbose',
} as const satisfies Record<ConfigKey, keyof ServerConfig>;

function getConfigValue(key: ConfigKey): number | boolean {
  return getConfig()[CONFIG_KEY_MAP[key]];
}

function requireSize(key: ConfigKey, v: unknown): number {
  if (typeof v !== 'number' || !Number.isInteger(v) || v < 1) {
    throw validationError(`${key} must be a positive integer`, { value: v });
  }
  return v;
}

function requireBoolean(key: ConfigKey, v: unknown): boolean {
  if (typeof v !== 'boolean') {
    throw validationError(`${key} must be a boolean`, { value: v });
  }
  return v;
}

/**
 * Validate one value and build the config update for it
 */
function buildConfigUpdate(key: ConfigKey, value: unknown): Partial<ServerConfig> {
  switch (key) {
    case 'target_size':
      return { targetSize: requireSize(key, value) };
    case 'min_size':
      return { minSize: requireSize(key, value) };
    case 'max_size':
      return { maxSize: requireSize(key, value) };
    case 'enable_merging':
      return { enableMerging: requireBoolean(key, value) };
    case 'verbose':
      return { verbose: requireBoolean(key, value) };
  }
}

/**
 * Apply a single key. Size changes are rejected when they would break
 * min_size <= target_size <= max_size.
 */
function setConfigValue(key: ConfigKey, value: string | number | boolean): void {
  const update = buildConfigUpdate(key, value);
  assertSizeOrdering({ ...getConfig(), ...update });
  updateConfig(update);
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);

    const configNextSteps = [
      { tool: 'chunker_config_set', description: 'Change a configuration setting' },
      { tool: 'chunker_document_process', description: 'Chunk a document with these defaults' },
    ];

    // Return specific key if requested
    if (input.key) {
      const value = getConfigValue(input.key);
      return formatResponse(successResult({ key: input.key, value, next_steps: configNextSteps }));
    }

    const config = getConfig();
    return formatResponse(
      successResult({
        target_size: config.targetSize,
        min_size: config.minSize,
        max_size: config.maxSize,
        enable_merging: config.enableMerging,
        verbose: config.verbose,

        // Immutable values (informational only)
        hash_algorithm: 'sha256',
        dedup_window: DEDUP_WINDOW,

        documents_processed: state.documentsProcessed,

        next_steps: configNextSteps,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);

    setConfigValue(input.key, input.value);
    console.error(`[Config] ${input.key}=${String(input.value)}`);

    return formatResponse(
      successResult({
        key: input.key,
        value: input.value,
        updated: true,
        next_steps: [
          { tool: 'chunker_config_get', description: 'Verify the updated configuration' },
          { tool: 'chunker_document_process', description: 'Process documents with new settings' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Config tools collection for MCP server registration
 */
export const configTools: Record<string, ToolDefinition> = {
  chunker_config_get: {
    description:
      '[STATUS] Use to view the default chunking configuration (target/min/max size, cross-page merging, verbose logging). Returns all or one specific key.',
    inputSchema: {
      key: ConfigKey.optional().describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
  chunker_config_set: {
    description:
      '[SETUP] Use to change one default chunking setting. Sizes must keep min_size <= target_size <= max_size. Returns updated value.',
    inputSchema: {
      key: ConfigKey.describe('Configuration key to update'),
      value: z.union([z.string(), z.number(), z.boolean()]).describe('New value'),
    },
    handler: handleConfigSet,
  },
};
