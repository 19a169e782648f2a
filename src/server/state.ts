/**
 * MCP Server State Management
 *
 * Holds the server-wide chunking defaults. Engine calls never read this
 * directly: tool handlers and the CLI resolve a ChunkingConfig from it and
 * pass that explicitly.
 *
 * @module server/state
 */

import { DEFAULT_CHUNKING_CONFIG, type ChunkingConfig } from '../models/chunk.js';
import type { ServerConfig, ServerState } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

const defaultConfig: ServerConfig = {
  ...DEFAULT_CHUNKING_CONFIG,
  verbose: false,
};

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

export const state: ServerState = {
  config: { ...defaultConfig },
  documentsProcessed: 0,
};

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Get a copy of the current server configuration
 */
export function getConfig(): ServerConfig {
  return { ...state.config };
}

/**
 * Update server configuration (shallow merge)
 */
export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = { ...state.config, ...updates };
}

/**
 * Reset configuration to defaults
 */
export function resetConfig(): void {
  state.config = { ...defaultConfig };
}

/**
 * Current chunking defaults, without server-only settings
 */
export function getChunkingDefaults(): ChunkingConfig {
  const { targetSize, minSize, maxSize, enableMerging } = state.config;
  return { targetSize, minSize, maxSize, enableMerging };
}

export function recordDocumentProcessed(): void {
  state.documentsProcessed++;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTING)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all state to initial values
 */
export function resetState(): void {
  resetConfig();
  state.documentsProcessed = 0;
}
