/**
 * Shared Startup Configuration
 *
 * Applies environment-driven config overrides. Used by both src/index.ts
 * (MCP stdio) and src/cli.ts.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { ServerConfig } from './types.js';
import { getConfig, updateConfig } from './state.js';
import { assertSizeOrdering } from '../utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// .env LOADING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Load .env from the first candidate location that exists:
 * 1. CHUNKER_ENV_FILE env var (explicit override)
 * 2. CWD/.env (project-local)
 * 3. Package root/.env (development)
 *
 * @returns Path loaded, or null when no candidate exists
 */
export function loadEnvironmentFile(): string | null {
  const here = path.dirname(fileURLToPath(import.meta.url));
  const envCandidates = [
    process.env.CHUNKER_ENV_FILE,
    path.resolve(process.cwd(), '.env'),
    path.resolve(here, '..', '..', '.env'),
  ].filter((p): p is string => typeof p === 'string');

  for (const envPath of envCandidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      return envPath;
    }
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT OVERRIDES
// ═══════════════════════════════════════════════════════════════════════════════

const EnvSize = z.coerce.number().int().positive();

const EnvBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((v) => v === 'true' || v === '1' || v === 'yes');

type SizeKey = 'targetSize' | 'minSize' | 'maxSize';
type FlagKey = 'enableMerging' | 'verbose';

const SIZE_ENV_VARS: ReadonlyArray<[string, SizeKey]> = [
  ['CHUNKER_TARGET_SIZE', 'targetSize'],
  ['CHUNKER_MIN_SIZE', 'minSize'],
  ['CHUNKER_MAX_SIZE', 'maxSize'],
];

const FLAG_ENV_VARS: ReadonlyArray<[string, FlagKey]> = [
  ['CHUNKER_ENABLE_MERGING', 'enableMerging'],
  ['CHUNKER_VERBOSE', 'verbose'],
];

/**
 * Read CHUNKER_* overrides from an environment.
 * Invalid values are skipped and reported in `warnings`.
 */
export function readEnvOverrides(env: NodeJS.ProcessEnv): {
  overrides: Partial<ServerConfig>;
  warnings: string[];
} {
  const overrides: Partial<ServerConfig> = {};
  const warnings: string[] = [];

  for (const [name, key] of SIZE_ENV_VARS) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;
    const parsed = EnvSize.safeParse(raw);
    if (parsed.success) {
      overrides[key] = parsed.data;
    } else {
      warnings.push(`${name}="${raw}" is not a positive integer; ignored`);
    }
  }

  for (const [name, key] of FLAG_ENV_VARS) {
    const raw = env[name];
    if (raw === undefined || raw === '') continue;
    const parsed = EnvBoolean.safeParse(raw);
    if (parsed.success) {
      overrides[key] = parsed.data;
    } else {
      warnings.push(`${name}="${raw}" is not a boolean; ignored`);
    }
  }

  return { overrides, warnings };
}

/**
 * Apply environment-driven config overrides to server state.
 * Warnings only: a bad value never stops startup.
 */
export function applyEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): void {
  const { overrides, warnings } = readEnvOverrides(env);

  let applied: Partial<ServerConfig> = overrides;
  try {
    assertSizeOrdering({ ...getConfig(), ...overrides });
  } catch (error) {
    warnings.push(
      `${error instanceof Error ? error.message : String(error)}; size overrides ignored`
    );
    applied = {};
    for (const [, key] of FLAG_ENV_VARS) {
      const value = overrides[key];
      if (value !== undefined) applied[key] = value;
    }
  }
  updateConfig(applied);

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  for (const [key, value] of Object.entries(applied)) {
    console.error(`[Config] ${key}=${String(value)} (from environment)`);
  }
}
