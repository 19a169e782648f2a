#!/usr/bin/env node
/**
 * Semantic Page Chunker - CLI Entry Point
 *
 * Usage:
 *   semantic-page-chunker --input-dir ./extracted/report
 *   semantic-page-chunker -i ./extracted/report --target-size 1200 --no-merging
 *
 * @module cli
 */

import { buildProgram } from './cli/chunk-command.js';
import { applyEnvironmentConfig, loadEnvironmentFile } from './server/startup.js';
import { getConfig } from './server/state.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('cli');

loadEnvironmentFile();
applyEnvironmentConfig();

buildProgram(getConfig)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
