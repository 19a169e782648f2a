/**
 * Stderr Logger
 *
 * CRITICAL: NEVER use console.log() - stdout is the JSON-RPC stream for the
 * MCP server and the summary channel for the CLI. Every line goes through
 * console.error() with a bracketed component prefix.
 *
 * @module utils/logger
 */

export interface Logger {
  /** Emitted only in verbose mode */
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Build a logger that writes `[prefix] message` lines to stderr.
 *
 * @param prefix - Component name without brackets, e.g. 'chunker'
 * @param verbose - Whether debug lines are written
 */
export function createLogger(prefix: string, verbose = false): Logger {
  const tag = `[${prefix}]`;
  return {
    debug(message) {
      if (verbose) {
        console.error(`${tag} ${message}`);
      }
    },
    info(message) {
      console.error(`${tag} ${message}`);
    },
    warn(message) {
      console.error(`${tag} WARNING: ${message}`);
    },
    error(message) {
      console.error(`${tag} ERROR: ${message}`);
    },
  };
}

const noop = (): void => {};

/** Discards everything */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
