/**
 * SHA-256 Hash Utilities for Chunk Identity
 *
 * Chunk ids are content hashes of the rendered chunk text.
 * All hashes use the format: 'sha256:' + 64-character lowercase hex string.
 *
 * @module utils/hash
 */

import crypto from 'crypto';

/**
 * Hash prefix used for all SHA-256 hashes in this system
 */
export const HASH_PREFIX = 'sha256:';

/**
 * Compute SHA-256 hash of content
 *
 * @param content - String or Buffer to hash
 * @returns Hash in format 'sha256:' + 64-char lowercase hex string
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  const hash = crypto.createHash('sha256').update(content).digest('hex');

  return HASH_PREFIX + hash;
}

/**
 * Short form for log lines: prefix stripped, first 8 hex characters
 */
export function shortHash(hash: string): string {
  const hex = hash.startsWith(HASH_PREFIX) ? hash.slice(HASH_PREFIX.length) : hash;
  return hex.slice(0, 8);
}
