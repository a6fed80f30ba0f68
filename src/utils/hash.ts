/**
 * Content hashing
 *
 * Hashes are '0x' followed by the lowercase hex SHA-256 digest of the
 * UTF-8 encoded input.
 *
 * @module utils/hash
 */

import * as crypto from 'crypto';

export const HASH_PREFIX = '0x';

const HASH_PATTERN = /^0x[0-9a-f]{64}$/;

/**
 * Compute the content hash of a string
 */
export function computeHash(content: string): string {
  return HASH_PREFIX + crypto.createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Check that a value has the shape of a content hash
 */
export function isValidHashFormat(value: string): boolean {
  return HASH_PATTERN.test(value);
}

/**
 * Recompute the hash of `content` and compare it with `expected`
 */
export function verifyHash(content: string, expected: string): boolean {
  return computeHash(content) === expected;
}
