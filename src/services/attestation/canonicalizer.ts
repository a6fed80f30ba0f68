/**
 * Canonicalizer and content hasher
 *
 * Canonical form of a hypothesis:
 *   - only the fields in CANONICAL_FIELDS (an allow-list; anything else is metadata)
 *   - object keys sorted by Unicode code point at every depth
 *   - array order preserved
 *   - no insignificant whitespace, non-ASCII characters written as-is
 *
 * Logically identical records produce byte-identical output regardless of
 * key order, so the content hash depends only on content.
 *
 * @module services/attestation/canonicalizer
 */

import { CANONICAL_FIELDS, type HypothesisRecord } from '../../models/hypothesis.js';
import { InputValidationError } from '../../server/errors.js';
import { computeHash } from '../../utils/hash.js';
import type { DeepReadonly } from '../../utils/freeze.js';

/**
 * Compare two keys by code point, which matches UTF-8 byte order.
 * (Default string sort compares UTF-16 code units and misorders astral characters.)
 */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a);
  const right = Array.from(b);
  const length = Math.min(left.length, right.length);

  for (let i = 0; i < length; i++) {
    const diff = (left[i].codePointAt(0) ?? 0) - (right[i].codePointAt(0) ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return left.length - right.length;
}

/**
 * Serialize any JSON-compatible value canonically.
 * Object properties whose value is undefined are omitted.
 *
 * @throws InputValidationError for non-finite numbers, undefined array
 *   elements, or values with no JSON form
 */
export function serializeCanonical(value: unknown, path = '$'): string {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return JSON.stringify(value);
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new InputValidationError(`Cannot canonicalize non-finite number at ${path}`, { path });
    }
    return JSON.stringify(value);
  }
  if (typeof value !== 'object') {
    throw new InputValidationError(`Cannot canonicalize ${typeof value} at ${path}`, { path });
  }
  if (value === null) {
    return 'null';
  }

  if (Array.isArray(value)) {
    const items = value.map((item: unknown, i) => {
      if (item === undefined) {
        throw new InputValidationError(`Cannot canonicalize undefined array element at ${path}[${i}]`, {
          path: `${path}[${i}]`,
        });
      }
      return serializeCanonical(item, `${path}[${i}]`);
    });
    return `[${items.join(',')}]`;
  }

  const entries: Array<[string, unknown]> = Object.entries(value);
  const members = entries
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => compareCodePoints(a, b))
    .map(([key, member]) => `${JSON.stringify(key)}:${serializeCanonical(member, `${path}.${key}`)}`);

  return `{${members.join(',')}}`;
}

/**
 * Keep only the hashed fields of a record.
 */
export function projectCanonicalFields(
  record: HypothesisRecord | DeepReadonly<HypothesisRecord>
): Record<string, unknown> {
  const projected: Record<string, unknown> = {};
  for (const field of CANONICAL_FIELDS) {
    projected[field] = record[field];
  }
  return projected;
}

/**
 * Canonical JSON string of a hypothesis record.
 */
export function canonicalize(record: HypothesisRecord | DeepReadonly<HypothesisRecord>): string {
  return serializeCanonical(projectCanonicalFields(record));
}

/**
 * Content hash of a hypothesis record: '0x' + sha256(canonical form).
 */
export function hashHypothesis(record: HypothesisRecord | DeepReadonly<HypothesisRecord>): string {
  return computeHash(canonicalize(record));
}
