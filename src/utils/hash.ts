/**
 * Hashing utilities for result fingerprints
 */

import { createHash } from 'crypto';

export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/** Key order independent, so equal content always hashes equal. */
export function contentHash(content: unknown): string {
  return sha256(stableStringify(content));
}

export function stableStringify(obj: unknown): string {
  if (obj === null || typeof obj !== 'object') {
    return JSON.stringify(obj) ?? 'null';
  }

  if (Array.isArray(obj)) {
    return '[' + obj.map(stableStringify).join(',') + ']';
  }

  const pairs = Object.entries(obj)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => JSON.stringify(key) + ':' + stableStringify(value));
  return '{' + pairs.join(',') + '}';
}
