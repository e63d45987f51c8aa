/**
 * Deterministic seed generation for reproducible simulated feeds
 */

import { createHash } from 'crypto';

export function deterministicHash(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

export function deterministicSeed(seed: string, salt: string = ''): number {
  const hash = deterministicHash(`${seed}${salt}`);
  // Use first 8 hex characters as a number
  return parseInt(hash.substring(0, 8), 16);
}

/** mulberry32; the sequence depends only on the 32-bit seed. */
export function createPrng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
