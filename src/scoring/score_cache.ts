/**
 * Score Cache
 *
 * Memoizes pillar scores per (symbol, pillar) slot, tagged with the state
 * version they were computed from. A lookup for a newer version is a miss and
 * overwrites the slot (lazy invalidation); a capacity bound evicts the least
 * recently used slot. Values are stored only after compute() has returned, so
 * a reader never sees a partially derived score.
 */

import type { PillarId, PillarScore } from '@/scanner/types';

interface CacheSlot {
  version: number;
  score: PillarScore;
}

export interface ScoreCacheStats {
  hits: number;
  misses: number;
  staleMisses: number;
  evictions: number;
  size: number;
  capacity: number;
}

function slotKey(symbol: string, pillar: PillarId): string {
  return `${symbol}\u0000${pillar}`;
}

export class ScoreCache {
  // Map iteration order doubles as the recency list: oldest first.
  private readonly slots = new Map<string, CacheSlot>();
  private hits = 0;
  private misses = 0;
  private staleMisses = 0;
  private evictions = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Score cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.slots.size;
  }

  getOrCompute(
    symbol: string,
    pillar: PillarId,
    version: number,
    compute: () => PillarScore
  ): PillarScore {
    const key = slotKey(symbol, pillar);
    const slot = this.slots.get(key);

    if (slot && slot.version === version) {
      this.hits += 1;
      this.slots.delete(key);
      this.slots.set(key, slot);
      return slot.score;
    }

    this.misses += 1;
    if (slot && slot.version < version) {
      this.staleMisses += 1;
    }

    const score = compute();

    // Never regress a slot to an older version than it already holds.
    if (slot && slot.version > version) {
      return score;
    }

    this.slots.delete(key);
    this.slots.set(key, { version, score });
    this.evictOverflow();
    return score;
  }

  peek(symbol: string, pillar: PillarId, version: number): PillarScore | undefined {
    const slot = this.slots.get(slotKey(symbol, pillar));
    return slot && slot.version === version ? slot.score : undefined;
  }

  invalidateSymbol(symbol: string, pillars: readonly PillarId[]): number {
    let removed = 0;
    for (const pillar of pillars) {
      if (this.slots.delete(slotKey(symbol, pillar))) removed += 1;
    }
    return removed;
  }

  clear(): void {
    this.slots.clear();
  }

  stats(): ScoreCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      staleMisses: this.staleMisses,
      evictions: this.evictions,
      size: this.slots.size,
      capacity: this.capacity,
    };
  }

  private evictOverflow(): void {
    while (this.slots.size > this.capacity) {
      const oldest = this.slots.keys().next();
      if (oldest.done) return;
      this.slots.delete(oldest.value);
      this.evictions += 1;
    }
  }
}
