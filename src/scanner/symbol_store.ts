/**
 * SymbolState Store
 *
 * Owns all per-symbol market state. Writers go through ingest(); readers get a
 * frozen snapshot that is built once per version and reused until the next
 * accepted tick, so evaluators never observe a state mid-update.
 */

import { RingBuffer } from './ring_buffer';
import { InvalidTickError } from './errors';
import type { CatalystTag, SymbolSnapshot, Tick } from './types';
import type { WindowConfig } from '@/scoring/scoring_config';

interface SymbolState {
  readonly symbol: string;
  readonly prices: RingBuffer<number>;
  readonly volumes: RingBuffer<number>;
  catalysts: CatalystTag[];
  floatShares: number | null;
  lastTimestamp: number;
  lastPrice: number;
  sessionVolume: number;
  version: number;
  /** Keys of the ticks accepted at lastTimestamp; older ones are rejected as out of order. */
  keysAtLastTimestamp: Set<string>;
  snapshot: SymbolSnapshot | null;
}

function tickKey(tick: Tick): string {
  const catalyst = tick.catalyst
    ? `${tick.catalyst.category}:${tick.catalyst.headline ?? ''}`
    : '';
  return `${tick.timestamp}|${tick.price}|${tick.volume}|${catalyst}|${tick.floatShares ?? ''}`;
}

function validateTick(tick: Tick, last: SymbolState | undefined): void {
  const symbol = tick.symbol;
  if (typeof symbol !== 'string' || symbol.trim() === '') {
    throw new InvalidTickError('', 'empty_symbol', 'symbol is empty');
  }
  if (!Number.isFinite(tick.timestamp)) {
    throw new InvalidTickError(symbol, 'bad_timestamp', `timestamp ${tick.timestamp} is not finite`);
  }
  if (!Number.isFinite(tick.price) || tick.price <= 0) {
    throw new InvalidTickError(symbol, 'non_positive_price', `price ${tick.price} must be positive`);
  }
  if (!Number.isFinite(tick.volume) || tick.volume < 0) {
    throw new InvalidTickError(symbol, 'negative_volume', `volume ${tick.volume} must be >= 0`);
  }
  if (tick.floatShares !== undefined && !(Number.isFinite(tick.floatShares) && tick.floatShares > 0)) {
    throw new InvalidTickError(
      symbol,
      'non_positive_float',
      `float ${tick.floatShares} must be positive`
    );
  }
  if (last && tick.timestamp < last.lastTimestamp) {
    throw new InvalidTickError(
      symbol,
      'out_of_order',
      `timestamp ${tick.timestamp} is older than last recorded ${last.lastTimestamp}`
    );
  }
}

export class SymbolStateStore {
  private readonly states = new Map<string, SymbolState>();

  constructor(private readonly windows: WindowConfig) {}

  get size(): number {
    return this.states.size;
  }

  /**
   * Applies a tick. Returns false when the tick re-delivers one already
   * accepted for its symbol (state unchanged, version unchanged).
   *
   * @throws InvalidTickError for malformed or out-of-order ticks; nothing is applied.
   */
  ingest(tick: Tick): boolean {
    const existing = this.states.get(tick.symbol);
    validateTick(tick, existing);

    const key = tickKey(tick);
    if (existing?.keysAtLastTimestamp.has(key)) {
      return false;
    }

    const state = existing ?? this.createState(tick.symbol);
    state.prices.push(tick.price);
    state.volumes.push(tick.volume);
    state.lastPrice = tick.price;
    if (tick.timestamp !== state.lastTimestamp) {
      state.keysAtLastTimestamp.clear();
    }
    state.keysAtLastTimestamp.add(key);
    state.lastTimestamp = tick.timestamp;
    state.sessionVolume += tick.volume;
    if (tick.floatShares !== undefined) {
      state.floatShares = tick.floatShares;
    }
    if (tick.catalyst) {
      state.catalysts.push({
        category: tick.catalyst.category.trim().toLowerCase(),
        headline: tick.catalyst.headline ?? null,
        timestamp: tick.timestamp,
      });
    }
    state.version += 1;
    state.snapshot = null;

    if (!existing) {
      this.states.set(tick.symbol, state);
    }
    return true;
  }

  snapshot(symbol: string): SymbolSnapshot | null {
    const state = this.states.get(symbol);
    if (!state) return null;
    if (state.snapshot) return state.snapshot;

    // Retention is measured from the symbol's own clock so a snapshot depends
    // only on the ticks that produced its version.
    const cutoff = state.lastTimestamp - this.windows.catalystRetentionMs;
    if (state.catalysts.length > 0 && state.catalysts[0].timestamp < cutoff) {
      state.catalysts = state.catalysts.filter((tag) => tag.timestamp >= cutoff);
    }

    const snapshot: SymbolSnapshot = Object.freeze({
      symbol: state.symbol,
      version: state.version,
      prices: Object.freeze(state.prices.toArray()),
      volumes: Object.freeze(state.volumes.toArray()),
      lastTimestamp: state.lastTimestamp,
      lastPrice: state.lastPrice,
      sessionVolume: state.sessionVolume,
      floatShares: state.floatShares,
      catalysts: Object.freeze(state.catalysts.map((tag) => Object.freeze({ ...tag }))),
    });
    state.snapshot = snapshot;
    return snapshot;
  }

  version(symbol: string): number | null {
    return this.states.get(symbol)?.version ?? null;
  }

  activeSymbols(): Set<string> {
    return new Set(this.states.keys());
  }

  remove(symbol: string): boolean {
    return this.states.delete(symbol);
  }

  clear(): void {
    this.states.clear();
  }

  private createState(symbol: string): SymbolState {
    return {
      symbol,
      prices: new RingBuffer<number>(this.windows.priceCapacity),
      volumes: new RingBuffer<number>(this.windows.volumeCapacity),
      catalysts: [],
      floatShares: null,
      lastTimestamp: Number.NEGATIVE_INFINITY,
      lastPrice: 0,
      sessionVolume: 0,
      version: 0,
      keysAtLastTimestamp: new Set(),
      snapshot: null,
    };
  }
}
