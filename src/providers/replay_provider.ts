/**
 * Replays a recorded tick file. Each poll releases the next `ticksPerPoll`
 * ticks for subscribed symbols. With `loop`, the recording restarts with
 * timestamps shifted past the previous pass so per-symbol time keeps moving
 * forward.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { validateTickBatch } from '@/validation/ajv_instance';
import { ProviderError } from '@/scanner/errors';
import type { Tick } from '@/scanner/types';
import type { MarketDataProvider, ReplayProviderConfig } from './types';

const logger = createChildLogger('replay_provider');

export interface RawTick {
  symbol: string;
  timestamp: number | string;
  price: number;
  volume: number;
  float_shares?: number;
  catalyst?: { category: string; headline?: string };
}

export interface RawTickBatch {
  description?: string;
  ticks: RawTick[];
}

function toTick(raw: RawTick): Tick {
  const timestamp = typeof raw.timestamp === 'number' ? raw.timestamp : Date.parse(raw.timestamp);
  return Object.freeze({
    symbol: raw.symbol.trim().toUpperCase(),
    timestamp,
    price: raw.price,
    volume: raw.volume,
    ...(raw.float_shares !== undefined ? { floatShares: raw.float_shares } : {}),
    ...(raw.catalyst ? { catalyst: { ...raw.catalyst } } : {}),
  });
}

export function parseTickBatch(data: unknown, source: string): Tick[] {
  const result = validateTickBatch(data);
  if (!result.valid || !result.data) {
    throw new ProviderError(
      `Invalid tick batch ${source}: ${result.errors?.join('; ') ?? 'unknown error'}`,
      'replay',
      'load'
    );
  }
  return result.data.ticks.map(toTick);
}

export function loadTickFile(path: string): Tick[] {
  const fullPath = isAbsolute(path) ? path : join(process.cwd(), path);
  if (!existsSync(fullPath)) {
    throw new ProviderError(`Tick file not found: ${fullPath}`, 'replay', 'load');
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new ProviderError(`Tick file is not valid JSON: ${fullPath}`, 'replay', 'load', error);
  }
  return parseTickBatch(parsed, fullPath);
}

export class ReplayProvider implements MarketDataProvider {
  readonly name = 'replay';
  private readonly subscribed = new Set<string>();
  private cursor = 0;
  private pass = 0;
  private readonly span: number;
  private connected = true;

  constructor(
    private readonly ticks: readonly Tick[],
    private readonly options: Pick<ReplayProviderConfig, 'ticksPerPoll' | 'loop'>
  ) {
    let min = Number.POSITIVE_INFINITY;
    let max = Number.NEGATIVE_INFINITY;
    for (const tick of ticks) {
      if (tick.timestamp < min) min = tick.timestamp;
      if (tick.timestamp > max) max = tick.timestamp;
    }
    this.span = ticks.length > 0 ? max - min + 1 : 0;
  }

  static fromConfig(config: ReplayProviderConfig): ReplayProvider {
    const ticks = loadTickFile(config.path);
    logger.info({ path: config.path, tickCount: ticks.length }, 'Loaded tick recording');
    return new ReplayProvider(ticks, config);
  }

  get exhausted(): boolean {
    return !this.options.loop && this.cursor >= this.ticks.length;
  }

  async poll(_deadline: number): Promise<Tick[]> {
    if (!this.connected) {
      throw new ProviderError('Replay provider is closed', this.name, 'poll');
    }
    const out: Tick[] = [];
    let scanned = 0;
    while (out.length < this.options.ticksPerPoll && this.ticks.length > 0) {
      if (this.cursor >= this.ticks.length) {
        if (!this.options.loop) break;
        this.cursor = 0;
        this.pass += 1;
        logger.debug({ pass: this.pass }, 'Replay restarted');
      }
      // Guard against a recording with no subscribed symbols at all.
      if (scanned >= this.ticks.length) break;
      const tick = this.ticks[this.cursor];
      this.cursor += 1;
      scanned += 1;
      if (!this.subscribed.has(tick.symbol)) continue;
      out.push(
        this.pass === 0 ? tick : Object.freeze({ ...tick, timestamp: tick.timestamp + this.span * this.pass })
      );
    }
    return out;
  }

  async subscribe(symbols: readonly string[]): Promise<void> {
    for (const symbol of symbols) this.subscribed.add(symbol);
  }

  async unsubscribe(symbols: readonly string[]): Promise<void> {
    for (const symbol of symbols) this.subscribed.delete(symbol);
  }

  isConnected(): boolean {
    return this.connected;
  }

  close(): void {
    this.connected = false;
  }
}
