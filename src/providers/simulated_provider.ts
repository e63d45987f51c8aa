/**
 * Seeded random-walk feed for demos and load checks. Each symbol draws from
 * its own generator, so the sequence for one symbol does not depend on which
 * other symbols are subscribed. Tick timestamps come from a virtual clock;
 * the injected clock is only read against the poll deadline.
 */

import { createPrng, deterministicSeed } from '@/core/seed';
import { roundScore } from '@/scoring/normalize';
import { ProviderError } from '@/scanner/errors';
import type { Tick } from '@/scanner/types';
import type { MarketDataProvider, ProviderOptions, SimulatedProviderConfig } from './types';

const CATALYST_CATEGORIES = ['earnings', 'fda', 'mna', 'contracts', 'guidance', 'rumor', 'social'];

interface SimulatedSymbol {
  next: () => number;
  price: number;
  floatShares: number;
  ticksSent: number;
}

export class SimulatedProvider implements MarketDataProvider {
  readonly name = 'simulated';
  private readonly symbols = new Map<string, SimulatedSymbol>();
  private readonly clock: () => number;
  private virtualTime: number;
  private connected = true;

  constructor(
    private readonly config: SimulatedProviderConfig,
    options: ProviderOptions = {}
  ) {
    this.clock = options.clock ?? Date.now;
    this.virtualTime = config.startTime;
  }

  async poll(deadline: number): Promise<Tick[]> {
    if (!this.connected) {
      throw new ProviderError('Simulated provider is closed', this.name, 'poll');
    }
    this.virtualTime += this.config.tickIntervalMs;
    const ticks: Tick[] = [];
    const ordered = [...this.symbols.keys()].sort();
    for (const symbol of ordered) {
      if (this.clock() >= deadline) break;
      const state = this.symbols.get(symbol);
      if (!state) continue;
      ticks.push(this.nextTick(symbol, state));
    }
    return ticks;
  }

  async subscribe(symbols: readonly string[]): Promise<void> {
    for (const symbol of symbols) {
      if (this.symbols.has(symbol)) continue;
      const next = createPrng(deterministicSeed(this.config.seed, symbol));
      this.symbols.set(symbol, {
        next,
        price: roundScore(2 + next() * 18),
        floatShares: Math.round(2_000_000 + next() * 80_000_000),
        ticksSent: 0,
      });
    }
  }

  async unsubscribe(symbols: readonly string[]): Promise<void> {
    for (const symbol of symbols) this.symbols.delete(symbol);
  }

  isConnected(): boolean {
    return this.connected;
  }

  close(): void {
    this.connected = false;
    this.symbols.clear();
  }

  private nextTick(symbol: string, state: SimulatedSymbol): Tick {
    const drift = (state.next() * 2 - 1) * (this.config.volatilityPct / 100);
    state.price = Math.max(0.01, roundScore(state.price * (1 + drift)));
    // Occasional volume bursts give the volume pillar something to find.
    const burst = state.next() < 0.05 ? 8 : 1;
    const volume = Math.round((500 + state.next() * 20_000) * burst);

    let catalyst: Tick['catalyst'];
    if (state.next() < this.config.catalystProbability) {
      const category = CATALYST_CATEGORIES[Math.floor(state.next() * CATALYST_CATEGORIES.length)];
      catalyst = { category, headline: `${symbol} ${category} headline` };
    }

    const first = state.ticksSent === 0;
    state.ticksSent += 1;
    return Object.freeze({
      symbol,
      timestamp: this.virtualTime,
      price: state.price,
      volume,
      ...(catalyst ? { catalyst } : {}),
      ...(first ? { floatShares: state.floatShares } : {}),
    });
  }
}
