/**
 * In-process provider backed by a queue. Ticks pushed in are delivered on the
 * next poll, in push order. Used for tests and for embedding the scanner
 * behind another feed.
 */

import { ProviderError } from '@/scanner/errors';
import type { Tick } from '@/scanner/types';
import type { MarketDataProvider } from './types';

export class InMemoryProvider implements MarketDataProvider {
  readonly name: string;
  private queue: Tick[] = [];
  private readonly subscribed = new Set<string>();
  private connected = true;
  private pollCount = 0;

  constructor(name: string = 'memory') {
    this.name = name;
  }

  push(...ticks: Tick[]): void {
    for (const tick of ticks) {
      this.queue.push(Object.freeze({ ...tick }));
    }
  }

  setConnected(connected: boolean): void {
    this.connected = connected;
  }

  getPollCount(): number {
    return this.pollCount;
  }

  subscribedSymbols(): string[] {
    return [...this.subscribed].sort();
  }

  async poll(_deadline: number): Promise<Tick[]> {
    this.pollCount += 1;
    if (!this.connected) {
      throw new ProviderError('Provider is disconnected', this.name, 'poll');
    }
    const drained = this.queue;
    this.queue = [];
    return drained;
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
    this.queue = [];
  }
}
