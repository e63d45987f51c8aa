/**
 * Shared types for market data providers.
 *
 * The scan engine only talks to this contract. Connection handling, retry and
 * reconnection policy belong to the concrete provider, never to the engine.
 */
import type { Tick } from '@/scanner/types';

export interface MarketDataProvider {
  readonly name: string;
  /**
   * Returns whatever ticks are available before `deadline` (epoch ms). Must
   * not block past the deadline; an empty array means nothing new.
   */
  poll(deadline: number): Promise<Tick[]>;
  subscribe(symbols: readonly string[]): Promise<void>;
  unsubscribe(symbols: readonly string[]): Promise<void>;
  isConnected(): boolean;
  /** Set by finite feeds; true once nothing is left to deliver. */
  readonly exhausted?: boolean;
  close(): void;
}

export interface ProviderOptions {
  /** Epoch ms, in the same time base as the deadline passed to poll(). */
  clock?: () => number;
}

export type ProviderType = 'memory' | 'replay' | 'simulated';

export interface MemoryProviderConfig {
  type: 'memory';
}

export interface ReplayProviderConfig {
  type: 'replay';
  path: string;
  ticksPerPoll: number;
  loop: boolean;
}

export interface SimulatedProviderConfig {
  type: 'simulated';
  seed: string;
  /** Epoch ms of the first simulated tick. */
  startTime: number;
  tickIntervalMs: number;
  volatilityPct: number;
  catalystProbability: number;
}

export type ProviderConfig =
  | MemoryProviderConfig
  | ReplayProviderConfig
  | SimulatedProviderConfig;
