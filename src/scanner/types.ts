/**
 * Shared types for the scan engine.
 *
 * Everything handed across a component boundary is read-only: ticks once a
 * provider emits them, snapshots once the store builds them, scores once an
 * evaluator returns them and results once the scheduler publishes them.
 */

export const PILLAR_IDS = ['price', 'momentum', 'volume', 'catalyst', 'float'] as const;

export type PillarId = (typeof PILLAR_IDS)[number];

export interface CatalystEvent {
  category: string;
  headline?: string;
}

export interface Tick {
  readonly symbol: string;
  /** Epoch milliseconds. */
  readonly timestamp: number;
  readonly price: number;
  /** Shares traded since the previous tick for this symbol. */
  readonly volume: number;
  readonly catalyst?: CatalystEvent;
  readonly floatShares?: number;
}

export interface CatalystTag {
  readonly category: string;
  readonly headline: string | null;
  readonly timestamp: number;
}

export interface SymbolSnapshot {
  readonly symbol: string;
  readonly version: number;
  /** Oldest first. */
  readonly prices: readonly number[];
  /** Oldest first, aligned with the volume window rather than the price window. */
  readonly volumes: readonly number[];
  readonly lastTimestamp: number;
  readonly lastPrice: number;
  readonly sessionVolume: number;
  readonly floatShares: number | null;
  /** Tags inside the retention window, oldest first. */
  readonly catalysts: readonly CatalystTag[];
}

export interface PillarScore {
  readonly pillar: PillarId;
  readonly symbol: string;
  readonly version: number;
  /** Always within [0, 100]. */
  readonly score: number;
  /** The raw measurement behind the score, when there was one. */
  readonly value: number | string | null;
  readonly insufficientData: boolean;
  /** Whether the measurement clears the pillar's qualification threshold. */
  readonly passed: boolean;
  readonly threshold: number | string | null;
  readonly reason: string;
}

export type PillarScores = Readonly<Record<PillarId, PillarScore>>;

export type PillarToggles = Readonly<Record<PillarId, boolean>>;

export interface CompositeScore {
  readonly symbol: string;
  readonly version: number;
  readonly score: number;
  readonly pillars: PillarScores;
  /** Disabled pillars count as passed. Both lists follow PILLAR_IDS order. */
  readonly passedPillars: readonly PillarId[];
  readonly failedPillars: readonly PillarId[];
  readonly passedAll: boolean;
}

export type SessionPhase = 'premarket' | 'early' | 'regular' | 'afterhours' | 'closed';

export interface RankedScore extends CompositeScore {
  readonly rank: number;
  readonly lastPrice: number;
  readonly session: SessionPhase;
}

export type CyclePhase = 'idle' | 'ingesting' | 'evaluating' | 'aggregating' | 'emitted';

export type CycleStatus = 'ok' | 'degraded';

export type DegradedReasonCode = 'deadline_exceeded' | 'provider_unavailable';

export interface DegradedReason {
  readonly code: DegradedReasonCode;
  readonly message: string;
}

export interface FailedSymbol {
  readonly symbol: string;
  readonly code: string;
  readonly message: string;
}

export interface PhaseTimings {
  readonly ingestMs: number;
  readonly evaluateMs: number;
  readonly aggregateMs: number;
}

export interface CycleCounters {
  readonly ticksReceived: number;
  readonly ticksApplied: number;
  readonly ticksDuplicate: number;
  readonly ticksRejected: number;
  readonly ticksOutsideUniverse: number;
  readonly symbolsActive: number;
  readonly symbolsEvaluated: number;
  readonly symbolsQualified: number;
  readonly cacheHits: number;
  readonly cacheMisses: number;
}

export interface ScanResult {
  readonly cycleId: string;
  readonly sequence: number;
  readonly startedAt: number;
  readonly durationMs: number;
  readonly status: CycleStatus;
  readonly degradedReasons: readonly DegradedReason[];
  readonly entries: readonly RankedScore[];
  readonly skippedSymbols: readonly string[];
  readonly failedSymbols: readonly FailedSymbol[];
  readonly timings: PhaseTimings;
  readonly counters: CycleCounters;
  /** Hash of the ranking (symbols, versions, scores); equal inputs give equal fingerprints. */
  readonly fingerprint: string;
}

export type ScanResultListener = (result: ScanResult) => void | Promise<void>;
