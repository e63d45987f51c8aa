/**
 * Scan Cycle Scheduler
 *
 * Drives one cycle at a time through idle → ingesting → evaluating →
 * aggregating → emitted. Cycle-level failures (provider outage, deadline
 * overrun) are reported on the ScanResult; runCycle() never throws for them.
 */

import type { Logger } from 'pino';
import { createChildLogger } from '@/utils/logger';
import { contentHash } from '@/utils/hash';
import { getCycleId, getSessionPhase } from '@/core/time';
import { aggregate, compareSymbols, rank } from '@/scoring/aggregator';
import { PILLAR_EVALUATORS, type PillarRegistry } from '@/scoring/pillars';
import { ScoreCache } from '@/scoring/score_cache';
import type { ScannerConfig } from '@/scoring/scoring_config';
import type { MarketDataProvider } from '@/providers/types';
import {
  DeadlineExceededError,
  ProviderUnavailableError,
  ScannerError,
  errorMessage,
} from './errors';
import { SymbolStateStore } from './symbol_store';
import {
  PILLAR_IDS,
  type CompositeScore,
  type CycleCounters,
  type CyclePhase,
  type DegradedReason,
  type FailedSymbol,
  type PillarScore,
  type RankedScore,
  type ScanResult,
  type ScanResultListener,
  type SymbolSnapshot,
  type Tick,
} from './types';

export interface ScanCycleSchedulerOptions {
  provider: MarketDataProvider;
  config: ScannerConfig;
  universe: readonly string[];
  store?: SymbolStateStore;
  cache?: ScoreCache;
  /** Replaces the pillar evaluators; used to instrument or slow evaluation. */
  evaluators?: PillarRegistry;
  /** Epoch ms. Defaults to Date.now. */
  clock?: () => number;
  logger?: Logger;
}

interface IngestOutcome {
  reasons: DegradedReason[];
  received: number;
  applied: number;
  duplicate: number;
  rejected: number;
  outsideUniverse: number;
}

interface EvaluationOutcome {
  completed: Map<string, PillarScore[]>;
  skipped: string[];
  failed: FailedSymbol[];
  deadlineHit: boolean;
}

const INGEST_TIMEOUT = Symbol('ingest-timeout');

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function failure(symbol: string, error: unknown): FailedSymbol {
  return {
    symbol,
    code: error instanceof ScannerError ? error.code : 'evaluation_error',
    message: errorMessage(error),
  };
}

export class ScanCycleScheduler {
  readonly store: SymbolStateStore;
  readonly cache: ScoreCache;

  private readonly provider: MarketDataProvider;
  private readonly config: ScannerConfig;
  private readonly evaluators: PillarRegistry;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private readonly listeners: ScanResultListener[] = [];

  private universe: Set<string>;
  private subscribed = false;
  private sequence = 0;
  private skippedCycles = 0;
  private currentPhase: CyclePhase = 'idle';
  private running: Promise<ScanResult> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private latest: ScanResult | null = null;

  constructor(options: ScanCycleSchedulerOptions) {
    this.provider = options.provider;
    this.config = options.config;
    this.store = options.store ?? new SymbolStateStore(options.config.windows);
    this.cache = options.cache ?? new ScoreCache(options.config.cache.capacity);
    this.evaluators = options.evaluators ?? PILLAR_EVALUATORS;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createChildLogger('scheduler');
    this.universe = new Set(options.universe);
  }

  get phase(): CyclePhase {
    return this.currentPhase;
  }

  get lastResult(): ScanResult | null {
    return this.latest;
  }

  get skippedCycleCount(): number {
    return this.skippedCycles;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  onResult(listener: ScanResultListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) this.listeners.splice(index, 1);
    };
  }

  /**
   * Runs one cycle. A call made while a cycle is in flight returns that
   * cycle's result instead of starting a second one.
   */
  runCycle(): Promise<ScanResult> {
    if (this.running) {
      return this.running;
    }
    const cycle = this.executeCycle().finally(() => {
      this.running = null;
    });
    this.running = cycle;
    return cycle;
  }

  /** Runs a cycle now, then one every `cycle.intervalMs`. */
  start(): void {
    if (this.timer) return;
    this.logger.info(
      {
        intervalMs: this.config.cycle.intervalMs,
        deadlineMs: this.config.cycle.deadlineMs,
        universe: this.universe.size,
        provider: this.provider.name,
      },
      'Scanner started'
    );
    this.timer = setInterval(() => this.onInterval(), this.config.cycle.intervalMs);
    this.onInterval();
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      this.logger.info({ cycles: this.sequence, skippedCycles: this.skippedCycles }, 'Scanner stopped');
    }
    if (this.running) {
      await this.running;
    }
  }

  async setUniverse(symbols: readonly string[]): Promise<void> {
    if (this.running) {
      await this.running;
    }
    const next = new Set(symbols);
    const removed = [...this.universe].filter((symbol) => !next.has(symbol));
    const added = [...next].filter((symbol) => !this.universe.has(symbol));
    this.universe = next;

    for (const symbol of removed) {
      this.store.remove(symbol);
      this.cache.invalidateSymbol(symbol, PILLAR_IDS);
    }
    if (!this.subscribed) {
      // The first cycle subscribes the whole universe.
      return;
    }
    if (removed.length > 0) await this.provider.unsubscribe(removed);
    if (added.length > 0) await this.provider.subscribe(added);
    this.logger.info({ added, removed }, 'Universe updated');
  }

  private onInterval(): void {
    if (this.running) {
      this.skippedCycles += 1;
      this.logger.warn(
        { phase: this.currentPhase, skippedCycles: this.skippedCycles },
        'Previous cycle still running; skipping this interval'
      );
      return;
    }
    this.runCycle().catch((error: unknown) => {
      this.logger.error({ error: errorMessage(error) }, 'Scan cycle failed');
    });
  }

  private async executeCycle(): Promise<ScanResult> {
    const startedAt = this.clock();
    const deadline = startedAt + this.config.cycle.deadlineMs;
    this.sequence += 1;
    const sequence = this.sequence;
    const cycleId = getCycleId(startedAt, sequence);
    const statsBefore = this.cache.stats();

    this.currentPhase = 'ingesting';
    const ingest = await this.ingest(startedAt);
    const ingestedAt = this.clock();

    this.currentPhase = 'evaluating';
    const snapshots = this.takeSnapshots();
    const evaluation = await this.evaluate(snapshots, deadline);
    const evaluatedAt = this.clock();

    this.currentPhase = 'aggregating';
    const reasons = [...ingest.reasons];
    if (evaluation.deadlineHit) {
      const error = new DeadlineExceededError(this.config.cycle.deadlineMs, 'evaluating');
      reasons.push({ code: 'deadline_exceeded', message: error.message });
      this.logger.warn(
        { cycleId, skipped: evaluation.skipped, completed: evaluation.completed.size },
        'Cycle deadline exceeded; symbols skipped'
      );
    }

    const failed = [...evaluation.failed];
    const composites: CompositeScore[] = [];
    for (const snapshot of snapshots) {
      const scores = evaluation.completed.get(snapshot.symbol);
      if (!scores) continue;
      try {
        composites.push(
          aggregate(
            snapshot.symbol,
            scores,
            snapshot.version,
            this.config.pillarWeights,
            this.config.enabledPillars
          )
        );
      } catch (error) {
        failed.push(failure(snapshot.symbol, error));
        this.logger.error(
          { cycleId, symbol: snapshot.symbol, error: errorMessage(error) },
          'Aggregation failed'
        );
      }
    }

    const bySymbol = new Map(snapshots.map((snapshot) => [snapshot.symbol, snapshot]));
    const entries = rank(composites, (symbol) => {
      const snapshot = bySymbol.get(symbol);
      return {
        lastPrice: snapshot?.lastPrice ?? 0,
        session: getSessionPhase(snapshot?.lastTimestamp ?? Number.NaN),
      };
    });
    const finishedAt = this.clock();
    const statsAfter = this.cache.stats();

    // Every symbol made the evaluation cutoff but aggregation ran past it.
    if (!evaluation.deadlineHit && finishedAt > deadline) {
      const error = new DeadlineExceededError(this.config.cycle.deadlineMs, 'aggregating');
      reasons.push({ code: 'deadline_exceeded', message: error.message });
      this.logger.warn(
        { cycleId, aggregateMs: finishedAt - evaluatedAt, durationMs: finishedAt - startedAt },
        'Cycle deadline exceeded during aggregation'
      );
    }

    const counters: CycleCounters = {
      ticksReceived: ingest.received,
      ticksApplied: ingest.applied,
      ticksDuplicate: ingest.duplicate,
      ticksRejected: ingest.rejected,
      ticksOutsideUniverse: ingest.outsideUniverse,
      symbolsActive: snapshots.length,
      symbolsEvaluated: evaluation.completed.size,
      symbolsQualified: entries.filter((entry) => entry.passedAll).length,
      cacheHits: statsAfter.hits - statsBefore.hits,
      cacheMisses: statsAfter.misses - statsBefore.misses,
    };

    const result = deepFreeze<ScanResult>({
      cycleId,
      sequence,
      startedAt,
      durationMs: Math.max(0, finishedAt - startedAt),
      status: reasons.length > 0 ? 'degraded' : 'ok',
      degradedReasons: reasons,
      entries,
      skippedSymbols: evaluation.skipped,
      failedSymbols: failed,
      timings: {
        ingestMs: Math.max(0, ingestedAt - startedAt),
        evaluateMs: Math.max(0, evaluatedAt - ingestedAt),
        aggregateMs: Math.max(0, finishedAt - evaluatedAt),
      },
      counters,
      fingerprint: fingerprint(entries),
    });

    this.currentPhase = 'emitted';
    this.latest = result;
    this.logger.debug(
      {
        cycleId,
        status: result.status,
        entries: entries.length,
        durationMs: result.durationMs,
        cacheHits: counters.cacheHits,
        cacheMisses: counters.cacheMisses,
      },
      'Cycle emitted'
    );
    await this.publish(result);
    this.currentPhase = 'idle';
    return result;
  }

  private async ingest(startedAt: number): Promise<IngestOutcome> {
    const outcome: IngestOutcome = {
      reasons: [],
      received: 0,
      applied: 0,
      duplicate: 0,
      rejected: 0,
      outsideUniverse: 0,
    };

    let ticks: Tick[];
    try {
      ticks = await this.pollProvider(startedAt);
    } catch (error) {
      const unavailable =
        error instanceof ProviderUnavailableError
          ? error
          : new ProviderUnavailableError(this.provider.name, errorMessage(error), error);
      outcome.reasons.push({ code: 'provider_unavailable', message: unavailable.message });
      this.logger.warn(
        { provider: this.provider.name, error: unavailable.message },
        'Provider unavailable; continuing with stale state'
      );
      return outcome;
    }

    outcome.received = ticks.length;
    for (const tick of ticks) {
      if (!this.universe.has(tick.symbol)) {
        outcome.outsideUniverse += 1;
        continue;
      }
      try {
        if (this.store.ingest(tick)) {
          outcome.applied += 1;
        } else {
          outcome.duplicate += 1;
        }
      } catch (error) {
        outcome.rejected += 1;
        this.logger.warn({ symbol: tick.symbol, error: errorMessage(error) }, 'Tick rejected');
      }
    }
    return outcome;
  }

  private async pollProvider(startedAt: number): Promise<Tick[]> {
    if (!this.subscribed) {
      await this.provider.subscribe([...this.universe].sort(compareSymbols));
      this.subscribed = true;
    }
    if (!this.provider.isConnected()) {
      throw new ProviderUnavailableError(this.provider.name, 'not connected');
    }

    const { ingestDeadlineMs } = this.config.cycle;
    let timeout: NodeJS.Timeout | undefined;
    const expired = new Promise<typeof INGEST_TIMEOUT>((resolve) => {
      timeout = setTimeout(() => resolve(INGEST_TIMEOUT), ingestDeadlineMs);
    });
    try {
      const ticks = await Promise.race([
        this.provider.poll(startedAt + ingestDeadlineMs),
        expired,
      ]);
      if (ticks === INGEST_TIMEOUT) {
        throw new ProviderUnavailableError(
          this.provider.name,
          `poll did not return within ${ingestDeadlineMs}ms`
        );
      }
      return ticks;
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Every snapshot is taken before any evaluation is dispatched. */
  private takeSnapshots(): SymbolSnapshot[] {
    const snapshots: SymbolSnapshot[] = [];
    const symbols = [...this.store.activeSymbols()]
      .filter((symbol) => this.universe.has(symbol))
      .sort(compareSymbols);
    for (const symbol of symbols) {
      const snapshot = this.store.snapshot(symbol);
      if (snapshot) snapshots.push(snapshot);
    }
    return snapshots;
  }

  private async evaluate(
    snapshots: readonly SymbolSnapshot[],
    deadline: number
  ): Promise<EvaluationOutcome> {
    const outcome: EvaluationOutcome = {
      completed: new Map(),
      skipped: [],
      failed: [],
      deadlineHit: false,
    };
    const controller = new AbortController();
    const { signal } = controller;
    const { thresholds } = this.config;

    await runWithConcurrency(
      snapshots,
      async (snapshot) => {
        if (signal.aborted || this.clock() >= deadline) {
          controller.abort();
          outcome.skipped.push(snapshot.symbol);
          return;
        }
        try {
          const scores = PILLAR_IDS.map((pillar) =>
            this.cache.getOrCompute(snapshot.symbol, pillar, snapshot.version, () =>
              this.evaluators[pillar](snapshot, thresholds)
            )
          );
          // Scores finished past the cutoff stay cached but are not emitted.
          if (this.clock() > deadline) {
            controller.abort();
            outcome.skipped.push(snapshot.symbol);
          } else {
            outcome.completed.set(snapshot.symbol, scores);
          }
        } catch (error) {
          outcome.failed.push(failure(snapshot.symbol, error));
          this.logger.error(
            { symbol: snapshot.symbol, version: snapshot.version, error: errorMessage(error) },
            'Evaluation failed'
          );
        }
        await yieldToEventLoop();
      },
      this.config.cycle.maxConcurrency
    );

    outcome.deadlineHit = signal.aborted;
    outcome.skipped.sort(compareSymbols);
    outcome.failed.sort((a, b) => compareSymbols(a.symbol, b.symbol));
    return outcome;
  }

  private async publish(result: ScanResult): Promise<void> {
    for (const listener of [...this.listeners]) {
      try {
        await listener(result);
      } catch (error) {
        this.logger.error(
          { cycleId: result.cycleId, error: errorMessage(error) },
          'Scan result listener failed'
        );
      }
    }
  }
}

async function runWithConcurrency<T>(
  items: readonly T[],
  worker: (item: T) => Promise<void>,
  concurrency: number
): Promise<void> {
  let index = 0;
  const workers = Array.from({ length: Math.max(1, concurrency) }, async () => {
    while (index < items.length) {
      const current = items[index];
      index += 1;
      await worker(current);
    }
  });

  await Promise.all(workers);
}

function fingerprint(entries: readonly RankedScore[]): string {
  return contentHash(
    entries.map((entry) => ({
      symbol: entry.symbol,
      version: entry.version,
      score: entry.score,
      rank: entry.rank,
      pillars: PILLAR_IDS.map((pillar) => entry.pillars[pillar].score),
    }))
  );
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
