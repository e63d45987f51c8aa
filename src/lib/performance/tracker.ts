/**
 * Cycle Performance Tracking
 * Rolling statistics over recent scan cycles to spot budget overruns and bottlenecks
 */

import { createChildLogger } from '@/utils/logger';
import { RingBuffer } from '@/scanner/ring_buffer';
import type { PhaseTimings, ScanResult } from '@/scanner/types';

const logger = createChildLogger('perf_tracker');

type PhaseName = 'ingest' | 'evaluate' | 'aggregate';

interface CycleSample {
  durationMs: number;
  degraded: boolean;
  overBudget: boolean;
  cacheHits: number;
  cacheMisses: number;
  skippedSymbols: number;
  timings: PhaseTimings;
}

export interface DurationStats {
  mean: number;
  median: number;
  min: number;
  max: number;
  stdDev: number;
  p95: number;
}

export interface Bottleneck {
  phase: PhaseName;
  meanMs: number;
  percentageOfCycle: number;
}

export interface CycleStatsSummary {
  /** Cycles inside the rolling window. */
  cycles: number;
  totalCycles: number;
  degradedCycles: number;
  degradedRate: number;
  overBudgetCycles: number;
  skippedSymbols: number;
  cacheHitRate: number;
  duration: DurationStats;
  bottleneck: Bottleneck | null;
}

export class CycleStatsTracker {
  private readonly samples: RingBuffer<CycleSample>;
  private total = 0;

  constructor(
    private readonly budgetMs: number,
    windowSize: number = 120
  ) {
    this.samples = new RingBuffer<CycleSample>(windowSize);
  }

  record(result: ScanResult): void {
    this.total += 1;
    this.samples.push({
      durationMs: result.durationMs,
      degraded: result.status === 'degraded',
      overBudget: result.durationMs > this.budgetMs,
      cacheHits: result.counters.cacheHits,
      cacheMisses: result.counters.cacheMisses,
      skippedSymbols: result.skippedSymbols.length,
      timings: result.timings,
    });
  }

  summary(): CycleStatsSummary {
    const samples = this.samples.toArray();
    const durations = samples.map((sample) => sample.durationMs);
    const degradedCycles = samples.filter((sample) => sample.degraded).length;
    const hits = samples.reduce((sum, sample) => sum + sample.cacheHits, 0);
    const lookups = hits + samples.reduce((sum, sample) => sum + sample.cacheMisses, 0);

    return {
      cycles: samples.length,
      totalCycles: this.total,
      degradedCycles,
      degradedRate: samples.length > 0 ? degradedCycles / samples.length : 0,
      overBudgetCycles: samples.filter((sample) => sample.overBudget).length,
      skippedSymbols: samples.reduce((sum, sample) => sum + sample.skippedSymbols, 0),
      cacheHitRate: lookups > 0 ? hits / lookups : 0,
      duration: calculateStats(durations),
      bottleneck: findBottleneck(samples),
    };
  }

  logSummary(): CycleStatsSummary {
    const summary = this.summary();
    logger.info(
      {
        cycles: summary.totalCycles,
        mean: formatDuration(summary.duration.mean),
        p95: formatDuration(summary.duration.p95),
        degradedRate: Number(summary.degradedRate.toFixed(3)),
        cacheHitRate: Number(summary.cacheHitRate.toFixed(3)),
        bottleneck: summary.bottleneck
          ? `${summary.bottleneck.phase} (${summary.bottleneck.percentageOfCycle.toFixed(1)}%)`
          : null,
      },
      'Cycle performance'
    );
    return summary;
  }

  reset(): void {
    this.samples.clear();
    this.total = 0;
  }
}

function findBottleneck(samples: readonly CycleSample[]): Bottleneck | null {
  if (samples.length === 0) return null;
  const means: Record<PhaseName, number> = {
    ingest: mean(samples.map((sample) => sample.timings.ingestMs)),
    evaluate: mean(samples.map((sample) => sample.timings.evaluateMs)),
    aggregate: mean(samples.map((sample) => sample.timings.aggregateMs)),
  };
  const cycleMean = mean(samples.map((sample) => sample.durationMs));

  let worst: PhaseName = 'ingest';
  for (const phase of ['evaluate', 'aggregate'] as const) {
    if (means[phase] > means[worst]) worst = phase;
  }
  if (means[worst] <= 0) return null;

  return {
    phase: worst,
    meanMs: means[worst],
    percentageOfCycle: cycleMean > 0 ? (means[worst] / cycleMean) * 100 : 0,
  };
}

function mean(values: readonly number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

/**
 * Helper to format duration consistently
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms.toFixed(0)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
  return `${(ms / 60000).toFixed(2)}min`;
}

/**
 * Helper to calculate statistics
 */
export function calculateStats(values: readonly number[]): DurationStats {
  if (values.length === 0) {
    return { mean: 0, median: 0, min: 0, max: 0, stdDev: 0, p95: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const avg = mean(values);
  const median = sorted[Math.floor(sorted.length / 2)];
  const min = sorted[0];
  const max = sorted[sorted.length - 1];
  const p95 = sorted[Math.min(sorted.length - 1, Math.ceil(sorted.length * 0.95) - 1)];

  const squareDiffs = values.map((v) => Math.pow(v - avg, 2));
  const stdDev = Math.sqrt(squareDiffs.reduce((a, b) => a + b, 0) / values.length);

  return { mean: avg, median, min, max, stdDev, p95 };
}
