import { describe, it, expect } from 'vitest';
import { CycleStatsTracker, calculateStats, formatDuration } from '@/lib/performance/tracker';
import type { PhaseTimings, ScanResult } from '@/scanner/types';

let sequence = 0;

function result(durationMs: number, options: { degraded?: boolean; timings?: PhaseTimings } = {}): ScanResult {
  sequence += 1;
  return {
    cycleId: `cycle-${sequence}`,
    sequence,
    startedAt: 0,
    durationMs,
    status: options.degraded ? 'degraded' : 'ok',
    degradedReasons: options.degraded ? [{ code: 'deadline_exceeded', message: 'late' }] : [],
    entries: [],
    skippedSymbols: options.degraded ? ['SLOW'] : [],
    failedSymbols: [],
    timings: options.timings ?? { ingestMs: 10, evaluateMs: durationMs - 20, aggregateMs: 10 },
    counters: {
      ticksReceived: 0,
      ticksApplied: 0,
      ticksDuplicate: 0,
      ticksRejected: 0,
      ticksOutsideUniverse: 0,
      symbolsActive: 0,
      symbolsEvaluated: 0,
      symbolsQualified: 0,
      cacheHits: 30,
      cacheMisses: 10,
    },
    fingerprint: 'f'.repeat(64),
  };
}

describe('CycleStatsTracker', () => {
  it('summarizes recent cycles', () => {
    const tracker = new CycleStatsTracker(500);
    tracker.record(result(100));
    tracker.record(result(200));
    tracker.record(result(300));
    tracker.record(result(600, { degraded: true }));

    const summary = tracker.summary();
    expect(summary.cycles).toBe(4);
    expect(summary.degradedCycles).toBe(1);
    expect(summary.degradedRate).toBe(0.25);
    expect(summary.overBudgetCycles).toBe(1);
    expect(summary.skippedSymbols).toBe(1);
    expect(summary.cacheHitRate).toBe(0.75);
    expect(summary.duration).toMatchObject({ mean: 300, median: 300, min: 100, max: 600, p95: 600 });
    expect(summary.bottleneck?.phase).toBe('evaluate');
    expect(summary.bottleneck?.meanMs).toBe(280);
  });

  it('keeps only the rolling window', () => {
    const tracker = new CycleStatsTracker(500, 2);
    tracker.record(result(100));
    tracker.record(result(200));
    tracker.record(result(400));
    const summary = tracker.summary();
    expect(summary.cycles).toBe(2);
    expect(summary.totalCycles).toBe(3);
    expect(summary.duration.mean).toBe(300);

    tracker.reset();
    expect(tracker.summary().cycles).toBe(0);
    expect(tracker.summary().bottleneck).toBeNull();
  });

  it('points at the slowest phase', () => {
    const tracker = new CycleStatsTracker(500);
    tracker.record(result(100, { timings: { ingestMs: 80, evaluateMs: 15, aggregateMs: 5 } }));
    expect(tracker.summary().bottleneck).toEqual({ phase: 'ingest', meanMs: 80, percentageOfCycle: 80 });
  });
});

describe('stats helpers', () => {
  it('formats durations', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.50s');
    expect(formatDuration(90_000)).toBe('1.50min');
  });

  it('handles an empty sample', () => {
    expect(calculateStats([])).toEqual({ mean: 0, median: 0, min: 0, max: 0, stdDev: 0, p95: 0 });
  });
});
