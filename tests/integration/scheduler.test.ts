import { afterEach, describe, expect, it, vi } from 'vitest';
import pino from 'pino';
import { ScanCycleScheduler } from '@/scanner/scheduler';
import { InMemoryProvider } from '@/providers/in_memory_provider';
import type { MarketDataProvider } from '@/providers/types';
import {
  PILLAR_EVALUATORS,
  evaluateCatalyst,
  evaluateFloat,
  evaluateMomentum,
  evaluatePrice,
  evaluateVolume,
  type PillarRegistry,
} from '@/scoring/pillars';
import { buildScannerConfig } from '@/scoring/scoring_config';
import { checkScanResultConsistency } from '@/run/validator';
import type { ScanResult, Tick } from '@/scanner/types';

const BASE = Date.parse('2024-03-04T14:35:00Z');

const config = buildScannerConfig({
  thresholds: { momentum: { lookback: 10 } },
  cycle: { deadlineMs: 500, ingestDeadlineMs: 100, maxConcurrency: 1, intervalMs: 1000 },
});

function tick(symbol: string, i: number, price: number, extra: Partial<Tick> = {}): Tick {
  return { symbol, timestamp: BASE + i * 1000, price, volume: 1000, ...extra };
}

function risingTicks(symbol: string): Tick[] {
  return Array.from({ length: 20 }, (_, i) => tick(symbol, i, 10 + (2 * i) / 19));
}

function captureLogger(): { logger: pino.Logger; lines: () => Array<Record<string, unknown>> } {
  const raw: string[] = [];
  const logger = pino({ level: 'debug' }, { write: (msg: string) => raw.push(msg) });
  return {
    logger,
    lines: () => raw.map((line) => JSON.parse(line)),
  };
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function spyRegistry() {
  return {
    price: vi.fn(evaluatePrice),
    momentum: vi.fn(evaluateMomentum),
    volume: vi.fn(evaluateVolume),
    catalyst: vi.fn(evaluateCatalyst),
    float: vi.fn(evaluateFloat),
  };
}

function totalCalls(registry: ReturnType<typeof spyRegistry>): number {
  return Object.values(registry).reduce((sum, spy) => sum + spy.mock.calls.length, 0);
}

describe('ScanCycleScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('ingests, scores and ranks one cycle', async () => {
    const provider = new InMemoryProvider();
    const { logger } = captureLogger();
    const scheduler = new ScanCycleScheduler({ provider, config, universe: ['ABC', 'XYZ'], logger });

    provider.push(...risingTicks('ABC'));
    provider.push(tick('NOPE', 0, 5));
    provider.push(tick('ABC', 30, -1));

    const result = await scheduler.runCycle();

    expect(result.status).toBe('ok');
    expect(result.sequence).toBe(1);
    expect(result.counters).toMatchObject({
      ticksReceived: 22,
      ticksApplied: 20,
      ticksRejected: 1,
      ticksOutsideUniverse: 1,
      symbolsActive: 1,
      symbolsEvaluated: 1,
      cacheMisses: 5,
      cacheHits: 0,
    });
    expect(result.entries).toHaveLength(1);
    expect(result.entries[0].symbol).toBe('ABC');
    expect(result.entries[0].rank).toBe(1);
    expect(result.entries[0].version).toBe(20);
    expect(result.entries[0].pillars.momentum.score).toBe(92.86);
    expect(result.entries[0].lastPrice).toBe(12);
    expect(result.entries[0].session).toBe('early');
    expect(result.fingerprint).toMatch(/^[a-f0-9]{64}$/);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.entries)).toBe(true);
    expect(scheduler.phase).toBe('idle');
    expect(provider.subscribedSymbols()).toEqual(['ABC', 'XYZ']);
    expect(checkScanResultConsistency(result)).toEqual({ passed: true, issues: [] });
  });

  it('reports pillar qualification and counts qualified symbols', async () => {
    const provider = new InMemoryProvider();
    const scheduler = new ScanCycleScheduler({
      provider,
      config,
      universe: ['ABC'],
      logger: captureLogger().logger,
    });
    provider.push(...risingTicks('ABC'));

    const result = await scheduler.runCycle();
    const [entry] = result.entries;
    expect(entry.passedPillars).toEqual(['price']);
    expect(entry.failedPillars).toEqual(['momentum', 'volume', 'catalyst', 'float']);
    expect(entry.passedAll).toBe(false);
    expect(entry.pillars.price).toMatchObject({ passed: true, threshold: '2-20' });
    expect(result.counters.symbolsQualified).toBe(0);
  });

  it('counts disabled pillars as passed', async () => {
    const provider = new InMemoryProvider();
    const priceOnly = buildScannerConfig({
      enabledPillars: { momentum: false, volume: false, catalyst: false, float: false },
      cycle: { maxConcurrency: 1 },
    });
    const scheduler = new ScanCycleScheduler({
      provider,
      config: priceOnly,
      universe: ['ABC'],
      logger: captureLogger().logger,
    });
    provider.push(...risingTicks('ABC'));

    const result = await scheduler.runCycle();
    const [entry] = result.entries;
    expect(entry.passedAll).toBe(true);
    expect(entry.failedPillars).toEqual([]);
    expect(entry.pillars.momentum.passed).toBe(false);
    expect(entry.score).toBe(entry.pillars.price.score);
    expect(result.counters.symbolsQualified).toBe(1);
    expect(checkScanResultConsistency(result)).toEqual({ passed: true, issues: [] });
  });

  it('breaks ties between identical symbols by symbol', async () => {
    const provider = new InMemoryProvider();
    const scheduler = new ScanCycleScheduler({
      provider,
      config,
      universe: ['CCC', 'AAA', 'BBB'],
      logger: captureLogger().logger,
    });
    for (const symbol of ['CCC', 'AAA', 'BBB']) provider.push(...risingTicks(symbol));

    const result = await scheduler.runCycle();
    expect(result.entries.map((entry) => [entry.symbol, entry.rank])).toEqual([
      ['AAA', 1],
      ['BBB', 2],
      ['CCC', 3],
    ]);
    expect(new Set(result.entries.map((entry) => entry.score)).size).toBe(1);
  });

  it('serves an unchanged symbol entirely from cache', async () => {
    const provider = new InMemoryProvider();
    const evaluators = spyRegistry();
    const scheduler = new ScanCycleScheduler({
      provider,
      config,
      universe: ['AAA', 'BBB'],
      evaluators,
      logger: captureLogger().logger,
    });
    provider.push(...risingTicks('AAA'), ...risingTicks('BBB'));

    const first = await scheduler.runCycle();
    expect(totalCalls(evaluators)).toBe(10);

    const second = await scheduler.runCycle();
    expect(totalCalls(evaluators)).toBe(10);
    expect(second.counters.cacheHits).toBe(10);
    expect(second.counters.cacheMisses).toBe(0);
    expect(second.entries).toEqual(first.entries);
    expect(second.fingerprint).toBe(first.fingerprint);

    provider.push(tick('BBB', 25, 12.5));
    const third = await scheduler.runCycle();
    expect(totalCalls(evaluators)).toBe(15);
    expect(evaluators.price.mock.calls.at(-1)?.[0].symbol).toBe('BBB');
    expect(third.counters.cacheHits).toBe(5);
  });

  it('emits a degraded partial result when evaluation overruns the deadline', async () => {
    let now = BASE;
    const { logger, lines } = captureLogger();
    const evaluators: PillarRegistry = {
      ...PILLAR_EVALUATORS,
      price: (snapshot, thresholds) => {
        if (snapshot.symbol === 'SLOW') now += 600;
        return evaluatePrice(snapshot, thresholds);
      },
    };
    const provider = new InMemoryProvider();
    const scheduler = new ScanCycleScheduler({
      provider,
      config,
      universe: ['AAA', 'SLOW', 'ZZZ'],
      evaluators,
      clock: () => now,
      logger,
    });
    for (const symbol of ['AAA', 'SLOW', 'ZZZ']) provider.push(...risingTicks(symbol));

    const result = await scheduler.runCycle();

    expect(result.status).toBe('degraded');
    expect(result.degradedReasons.map((reason) => reason.code)).toEqual(['deadline_exceeded']);
    expect(result.entries.map((entry) => entry.symbol)).toEqual(['AAA']);
    expect(result.skippedSymbols).toEqual(['SLOW', 'ZZZ']);
    expect(result.durationMs).toBe(600);

    const warning = lines().find((line) => line.msg === 'Cycle deadline exceeded; symbols skipped');
    expect(warning?.skipped).toEqual(['SLOW', 'ZZZ']);

    // Work finished past the cutoff is still valid for its version.
    const slowVersion = scheduler.store.version('SLOW');
    expect(slowVersion).toBe(20);
    expect(scheduler.cache.peek('SLOW', 'price', 20)).toBeDefined();
    expect(scheduler.cache.peek('ZZZ', 'price', 20)).toBeUndefined();
    expect(checkScanResultConsistency(result).passed).toBe(true);
  });

  it('degrades a cycle whose aggregation finishes past the deadline', async () => {
    const { logger, lines } = captureLogger();
    const provider = new InMemoryProvider();
    // Time stands still until the aggregating phase, then jumps past the 500ms cutoff.
    const scheduler: ScanCycleScheduler = new ScanCycleScheduler({
      provider,
      config,
      universe: ['ABC'],
      clock: () => (scheduler.phase === 'aggregating' ? BASE + 700 : BASE),
      logger,
    });
    provider.push(...risingTicks('ABC'));

    const result = await scheduler.runCycle();

    expect(result.status).toBe('degraded');
    expect(result.degradedReasons).toEqual([
      { code: 'deadline_exceeded', message: 'Cycle deadline of 500ms exceeded during aggregating' },
    ]);
    expect(result.entries.map((entry) => entry.symbol)).toEqual(['ABC']);
    expect(result.skippedSymbols).toEqual([]);
    expect(result.durationMs).toBe(700);
    expect(result.timings).toEqual({ ingestMs: 0, evaluateMs: 0, aggregateMs: 700 });
    expect(lines().filter((line) => line.msg === 'Cycle deadline exceeded during aggregation')).toHaveLength(1);
    expect(checkScanResultConsistency(result).passed).toBe(true);
  });

  it('degrades and keeps stale state when the provider is down', async () => {
    const provider = new InMemoryProvider();
    const scheduler = new ScanCycleScheduler({
      provider,
      config,
      universe: ['ABC'],
      logger: captureLogger().logger,
    });
    provider.push(...risingTicks('ABC'));
    const healthy = await scheduler.runCycle();

    provider.setConnected(false);
    const pollsBefore = provider.getPollCount();
    const degraded = await scheduler.runCycle();

    expect(provider.getPollCount()).toBe(pollsBefore);
    expect(degraded.status).toBe('degraded');
    expect(degraded.degradedReasons).toEqual([
      { code: 'provider_unavailable', message: 'Provider memory unavailable: not connected' },
    ]);
    expect(degraded.counters.ticksReceived).toBe(0);
    expect(degraded.entries).toEqual(healthy.entries);
  });

  it('degrades when a poll fails or misses the ingest deadline', async () => {
    const failing: MarketDataProvider = {
      name: 'flaky',
      poll: () => Promise.reject(new Error('socket reset')),
      subscribe: async () => undefined,
      unsubscribe: async () => undefined,
      isConnected: () => true,
      close: () => undefined,
    };
    const failed = await new ScanCycleScheduler({
      provider: failing,
      config,
      universe: ['ABC'],
      logger: captureLogger().logger,
    }).runCycle();
    expect(failed.degradedReasons).toEqual([
      { code: 'provider_unavailable', message: 'Provider flaky unavailable: socket reset' },
    ]);

    const hanging: MarketDataProvider = {
      ...failing,
      name: 'stuck',
      poll: () => new Promise<Tick[]>(() => undefined),
    };
    const slowConfig = buildScannerConfig({ cycle: { ingestDeadlineMs: 20 } });
    const timedOut = await new ScanCycleScheduler({
      provider: hanging,
      config: slowConfig,
      universe: ['ABC'],
      logger: captureLogger().logger,
    }).runCycle();
    expect(timedOut.status).toBe('degraded');
    expect(timedOut.degradedReasons[0].message).toBe(
      'Provider stuck unavailable: poll did not return within 20ms'
    );
  });

  it('isolates a failing symbol from the rest of the cycle', async () => {
    const evaluators: PillarRegistry = {
      ...PILLAR_EVALUATORS,
      volume: (snapshot, thresholds) => {
        if (snapshot.symbol === 'BAD') throw new Error('corrupt window');
        return evaluateVolume(snapshot, thresholds);
      },
    };
    const provider = new InMemoryProvider();
    const scheduler = new ScanCycleScheduler({
      provider,
      config,
      universe: ['AAA', 'BAD'],
      evaluators,
      logger: captureLogger().logger,
    });
    provider.push(...risingTicks('AAA'), ...risingTicks('BAD'));

    const result = await scheduler.runCycle();
    expect(result.status).toBe('ok');
    expect(result.entries.map((entry) => entry.symbol)).toEqual(['AAA']);
    expect(result.failedSymbols).toEqual([
      { symbol: 'BAD', code: 'evaluation_error', message: 'corrupt window' },
    ]);
  });

  it('isolates listener failures', async () => {
    const provider = new InMemoryProvider();
    const scheduler = new ScanCycleScheduler({
      provider,
      config,
      universe: ['ABC'],
      logger: captureLogger().logger,
    });
    const received: ScanResult[] = [];
    scheduler.onResult(() => {
      throw new Error('listener down');
    });
    scheduler.onResult((result) => {
      received.push(result);
    });

    const result = await scheduler.runCycle();
    expect(received).toEqual([result]);
    expect(scheduler.lastResult).toBe(result);
  });

  it('skips interval ticks while a cycle is still running', async () => {
    vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval'] });
    const provider = new InMemoryProvider();
    const { logger, lines } = captureLogger();
    const scheduler = new ScanCycleScheduler({ provider, config, universe: ['ABC'], logger });

    const reached = deferred();
    const release = deferred();
    const listener = vi.fn(async () => {
      reached.resolve();
      await release.promise;
    });
    scheduler.onResult(listener);

    scheduler.start();
    expect(scheduler.isRunning).toBe(true);
    await reached.promise;

    vi.advanceTimersByTime(3000);
    expect(scheduler.skippedCycleCount).toBe(3);
    expect(lines().filter((line) => line.msg === 'Previous cycle still running; skipping this interval')).toHaveLength(3);

    release.resolve();
    await scheduler.stop();
    expect(scheduler.isRunning).toBe(false);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('evicts removed symbols and resubscribes on universe changes', async () => {
    const provider = new InMemoryProvider();
    const scheduler = new ScanCycleScheduler({
      provider,
      config,
      universe: ['AAA', 'BBB'],
      logger: captureLogger().logger,
    });
    provider.push(...risingTicks('AAA'), ...risingTicks('BBB'));
    await scheduler.runCycle();

    await scheduler.setUniverse(['AAA', 'CCC']);
    expect(provider.subscribedSymbols()).toEqual(['AAA', 'CCC']);
    expect(scheduler.store.version('BBB')).toBeNull();
    expect(scheduler.cache.peek('BBB', 'price', 20)).toBeUndefined();

    provider.push(tick('BBB', 40, 11));
    const result = await scheduler.runCycle();
    expect(result.entries.map((entry) => entry.symbol)).toEqual(['AAA']);
    expect(result.counters.ticksOutsideUniverse).toBe(1);
  });
});
