/**
 * Scanner Run Script
 * Runs scan cycles against the configured provider and appends results to data/scans.
 * Stops on --cycles, a signal, or when a finite provider (non-looping replay) runs dry.
 *
 * Usage: npx tsx scripts/run_scanner.ts [--cycles=N] [--config=path] [--provider=memory|replay|simulated] [--top=N] [--no-write]
 */

import './load_env';
import { setTimeout as sleep } from 'timers/promises';
import { loadAppConfig } from '../src/core/config';
import type { ProviderType } from '../src/providers/types';
import { createProvider } from '../src/providers/registry';
import { ScanCycleScheduler } from '../src/scanner/scheduler';
import { errorMessage } from '../src/scanner/errors';
import type { ScanResult } from '../src/scanner/types';
import { selectQualified, selectTopK } from '../src/scoring/aggregator';
import { JsonlResultWriter } from '../src/run/writer';
import { checkScanResultConsistency } from '../src/run/validator';
import { CycleStatsTracker } from '../src/lib/performance/tracker';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_scanner');

interface ScannerCliArgs {
  cycles: number | null;
  configPath?: string;
  provider?: ProviderType;
  topN?: number;
  write: boolean;
}

function readArg(name: string): string | undefined {
  const eqArg = process.argv.find((arg) => arg.startsWith(`--${name}=`));
  if (eqArg) return eqArg.slice(name.length + 3);
  const posIndex = process.argv.findIndex((arg) => arg === `--${name}`);
  return posIndex >= 0 ? process.argv[posIndex + 1] : undefined;
}

function parsePositiveInt(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`--${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseProvider(raw: string | undefined): ProviderType | undefined {
  if (raw === undefined) return undefined;
  if (raw === 'memory' || raw === 'replay' || raw === 'simulated') return raw;
  throw new Error(`--provider must be memory, replay or simulated, got "${raw}"`);
}

function parseCliArgs(): ScannerCliArgs {
  return {
    cycles: parsePositiveInt('cycles', readArg('cycles')) ?? null,
    configPath: readArg('config'),
    provider: parseProvider(readArg('provider')),
    topN: parsePositiveInt('top', readArg('top')),
    write: !process.argv.includes('--no-write'),
  };
}

function logTopEntries(result: ScanResult, topN: number): void {
  const top = selectTopK(result.entries, topN).map(
    (entry) =>
      `${entry.rank}. ${entry.symbol} ${entry.score.toFixed(2)} @ ${entry.lastPrice}` +
      (entry.passedAll ? ' [all pillars]' : ` [failed: ${entry.failedPillars.join(', ')}]`)
  );
  logger.info(
    {
      cycleId: result.cycleId,
      status: result.status,
      durationMs: result.durationMs,
      ranked: result.entries.length,
      skipped: result.skippedSymbols.length,
      qualified: selectQualified(result.entries).map((entry) => entry.symbol),
      top,
    },
    'Scan cycle complete'
  );
}

async function main(): Promise<void> {
  const args = parseCliArgs();
  const config = loadAppConfig({ path: args.configPath, provider: args.provider });
  const topN = args.topN ?? config.output.topN;

  logger.info(
    {
      source: config.source ?? 'defaults',
      provider: config.provider.type,
      universe: config.universe.length,
      cycles: args.cycles ?? 'until interrupted',
    },
    'Starting scanner'
  );

  const clock = Date.now;
  const provider = createProvider(config.provider, { clock });
  const scheduler = new ScanCycleScheduler({
    provider,
    config: config.scanner,
    universe: config.universe,
    clock,
  });
  const tracker = new CycleStatsTracker(config.scanner.cycle.deadlineMs);
  const writer = args.write ? new JsonlResultWriter({ dir: config.output.jsonlDir }) : null;

  let requestStop: () => void = () => undefined;
  const stopRequested = new Promise<void>((resolve) => {
    requestStop = resolve;
  });
  let drained = false;

  scheduler.onResult(async (result) => {
    tracker.record(result);
    logTopEntries(result, topN);

    const consistency = checkScanResultConsistency(result);
    if (!consistency.passed) {
      logger.warn({ cycleId: result.cycleId, issues: consistency.issues }, 'Inconsistent scan result');
    }
    if (writer) {
      await writer.write(result);
    }
    if (result.sequence % config.output.statsEveryCycles === 0) {
      tracker.logSummary();
    }
    if (provider.exhausted && !drained) {
      drained = true;
      logger.info({ provider: provider.name, cycleId: result.cycleId }, 'Provider has no more ticks; stopping');
      requestStop();
    }
  });

  const shutdown = async (): Promise<void> => {
    await scheduler.stop();
    provider.close();
    tracker.logSummary();
    if (writer) {
      logger.info({ written: writer.count, dir: config.output.jsonlDir }, 'Scan results saved');
    }
  };

  if (args.cycles !== null) {
    for (let i = 0; i < args.cycles && !drained; i++) {
      if (i > 0) await sleep(config.scanner.cycle.intervalMs);
      await scheduler.runCycle();
    }
    await shutdown();
    return;
  }

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down');
    requestStop();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  scheduler.start();
  await stopRequested;
  process.off('SIGINT', onSignal);
  process.off('SIGTERM', onSignal);
  await shutdown();
}

main().catch((error: unknown) => {
  logger.error({ error: errorMessage(error) }, 'Scanner run failed');
  process.exitCode = 1;
});
