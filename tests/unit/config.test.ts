import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  DEFAULT_UNIVERSE,
  loadAppConfig,
  parseAppConfig,
  resetConfig,
} from '@/core/config';
import { resetEnvConfig } from '@/core/env';
import { ConfigurationError } from '@/scanner/errors';

let tempDir: string;
const originalProvider = process.env.SCANNER_PROVIDER;

function writeConfig(name: string, content: unknown): string {
  const path = join(tempDir, name);
  writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
  return path;
}

function configErrors(action: () => unknown): string[] {
  try {
    action();
  } catch (error) {
    if (error instanceof ConfigurationError) return error.errors;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('scanner config loader', () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'scanner-config-'));
    delete process.env.SCANNER_PROVIDER;
    resetEnvConfig();
    resetConfig();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
    if (originalProvider === undefined) {
      delete process.env.SCANNER_PROVIDER;
    } else {
      process.env.SCANNER_PROVIDER = originalProvider;
    }
    resetEnvConfig();
    resetConfig();
  });

  it('converts the snake_case file into engine config', () => {
    const path = writeConfig('scanner.json', {
      universe: ['abcd', ' efgh ', 'ABCD'],
      thresholds: { catalyst: { fresh_window_minutes: 30, allowed_types: ['FDA'] } },
      windows: { catalyst_retention_hours: 2 },
      cycle: { deadline_ms: 400 },
      provider: { type: 'replay', path: 'ticks.json', ticks_per_poll: 5 },
      output: { top_n: 3 },
    });

    const config = loadAppConfig({ path });

    expect(config.source).toBe(path);
    expect(config.universe).toEqual(['ABCD', 'EFGH']);
    expect(config.scanner.thresholds.catalyst.freshWindowMs).toBe(1_800_000);
    expect(config.scanner.thresholds.catalyst.allowedTypes).toEqual(['fda']);
    expect(config.scanner.windows.catalystRetentionMs).toBe(7_200_000);
    expect(config.scanner.cycle.deadlineMs).toBe(400);
    expect(config.scanner.cycle.intervalMs).toBe(1000);
    expect(config.scanner.thresholds.price.maxPrice).toBe(20);
    expect(config.provider).toEqual({ type: 'replay', path: 'ticks.json', ticksPerPoll: 5, loop: false });
    expect(config.output).toEqual({ jsonlDir: join('data', 'scans'), topN: 3, statsEveryCycles: 30 });
  });

  it('normalizes configured weights', () => {
    const config = parseAppConfig({
      pillar_weights: { price: 2, momentum: 2, volume: 2, catalyst: 2, float: 2 },
    });
    expect(config.scanner.pillarWeights.catalyst).toBe(0.2);
  });

  it('maps pillar toggles and pass thresholds', () => {
    const config = parseAppConfig({
      pillars: { float: { enabled: false } },
      thresholds: {
        momentum: { min_pct_move: 8 },
        volume: { min_relative_volume: 3 },
        catalyst: { require_news: false },
        float: { max_shares: 10_000_000 },
      },
    });
    expect(config.scanner.enabledPillars.float).toBe(false);
    expect(config.scanner.enabledPillars.catalyst).toBe(true);
    expect(config.scanner.pillarWeights.float).toBe(0);
    expect(config.scanner.pillarWeights.price).toBeCloseTo(0.25, 10);
    expect(config.scanner.thresholds.momentum.minPctMove).toBe(8);
    expect(config.scanner.thresholds.volume.minRelativeVolume).toBe(3);
    expect(config.scanner.thresholds.catalyst.requireNews).toBe(false);
    expect(config.scanner.thresholds.float.maxShares).toBe(10_000_000);
  });

  it('rejects a config that disables every pillar', () => {
    const off = { enabled: false };
    const errors = configErrors(() =>
      parseAppConfig({ pillars: { price: off, momentum: off, volume: off, catalyst: off, float: off } })
    );
    expect(errors).toEqual(['/pillars: at least one pillar must be enabled']);
  });

  it('defaults to the simulated provider and the built-in universe', () => {
    const config = parseAppConfig({});
    expect(config.universe).toEqual(DEFAULT_UNIVERSE);
    expect(config.provider).toEqual({
      type: 'simulated',
      seed: 'momentum-scanner',
      startTime: Date.parse('2024-03-04T14:30:00Z'),
      tickIntervalMs: 1000,
      volatilityPct: 1.5,
      catalystProbability: 0.01,
    });
  });

  it('rejects unknown keys', () => {
    expect(configErrors(() => parseAppConfig({ pillar_weight: {} }))).toContain(
      'root: must NOT have additional properties'
    );
  });

  it('rejects values outside the schema', () => {
    const errors = configErrors(() => parseAppConfig({ cycle: { max_concurrency: 0 } }));
    expect(errors).toContain('/cycle/max_concurrency: must be >= 1');
  });

  it('rejects an inverted price band', () => {
    const errors = configErrors(() =>
      parseAppConfig({ thresholds: { price: { min_price: 25 } } })
    );
    expect(errors).toEqual(['/thresholds/price: min_price must be below max_price']);
  });

  it('requires a path for the replay provider', () => {
    expect(() => parseAppConfig({ provider: { type: 'replay' } })).toThrow(
      'Replay provider requires provider.path'
    );
  });

  it('fails on a missing or unreadable file', () => {
    expect(() => loadAppConfig({ path: join(tempDir, 'missing.json') })).toThrow(ConfigurationError);
    const broken = writeConfig('broken.json', '{ not json');
    expect(() => loadAppConfig({ path: broken })).toThrow(/Could not read scanner config/);
  });

  it('lets SCANNER_PROVIDER override the configured provider', () => {
    process.env.SCANNER_PROVIDER = 'memory';
    resetEnvConfig();
    const config = parseAppConfig({ provider: { type: 'replay', path: 'ticks.json' } });
    expect(config.provider).toEqual({ type: 'memory' });
  });

  it('prefers an explicit provider option', () => {
    const path = writeConfig('scanner.json', { provider: { type: 'replay', path: 'ticks.json' } });
    expect(loadAppConfig({ path, provider: 'memory' }).provider).toEqual({ type: 'memory' });
  });

  it('accepts the shipped configs', () => {
    const main = loadAppConfig({ path: 'config/scanner.json' });
    expect(main.universe).toHaveLength(8);
    expect(main.provider.type).toBe('simulated');
    expect(main.output.topN).toBe(5);

    const replay = loadAppConfig({ path: 'config/scanner.replay.json' });
    expect(replay.provider).toEqual({
      type: 'replay',
      path: 'data/sample_ticks.json',
      ticksPerPoll: 3,
      loop: true,
    });
  });
});
