/**
 * Application configuration loaded from JSON files
 *
 * The file on disk is snake_case and validated against
 * schemas/scanner_config.v1.schema.json before it is merged over the defaults.
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { getEnvConfig } from './env';
import { ConfigurationError, errorMessage } from '@/scanner/errors';
import {
  buildScannerConfig,
  type PillarWeights,
  type ScannerConfig,
  type ScannerConfigOverrides,
} from '@/scoring/scoring_config';
import { PILLAR_IDS, type PillarId } from '@/scanner/types';
import type { ProviderConfig, ProviderType } from '@/providers/types';
import { validateScannerConfig } from '@/validation/ajv_instance';

export interface RawScannerConfig {
  universe?: string[];
  pillars?: Partial<Record<PillarId, { enabled?: boolean }>>;
  pillar_weights?: Partial<PillarWeights>;
  thresholds?: {
    insufficient_data_score?: number;
    price?: {
      min_price?: number;
      max_price?: number;
      min_points?: number;
      out_of_band_factor?: number;
    };
    momentum?: { lookback?: number; full_scale_move_pct?: number; min_pct_move?: number };
    volume?: { target_relative_volume?: number; min_relative_volume?: number };
    catalyst?: {
      allowed_types?: string[];
      excluded_types?: string[];
      fresh_window_minutes?: number;
      require_news?: boolean;
    };
    float?: {
      small_max?: number;
      medium_max?: number;
      large_max?: number;
      max_shares?: number;
    };
  };
  windows?: {
    price_capacity?: number;
    volume_capacity?: number;
    catalyst_retention_hours?: number;
  };
  cycle?: {
    interval_ms?: number;
    deadline_ms?: number;
    ingest_deadline_ms?: number;
    max_concurrency?: number;
  };
  cache?: { capacity?: number };
  provider?: {
    type: ProviderType;
    path?: string;
    ticks_per_poll?: number;
    loop?: boolean;
    seed?: string;
    start_time?: string;
    tick_interval_ms?: number;
    volatility_pct?: number;
    catalyst_probability?: number;
  };
  output?: {
    jsonl_dir?: string;
    top_n?: number;
    stats_every_cycles?: number;
  };
}

export interface OutputConfig {
  jsonlDir: string;
  topN: number;
  statsEveryCycles: number;
}

export interface AppConfig {
  scanner: ScannerConfig;
  universe: string[];
  provider: ProviderConfig;
  output: OutputConfig;
  /** Absolute path of the file the config was read from, null for defaults. */
  source: string | null;
}

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;

// Monday 2024-03-04 09:30 America/New_York.
const DEFAULT_SIMULATION_START = '2024-03-04T14:30:00Z';

export const DEFAULT_OUTPUT: OutputConfig = {
  jsonlDir: join('data', 'scans'),
  topN: 10,
  statsEveryCycles: 30,
};

export const DEFAULT_UNIVERSE = ['ABCD', 'BOLT', 'CRWN', 'DYNA', 'EVRG', 'FLUX'];

let cachedConfig: AppConfig | null = null;

function resolveConfigPath(explicit?: string): string {
  const projectRoot = process.cwd();
  const candidate = explicit ?? getEnvConfig().configPath ?? join('config', 'scanner.json');
  return isAbsolute(candidate) ? candidate : join(projectRoot, candidate);
}

function normalizeUniverse(symbols: readonly string[]): string[] {
  const seen = new Set<string>();
  const normalized: string[] = [];
  for (const symbol of symbols) {
    const upper = symbol.trim().toUpperCase();
    if (upper && !seen.has(upper)) {
      seen.add(upper);
      normalized.push(upper);
    }
  }
  return normalized;
}

function toOverrides(raw: RawScannerConfig): ScannerConfigOverrides {
  const t = raw.thresholds;
  const pillars = raw.pillars;
  return {
    enabledPillars: pillars && {
      price: pillars.price?.enabled,
      momentum: pillars.momentum?.enabled,
      volume: pillars.volume?.enabled,
      catalyst: pillars.catalyst?.enabled,
      float: pillars.float?.enabled,
    },
    pillarWeights: raw.pillar_weights,
    thresholds: t && {
      insufficientDataScore: t.insufficient_data_score,
      price: t.price && {
        minPrice: t.price.min_price,
        maxPrice: t.price.max_price,
        minPoints: t.price.min_points,
        outOfBandFactor: t.price.out_of_band_factor,
      },
      momentum: t.momentum && {
        lookback: t.momentum.lookback,
        fullScaleMovePct: t.momentum.full_scale_move_pct,
        minPctMove: t.momentum.min_pct_move,
      },
      volume: t.volume && {
        targetRelativeVolume: t.volume.target_relative_volume,
        minRelativeVolume: t.volume.min_relative_volume,
      },
      catalyst: t.catalyst && {
        allowedTypes: t.catalyst.allowed_types?.map((type) => type.trim().toLowerCase()),
        excludedTypes: t.catalyst.excluded_types?.map((type) => type.trim().toLowerCase()),
        freshWindowMs:
          t.catalyst.fresh_window_minutes === undefined
            ? undefined
            : t.catalyst.fresh_window_minutes * MINUTE_MS,
        requireNews: t.catalyst.require_news,
      },
      float: t.float && {
        smallMax: t.float.small_max,
        mediumMax: t.float.medium_max,
        largeMax: t.float.large_max,
        maxShares: t.float.max_shares,
      },
    },
    windows: raw.windows && {
      priceCapacity: raw.windows.price_capacity,
      volumeCapacity: raw.windows.volume_capacity,
      catalystRetentionMs:
        raw.windows.catalyst_retention_hours === undefined
          ? undefined
          : raw.windows.catalyst_retention_hours * HOUR_MS,
    },
    cycle: raw.cycle && {
      intervalMs: raw.cycle.interval_ms,
      deadlineMs: raw.cycle.deadline_ms,
      ingestDeadlineMs: raw.cycle.ingest_deadline_ms,
      maxConcurrency: raw.cycle.max_concurrency,
    },
    cache: raw.cache && { capacity: raw.cache.capacity },
  };
}

function parseStartTime(raw: string | undefined): number {
  const parsed = Date.parse(raw ?? DEFAULT_SIMULATION_START);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`Invalid provider.start_time: ${raw}`);
  }
  return parsed;
}

export function resolveProviderConfig(
  raw: RawScannerConfig['provider'],
  override: ProviderType | null
): ProviderConfig {
  const type = override ?? raw?.type ?? 'simulated';
  const settings = raw && raw.type === type ? raw : undefined;

  switch (type) {
    case 'memory':
      return { type };
    case 'replay': {
      const path = settings?.path;
      if (!path) {
        throw new ConfigurationError('Replay provider requires provider.path', [
          '/provider: must have property path when type is replay',
        ]);
      }
      return {
        type,
        path,
        ticksPerPoll: settings?.ticks_per_poll ?? 50,
        loop: settings?.loop ?? false,
      };
    }
    case 'simulated':
      return {
        type,
        seed: settings?.seed ?? 'momentum-scanner',
        startTime: parseStartTime(settings?.start_time),
        tickIntervalMs: settings?.tick_interval_ms ?? 1000,
        volatilityPct: settings?.volatility_pct ?? 1.5,
        catalystProbability: settings?.catalyst_probability ?? 0.01,
      };
    default: {
      const unknownType: never = type;
      throw new ConfigurationError(`Unknown provider type: ${String(unknownType)}`);
    }
  }
}

function checkCrossFieldRules(config: AppConfig): void {
  const errors: string[] = [];
  const { price, float } = config.scanner.thresholds;
  if (price.minPrice >= price.maxPrice) {
    errors.push('/thresholds/price: min_price must be below max_price');
  }
  if (!(float.smallMax < float.mediumMax && float.mediumMax < float.largeMax)) {
    errors.push('/thresholds/float: expected small_max < medium_max < large_max');
  }
  const { cycle } = config.scanner;
  if (cycle.ingestDeadlineMs > cycle.deadlineMs) {
    errors.push('/cycle: ingest_deadline_ms must not exceed deadline_ms');
  }
  if (config.universe.length === 0) {
    errors.push('/universe: at least one symbol is required');
  }
  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid scanner config: ${errors.join('; ')}`, errors);
  }
}

/**
 * Builds an AppConfig from already-parsed JSON. Exposed for tests and for
 * callers that hold the config in memory.
 */
export function parseAppConfig(
  data: unknown,
  source: string | null = null,
  providerOverride: ProviderType | null = getEnvConfig().providerOverride
): AppConfig {
  const result = validateScannerConfig(data);
  if (!result.valid || !result.data) {
    const errors = result.errors ?? [];
    throw new ConfigurationError(
      `Scanner config ${source ?? '(inline)'} failed validation: ${errors.join('; ')}`,
      errors
    );
  }
  const raw = result.data;

  const pillars = raw.pillars;
  if (pillars && PILLAR_IDS.every((pillar) => pillars[pillar]?.enabled === false)) {
    const errors = ['/pillars: at least one pillar must be enabled'];
    throw new ConfigurationError(`Invalid scanner config: ${errors.join('; ')}`, errors);
  }

  const config: AppConfig = {
    scanner: buildScannerConfig(toOverrides(raw)),
    universe: normalizeUniverse(raw.universe ?? DEFAULT_UNIVERSE),
    provider: resolveProviderConfig(raw.provider, providerOverride),
    output: {
      jsonlDir: raw.output?.jsonl_dir ?? DEFAULT_OUTPUT.jsonlDir,
      topN: raw.output?.top_n ?? DEFAULT_OUTPUT.topN,
      statsEveryCycles: raw.output?.stats_every_cycles ?? DEFAULT_OUTPUT.statsEveryCycles,
    },
    source,
  };
  checkCrossFieldRules(config);
  return config;
}

export interface LoadConfigOptions {
  path?: string;
  /** Takes precedence over SCANNER_PROVIDER and the file. */
  provider?: ProviderType;
  /** Bypass the process-wide cache. */
  fresh?: boolean;
}

/**
 * ENV:
 * - SCANNER_CONFIG: alternate config path
 * - SCANNER_PROVIDER: overrides provider.type
 */
export function loadAppConfig(options: LoadConfigOptions = {}): AppConfig {
  const useCache = !options.path && !options.provider && !options.fresh;
  if (useCache && cachedConfig) {
    return cachedConfig;
  }

  const path = resolveConfigPath(options.path);
  const found = existsSync(path);
  let data: unknown = {};
  if (found) {
    try {
      data = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Could not read scanner config ${path}: ${errorMessage(error)}`);
    }
  } else if (options.path || getEnvConfig().configPath) {
    throw new ConfigurationError(`Scanner config not found: ${path}`);
  }

  const config = parseAppConfig(
    data,
    found ? path : null,
    options.provider ?? getEnvConfig().providerOverride
  );
  if (useCache) {
    cachedConfig = config;
  }
  return config;
}

export function resetConfig(): void {
  cachedConfig = null;
}
