/**
 * Scanner configuration: pillar thresholds, weights, windows, cycle timing
 * and cache sizing. The engine only ever sees the resolved ScannerConfig;
 * reading and validating files happens in core/config.
 */

import { PILLAR_IDS, type PillarId, type PillarToggles } from '@/scanner/types';

export type PillarWeights = Record<PillarId, number>;

export interface PriceThresholds {
  minPrice: number;
  maxPrice: number;
  minPoints: number;
  outOfBandFactor: number;
}

export interface MomentumThresholds {
  lookback: number;
  fullScaleMovePct: number;
  /** Absolute % move over the lookback needed to pass. */
  minPctMove: number;
}

export interface VolumeThresholds {
  targetRelativeVolume: number;
  minRelativeVolume: number;
}

export interface CatalystThresholds {
  allowedTypes: string[];
  excludedTypes: string[];
  freshWindowMs: number;
  /** When false, a symbol without news passes the catalyst pillar. */
  requireNews: boolean;
}

export interface FloatThresholds {
  smallMax: number;
  mediumMax: number;
  largeMax: number;
  maxShares: number;
}

export interface PillarThresholds {
  insufficientDataScore: number;
  price: PriceThresholds;
  momentum: MomentumThresholds;
  volume: VolumeThresholds;
  catalyst: CatalystThresholds;
  float: FloatThresholds;
}

export interface WindowConfig {
  priceCapacity: number;
  volumeCapacity: number;
  catalystRetentionMs: number;
}

export interface CycleConfig {
  intervalMs: number;
  deadlineMs: number;
  ingestDeadlineMs: number;
  maxConcurrency: number;
}

export interface CacheConfig {
  capacity: number;
}

export interface ScannerConfig {
  /** Disabled pillars are still scored but carry no weight and always pass. */
  enabledPillars: PillarToggles;
  pillarWeights: PillarWeights;
  thresholds: PillarThresholds;
  windows: WindowConfig;
  cycle: CycleConfig;
  cache: CacheConfig;
}

export const DEFAULT_PILLAR_WEIGHTS: PillarWeights = {
  price: 0.2,
  momentum: 0.2,
  volume: 0.2,
  catalyst: 0.2,
  float: 0.2,
};

export const DEFAULT_THRESHOLDS: PillarThresholds = {
  insufficientDataScore: 0,
  price: {
    minPrice: 2,
    maxPrice: 20,
    minPoints: 2,
    outOfBandFactor: 0.25,
  },
  momentum: {
    lookback: 10,
    fullScaleMovePct: 10,
    minPctMove: 10,
  },
  volume: {
    targetRelativeVolume: 5,
    minRelativeVolume: 5,
  },
  catalyst: {
    allowedTypes: ['earnings', 'fda', 'mna', 'contracts', 'guidance'],
    excludedTypes: ['rumor', 'sympathy', 'social', 'technical'],
    freshWindowMs: 60 * 60 * 1000,
    requireNews: true,
  },
  float: {
    smallMax: 10_000_000,
    mediumMax: 20_000_000,
    largeMax: 100_000_000,
    maxShares: 20_000_000,
  },
};

export const ALL_PILLARS_ENABLED: PillarToggles = Object.freeze({
  price: true,
  momentum: true,
  volume: true,
  catalyst: true,
  float: true,
});

export const DEFAULT_SCANNER_CONFIG: ScannerConfig = {
  enabledPillars: ALL_PILLARS_ENABLED,
  pillarWeights: DEFAULT_PILLAR_WEIGHTS,
  thresholds: DEFAULT_THRESHOLDS,
  windows: {
    priceCapacity: 120,
    volumeCapacity: 120,
    catalystRetentionMs: 24 * 60 * 60 * 1000,
  },
  cycle: {
    intervalMs: 1000,
    deadlineMs: 500,
    ingestDeadlineMs: 100,
    maxConcurrency: 4,
  },
  cache: {
    capacity: 10_000,
  },
};

export interface ScannerConfigOverrides {
  enabledPillars?: Partial<PillarToggles>;
  pillarWeights?: Partial<PillarWeights>;
  thresholds?: {
    insufficientDataScore?: number;
    price?: Partial<PriceThresholds>;
    momentum?: Partial<MomentumThresholds>;
    volume?: Partial<VolumeThresholds>;
    catalyst?: Partial<CatalystThresholds>;
    float?: Partial<FloatThresholds>;
  };
  windows?: Partial<WindowConfig>;
  cycle?: Partial<CycleConfig>;
  cache?: Partial<CacheConfig>;
}

function mergeWeights(base: PillarWeights, override?: Partial<PillarWeights>): PillarWeights {
  if (!override) return base;
  return {
    price: override.price ?? base.price,
    momentum: override.momentum ?? base.momentum,
    volume: override.volume ?? base.volume,
    catalyst: override.catalyst ?? base.catalyst,
    float: override.float ?? base.float,
  };
}

function mergeThresholds(
  base: PillarThresholds,
  override?: ScannerConfigOverrides['thresholds']
): PillarThresholds {
  if (!override) return base;
  const { price, momentum, volume, catalyst, float } = override;
  return {
    insufficientDataScore: override.insufficientDataScore ?? base.insufficientDataScore,
    price: {
      minPrice: price?.minPrice ?? base.price.minPrice,
      maxPrice: price?.maxPrice ?? base.price.maxPrice,
      minPoints: price?.minPoints ?? base.price.minPoints,
      outOfBandFactor: price?.outOfBandFactor ?? base.price.outOfBandFactor,
    },
    momentum: {
      lookback: momentum?.lookback ?? base.momentum.lookback,
      fullScaleMovePct: momentum?.fullScaleMovePct ?? base.momentum.fullScaleMovePct,
      minPctMove: momentum?.minPctMove ?? base.momentum.minPctMove,
    },
    volume: {
      targetRelativeVolume: volume?.targetRelativeVolume ?? base.volume.targetRelativeVolume,
      minRelativeVolume: volume?.minRelativeVolume ?? base.volume.minRelativeVolume,
    },
    catalyst: {
      allowedTypes: catalyst?.allowedTypes ?? base.catalyst.allowedTypes,
      excludedTypes: catalyst?.excludedTypes ?? base.catalyst.excludedTypes,
      freshWindowMs: catalyst?.freshWindowMs ?? base.catalyst.freshWindowMs,
      requireNews: catalyst?.requireNews ?? base.catalyst.requireNews,
    },
    float: {
      smallMax: float?.smallMax ?? base.float.smallMax,
      mediumMax: float?.mediumMax ?? base.float.mediumMax,
      largeMax: float?.largeMax ?? base.float.largeMax,
      maxShares: float?.maxShares ?? base.float.maxShares,
    },
  };
}

/**
 * Scales weights to sum to 1. A non-positive total falls back to equal weights.
 */
export function normalizeWeights(weights: PillarWeights): PillarWeights {
  const total =
    weights.price + weights.momentum + weights.volume + weights.catalyst + weights.float;
  if (!(total > 0)) {
    return DEFAULT_PILLAR_WEIGHTS;
  }
  return {
    price: weights.price / total,
    momentum: weights.momentum / total,
    volume: weights.volume / total,
    catalyst: weights.catalyst / total,
    float: weights.float / total,
  };
}

function mergeToggles(base: PillarToggles, override?: Partial<PillarToggles>): PillarToggles {
  if (!override) return base;
  return Object.freeze({
    price: override.price ?? base.price,
    momentum: override.momentum ?? base.momentum,
    volume: override.volume ?? base.volume,
    catalyst: override.catalyst ?? base.catalyst,
    float: override.float ?? base.float,
  });
}

/** Zeroes the weight of every disabled pillar. */
export function maskWeights(weights: PillarWeights, enabled: PillarToggles): PillarWeights {
  return {
    price: enabled.price ? weights.price : 0,
    momentum: enabled.momentum ? weights.momentum : 0,
    volume: enabled.volume ? weights.volume : 0,
    catalyst: enabled.catalyst ? weights.catalyst : 0,
    float: enabled.float ? weights.float : 0,
  };
}

/**
 * Resolves overrides over a base config. Weights are masked by the enabled
 * pillars, then normalized; when every enabled pillar has weight 0 they share
 * the weight equally.
 *
 * @throws RangeError when every pillar is disabled
 */
export function buildScannerConfig(
  overrides: ScannerConfigOverrides = {},
  base: ScannerConfig = DEFAULT_SCANNER_CONFIG
): ScannerConfig {
  const { windows, cycle, cache } = overrides;
  const enabledPillars = mergeToggles(base.enabledPillars, overrides.enabledPillars);
  if (!PILLAR_IDS.some((pillar) => enabledPillars[pillar])) {
    throw new RangeError('At least one pillar must be enabled');
  }
  let pillarWeights = maskWeights(
    mergeWeights(base.pillarWeights, overrides.pillarWeights),
    enabledPillars
  );
  if (!PILLAR_IDS.some((pillar) => pillarWeights[pillar] > 0)) {
    pillarWeights = maskWeights(DEFAULT_PILLAR_WEIGHTS, enabledPillars);
  }
  return {
    enabledPillars,
    pillarWeights: normalizeWeights(pillarWeights),
    thresholds: mergeThresholds(base.thresholds, overrides.thresholds),
    windows: {
      priceCapacity: windows?.priceCapacity ?? base.windows.priceCapacity,
      volumeCapacity: windows?.volumeCapacity ?? base.windows.volumeCapacity,
      catalystRetentionMs: windows?.catalystRetentionMs ?? base.windows.catalystRetentionMs,
    },
    cycle: {
      intervalMs: cycle?.intervalMs ?? base.cycle.intervalMs,
      deadlineMs: cycle?.deadlineMs ?? base.cycle.deadlineMs,
      ingestDeadlineMs: cycle?.ingestDeadlineMs ?? base.cycle.ingestDeadlineMs,
      maxConcurrency: cycle?.maxConcurrency ?? base.cycle.maxConcurrency,
    },
    cache: {
      capacity: cache?.capacity ?? base.cache.capacity,
    },
  };
}
