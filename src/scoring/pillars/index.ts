import { evaluatePrice } from './price';
import { evaluateMomentum } from './momentum';
import { evaluateVolume } from './volume';
import { evaluateCatalyst } from './catalyst';
import { evaluateFloat } from './float';
import type { PillarEvaluator } from './base';
import type { PillarId } from '@/scanner/types';

export type { PillarEvaluator } from './base';
export { evaluatePrice, evaluateMomentum, evaluateVolume, evaluateCatalyst, evaluateFloat };
export { CATALYST_TIER_SCORES, type CatalystTier } from './catalyst';

export type PillarRegistry = Readonly<Record<PillarId, PillarEvaluator>>;

/** The closed set of pillars. Keyed by PillarId so a missing pillar fails to compile. */
export const PILLAR_EVALUATORS: PillarRegistry = Object.freeze({
  price: evaluatePrice,
  momentum: evaluateMomentum,
  volume: evaluateVolume,
  catalyst: evaluateCatalyst,
  float: evaluateFloat,
});
