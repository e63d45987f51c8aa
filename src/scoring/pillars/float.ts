/**
 * Float pillar: low float means more volatility potential.
 */

import { linearScale } from '../normalize';
import { insufficientData, pillarScore, type PillarEvaluator } from './base';

export function formatShares(shares: number): string {
  if (shares >= 1_000_000_000) return `${(shares / 1_000_000_000).toFixed(1)}B`;
  if (shares >= 1_000_000) return `${(shares / 1_000_000).toFixed(1)}M`;
  if (shares >= 1_000) return `${(shares / 1_000).toFixed(0)}K`;
  return String(shares);
}

export const evaluateFloat: PillarEvaluator = (snapshot, thresholds) => {
  const t = thresholds.float;
  const shares = snapshot.floatShares;

  if (shares === null) {
    return insufficientData(
      'float',
      snapshot,
      thresholds,
      'Float data unavailable',
      formatShares(t.maxShares)
    );
  }

  let score: number;
  let band: string;
  if (shares <= t.smallMax) {
    score = 100;
    band = 'low float';
  } else if (shares <= t.mediumMax) {
    score = linearScale(shares, t.smallMax, t.mediumMax, 100, 60);
    band = 'medium float';
  } else if (shares <= t.largeMax) {
    score = linearScale(shares, t.mediumMax, t.largeMax, 60, 20);
    band = 'large float';
  } else {
    score = 10;
    band = 'float above large band';
  }

  return pillarScore(
    'float',
    snapshot,
    score,
    shares,
    `${formatShares(shares)} ${band} (small <= ${formatShares(t.smallMax)})`,
    { passed: shares <= t.maxShares, threshold: formatShares(t.maxShares) }
  );
};
