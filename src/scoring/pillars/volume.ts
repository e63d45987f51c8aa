/**
 * Volume pillar: relative volume of the latest tick against the trailing
 * average of the earlier ticks in the window. The score scales against
 * targetRelativeVolume; the pillar passes at minRelativeVolume.
 */

import { mean } from '../normalize';
import { insufficientData, pillarScore, type PillarEvaluator } from './base';

export const evaluateVolume: PillarEvaluator = (snapshot, thresholds) => {
  const t = thresholds.volume;
  const volumes = snapshot.volumes;

  if (volumes.length < 2) {
    return insufficientData(
      'volume',
      snapshot,
      thresholds,
      'No prior volume for a baseline',
      t.minRelativeVolume
    );
  }

  const latest = volumes[volumes.length - 1];
  const baseline = mean(volumes.slice(0, -1));
  if (baseline === null || !(baseline > 0)) {
    return insufficientData(
      'volume',
      snapshot,
      thresholds,
      'Baseline volume is zero',
      t.minRelativeVolume
    );
  }

  const rvol = latest / baseline;
  const score = t.targetRelativeVolume > 0 ? (rvol / t.targetRelativeVolume) * 100 : 0;
  const passed = rvol >= t.minRelativeVolume;

  return pillarScore(
    'volume',
    snapshot,
    score,
    rvol,
    `RVol ${rvol.toFixed(1)}x ${passed ? 'meets' : 'below'} threshold ${t.minRelativeVolume}x`,
    { passed, threshold: t.minRelativeVolume }
  );
};
