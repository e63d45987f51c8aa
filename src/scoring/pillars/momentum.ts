/**
 * Momentum pillar: rate of change across the lookback window.
 *
 * A flat series scores the neutral midpoint (50); a move of
 * fullScaleMovePct or more in either direction saturates the scale. The
 * pillar passes on an absolute move of at least minPctMove.
 */

import { insufficientData, pillarScore, type PillarEvaluator } from './base';

export const evaluateMomentum: PillarEvaluator = (snapshot, thresholds) => {
  const t = thresholds.momentum;
  const lookback = Math.max(2, Math.floor(t.lookback));
  const window = snapshot.prices.slice(-lookback);

  if (window.length < 2) {
    return insufficientData(
      'momentum',
      snapshot,
      thresholds,
      `Need 2 price points in the lookback window, have ${window.length}`,
      t.minPctMove
    );
  }

  const first = window[0];
  const last = window[window.length - 1];
  const rocPct = ((last - first) / first) * 100;
  const scale = t.fullScaleMovePct > 0 ? 50 / t.fullScaleMovePct : 0;
  const score = 50 + rocPct * scale;

  const sign = rocPct >= 0 ? '+' : '';
  const passed = Math.abs(rocPct) >= t.minPctMove;
  const verdict = passed ? '' : `, below threshold ${t.minPctMove}%`;
  return pillarScore(
    'momentum',
    snapshot,
    score,
    rocPct,
    `${sign}${rocPct.toFixed(1)}% over ${window.length} ticks${verdict}`,
    { passed, threshold: t.minPctMove }
  );
};
