/**
 * Price pillar: where the last trade sits in the recent high/low range, with a
 * penalty when it falls outside the tradable price band.
 */

import { insufficientData, pillarScore, type PillarEvaluator } from './base';

export const evaluatePrice: PillarEvaluator = (snapshot, thresholds) => {
  const t = thresholds.price;
  const prices = snapshot.prices;
  const required = Math.max(1, t.minPoints);
  const threshold = `${t.minPrice}-${t.maxPrice}`;

  if (prices.length < required) {
    return insufficientData(
      'price',
      snapshot,
      thresholds,
      `Need ${required} price points, have ${prices.length}`,
      threshold
    );
  }

  let low = Number.POSITIVE_INFINITY;
  let high = Number.NEGATIVE_INFINITY;
  for (const p of prices) {
    if (p < low) low = p;
    if (p > high) high = p;
  }

  const price = snapshot.lastPrice;
  const position = high > low ? (price - low) / (high - low) : 0.5;
  const inBand = price >= t.minPrice && price <= t.maxPrice;
  const score = position * 100 * (inBand ? 1 : t.outOfBandFactor);

  const band = `$${t.minPrice.toFixed(2)}-$${t.maxPrice.toFixed(2)}`;
  let reason: string;
  if (inBand) {
    reason = `Price $${price.toFixed(2)} within range ${band}`;
  } else if (price < t.minPrice) {
    reason = `Price $${price.toFixed(2)} below minimum $${t.minPrice.toFixed(2)}`;
  } else {
    reason = `Price $${price.toFixed(2)} above maximum $${t.maxPrice.toFixed(2)}`;
  }

  return pillarScore(
    'price',
    snapshot,
    score,
    price,
    `${reason}, at ${(position * 100).toFixed(0)}% of recent range`,
    { passed: inBand, threshold }
  );
};
