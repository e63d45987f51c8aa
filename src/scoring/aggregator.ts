/**
 * Aggregator
 * Combines the five pillar scores into a composite and ranks composites into a
 * total order: composite descending, then symbol ascending. Qualification
 * (passedAll) is reported alongside and never reorders the ranking.
 */

import { roundScore } from './normalize';
import { ALL_PILLARS_ENABLED, type PillarWeights } from './scoring_config';
import { IncompleteScoreSetError } from '@/scanner/errors';
import {
  PILLAR_IDS,
  type CompositeScore,
  type PillarId,
  type PillarScore,
  type PillarScores,
  type PillarToggles,
  type RankedScore,
  type SessionPhase,
} from '@/scanner/types';

export function aggregate(
  symbol: string,
  scores: readonly PillarScore[],
  currentVersion: number,
  weights: PillarWeights,
  enabled: PillarToggles = ALL_PILLARS_ENABLED
): CompositeScore {
  if (scores.length < PILLAR_IDS.length) {
    throw new IncompleteScoreSetError(
      symbol,
      `expected ${PILLAR_IDS.length} pillar scores, got ${scores.length}`
    );
  }

  const byPillar: Partial<Record<PillarId, PillarScore>> = {};
  for (const score of scores) {
    if (score.symbol !== symbol) {
      throw new IncompleteScoreSetError(symbol, `score for ${score.symbol} supplied`);
    }
    if (byPillar[score.pillar]) {
      throw new IncompleteScoreSetError(symbol, `duplicate ${score.pillar} score`);
    }
    if (score.version !== currentVersion) {
      throw new IncompleteScoreSetError(
        symbol,
        `${score.pillar} score is stale (version ${score.version}, current ${currentVersion})`
      );
    }
    byPillar[score.pillar] = score;
  }

  const { price, momentum, volume, catalyst, float } = byPillar;
  if (!price || !momentum || !volume || !catalyst || !float) {
    const missing = PILLAR_IDS.filter((id) => !byPillar[id]);
    throw new IncompleteScoreSetError(symbol, `missing ${missing.join(', ')}`);
  }

  const pillars: PillarScores = Object.freeze({ price, momentum, volume, catalyst, float });
  const total =
    price.score * weights.price +
    momentum.score * weights.momentum +
    volume.score * weights.volume +
    catalyst.score * weights.catalyst +
    float.score * weights.float;

  const passedPillars = PILLAR_IDS.filter((id) => !enabled[id] || pillars[id].passed);
  const failedPillars = PILLAR_IDS.filter((id) => enabled[id] && !pillars[id].passed);

  return Object.freeze({
    symbol,
    version: currentVersion,
    score: roundScore(total),
    pillars,
    passedPillars: Object.freeze(passedPillars),
    failedPillars: Object.freeze(failedPillars),
    passedAll: failedPillars.length === 0,
  });
}

/** Code-unit order, independent of the host locale. */
export function compareSymbols(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareComposites(a: CompositeScore, b: CompositeScore): number {
  if (b.score !== a.score) return b.score - a.score;
  return compareSymbols(a.symbol, b.symbol);
}

export interface RankContext {
  lastPrice: number;
  session: SessionPhase;
}

export function rank(
  composites: readonly CompositeScore[],
  context: (symbol: string) => RankContext
): RankedScore[] {
  return composites
    .slice()
    .sort(compareComposites)
    .map((composite, index) => {
      const { lastPrice, session } = context(composite.symbol);
      return Object.freeze({ ...composite, rank: index + 1, lastPrice, session });
    });
}

export function selectTopK(entries: readonly RankedScore[], k: number): RankedScore[] {
  return entries.slice(0, Math.max(0, k));
}

/** Entries that passed every enabled pillar, in rank order. */
export function selectQualified(entries: readonly RankedScore[]): RankedScore[] {
  return entries.filter((entry) => entry.passedAll);
}
