import { clamp, roundScore } from '../normalize';
import type { PillarThresholds } from '../scoring_config';
import type { PillarId, PillarScore, SymbolSnapshot } from '@/scanner/types';

export type PillarEvaluator = (
  snapshot: SymbolSnapshot,
  thresholds: PillarThresholds
) => PillarScore;

export interface PillarVerdict {
  passed: boolean;
  threshold: number | string | null;
}

export function pillarScore(
  pillar: PillarId,
  snapshot: SymbolSnapshot,
  score: number,
  value: number | string | null,
  reason: string,
  verdict: PillarVerdict
): PillarScore {
  return Object.freeze({
    pillar,
    symbol: snapshot.symbol,
    version: snapshot.version,
    score: roundScore(clamp(Number.isFinite(score) ? score : 0)),
    value,
    insufficientData: false,
    passed: verdict.passed,
    threshold: verdict.threshold,
    reason,
  });
}

/** The defined fallback for a pillar that cannot be measured yet. It never passes. */
export function insufficientData(
  pillar: PillarId,
  snapshot: SymbolSnapshot,
  thresholds: PillarThresholds,
  reason: string,
  threshold: number | string | null
): PillarScore {
  return Object.freeze({
    pillar,
    symbol: snapshot.symbol,
    version: snapshot.version,
    score: clamp(thresholds.insufficientDataScore),
    value: null,
    insufficientData: true,
    passed: false,
    threshold,
    reason,
  });
}
