/**
 * Catalyst pillar: maps retained news tags to a discrete tier.
 * No real news = no continuation, so an empty tag list is the lowest tier.
 * Only an allowed catalyst passes, unless news is not required and there is none.
 */

import { pillarScore, type PillarEvaluator } from './base';
import type { CatalystTag, PillarScore } from '@/scanner/types';

export type CatalystTier = 'none' | 'unverified' | 'aging' | 'fresh';

export const CATALYST_TIER_SCORES: Readonly<Record<CatalystTier, number>> = {
  none: 0,
  unverified: 25,
  aging: 70,
  fresh: 100,
};

export const evaluateCatalyst: PillarEvaluator = (snapshot, thresholds): PillarScore => {
  const t = thresholds.catalyst;
  const allowed = new Set(t.allowedTypes.map((c) => c.toLowerCase()));
  const excluded = new Set(t.excludedTypes.map((c) => c.toLowerCase()));
  const threshold = t.allowedTypes.join(', ');

  if (snapshot.catalysts.length === 0) {
    const reason = t.requireNews ? 'No catalyst found' : 'No catalyst found, news not required';
    return pillarScore('catalyst', snapshot, CATALYST_TIER_SCORES.none, null, reason, {
      passed: !t.requireNews,
      threshold: t.requireNews ? 'requires news' : null,
    });
  }

  let best: { tier: CatalystTier; tag: CatalystTag } | null = null;
  for (const tag of snapshot.catalysts) {
    let tier: CatalystTier;
    if (excluded.has(tag.category)) {
      tier = 'none';
    } else if (allowed.has(tag.category)) {
      const age = snapshot.lastTimestamp - tag.timestamp;
      tier = age <= t.freshWindowMs ? 'fresh' : 'aging';
    } else {
      tier = 'unverified';
    }
    // Later tags win ties; tags are stored oldest first.
    if (!best || CATALYST_TIER_SCORES[tier] >= CATALYST_TIER_SCORES[best.tier]) {
      best = { tier, tag };
    }
  }

  if (!best || best.tier === 'none') {
    const category = best?.tag.category ?? null;
    return pillarScore(
      'catalyst',
      snapshot,
      CATALYST_TIER_SCORES.none,
      category,
      `Catalyst type '${category}' is explicitly excluded`,
      { passed: false, threshold }
    );
  }

  const headline = best.tag.headline ? ` - ${best.tag.headline.slice(0, 50)}` : '';
  const label =
    best.tier === 'unverified'
      ? `Catalyst type '${best.tag.category}' not in allowed list`
      : `${best.tier === 'fresh' ? 'Fresh' : 'Aging'} catalyst: ${best.tag.category}${headline}`;

  return pillarScore('catalyst', snapshot, CATALYST_TIER_SCORES[best.tier], best.tag.category, label, {
    passed: best.tier !== 'unverified',
    threshold,
  });
};
