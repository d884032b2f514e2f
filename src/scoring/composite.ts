/**
 * Composite score and rating tiers
 * Five dimensions on a 0-10 scale, fixed weights
 */

import { roundTo } from './normalize';
import type { DimensionScores, Rating, Signal } from '@/types/scoring';

export const DIMENSION_WEIGHTS: DimensionScores = {
  fundamental: 0.4,
  technical: 0.3,
  growth: 0.15,
  sentiment: 0.1,
  industryRisk: 0.05,
};

export interface RatingTier {
  /** Inclusive lower bound */
  min: number;
  rating: Rating;
  signal: Signal;
}

// Ordered from highest bound down; the last tier catches everything below.
export const RATING_TIERS: readonly RatingTier[] = [
  { min: 9.0, rating: 'StrongBuy', signal: 'green' },
  { min: 7.5, rating: 'Buy', signal: 'yellow' },
  { min: 6.0, rating: 'Hold', signal: 'orange' },
  { min: 4.0, rating: 'Reduce', signal: 'red' },
  { min: Number.NEGATIVE_INFINITY, rating: 'Sell', signal: 'black' },
];

export function calculateOverallScore(scores: DimensionScores): number {
  const weighted =
    scores.fundamental * DIMENSION_WEIGHTS.fundamental +
    scores.technical * DIMENSION_WEIGHTS.technical +
    scores.growth * DIMENSION_WEIGHTS.growth +
    scores.sentiment * DIMENSION_WEIGHTS.sentiment +
    scores.industryRisk * DIMENSION_WEIGHTS.industryRisk;
  return roundTo(weighted, 2);
}

export function deriveRating(overallScore: number): RatingTier {
  for (const tier of RATING_TIERS) {
    if (overallScore >= tier.min) {
      return tier;
    }
  }
  return RATING_TIERS[RATING_TIERS.length - 1];
}
