/**
 * Normalizer
 * Turns the model's parsed object into a complete, clamped ScoredEntity
 */

import { calculateOverallScore, deriveRating } from './composite';
import { normalizeDimension, toFiniteNumber } from './normalize';
import type { Dimension, DimensionScores, Quote, ScoredEntity } from '@/types/scoring';

const DIMENSION_KEYS: Record<Dimension, readonly string[]> = {
  fundamental: ['fundamental_score', 'fundamentalScore', 'fundamental'],
  technical: ['technical_score', 'technicalScore', 'technical'],
  growth: ['growth_score', 'growthScore', 'growth'],
  sentiment: ['sentiment_score', 'sentimentScore', 'sentiment'],
  industryRisk: ['industry_risk_score', 'industryRiskScore', 'industry_risk', 'industryRisk'],
};

function pickValue(parsed: Record<string, unknown>, keys: readonly string[]): unknown {
  for (const key of keys) {
    const value = parsed[key];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return undefined;
}

function pickText(parsed: Record<string, unknown>, keys: readonly string[]): string {
  const value = pickValue(parsed, keys);
  return typeof value === 'string' ? value.trim() : '';
}

function toTextList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function normalizeDimensions(parsed: Record<string, unknown>): DimensionScores {
  return {
    fundamental: normalizeDimension(pickValue(parsed, DIMENSION_KEYS.fundamental)),
    technical: normalizeDimension(pickValue(parsed, DIMENSION_KEYS.technical)),
    growth: normalizeDimension(pickValue(parsed, DIMENSION_KEYS.growth)),
    sentiment: normalizeDimension(pickValue(parsed, DIMENSION_KEYS.sentiment)),
    industryRisk: normalizeDimension(pickValue(parsed, DIMENSION_KEYS.industryRisk)),
  };
}

/**
 * The requested id always wins over the model's `code` so results stay keyed
 * by what was asked for. The model's own overall score is ignored; rating and
 * signal strings it supplies take precedence over the derived tier.
 */
export function normalizeScoreResult(
  parsed: Record<string, unknown>,
  fallbackId: string,
  fallbackName: string,
  quote: Quote | null
): ScoredEntity {
  const scores = normalizeDimensions(parsed);
  const overallScore = calculateOverallScore(scores);
  const tier = deriveRating(overallScore);

  const rating = pickText(parsed, ['rating']);
  const signal = pickText(parsed, ['signal']);

  return {
    ok: true,
    entityId: fallbackId,
    displayName: pickText(parsed, ['name', 'display_name', 'displayName']) || fallbackName,
    price: toFiniteNumber(pickValue(parsed, ['price', 'last_price', 'lastPrice'])) ?? quote?.lastPrice ?? null,
    changePct:
      toFiniteNumber(pickValue(parsed, ['change_pct', 'changePct', 'change_percent'])) ??
      quote?.changePct ??
      null,
    scores,
    overallScore,
    rating: rating || tier.rating,
    signal: signal || tier.signal,
    reason: pickText(parsed, ['reason']),
    risks: toTextList(parsed.risks),
    opportunities: toTextList(parsed.opportunities),
    suggestion: pickText(parsed, ['suggestion']),
  };
}
