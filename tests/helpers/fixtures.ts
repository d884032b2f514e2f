import { normalizeScoreResult } from '@/scoring/normalizer';
import type { EntityRef, Quote, ScoredEntity } from '@/types/scoring';

export function makeQuote(symbol: string, overrides: Partial<Quote> = {}): Quote {
  return {
    symbol,
    lastPrice: 10.5,
    open: 10.2,
    high: 10.8,
    low: 10.1,
    previousClose: 10.25,
    changePct: 2.44,
    volume: 1_200_000,
    turnover: 12_600_000,
    ...overrides,
  };
}

export const SAMPLE_SCORES = {
  technical_score: 8,
  fundamental_score: 7,
  growth_score: 6,
  sentiment_score: 5,
  industry_risk_score: 5,
};

/** overall 6.85, Hold / orange */
export function makeScored(entity: EntityRef, quote: Quote | null = makeQuote(entity.id)): ScoredEntity {
  return normalizeScoreResult(
    {
      ...SAMPLE_SCORES,
      reason: `Steady trend for ${entity.id}`,
      risks: ['Valuation'],
      opportunities: ['Buybacks'],
      suggestion: 'Accumulate on dips',
    },
    entity.id,
    entity.name,
    quote
  );
}

export function modelReply(payload: Record<string, unknown> = SAMPLE_SCORES): string {
  return `<think>checking the numbers</think>\n\`\`\`json\n${JSON.stringify(payload)}\n\`\`\``;
}
