/**
 * LLM Prompt Templates
 * Builds the per-entity scoring request: analyst role, rubric, condensed quote
 */

import { DIMENSION_WEIGHTS, RATING_TIERS } from '@/scoring/composite';
import type { Dimension, EntityRef, Quote } from '@/types/scoring';
import { systemMessage, userMessage, type ChatMessage } from './types';

export const PROMPT_VERSION = '1.0.0';

const DIMENSION_LABELS: Record<Dimension, string> = {
  fundamental: 'Fundamentals (valuation, profitability, balance sheet)',
  technical: 'Technicals (trend, momentum, intraday range, volume)',
  growth: 'Growth (revenue and earnings trajectory, market expansion)',
  sentiment: 'Market sentiment (news flow, positioning, risk appetite)',
  industryRisk: 'Industry risk (competition, regulation, cyclicality; 10 = lowest risk)',
};

const DIMENSION_ORDER: readonly Dimension[] = ['fundamental', 'technical', 'growth', 'sentiment', 'industryRisk'];

const RESPONSE_SHAPE = `{
  "code": "<symbol>",
  "name": "<display name>",
  "price": <number>,
  "change_pct": <number>,
  "technical_score": <0-10>,
  "fundamental_score": <0-10>,
  "growth_score": <0-10>,
  "sentiment_score": <0-10>,
  "industry_risk_score": <0-10>,
  "rating": "<StrongBuy|Buy|Hold|Reduce|Sell>",
  "signal": "<green|yellow|orange|red|black>",
  "reason": "<two or three sentences>",
  "risks": ["<risk>", "..."],
  "opportunities": ["<opportunity>", "..."],
  "suggestion": "<one actionable sentence>"
}`;

function formatPct(weight: number): string {
  return `${Math.round(weight * 100)}%`;
}

export function buildRubric(): string {
  const dimensions = DIMENSION_ORDER
    .map((key) => `- ${DIMENSION_LABELS[key]}: weight ${formatPct(DIMENSION_WEIGHTS[key])}`)
    .join('\n');

  const tiers = RATING_TIERS.map((tier) =>
    tier.min > 0
      ? `- overall >= ${tier.min.toFixed(1)}: ${tier.rating} (${tier.signal})`
      : `- overall < ${RATING_TIERS[RATING_TIERS.length - 2].min.toFixed(1)}: ${tier.rating} (${tier.signal})`
  ).join('\n');

  return [
    'Score the instrument on five dimensions, each from 0 to 10 with one decimal:',
    dimensions,
    '',
    'Rating tiers by weighted overall score:',
    tiers,
    '',
    'Where a metric is unavailable, infer from price action, range and volume; do not leave a score empty.',
  ].join('\n');
}

/**
 * System prompt. A loaded strategy document follows the rubric under its own
 * heading; blank or absent strategy text leaves the base prompt unchanged.
 */
export function buildSystemPrompt(strategy: string | null = null): string {
  const strategyText = strategy?.trim() ?? '';
  return [
    'You are a professional equity analyst who scores listed instruments from quantitative market data.',
    'Follow the rubric exactly and ground every statement in the data provided.',
    '',
    buildRubric(),
    ...(strategyText ? ['', '## Scoring strategy', strategyText] : []),
    '',
    'Reply with a single JSON object and nothing else: no markdown, no commentary before or after it.',
  ].join('\n');
}

export const SYSTEM_PROMPT = buildSystemPrompt();

function formatNumber(value: number | null, digits: number = 2): string {
  if (value === null || !Number.isFinite(value)) return 'n/a';
  return value.toFixed(digits);
}

function formatCount(value: number | null): string {
  if (value === null || !Number.isFinite(value)) return 'n/a';
  return Math.round(value).toLocaleString('en-US');
}

export function formatQuote(quote: Quote): string {
  const sign = quote.changePct > 0 ? '+' : '';
  return [
    `- Last price: ${formatNumber(quote.lastPrice)}`,
    `- Open / High / Low: ${formatNumber(quote.open)} / ${formatNumber(quote.high)} / ${formatNumber(quote.low)}`,
    `- Previous close: ${formatNumber(quote.previousClose)}`,
    `- Change: ${sign}${formatNumber(quote.changePct)}%`,
    `- Volume: ${formatCount(quote.volume)}`,
    `- Turnover: ${formatCount(quote.turnover)}`,
  ].join('\n');
}

export function buildUserPrompt(entity: EntityRef, quote: Quote): string {
  return [
    `# Instrument: ${entity.name} (${entity.id})`,
    '',
    '## Latest quote',
    formatQuote(quote),
    '',
    '## Required response',
    'Return exactly this JSON object:',
    RESPONSE_SHAPE,
  ].join('\n');
}

export function buildScoringMessages(entity: EntityRef, quote: Quote, strategy: string | null = null): ChatMessage[] {
  return [systemMessage(buildSystemPrompt(strategy)), userMessage(buildUserPrompt(entity, quote))];
}
