/**
 * Score normalization utilities
 * Dimension scores live on a 0-10 scale
 */

export const SCORE_MIN = 0;
export const SCORE_MAX = 10;
/** Used for any dimension the model left out or garbled */
export const NEUTRAL_SCORE = 5.0;

export function clamp(value: number, min: number = SCORE_MIN, max: number = SCORE_MAX): number {
  return Math.min(Math.max(value, min), max);
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round((value + Number.EPSILON) * factor) / factor;
}

export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim().replace(/%$/, '');
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function normalizeDimension(value: unknown): number {
  const numeric = toFiniteNumber(value) ?? NEUTRAL_SCORE;
  return roundTo(clamp(numeric), 1);
}
