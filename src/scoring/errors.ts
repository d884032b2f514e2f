/**
 * Scoring error types
 */

import type { ResponseParseErrorKind } from '@/llm/response_parser';

export type ScoreErrorKind = 'ProviderError' | 'ParseError' | 'Timeout';

export class ScoreError extends Error {
  constructor(
    message: string,
    public kind: ScoreErrorKind,
    public entityId: string,
    public attempt: number,
    public parseKind: ResponseParseErrorKind | null = null,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ScoreError';
  }
}

/** Whole-run precondition failures; never converted into a per-entity result */
export class BatchFatalError extends Error {
  constructor(
    message: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'BatchFatalError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
