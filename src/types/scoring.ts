/**
 * Shared types for the quote scoring pipeline
 */

export interface Quote {
  symbol: string;
  lastPrice: number;
  open: number;
  high: number;
  low: number;
  previousClose: number;
  changePct: number;
  volume: number | null;
  turnover: number | null;
}

export interface EntityRef {
  id: string;
  name: string;
}

export type Dimension = 'fundamental' | 'technical' | 'growth' | 'sentiment' | 'industryRisk';

export type DimensionScores = Record<Dimension, number>;

export type Rating = 'StrongBuy' | 'Buy' | 'Hold' | 'Reduce' | 'Sell';

export type Signal = 'green' | 'yellow' | 'orange' | 'red' | 'black';

export type FailureKind = 'MissingInputData' | 'ProviderError' | 'ParseError' | 'Timeout' | 'Unknown';

interface ScoreResultBase {
  entityId: string;
  displayName: string;
  price: number | null;
  changePct: number | null;
}

export interface ScoredEntity extends ScoreResultBase {
  ok: true;
  scores: DimensionScores;
  overallScore: number;
  /** Derived tier label, or the model's own label when it supplied one */
  rating: string;
  signal: string;
  reason: string;
  risks: string[];
  opportunities: string[];
  suggestion: string;
}

export interface FailedEntity extends ScoreResultBase {
  ok: false;
  error: string;
  errorKind: FailureKind;
}

export type ScoreResult = ScoredEntity | FailedEntity;

export interface Coverage {
  succeeded: number;
  failed: number;
  requested: number;
  ratio: number;
}

export interface BatchRun {
  runId: string;
  model: string;
  startedAt: string;
  finishedAt: string | null;
  /** Fixed for the lifetime of the run */
  requested: readonly EntityRef[];
  results: Map<string, ScoreResult>;
}

export interface BatchRunResult {
  run: BatchRun;
  /** Results in requested order */
  ordered: ScoreResult[];
  coverage: Coverage;
}
