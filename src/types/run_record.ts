/**
 * On-disk shape of a finished batch run (schemas/batch_run.v1.schema.json)
 */

import type { FailureKind } from './scoring';

export interface ScoredEntityRecord {
  entity_id: string;
  display_name: string;
  ok: true;
  price: number | null;
  change_pct: number | null;
  scores: {
    technical: number;
    fundamental: number;
    growth: number;
    sentiment: number;
    industry_risk: number;
  };
  overall_score: number;
  rating: string;
  signal: string;
  reason: string;
  risks: string[];
  opportunities: string[];
  suggestion: string;
}

export interface FailedEntityRecord {
  entity_id: string;
  display_name: string;
  ok: false;
  price: number | null;
  change_pct: number | null;
  error: string;
  error_kind: FailureKind;
}

export type EntityRecord = ScoredEntityRecord | FailedEntityRecord;

export interface BatchRunRecord {
  schema_version: 'batch_run.v1';
  run_id: string;
  model: string;
  started_at: string;
  finished_at: string;
  coverage: {
    succeeded: number;
    failed: number;
    requested: number;
    ratio: number;
  };
  entities: EntityRecord[];
}
