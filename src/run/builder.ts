/**
 * Run Builder
 * Converts an in-memory BatchRun into its on-disk record
 */

import type { BatchRun, ScoreResult } from '@/types/scoring';
import type { BatchRunRecord, EntityRecord } from '@/types/run_record';
import { computeCoverage } from './render';

export function toEntityRecord(result: ScoreResult): EntityRecord {
  if (!result.ok) {
    return {
      entity_id: result.entityId,
      display_name: result.displayName,
      ok: false,
      price: result.price,
      change_pct: result.changePct,
      error: result.error,
      error_kind: result.errorKind,
    };
  }
  return {
    entity_id: result.entityId,
    display_name: result.displayName,
    ok: true,
    price: result.price,
    change_pct: result.changePct,
    scores: {
      technical: result.scores.technical,
      fundamental: result.scores.fundamental,
      growth: result.scores.growth,
      sentiment: result.scores.sentiment,
      industry_risk: result.scores.industryRisk,
    },
    overall_score: result.overallScore,
    rating: result.rating,
    signal: result.signal,
    reason: result.reason,
    risks: result.risks,
    opportunities: result.opportunities,
    suggestion: result.suggestion,
  };
}

/**
 * Entities never attempted (only possible if a run is finalized early) are
 * recorded as failed so the record still lists every requested entity.
 */
export function buildRunRecord(run: BatchRun, finishedAt: string): BatchRunRecord {
  const coverage = computeCoverage(run.requested, run.results);
  const entities = run.requested.map((entity) => {
    const result = run.results.get(entity.id);
    if (result) return toEntityRecord(result);
    const placeholder: EntityRecord = {
      entity_id: entity.id,
      display_name: entity.name,
      ok: false,
      price: null,
      change_pct: null,
      error: 'not attempted',
      error_kind: 'Unknown',
    };
    return placeholder;
  });

  return {
    schema_version: 'batch_run.v1',
    run_id: run.runId,
    model: run.model,
    started_at: run.startedAt,
    finished_at: run.finishedAt ?? finishedAt,
    coverage: {
      succeeded: coverage.succeeded,
      failed: coverage.requested - coverage.succeeded,
      requested: coverage.requested,
      ratio: coverage.ratio,
    },
    entities,
  };
}
