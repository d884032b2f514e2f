/**
 * Batch Orchestrator
 * Scores requested entities one at a time, in input order, and persists
 * progress after each. No single entity can abort the batch.
 */

import { createChildLogger } from '@/utils/logger';
import { getRunId } from '@/core/time';
import { ScoreError, describeError } from '@/scoring/errors';
import type { FinalArtifacts, RunProgress } from '@/lib/progress/progressStore';
import type {
  BatchRun,
  BatchRunResult,
  EntityRef,
  FailedEntity,
  FailureKind,
  Quote,
  ScoreResult,
  ScoredEntity,
} from '@/types/scoring';
import { computeCoverage } from './render';

const logger = createChildLogger('orchestrator');

export const MISSING_DATA_ERROR = 'missing data';

export interface EntityScorer {
  readonly model: string;
  scoreOne(entity: EntityRef, quote: Quote): Promise<ScoredEntity>;
}

export interface ProgressSink {
  prepare(runId: string, totalEntities: number): void;
  persistPartial(
    runId: string,
    requested: readonly EntityRef[],
    results: ReadonlyMap<string, ScoreResult>
  ): string;
  persistFinal(run: BatchRun): FinalArtifacts;
  getProgress?(runId: string): RunProgress | undefined;
}

export interface RunBatchOptions {
  runId?: string;
  now?: () => Date;
}

export interface OrchestratorResult extends BatchRunResult {
  artifacts: FinalArtifacts;
}

/** First occurrence wins; order is otherwise preserved. */
export function dedupeEntities(entities: readonly EntityRef[]): EntityRef[] {
  const seen = new Set<string>();
  const unique: EntityRef[] = [];
  for (const entity of entities) {
    if (seen.has(entity.id)) continue;
    seen.add(entity.id);
    unique.push({ id: entity.id, name: entity.name || entity.id });
  }
  return unique;
}

export function toEntityRefs(ids: readonly string[], names: Record<string, string> = {}): EntityRef[] {
  return ids.map((id) => ({ id, name: names[id] ?? id }));
}

function failedResult(
  entity: EntityRef,
  quote: Quote | undefined,
  error: string,
  errorKind: FailureKind
): FailedEntity {
  return {
    ok: false,
    entityId: entity.id,
    displayName: entity.name,
    price: quote?.lastPrice ?? null,
    changePct: quote?.changePct ?? null,
    error,
    errorKind,
  };
}

export class Orchestrator {
  constructor(
    private readonly scorer: EntityScorer,
    private readonly progress: ProgressSink
  ) {}

  async run(
    requested: readonly EntityRef[],
    quotes: ReadonlyMap<string, Quote>,
    options: RunBatchOptions = {}
  ): Promise<OrchestratorResult> {
    const now = options.now ?? (() => new Date());
    const startedAt = now();
    const entities = Object.freeze(dedupeEntities(requested));
    const run: BatchRun = {
      runId: options.runId ?? getRunId(startedAt),
      model: this.scorer.model,
      startedAt: startedAt.toISOString(),
      finishedAt: null,
      requested: entities,
      results: new Map<string, ScoreResult>(),
    };

    if (entities.length < requested.length) {
      logger.warn(
        { runId: run.runId, dropped: requested.length - entities.length },
        'Duplicate entities removed from request'
      );
    }

    // Throws BatchFatalError when the destination cannot be created.
    this.progress.prepare(run.runId, entities.length);
    logger.info({ runId: run.runId, entityCount: entities.length, model: run.model }, 'Starting batch');

    const ordered: ScoreResult[] = [];
    for (const [index, entity] of entities.entries()) {
      const result = await this.scoreEntity(entity, quotes.get(entity.id));
      run.results.set(entity.id, result);
      ordered.push(result);

      this.progress.persistPartial(run.runId, run.requested, run.results);

      const progress = this.progress.getProgress?.(run.runId);
      logger.info(
        {
          runId: run.runId,
          entityId: entity.id,
          ok: result.ok,
          position: `${index + 1}/${entities.length}`,
          eta: progress?.estimatedCompletion ? new Date(progress.estimatedCompletion).toISOString() : null,
        },
        'Entity processed'
      );
    }

    run.finishedAt = now().toISOString();
    const artifacts = this.progress.persistFinal(run);
    const coverage = computeCoverage(run.requested, run.results);

    logger.info(
      {
        runId: run.runId,
        succeeded: coverage.succeeded,
        failed: coverage.failed,
        requested: coverage.requested,
      },
      'Batch complete'
    );

    return { run, ordered, coverage, artifacts };
  }

  private async scoreEntity(entity: EntityRef, quote: Quote | undefined): Promise<ScoreResult> {
    if (!quote) {
      logger.warn({ entityId: entity.id }, 'No quote available, skipping model call');
      return failedResult(
        entity,
        undefined,
        `${MISSING_DATA_ERROR}: no quote available for ${entity.id}`,
        'MissingInputData'
      );
    }

    try {
      return await this.scorer.scoreOne(entity, quote);
    } catch (error) {
      const kind: FailureKind = error instanceof ScoreError ? error.kind : 'Unknown';
      const message = describeError(error);
      logger.error({ entityId: entity.id, kind, error: message }, 'Entity failed');
      return failedResult(entity, quote, message, kind);
    }
  }
}
