/**
 * Progress store for batch runs
 *
 * Rewrites an order-preserving markdown snapshot after every entity, keeps a
 * JSON detail record per completed entity, and tracks in-memory progress
 * (processed count, failures, ETA) for log lines and callers.
 *
 * Layout under `<outputDir>/<runId>/`:
 *   progress.md        rewritten after every entity
 *   details/<id>-<hash>.json  one per completed entity, never removed
 *   summary.md         final table plus narratives and failures
 *   run.json           final validated run record
 */

import { existsSync, mkdirSync } from 'fs';
import { join, resolve } from 'path';
import { createChildLogger } from '@/utils/logger';
import { deterministicHash } from '@/core/seed';
import { buildRunRecord, toEntityRecord } from '@/run/builder';
import { renderProgress, renderSummary } from '@/run/render';
import { checkRunConsistency } from '@/run/validator';
import { writeFileAtomic, writeRunRecord, type WriteResult } from '@/run/writer';
import { BatchFatalError, describeError } from '@/scoring/errors';
import type { BatchRun, EntityRef, ScoreResult } from '@/types/scoring';

const logger = createChildLogger('progress_store');

export type RunPhase = 'scoring' | 'complete';

export interface RunProgress {
  runId: string;
  totalEntities: number;
  processedEntities: number;
  lastEntity: string;
  currentPhase: RunPhase;
  startTime: number;
  failedEntities: string[];
  estimatedCompletion?: number;
}

export interface ProgressStoreOptions {
  outputDir: string;
  /** Clock for the snapshot timestamp */
  now?: () => Date;
}

export interface FinalArtifacts {
  progressPath: string;
  summaryPath: string;
  record: WriteResult;
}

/**
 * File name for an entity's detail record. The hash suffix keeps ids that
 * sanitize or case-fold to the same text apart.
 */
export function detailFileName(entityId: string): string {
  const readable = entityId.replace(/[^A-Za-z0-9._-]/g, '_');
  return `${readable}-${deterministicHash(entityId).slice(0, 12)}.json`;
}

export class ProgressStore {
  private readonly outputDir: string;
  private readonly now: () => Date;
  private readonly progress = new Map<string, RunProgress>();
  private readonly writtenDetails = new Map<string, Set<string>>();

  constructor(options: ProgressStoreOptions) {
    this.outputDir = resolve(options.outputDir);
    this.now = options.now ?? (() => new Date());
  }

  runDir(runId: string): string {
    return join(this.outputDir, runId);
  }

  progressPath(runId: string): string {
    return join(this.runDir(runId), 'progress.md');
  }

  summaryPath(runId: string): string {
    return join(this.runDir(runId), 'summary.md');
  }

  detailPath(runId: string, entityId: string): string {
    return join(this.runDir(runId), 'details', detailFileName(entityId));
  }

  /**
   * Creates the run directory. Failing here is fatal for the whole run.
   */
  prepare(runId: string, totalEntities: number): void {
    const detailsDir = join(this.runDir(runId), 'details');
    try {
      mkdirSync(detailsDir, { recursive: true });
    } catch (error) {
      throw new BatchFatalError(
        `Cannot create progress directory ${detailsDir}: ${describeError(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    this.progress.set(runId, {
      runId,
      totalEntities,
      processedEntities: 0,
      lastEntity: '',
      currentPhase: 'scoring',
      startTime: Date.now(),
      failedEntities: [],
    });
    logger.info({ runId, dir: this.runDir(runId), totalEntities }, 'Progress directory ready');
  }

  persistPartial(
    runId: string,
    requested: readonly EntityRef[],
    results: ReadonlyMap<string, ScoreResult>
  ): string {
    this.ensureRunDir(runId);
    this.writeDetails(runId, results);

    const filePath = this.progressPath(runId);
    writeFileAtomic(filePath, renderProgress(runId, requested, results, this.now()));
    this.updateProgress(runId, requested, results);

    logger.debug({ runId, processed: results.size, total: requested.length }, 'Progress snapshot written');
    return filePath;
  }

  persistFinal(run: BatchRun): FinalArtifacts {
    const finishedAt = run.finishedAt ?? this.now().toISOString();
    const finished: BatchRun = { ...run, finishedAt };

    this.ensureRunDir(run.runId);
    this.writeDetails(run.runId, run.results);

    const progressPath = this.progressPath(run.runId);
    const summaryPath = this.summaryPath(run.runId);
    const updatedAt = this.now();
    writeFileAtomic(progressPath, renderProgress(run.runId, run.requested, run.results, updatedAt));
    writeFileAtomic(summaryPath, renderSummary(finished, updatedAt));
    const runRecord = buildRunRecord(finished, finishedAt);
    const consistency = checkRunConsistency(runRecord);
    if (!consistency.passed) {
      logger.warn({ runId: run.runId, issues: consistency.issues }, 'Run record consistency issues');
    }
    const record = writeRunRecord(runRecord, this.runDir(run.runId));

    this.updateProgress(run.runId, run.requested, run.results);
    this.completeRun(run.runId);

    logger.info({ runId: run.runId, summaryPath, recordPath: record.filePath }, 'Final artifacts written');
    return { progressPath, summaryPath, record };
  }

  getProgress(runId: string): RunProgress | undefined {
    return this.progress.get(runId);
  }

  private ensureRunDir(runId: string): void {
    const detailsDir = join(this.runDir(runId), 'details');
    if (!existsSync(detailsDir)) {
      mkdirSync(detailsDir, { recursive: true });
    }
  }

  private writeDetails(runId: string, results: ReadonlyMap<string, ScoreResult>): void {
    let written = this.writtenDetails.get(runId);
    if (!written) {
      written = new Set<string>();
      this.writtenDetails.set(runId, written);
    }

    for (const [entityId, result] of results) {
      if (written.has(entityId)) continue;
      const record = toEntityRecord(result);
      writeFileAtomic(this.detailPath(runId, entityId), `${JSON.stringify(record, null, 2)}\n`);
      written.add(entityId);
    }
  }

  private updateProgress(
    runId: string,
    requested: readonly EntityRef[],
    results: ReadonlyMap<string, ScoreResult>
  ): void {
    const current = this.progress.get(runId) ?? {
      runId,
      totalEntities: requested.length,
      processedEntities: 0,
      lastEntity: '',
      currentPhase: 'scoring' as const,
      startTime: Date.now(),
      failedEntities: [],
    };

    const processed = requested.filter((entity) => results.has(entity.id));
    const failedEntities = processed
      .filter((entity) => results.get(entity.id)?.ok === false)
      .map((entity) => entity.id);

    const updated: RunProgress = {
      ...current,
      totalEntities: requested.length,
      processedEntities: processed.length,
      lastEntity: processed.length > 0 ? processed[processed.length - 1].id : '',
      failedEntities,
    };

    if (processed.length > 0) {
      const elapsed = Date.now() - current.startTime;
      const avgTimePerEntity = elapsed / processed.length;
      const remaining = requested.length - processed.length;
      updated.estimatedCompletion = Date.now() + avgTimePerEntity * remaining;
    }

    this.progress.set(runId, updated);
  }

  private completeRun(runId: string): void {
    const current = this.progress.get(runId);
    if (!current) return;

    this.progress.set(runId, {
      ...current,
      currentPhase: 'complete',
      estimatedCompletion: Date.now(),
    });
  }
}
