/**
 * Run Writer
 * Atomic file writes for snapshots and the final run record
 */

import { renameSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createChildLogger } from '@/utils/logger';
import { contentHash } from '@/core/seed';
import type { BatchRunRecord } from '@/types/run_record';
import { validateAndThrow } from './validator';

const logger = createChildLogger('run_writer');

export interface WriteResult {
  runId: string;
  filePath: string;
  contentHash: string;
}

/**
 * Write to a sibling temp file, then rename over the target. Readers see
 * either the previous content or the new content, never a torn file.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  writeFileSync(tempPath, content, 'utf-8');
  renameSync(tempPath, filePath);
}

export function writeRunRecord(record: BatchRunRecord, runDir: string): WriteResult {
  const validated = validateAndThrow(record);
  const filePath = join(runDir, 'run.json');
  const hash = contentHash(validated);

  writeFileAtomic(filePath, `${JSON.stringify(validated, null, 2)}\n`);

  logger.info({ runId: validated.run_id, filePath, contentHash: hash }, 'Run record written');

  return {
    runId: validated.run_id,
    filePath,
    contentHash: hash,
  };
}
