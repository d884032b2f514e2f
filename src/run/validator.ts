/**
 * Run Validator
 * Validates run records against the schema
 */

import { validateBatchRun, type ValidationResult } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';
import { calculateOverallScore } from '@/scoring/composite';
import type { BatchRunRecord } from '@/types/run_record';

const logger = createChildLogger('run_validator');

export function validateRunRecord(data: unknown): ValidationResult<BatchRunRecord> {
  const result = validateBatchRun(data);

  if (!result.valid) {
    logger.error({ errors: result.errors }, 'Run validation failed');
  } else {
    logger.debug('Run validation passed');
  }

  return result;
}

export function validateAndThrow(data: unknown): BatchRunRecord {
  const result = validateBatchRun(data);

  if (!result.valid || !result.data) {
    throw new Error(`Run validation failed: ${result.errors?.join('; ') ?? 'Unknown error'}`);
  }

  return result.data;
}

export interface ConsistencyCheck {
  passed: boolean;
  issues: string[];
}

export function checkRunConsistency(record: BatchRunRecord): ConsistencyCheck {
  const issues: string[] = [];

  if (record.entities.length !== record.coverage.requested) {
    issues.push(
      `Entity count (${record.entities.length}) doesn't match requested count (${record.coverage.requested})`
    );
  }

  const succeeded = record.entities.filter((e) => e.ok).length;
  if (succeeded !== record.coverage.succeeded) {
    issues.push(`Coverage reports ${record.coverage.succeeded} succeeded, found ${succeeded}`);
  }

  const seen = new Set<string>();
  for (const entity of record.entities) {
    if (seen.has(entity.entity_id)) {
      issues.push(`Duplicate entity: ${entity.entity_id}`);
    }
    seen.add(entity.entity_id);

    if (entity.ok) {
      const { technical, fundamental, growth, sentiment, industry_risk } = entity.scores;
      const expected = calculateOverallScore({
        technical,
        fundamental,
        growth,
        sentiment,
        industryRisk: industry_risk,
      });
      if (expected !== entity.overall_score) {
        issues.push(`Overall score for ${entity.entity_id} is ${entity.overall_score}, expected ${expected}`);
      }
    }
  }

  return {
    passed: issues.length === 0,
    issues,
  };
}
