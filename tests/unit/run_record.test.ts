import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, readdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { buildRunRecord, toEntityRecord } from '@/run/builder';
import { checkRunConsistency, validateAndThrow, validateRunRecord } from '@/run/validator';
import { writeFileAtomic, writeRunRecord } from '@/run/writer';
import type { BatchRun, ScoreResult } from '@/types/scoring';
import type { BatchRunRecord } from '@/types/run_record';
import { makeScored } from '../helpers/fixtures';

function sampleRun(): BatchRun {
  const A = { id: 'A', name: 'Alpha' };
  return {
    runId: '20260114_093005',
    model: 'test-model',
    startedAt: '2026-01-14T09:30:05.000Z',
    finishedAt: '2026-01-14T09:31:00.000Z',
    requested: [A, { id: 'B', name: 'Beta' }],
    results: new Map<string, ScoreResult>([
      ['A', makeScored(A)],
      [
        'B',
        {
          ok: false,
          entityId: 'B',
          displayName: 'Beta',
          price: 20,
          changePct: -1.5,
          error: 'B attempt 3/3 timed out after 180.0s (budget 180.0s)',
          errorKind: 'Timeout',
        },
      ],
    ]),
  };
}

describe('run builder', () => {
  it('maps a scored entity to snake_case', () => {
    const result = sampleRun().results.get('A');
    if (!result) throw new Error('fixture missing A');

    expect(toEntityRecord(result)).toEqual({
      entity_id: 'A',
      display_name: 'Alpha',
      ok: true,
      price: 10.5,
      change_pct: 2.44,
      scores: { technical: 8, fundamental: 7, growth: 6, sentiment: 5, industry_risk: 5 },
      overall_score: 6.85,
      rating: 'Hold',
      signal: 'orange',
      reason: 'Steady trend for A',
      risks: ['Valuation'],
      opportunities: ['Buybacks'],
      suggestion: 'Accumulate on dips',
    });
  });

  it('builds a record with coverage in requested order', () => {
    const record = buildRunRecord(sampleRun(), '2026-01-14T09:40:00.000Z');

    expect(record.schema_version).toBe('batch_run.v1');
    expect(record.finished_at).toBe('2026-01-14T09:31:00.000Z');
    expect(record.coverage).toEqual({ succeeded: 1, failed: 1, requested: 2, ratio: 0.5 });
    expect(record.entities.map((e) => e.entity_id)).toEqual(['A', 'B']);
    expect(record.entities[1]).toMatchObject({ ok: false, error_kind: 'Timeout', price: 20 });
  });
});

describe('run validator', () => {
  it('accepts a built record', () => {
    const record = buildRunRecord(sampleRun(), '2026-01-14T09:40:00.000Z');
    expect(validateRunRecord(record)).toMatchObject({ valid: true, errors: null });
    expect(checkRunConsistency(record)).toEqual({ passed: true, issues: [] });
  });

  it('rejects a record with an out-of-range score', () => {
    const record = buildRunRecord(sampleRun(), '2026-01-14T09:40:00.000Z');
    const tampered = structuredClone(record);
    const [first] = tampered.entities;
    if (!first.ok) throw new Error('fixture should start with a scored entity');
    first.scores.technical = 11;

    const result = validateRunRecord(tampered);
    expect(result.valid).toBe(false);
    expect(result.data).toBeNull();
    expect(() => validateAndThrow(tampered)).toThrow(/^Run validation failed: /);
  });

  it('rejects an unknown failure kind', () => {
    const record = buildRunRecord(sampleRun(), '2026-01-14T09:40:00.000Z');
    const tampered = {
      ...record,
      entities: [record.entities[0], { ...record.entities[1], error_kind: 'Crashed' }],
    };

    expect(validateRunRecord(tampered).valid).toBe(false);
  });

  it('flags an overall score that does not match the dimensions', () => {
    const record: BatchRunRecord = buildRunRecord(sampleRun(), '2026-01-14T09:40:00.000Z');
    const [first] = record.entities;
    if (!first.ok) throw new Error('fixture should start with a scored entity');
    first.overall_score = 9.5;

    expect(checkRunConsistency(record)).toEqual({
      passed: false,
      issues: ['Overall score for A is 9.5, expected 6.85'],
    });
  });

  it('flags duplicate entities and mismatched counts', () => {
    const record = buildRunRecord(sampleRun(), '2026-01-14T09:40:00.000Z');
    record.entities.push(record.entities[1]);

    expect(checkRunConsistency(record).issues).toEqual([
      "Entity count (3) doesn't match requested count (2)",
      'Duplicate entity: B',
    ]);
  });
});

describe('run writer', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'writer-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('replaces file content without leaving temp files behind', () => {
    const target = join(tempDir, 'progress.md');
    writeFileAtomic(target, 'first');
    writeFileAtomic(target, 'second');

    expect(readFileSync(target, 'utf-8')).toBe('second');
    expect(readdirSync(tempDir)).toEqual(['progress.md']);
  });

  it('writes run.json and returns a stable content hash', () => {
    const record = buildRunRecord(sampleRun(), '2026-01-14T09:40:00.000Z');
    const first = writeRunRecord(record, tempDir);
    const second = writeRunRecord(record, tempDir);

    expect(first.filePath).toBe(join(tempDir, 'run.json'));
    expect(first.runId).toBe('20260114_093005');
    expect(first.contentHash).toBe(second.contentHash);
    expect(JSON.parse(readFileSync(first.filePath, 'utf-8'))).toEqual(record);
  });

  it('refuses to write an invalid record', () => {
    const record = buildRunRecord(sampleRun(), '2026-01-14T09:40:00.000Z');
    const invalid = { ...record, run_id: '' };

    expect(() => writeRunRecord(invalid, tempDir)).toThrow(/^Run validation failed/);
    expect(existsSync(join(tempDir, 'run.json'))).toBe(false);
  });
});
