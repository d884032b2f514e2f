/**
 * Markdown rendering for progress snapshots and the final summary.
 * Pure functions of their inputs; the timestamp is passed in.
 */

import { formatTimestamp } from '@/core/time';
import type { BatchRun, Coverage, EntityRef, ScoreResult, ScoredEntity } from '@/types/scoring';

export const PENDING_VALUE = '...';
export const PENDING_MARKER = 'pending';
export const FAILED_VALUE = 'N/A';
export const FAILED_MARKER = 'failed';

export const TABLE_HEADERS = [
  'Code',
  'Price',
  'Technical',
  'Fundamental',
  'Growth',
  'Overall',
  'Rating',
  'Signal',
] as const;

export function computeCoverage(
  requested: readonly EntityRef[],
  results: ReadonlyMap<string, ScoreResult>
): Coverage {
  let succeeded = 0;
  let failed = 0;
  for (const entity of requested) {
    const result = results.get(entity.id);
    if (!result) continue;
    if (result.ok) succeeded++;
    else failed++;
  }
  return {
    succeeded,
    failed,
    requested: requested.length,
    ratio: requested.length === 0 ? 0 : succeeded / requested.length,
  };
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

function formatNumber(value: number | null, digits: number): string {
  return value === null ? FAILED_VALUE : value.toFixed(digits);
}

export function renderRow(entity: EntityRef, result: ScoreResult | undefined): string[] {
  if (!result) {
    return [
      entity.id,
      PENDING_VALUE,
      PENDING_VALUE,
      PENDING_VALUE,
      PENDING_VALUE,
      PENDING_VALUE,
      PENDING_MARKER,
      PENDING_VALUE,
    ];
  }
  if (!result.ok) {
    return [
      entity.id,
      FAILED_VALUE,
      FAILED_VALUE,
      FAILED_VALUE,
      FAILED_VALUE,
      FAILED_VALUE,
      FAILED_MARKER,
      FAILED_VALUE,
    ];
  }
  return [
    entity.id,
    formatNumber(result.price, 2),
    result.scores.technical.toFixed(1),
    result.scores.fundamental.toFixed(1),
    result.scores.growth.toFixed(1),
    result.overallScore.toFixed(2),
    result.rating,
    result.signal,
  ];
}

export function renderTable(
  requested: readonly EntityRef[],
  results: ReadonlyMap<string, ScoreResult>
): string {
  const lines = [
    `| ${TABLE_HEADERS.join(' | ')} |`,
    `| ${TABLE_HEADERS.map(() => '---').join(' | ')} |`,
  ];
  for (const entity of requested) {
    const cells = renderRow(entity, results.get(entity.id)).map(escapeCell);
    lines.push(`| ${cells.join(' | ')} |`);
  }
  return lines.join('\n');
}

function formatCoverage(coverage: Coverage): string {
  return `${coverage.succeeded}/${coverage.requested} succeeded (${(coverage.ratio * 100).toFixed(1)}%)`;
}

export function renderProgress(
  runId: string,
  requested: readonly EntityRef[],
  results: ReadonlyMap<string, ScoreResult>,
  updatedAt: Date
): string {
  const coverage = computeCoverage(requested, results);
  const pending = coverage.requested - coverage.succeeded - coverage.failed;
  return [
    `# Scoring progress: ${runId}`,
    '',
    `- Updated: ${formatTimestamp(updatedAt)}`,
    `- Coverage: ${formatCoverage(coverage)}`,
    `- Status: ${coverage.succeeded} scored, ${coverage.failed} failed, ${pending} pending`,
    '',
    renderTable(requested, results),
    '',
  ].join('\n');
}

function renderList(title: string, items: string[]): string[] {
  if (items.length === 0) return [`**${title}**: none`];
  return [`**${title}**`, '', ...items.map((item) => `- ${item}`)];
}

function renderNarrative(result: ScoredEntity): string[] {
  return [
    `### ${result.displayName} (${result.entityId})`,
    '',
    `- Overall: ${result.overallScore.toFixed(2)}`,
    `- Rating: ${result.rating} (${result.signal})`,
    '',
    `**Reason**: ${result.reason || 'n/a'}`,
    '',
    ...renderList('Risks', result.risks),
    '',
    ...renderList('Opportunities', result.opportunities),
    '',
    `**Suggestion**: ${result.suggestion || 'n/a'}`,
    '',
  ];
}

export function renderSummary(run: BatchRun, updatedAt: Date): string {
  const coverage = computeCoverage(run.requested, run.results);
  const lines = [
    `# Scoring summary: ${run.runId}`,
    '',
    `- Model: ${run.model}`,
    `- Started: ${run.startedAt}`,
    `- Finished: ${run.finishedAt ?? formatTimestamp(updatedAt)}`,
    `- Coverage: ${formatCoverage(coverage)}`,
    '',
    '## Scores',
    '',
    renderTable(run.requested, run.results),
    '',
    '## Details',
    '',
  ];

  const failures: string[] = [];
  for (const entity of run.requested) {
    const result = run.results.get(entity.id);
    if (!result) continue;
    if (result.ok) {
      lines.push(...renderNarrative(result));
    } else {
      failures.push(`- ${result.entityId}: ${result.error} [${result.errorKind}]`);
    }
  }

  lines.push('## Failed entities', '');
  lines.push(...(failures.length > 0 ? failures : ['None']));
  lines.push('');
  return lines.join('\n');
}
