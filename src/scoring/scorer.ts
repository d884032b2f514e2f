/**
 * Scorer
 * One entity, up to maxAttempts independent model calls, each bounded in time
 */

import { createChildLogger } from '@/utils/logger';
import { sleep } from '@/core/time';
import { buildScoringMessages, PROMPT_VERSION } from '@/llm/templates';
import { parseModelResponse, ResponseParseError } from '@/llm/response_parser';
import type { ModelClient } from '@/llm/types';
import type { EntityRef, Quote, ScoredEntity } from '@/types/scoring';
import { runBounded, InvocationTimeoutError, type Heartbeat } from './bounded_call';
import { normalizeScoreResult } from './normalizer';
import { ScoreError, describeError } from './errors';

const logger = createChildLogger('scorer');

export interface ScorerOptions {
  temperature: number;
  maxAttempts: number;
  /** Base delay before a retry; doubles per failed attempt, 0 disables */
  retryBackoffMs: number;
  timeoutMs: number | null;
  pollIntervalMs: number;
  heartbeatIntervalMs: number;
  /** Strategy document appended to the system prompt */
  strategy?: string | null;
  onHeartbeat?: (beat: Heartbeat) => void;
}

export function toScoreError(error: unknown, entityId: string, attempt: number): ScoreError {
  if (error instanceof ScoreError) return error;
  if (error instanceof InvocationTimeoutError) {
    return new ScoreError(error.message, 'Timeout', entityId, attempt, null, error);
  }
  if (error instanceof ResponseParseError) {
    return new ScoreError(error.message, 'ParseError', entityId, attempt, error.kind, error);
  }
  return new ScoreError(
    describeError(error),
    'ProviderError',
    entityId,
    attempt,
    null,
    error instanceof Error ? error : undefined
  );
}

export class Scorer {
  private readonly options: Readonly<ScorerOptions>;

  constructor(
    private readonly client: ModelClient,
    options: ScorerOptions
  ) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.options = Object.freeze({ ...options });
  }

  get model(): string {
    return this.client.model;
  }

  async scoreOne(entity: EntityRef, quote: Quote): Promise<ScoredEntity> {
    const { maxAttempts, temperature, retryBackoffMs } = this.options;
    const messages = buildScoringMessages(entity, quote, this.options.strategy ?? null);
    let lastError: ScoreError | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const startedAt = Date.now();
      try {
        logger.info({ entityId: entity.id, attempt, maxAttempts, promptVersion: PROMPT_VERSION }, 'Requesting score');
        // The slot enforces the budget; abandoning it aborts the request.
        const raw = await runBounded(
          (signal) => this.client.generate(messages, { temperature, timeoutMs: null, signal }),
          {
            label: `${entity.id} attempt ${attempt}/${maxAttempts}`,
            timeoutMs: this.options.timeoutMs,
            pollIntervalMs: this.options.pollIntervalMs,
            heartbeatIntervalMs: this.options.heartbeatIntervalMs,
            onHeartbeat: this.options.onHeartbeat,
          }
        );

        const parsed = parseModelResponse(raw);
        const result = normalizeScoreResult(parsed, entity.id, entity.name, quote);
        logger.info(
          {
            entityId: entity.id,
            attempt,
            overallScore: result.overallScore,
            rating: result.rating,
            durationMs: Date.now() - startedAt,
          },
          'Entity scored'
        );
        return result;
      } catch (error) {
        lastError = toScoreError(error, entity.id, attempt);
        logger.warn(
          {
            entityId: entity.id,
            attempt,
            maxAttempts,
            kind: lastError.kind,
            parseKind: lastError.parseKind,
            error: lastError.message,
          },
          'Scoring attempt failed'
        );

        if (attempt < maxAttempts && retryBackoffMs > 0) {
          const backoffMs = retryBackoffMs * Math.pow(2, attempt - 1);
          logger.debug({ entityId: entity.id, backoffMs }, 'Backing off before retry');
          await sleep(backoffMs);
        }
      }
    }

    throw lastError ?? new ScoreError('No scoring attempt was made', 'ProviderError', entity.id, 0);
  }
}
