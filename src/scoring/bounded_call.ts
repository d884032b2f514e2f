/**
 * Bounded invocation with heartbeat
 *
 * Each call runs in a single-use ExecutionSlot. The caller polls the slot at a
 * short interval, logs a heartbeat at a longer one, and walks away once the
 * time budget is spent. Walking away aborts the slot's signal; whatever the
 * task produces afterwards is dropped inside the slot.
 */

import { createChildLogger } from '@/utils/logger';
import { formatElapsed, sleep } from '@/core/time';

const logger = createChildLogger('bounded_call');

export interface Heartbeat {
  label: string;
  elapsedMs: number;
  /** `null` when no budget is configured */
  remainingMs: number | null;
}

export interface BoundedCallOptions {
  label: string;
  timeoutMs: number | null;
  pollIntervalMs: number;
  heartbeatIntervalMs: number;
  onHeartbeat?: (beat: Heartbeat) => void;
}

export class InvocationTimeoutError extends Error {
  constructor(
    public label: string,
    public timeoutMs: number,
    public elapsedMs: number
  ) {
    super(`${label} timed out after ${formatElapsed(elapsedMs)} (budget ${formatElapsed(timeoutMs)})`);
    this.name = 'InvocationTimeoutError';
  }
}

export type SlotState<T> =
  | { status: 'pending' }
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; error: unknown };

export class ExecutionSlot<T> {
  private state: SlotState<T> = { status: 'pending' };
  private abandoned = false;
  private readonly controller = new AbortController();

  constructor(
    private readonly label: string,
    task: (signal: AbortSignal) => Promise<T>
  ) {
    let pending: Promise<T>;
    try {
      pending = task(this.controller.signal);
    } catch (error) {
      pending = Promise.reject(error);
    }
    void pending.then(
      (value) => this.settle({ status: 'fulfilled', value }),
      (error: unknown) => this.settle({ status: 'rejected', error })
    );
  }

  private settle(outcome: SlotState<T>): void {
    if (this.abandoned) {
      logger.debug({ label: this.label, status: outcome.status }, 'Discarding late result from abandoned slot');
      return;
    }
    this.state = outcome;
  }

  poll(): SlotState<T> {
    return this.state;
  }

  isAbandoned(): boolean {
    return this.abandoned;
  }

  abandon(): void {
    if (this.abandoned) return;
    this.abandoned = true;
    this.state = { status: 'pending' };
    this.controller.abort(new Error(`${this.label} abandoned`));
  }
}

function logHeartbeat(beat: Heartbeat): void {
  logger.info(
    {
      label: beat.label,
      elapsed: formatElapsed(beat.elapsedMs),
      remaining: beat.remainingMs === null ? null : formatElapsed(beat.remainingMs),
    },
    'Still waiting on model response'
  );
}

export async function runBounded<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: BoundedCallOptions
): Promise<T> {
  const { label, timeoutMs, pollIntervalMs, heartbeatIntervalMs } = options;
  const emitHeartbeat = options.onHeartbeat ?? logHeartbeat;
  const slot = new ExecutionSlot(label, task);
  const startedAt = Date.now();
  let lastHeartbeatAt = startedAt;

  for (;;) {
    const state = slot.poll();
    if (state.status === 'fulfilled') return state.value;
    if (state.status === 'rejected') throw state.error;

    const now = Date.now();
    const elapsedMs = now - startedAt;
    if (timeoutMs !== null && elapsedMs >= timeoutMs) {
      slot.abandon();
      throw new InvocationTimeoutError(label, timeoutMs, elapsedMs);
    }

    if (now - lastHeartbeatAt >= heartbeatIntervalMs) {
      lastHeartbeatAt = now;
      emitHeartbeat({
        label,
        elapsedMs,
        remainingMs: timeoutMs === null ? null : timeoutMs - elapsedMs,
      });
    }

    const waitMs =
      timeoutMs === null ? pollIntervalMs : Math.max(1, Math.min(pollIntervalMs, timeoutMs - elapsedMs));
    await sleep(waitMs);
  }
}
