import { describe, it, expect } from 'vitest';
import {
  ExecutionSlot,
  InvocationTimeoutError,
  runBounded,
  type Heartbeat,
} from '@/scoring/bounded_call';

const fastOptions = {
  label: 'AAA attempt 1/1',
  timeoutMs: 1000,
  pollIntervalMs: 5,
  heartbeatIntervalMs: 1000,
};

function delay<T>(ms: number, value: T): Promise<T> {
  return new Promise((resolve) => setTimeout(() => resolve(value), ms));
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function flushTimers(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('runBounded', () => {
  it('returns the task result', async () => {
    await expect(runBounded(async () => 'scored', fastOptions)).resolves.toBe('scored');
  });

  it('propagates a task rejection unchanged', async () => {
    await expect(
      runBounded(async () => {
        throw new Error('connection refused');
      }, fastOptions)
    ).rejects.toThrow('connection refused');
  });

  it('captures a synchronous throw from the task', async () => {
    await expect(
      runBounded(() => {
        throw new Error('bad request');
      }, fastOptions)
    ).rejects.toThrow('bad request');
  });

  it('gives up once the budget is spent and aborts the task signal', async () => {
    const seen: { signal: AbortSignal | null } = { signal: null };
    const startedAt = Date.now();

    const error = await runBounded(
      (signal) => {
        seen.signal = signal;
        return new Promise<string>(() => undefined);
      },
      { ...fastOptions, timeoutMs: 30 }
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(InvocationTimeoutError);
    expect(error).toMatchObject({ label: 'AAA attempt 1/1', timeoutMs: 30 });
    expect(seen.signal?.aborted).toBe(true);
    expect(Date.now() - startedAt).toBeLessThan(1000);
  });

  it('emits heartbeats while waiting', async () => {
    const beats: Heartbeat[] = [];
    const result = await runBounded(() => delay(60, 'done'), {
      ...fastOptions,
      timeoutMs: null,
      heartbeatIntervalMs: 10,
      onHeartbeat: (beat) => beats.push(beat),
    });

    expect(result).toBe('done');
    expect(beats.length).toBeGreaterThan(0);
    expect(beats[0].label).toBe('AAA attempt 1/1');
    expect(beats[0].remainingMs).toBeNull();
    expect(beats[0].elapsedMs).toBeGreaterThanOrEqual(10);
  });

  it('reports remaining budget in heartbeats when a timeout is set', async () => {
    const beats: Heartbeat[] = [];
    await runBounded(() => delay(40, 'done'), {
      ...fastOptions,
      heartbeatIntervalMs: 10,
      onHeartbeat: (beat) => beats.push(beat),
    });

    expect(beats.length).toBeGreaterThan(0);
    for (const beat of beats) {
      expect(beat.remainingMs).toBe(1000 - beat.elapsedMs);
    }
  });
});

describe('ExecutionSlot', () => {
  it('exposes the settled value', async () => {
    const slot = new ExecutionSlot('slot', async () => 42);
    expect(slot.poll()).toEqual({ status: 'pending' });
    await flushTimers();
    expect(slot.poll()).toEqual({ status: 'fulfilled', value: 42 });
  });

  it('discards a result that arrives after abandonment', async () => {
    const pending = deferred<string>();
    const slot = new ExecutionSlot('slot', () => pending.promise);

    slot.abandon();
    pending.resolve('late');
    await flushTimers();

    expect(slot.isAbandoned()).toBe(true);
    expect(slot.poll()).toEqual({ status: 'pending' });
  });

  it('discards a late rejection without surfacing it', async () => {
    let rejectTask: (error: Error) => void = () => undefined;
    const slot = new ExecutionSlot(
      'slot',
      () =>
        new Promise<string>((_, reject) => {
          rejectTask = reject;
        })
    );

    slot.abandon();
    rejectTask(new Error('late failure'));
    await flushTimers();

    expect(slot.poll()).toEqual({ status: 'pending' });
  });
});
