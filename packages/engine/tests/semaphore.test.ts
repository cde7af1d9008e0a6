import { describe, it, expect } from 'vitest';
import { AsyncSemaphore } from '../src/gateway/semaphore.js';
import { CancelledError, TimeoutError } from '../src/errors.js';
import { deferred } from './helpers.js';

describe('AsyncSemaphore', () => {
  it('admits up to the limit and queues the rest in FIFO order', async () => {
    const sem = new AsyncSemaphore(2);
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
    const started: number[] = [];

    const runs = gates.map((g, i) =>
      sem.run(async () => {
        started.push(i);
        await g.promise;
        return i;
      }),
    );

    await Promise.resolve();
    expect(started).toEqual([0, 1]);
    expect(sem.inFlight).toBe(2);
    expect(sem.queued).toBe(1);

    gates[0]?.resolve();
    await runs[0];
    await Promise.resolve();
    expect(started).toEqual([0, 1, 2]);

    gates[1]?.resolve();
    gates[2]?.resolve();
    expect(await Promise.all(runs)).toEqual([0, 1, 2]);
    expect(sem.inFlight).toBe(0);
  });

  it('releases the slot when the task throws', async () => {
    const sem = new AsyncSemaphore(1);
    await expect(sem.run(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(sem.inFlight).toBe(0);
    expect(await sem.run(async () => 'ok')).toBe('ok');
  });

  it('times out a queued waiter without taking a slot', async () => {
    const sem = new AsyncSemaphore(1);
    const hold = deferred<void>();
    const first = sem.run(() => hold.promise);

    await expect(sem.run(async () => 'late', { timeoutMs: 10 })).rejects.toBeInstanceOf(TimeoutError);
    expect(sem.queued).toBe(0);

    hold.resolve();
    await first;
    expect(sem.inFlight).toBe(0);
  });

  it('cancels a queued waiter on abort', async () => {
    const sem = new AsyncSemaphore(1);
    const hold = deferred<void>();
    const first = sem.run(() => hold.promise);
    const controller = new AbortController();

    const waiting = sem.run(async () => 'never', { signal: controller.signal });
    controller.abort();
    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
    expect(sem.queued).toBe(0);

    hold.resolve();
    await first;
  });

  it('rejects a non-positive limit', () => {
    expect(() => new AsyncSemaphore(0)).toThrow(RangeError);
  });
});
