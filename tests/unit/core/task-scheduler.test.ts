import { describe, it, expect } from 'vitest';
import { BoundedTaskScheduler } from '../../../src/core/task-scheduler.js';
import { InvalidInputError, TaskAbortedError } from '../../../src/errors/index.js';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('BoundedTaskScheduler', () => {
  it('rejects invalid concurrency', () => {
    expect(() => new BoundedTaskScheduler(0)).toThrow(InvalidInputError);
    expect(() => new BoundedTaskScheduler(2.5)).toThrow('maxConcurrency must be a positive integer, got 2.5');
  });

  it('runs at most maxConcurrency tasks at once, in FIFO order', async () => {
    const scheduler = new BoundedTaskScheduler(2);
    const gates = [deferred<number>(), deferred<number>(), deferred<number>()];
    const started: number[] = [];

    const results = gates.map((gate, i) =>
      scheduler.schedule(() => {
        started.push(i);
        return gate.promise;
      }),
    );

    expect(started).toEqual([0, 1]);
    expect(scheduler.running).toBe(2);
    expect(scheduler.pending).toBe(1);

    gates[0]?.resolve(10);
    await expect(results[0]).resolves.toBe(10);
    await Promise.resolve();

    expect(started).toEqual([0, 1, 2]);

    gates[1]?.resolve(11);
    gates[2]?.resolve(12);
    await expect(Promise.all(results)).resolves.toEqual([10, 11, 12]);
    expect(scheduler.running).toBe(0);
  });

  it('propagates task failures', async () => {
    const scheduler = new BoundedTaskScheduler(1);

    await expect(scheduler.schedule(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(scheduler.schedule(() => Promise.resolve('next'))).resolves.toBe('next');
  });

  it('rejects immediately when the signal is already aborted', async () => {
    const scheduler = new BoundedTaskScheduler(1);
    const controller = new AbortController();
    controller.abort();
    let ran = false;

    const result = scheduler.schedule(async () => {
      ran = true;
    }, controller.signal);

    await expect(result).rejects.toThrow('Task was aborted before it started');
    expect(ran).toBe(false);
  });

  it('drops a queued task aborted before it starts', async () => {
    const scheduler = new BoundedTaskScheduler(1);
    const gate = deferred<string>();
    const controller = new AbortController();
    let ran = false;

    const blocker = scheduler.schedule(() => gate.promise);
    const queued = scheduler.schedule(async () => {
      ran = true;
    }, controller.signal);

    controller.abort();
    const error = await queued.then(
      () => null,
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(TaskAbortedError);
    expect(error instanceof TaskAbortedError && error.started).toBe(false);
    expect(scheduler.pending).toBe(0);

    gate.resolve('done');
    await blocker;
    expect(ran).toBe(false);
  });

  it('rejects the caller when aborted mid-run, but lets the task finish', async () => {
    const scheduler = new BoundedTaskScheduler(1);
    const gate = deferred<string>();
    const controller = new AbortController();

    const result = scheduler.schedule(() => gate.promise, controller.signal);
    controller.abort();

    await expect(result).rejects.toThrow('Task was aborted after it started');
    expect(scheduler.running).toBe(1);

    gate.resolve('late');
    await scheduler.drain();
    expect(scheduler.running).toBe(0);
  });

  it('drain resolves once queued and running tasks complete', async () => {
    const scheduler = new BoundedTaskScheduler(1);
    const gate = deferred<void>();
    const completed: string[] = [];

    void scheduler.schedule(async () => {
      await gate.promise;
      completed.push('a');
    });
    void scheduler.schedule(async () => {
      completed.push('b');
    });

    const drained = scheduler.drain();
    gate.resolve();
    await drained;

    expect(completed).toEqual(['a', 'b']);
    await expect(scheduler.drain()).resolves.toBeUndefined();
  });
});
