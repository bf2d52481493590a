import { describe, it, expect } from 'vitest';
import { parallelLimit } from '../../src/utils/concurrency.js';

describe('parallelLimit', () => {
  it('should execute tasks and keep results in index order', async () => {
    const tasks = [1, 2, 3, 4, 5].map((n) => async () => {
      await new Promise((resolve) => setTimeout(resolve, 10 - n));
      return n * 2;
    });

    const result = await parallelLimit(tasks, { concurrency: 2 });

    expect(result.allSucceeded).toBe(true);
    expect(result.results).toEqual([2, 4, 6, 8, 10]);
    expect(result.errors.size).toBe(0);
  });

  it('should never exceed the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const tasks = Array.from({ length: 10 }, () => async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return true;
    });

    await parallelLimit(tasks, { concurrency: 3 });

    expect(peak).toBe(3);
  });

  it('should handle empty task list', async () => {
    const result = await parallelLimit<number>([], { concurrency: 3 });

    expect(result.allSucceeded).toBe(true);
    expect(result.results).toEqual([]);
    expect(result.errors.size).toBe(0);
  });

  it('should capture errors while continuing other tasks', async () => {
    const tasks = [
      async () => 1,
      async () => { throw new Error('Task 2 failed'); },
      async () => 3,
    ];

    const result = await parallelLimit(tasks, { concurrency: 2 });

    expect(result.allSucceeded).toBe(false);
    expect(result.results[0]).toBe(1);
    expect(result.results[1]).toBeUndefined();
    expect(result.results[2]).toBe(3);
    expect(result.errors.get(1)?.message).toBe('Task 2 failed');
  });

  it('should turn synchronous throws into task errors', async () => {
    const tasks: Array<() => Promise<number>> = [
      () => {
        throw new Error('sync failure');
      },
    ];

    const result = await parallelLimit(tasks);

    expect(result.errors.get(0)?.message).toBe('sync failure');
  });

  it('should wrap non-Error rejections', async () => {
    const tasks = [async () => Promise.reject('plain string')];

    const result = await parallelLimit(tasks);

    expect(result.errors.get(0)).toBeInstanceOf(Error);
    expect(result.errors.get(0)?.message).toBe('plain string');
  });

  it('should call the completion and error callbacks', async () => {
    const completed: number[] = [];
    const failed: number[] = [];
    const tasks = [
      async () => 10,
      async () => { throw new Error('Failed'); },
    ];

    await parallelLimit(tasks, {
      concurrency: 2,
      onTaskComplete: (_result, index) => completed.push(index),
      onTaskError: (_error, index) => failed.push(index),
    });

    expect(completed).toEqual([0]);
    expect(failed).toEqual([1]);
  });

  it('should treat a concurrency below one as one', async () => {
    let peak = 0;
    let inFlight = 0;
    const tasks = [1, 2].map(() => async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 1));
      inFlight--;
    });

    await parallelLimit(tasks, { concurrency: 0 });

    expect(peak).toBe(1);
  });
});
