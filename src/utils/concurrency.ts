/**
 * Concurrency utilities for parallel execution with limits.
 */

/**
 * Options for parallel execution.
 */
export interface ParallelOptions<T> {
  /** Maximum concurrent tasks (default: 3) */
  concurrency?: number;
  /** Callback when a task completes */
  onTaskComplete?: (result: T, index: number) => void;
  /** Callback when a task fails */
  onTaskError?: (error: Error, index: number) => void;
}

/**
 * Result of a parallel execution.
 */
export interface ParallelResult<T> {
  /** Results by index; failed slots are absent */
  results: Array<T | undefined>;
  /** Errors by index */
  errors: Map<number, Error>;
  /** Whether all tasks succeeded */
  allSucceeded: boolean;
}

/**
 * Execute tasks in parallel with a concurrency limit.
 *
 * Never more than `concurrency` tasks are in flight. Tasks start in
 * index order; completion order is whatever the tasks produce.
 */
export async function parallelLimit<T>(
  tasks: Array<() => Promise<T>>,
  options: ParallelOptions<T> = {}
): Promise<ParallelResult<T>> {
  const { onTaskComplete, onTaskError } = options;
  const concurrency = Math.max(1, options.concurrency ?? 3);

  const results: Array<T | undefined> = new Array(tasks.length).fill(undefined);
  const errors = new Map<number, Error>();
  let running = 0;
  let index = 0;

  if (tasks.length === 0) {
    return { results: [], errors, allSucceeded: true };
  }

  return new Promise((resolve) => {
    const startNext = (): void => {
      if (index >= tasks.length && running === 0) {
        resolve({
          results,
          errors,
          allSucceeded: errors.size === 0,
        });
        return;
      }

      while (running < concurrency && index < tasks.length) {
        const currentIndex = index++;
        running++;

        // Wrap so a synchronous throw becomes a rejection
        Promise.resolve()
          .then(() => tasks[currentIndex]())
          .then((result) => {
            results[currentIndex] = result;
            onTaskComplete?.(result, currentIndex);
          })
          .catch((error: unknown) => {
            const err = error instanceof Error ? error : new Error(String(error));
            errors.set(currentIndex, err);
            onTaskError?.(err, currentIndex);
          })
          .finally(() => {
            running--;
            startNext();
          });
      }
    };

    startNext();
  });
}
