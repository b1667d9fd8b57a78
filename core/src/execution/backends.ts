import pLimit from 'p-limit';
import { createRuntimeError, RuntimeErrorCode } from '../errors/index.js';

/**
 * Dispatch substrate for the engine. Both backends run the same scheduling
 * loop; they differ only in how many steps may be in flight at once.
 */
export interface ExecutionBackend {
  readonly kind: 'parallel' | 'sequential';
  /** Upper bound on steps in flight. */
  readonly capacity: number;
  run<T>(task: () => Promise<T>): Promise<T>;
}

/**
 * Dispatches every eligible step concurrently, bounded by `concurrency` to
 * respect external service rate limits.
 */
export function createParallelBackend(concurrency: number): ExecutionBackend {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw createRuntimeError(
      RuntimeErrorCode.INVALID_CONCURRENCY_VALUE,
      `Invalid concurrency value: ${concurrency}. Must be a positive integer.`,
    );
  }
  const limit = pLimit(concurrency);
  return {
    kind: 'parallel',
    capacity: concurrency,
    run: (task) => limit(task),
  };
}

/** One step at a time, in topological order. */
export function createSequentialBackend(): ExecutionBackend {
  const limit = pLimit(1);
  return {
    kind: 'sequential',
    capacity: 1,
    run: (task) => limit(task),
  };
}
