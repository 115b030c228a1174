/**
 * Concurrency Controller
 *
 * Counting-semaphore admission control for provider tasks. A task holds a
 * slot from admission until it settles or its timeout fires; the timeout
 * clock starts at admission, so time spent queued is not charged to it.
 */

import { Semaphore } from 'async-mutex';

export class TaskTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'TaskTimeoutError';
  }
}

/**
 * Race a task against a timer. On expiry the task's signal is aborted with a
 * TaskTimeoutError and the returned promise rejects with the same error.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TaskTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class ConcurrencyController {
  private readonly semaphore: Semaphore;
  private active = 0;
  private peak = 0;

  constructor(public readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
    this.semaphore = new Semaphore(limit);
  }

  /** Tasks past admission and not yet settled */
  get inFlight(): number {
    return this.active;
  }

  /** Highest inFlight observed since construction */
  get peakInFlight(): number {
    return this.peak;
  }

  /**
   * Wait for a slot, then run the task under a timeout.
   * The slot is released when the task settles or times out, whichever is first.
   */
  run<T>(task: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
    return this.semaphore.runExclusive(async () => {
      this.active++;
      this.peak = Math.max(this.peak, this.active);
      try {
        return await withTimeout(task, timeoutMs);
      } finally {
        this.active--;
      }
    });
  }
}
