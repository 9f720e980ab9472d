/**
 * Concurrency control utilities
 */

import pLimit from 'p-limit';
import { ConfigurationError, DeadlineExceededError, PoolBusyError } from '../core/errors.js';

/**
 * A unit of work for the pool. Each task carries its own deadline.
 */
export interface ScanTask<I> {
  id: string;
  input: I;
  timeoutMs: number;
}

export type TaskOutcome<T> =
  | { status: 'success'; value: T; durationMs: number }
  | { status: 'timeout'; durationMs: number }
  | { status: 'error'; error: Error; durationMs: number }
  | { status: 'cancelled'; durationMs: number };

export interface TaskResult<I, T> {
  task: ScanTask<I>;
  outcome: TaskOutcome<T>;
}

/**
 * The signal passed to a handler aborts when its task times out or the run is cancelled
 */
export type TaskHandler<I, T> = (input: I, signal: AbortSignal) => Promise<T>;

export interface RunOptions {
  onProgress?: (completed: number, total: number) => void;
  signal?: AbortSignal;
}

/**
 * Bounded worker pool. Results come back in submission order, one outcome per task.
 *
 * A pool may be reused for several batches, one batch at a time.
 */
export class WorkerPool {
  private limit: ReturnType<typeof pLimit>;
  private size: number;
  private signal?: AbortSignal;
  private running = false;

  constructor(concurrency = 10, signal?: AbortSignal) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`Worker count must be a positive integer, got ${concurrency}`);
    }
    this.limit = pLimit(concurrency);
    this.size = concurrency;
    this.signal = signal;
  }

  get concurrency(): number {
    return this.size;
  }

  get busy(): boolean {
    return this.running;
  }

  /**
   * Run a batch. Never rejects because of a task; a task's failure only shows in its outcome.
   */
  async run<I, T>(
    tasks: readonly ScanTask<I>[],
    handler: TaskHandler<I, T>,
    options: RunOptions = {}
  ): Promise<TaskResult<I, T>[]> {
    if (this.running) {
      throw new PoolBusyError();
    }
    this.running = true;

    const signal = linkSignals(this.signal, options.signal);
    const total = tasks.length;
    let completed = 0;

    try {
      return await Promise.all(
        tasks.map((task) =>
          this.limit(async () => {
            const outcome = await this.execute(task, handler, signal);
            completed++;
            options.onProgress?.(completed, total);
            return { task, outcome };
          })
        )
      );
    } finally {
      this.running = false;
    }
  }

  /**
   * Run one task against its deadline. A task that misses it is aborted and left behind.
   */
  private execute<I, T>(
    task: ScanTask<I>,
    handler: TaskHandler<I, T>,
    runSignal?: AbortSignal
  ): Promise<TaskOutcome<T>> {
    const startTime = Date.now();
    const elapsed = () => Date.now() - startTime;

    if (runSignal?.aborted) {
      return Promise.resolve({ status: 'cancelled', durationMs: 0 });
    }

    return new Promise<TaskOutcome<T>>((resolve) => {
      const controller = new AbortController();
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const finalize = (outcome: TaskOutcome<T>) => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        runSignal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };

      const onAbort = () => {
        controller.abort(runSignal?.reason);
        finalize({ status: 'cancelled', durationMs: elapsed() });
      };

      // armed before the handler starts, so a handler finishing on the deadline loses
      if (Number.isFinite(task.timeoutMs)) {
        timer = setTimeout(() => {
          controller.abort(new DeadlineExceededError(task.timeoutMs));
          finalize({ status: 'timeout', durationMs: elapsed() });
        }, task.timeoutMs);
      }
      runSignal?.addEventListener('abort', onAbort, { once: true });

      let pending: Promise<T>;
      try {
        pending = handler(task.input, controller.signal);
      } catch (error) {
        finalize({ status: 'error', error: toError(error), durationMs: elapsed() });
        return;
      }

      pending.then(
        (value) => finalize({ status: 'success', value, durationMs: elapsed() }),
        (error: unknown) => finalize({ status: 'error', error: toError(error), durationMs: elapsed() })
      );
    });
  }
}

/**
 * Combine optional signals into one
 */
export function linkSignals(...signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const present = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  if (present.length <= 1) {
    return present[0];
  }
  return AbortSignal.any(present);
}

/**
 * Race a task against a deadline. The task's signal aborts when the deadline passes.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    let settled = false;

    const finish = (callback: () => void) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      callback();
    };

    const onAbort = () => {
      controller.abort(signal?.reason);
      finish(() => reject(toError(signal?.reason ?? new Error('Aborted'))));
    };

    const timer = setTimeout(() => {
      const error = new DeadlineExceededError(timeoutMs);
      controller.abort(error);
      finish(() => reject(error));
    }, timeoutMs);

    if (signal?.aborted) {
      onAbort();
      return;
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    task(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(toError(error)))
    );
  });
}

export interface RetryOptions {
  retries?: number;
  delayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
}

/**
 * Retry a task with exponential backoff
 */
export async function retryWithBackoff<T>(
  task: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { retries = 3, delayMs = 1000, shouldRetry = () => true, signal } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await task();
    } catch (error) {
      if (attempt >= retries || signal?.aborted || !shouldRetry(error)) {
        throw error;
      }
      await sleep(delayMs * Math.pow(2, attempt));
    }
  }
}

/**
 * Sleep for specified milliseconds
 * @param ms Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
