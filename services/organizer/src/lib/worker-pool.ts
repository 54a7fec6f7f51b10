/**
 * Worker Pool
 *
 * Bounds how many document pipelines run at once. Tasks beyond the limit
 * wait in FIFO order and start as soon as a worker frees up.
 */

import { logger } from '@docsort/shared';

const SLOW_TASK_MS = 30_000;

interface QueuedTask {
  run: () => Promise<void>;
  cancel: (error: Error) => void;
}

export class WorkerPool {
  private readonly maxWorkers: number;
  private activeWorkers = 0;
  private readonly queue: QueuedTask[] = [];
  private running = true;
  private idleWaiters: Array<() => void> = [];

  constructor(maxWorkers: number) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`Worker pool size must be a positive integer (got ${maxWorkers})`);
    }
    this.maxWorkers = maxWorkers;
  }

  /**
   * Execute a task through the pool. If at capacity, the task is queued
   * until a worker becomes available.
   */
  execute<T>(task: () => Promise<T>): Promise<T> {
    if (!this.running) {
      return Promise.reject(new Error('Worker pool is shut down'));
    }

    return new Promise<T>((resolve, reject) => {
      const wrappedTask = async (): Promise<void> => {
        const startTime = Date.now();
        try {
          resolve(await task());
        } catch (error) {
          reject(error);
        } finally {
          const duration = Date.now() - startTime;
          if (duration > SLOW_TASK_MS) {
            logger.warn('Worker task completed slowly', { duration_ms: duration });
          }
          this.activeWorkers--;
          this.processQueue();
        }
      };

      this.queue.push({ run: wrappedTask, cancel: reject });
      this.processQueue();
    });
  }

  /**
   * Start queued tasks while workers are free.
   */
  private processQueue(): void {
    while (this.queue.length > 0 && this.activeWorkers < this.maxWorkers && this.running) {
      const task = this.queue.shift();
      if (!task) break;
      // Increment before starting so concurrent submissions never exceed maxWorkers
      this.activeWorkers++;
      void task.run();
    }

    if (this.activeWorkers === 0 && (this.queue.length === 0 || !this.running)) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((notify) => notify());
    }
  }

  getStats(): { active: number; queued: number; max: number } {
    return {
      active: this.activeWorkers,
      queued: this.queue.length,
      max: this.maxWorkers,
    };
  }

  /**
   * Resolves once no task is running or queued.
   */
  waitForCompletion(): Promise<void> {
    if (this.activeWorkers === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop starting new tasks. Running tasks finish; queued tasks are rejected.
   */
  shutdown(): void {
    this.running = false;
    const pending = this.queue.splice(0);
    if (pending.length > 0) {
      logger.warn('Worker pool shut down with queued tasks', { queued: pending.length });
    }
    pending.forEach((task) => task.cancel(new Error('Worker pool is shut down')));
    this.processQueue();
  }
}
