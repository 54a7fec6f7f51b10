/**
 * Timeout helpers for slow suspension points (extraction, embedding).
 */

import { logger } from './logger';

export interface TimeoutOptions {
  timeoutMs: number;
  /** Log a warning when the operation is still running after this long */
  warningMs?: number;
  /** Used in the warning and in the default timeout error */
  label: string;
  /** Builds the error thrown on timeout */
  onTimeout?: (timeoutMs: number) => Error;
}

/**
 * Race a promise against a timer. Both timers are always cleared, so a
 * settled operation never keeps the process alive.
 */
export async function withTimeout<T>(promise: Promise<T>, options: TimeoutOptions): Promise<T> {
  const { timeoutMs, warningMs, label } = options;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  const startTime = Date.now();
  let warningTimer: NodeJS.Timeout | undefined;
  let timeoutTimer: NodeJS.Timeout | undefined;

  if (warningMs !== undefined && warningMs < timeoutMs) {
    warningTimer = setTimeout(() => {
      logger.warn('Operation taking longer than expected', {
        operation: label,
        elapsed_ms: Date.now() - startTime,
      });
    }, warningMs);
  }

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutTimer = setTimeout(() => {
      reject(
        options.onTimeout
          ? options.onTimeout(timeoutMs)
          : new Error(`${label} timed out after ${timeoutMs}ms`)
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(warningTimer);
    clearTimeout(timeoutTimer);
  }
}
