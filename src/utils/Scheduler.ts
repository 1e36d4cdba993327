/**
 * Time source and cancellable sleeps used by every strategy task
 */

import { performance } from 'perf_hooks';

export interface Scheduler {
  /** Current time, epoch milliseconds, never decreasing */
  now(): number;
  /** Resolves after ms, rejects with an AbortError when the signal fires first */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class AbortError extends Error {
  constructor(message: string = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof AbortError;
}

/**
 * Suspends until an absolute time, returning at once when it is already due
 */
export async function sleepUntil(scheduler: Scheduler, at: number, signal?: AbortSignal): Promise<void> {
  const remaining = at - scheduler.now();
  if (remaining <= 0) {
    if (signal?.aborted) {
      throw new AbortError();
    }
    return;
  }
  await scheduler.sleep(remaining, signal);
}

/**
 * Wall-clock anchored, monotonic scheduler backed by setTimeout
 */
export class SystemScheduler implements Scheduler {
  private readonly origin = Date.now() - performance.now();

  now(): number {
    return Math.floor(this.origin + performance.now());
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AbortError());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new AbortError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, Math.max(0, ms));
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
