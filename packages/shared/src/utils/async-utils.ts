import { createHash } from 'node:crypto';

/**
 * Error raised by withTimeout when the wrapped promise does not settle in time.
 */
export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Error raised by sleep when its abort signal fires.
 */
export class AbortedError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

/**
 * Resolve after `ms` milliseconds. Rejects with AbortedError as soon as the
 * signal aborts.
 */
export function sleep(ms: number, abortSignal?: AbortSignal): Promise<void> {
  if (abortSignal?.aborted) {
    return Promise.reject(new AbortedError());
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      abortSignal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    abortSignal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Race a promise against a timer. The timer is cleared once the promise
 * settles, so nothing is left pending.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Exponential backoff delay for a 1-based attempt number, capped at `maxMs`.
 *
 * @example
 * ```typescript
 * backoffDelay(1, 1000); // 1000
 * backoffDelay(3, 1000); // 4000
 * ```
 */
export function backoffDelay(
  attempt: number,
  baseMs: number,
  maxMs: number = 30000,
): number {
  return Math.min(baseMs * 2 ** Math.max(0, attempt - 1), maxMs);
}

export function sha256(value: string): string {
  return createHash('sha256').update(value, 'utf-8').digest('hex');
}
