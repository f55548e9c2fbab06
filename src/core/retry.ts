import { CollaboratorTimeoutError, RetryExhaustedError, describeError } from './errors.js';
import type { Logger } from './logger.js';

/**
 * Bounded retry policy handed to every external call site.
 *
 * `backoffMs[i]` is the delay before attempt `i + 2`; a shorter schedule
 * repeats its last entry.
 */
export interface RetryPolicy {
  maxAttempts: number;
  backoffMs: number[];
  timeoutMs: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffFor(policy: RetryPolicy, failedAttempt: number): number {
  if (policy.backoffMs.length === 0) return 0;
  const index = Math.min(failedAttempt - 1, policy.backoffMs.length - 1);
  return Math.max(0, policy.backoffMs[index] ?? 0);
}

/**
 * Run `task` with an abort signal that fires after `timeoutMs`. The returned
 * promise always settles: either with the task result or with a
 * CollaboratorTimeoutError.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | null = null;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new CollaboratorTimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });
  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

export async function retryWithPolicy<T>(
  operation: string,
  policy: RetryPolicy,
  task: (signal: AbortSignal, attempt: number) => Promise<T>,
  options?: { logger?: Logger; wait?: (ms: number) => Promise<void> }
): Promise<T> {
  const attempts = Math.max(1, Math.floor(policy.maxAttempts));
  const wait = options?.wait ?? sleep;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await withTimeout(operation, policy.timeoutMs, (signal) => task(signal, attempt));
    } catch (error) {
      lastError = error;
      if (attempt >= attempts) break;
      const delay = backoffFor(policy, attempt);
      options?.logger?.warn(
        `${operation} attempt ${attempt}/${attempts} failed: ${describeError(error)}. Retrying in ${delay}ms`
      );
      if (delay > 0) {
        await wait(delay);
      }
    }
  }

  throw new RetryExhaustedError(operation, attempts, lastError);
}
