import { describe, expect, it, vi } from 'vitest';

import { CollaboratorTimeoutError, RetryExhaustedError } from '../../src/core/errors.js';
import { backoffFor, retryWithPolicy, withTimeout } from '../../src/core/retry.js';

describe('withTimeout', () => {
  it('resolves with the task result', async () => {
    await expect(withTimeout('quick', 1000, async () => 42)).resolves.toBe(42);
  });

  it('rejects with CollaboratorTimeoutError and aborts the signal', async () => {
    const seen: { signal?: AbortSignal } = {};
    const pending = withTimeout('slow', 20, (signal) => {
      seen.signal = signal;
      return new Promise<never>(() => undefined);
    });

    await expect(pending).rejects.toBeInstanceOf(CollaboratorTimeoutError);
    await expect(pending).rejects.toThrow('slow timed out after 20ms');
    expect(seen.signal?.aborted).toBe(true);
  });
});

describe('retryWithPolicy', () => {
  it('retries after a failure and returns the later result', async () => {
    const wait = vi.fn(async () => undefined);
    const task = vi
      .fn<(signal: AbortSignal, attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce('ok');

    const result = await retryWithPolicy('fetch', { maxAttempts: 2, backoffMs: [250], timeoutMs: 1000 }, task, {
      wait,
    });

    expect(result).toBe('ok');
    expect(task).toHaveBeenCalledTimes(2);
    expect(task.mock.calls[1]?.[1]).toBe(2);
    expect(wait).toHaveBeenCalledWith(250);
  });

  it('throws RetryExhaustedError once attempts run out', async () => {
    const wait = vi.fn(async () => undefined);
    const task = vi.fn(async () => {
      throw new Error('venue down');
    });

    const error = await retryWithPolicy(
      'getPositions',
      { maxAttempts: 2, backoffMs: [10], timeoutMs: 1000 },
      task,
      { wait }
    ).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(2);
      expect(error.message).toBe('getPositions failed after 2 attempt(s): venue down');
    }
    expect(task).toHaveBeenCalledTimes(2);
    expect(wait).toHaveBeenCalledTimes(1);
  });
});

describe('backoffFor', () => {
  it('repeats the last entry of a short schedule', () => {
    const policy = { maxAttempts: 4, backoffMs: [100, 500], timeoutMs: 1000 };
    expect(backoffFor(policy, 1)).toBe(100);
    expect(backoffFor(policy, 2)).toBe(500);
    expect(backoffFor(policy, 3)).toBe(500);
    expect(backoffFor({ ...policy, backoffMs: [] }, 1)).toBe(0);
  });
});
