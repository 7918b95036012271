import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, sleep, withRetry, type RetryLog } from './retry.js';
import { PermanentJobError, TransientUpstreamError } from '../errors.js';

const fast = { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 2, multiplier: 2 };

describe('withRetry', () => {
  it('should retry transient failures until success', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new TransientUpstreamError('UPSTREAM_UNAVAILABLE', 'down'))
      .mockResolvedValueOnce('ok');
    const logs: RetryLog[] = [];

    await expect(withRetry(fn, fast, { onLog: log => logs.push(log) })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(logs).toEqual([
      { attempt: 1, success: false, error: 'down', nextRetryInMs: 1 },
      { attempt: 2, success: true },
    ]);
  });

  it('should stop at the first permanent failure', async () => {
    const error = new PermanentJobError('UPSTREAM_AUTH', 'bad key');
    const fn = vi.fn().mockRejectedValue(error);

    await expect(withRetry(fn, fast)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should rethrow the last error once attempts run out', async () => {
    const fn = vi.fn().mockRejectedValue(new TransientUpstreamError('UPSTREAM_RATE_LIMITED', 'slow down'));

    await expect(withRetry(fn, fast)).rejects.toMatchObject({ code: 'UPSTREAM_RATE_LIMITED' });
    expect(fn).toHaveBeenCalledTimes(3);
  });
});

describe('backoffDelay', () => {
  it('should grow exponentially and cap at the maximum', () => {
    const noJitter = () => 0;
    expect(backoffDelay(1, 1000, 60_000, noJitter)).toBe(2000);
    expect(backoffDelay(2, 1000, 60_000, noJitter)).toBe(4000);
    expect(backoffDelay(10, 1000, 60_000, noJitter)).toBe(60_000);
  });

  it('should add at most 10% jitter', () => {
    expect(backoffDelay(1, 1000, 60_000, () => 1)).toBe(2200);
    expect(backoffDelay(1, 1000, 60_000, () => 0.5)).toBe(2100);
  });
});

describe('sleep', () => {
  it('should reject with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error('stopped'));

    await expect(pending).rejects.toThrow('stopped');
  });
});
