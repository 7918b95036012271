/**
 * Exponential backoff helpers shared by the generation clients, the Redis
 * transport and the worker's requeue delay.
 */
import { isRetryable } from '../errors.js';

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 4,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  multiplier: 2,
};

export interface RetryLog {
  attempt: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  isRetryable?: (error: unknown) => boolean;
  onLog?: (log: RetryLog) => void;
  signal?: AbortSignal;
}

/**
 * Runs `fn` until it resolves, a non-retryable error is thrown, or the
 * attempts run out. The last error is rethrown as-is so its classification
 * survives.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const retryable = options.isRetryable ?? isRetryable;
  let delay = config.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      const result = await fn(attempt);
      options.onLog?.({ attempt, success: true });
      return result;
    } catch (error) {
      const last = attempt >= config.maxAttempts || !retryable(error) || options.signal?.aborted === true;
      options.onLog?.({
        attempt,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs: last ? undefined : delay,
      });
      if (last) throw error;

      await sleep(delay, options.signal);
      delay = Math.min(delay * config.multiplier, config.maxDelayMs);
    }
  }
}

/** Delay before retry number `attempt` (1-based): base·2^attempt capped at max, plus up to 10% jitter. */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number, random: () => number = Math.random): number {
  const backoffMs = Math.min(baseMs * Math.pow(2, attempt), maxMs);
  const jitter = random() * 0.1 * backoffMs;
  return Math.round(backoffMs + jitter);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
