import { z } from 'zod';
import { TransientInfraError } from '../errors.js';
import { withRetry, type RetryConfig } from '../utils/retry.js';

const UpstashResponseSchema = z.object({
  result: z.unknown(),
  error: z.string().optional(),
});

export type RedisCommand = Array<string | number>;

export interface UpstashClientOptions {
  fetch?: typeof fetch;
  retry?: RetryConfig;
}

const TRANSPORT_RETRY: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 100,
  maxDelayMs: 1000,
  multiplier: 2,
};

/**
 * Process-wide Redis connection over the Upstash REST API, shared by the job
 * repository and the task queue. Transport failures surface as
 * TransientInfraError after a short retry.
 */
export class UpstashClient {
  private baseUrl: string;
  private token: string;
  private fetchImpl: typeof fetch;
  private retry: RetryConfig;

  constructor(url: string, token: string, options: UpstashClientOptions = {}) {
    this.baseUrl = url.replace(/\/$/, '');
    this.token = token;
    this.fetchImpl = options.fetch ?? fetch;
    this.retry = options.retry ?? TRANSPORT_RETRY;
  }

  async command(command: RedisCommand): Promise<unknown> {
    return withRetry(() => this.send(command), this.retry, {
      isRetryable: error => error instanceof TransientInfraError,
    });
  }

  /** EVAL with KEYS and ARGV. */
  async eval(script: string, keys: string[], args: Array<string | number>): Promise<unknown> {
    return this.command(['EVAL', script, keys.length, ...keys, ...args]);
  }

  private async send(command: RedisCommand): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(command.map(String)),
      });
    } catch (error) {
      throw new TransientInfraError('REDIS_UNAVAILABLE', `Redis request failed: ${String(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new TransientInfraError('REDIS_UNAVAILABLE', `Redis request failed: ${response.status} ${response.statusText}`);
    }

    const data = UpstashResponseSchema.parse(await response.json());
    if (data.error) {
      // Script and command errors are bugs, not outages.
      throw new Error(`Redis error: ${data.error}`);
    }

    return data.result;
  }
}

/** HGETALL replies arrive as a flat [field, value, ...] array. */
export function pairsToRecord(reply: unknown): Record<string, string> {
  const record: Record<string, string> = {};
  if (!Array.isArray(reply)) return record;
  for (let i = 0; i + 1 < reply.length; i += 2) {
    record[String(reply[i])] = String(reply[i + 1]);
  }
  return record;
}

export function asStringArray(reply: unknown): string[] {
  return Array.isArray(reply) ? reply.map(String) : [];
}

export function asNumber(reply: unknown): number {
  return typeof reply === 'number' ? reply : Number(reply ?? 0);
}
