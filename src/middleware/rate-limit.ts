import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AppConfig } from '../config.js';
import { replyWithError } from '../errors.js';

interface TokenBucket {
  tokens: number;
  lastRefill: number;
}

export interface ConsumeResult {
  allowed: boolean;
  remaining: number;
  retryAfterSec?: number;
}

const EVICT_INTERVAL_MS = 60_000;

/**
 * Per-key token buckets: `burst` capacity refilled at `sustainedPerMin`.
 * A bucket that has refilled completely is indistinguishable from a new one
 * and is dropped on the next eviction pass.
 */
export class RateLimiter {
  private buckets = new Map<string, TokenBucket>();
  private lastEviction: number;

  constructor(
    private maxTokens: number,
    private refillPerMin: number,
    private now: () => number = Date.now
  ) {
    this.lastEviction = now();
  }

  get size(): number {
    return this.buckets.size;
  }

  tryConsume(key: string): ConsumeResult {
    const bucket = this.getBucket(key);

    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return { allowed: true, remaining: bucket.tokens };
    }

    return { allowed: false, remaining: 0, retryAfterSec: Math.max(1, Math.ceil(60 / this.refillPerMin)) };
  }

  private getBucket(key: string): TokenBucket {
    const now = this.now();
    if (now - this.lastEviction >= EVICT_INTERVAL_MS) {
      this.evictIdle(now);
    }

    let bucket = this.buckets.get(key);

    if (!bucket) {
      bucket = { tokens: this.maxTokens, lastRefill: now };
      this.buckets.set(key, bucket);
      return bucket;
    }

    const tokensToAdd = this.refillSince(bucket, now);
    if (tokensToAdd > 0) {
      bucket.tokens = Math.min(this.maxTokens, bucket.tokens + tokensToAdd);
      bucket.lastRefill = now;
    }

    return bucket;
  }

  private refillSince(bucket: TokenBucket, now: number): number {
    return Math.floor(((now - bucket.lastRefill) / 60_000) * this.refillPerMin);
  }

  private evictIdle(now: number): void {
    for (const [key, bucket] of this.buckets) {
      if (bucket.tokens + this.refillSince(bucket, now) >= this.maxTokens) {
        this.buckets.delete(key);
      }
    }
    this.lastEviction = now;
  }
}

export function createRateLimiter(config: AppConfig['api']['rateLimit'], now?: () => number) {
  const limiter = new RateLimiter(config.burst, config.sustainedPerMin, now);

  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!config.enabled) {
      return;
    }

    const result = limiter.tryConsume(`ip:${request.ip}`);
    reply.header('X-RateLimit-Limit', String(config.burst));
    reply.header('X-RateLimit-Remaining', String(result.remaining));

    if (!result.allowed) {
      reply.header('Retry-After', String(result.retryAfterSec ?? 60));
      return replyWithError(reply, 429, 'RATE_LIMITED', 'RATE_LIMIT_RPM');
    }
  };
}
