import { describe, it, expect } from 'vitest';
import { RateLimiter } from './rate-limit.js';

describe('RateLimiter', () => {
  it('should allow a burst and then deny', () => {
    const limiter = new RateLimiter(2, 60, () => 0);

    expect(limiter.tryConsume('ip:1')).toEqual({ allowed: true, remaining: 1 });
    expect(limiter.tryConsume('ip:1')).toEqual({ allowed: true, remaining: 0 });
    expect(limiter.tryConsume('ip:1')).toEqual({ allowed: false, remaining: 0, retryAfterSec: 1 });
  });

  it('should refill at the sustained rate up to the burst size', () => {
    let now = 0;
    const limiter = new RateLimiter(2, 60, () => now);
    limiter.tryConsume('ip:1');
    limiter.tryConsume('ip:1');

    now = 1000;
    expect(limiter.tryConsume('ip:1')).toEqual({ allowed: true, remaining: 0 });

    now = 10 * 60_000;
    expect(limiter.tryConsume('ip:1')).toEqual({ allowed: true, remaining: 1 });
  });

  it('should keep separate buckets per key', () => {
    const limiter = new RateLimiter(1, 1, () => 0);

    expect(limiter.tryConsume('ip:1').allowed).toBe(true);
    expect(limiter.tryConsume('ip:2').allowed).toBe(true);
    expect(limiter.tryConsume('ip:1')).toEqual({ allowed: false, remaining: 0, retryAfterSec: 60 });
  });

  it('should drop buckets that have refilled once a minute has passed', () => {
    let now = 0;
    const limiter = new RateLimiter(2, 60, () => now);
    limiter.tryConsume('ip:1');
    limiter.tryConsume('ip:2');
    expect(limiter.size).toBe(2);

    now = 2 * 60_000;
    limiter.tryConsume('ip:3');

    expect(limiter.size).toBe(1);
  });

  it('should keep buckets that are still draining', () => {
    let now = 0;
    const limiter = new RateLimiter(2, 1, () => now);
    limiter.tryConsume('ip:1');
    limiter.tryConsume('ip:1');

    now = 61_000;
    limiter.tryConsume('ip:2');

    expect(limiter.size).toBe(2);
    expect(limiter.tryConsume('ip:1')).toEqual({ allowed: true, remaining: 0 });
  });
});
