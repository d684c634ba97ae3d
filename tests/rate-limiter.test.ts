import { describe, expect, it } from 'vitest';

import { RateLimitTimeoutError } from '../src/errors';
import { RateLimiter, SOURCE_BUCKET, TARGET_BUCKET, createEndpointRateLimiter } from '../src/rate-limiter';

describe('RateLimiter', () => {
  it('never blocks an unlimited bucket', async () => {
    const limiter = new RateLimiter({ buckets: { open: {} } });

    expect(await limiter.acquire('open')).toBe(0);
    expect(await limiter.acquire('unknown')).toBe(0);
    expect(limiter.available('open')).toBe(Number.POSITIVE_INFINITY);
  });

  it('serves the burst immediately and then waits for a refill', async () => {
    const limiter = new RateLimiter({ buckets: { target: { tokensPerSecond: 20, capacity: 1 } } });

    expect(await limiter.acquire('target')).toBe(0);
    const waited = await limiter.acquire('target');

    expect(waited).toBeGreaterThanOrEqual(40);
  });

  it('refills from the injected clock', async () => {
    let now = 0;
    const limiter = new RateLimiter({ buckets: { source: { tokensPerSecond: 2, capacity: 4 } }, now: () => now });

    await limiter.acquire('source', 4);
    expect(limiter.available('source')).toBe(0);

    now = 1000;
    expect(limiter.available('source')).toBe(2);

    now = 10_000;
    expect(limiter.available('source')).toBe(4);
  });

  it('serves waiters in arrival order', async () => {
    const limiter = new RateLimiter({ buckets: { target: { tokensPerSecond: 100, capacity: 1 } } });
    const served: number[] = [];

    await Promise.all([1, 2, 3].map(n => limiter.acquire('target').then(() => served.push(n))));

    expect(served).toEqual([1, 2, 3]);
  });

  it('times out instead of waiting past the deadline', async () => {
    const limiter = new RateLimiter({ buckets: { target: { tokensPerSecond: 1, capacity: 1 } }, timeoutMs: 100 });

    await limiter.acquire('target');
    await expect(limiter.acquire('target')).rejects.toBeInstanceOf(RateLimitTimeoutError);
    await expect(limiter.acquire('target')).rejects.toThrow(
      'Timed out after 100ms waiting for target rate limit tokens'
    );
  });

  it('rejects a cost larger than the bucket', async () => {
    const limiter = new RateLimiter({ buckets: { target: { tokensPerSecond: 1, capacity: 2 } } });
    await expect(limiter.acquire('target', 3)).rejects.toBeInstanceOf(RangeError);
  });
});

describe('createEndpointRateLimiter', () => {
  it('creates source and target buckets', () => {
    const limiter = createEndpointRateLimiter({ rateLimitSource: 5 });

    expect(limiter.available(SOURCE_BUCKET)).toBe(5);
    expect(limiter.available(TARGET_BUCKET)).toBe(Number.POSITIVE_INFINITY);
  });
});
