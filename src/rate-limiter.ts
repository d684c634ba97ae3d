/**
 * Token-bucket rate limiter, one bucket per remote endpoint.
 *
 * Waiters on a bucket are served in arrival order. Blocking in `acquire` is
 * the engine's backpressure: workers never pace themselves.
 */

import { RateLimitTimeoutError } from './errors';
import { sleep } from './utils';

export interface BucketOptions {
  /** Refill rate. Zero or undefined means the bucket never blocks. */
  tokensPerSecond?: number;
  /** Burst size. Defaults to max(1, tokensPerSecond). */
  capacity?: number;
}

export interface RateLimiterOptions {
  buckets: Record<string, BucketOptions>;
  /** Longest a caller may wait for tokens. Default: 60 000 ms */
  timeoutMs?: number;
  now?: () => number;
}

interface BucketState {
  rate: number;
  capacity: number;
  tokens: number;
  lastRefill: number;
  tail: Promise<void>; // Last waiter in line
}

export class RateLimiter {
  private readonly buckets = new Map<string, BucketState>();
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions) {
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.now = options.now ?? Date.now;

    for (const [name, bucket] of Object.entries(options.buckets)) {
      const rate = bucket.tokensPerSecond ?? 0;
      const capacity = bucket.capacity ?? Math.max(1, rate);
      this.buckets.set(name, {
        rate,
        capacity,
        tokens: capacity,
        lastRefill: this.now(),
        tail: Promise.resolve(),
      });
    }
  }

  /**
   * Wait until `cost` tokens are available in `bucket` and take them.
   * @returns milliseconds spent waiting
   * @throws RateLimitTimeoutError when the wait would exceed the timeout
   */
  async acquire(bucket: string, cost = 1): Promise<number> {
    const state = this.buckets.get(bucket);
    if (!state || state.rate <= 0) {
      return 0;
    }
    if (cost > state.capacity) {
      throw new RangeError(`Cost ${cost} exceeds capacity ${state.capacity} of bucket ${bucket}`);
    }

    const startedAt = this.now();
    const deadline = startedAt + this.timeoutMs;

    const turn = state.tail.then(async () => {
      this.refill(state);

      if (state.tokens < cost) {
        const waitMs = Math.ceil(((cost - state.tokens) / state.rate) * 1000);
        if (this.now() + waitMs > deadline) {
          throw new RateLimitTimeoutError(bucket, this.timeoutMs);
        }
        await sleep(waitMs);
        this.refill(state);
      }

      state.tokens -= cost;
    });

    // Keep the line moving even when this waiter times out
    state.tail = turn.catch(() => undefined);

    await turn;
    return this.now() - startedAt;
  }

  /** Tokens currently available, after refill. */
  available(bucket: string): number {
    const state = this.buckets.get(bucket);
    if (!state || state.rate <= 0) {
      return Number.POSITIVE_INFINITY;
    }
    this.refill(state);
    return state.tokens;
  }

  private refill(state: BucketState): void {
    const now = this.now();
    const elapsedMs = now - state.lastRefill;
    if (elapsedMs > 0) {
      state.tokens = Math.min(state.capacity, state.tokens + (elapsedMs / 1000) * state.rate);
      state.lastRefill = now;
    }
  }
}

export const SOURCE_BUCKET = 'source';
export const TARGET_BUCKET = 'target';

/**
 * Limiter with the two endpoint buckets the engine uses
 */
export function createEndpointRateLimiter(options: {
  rateLimitSource?: number;
  rateLimitTarget?: number;
  rateLimitTimeoutMs?: number;
}): RateLimiter {
  return new RateLimiter({
    buckets: {
      [SOURCE_BUCKET]: { tokensPerSecond: options.rateLimitSource },
      [TARGET_BUCKET]: { tokensPerSecond: options.rateLimitTarget },
    },
    timeoutMs: options.rateLimitTimeoutMs,
  });
}
