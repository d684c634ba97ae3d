/**
 * Maps a failure to retryable-with-delay or fatal.
 *
 * Backoff is exponential (base × factor^(attempt-1)), capped, with jitter
 * drawn from [0, exp × (factor − 1) / 2). Below the cap that keeps the delay
 * strictly increasing from one attempt to the next.
 */

import {
  ArtifactNotFoundError,
  AuthorizationError,
  IntegrityError,
  MalformedRequestError,
  MigrationError,
  RateLimitTimeoutError,
  TransientRemoteError,
  errorClassOf,
} from './errors';

export type Classification =
  | { kind: 'retryable'; delayMs: number; errorClass: string }
  | { kind: 'fatal'; errorClass: string };

export interface RetryPolicy {
  backoffBaseMs: number;
  backoffFactor: number;
  maxBackoffMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  backoffBaseMs: 500,
  backoffFactor: 2,
  maxBackoffMs: 30_000,
};

export function readProperty(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, key);
  return value;
}

/**
 * Status code carried by an arbitrary error (plain `statusCode`/`status`, or an
 * AWS SDK `$metadata.httpStatusCode`)
 */
export function statusCodeOf(error: unknown): number | undefined {
  if (error instanceof TransientRemoteError) {
    return error.statusCode;
  }
  for (const key of ['statusCode', 'status']) {
    const value = readProperty(error, key);
    if (typeof value === 'number') {
      return value;
    }
  }
  const metadataStatus = readProperty(readProperty(error, '$metadata'), 'httpStatusCode');
  return typeof metadataStatus === 'number' ? metadataStatus : undefined;
}

/**
 * Credential failures recur on every artifact, so they are treated as systemic
 */
export function isAuthorizationFailure(error: unknown): boolean {
  if (error instanceof AuthorizationError) {
    return true;
  }
  const status = statusCodeOf(error);
  return status === 401 || status === 403;
}

export class RetryClassifier {
  private readonly policy: RetryPolicy;
  private readonly random: () => number;

  constructor(policy: Partial<RetryPolicy> = {}, random: () => number = Math.random) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy };
    this.random = random;
  }

  /**
   * @param attempt 1-based number of the attempt that just failed
   */
  classify(error: unknown, attempt: number): Classification {
    const errorClass = errorClassOf(error);

    if (this.isFatal(error)) {
      return { kind: 'fatal', errorClass };
    }

    let delayMs = this.backoffDelay(attempt);
    if (error instanceof TransientRemoteError && error.retryAfterMs !== undefined) {
      delayMs = Math.max(delayMs, error.retryAfterMs);
    }
    return { kind: 'retryable', delayMs, errorClass };
  }

  backoffDelay(attempt: number): number {
    const { backoffBaseMs, backoffFactor, maxBackoffMs } = this.policy;
    const exponential = backoffBaseMs * Math.pow(backoffFactor, Math.max(0, attempt - 1));
    if (exponential >= maxBackoffMs) {
      return maxBackoffMs;
    }
    const jitterSpan = backoffFactor > 1 ? (exponential * (backoffFactor - 1)) / 2 : exponential * 0.1;
    return Math.min(maxBackoffMs, Math.floor(exponential + this.random() * jitterSpan));
  }

  private isFatal(error: unknown): boolean {
    if (
      error instanceof AuthorizationError ||
      error instanceof IntegrityError ||
      error instanceof MalformedRequestError ||
      error instanceof ArtifactNotFoundError
    ) {
      return true;
    }
    if (error instanceof TransientRemoteError || error instanceof RateLimitTimeoutError) {
      return false;
    }
    if (error instanceof MigrationError) {
      return !error.retryable;
    }

    const status = statusCodeOf(error);
    if (status !== undefined) {
      if (status === 408 || status === 429 || status >= 500) {
        return false;
      }
      // Remaining 4xx: authorization, malformed request, missing object
      return status >= 400 && status < 500;
    }

    // Network error codes (ECONNRESET, ETIMEDOUT, ...) and anything unrecognised
    // get the retry budget rather than an immediate verdict
    return false;
  }
}

/**
 * True once `attempts` attempts have been made and none remain
 */
export function isExhausted(attempts: number, maxRetries: number): boolean {
  return attempts > maxRetries;
}
