/**
 * Error taxonomy for the migration engine.
 *
 * Every error raised by the engine or mapped from a storage client carries a
 * stable `code` so the retry classifier, the checkpoint records and the final
 * report all speak the same vocabulary.
 */

export type RemoteEndpoint = 'source' | 'target';

export class MigrationError extends Error {
  readonly code: string;
  readonly retryable: boolean;

  constructor(code: string, message: string, retryable = false, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
  }
}

/** Network failure, throttling or a 5xx from a remote store. */
export class TransientRemoteError extends MigrationError {
  readonly endpoint?: RemoteEndpoint;
  readonly statusCode?: number;
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    details: { endpoint?: RemoteEndpoint; statusCode?: number; retryAfterMs?: number; cause?: unknown } = {}
  ) {
    super('REMOTE.TRANSIENT', message, true, { cause: details.cause });
    this.endpoint = details.endpoint;
    this.statusCode = details.statusCode;
    this.retryAfterMs = details.retryAfterMs;
  }
}

export interface IntegrityMismatch {
  field: 'size' | 'checksum' | 'identity' | 'contentType';
  expected: string;
  actual: string;
  algorithm?: string;
}

/** Checksum or size mismatch. Never retried. */
export class IntegrityError extends MigrationError {
  readonly artifactId: string;
  readonly stage: 'source' | 'target';
  readonly mismatches: IntegrityMismatch[];

  constructor(artifactId: string, stage: 'source' | 'target', mismatches: IntegrityMismatch[]) {
    const summary = mismatches
      .map(m => `${m.algorithm ? `${m.field}(${m.algorithm})` : m.field} expected ${m.expected}, got ${m.actual}`)
      .join('; ');
    super('INTEGRITY.MISMATCH', `Integrity check failed on ${stage} for ${artifactId}: ${summary}`);
    this.artifactId = artifactId;
    this.stage = stage;
    this.mismatches = mismatches;
  }
}

export class AuthorizationError extends MigrationError {
  readonly endpoint?: RemoteEndpoint;

  constructor(message: string, endpoint?: RemoteEndpoint, cause?: unknown) {
    super('AUTH.DENIED', message, false, { cause });
    this.endpoint = endpoint;
  }
}

export class MalformedRequestError extends MigrationError {
  constructor(message: string, cause?: unknown) {
    super('REQUEST.MALFORMED', message, false, { cause });
  }
}

export class ArtifactNotFoundError extends MigrationError {
  constructor(artifactId: string, cause?: unknown) {
    super('ARTIFACT.NOT_FOUND', `Artifact not found in source: ${artifactId}`, false, { cause });
  }
}

/** Conditional checkpoint write lost a race. */
export class CheckpointConflictError extends MigrationError {
  readonly artifactId: string;
  readonly expected: string | null;
  readonly actual: string | null;

  constructor(artifactId: string, expected: string | null, actual: string | null) {
    super(
      'CHECKPOINT.CONFLICT',
      `Checkpoint conflict for ${artifactId}: expected ${expected ?? 'absent'}, found ${actual ?? 'absent'}`
    );
    this.artifactId = artifactId;
    this.expected = expected;
    this.actual = actual;
  }
}

export class RateLimitTimeoutError extends MigrationError {
  readonly bucket: string;

  constructor(bucket: string, timeoutMs: number) {
    super('RATE_LIMIT.TIMEOUT', `Timed out after ${timeoutMs}ms waiting for ${bucket} rate limit tokens`, true);
    this.bucket = bucket;
  }
}

export class InvalidTransitionError extends MigrationError {
  constructor(kind: 'run' | 'transfer', from: string | null, to: string) {
    super(`${kind.toUpperCase()}.INVALID_TRANSITION`, `Invalid ${kind} state transition: ${from ?? 'absent'} -> ${to}`);
  }
}

export class RunNotFoundError extends MigrationError {
  constructor(runId: string) {
    super('RUN.NOT_FOUND', `Run not found: ${runId}`);
  }
}

export class ConfigError extends MigrationError {
  constructor(message: string) {
    super('CONFIG.INVALID', message);
  }
}

/**
 * Short class name used in checkpoint records and reports
 */
export function errorClassOf(error: unknown): string {
  if (error instanceof MigrationError) {
    return error.name;
  }
  if (error instanceof Error) {
    return error.name || 'Error';
  }
  return 'UnknownError';
}

export function errorMessageOf(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
