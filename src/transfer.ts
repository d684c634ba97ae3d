/**
 * Per-artifact transfer protocol:
 *
 *   1. claim the record (`→ in_progress`, conditional write)
 *   2. take a source token, 3. read and spool the content
 *   4. verify it against the source's declared size/checksum
 *   5. take a target token and write
 *   6. verify the target's confirmation, 7. `validated → committed`
 *
 * Retryable failures re-enter at step 2 with the record still `in_progress`.
 * Cancellation is observed between steps; the record then goes back to
 * `pending`, so a paused run never leaves a record claimed.
 */

// Local imports
import { spoolContent } from './content-spool';
import { CheckpointConflictError, errorMessageOf } from './errors';
import { logSilent, logVerbose, logWarning, LogLevel } from './logger';
import { Events, Metrics } from './observability';
import { SOURCE_BUCKET, TARGET_BUCKET } from './rate-limiter';
import { isAuthorizationFailure, isExhausted } from './retry-classifier';
import { isTerminalTransferState } from './state-machine';
import { TransferState } from './types';
import { sleep } from './utils';
import { integrityError, verify, verifyTarget } from './validator';

// Types
import type { CheckpointStore, TransferRecordUpdate } from './checkpoint-store';
import type { SpooledContent } from './content-spool';
import type { ObservabilitySink } from './observability';
import type { RateLimiter } from './rate-limiter';
import type { RetryClassifier } from './retry-classifier';
import type {
  ArtifactDescriptor,
  ArtifactSource,
  ArtifactTarget,
  OutcomeKind,
  TransferOutcome,
  TransferStage,
} from './types';

export interface TransferContext {
  runId: string;
  source: ArtifactSource;
  target: ArtifactTarget;
  store: CheckpointStore;
  limiter: RateLimiter;
  classifier: RetryClassifier;
  sink: ObservabilitySink;
  maxRetries: number;
  memoryThreshold: number;
  tempDir: string;
  signal: AbortSignal;
}

class ArtifactTransfer {
  private record: TransferRecordUpdate | undefined;
  private attempts = 0;
  private priorAttempts = 0;
  private bytes = 0;
  private readonly startedAt = Date.now();

  constructor(
    private readonly ctx: TransferContext,
    private readonly artifact: ArtifactDescriptor,
    private readonly batchIndex: number
  ) {}

  async run(): Promise<TransferOutcome> {
    const claimed = await this.claim();
    if (claimed) {
      return claimed;
    }

    for (;;) {
      let stage: TransferStage = 'source';
      let spool: SpooledContent | undefined;

      try {
        if (this.ctx.signal.aborted) {
          return await this.requeue();
        }
        this.ctx.sink.count(Metrics.ATTEMPTS, 1);

        // Steps 2-3
        await this.acquire(SOURCE_BUCKET);
        const object = await this.ctx.source.read(this.artifact.id);
        spool = await spoolContent(object.body, {
          name: this.artifact.id,
          sizeHint: this.artifact.size,
          memoryThreshold: this.ctx.memoryThreshold,
          tempDir: this.ctx.tempDir,
        });

        // Step 4
        stage = 'validate';
        const sourceFailure = integrityError(
          this.artifact.id,
          'source',
          verify(spool, { size: this.artifact.size, checksum: object.checksum ?? this.artifact.checksum })
        );
        if (sourceFailure) {
          throw sourceFailure;
        }

        if (this.ctx.signal.aborted) {
          return await this.requeue();
        }

        // Step 5
        stage = 'target';
        const contentType = object.contentType ?? this.artifact.contentType;
        await this.acquire(TARGET_BUCKET);
        const confirmation = await this.ctx.target.write(this.artifact.id, spool.open(), {
          size: spool.size,
          contentType,
          metadata: { ...this.artifact.metadata, ...object.metadata },
          checksums: spool.digests,
        });

        // Step 6
        stage = 'verify';
        const targetFailure = integrityError(
          this.artifact.id,
          'target',
          verifyTarget(spool, { id: this.artifact.id, contentType }, confirmation)
        );
        if (targetFailure) {
          throw targetFailure;
        }

        // Step 7
        stage = 'commit';
        this.bytes = spool.size;
        await this.persist(TransferState.VALIDATED, { checksum: spool.digests.sha256, size: spool.size });
        await this.persist(TransferState.COMMITTED, { lastErrorClass: undefined, lastErrorMessage: undefined });

        this.ctx.sink.count(Metrics.SUCCESSES, 1);
        this.ctx.sink.event(Events.ARTIFACT_COMMITTED, {
          runId: this.ctx.runId,
          artifactId: this.artifact.id,
          bytes: this.bytes,
          attempts: this.attempts,
        });
        return this.outcome(TransferState.COMMITTED);
      } catch (error) {
        const handled = await this.handleFailure(error, stage);
        if (handled) {
          return handled;
        }
      } finally {
        await spool?.dispose();
      }
    }
  }

  /**
   * Step 1. Returns an outcome when the artifact must not be processed here.
   */
  private async claim(): Promise<TransferOutcome | undefined> {
    const existing = await this.ctx.store.getRecord(this.ctx.runId, this.artifact.id);

    if (existing && isTerminalTransferState(existing.state)) {
      return this.outcome('skipped');
    }
    if (existing && (existing.state === TransferState.IN_PROGRESS || existing.state === TransferState.VALIDATED)) {
      logVerbose(`${this.artifact.id} is held by another worker, leaving it alone`);
      return this.outcome('conflict');
    }

    this.record = existing
      ? {
          state: existing.state,
          attemptCount: existing.attemptCount,
          lastAttemptAt: existing.lastAttemptAt,
          lastErrorClass: existing.lastErrorClass,
          lastErrorMessage: existing.lastErrorMessage,
          checksum: existing.checksum,
          size: existing.size,
        }
      : undefined;
    this.priorAttempts = existing?.attemptCount ?? 0;

    try {
      await this.beginAttempt();
      return undefined;
    } catch (error) {
      if (!(error instanceof CheckpointConflictError)) {
        throw error;
      }
      // Lost the race: whoever won owns the record
      const current = await this.ctx.store.getRecord(this.ctx.runId, this.artifact.id);
      this.attempts = 0;
      return this.outcome(current?.state === TransferState.COMMITTED ? 'skipped' : 'conflict');
    }
  }

  private async beginAttempt(): Promise<void> {
    this.attempts++;
    await this.persist(TransferState.IN_PROGRESS, { lastAttemptAt: new Date().toISOString() });
  }

  private async handleFailure(error: unknown, stage: TransferStage): Promise<TransferOutcome | undefined> {
    if (error instanceof CheckpointConflictError) {
      // Someone else moved our record; abandon this attempt without failing it
      logWarning(`Abandoning ${this.artifact.id}: ${error.message}`);
      return this.outcome('conflict', { stage });
    }

    const message = errorMessageOf(error);
    const classification = this.ctx.classifier.classify(error, this.attempts);
    const failure = { lastErrorClass: classification.errorClass, lastErrorMessage: message };

    if (classification.kind === 'fatal') {
      await this.persist(TransferState.FAILED_FATAL, failure);
      return this.failed(TransferState.FAILED_FATAL, classification.errorClass, message, stage, isAuthorizationFailure(error));
    }

    if (isExhausted(this.attempts, this.ctx.maxRetries)) {
      await this.persist(TransferState.FAILED_RETRYABLE, failure);
      return this.failed(TransferState.FAILED_RETRYABLE, classification.errorClass, message, stage, false);
    }

    logSilent(
      `Retrying ${this.artifact.id} after ${stage} failure (${this.attempts}/${this.ctx.maxRetries + 1}) ` +
        `in ${classification.delayMs}ms: ${message}`,
      LogLevel.WARNING
    );
    await this.persist(TransferState.IN_PROGRESS, failure);

    await sleep(classification.delayMs, this.ctx.signal);
    if (this.ctx.signal.aborted) {
      return this.requeue();
    }

    await this.beginAttempt();
    return undefined;
  }

  private failed(
    kind: TransferState.FAILED_FATAL | TransferState.FAILED_RETRYABLE,
    errorClass: string,
    errorMessage: string,
    stage: TransferStage,
    systemic: boolean
  ): TransferOutcome {
    this.ctx.sink.count(Metrics.FAILURES, 1, { errorClass });
    this.ctx.sink.event(Events.ARTIFACT_FAILED, {
      runId: this.ctx.runId,
      artifactId: this.artifact.id,
      state: kind,
      errorClass,
      errorMessage,
      stage,
      attempts: this.attempts,
    });
    return this.outcome(kind, { errorClass, errorMessage, stage, systemic });
  }

  private async requeue(): Promise<TransferOutcome> {
    await this.persist(TransferState.PENDING, {});
    logVerbose(`Requeued ${this.artifact.id} to pending`);
    return this.outcome('requeued');
  }

  private async acquire(bucket: string): Promise<void> {
    const waitedMs = await this.ctx.limiter.acquire(bucket);
    if (waitedMs > 0) {
      this.ctx.sink.timing(Metrics.RATE_LIMIT_WAIT, waitedMs, { bucket });
    }
  }

  /**
   * Conditional write from the state this worker last wrote
   */
  private async persist(state: TransferState, changes: Partial<TransferRecordUpdate>): Promise<void> {
    const next: TransferRecordUpdate = {
      ...this.record,
      ...changes,
      state,
      attemptCount: this.priorAttempts + this.attempts,
    };
    await this.ctx.store.putRecord(this.ctx.runId, this.artifact.id, next, this.record?.state ?? null);
    this.record = next;
  }

  private outcome(kind: OutcomeKind, extra: Partial<TransferOutcome> = {}): TransferOutcome {
    return {
      artifactId: this.artifact.id,
      batchIndex: this.batchIndex,
      kind,
      attempts: this.attempts,
      bytes: this.bytes,
      durationMs: Date.now() - this.startedAt,
      ...extra,
    };
  }
}

/**
 * Run the full protocol for one artifact. Per-artifact failures come back as
 * outcomes; only a checkpoint store failure escapes as an exception.
 */
export function transferArtifact(
  ctx: TransferContext,
  artifact: ArtifactDescriptor,
  batchIndex: number
): Promise<TransferOutcome> {
  return new ArtifactTransfer(ctx, artifact, batchIndex).run();
}
