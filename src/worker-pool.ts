// Local imports
import { errorClassOf, errorMessageOf } from './errors';
import { logError, logWarning } from './logger';
import { transferArtifact } from './transfer';
import { TransferState } from './types';

// Types
import type { TransferContext } from './transfer';
import type { ArtifactDescriptor, TransferOutcome, WorkUnit } from './types';

export const DEFAULT_SYSTEMIC_FAILURE_THRESHOLD = 5;

export interface WorkerPoolOptions extends Omit<TransferContext, 'signal'> {
  /** Consecutive artifacts exhausting their retries against the target before the run halts */
  systemicFailureThreshold?: number;
  onSystemicFailure?: (reason: string) => void;
}

interface QueuedArtifact {
  artifact: ArtifactDescriptor;
  batchIndex: number;
}

/**
 * Unbounded single-consumer queue bridging worker slots to an async iterator
 */
class OutcomeChannel<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private waiting: (() => void) | undefined;
  private closed = false;
  private failed = false;
  private failure: unknown;

  push(item: T): void {
    this.items.push(item);
    this.wake();
  }

  close(): void {
    this.closed = true;
    this.wake();
  }

  fail(error: unknown): void {
    this.failed = true;
    this.failure = error;
    this.close();
  }

  private wake(): void {
    const waiting = this.waiting;
    this.waiting = undefined;
    waiting?.();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      if (this.items.length > 0) {
        yield* this.items.splice(0, this.items.length);
        continue;
      }
      if (this.failed) {
        throw this.failure;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>(resolve => {
        this.waiting = resolve;
      });
    }
  }
}

/**
 * Bounded-concurrency executor for work units.
 *
 * Artifacts are dispatched in listing order across at most `concurrencyLimit`
 * slots; outcomes are yielded as they complete. `cancel()` stops dispatch and
 * tells in-flight transfers to requeue at their next step boundary. `halt()`
 * stops dispatch but lets in-flight transfers finish.
 */
export class WorkerPool {
  private readonly controller = new AbortController();
  private readonly threshold: number;
  private haltReason: string | undefined;
  private consecutiveTargetFailures = 0;
  private inFlight = 0;

  constructor(private readonly options: WorkerPoolOptions) {
    this.threshold = Math.max(1, options.systemicFailureThreshold ?? DEFAULT_SYSTEMIC_FAILURE_THRESHOLD);
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get halted(): string | undefined {
    return this.haltReason;
  }

  get active(): number {
    return this.inFlight;
  }

  cancel(): void {
    this.controller.abort();
  }

  halt(reason: string): void {
    if (this.haltReason !== undefined) {
      return;
    }
    this.haltReason = reason;
    logWarning(`Halting dispatch: ${reason}`);
    this.options.onSystemicFailure?.(reason);
  }

  async *run(units: readonly WorkUnit[], concurrencyLimit: number): AsyncGenerator<TransferOutcome> {
    const queue: QueuedArtifact[] = units.flatMap(unit =>
      unit.artifacts.map(artifact => ({ artifact, batchIndex: unit.index }))
    );
    let cursor = 0;

    const next = (): QueuedArtifact | undefined => {
      if (this.cancelled || this.haltReason !== undefined || cursor >= queue.length) {
        return undefined;
      }
      return queue[cursor++];
    };

    const channel = new OutcomeChannel<TransferOutcome>();
    const slot = async (): Promise<void> => {
      for (let item = next(); item; item = next()) {
        this.inFlight++;
        try {
          const outcome = await this.execute(item);
          this.track(outcome);
          channel.push(outcome);
        } finally {
          this.inFlight--;
        }
      }
    };

    const slotCount = Math.min(Math.max(1, Math.floor(concurrencyLimit)), queue.length);
    const finished = Promise.all(Array.from({ length: slotCount }, () => slot())).then(
      () => channel.close(),
      (error: unknown) => channel.fail(error)
    );

    yield* channel;
    await finished;
  }

  private async execute({ artifact, batchIndex }: QueuedArtifact): Promise<TransferOutcome> {
    const startedAt = Date.now();
    try {
      return await transferArtifact({ ...this.options, signal: this.controller.signal }, artifact, batchIndex);
    } catch (error) {
      // Only checkpoint store failures get here; the store is shared, so stop
      logError(`Checkpoint store failure on ${artifact.id}: ${errorMessageOf(error)}`, error);
      return {
        artifactId: artifact.id,
        batchIndex,
        kind: TransferState.FAILED_RETRYABLE,
        attempts: 0,
        bytes: 0,
        durationMs: Date.now() - startedAt,
        errorClass: errorClassOf(error),
        errorMessage: errorMessageOf(error),
        stage: 'commit',
        systemic: true,
      };
    }
  }

  private track(outcome: TransferOutcome): void {
    if (outcome.systemic) {
      this.halt(`${outcome.errorClass ?? 'Error'} on ${outcome.artifactId}: ${outcome.errorMessage ?? ''}`);
      return;
    }

    if (outcome.kind === TransferState.COMMITTED) {
      this.consecutiveTargetFailures = 0;
    } else if (outcome.kind === TransferState.FAILED_RETRYABLE && outcome.stage === 'target') {
      this.consecutiveTargetFailures++;
      if (this.consecutiveTargetFailures >= this.threshold) {
        this.halt(`${this.consecutiveTargetFailures} consecutive artifacts exhausted their retries against the target`);
      }
    }
  }
}
