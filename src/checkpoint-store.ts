/**
 * Durable per-artifact transfer state.
 *
 * `putRecord` is the single mutual-exclusion primitive of the engine: it is a
 * compare-and-set on the stored state, so two workers racing to claim the same
 * artifact cannot both move it to `in_progress`.
 */

import { CheckpointConflictError } from './errors';
import { assertTransferTransition } from './state-machine';
import { TransferState } from './types';

// Types
import type { RunRecord, TransferRecord } from './types';

export type TransferRecordUpdate = Omit<TransferRecord, 'runId' | 'artifactId' | 'updatedAt'>;

export interface CheckpointStore {
  getRecord(runId: string, artifactId: string): Promise<TransferRecord | undefined>;
  /**
   * Write a record only if the stored state equals `expectedPriorState`
   * (`null` means the record must not exist yet).
   * @throws CheckpointConflictError when another writer got there first
   */
  putRecord(
    runId: string,
    artifactId: string,
    record: TransferRecordUpdate,
    expectedPriorState: TransferState | null
  ): Promise<TransferRecord>;
  listCommitted(runId: string): Promise<Set<string>>;
  listRecords(runId: string, states?: TransferState[]): Promise<TransferRecord[]>;
  /** Move interrupted (`in_progress` / `validated`) records back to `pending`. */
  requeueInterrupted(runId: string): Promise<string[]>;
  saveRun(run: RunRecord): Promise<void>;
  getRun(runId: string): Promise<RunRecord | undefined>;
  close(): Promise<void>;
}

const INTERRUPTED_STATES = [TransferState.IN_PROGRESS, TransferState.VALIDATED];

/**
 * Shared crash-recovery pass. Records that change under us are left alone:
 * whoever changed them owns them now.
 */
export async function requeueInterruptedRecords(store: CheckpointStore, runId: string): Promise<string[]> {
  const interrupted = await store.listRecords(runId, INTERRUPTED_STATES);
  const requeued: string[] = [];

  for (const record of interrupted) {
    try {
      await store.putRecord(
        runId,
        record.artifactId,
        {
          state: TransferState.PENDING,
          attemptCount: record.attemptCount,
          lastAttemptAt: record.lastAttemptAt,
          lastErrorClass: record.lastErrorClass,
          lastErrorMessage: record.lastErrorMessage,
          checksum: record.checksum,
          size: record.size,
        },
        record.state
      );
      requeued.push(record.artifactId);
    } catch (error) {
      if (!(error instanceof CheckpointConflictError)) {
        throw error;
      }
    }
  }

  return requeued;
}

/**
 * In-process store. Records are copied on the way in and out so callers never
 * share mutable state with the store.
 */
export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly records = new Map<string, Map<string, TransferRecord>>();
  private readonly runs = new Map<string, RunRecord>();

  async getRecord(runId: string, artifactId: string): Promise<TransferRecord | undefined> {
    const record = this.records.get(runId)?.get(artifactId);
    return record ? { ...record } : undefined;
  }

  async putRecord(
    runId: string,
    artifactId: string,
    record: TransferRecordUpdate,
    expectedPriorState: TransferState | null
  ): Promise<TransferRecord> {
    let runRecords = this.records.get(runId);
    if (!runRecords) {
      runRecords = new Map();
      this.records.set(runId, runRecords);
    }

    const current = runRecords.get(artifactId);
    const actualState = current ? current.state : null;
    if (actualState !== expectedPriorState) {
      throw new CheckpointConflictError(artifactId, expectedPriorState, actualState);
    }
    assertTransferTransition(actualState, record.state);

    const stored: TransferRecord = {
      ...record,
      runId,
      artifactId,
      updatedAt: new Date().toISOString(),
    };
    runRecords.set(artifactId, stored);
    return { ...stored };
  }

  async listCommitted(runId: string): Promise<Set<string>> {
    const committed = new Set<string>();
    for (const record of this.records.get(runId)?.values() ?? []) {
      if (record.state === TransferState.COMMITTED) {
        committed.add(record.artifactId);
      }
    }
    return committed;
  }

  async listRecords(runId: string, states?: TransferState[]): Promise<TransferRecord[]> {
    const result: TransferRecord[] = [];
    for (const record of this.records.get(runId)?.values() ?? []) {
      if (!states || states.includes(record.state)) {
        result.push({ ...record });
      }
    }
    return result;
  }

  requeueInterrupted(runId: string): Promise<string[]> {
    return requeueInterruptedRecords(this, runId);
  }

  async saveRun(run: RunRecord): Promise<void> {
    this.runs.set(run.runId, structuredClone(run));
  }

  async getRun(runId: string): Promise<RunRecord | undefined> {
    const run = this.runs.get(runId);
    return run ? structuredClone(run) : undefined;
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
