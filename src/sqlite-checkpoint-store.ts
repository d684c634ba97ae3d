/**
 * SQLite checkpoint store backed by better-sqlite3.
 *
 * The compare-and-set is a single conditional statement inside a transaction,
 * so concurrent writers in other processes sharing the database file see the
 * same single-writer guarantee as workers in this one.
 */

// Node.js built-in modules
import path from 'node:path';

// Third-party dependencies
import Database from 'better-sqlite3';
import * as fsExtra from 'fs-extra';

// Local imports
import { requeueInterruptedRecords } from './checkpoint-store';
import { CheckpointConflictError } from './errors';
import { assertTransferTransition } from './state-machine';
import { RunState, TransferState } from './types';

// Types
import type { CheckpointStore, TransferRecordUpdate } from './checkpoint-store';
import type { RunRecord, RunReport, StrategyName, TransferRecord } from './types';

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS transfer_records (
  runId TEXT NOT NULL,
  artifactId TEXT NOT NULL,
  state TEXT NOT NULL,
  attemptCount INTEGER NOT NULL DEFAULT 0,
  lastAttemptAt TEXT,
  lastErrorClass TEXT,
  lastErrorMessage TEXT,
  checksum TEXT,
  size INTEGER,
  updatedAt TEXT NOT NULL,
  PRIMARY KEY (runId, artifactId)
);

CREATE INDEX IF NOT EXISTS idx_transfer_records_state ON transfer_records(runId, state);

CREATE TABLE IF NOT EXISTS runs (
  runId TEXT PRIMARY KEY,
  state TEXT NOT NULL,
  strategy TEXT,
  priorRunId TEXT,
  total INTEGER NOT NULL DEFAULT 0,
  skippedAlreadyDone INTEGER NOT NULL DEFAULT 0,
  startedAt TEXT NOT NULL,
  endedAt TEXT,
  failureReason TEXT,
  report TEXT
);
`;

// --- Row types (what SQLite returns) ---

interface RecordRow {
  runId: string;
  artifactId: string;
  state: string;
  attemptCount: number;
  lastAttemptAt: string | null;
  lastErrorClass: string | null;
  lastErrorMessage: string | null;
  checksum: string | null;
  size: number | null;
  updatedAt: string;
}

interface RunRow {
  runId: string;
  state: string;
  strategy: string | null;
  priorRunId: string | null;
  total: number;
  skippedAlreadyDone: number;
  startedAt: string;
  endedAt: string | null;
  failureReason: string | null;
  report: string | null;
}

interface StateRow {
  state: string;
}

// --- Conversions ---

const TRANSFER_STATES = new Set<string>(Object.values(TransferState));
const RUN_STATES = new Set<string>(Object.values(RunState));
const STRATEGIES = new Set<string>(['small', 'medium', 'large']);

function isTransferState(value: string): value is TransferState {
  return TRANSFER_STATES.has(value);
}

function isRunState(value: string): value is RunState {
  return RUN_STATES.has(value);
}

function isStrategyName(value: string): value is StrategyName {
  return STRATEGIES.has(value);
}

function toTransferState(value: string): TransferState {
  if (!isTransferState(value)) {
    throw new Error(`Corrupt checkpoint: unknown transfer state "${value}"`);
  }
  return value;
}

function rowToRecord(row: RecordRow): TransferRecord {
  return {
    runId: row.runId,
    artifactId: row.artifactId,
    state: toTransferState(row.state),
    attemptCount: row.attemptCount,
    lastAttemptAt: row.lastAttemptAt ?? undefined,
    lastErrorClass: row.lastErrorClass ?? undefined,
    lastErrorMessage: row.lastErrorMessage ?? undefined,
    checksum: row.checksum ?? undefined,
    size: row.size ?? undefined,
    updatedAt: row.updatedAt,
  };
}

// Reports are written by this store only
function parseReport(text: string): RunReport {
  const report: RunReport = JSON.parse(text);
  return report;
}

function rowToRun(row: RunRow): RunRecord {
  if (!isRunState(row.state)) {
    throw new Error(`Corrupt checkpoint: unknown run state "${row.state}"`);
  }
  return {
    runId: row.runId,
    state: row.state,
    strategy: row.strategy !== null && isStrategyName(row.strategy) ? row.strategy : undefined,
    priorRunId: row.priorRunId ?? undefined,
    total: row.total,
    skippedAlreadyDone: row.skippedAlreadyDone,
    startedAt: row.startedAt,
    endedAt: row.endedAt ?? undefined,
    failureReason: row.failureReason ?? undefined,
    report: row.report ? parseReport(row.report) : undefined,
  };
}

function prepareStatements(db: Database.Database) {
  return {
    getRecord: db.prepare<[string, string], RecordRow>(
      'SELECT * FROM transfer_records WHERE runId = ? AND artifactId = ?'
    ),
    getState: db.prepare<[string, string], StateRow>(
      'SELECT state FROM transfer_records WHERE runId = ? AND artifactId = ?'
    ),
    insert: db.prepare<RecordRow>(`
      INSERT INTO transfer_records
        (runId, artifactId, state, attemptCount, lastAttemptAt, lastErrorClass, lastErrorMessage, checksum, size, updatedAt)
      VALUES
        (@runId, @artifactId, @state, @attemptCount, @lastAttemptAt, @lastErrorClass, @lastErrorMessage, @checksum, @size, @updatedAt)
      ON CONFLICT (runId, artifactId) DO NOTHING
    `),
    update: db.prepare<RecordRow & { expectedState: string }>(`
      UPDATE transfer_records SET
        state = @state,
        attemptCount = @attemptCount,
        lastAttemptAt = @lastAttemptAt,
        lastErrorClass = @lastErrorClass,
        lastErrorMessage = @lastErrorMessage,
        checksum = @checksum,
        size = @size,
        updatedAt = @updatedAt
      WHERE runId = @runId AND artifactId = @artifactId AND state = @expectedState
    `),
    listByRun: db.prepare<[string], RecordRow>(
      'SELECT * FROM transfer_records WHERE runId = ? ORDER BY artifactId'
    ),
    listCommitted: db.prepare<[string, string], { artifactId: string }>(
      'SELECT artifactId FROM transfer_records WHERE runId = ? AND state = ?'
    ),
    upsertRun: db.prepare<RunRow>(`
      INSERT INTO runs (runId, state, strategy, priorRunId, total, skippedAlreadyDone, startedAt, endedAt, failureReason, report)
      VALUES (@runId, @state, @strategy, @priorRunId, @total, @skippedAlreadyDone, @startedAt, @endedAt, @failureReason, @report)
      ON CONFLICT (runId) DO UPDATE SET
        state = excluded.state,
        strategy = excluded.strategy,
        priorRunId = excluded.priorRunId,
        total = excluded.total,
        skippedAlreadyDone = excluded.skippedAlreadyDone,
        endedAt = excluded.endedAt,
        failureReason = excluded.failureReason,
        report = excluded.report
    `),
    getRun: db.prepare<[string], RunRow>('SELECT * FROM runs WHERE runId = ?'),
  };
}

export interface SqliteCheckpointStoreOptions {
  /** Database file, or ":memory:". */
  path: string;
}

export class SqliteCheckpointStore implements CheckpointStore {
  private readonly db: Database.Database;
  private readonly stmts: ReturnType<typeof prepareStatements>;
  private readonly casWrite: (
    runId: string,
    artifactId: string,
    record: TransferRecordUpdate,
    expectedPriorState: TransferState | null
  ) => TransferRecord;

  constructor(options: SqliteCheckpointStoreOptions) {
    if (options.path !== ':memory:') {
      fsExtra.ensureDirSync(path.dirname(path.resolve(options.path)));
    }

    this.db = new Database(options.path);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(SCHEMA_SQL);

    this.stmts = prepareStatements(this.db);

    this.casWrite = this.db.transaction(
      (runId: string, artifactId: string, record: TransferRecordUpdate, expectedPriorState: TransferState | null) => {
        const row: RecordRow = {
          runId,
          artifactId,
          state: record.state,
          attemptCount: record.attemptCount,
          lastAttemptAt: record.lastAttemptAt ?? null,
          lastErrorClass: record.lastErrorClass ?? null,
          lastErrorMessage: record.lastErrorMessage ?? null,
          checksum: record.checksum ?? null,
          size: record.size ?? null,
          updatedAt: new Date().toISOString(),
        };

        const changes =
          expectedPriorState === null
            ? this.stmts.insert.run(row).changes
            : this.stmts.update.run({ ...row, expectedState: expectedPriorState }).changes;

        if (changes !== 1) {
          const actual = this.stmts.getState.get(runId, artifactId);
          throw new CheckpointConflictError(artifactId, expectedPriorState, actual ? actual.state : null);
        }

        return rowToRecord(row);
      }
    );
  }

  async getRecord(runId: string, artifactId: string): Promise<TransferRecord | undefined> {
    const row = this.stmts.getRecord.get(runId, artifactId);
    return row ? rowToRecord(row) : undefined;
  }

  async putRecord(
    runId: string,
    artifactId: string,
    record: TransferRecordUpdate,
    expectedPriorState: TransferState | null
  ): Promise<TransferRecord> {
    assertTransferTransition(expectedPriorState, record.state);
    return this.casWrite(runId, artifactId, record, expectedPriorState);
  }

  async listCommitted(runId: string): Promise<Set<string>> {
    const rows = this.stmts.listCommitted.all(runId, TransferState.COMMITTED);
    return new Set(rows.map(row => row.artifactId));
  }

  async listRecords(runId: string, states?: TransferState[]): Promise<TransferRecord[]> {
    const records = this.stmts.listByRun.all(runId).map(rowToRecord);
    return states ? records.filter(record => states.includes(record.state)) : records;
  }

  requeueInterrupted(runId: string): Promise<string[]> {
    return requeueInterruptedRecords(this, runId);
  }

  async saveRun(run: RunRecord): Promise<void> {
    this.stmts.upsertRun.run({
      runId: run.runId,
      state: run.state,
      strategy: run.strategy ?? null,
      priorRunId: run.priorRunId ?? null,
      total: run.total,
      skippedAlreadyDone: run.skippedAlreadyDone ?? 0,
      startedAt: run.startedAt,
      endedAt: run.endedAt ?? null,
      failureReason: run.failureReason ?? null,
      report: run.report ? JSON.stringify(run.report) : null,
    });
  }

  async getRun(runId: string): Promise<RunRecord | undefined> {
    const row = this.stmts.getRun.get(runId);
    return row ? rowToRun(row) : undefined;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
