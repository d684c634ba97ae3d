/**
 * Migration controller: owns the run lifecycle
 *
 *   created → listing → partitioning → running → completed | failed
 *                                         ↕
 *                                       paused
 *
 * The controller never touches artifact bytes. It lists the source once per
 * run session, partitions what is left to do, and hands batches to worker
 * pools that share one checkpoint store and one rate limiter.
 */

// Node.js built-in modules
import os from 'node:os';
import path from 'node:path';

// Third-party dependencies
import { v4 as uuidv4 } from 'uuid';

// Local imports
import { errorMessageOf, InvalidTransitionError, RunNotFoundError } from './errors';
import { logError, logVerbose, logWarning } from './logger';
import { Events, fanOut, MetricsRecorder } from './observability';
import { assignToPools, partition } from './partitioner';
import { createEndpointRateLimiter } from './rate-limiter';
import { buildReport, countRecords } from './report';
import { RetryClassifier } from './retry-classifier';
import { assertRunTransition, isTerminalRunState, VALID_RUN_TRANSITIONS } from './state-machine';
import { estimateListing, resolveStrategy } from './strategy';
import { RunState, TransferState } from './types';
import { formatBytes } from './utils';
import { WorkerPool } from './worker-pool';

// Types
import type { CheckpointStore } from './checkpoint-store';
import type { ObservabilitySink } from './observability';
import type { RateLimiter } from './rate-limiter';
import type { TransferTotals } from './report';
import type { RetryPolicy } from './retry-classifier';
import type {
  ArtifactDescriptor,
  ArtifactSource,
  ArtifactTarget,
  EngineConfig,
  RunCounts,
  RunHandle,
  RunRecord,
  RunReport,
  RunStatus,
  SizeEstimate,
  StrategyParams,
  TransferOutcome,
  WorkUnit,
} from './types';

export const DEFAULT_MEMORY_THRESHOLD = 100 * 1024 * 1024; // 100MB
export const DEFAULT_TEMP_DIR = path.join(os.tmpdir(), 'artifact-migrate');

// Records a continued run does not pick up again
const TERMINAL_RECORD_STATES = [TransferState.COMMITTED, TransferState.FAILED_FATAL];

export interface ControllerDeps {
  source: ArtifactSource;
  target: ArtifactTarget;
  store: CheckpointStore;
  rateLimiter?: RateLimiter; // Built from the run's rate limit settings when omitted
  sink?: ObservabilitySink;
  classifier?: RetryClassifier;
  random?: () => number; // Jitter source for the default classifier
}

/**
 * What a run would do, without transferring anything
 */
export interface MigrationPlan {
  strategy: StrategyParams;
  estimate: SizeEstimate;
  listed: number;
  skippedAlreadyDone: number;
  units: WorkUnit[];
  pools: WorkUnit[][];
}

interface ActiveRun {
  runId: string;
  config: EngineConfig;
  record: RunRecord;
  strategy: StrategyParams;
  listing: ArtifactDescriptor[]; // Snapshot taken when the run was listed
  excluded: Set<string>; // Committed by the prior run
  skippedAlreadyDone: number; // Listed artifacts found in `excluded`
  metrics: MetricsRecorder;
  sink: ObservabilitySink;
  limiter: RateLimiter;
  classifier: RetryClassifier;
  pools: WorkerPool[];
  processed: number;
  transferred: TransferTotals; // Across every session of this controller
  activeMs: number;
  sessionStartedAt: number;
  sessionActive: boolean;
  pauseRequested: boolean;
  failureReason?: string;
  session?: Promise<RunReport>;
}

function retryPolicyOf(config: EngineConfig): Partial<RetryPolicy> {
  const policy: Partial<RetryPolicy> = {};
  if (config.backoffBaseMs !== undefined) {
    policy.backoffBaseMs = config.backoffBaseMs;
  }
  if (config.backoffFactor !== undefined) {
    policy.backoffFactor = config.backoffFactor;
  }
  if (config.maxBackoffMs !== undefined) {
    policy.maxBackoffMs = config.maxBackoffMs;
  }
  return policy;
}

function isFinishedOutcome(outcome: TransferOutcome): boolean {
  return outcome.kind !== 'requeued' && outcome.kind !== 'conflict';
}

/**
 * Status of a run that is not active in this process, read back from the
 * checkpoint store
 */
export async function readRunStatus(store: CheckpointStore, runId: string): Promise<RunStatus> {
  const run = await store.getRun(runId);
  if (!run) {
    throw new RunNotFoundError(runId);
  }

  let counts: RunCounts;
  if (run.report) {
    counts = run.report.counts;
  } else {
    // No listing to compare against; the run's own records are all listed
    const skipped = run.skippedAlreadyDone ?? 0;
    const records = await store.listRecords(runId);
    counts = countRecords(
      records.map(record => record.artifactId),
      records,
      skipped
    );
    counts.remaining = Math.max(
      0,
      run.total - skipped - counts.committed - counts.failedRetryable - counts.failedFatal
    );
  }

  const startedAt = Date.parse(run.startedAt);
  const endedAt = run.endedAt ? Date.parse(run.endedAt) : Date.now();

  return {
    runId,
    state: run.state,
    strategy: run.strategy,
    total: run.total,
    processed: counts.committed + counts.failedRetryable + counts.failedFatal,
    counts,
    elapsedMs: run.report?.elapsedMs ?? Math.max(0, endedAt - startedAt),
    report: run.report,
  };
}

export class MigrationController {
  private readonly runs = new Map<string, ActiveRun>();

  constructor(private readonly deps: ControllerDeps) {}

  /**
   * Begin a run in the background. `config.runId` continues an existing run;
   * `config.priorRunId` skips whatever that run committed.
   */
  async start(config: EngineConfig = {}): Promise<RunHandle> {
    const { store } = this.deps;
    const runId = config.runId ?? uuidv4();

    const active = this.runs.get(runId);
    if (active && !isTerminalRunState(active.record.state)) {
      throw new InvalidTransitionError('run', active.record.state, RunState.LISTING);
    }

    let startedAt = new Date().toISOString();
    if (config.runId) {
      const existing = await store.getRun(runId);
      if (!existing) {
        throw new RunNotFoundError(runId);
      }
      startedAt = existing.startedAt;
      await this.requeue(runId);
    }
    if (config.priorRunId) {
      if (!(await store.getRun(config.priorRunId))) {
        throw new RunNotFoundError(config.priorRunId);
      }
      await this.requeue(config.priorRunId);
    }

    const metrics = new MetricsRecorder();
    const run: ActiveRun = {
      runId,
      config,
      record: {
        runId,
        state: RunState.CREATED,
        priorRunId: config.priorRunId,
        total: 0,
        startedAt,
      },
      strategy: resolveStrategy(config),
      listing: [],
      excluded: new Set(),
      skippedAlreadyDone: 0,
      metrics,
      sink: this.deps.sink ? fanOut(metrics, this.deps.sink) : metrics,
      limiter: this.deps.rateLimiter ?? createEndpointRateLimiter(config),
      classifier: this.deps.classifier ?? new RetryClassifier(retryPolicyOf(config), this.deps.random),
      pools: [],
      processed: 0,
      transferred: { artifacts: 0, bytes: 0 },
      activeMs: 0,
      sessionStartedAt: Date.now(),
      sessionActive: true,
      pauseRequested: false,
    };

    await store.saveRun(run.record);
    this.runs.set(runId, run);

    const done = this.execute(run);
    run.session = done;
    return { runId, done };
  }

  /**
   * Stop dispatching and roll in-flight artifacts back to pending at their
   * next step boundary. Resolves with the report once the run is paused.
   */
  async pause(runId: string): Promise<RunReport> {
    const run = this.activeRun(runId);
    if (run.record.state === RunState.PAUSED && run.record.report) {
      return run.record.report;
    }
    if (isTerminalRunState(run.record.state) || !run.session) {
      throw new InvalidTransitionError('run', run.record.state, RunState.PAUSED);
    }

    logVerbose(`Pausing run ${runId}`);
    run.pauseRequested = true;
    run.pools.forEach(pool => pool.cancel());
    return run.session;
  }

  /**
   * Continue a paused run against the listing snapshot it was started with
   */
  async resume(runId: string): Promise<RunHandle> {
    const run = this.activeRun(runId);
    assertRunTransition(run.record.state, RunState.RUNNING);

    run.pauseRequested = false;
    run.sessionStartedAt = Date.now();
    run.sessionActive = true;

    const done = this.resumeSession(run);
    run.session = done;
    return { runId, done };
  }

  async status(runId: string): Promise<RunStatus> {
    const run = this.runs.get(runId);
    if (!run) {
      return readRunStatus(this.deps.store, runId);
    }

    const records = await this.deps.store.listRecords(runId);
    return {
      runId,
      state: run.record.state,
      strategy: run.strategy.name,
      total: run.listing.length,
      processed: run.processed,
      counts: countRecords(this.listedIds(run), records, run.skippedAlreadyDone),
      elapsedMs: run.activeMs + (run.sessionActive ? Date.now() - run.sessionStartedAt : 0),
      report: run.record.report,
    };
  }

  /**
   * List and partition without transferring anything. With `config.runId`
   * the run's committed and fatally failed artifacts count as already done.
   */
  async plan(config: EngineConfig = {}): Promise<MigrationPlan> {
    const listing = await this.list();
    const excluded = config.priorRunId ? await this.deps.store.listCommitted(config.priorRunId) : new Set<string>();
    if (config.runId) {
      const terminal = await this.deps.store.listRecords(config.runId, TERMINAL_RECORD_STATES);
      terminal.forEach(record => excluded.add(record.artifactId));
    }
    const todo = listing.filter(artifact => !excluded.has(artifact.id));

    const estimate = estimateListing(todo);
    const strategy = resolveStrategy(config, estimate);
    const units = partition(todo, strategy);

    return {
      strategy,
      estimate,
      listed: listing.length,
      skippedAlreadyDone: listing.length - todo.length,
      units,
      pools: assignToPools(units, strategy.poolCount),
    };
  }

  private activeRun(runId: string): ActiveRun {
    const run = this.runs.get(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }
    return run;
  }

  private async requeue(runId: string): Promise<void> {
    const requeued = await this.deps.store.requeueInterrupted(runId);
    if (requeued.length > 0) {
      logWarning(`Requeued ${requeued.length} interrupted artifacts of run ${runId}`);
    }
  }

  private async list(): Promise<ArtifactDescriptor[]> {
    const listing: ArtifactDescriptor[] = [];
    for await (const artifact of this.deps.source.list()) {
      listing.push(artifact);
    }
    return listing;
  }

  private listedIds(run: ActiveRun): string[] {
    return run.listing.map(artifact => artifact.id);
  }

  /**
   * Listed artifacts that still need work in this run
   */
  private async outstanding(run: ActiveRun): Promise<ArtifactDescriptor[]> {
    const terminal = await this.deps.store.listRecords(run.runId, TERMINAL_RECORD_STATES);
    const done = new Set(terminal.map(record => record.artifactId));
    return run.listing.filter(artifact => !run.excluded.has(artifact.id) && !done.has(artifact.id));
  }

  private async execute(run: ActiveRun): Promise<RunReport> {
    try {
      await this.transition(run, RunState.LISTING);
      run.listing = await this.list();
      if (run.config.priorRunId) {
        run.excluded = await this.deps.store.listCommitted(run.config.priorRunId);
      }
      run.skippedAlreadyDone = run.listing.filter(artifact => run.excluded.has(artifact.id)).length;
      run.record = { ...run.record, total: run.listing.length, skippedAlreadyDone: run.skippedAlreadyDone };

      await this.transition(run, RunState.PARTITIONING);
      const todo = await this.outstanding(run);
      const estimate = estimateListing(todo);
      run.strategy = resolveStrategy(run.config, estimate);
      run.record = { ...run.record, strategy: run.strategy.name };
      logVerbose(
        `Run ${run.runId}: ${todo.length} of ${run.listing.length} artifacts to migrate ` +
          `(${formatBytes(estimate.totalBytes)}), ${run.skippedAlreadyDone} already done, ${run.strategy.name} strategy`
      );

      await this.transition(run, RunState.RUNNING);
      return await this.runSession(run, todo);
    } catch (error) {
      return this.fail(run, error);
    }
  }

  private async resumeSession(run: ActiveRun): Promise<RunReport> {
    try {
      await this.transition(run, RunState.RUNNING);
      await this.requeue(run.runId);
      return await this.runSession(run, await this.outstanding(run));
    } catch (error) {
      return this.fail(run, error);
    }
  }

  private async runSession(run: ActiveRun, todo: ArtifactDescriptor[]): Promise<RunReport> {
    const units = partition(todo, run.strategy);
    const groups = run.strategy.poolCount > 1 ? assignToPools(units, run.strategy.poolCount) : [units];

    run.pools = groups.map(
      () =>
        new WorkerPool({
          runId: run.runId,
          source: this.deps.source,
          target: this.deps.target,
          store: this.deps.store,
          limiter: run.limiter,
          classifier: run.classifier,
          sink: run.sink,
          maxRetries: run.strategy.maxRetries,
          memoryThreshold: run.config.memoryThreshold ?? DEFAULT_MEMORY_THRESHOLD,
          tempDir: run.config.tempDir ?? DEFAULT_TEMP_DIR,
          systemicFailureThreshold: run.config.systemicFailureThreshold,
          onSystemicFailure: reason => this.haltAll(run, reason),
        })
    );
    if (run.pauseRequested) {
      run.pools.forEach(pool => pool.cancel());
    }

    await Promise.all(run.pools.map((pool, i) => this.drain(run, pool, groups[i])));
    run.pools = [];

    if (run.failureReason !== undefined) {
      return this.finish(run, RunState.FAILED);
    }

    const records = await this.deps.store.listRecords(run.runId);
    const { remaining } = countRecords(this.listedIds(run), records, run.skippedAlreadyDone);
    return this.finish(run, run.pauseRequested && remaining > 0 ? RunState.PAUSED : RunState.COMPLETED);
  }

  private async drain(run: ActiveRun, pool: WorkerPool, units: WorkUnit[]): Promise<void> {
    for await (const outcome of pool.run(units, run.strategy.concurrencyLimit)) {
      if (isFinishedOutcome(outcome)) {
        run.processed++;
      }
      if (outcome.kind === TransferState.COMMITTED) {
        run.transferred.artifacts++;
        run.transferred.bytes += outcome.bytes;
      }
    }
  }

  private haltAll(run: ActiveRun, reason: string): void {
    if (run.failureReason !== undefined) {
      return;
    }
    run.failureReason = reason;
    run.pools.forEach(pool => pool.halt(reason));
  }

  private async transition(run: ActiveRun, to: RunState): Promise<void> {
    const from = run.record.state;
    assertRunTransition(from, to);
    run.record = { ...run.record, state: to };
    await this.deps.store.saveRun(run.record);
    run.sink.event(Events.RUN_STATE, { runId: run.runId, from, to });
    logVerbose(`Run ${run.runId}: ${from} -> ${to}`);
  }

  private closeSession(run: ActiveRun): void {
    if (run.sessionActive) {
      run.activeMs += Date.now() - run.sessionStartedAt;
      run.sessionActive = false;
    }
  }

  private async finish(run: ActiveRun, state: RunState): Promise<RunReport> {
    this.closeSession(run);
    const records = await this.deps.store.listRecords(run.runId);
    const report = buildReport({
      runId: run.runId,
      state,
      strategy: run.strategy.name,
      elapsedMs: run.activeMs,
      listedIds: this.listedIds(run),
      skippedAlreadyDone: run.skippedAlreadyDone,
      records,
      transferred: run.transferred,
      metrics: run.metrics,
      failureReason: run.failureReason,
    });

    await this.transition(run, state);
    run.record = {
      ...run.record,
      endedAt: new Date().toISOString(),
      failureReason: run.failureReason,
      report,
    };
    await this.deps.store.saveRun(run.record);
    return report;
  }

  /**
   * Move the run to failed and still resolve with a report
   */
  private async fail(run: ActiveRun, error: unknown): Promise<RunReport> {
    run.failureReason ??= errorMessageOf(error);
    logError(`Run ${run.runId} failed: ${run.failureReason}`, error);

    if (VALID_RUN_TRANSITIONS[run.record.state].includes(RunState.FAILED)) {
      try {
        return await this.finish(run, RunState.FAILED);
      } catch (finishError) {
        logError(`Could not record failure of run ${run.runId}`, finishError);
      }
    }

    this.closeSession(run);
    return buildReport({
      runId: run.runId,
      state: isTerminalRunState(run.record.state) ? run.record.state : RunState.FAILED,
      strategy: run.strategy.name,
      elapsedMs: run.activeMs,
      listedIds: this.listedIds(run),
      skippedAlreadyDone: run.skippedAlreadyDone,
      records: [],
      transferred: run.transferred,
      metrics: run.metrics,
      failureReason: run.failureReason,
    });
  }
}
