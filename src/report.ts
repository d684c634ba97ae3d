// Third-party dependencies
import chalk from 'chalk';

// Local imports
import { log, logError, logInfo, LogLevel, logSuccess, logWarning } from './logger';
import { Metrics } from './observability';
import { SOURCE_BUCKET, TARGET_BUCKET } from './rate-limiter';
import { RunState, TransferState } from './types';
import { formatBytes, formatSpeed, formatTime } from './utils';

// Types
import type { MetricsRecorder } from './observability';
import type { FailureDetail, RunCounts, RunReport, StrategyName, TransferRecord } from './types';

export interface TransferTotals {
  artifacts: number;
  bytes: number;
}

export interface ReportInput {
  runId: string;
  state: RunState;
  strategy: StrategyName;
  elapsedMs: number;
  /** Every artifact id of the listing snapshot, including ones a prior run committed */
  listedIds: readonly string[];
  /** Listed artifacts excluded because a prior run already committed them */
  skippedAlreadyDone: number;
  records: readonly TransferRecord[];
  /** Committed by this controller; earlier processes' commits fall outside `elapsedMs` */
  transferred: TransferTotals;
  metrics?: MetricsRecorder;
  failureReason?: string;
}

/**
 * Tally stored records against the listing snapshot. The checkpoint store is
 * the source of truth; in-memory counters only feed the rate-limit figures.
 */
export function countRecords(
  listedIds: readonly string[],
  records: readonly TransferRecord[],
  skippedAlreadyDone: number
): RunCounts {
  const listed = new Set(listedIds);
  const counts: RunCounts = {
    committed: 0,
    failedRetryable: 0,
    failedFatal: 0,
    skippedAlreadyDone,
    remaining: 0,
    vanished: 0,
  };

  for (const record of records) {
    if (!listed.has(record.artifactId)) {
      counts.vanished++;
      continue;
    }
    switch (record.state) {
      case TransferState.COMMITTED:
        counts.committed++;
        break;
      case TransferState.FAILED_RETRYABLE:
        counts.failedRetryable++;
        break;
      case TransferState.FAILED_FATAL:
        counts.failedFatal++;
        break;
      default:
        break;
    }
  }

  counts.remaining = Math.max(
    0,
    listed.size - skippedAlreadyDone - counts.committed - counts.failedRetryable - counts.failedFatal
  );
  return counts;
}

export function buildReport(input: ReportInput): RunReport {
  const listed = new Set(input.listedIds);
  const counts = countRecords(input.listedIds, input.records, input.skippedAlreadyDone);

  const failures: FailureDetail[] = [];
  for (const record of input.records) {
    if (!listed.has(record.artifactId)) {
      continue;
    }
    if (record.state === TransferState.FAILED_RETRYABLE || record.state === TransferState.FAILED_FATAL) {
      failures.push({
        artifactId: record.artifactId,
        state: record.state,
        attempts: record.attemptCount,
        errorClass: record.lastErrorClass,
        errorMessage: record.lastErrorMessage,
      });
    }
  }
  failures.sort((a, b) => a.artifactId.localeCompare(b.artifactId));

  const { transferred } = input;
  const seconds = input.elapsedMs / 1000;
  return {
    runId: input.runId,
    state: input.state,
    strategy: input.strategy,
    total: listed.size,
    counts,
    bytesTransferred: transferred.bytes,
    elapsedMs: input.elapsedMs,
    throughput: {
      artifactsPerSecond: seconds > 0 ? transferred.artifacts / seconds : 0,
      bytesPerSecond: seconds > 0 ? transferred.bytes / seconds : 0,
    },
    rateLimitWaitMs: {
      [SOURCE_BUCKET]: input.metrics?.get(Metrics.RATE_LIMIT_WAIT, { bucket: SOURCE_BUCKET }) ?? 0,
      [TARGET_BUCKET]: input.metrics?.get(Metrics.RATE_LIMIT_WAIT, { bucket: TARGET_BUCKET }) ?? 0,
    },
    failures,
    failureReason: input.failureReason,
  };
}

const MAX_LISTED_FAILURES = 20;

/**
 * Print final summary
 */
export function printSummary(report: RunReport): void {
  const { counts } = report;
  const elapsedSeconds = Math.floor(report.elapsedMs / 1000);

  logInfo('Migration Summary', chalk.cyanBright.bold);
  logInfo('─'.repeat(50), chalk.white);
  logInfo(`Run ID:             ${report.runId}`, chalk.white);
  logInfo(`Strategy:           ${report.strategy}`, chalk.white);
  logInfo(`Total artifacts:    ${report.total.toString()}`, chalk.white);
  logInfo(`Committed:          ${counts.committed.toString()}`, chalk.green);
  logInfo(`Already done:       ${counts.skippedAlreadyDone.toString()}`, chalk.gray);
  logInfo(`Failed (retryable): ${counts.failedRetryable.toString()}`, chalk.yellow);
  logInfo(`Failed (fatal):     ${counts.failedFatal.toString()}`, chalk.redBright);
  logInfo(`Remaining:          ${counts.remaining.toString()}`, chalk.white);
  if (counts.vanished > 0) {
    logInfo(`No longer listed:   ${counts.vanished.toString()}`, chalk.gray);
  }
  logInfo(`Transferred:        ${formatBytes(report.bytesTransferred)}`, chalk.white);
  logInfo(`Throughput:         ${formatSpeed(report.throughput.bytesPerSecond)}`, chalk.white);
  logInfo(`Total time:         ${formatTime(elapsedSeconds)}`, chalk.white);

  const waited = Object.entries(report.rateLimitWaitMs).filter(([, ms]) => ms > 0);
  if (waited.length > 0) {
    logInfo(
      `Rate limit wait:    ${waited.map(([bucket, ms]) => `${bucket} ${formatTime(Math.round(ms / 1000))}`).join(', ')}`,
      chalk.white
    );
  }

  // Add detailed summary to log file
  log(
    LogLevel.INFO,
    `Migration Summary - Run: ${report.runId}, State: ${report.state}, Total: ${report.total}, ` +
      `Committed: ${counts.committed}, Already done: ${counts.skippedAlreadyDone}, ` +
      `Failed (retryable): ${counts.failedRetryable}, Failed (fatal): ${counts.failedFatal}, ` +
      `Remaining: ${counts.remaining}, Time: ${formatTime(elapsedSeconds)}`,
    true
  );

  if (report.failures.length > 0) {
    logInfo('', chalk.white);
    logWarning('Failed artifacts:');

    for (const failure of report.failures.slice(0, MAX_LISTED_FAILURES)) {
      const label = failure.state === TransferState.FAILED_FATAL ? 'fatal' : `gave up after ${failure.attempts} attempts`;
      logError(`  ✗ ${failure.artifactId} (${label}: ${failure.errorMessage ?? failure.errorClass ?? 'Unknown error'})`);
    }
    if (report.failures.length > MAX_LISTED_FAILURES) {
      logInfo(`  ... and ${report.failures.length - MAX_LISTED_FAILURES} more`, chalk.white);
    }
  }

  logInfo('', chalk.white);

  if (report.state === RunState.PAUSED) {
    logWarning(`⏸ Migration paused. Resume with --resume ${report.runId}`);
  } else if (report.state === RunState.FAILED) {
    logError(`✗ Migration failed: ${report.failureReason ?? 'unknown reason'}`);
  } else if (report.failures.length === 0 && counts.remaining === 0) {
    logSuccess('✓ Migration completed successfully!');
  } else {
    logWarning('⚠ Migration completed with some issues.');
  }
}
