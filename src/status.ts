// Third-party dependencies
import chalk from 'chalk';

// Local imports
import { readRunStatus } from './controller';
import { closeLogger, initLogger, logError, logInfo, logWarning } from './logger';
import { SqliteCheckpointStore } from './sqlite-checkpoint-store';
import { TransferState } from './types';
import { formatTime } from './utils';

// Types
import type { MigrationConfig, RunStatus } from './types';

/**
 * Print the persisted state of a run, with every failed artifact so a
 * targeted re-run can be planned
 */
export async function showRunStatus(config: MigrationConfig, runId: string): Promise<RunStatus> {
  initLogger(config);
  const store = new SqliteCheckpointStore({ path: config.checkpoint.path });

  try {
    const status = await readRunStatus(store, runId);
    const { counts } = status;

    logInfo(`Run ${status.runId}`, chalk.cyanBright.bold);
    logInfo('─'.repeat(50), chalk.white);
    logInfo(`State:              ${status.state}`, chalk.magenta);
    logInfo(`Strategy:           ${status.strategy ?? '-'}`, chalk.white);
    logInfo(`Total artifacts:    ${status.total}`, chalk.white);
    logInfo(`Committed:          ${counts.committed}`, chalk.green);
    logInfo(`Already done:       ${counts.skippedAlreadyDone}`, chalk.gray);
    logInfo(`Failed (retryable): ${counts.failedRetryable}`, chalk.yellow);
    logInfo(`Failed (fatal):     ${counts.failedFatal}`, chalk.redBright);
    logInfo(`Remaining:          ${counts.remaining}`, chalk.white);
    logInfo(`Elapsed:            ${formatTime(Math.floor(status.elapsedMs / 1000))}`, chalk.white);
    if (status.report?.failureReason) {
      logError(`Failure reason: ${status.report.failureReason}`);
    }

    const failed = await store.listRecords(runId, [TransferState.FAILED_RETRYABLE, TransferState.FAILED_FATAL]);
    if (failed.length > 0) {
      logInfo('', chalk.white);
      logWarning('Failed artifacts:');
      for (const record of failed) {
        logInfo(
          `  ✗ ${record.artifactId} [${record.state}, ${record.attemptCount} attempts] ` +
            `${record.lastErrorClass ?? 'Error'}: ${record.lastErrorMessage ?? 'Unknown error'}`,
          chalk.red
        );
      }
    }

    return status;
  } finally {
    await store.close();
    closeLogger();
  }
}
