// Third-party dependencies
import chalk from 'chalk';
import cliProgress from 'cli-progress';
import inquirer from 'inquirer';
import ora from 'ora';

// Local imports
import { MigrationController } from './controller';
import { errorMessageOf } from './errors';
import { closeLogger, initLogger, log, logError, logInfo, LogLevel, logWarning } from './logger';
import { Events, fanOut, LoggingSink } from './observability';
import { printSummary } from './report';
import { createS3Client, S3Source, S3Target } from './s3-client';
import { SqliteCheckpointStore } from './sqlite-checkpoint-store';
import { RunState } from './types';
import { formatBytes, formatSpeed } from './utils';

// Types
import type { MigrationPlan } from './controller';
import type { EventFields, ObservabilitySink } from './observability';
import type { MigrationConfig, RunReport } from './types';

/**
 * Drives the overall progress bar from artifact events
 */
class ProgressSink implements ObservabilitySink {
  private bar: cliProgress.SingleBar | undefined;
  private bytes = 0;
  private startedAt = 0;

  start(total: number): void {
    this.bar = new cliProgress.SingleBar(
      {
        clearOnComplete: false,
        hideCursor: true,
        format: ' {bar} | {percentage}% | {value}/{total} | {status} | {speed}',
      },
      cliProgress.Presets.shades_grey
    );
    this.startedAt = Date.now();
    this.bar.start(total, 0, { status: chalk.blue('In Progress'), speed: '' });
  }

  stop(): void {
    this.bar?.stop();
    this.bar = undefined;
  }

  count(): void {
    // Counters are not shown on the bar
  }

  timing(): void {
    // Timings are not shown on the bar
  }

  event(name: string, fields: EventFields): void {
    if (!this.bar) {
      return;
    }

    if (name === Events.ARTIFACT_COMMITTED) {
      this.bytes += typeof fields.bytes === 'number' ? fields.bytes : 0;
      const seconds = (Date.now() - this.startedAt) / 1000;
      this.bar.increment(1, {
        status: chalk.green('Committed'),
        speed: seconds > 0 ? formatSpeed(this.bytes / seconds) : '',
      });
    } else if (name === Events.ARTIFACT_FAILED) {
      this.bar.increment(1, { status: chalk.red('Failed') });
    } else if (name === Events.RUN_STATE && fields.to === RunState.PAUSED) {
      this.bar.update({ status: chalk.yellow('Paused') });
    }
  }
}

function printConfiguration(config: MigrationConfig): void {
  logInfo('Starting artifact migration...', chalk.cyan);
  logInfo(`Source: ${config.source.endpoint}/${config.source.bucket}`, chalk.cyan);
  logInfo(`Target: ${config.target.endpoint}/${config.target.bucket}`, chalk.cyan);
  logInfo(`Checkpoint database: ${config.checkpoint.path}`, chalk.white);
  logInfo(`Strategy: ${config.strategyHint ?? 'auto'}`, chalk.white);

  if (config.runId) {
    logInfo(`Resuming run: ${config.runId}`, chalk.magenta);
  }
  if (config.priorRunId) {
    logInfo(`Skipping artifacts committed by run: ${config.priorRunId}`, chalk.magenta);
  }
  if (config.prefix) {
    logInfo(`Prefix: ${config.prefix}`, chalk.cyan);
  }
  if (config.include && config.include.length > 0) {
    logInfo(`Include patterns: ${config.include.join(', ')}`, chalk.cyan);
  }
  if (config.exclude && config.exclude.length > 0) {
    logInfo(`Exclude patterns: ${config.exclude.join(', ')}`, chalk.cyan);
  }
  logInfo('', chalk.white);
}

function printPlan(plan: MigrationPlan): void {
  const { strategy } = plan;

  logInfo('Migration Plan', chalk.cyanBright.bold);
  logInfo('─'.repeat(50), chalk.white);
  logInfo(`Strategy:           ${strategy.name}`, chalk.magenta);
  logInfo(`Artifacts:          ${plan.estimate.artifactCount} (${formatBytes(plan.estimate.totalBytes)})`, chalk.white);
  if (plan.skippedAlreadyDone > 0) {
    logInfo(`Already done:       ${plan.skippedAlreadyDone}`, chalk.gray);
  }
  logInfo(`Batches:            ${plan.units.length} across ${plan.pools.length} pool(s)`, chalk.white);
  logInfo(`Concurrency:        ${strategy.concurrencyLimit} per pool`, chalk.white);
  logInfo(`Max Retries:        ${strategy.maxRetries}`, chalk.white);

  const sample = plan.units.flatMap(unit => unit.artifacts).slice(0, 10);
  if (sample.length > 0) {
    logInfo('\nArtifacts to migrate (showing first 10):', chalk.cyan);
    for (const artifact of sample) {
      logInfo(`  - ${artifact.id} (${formatBytes(artifact.size)})`, chalk.white);
    }
    if (plan.estimate.artifactCount > sample.length) {
      logInfo(`  ... and ${plan.estimate.artifactCount - sample.length} more artifacts`, chalk.white);
    }
  }
  logInfo('', chalk.white);
}

/**
 * Run a migration from the command line. Resolves with the run report, or
 * undefined when nothing was started.
 */
export async function runMigration(config: MigrationConfig): Promise<RunReport | undefined> {
  // Initialize logger
  initLogger(config);
  const store = new SqliteCheckpointStore({ path: config.checkpoint.path });

  try {
    const source = new S3Source(createS3Client(config.source), config.source.bucket, {
      prefix: config.prefix,
      include: config.include,
      exclude: config.exclude,
    });
    const target = new S3Target(createS3Client(config.target), config.target.bucket, {
      multipartThreshold: config.multipartThreshold,
    });

    const progress = new ProgressSink();
    const controller = new MigrationController({
      source,
      target,
      store,
      sink: fanOut(new LoggingSink(), progress),
    });

    if (config.dryRun) {
      logWarning('DRY RUN MODE - No artifacts will be transferred');
    }
    printConfiguration(config);

    // List and partition
    const spinner = ora('Listing artifacts from source bucket...').start();
    let plan: MigrationPlan;
    try {
      plan = await controller.plan(config);
      spinner.succeed(`Found ${chalk.bold(plan.listed.toString())} artifacts in source bucket`);
    } catch (error) {
      spinner.fail(`Failed to list artifacts: ${errorMessageOf(error)}`);
      throw error;
    }

    printPlan(plan);

    if (config.dryRun) {
      return undefined;
    }

    if (plan.estimate.artifactCount === 0) {
      logWarning('No artifacts to migrate. Exiting.');
      return undefined;
    }

    // Ask user for confirmation before proceeding (unless skipConfirmation is true)
    if (!config.skipConfirmation) {
      const { confirmMigration } = await inquirer.prompt<{ confirmMigration: boolean }>([
        {
          type: 'confirm',
          name: 'confirmMigration',
          message: `Do you want to proceed with migrating ${chalk.bold(plan.estimate.artifactCount.toString())} artifacts?`,
          default: false,
        },
      ]);

      if (!confirmMigration) {
        logWarning('Migration cancelled by user.');
        return undefined;
      }
    } else {
      log(LogLevel.INFO, `Proceeding with migration of ${plan.estimate.artifactCount} artifacts (confirmation skipped)`, true);
    }

    const handle = await controller.start(config);
    logInfo(`Run ID: ${handle.runId}`, chalk.magenta);

    // Ctrl+C pauses; in-flight artifacts roll back to pending
    const onInterrupt = (): void => {
      logWarning('Interrupt received, pausing migration...');
      controller.pause(handle.runId).catch((error: unknown) => {
        logError(`Failed to pause run ${handle.runId}: ${errorMessageOf(error)}`);
      });
    };
    process.once('SIGINT', onInterrupt);

    progress.start(plan.estimate.artifactCount);
    let report: RunReport;
    try {
      report = await handle.done;
    } finally {
      progress.stop();
      process.off('SIGINT', onInterrupt);
    }

    logInfo('', chalk.white);
    printSummary(report);
    return report;
  } finally {
    await store.close();
    closeLogger();
  }
}
