#!/usr/bin/env node

// Third-party dependencies
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';

// Local imports
import { loadConfig } from './config';
import { errorMessageOf } from './errors';
import { displayHelp } from './help';
import { runMigration } from './migrate';
import { showRunStatus } from './status';
import { RunState } from './types';

// Types
import type { StrategyHint } from './types';

// Package info
import { name, version } from '../package.json';

interface MigrateOptions {
  resume?: string;
  priorRun?: string;
  strategy?: StrategyHint;
  concurrency?: number;
  maxRetries?: number;
  prefix?: string;
  dryRun?: boolean;
  yes?: boolean;
  verbose?: boolean;
  logFile?: string;
}

interface StatusOptions {
  verbose?: boolean;
}

function parseInteger(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer of at least ${min}.`);
    }
    return parsed;
  };
}

function parseStrategy(value: string): StrategyHint {
  const hints: StrategyHint[] = ['auto', 'small', 'medium', 'large'];
  const hint = hints.find(candidate => candidate === value);
  if (!hint) {
    throw new InvalidArgumentError(`Expected one of ${hints.join(', ')}.`);
  }
  return hint;
}

function fail(error: unknown): never {
  console.error(chalk.red.bold('Error:'), chalk.red(errorMessageOf(error)));
  process.exit(1);
}

// Create the command line program
const program = new Command();

// Main command
program
  .name(name)
  .version(version)
  .description('A CLI tool for resumable, verified migration of artifacts between S3 compatible buckets')
  .argument('<config-file>', 'Path to the migration configuration file (YAML or JSON)')
  .option('-r, --resume <runId>', 'Continue an interrupted or paused run')
  .option('--prior-run <runId>', 'Skip artifacts already committed by an earlier run')
  .option('-s, --strategy <name>', 'Scale strategy: auto, small, medium or large', parseStrategy)
  .option('-c, --concurrency <number>', 'Number of concurrent transfers per pool', parseInteger(1))
  .option('--max-retries <number>', 'Retries per artifact after the first attempt', parseInteger(0))
  .option('-p, --prefix <prefix>', 'Only migrate artifacts with this prefix')
  .option('-d, --dry-run', 'List and plan only (no actual transfers)')
  .option('-y, --yes', 'Skip confirmation prompts and proceed with migration')
  .option('-v, --verbose', 'Enable verbose logging with detailed error messages')
  .option('-l, --log-file <path>', 'Save logs to the specified file')
  .action(async (configFile: string, options: MigrateOptions) => {
    try {
      // Load configuration
      const config = loadConfig(configFile);

      // Override config with command line options
      if (options.resume) {
        config.runId = options.resume;
      }
      if (options.priorRun) {
        config.priorRunId = options.priorRun;
      }
      if (options.strategy) {
        config.strategyHint = options.strategy;
      }
      if (options.concurrency !== undefined) {
        config.concurrencyLimit = options.concurrency;
      }
      if (options.maxRetries !== undefined) {
        config.maxRetries = options.maxRetries;
      }
      if (options.prefix) {
        config.prefix = options.prefix;
      }
      if (options.dryRun) {
        config.dryRun = true;
      }
      if (options.yes) {
        config.skipConfirmation = true;
      }
      if (options.verbose) {
        config.verbose = true;
      }
      if (options.logFile) {
        config.logFile = options.logFile;
      }

      // Run migration
      const report = await runMigration(config);
      if (report?.state === RunState.FAILED) {
        process.exitCode = 1;
      }
    } catch (error) {
      fail(error);
    }
  });

// Status command
program
  .command('status')
  .description('Show counts and failed artifacts of a run from the checkpoint database')
  .argument('<config-file>', 'Path to the migration configuration file (YAML or JSON)')
  .argument('<runId>', 'Run to inspect')
  .option('-v, --verbose', 'Enable verbose logging with detailed error messages')
  .action(async (configFile: string, runId: string, options: StatusOptions) => {
    try {
      const config = loadConfig(configFile);
      if (options.verbose) {
        config.verbose = true;
      }
      await showRunStatus(config, runId);
    } catch (error) {
      fail(error);
    }
  });

// Help command
program
  .command('help [topic]')
  .description('Display help information about specific topics')
  .action((topic?: string) => {
    displayHelp(topic, name);
  });

// Add examples
program.addHelpText('after', `
Examples:
  $ ${name} ./migration.yaml
  $ ${name} ./migration.json --dry-run
  $ ${name} ./migration.yaml --strategy large --concurrency 32
  $ ${name} ./migration.yaml --resume 6f1c2a8e-0b7d-4e55-9a39-2f0d7c1b9e44
  $ ${name} ./migration.yaml --prior-run 6f1c2a8e-0b7d-4e55-9a39-2f0d7c1b9e44
  $ ${name} status ./migration.yaml 6f1c2a8e-0b7d-4e55-9a39-2f0d7c1b9e44
  $ ${name} help config
  $ ${name} help strategies
  $ ${name} help resume
  $ ${name} help errors
`);

// Parse command line arguments
program.parseAsync().catch(fail);
