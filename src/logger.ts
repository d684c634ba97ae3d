// Node.js built-in modules
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// Third-party dependencies
import chalk from 'chalk';
import * as fsExtra from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';

// Local imports
import { errorMessageOf } from './errors';

// Types
import type { MigrationConfig } from './types';

// Log levels
export enum LogLevel {
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  DEBUG = 'DEBUG',
}

const CONSOLE_STYLES: Record<LogLevel, (text: string) => string> = {
  [LogLevel.INFO]: chalk.blue,
  [LogLevel.SUCCESS]: chalk.green,
  [LogLevel.WARNING]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.DEBUG]: chalk.gray,
};

export type LoggerOptions = Pick<MigrationConfig, 'logFile' | 'verbose'> & {
  silent?: boolean; // Suppress console output entirely (file logging still applies)
};

let options: LoggerOptions | null = null;
let logStream: fs.WriteStream | null = null;
let executionId = '-';

/**
 * Plain log-file line. The execution id ties together lines of one process
 * when several runs append to the same file.
 */
export function formatLine(level: LogLevel | 'ERROR_DETAILS', message: string, at = new Date()): string {
  return `[${at.toISOString()}] [${level}] [${executionId}] ${message}`;
}

function banner(title: string): string {
  const rule = '='.repeat(80);
  return [rule, `== ${title} ==`, `== Execution ID: ${executionId} ==`, rule].join('\n');
}

/**
 * Initialize the logger with the given options
 */
export function initLogger(loggerOptions: LoggerOptions): void {
  options = loggerOptions;
  executionId = uuidv4().slice(0, 8);

  if (!options.logFile) {
    return;
  }

  try {
    fsExtra.ensureDirSync(path.dirname(path.resolve(options.logFile)));
    logStream = fs.createWriteStream(options.logFile, { flags: 'a' });

    const processInfo = `PID: ${process.pid}, User: ${process.env.USERNAME || process.env.USER || 'unknown'}`;
    const systemInfo = `OS: ${os.platform()} ${os.release()}, Hostname: ${os.hostname()}`;
    logStream.write(`\n${banner(`ARTIFACT MIGRATION STARTED AT ${new Date().toISOString()}`)}\n`);
    logStream.write(`== ${processInfo} ==\n== ${systemInfo} ==\n\n`);
  } catch (error) {
    // Console logging still works without the file
    console.error(chalk.red(`Failed to open log file: ${errorMessageOf(error)}`));
    logStream = null;
  }
}

/**
 * Close the logger and release resources
 */
export function closeLogger(): void {
  if (logStream) {
    logStream.write(`\n${banner(`ARTIFACT MIGRATION FINISHED AT ${new Date().toISOString()}`)}\n`);
    logStream.end();
    logStream = null;
  }
  options = null;
}

/**
 * Log a message with the specified level
 */
export function log(level: LogLevel, message: string, skipConsole = false): void {
  logStream?.write(formatLine(level, message) + '\n');

  if (skipConsole || options?.silent) {
    return;
  }
  // Debug lines reach the console only in verbose mode
  if (level === LogLevel.DEBUG && !options?.verbose) {
    return;
  }

  console.log(CONSOLE_STYLES[level](`[${level}] ${message}`));
}

/**
 * Log an error, with the cause's stack written to the log file (and to the
 * console in verbose mode)
 */
export function logError(message: string, cause?: unknown, skipConsole = false): void {
  log(LogLevel.ERROR, message, skipConsole);

  if (cause === undefined) {
    return;
  }

  const details =
    cause instanceof Error
      ? `${cause.name}: ${cause.message}\n${cause.stack || '(No stack trace)'}`
      : errorMessageOf(cause);

  logStream?.write(formatLine('ERROR_DETAILS', details) + '\n');
  if (options?.verbose && !options.silent && !skipConsole) {
    console.log(chalk.red(details));
  }
}

export function logVerbose(message: string): void {
  log(LogLevel.DEBUG, message);
}

export function logSuccess(message: string): void {
  log(LogLevel.SUCCESS, message);
}

export function logWarning(message: string): void {
  log(LogLevel.WARNING, message);
}

/**
 * Log an info message with custom color
 */
export function logInfo(message: string, color?: (message: string) => string): void {
  log(LogLevel.INFO, color ? color(message) : message);
}

/**
 * File only. Used for per-artifact lines that would fight with the progress bar.
 */
export function logSilent(message: string, level: LogLevel = LogLevel.INFO): void {
  log(level, message, true);
}
