// Third-party dependencies
import chalk from 'chalk';

// Define help topic interface
export interface HelpTopic {
  title: string;
  content: string;
  examples?: string[]; // Arguments after the program name
}

// Define help topics
export const helpTopics: Record<string, HelpTopic> = {
  config: {
    title: 'Configuration File Format',
    content: `
Configuration File (YAML or JSON):
  source:
    endpoint: 'https://s3.amazonaws.com'
    accessKey: 'YOUR_SOURCE_ACCESS_KEY'
    secretKey: 'YOUR_SOURCE_SECRET_KEY'
    region: 'us-east-1'
    bucket: 'source-bucket-name'
    forcePathStyle: false

  target:
    endpoint: 'https://storage.example.com'
    accessKey: 'YOUR_TARGET_ACCESS_KEY'
    secretKey: 'YOUR_TARGET_SECRET_KEY'
    region: 'eu-west-1'
    bucket: 'target-bucket-name'
    forcePathStyle: true

  checkpoint:
    path: './.artifact-migrate/checkpoints.sqlite'

  # Optional parameters
  strategyHint: 'auto'         # 'auto', 'small', 'medium' or 'large'
  concurrencyLimit: 10         # Overrides the strategy's concurrency
  batchArtifactCount: 100
  batchByteSize: 1073741824    # 1GB
  maxRetries: 3                # Retries after the first attempt
  backoffBaseMs: 500
  backoffFactor: 2
  maxBackoffMs: 30000
  rateLimitSource: 50          # Requests per second against the source
  rateLimitTarget: 20          # Requests per second against the target
  rateLimitTimeoutMs: 60000
  memoryThreshold: 104857600   # Larger artifacts are spooled to tempDir
  tempDir: './tmp'
  multipartThreshold: 67108864 # Larger uploads use multipart
  systemicFailureThreshold: 5
  poolCount: 4                 # Large strategy only

  prefix: 'data/'
  include:
    - "\\.tar\\.gz$"
  exclude:
    - '^tmp/'

  skipConfirmation: false
  verbose: false
  logFile: "./logs/migration.log"
  dryRun: false
    `,
    examples: ['./migration.yaml --dry-run', './migration.json --log-file ./logs/migration.log'],
  },
  strategies: {
    title: 'Scale Strategies',
    content: `
Scale Strategies:
  Every strategy runs the same transfer protocol; they differ only in batch
  size, concurrency and the number of worker pools.

  - small:  up to 100MB in total
    * One artifact at a time, one artifact per batch

  - medium: up to 100GB in total
    * 10 concurrent transfers, batches of 100 artifacts or 1GB

  - large:  above 100GB
    * 4 independent pools of 16 transfers each
    * Batches of 1000 artifacts or 10GB, completed in any order

  - auto: (Default) Pick one of the above from the listed size

  Any individual parameter can be overridden in the configuration file or
  with --concurrency and --max-retries.
    `,
    examples: ['./migration.yaml --strategy small', './migration.yaml --strategy large --concurrency 32'],
  },
  resume: {
    title: 'Pausing and Resuming',
    content: `
Pausing and Resuming:
  Every artifact's progress is recorded in the checkpoint database
  (checkpoint.path). Press Ctrl+C during a migration to pause it: transfers in
  flight stop at their next step and go back to pending.

  - --resume <runId>
    Continue the same run. Committed artifacts are never transferred again;
    artifacts that were in flight when the process stopped are requeued.

  - --prior-run <runId>
    Start a new run that skips everything the prior run committed.

  Both options list the source again. Artifacts recorded in the run that are
  no longer listed are reported as "no longer listed".

  Use "status <config> <runId>" to see the counts and failures of any run.
    `,
    examples: ['./migration.yaml --resume <runId>', './migration.yaml --prior-run <runId>', 'status ./migration.yaml <runId>'],
  },
  errors: {
    title: 'Failures and Retries',
    content: `
Failures and Retries:
  - Transient errors (network, throttling, 5xx) are retried with exponential
    backoff up to maxRetries. Artifacts that run out of retries are reported
    as "Failed (retryable)" and are attempted again by --resume.

  - Integrity errors (size or checksum mismatch), authorization failures and
    malformed requests are fatal and never retried.

  - An authorization failure, or systemicFailureThreshold artifacts in a row
    exhausting their retries against the target, stops the run: no new
    transfers start, those in flight finish, and the run is marked failed.
    `,
    examples: ['./migration.yaml --max-retries 5 --verbose', 'status ./migration.yaml <runId>'],
  },
};

function topicIndex(programName: string): string[] {
  const width = Math.max(...Object.keys(helpTopics).map(key => key.length));
  return [
    chalk.blue.bold(`${programName} Help`),
    chalk.blue('─'.repeat(50)),
    'Available help topics:',
    ...Object.entries(helpTopics).map(([key, topic]) => `  ${chalk.yellow(key.padEnd(width))}  ${topic.title}`),
    '',
    `Use: ${chalk.yellow(`${programName} help <topic>`)} for detailed information`,
  ];
}

/**
 * Lines printed by `help [topic]`. An unknown topic gets the topic index
 * after the error line.
 */
export function renderHelp(topic: string | undefined, programName: string): string[] {
  if (topic === undefined) {
    return topicIndex(programName);
  }

  const entry = Object.prototype.hasOwnProperty.call(helpTopics, topic) ? helpTopics[topic] : undefined;
  if (!entry) {
    return [chalk.red(`Unknown help topic: ${topic}`), '', ...topicIndex(programName)];
  }

  const lines = [chalk.blue.bold(entry.title), chalk.blue('─'.repeat(50)), entry.content.replace(/\s+$/, '')];
  if (entry.examples && entry.examples.length > 0) {
    lines.push('', 'Examples:', ...entry.examples.map(example => `  $ ${programName} ${example}`));
  }
  return lines;
}

export function displayHelp(topic: string | undefined, programName: string): void {
  renderHelp(topic, programName).forEach(line => console.log(line));
}
