import type { Readable } from 'node:stream';

export interface S3Credentials {
  endpoint: string;
  accessKey: string;
  secretKey: string;
  region: string;
  bucket: string;
  // Optional parameters
  forcePathStyle?: boolean;
}

export type DigestAlgorithm = 'md5' | 'sha256';

export interface Checksum {
  algorithm: DigestAlgorithm;
  value: string; // lowercase hex
}

/**
 * One logical object to migrate, as reported by the source listing
 */
export interface ArtifactDescriptor {
  id: string; // Stable store-relative key, primary key for all state tracking
  size: number; // Declared size in bytes
  checksum?: Checksum; // Declared checksum when the source exposes one
  contentType?: string;
  metadata?: Record<string, string>;
}

// Persisted per-artifact transfer state
export enum TransferState {
  PENDING = 'pending',
  IN_PROGRESS = 'in_progress',
  VALIDATED = 'validated', // Source and target digests both verified, not yet committed
  COMMITTED = 'committed',
  FAILED_RETRYABLE = 'failed_retryable', // Retry budget exhausted
  FAILED_FATAL = 'failed_fatal',
}

export interface TransferRecord {
  runId: string;
  artifactId: string;
  state: TransferState;
  attemptCount: number;
  lastAttemptAt?: string; // ISO timestamp
  lastErrorClass?: string;
  lastErrorMessage?: string;
  checksum?: string; // sha256 computed while reading from the source
  size?: number;
  updatedAt: string;
}

// Run lifecycle
export enum RunState {
  CREATED = 'created',
  LISTING = 'listing',
  PARTITIONING = 'partitioning',
  RUNNING = 'running',
  PAUSED = 'paused',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

export type StrategyName = 'small' | 'medium' | 'large';
export type StrategyHint = StrategyName | 'auto';

/**
 * Parameters that distinguish the scale strategies. The transfer protocol is
 * the same for all of them.
 */
export interface StrategyParams {
  name: StrategyName;
  concurrencyLimit: number; // Slots per pool
  batchArtifactCount: number;
  batchByteSize: number;
  maxRetries: number;
  poolCount: number; // Independent pool instances sharing the store and limiter
}

/**
 * Engine configuration accepted by MigrationController.start
 */
export interface EngineConfig {
  strategyHint?: StrategyHint;
  concurrencyLimit?: number;
  batchArtifactCount?: number;
  batchByteSize?: number;
  maxRetries?: number;
  backoffBaseMs?: number;
  backoffFactor?: number;
  maxBackoffMs?: number;
  rateLimitSource?: number; // tokens per second
  rateLimitTarget?: number; // tokens per second
  rateLimitTimeoutMs?: number;
  memoryThreshold?: number; // Artifacts larger than this are spooled to disk
  tempDir?: string;
  systemicFailureThreshold?: number; // Consecutive exhausted target failures before the run fails
  poolCount?: number;
  runId?: string; // Continue an existing run
  priorRunId?: string; // Exclude what an earlier run committed
}

export interface SizeEstimate {
  artifactCount: number;
  totalBytes: number;
}

export interface WorkUnit {
  index: number;
  artifacts: ArtifactDescriptor[];
  totalBytes: number;
}

// What a source hands back for one artifact
export interface SourceObject {
  body: Readable;
  size: number;
  checksum?: Checksum;
  contentType?: string;
  metadata: Record<string, string>;
}

export interface WriteMetadata {
  size: number;
  contentType?: string;
  metadata: Record<string, string>;
  checksums: Record<DigestAlgorithm, string>;
}

// What a target reports after a write
export interface WriteConfirmation {
  id: string;
  size: number;
  checksum: Checksum;
  contentType?: string;
}

/**
 * Read-only source collaborator
 */
export interface ArtifactSource {
  list(): AsyncIterable<ArtifactDescriptor>;
  read(id: string): Promise<SourceObject>;
}

/**
 * Write-only target collaborator
 */
export interface ArtifactTarget {
  write(id: string, body: Readable, metadata: WriteMetadata): Promise<WriteConfirmation>;
}

export type OutcomeKind =
  | TransferState.COMMITTED
  | TransferState.FAILED_RETRYABLE
  | TransferState.FAILED_FATAL
  | 'requeued' // Cancelled at a step boundary and rolled back to pending
  | 'skipped' // Already terminal in the checkpoint store
  | 'conflict'; // Another writer holds the record

export interface TransferOutcome {
  artifactId: string;
  batchIndex: number;
  kind: OutcomeKind;
  attempts: number;
  bytes: number;
  durationMs: number;
  errorClass?: string;
  errorMessage?: string;
  stage?: TransferStage;
  systemic?: boolean;
}

export type TransferStage = 'claim' | 'source' | 'validate' | 'target' | 'verify' | 'commit';

export interface FailureDetail {
  artifactId: string;
  state: TransferState.FAILED_RETRYABLE | TransferState.FAILED_FATAL;
  attempts: number;
  errorClass?: string;
  errorMessage?: string;
}

export interface RunCounts {
  committed: number;
  failedRetryable: number;
  failedFatal: number;
  skippedAlreadyDone: number;
  remaining: number; // Listed but neither committed nor failed, e.g. after a pause
  vanished: number; // Records of this run whose artifact is no longer listed
}

export interface RunReport {
  runId: string;
  state: RunState;
  strategy: StrategyName;
  total: number;
  counts: RunCounts;
  bytesTransferred: number; // Committed by this process; throughput covers the same artifacts
  elapsedMs: number;
  throughput: {
    artifactsPerSecond: number;
    bytesPerSecond: number;
  };
  rateLimitWaitMs: Record<string, number>;
  failures: FailureDetail[];
  failureReason?: string;
}

export interface RunRecord {
  runId: string;
  state: RunState;
  strategy?: StrategyName;
  priorRunId?: string;
  total: number;
  skippedAlreadyDone?: number; // Listed artifacts the prior run committed
  startedAt: string;
  endedAt?: string;
  failureReason?: string;
  report?: RunReport;
}

export interface RunStatus {
  runId: string;
  state: RunState;
  strategy?: StrategyName;
  total: number;
  processed: number;
  counts: RunCounts;
  elapsedMs: number;
  report?: RunReport;
}

export interface RunHandle {
  runId: string;
  done: Promise<RunReport>;
}

/**
 * Configuration file for the command-line tool
 */
export interface MigrationConfig extends EngineConfig {
  source: S3Credentials;
  target: S3Credentials;
  checkpoint: {
    path: string; // SQLite database file
  };
  // Optional parameters
  prefix?: string;
  exclude?: string[];
  include?: string[];
  dryRun?: boolean;
  multipartThreshold?: number; // Uploads above this size use multipart
  skipConfirmation?: boolean; // Skip confirmation prompts
  verbose?: boolean; // Enable verbose logging
  logFile?: string; // Log file path for saving detailed logs
}
