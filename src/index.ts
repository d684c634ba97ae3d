export * from './types';
export * from './errors';
export { MigrationController, readRunStatus, DEFAULT_MEMORY_THRESHOLD, DEFAULT_TEMP_DIR } from './controller';
export type { ControllerDeps, MigrationPlan } from './controller';
export { InMemoryCheckpointStore, requeueInterruptedRecords } from './checkpoint-store';
export type { CheckpointStore, TransferRecordUpdate } from './checkpoint-store';
export { SqliteCheckpointStore } from './sqlite-checkpoint-store';
export type { SqliteCheckpointStoreOptions } from './sqlite-checkpoint-store';
export { RateLimiter, createEndpointRateLimiter, SOURCE_BUCKET, TARGET_BUCKET } from './rate-limiter';
export type { BucketOptions, RateLimiterOptions } from './rate-limiter';
export { computeDigests, verify, verifyTarget, integrityError } from './validator';
export type { ContentDigest, VerifyResult } from './validator';
export { spoolContent, SpoolMode } from './content-spool';
export type { SpooledContent, SpoolOptions } from './content-spool';
export { RetryClassifier, DEFAULT_RETRY_POLICY, isExhausted, isAuthorizationFailure } from './retry-classifier';
export type { Classification, RetryPolicy } from './retry-classifier';
export { partition, assignToPools } from './partitioner';
export { selectStrategy, resolveStrategy, estimateListing, STRATEGY_PRESETS } from './strategy';
export { WorkerPool } from './worker-pool';
export type { WorkerPoolOptions } from './worker-pool';
export { transferArtifact } from './transfer';
export type { TransferContext } from './transfer';
export { MetricsRecorder, LoggingSink, fanOut, Metrics, Events } from './observability';
export type { ObservabilitySink, EventFields, Tags } from './observability';
export { buildReport, countRecords, printSummary } from './report';
export { S3Source, S3Target, createS3Client, toRemoteError } from './s3-client';
export { loadConfig, validateConfig } from './config';
