import * as os from 'node:os';
import * as path from 'node:path';

import { beforeEach, describe, expect, it } from 'vitest';

import { InMemoryCheckpointStore } from '../src/checkpoint-store';
import { AuthorizationError, TransientRemoteError } from '../src/errors';
import { Metrics, MetricsRecorder } from '../src/observability';
import { RateLimiter } from '../src/rate-limiter';
import { RetryClassifier } from '../src/retry-classifier';
import { transferArtifact } from '../src/transfer';
import { TransferState } from '../src/types';

import { FakeSource, FakeTarget, artifact, listAll, seedRecord, sha256 } from './helpers/fakes';

import type { TransferContext } from '../src/transfer';
import type { ArtifactDescriptor } from '../src/types';

const RUN = 'run-transfer';

describe('transferArtifact', () => {
  let source: FakeSource;
  let target: FakeTarget;
  let store: InMemoryCheckpointStore;
  let metrics: MetricsRecorder;
  let descriptor: ArtifactDescriptor;

  const context = (overrides: Partial<TransferContext> = {}): TransferContext => ({
    runId: RUN,
    source,
    target,
    store,
    limiter: new RateLimiter({ buckets: {} }),
    classifier: new RetryClassifier({ backoffBaseMs: 1, maxBackoffMs: 5 }, () => 0),
    sink: metrics,
    maxRetries: 3,
    memoryThreshold: 1024,
    tempDir: path.join(os.tmpdir(), 'transfer-test'),
    signal: new AbortController().signal,
    ...overrides,
  });

  beforeEach(async () => {
    source = new FakeSource([artifact('docs/a.txt', 'alpha', 'text/plain')]);
    target = new FakeTarget();
    store = new InMemoryCheckpointStore();
    metrics = new MetricsRecorder();
    [descriptor] = await listAll(source);
  });

  it('copies, verifies and commits an artifact', async () => {
    const outcome = await transferArtifact(context(), descriptor, 0);

    expect(outcome).toMatchObject({ artifactId: 'docs/a.txt', kind: TransferState.COMMITTED, attempts: 1, bytes: 5 });
    expect(await store.getRecord(RUN, 'docs/a.txt')).toMatchObject({
      state: TransferState.COMMITTED,
      attemptCount: 1,
      checksum: sha256(Buffer.from('alpha')),
      size: 5,
    });

    const stored = target.objects.get('docs/a.txt');
    expect(stored?.content.toString()).toBe('alpha');
    expect(stored?.metadata.contentType).toBe('text/plain');
    expect(stored?.metadata.metadata).toEqual({ origin: 'fake' });
    expect(metrics.get(Metrics.SUCCESSES)).toBe(1);
  });

  it('skips an artifact that is already committed', async () => {
    await seedRecord(store, RUN, 'docs/a.txt', TransferState.COMMITTED);

    const outcome = await transferArtifact(context(), descriptor, 0);

    expect(outcome.kind).toBe('skipped');
    expect(source.readCount('docs/a.txt')).toBe(0);
  });

  it('leaves a record another worker holds alone', async () => {
    await seedRecord(store, RUN, 'docs/a.txt', TransferState.IN_PROGRESS);

    const outcome = await transferArtifact(context(), descriptor, 0);

    expect(outcome.kind).toBe('conflict');
    expect(target.writeCount('docs/a.txt')).toBe(0);
  });

  it('lets only one of two concurrent transfers of the same artifact commit', async () => {
    const outcomes = await Promise.all([
      transferArtifact(context(), descriptor, 0),
      transferArtifact(context(), descriptor, 0),
    ]);
    const kinds = outcomes.map(outcome => outcome.kind);

    expect(kinds.filter(kind => kind === TransferState.COMMITTED)).toHaveLength(1);
    expect(kinds.filter(kind => kind === 'conflict' || kind === 'skipped')).toHaveLength(1);
    expect(source.readCount('docs/a.txt')).toBe(1);
    expect(target.writeCount('docs/a.txt')).toBe(1);
    expect(await store.getRecord(RUN, 'docs/a.txt')).toMatchObject({ state: TransferState.COMMITTED, attemptCount: 1 });
  });

  it('retries transient target failures and keeps the attempt count', async () => {
    target.failWrites('docs/a.txt', new TransientRemoteError('503'), new TransientRemoteError('503'));

    const outcome = await transferArtifact(context(), descriptor, 0);

    expect(outcome).toMatchObject({ kind: TransferState.COMMITTED, attempts: 3 });
    expect(await store.getRecord(RUN, 'docs/a.txt')).toMatchObject({ state: TransferState.COMMITTED, attemptCount: 3 });
    expect(source.readCount('docs/a.txt')).toBe(3);
    expect(metrics.get(Metrics.ATTEMPTS)).toBe(3);
  });

  it('continues the attempt count of a requeued record', async () => {
    await seedRecord(store, RUN, 'docs/a.txt', TransferState.PENDING, { attemptCount: 2 });

    const outcome = await transferArtifact(context(), descriptor, 0);

    expect(outcome.attempts).toBe(1);
    expect((await store.getRecord(RUN, 'docs/a.txt'))?.attemptCount).toBe(3);
  });

  it('marks the artifact failed_retryable once the retries are used up', async () => {
    target.failWrites('docs/a.txt', new TransientRemoteError('503'), new TransientRemoteError('timeout'));

    const outcome = await transferArtifact(context({ maxRetries: 1 }), descriptor, 0);

    expect(outcome).toMatchObject({
      kind: TransferState.FAILED_RETRYABLE,
      attempts: 2,
      stage: 'target',
      errorClass: 'TransientRemoteError',
      errorMessage: 'timeout',
    });
    expect(await store.getRecord(RUN, 'docs/a.txt')).toMatchObject({
      state: TransferState.FAILED_RETRYABLE,
      attemptCount: 2,
      lastErrorClass: 'TransientRemoteError',
      lastErrorMessage: 'timeout',
    });
    expect(metrics.get(Metrics.FAILURES, { errorClass: 'TransientRemoteError' })).toBe(1);
  });

  it('fails fatally on corrupted source content without writing', async () => {
    source.corruptReads('docs/a.txt');

    const outcome = await transferArtifact(context(), descriptor, 0);

    expect(outcome).toMatchObject({ kind: TransferState.FAILED_FATAL, errorClass: 'IntegrityError', stage: 'validate' });
    expect(outcome.attempts).toBe(1);
    expect(target.writeCount('docs/a.txt')).toBe(0);
    expect((await store.getRecord(RUN, 'docs/a.txt'))?.state).toBe(TransferState.FAILED_FATAL);
  });

  it('fails fatally when the target confirms different content', async () => {
    target.tamperConfirmation('docs/a.txt');

    const outcome = await transferArtifact(context(), descriptor, 0);

    expect(outcome).toMatchObject({ kind: TransferState.FAILED_FATAL, errorClass: 'IntegrityError', stage: 'verify' });
  });

  it('flags authorization failures as systemic', async () => {
    target.failWrites('docs/a.txt', new AuthorizationError('Access denied', 'target'));

    const outcome = await transferArtifact(context(), descriptor, 0);

    expect(outcome).toMatchObject({ kind: TransferState.FAILED_FATAL, systemic: true, attempts: 1 });
  });

  it('requeues without reading when cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await transferArtifact(context({ signal: controller.signal }), descriptor, 0);

    expect(outcome.kind).toBe('requeued');
    expect(source.readCount('docs/a.txt')).toBe(0);
    expect(await store.getRecord(RUN, 'docs/a.txt')).toMatchObject({ state: TransferState.PENDING, attemptCount: 1 });
  });

  it('lets a store failure escape', async () => {
    const failing = new InMemoryCheckpointStore();
    failing.getRecord = async () => {
      throw new Error('database is locked');
    };

    await expect(transferArtifact(context({ store: failing }), descriptor, 0)).rejects.toThrow('database is locked');
  });
});
