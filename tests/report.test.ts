import { describe, expect, it } from 'vitest';

import { Metrics, MetricsRecorder } from '../src/observability';
import { buildReport, countRecords } from '../src/report';
import { RunState, TransferState } from '../src/types';

import type { TransferRecord } from '../src/types';

function record(artifactId: string, state: TransferState, extra: Partial<TransferRecord> = {}): TransferRecord {
  return {
    runId: 'r',
    artifactId,
    state,
    attemptCount: 1,
    updatedAt: '2024-01-01T00:00:00.000Z',
    ...extra,
  };
}

describe('countRecords', () => {
  it('counts states, remaining and vanished artifacts', () => {
    const counts = countRecords(
      ['a', 'b', 'c', 'd', 'e'],
      [
        record('a', TransferState.COMMITTED),
        record('b', TransferState.FAILED_FATAL),
        record('c', TransferState.PENDING),
        record('gone', TransferState.COMMITTED),
      ],
      1
    );

    expect(counts).toEqual({
      committed: 1,
      failedRetryable: 0,
      failedFatal: 1,
      skippedAlreadyDone: 1,
      remaining: 2,
      vanished: 1,
    });
  });
});

describe('buildReport', () => {
  it('derives totals and failures from the records', () => {
    const metrics = new MetricsRecorder();
    metrics.timing(Metrics.RATE_LIMIT_WAIT, 250, { bucket: 'target' });

    const report = buildReport({
      runId: 'r',
      state: RunState.COMPLETED,
      strategy: 'medium',
      elapsedMs: 2000,
      listedIds: ['a', 'b', 'c', 'd'],
      skippedAlreadyDone: 0,
      records: [
        record('a', TransferState.COMMITTED, { size: 600 }),
        record('d', TransferState.FAILED_RETRYABLE, {
          attemptCount: 4,
          lastErrorClass: 'TransientRemoteError',
          lastErrorMessage: 'Service unavailable',
        }),
        record('b', TransferState.COMMITTED, { size: 400 }),
        record('c', TransferState.FAILED_FATAL, { lastErrorClass: 'IntegrityError', lastErrorMessage: 'size mismatch' }),
      ],
      transferred: { artifacts: 2, bytes: 1000 },
      metrics,
    });

    expect(report).toEqual({
      runId: 'r',
      state: RunState.COMPLETED,
      strategy: 'medium',
      total: 4,
      counts: { committed: 2, failedRetryable: 1, failedFatal: 1, skippedAlreadyDone: 0, remaining: 0, vanished: 0 },
      bytesTransferred: 1000,
      elapsedMs: 2000,
      throughput: { artifactsPerSecond: 1, bytesPerSecond: 500 },
      rateLimitWaitMs: { source: 0, target: 250 },
      failures: [
        {
          artifactId: 'c',
          state: TransferState.FAILED_FATAL,
          attempts: 1,
          errorClass: 'IntegrityError',
          errorMessage: 'size mismatch',
        },
        {
          artifactId: 'd',
          state: TransferState.FAILED_RETRYABLE,
          attempts: 4,
          errorClass: 'TransientRemoteError',
          errorMessage: 'Service unavailable',
        },
      ],
      failureReason: undefined,
    });
  });

  it('measures throughput on what this process committed', () => {
    const report = buildReport({
      runId: 'r',
      state: RunState.COMPLETED,
      strategy: 'large',
      elapsedMs: 4000,
      listedIds: ['a', 'b'],
      skippedAlreadyDone: 0,
      records: [
        record('a', TransferState.COMMITTED, { size: 10_000_000_000 }),
        record('b', TransferState.COMMITTED, { size: 20 }),
      ],
      transferred: { artifacts: 1, bytes: 20 },
    });

    expect(report.counts.committed).toBe(2);
    expect(report.bytesTransferred).toBe(20);
    expect(report.throughput).toEqual({ artifactsPerSecond: 0.25, bytesPerSecond: 5 });
  });

  it('reports zero throughput for an instant run', () => {
    const report = buildReport({
      runId: 'r',
      state: RunState.COMPLETED,
      strategy: 'small',
      elapsedMs: 0,
      listedIds: [],
      skippedAlreadyDone: 0,
      records: [],
      transferred: { artifacts: 0, bytes: 0 },
    });

    expect(report.throughput).toEqual({ artifactsPerSecond: 0, bytesPerSecond: 0 });
    expect(report.rateLimitWaitMs).toEqual({ source: 0, target: 0 });
  });
});
