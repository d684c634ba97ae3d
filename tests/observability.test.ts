import { describe, expect, it, vi } from 'vitest';

import { Metrics, MetricsRecorder, fanOut } from '../src/observability';

import type { ObservabilitySink } from '../src/observability';

describe('MetricsRecorder', () => {
  it('aggregates counters by name and tags', () => {
    const metrics = new MetricsRecorder();
    metrics.count(Metrics.FAILURES, 1, { errorClass: 'IntegrityError' });
    metrics.count(Metrics.FAILURES, 1, { errorClass: 'IntegrityError' });
    metrics.count(Metrics.FAILURES, 1, { errorClass: 'TransientRemoteError' });
    metrics.timing(Metrics.RATE_LIMIT_WAIT, 120, { bucket: 'target' });

    expect(metrics.get(Metrics.FAILURES, { errorClass: 'IntegrityError' })).toBe(2);
    expect(metrics.get(Metrics.RATE_LIMIT_WAIT, { bucket: 'target' })).toBe(120);
    expect(metrics.get(Metrics.SUCCESSES)).toBe(0);
    expect(metrics.snapshot()).toEqual({
      'transfer.failures{errorClass=IntegrityError}': 2,
      'transfer.failures{errorClass=TransientRemoteError}': 1,
      'ratelimit.wait_ms{bucket=target}': 120,
    });
  });
});

describe('fanOut', () => {
  it('keeps delivering when one sink throws', () => {
    const broken: ObservabilitySink = {
      count: () => {
        throw new Error('sink offline');
      },
      timing: vi.fn(),
      event: vi.fn(),
    };
    const metrics = new MetricsRecorder();

    const sink = fanOut(broken, metrics);
    sink.count(Metrics.ATTEMPTS, 1);
    sink.event('artifact.committed', { artifactId: 'a' });

    expect(metrics.get(Metrics.ATTEMPTS)).toBe(1);
    expect(broken.event).toHaveBeenCalledWith('artifact.committed', { artifactId: 'a' });
  });
});
