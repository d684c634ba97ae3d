/**
 * Metrics and structured events. Sinks are fire-and-forget: a failing sink is
 * logged and otherwise ignored, it never holds up a transfer.
 */

import { errorMessageOf } from './errors';
import { logSilent, logWarning, LogLevel } from './logger';

export type Tags = Record<string, string>;
export type EventFields = Record<string, string | number | boolean | undefined>;

export interface ObservabilitySink {
  count(name: string, value: number, tags?: Tags): void;
  timing(name: string, ms: number, tags?: Tags): void;
  event(name: string, fields: EventFields): void;
}

export const Metrics = {
  ATTEMPTS: 'transfer.attempts',
  SUCCESSES: 'transfer.successes',
  FAILURES: 'transfer.failures',
  RATE_LIMIT_WAIT: 'ratelimit.wait_ms',
} as const;

export const Events = {
  ARTIFACT_COMMITTED: 'artifact.committed',
  ARTIFACT_FAILED: 'artifact.failed',
  RUN_STATE: 'run.state',
} as const;

function metricKey(name: string, tags?: Tags): string {
  if (!tags) {
    return name;
  }
  const suffix = Object.keys(tags)
    .sort()
    .map(key => `${key}=${tags[key]}`)
    .join(',');
  return suffix ? `${name}{${suffix}}` : name;
}

/**
 * In-memory counters, read back for the run report
 */
export class MetricsRecorder implements ObservabilitySink {
  private readonly counters = new Map<string, number>();

  count(name: string, value: number, tags?: Tags): void {
    const key = metricKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  timing(name: string, ms: number, tags?: Tags): void {
    this.count(name, ms, tags);
  }

  event(): void {
    // Events are not aggregated
  }

  get(name: string, tags?: Tags): number {
    return this.counters.get(metricKey(name, tags)) ?? 0;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counters);
  }
}

/**
 * Writes events and counters to the log file
 */
export class LoggingSink implements ObservabilitySink {
  count(name: string, value: number, tags?: Tags): void {
    logSilent(`metric ${metricKey(name, tags)} +${value}`, LogLevel.DEBUG);
  }

  timing(name: string, ms: number, tags?: Tags): void {
    logSilent(`timing ${metricKey(name, tags)} ${ms}ms`, LogLevel.DEBUG);
  }

  event(name: string, fields: EventFields): void {
    const level = name === Events.ARTIFACT_FAILED ? LogLevel.ERROR : LogLevel.INFO;
    logSilent(`${name} ${JSON.stringify(fields)}`, level);
  }
}

function guarded(action: () => void): void {
  try {
    action();
  } catch (error) {
    logWarning(`Observability sink failed: ${errorMessageOf(error)}`);
  }
}

/**
 * Combine sinks; each one is isolated from the others' failures
 */
export function fanOut(...sinks: ObservabilitySink[]): ObservabilitySink {
  return {
    count: (name, value, tags) => sinks.forEach(sink => guarded(() => sink.count(name, value, tags))),
    timing: (name, ms, tags) => sinks.forEach(sink => guarded(() => sink.timing(name, ms, tags))),
    event: (name, fields) => sinks.forEach(sink => guarded(() => sink.event(name, fields))),
  };
}
