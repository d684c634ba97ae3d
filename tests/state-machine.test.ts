import { describe, expect, it } from 'vitest';

import { InvalidTransitionError } from '../src/errors';
import {
  assertRunTransition,
  assertTransferTransition,
  canTransitionTransfer,
  isTerminalRunState,
  isTerminalTransferState,
} from '../src/state-machine';
import { RunState, TransferState } from '../src/types';

describe('transfer transitions', () => {
  it('allows the happy path in order', () => {
    expect(canTransitionTransfer(null, TransferState.PENDING)).toBe(true);
    expect(canTransitionTransfer(TransferState.PENDING, TransferState.IN_PROGRESS)).toBe(true);
    expect(canTransitionTransfer(TransferState.IN_PROGRESS, TransferState.VALIDATED)).toBe(true);
    expect(canTransitionTransfer(TransferState.VALIDATED, TransferState.COMMITTED)).toBe(true);
  });

  it('lets a claim create the record directly in progress', () => {
    expect(canTransitionTransfer(null, TransferState.IN_PROGRESS)).toBe(true);
    expect(canTransitionTransfer(null, TransferState.COMMITTED)).toBe(false);
  });

  it('allows recovery back to pending', () => {
    expect(canTransitionTransfer(TransferState.IN_PROGRESS, TransferState.PENDING)).toBe(true);
    expect(canTransitionTransfer(TransferState.VALIDATED, TransferState.PENDING)).toBe(true);
  });

  it('allows a later pass to pick up an exhausted artifact', () => {
    expect(canTransitionTransfer(TransferState.FAILED_RETRYABLE, TransferState.IN_PROGRESS)).toBe(true);
  });

  it('never leaves a terminal state', () => {
    for (const to of Object.values(TransferState)) {
      expect(canTransitionTransfer(TransferState.COMMITTED, to)).toBe(false);
      expect(canTransitionTransfer(TransferState.FAILED_FATAL, to)).toBe(false);
    }
    expect(isTerminalTransferState(TransferState.COMMITTED)).toBe(true);
    expect(isTerminalTransferState(TransferState.FAILED_FATAL)).toBe(true);
    expect(isTerminalTransferState(TransferState.FAILED_RETRYABLE)).toBe(false);
  });

  it('rejects skipping validation', () => {
    expect(() => assertTransferTransition(TransferState.IN_PROGRESS, TransferState.COMMITTED)).toThrow(
      InvalidTransitionError
    );
    expect(() => assertTransferTransition(TransferState.PENDING, TransferState.VALIDATED)).toThrow(
      'Invalid transfer state transition: pending -> validated'
    );
  });
});

describe('run transitions', () => {
  it('follows the lifecycle', () => {
    expect(() => assertRunTransition(RunState.CREATED, RunState.LISTING)).not.toThrow();
    expect(() => assertRunTransition(RunState.LISTING, RunState.PARTITIONING)).not.toThrow();
    expect(() => assertRunTransition(RunState.PARTITIONING, RunState.RUNNING)).not.toThrow();
    expect(() => assertRunTransition(RunState.RUNNING, RunState.PAUSED)).not.toThrow();
    expect(() => assertRunTransition(RunState.PAUSED, RunState.RUNNING)).not.toThrow();
    expect(() => assertRunTransition(RunState.RUNNING, RunState.COMPLETED)).not.toThrow();
  });

  it('lets listing fail the run', () => {
    expect(() => assertRunTransition(RunState.LISTING, RunState.FAILED)).not.toThrow();
  });

  it('rejects restarting a finished run', () => {
    expect(() => assertRunTransition(RunState.COMPLETED, RunState.RUNNING)).toThrow(
      'Invalid run state transition: completed -> running'
    );
    expect(() => assertRunTransition(RunState.PAUSED, RunState.COMPLETED)).toThrow(InvalidTransitionError);
    expect(isTerminalRunState(RunState.FAILED)).toBe(true);
    expect(isTerminalRunState(RunState.PAUSED)).toBe(false);
  });
});
