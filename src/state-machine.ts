/**
 * Transition tables for transfer records and runs.
 *
 * Transfer records only move forward, with two exceptions: recovery moves an
 * interrupted record back to `pending`, and a retry re-enters `in_progress`.
 */

import { InvalidTransitionError } from './errors';
import { RunState, TransferState } from './types';

export const VALID_TRANSFER_TRANSITIONS: Record<TransferState, TransferState[]> = {
  [TransferState.PENDING]: [TransferState.IN_PROGRESS],
  [TransferState.IN_PROGRESS]: [
    TransferState.IN_PROGRESS,
    TransferState.VALIDATED,
    TransferState.PENDING,
    TransferState.FAILED_RETRYABLE,
    TransferState.FAILED_FATAL,
  ],
  [TransferState.VALIDATED]: [
    TransferState.COMMITTED,
    TransferState.IN_PROGRESS,
    TransferState.PENDING,
    TransferState.FAILED_RETRYABLE,
  ],
  [TransferState.FAILED_RETRYABLE]: [TransferState.IN_PROGRESS, TransferState.PENDING],
  [TransferState.COMMITTED]: [],
  [TransferState.FAILED_FATAL]: [],
};

// A record may be created directly in these states
const INITIAL_TRANSFER_STATES: TransferState[] = [TransferState.PENDING, TransferState.IN_PROGRESS];

export const VALID_RUN_TRANSITIONS: Record<RunState, RunState[]> = {
  [RunState.CREATED]: [RunState.LISTING, RunState.FAILED],
  [RunState.LISTING]: [RunState.PARTITIONING, RunState.FAILED],
  [RunState.PARTITIONING]: [RunState.RUNNING, RunState.FAILED],
  [RunState.RUNNING]: [RunState.PAUSED, RunState.COMPLETED, RunState.FAILED],
  [RunState.PAUSED]: [RunState.RUNNING],
  [RunState.COMPLETED]: [],
  [RunState.FAILED]: [],
};

export function canTransitionTransfer(from: TransferState | null, to: TransferState): boolean {
  if (from === null) {
    return INITIAL_TRANSFER_STATES.includes(to);
  }
  return VALID_TRANSFER_TRANSITIONS[from].includes(to);
}

export function assertTransferTransition(from: TransferState | null, to: TransferState): void {
  if (!canTransitionTransfer(from, to)) {
    throw new InvalidTransitionError('transfer', from, to);
  }
}

export function assertRunTransition(from: RunState, to: RunState): void {
  if (!VALID_RUN_TRANSITIONS[from].includes(to)) {
    throw new InvalidTransitionError('run', from, to);
  }
}

export function isTerminalTransferState(state: TransferState): boolean {
  return state === TransferState.COMMITTED || state === TransferState.FAILED_FATAL;
}

export function isTerminalRunState(state: RunState): boolean {
  return state === RunState.COMPLETED || state === RunState.FAILED;
}
