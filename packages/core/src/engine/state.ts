/**
 * State machine for node execution within a run
 */

import type { StepStatus, WorkflowStatus } from '@stepweave/types';

/**
 * Valid state transitions
 */
const VALID_TRANSITIONS: Record<StepStatus, StepStatus[]> = {
  PENDING: ['RUNNING', 'SKIPPED'],
  RUNNING: ['SUCCESS', 'FAILED'],
  SUCCESS: [], // Terminal state
  FAILED: [], // Terminal state
  SKIPPED: [], // Terminal state
};

/**
 * Check if transition is valid
 */
export function canTransition(from: StepStatus, to: StepStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Check if status is terminal (no further transitions)
 */
export function isTerminal(status: StepStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0;
}

/**
 * Tracks every node's status for one run and rejects illegal moves
 */
export class StepStatusTracker {
  private readonly statuses = new Map<string, StepStatus>();

  constructor(nodeIds: Iterable<string>) {
    for (const nodeId of nodeIds) {
      this.statuses.set(nodeId, 'PENDING');
    }
  }

  get(nodeId: string): StepStatus | undefined {
    return this.statuses.get(nodeId);
  }

  transition(nodeId: string, to: StepStatus): void {
    const from = this.statuses.get(nodeId);
    if (from === undefined) {
      throw new Error(`Unknown node ${nodeId}`);
    }
    if (!canTransition(from, to)) {
      throw new Error(`Node ${nodeId} cannot move from ${from} to ${to}`);
    }
    this.statuses.set(nodeId, to);
  }
}

/**
 * Aggregate status law:
 * SUCCESS iff every outcome succeeded, FAILED iff none did, PARTIAL_SUCCESS otherwise
 */
export function computeRunStatus(statuses: Iterable<StepStatus>): WorkflowStatus {
  let total = 0;
  let succeeded = 0;

  for (const status of statuses) {
    total += 1;
    if (status === 'SUCCESS') {
      succeeded += 1;
    }
  }

  if (succeeded === total) {
    return 'SUCCESS';
  }
  if (succeeded === 0) {
    return 'FAILED';
  }
  return 'PARTIAL_SUCCESS';
}
