/**
 * Persistence types - the rows a persistence collaborator stores
 * for every workflow run and every executed node
 */

import type { StepOutcome } from './api';

// =============================================================================
// ENUMS
// =============================================================================

export type WorkflowStatus = 'SUCCESS' | 'PARTIAL_SUCCESS' | 'FAILED';

export type RunStatus = 'RUNNING' | WorkflowStatus;

export type StepStatus =
  | 'PENDING'  // Waiting for dependencies
  | 'RUNNING'  // Submitted to the worker
  | 'SUCCESS'  // Worker returned a result
  | 'FAILED'   // Exception escaped the task or one of its decorators
  | 'SKIPPED'; // An ancestor failed, never submitted

/** Statuses a node can finish a run with */
export type StepOutcomeStatus = Extract<StepStatus, 'SUCCESS' | 'FAILED' | 'SKIPPED'>;

// =============================================================================
// TABLE TYPES
// =============================================================================

export interface WorkflowRunRecord {
  id: string;                    // Run identifier (e.g., "run_1")
  name: string;                  // Workflow name
  status: RunStatus;
  started_at: Date;
  finished_at: Date | null;      // NULL while RUNNING
  duration_ms: number | null;
  result_summary: Record<string, StepOutcomeStatus>; // node id -> final status
}

export interface NodeRunRecord {
  run_id: string;                // Parent run
  node_id: string;
  type: string;                  // Strategy discriminator
  status: StepOutcomeStatus;
  started_at: Date;
  finished_at: Date;
  duration_ms: number;
  result: unknown;               // Result payload, or { error } when FAILED
}

// =============================================================================
// WRITE INPUTS
// =============================================================================

export interface UpdateRunInput {
  run_id: string;
  status: RunStatus;
  results: Record<string, StepOutcome>;
  finished_at: Date;
}

export interface RecordNodeRunInput {
  run_id: string;
  node_id: string;
  type: string;
  status: StepOutcomeStatus;
  started_at: Date;
  finished_at: Date;
  result: unknown;
}
