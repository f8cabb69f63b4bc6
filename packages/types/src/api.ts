/**
 * Engine types - workflow definitions, commands and outcomes
 */

import type { WorkflowStatus } from './db';

// =============================================================================
// WORKFLOW SOURCE (external declarative input)
// =============================================================================

export interface WorkflowSource {
  id?: string;
  name: string;
  nodes: WorkflowNodeSource[];
}

export interface WorkflowNodeSource {
  id: string;
  type: string;
  params?: Record<string, unknown>;
  depends_on?: string | string[];
}

// =============================================================================
// WORKFLOW DEFINITION (normalized, immutable during a run)
// =============================================================================

export interface WorkflowDefinition {
  readonly id?: string;
  readonly name: string;
  readonly nodes: readonly WorkflowNode[];
}

export interface WorkflowNode {
  readonly id: string;                      // Unique within the workflow
  readonly type: string;                    // Strategy discriminator
  readonly params: Readonly<Record<string, unknown>>;
  readonly depends_on: readonly string[];   // Node ids that must finish first
}

// =============================================================================
// EXECUTION
// =============================================================================

export interface TaskCommand {
  readonly run_id: string;
  readonly node_key: string;
  readonly type: string;
  readonly params: Readonly<Record<string, unknown>>;
  readonly metadata: Readonly<CommandMetadata>;
}

export interface CommandMetadata {
  workflow_name: string;
  workflow_id?: string;
  depends_on: readonly string[];
}

interface OutcomeTimes {
  started_at: Date;
  finished_at: Date;
}

export interface SuccessOutcome extends OutcomeTimes {
  status: 'SUCCESS';
  result: unknown;
}

export interface FailedOutcome extends OutcomeTimes {
  status: 'FAILED';
  error: string;
}

export interface SkippedOutcome extends OutcomeTimes {
  status: 'SKIPPED';
  reason: string;
  skipped_due_to: string;        // Id of the failed ancestor
}

export type StepOutcome = SuccessOutcome | FailedOutcome | SkippedOutcome;

export interface WorkflowResult {
  readonly workflow_name: string;
  readonly run_id: string;
  readonly status: WorkflowStatus;
  readonly results: Readonly<Record<string, StepOutcome>>;
}

// =============================================================================
// TASK TYPES
// =============================================================================

export interface TaskDescriptor {
  type: string;
  display_name: string;
  description?: string;
  category?: string;
  icon?: string;
  params_schema?: JsonSchema;
}

export interface JsonSchema {
  type: string;
  properties?: Record<string, unknown>;
  required?: string[];
  [key: string]: unknown;
}
