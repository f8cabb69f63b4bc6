/**
 * Error taxonomy for definition, registration, validation and orchestration failures
 */

export class StepweaveError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'StepweaveError';
    this.code = code;
  }
}

export class WorkflowDefinitionError extends StepweaveError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('WORKFLOW_DEFINITION_INVALID', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'WorkflowDefinitionError';
    this.issues = issues;
  }
}

export interface DependencyIssue {
  code: string;
  message: string;
  node_id?: string;
}

/**
 * The dependency scan stalled with nodes still pending.
 */
export class OrchestrationError extends StepweaveError {
  readonly workflowName: string;
  readonly pending: string[];
  readonly issues: DependencyIssue[];

  constructor(workflowName: string, pending: string[], issues: DependencyIssue[]) {
    const detail = issues.length > 0
      ? issues.map((issue) => issue.message).join('; ')
      : `blocked nodes: ${pending.join(', ')}`;
    super(
      'WORKFLOW_UNRESOLVED_DEPENDENCIES',
      `Workflow "${workflowName}" cannot make progress: ${detail}`
    );
    this.name = 'OrchestrationError';
    this.workflowName = workflowName;
    this.pending = pending;
    this.issues = issues;
  }
}

export class TaskRegistrationError extends StepweaveError {
  constructor(message: string, code: 'TASK_REGISTRATION_INVALID' | 'TASK_TYPE_DUPLICATE' = 'TASK_REGISTRATION_INVALID') {
    super(code, message);
    this.name = 'TaskRegistrationError';
  }
}

export class UnknownTaskTypeError extends StepweaveError {
  readonly type: string;

  constructor(type: string) {
    super('TASK_TYPE_UNKNOWN', `Unknown task type: ${type}`);
    this.name = 'UnknownTaskTypeError';
    this.type = type;
  }
}

export class TaskValidationError extends StepweaveError {
  readonly field: string;

  constructor(field: string, message: string) {
    super('TASK_PARAMS_INVALID', message);
    this.name = 'TaskValidationError';
    this.field = field;
  }
}

export class ContextWriteError extends StepweaveError {
  constructor(nodeId: string) {
    super('CONTEXT_KEY_REWRITE', `Context already holds a result for node "${nodeId}"`);
    this.name = 'ContextWriteError';
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
