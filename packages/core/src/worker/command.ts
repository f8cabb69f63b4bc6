import type { TaskCommand, WorkflowDefinition, WorkflowNode } from '@stepweave/types';

export function createTaskCommand(
  runId: string,
  workflow: Pick<WorkflowDefinition, 'id' | 'name'>,
  node: WorkflowNode
): TaskCommand {
  return Object.freeze({
    run_id: runId,
    node_key: node.id,
    type: node.type,
    params: node.params,
    metadata: Object.freeze({
      workflow_name: workflow.name,
      ...(workflow.id !== undefined ? { workflow_id: workflow.id } : {}),
      depends_on: node.depends_on,
    }),
  });
}
