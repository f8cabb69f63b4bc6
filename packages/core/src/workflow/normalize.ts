/**
 * Workflow normalization
 * Turns an external declarative source into an immutable WorkflowDefinition
 */

import { z } from 'zod';
import type { WorkflowDefinition, WorkflowNode } from '@stepweave/types';
import { WorkflowDefinitionError } from '../errors';

const nodeIdSchema = z.string().trim().min(1, 'must be a non-empty string');

export const WorkflowNodeSourceSchema = z.object({
  id: nodeIdSchema,
  type: z.string().trim().min(1, 'must be a non-empty string'),
  params: z.record(z.unknown()).optional(),
  depends_on: z.union([nodeIdSchema, z.array(nodeIdSchema)]).optional(),
});

export const WorkflowSourceSchema = z.object({
  id: z.string().optional(),
  name: z.string().trim().min(1, 'must be a non-empty string'),
  nodes: z.array(WorkflowNodeSourceSchema).min(1, 'must contain at least one node'),
});

export type WorkflowSourceInput = z.input<typeof WorkflowSourceSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'workflow';
    return `${path} ${issue.message}`;
  });
}

/**
 * Normalize a workflow source
 * - Converts a single depends_on string to an array
 * - Fills in empty params and dependencies
 * - Rejects duplicate node ids
 *
 * Dangling references and cycles are left to the engine.
 */
export function normalizeWorkflow(raw: unknown): WorkflowDefinition {
  const parsed = WorkflowSourceSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WorkflowDefinitionError('Invalid workflow definition', formatIssues(parsed.error));
  }

  const source = parsed.data;
  const nodes = source.nodes.map((node): WorkflowNode => {
    const dependsOn = node.depends_on === undefined
      ? []
      : typeof node.depends_on === 'string'
        ? [node.depends_on]
        : node.depends_on;

    return Object.freeze({
      id: node.id,
      type: node.type,
      params: Object.freeze({ ...(node.params ?? {}) }),
      depends_on: Object.freeze([...new Set(dependsOn)]),
    });
  });

  const definition: WorkflowDefinition = Object.freeze({
    ...(source.id !== undefined ? { id: source.id } : {}),
    name: source.name,
    nodes: Object.freeze(nodes),
  });

  validateUniqueNodeIds(definition);
  return definition;
}

/**
 * Validate that all node IDs are unique
 */
export function validateUniqueNodeIds(workflow: Pick<WorkflowDefinition, 'nodes'>): void {
  const ids = new Set<string>();
  const duplicates: string[] = [];

  for (const node of workflow.nodes) {
    if (ids.has(node.id) && !duplicates.includes(node.id)) {
      duplicates.push(node.id);
    }
    ids.add(node.id);
  }

  if (duplicates.length > 0) {
    throw new WorkflowDefinitionError('Duplicate node IDs', duplicates);
  }
}

/**
 * List depends_on references that point at no node in the workflow
 */
export function findDanglingReferences(
  workflow: Pick<WorkflowDefinition, 'nodes'>
): Array<{ node_id: string; missing: string }> {
  const nodeIds = new Set(workflow.nodes.map((node) => node.id));
  const dangling: Array<{ node_id: string; missing: string }> = [];

  for (const node of workflow.nodes) {
    for (const depId of node.depends_on) {
      if (!nodeIds.has(depId)) {
        dangling.push({ node_id: node.id, missing: depId });
      }
    }
  }

  return dangling;
}
