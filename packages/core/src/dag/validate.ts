/**
 * DAG validation
 * Diagnoses why a workflow's dependencies cannot be resolved
 */

import type { WorkflowDefinition } from '@stepweave/types';
import type { DependencyIssue } from '../errors';
import { findDanglingReferences } from '../workflow/normalize';
import { DAG, buildDAG } from './build';

type Color = 'WHITE' | 'GRAY' | 'BLACK';

/**
 * Report dangling references and cycles; empty when the graph is a complete DAG
 */
export function validateDAG(workflow: Pick<WorkflowDefinition, 'nodes'>): DependencyIssue[] {
  const issues: DependencyIssue[] = [];

  for (const { node_id, missing } of findDanglingReferences(workflow)) {
    issues.push({
      code: 'DANGLING_DEPENDENCY',
      message: `Node ${node_id} depends on non-existent node: ${missing}`,
      node_id,
    });
  }

  issues.push(...detectCycles(buildDAG(workflow)));
  return issues;
}

/**
 * Detect cycles using DFS with 3-color algorithm
 * WHITE = unvisited, GRAY = in current path, BLACK = fully processed
 * Every back edge yields one issue, so disjoint cycles are all reported.
 */
function detectCycles(dag: DAG): DependencyIssue[] {
  const color = new Map<string, Color>();
  const cycles: string[][] = [];

  for (const nodeId of dag.nodes.keys()) {
    color.set(nodeId, 'WHITE');
  }

  for (const nodeId of dag.nodes.keys()) {
    if (color.get(nodeId) === 'WHITE') {
      dfsVisit(dag, nodeId, color, [], cycles);
    }
  }

  return cycles.map((cycle): DependencyIssue => ({
    code: 'CYCLE_DETECTED',
    message: `Cycle detected: ${cycle.join(' → ')}`,
    node_id: cycle[0],
  }));
}

function dfsVisit(
  dag: DAG,
  nodeId: string,
  color: Map<string, Color>,
  path: string[],
  cycles: string[][]
): void {
  color.set(nodeId, 'GRAY');
  path.push(nodeId);

  for (const childId of dag.edges.get(nodeId) ?? []) {
    const childColor = color.get(childId);

    if (childColor === 'GRAY') {
      // Back edge closes the path from childId down to here
      cycles.push([...path.slice(path.indexOf(childId)), childId]);
    } else if (childColor === 'WHITE') {
      dfsVisit(dag, childId, color, path, cycles);
    }
  }

  color.set(nodeId, 'BLACK');
  path.pop();
}

/**
 * Quick validation check - returns true if valid
 */
export function isValidDAG(workflow: Pick<WorkflowDefinition, 'nodes'>): boolean {
  return validateDAG(workflow).length === 0;
}
