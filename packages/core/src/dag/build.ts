/**
 * DAG (Directed Acyclic Graph) construction
 * Converts a workflow definition into graph data structure
 */

import type { WorkflowDefinition, WorkflowNode } from '@stepweave/types';

/**
 * DAG representation
 */
export interface DAG {
  // All nodes, in definition order
  nodes: Map<string, WorkflowNode>;

  // Adjacency list: node_id -> array of dependent node_ids
  // (edges point FROM upstream TO downstream)
  edges: Map<string, string[]>;

  // Reverse adjacency list: node_id -> array of dependency node_ids
  // Dangling references are kept here but get no edge
  dependencies: Map<string, string[]>;

  // Nodes with no dependencies (entry points)
  roots: string[];
}

/**
 * Build DAG from workflow definition
 */
export function buildDAG(workflow: Pick<WorkflowDefinition, 'nodes'>): DAG {
  const nodes = new Map<string, WorkflowNode>();
  const edges = new Map<string, string[]>();
  const dependencies = new Map<string, string[]>();

  // Step 1: Create nodes
  for (const node of workflow.nodes) {
    nodes.set(node.id, node);
    edges.set(node.id, []);
    dependencies.set(node.id, [...node.depends_on]);
  }

  // Step 2: Build edges for references that resolve
  for (const node of workflow.nodes) {
    for (const depId of node.depends_on) {
      edges.get(depId)?.push(node.id);
    }
  }

  // Step 3: Find roots
  const roots: string[] = [];
  for (const [nodeId, deps] of dependencies) {
    if (deps.length === 0) {
      roots.push(nodeId);
    }
  }

  return { nodes, edges, dependencies, roots };
}

/**
 * Get direct downstream nodes (nodes that depend on this node)
 */
export function getDownstream(dag: DAG, nodeId: string): string[] {
  return dag.edges.get(nodeId) ?? [];
}

/**
 * Get direct upstream nodes (nodes this node depends on)
 */
export function getUpstream(dag: DAG, nodeId: string): string[] {
  return dag.dependencies.get(nodeId) ?? [];
}

/**
 * Every direct and indirect dependent of a node, breadth-first.
 * The node itself is never included, even inside a cycle.
 */
export function collectDependents(dag: DAG, nodeId: string): string[] {
  const seen = new Set<string>([nodeId]);
  const ordered: string[] = [];
  const queue = [...getDownstream(dag, nodeId)];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined || seen.has(current)) {
      continue;
    }
    seen.add(current);
    ordered.push(current);
    queue.push(...getDownstream(dag, current));
  }

  return ordered;
}
