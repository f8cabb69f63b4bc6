/**
 * Workflow orchestrator
 * Runs each node once, in dependency order, and aggregates the outcomes
 */

import type {
  SkippedOutcome,
  StepOutcome,
  TaskCommand,
  WorkflowDefinition,
  WorkflowNode,
  WorkflowResult,
} from '@stepweave/types';
import { buildDAG, collectDependents, type DAG } from '../dag/build';
import { validateDAG } from '../dag/validate';
import { OrchestrationError } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { WorkflowPersistence } from '../persistence/persistence';
import { createTaskCommand } from '../worker/command';
import type { WorkerOutcome } from '../worker/worker';
import { ExecutionContext, deepFreeze, type ContextView } from './context';
import { StepStatusTracker, computeRunStatus } from './state';

export interface StepExecutor {
  execute(command: TaskCommand, context: ContextView): Promise<WorkerOutcome>;
}

export interface WorkflowEngineOptions {
  worker: StepExecutor;
  persistence: WorkflowPersistence;
  logger?: Logger;
  now?: () => Date;
}

interface RunState {
  runId: string;
  dag: DAG;
  logger: Logger;
  context: ExecutionContext;
  tracker: StepStatusTracker;
  pending: Map<string, WorkflowNode>;
  executed: Set<string>;
  outcomes: Map<string, StepOutcome>;
}

export class WorkflowEngine {
  private readonly worker: StepExecutor;
  private readonly persistence: WorkflowPersistence;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: WorkflowEngineOptions) {
    this.worker = options.worker;
    this.persistence = options.persistence;
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Node failures degrade the result; only a stalled dependency scan throws.
   */
  async run(workflow: WorkflowDefinition): Promise<WorkflowResult> {
    const runId = await this.persistence.createRun(workflow.name);
    const dag = buildDAG(workflow);
    const state: RunState = {
      runId,
      dag,
      logger: this.logger.child({ workflow: workflow.name, run_id: runId }),
      context: new ExecutionContext(),
      tracker: new StepStatusTracker(dag.nodes.keys()),
      pending: new Map(workflow.nodes.map((node) => [node.id, node])),
      executed: new Set(),
      outcomes: new Map(),
    };

    state.logger.info({ nodes: workflow.nodes.length }, 'workflow started');

    while (state.pending.size > 0) {
      let progress = false;

      // Definition order; nodes unlocked earlier in the same pass run in it
      for (const node of Array.from(state.pending.values())) {
        if (!state.pending.has(node.id)) {
          continue; // skipped by a failure earlier in this pass
        }
        if (!node.depends_on.every((depId) => state.executed.has(depId))) {
          continue;
        }

        state.pending.delete(node.id);
        progress = true;

        const outcome = await this.executeNode(workflow, node, state);
        if (outcome.status === 'FAILED') {
          this.skipDependents(node.id, state);
        }
      }

      if (!progress) {
        await this.abort(workflow, state);
      }
    }

    const results = collectResults(workflow, state.outcomes);
    const status = computeRunStatus(Object.values(results).map((outcome) => outcome.status));

    await this.persistence.updateRun({
      run_id: runId,
      status,
      results,
      finished_at: this.now(),
    });

    state.logger.info({ status }, 'workflow finished');
    return Object.freeze({
      workflow_name: workflow.name,
      run_id: runId,
      status,
      results: Object.freeze(results),
    });
  }

  private async executeNode(
    workflow: WorkflowDefinition,
    node: WorkflowNode,
    state: RunState
  ): Promise<StepOutcome> {
    const command = createTaskCommand(state.runId, workflow, node);
    state.tracker.transition(node.id, 'RUNNING');
    state.logger.debug({ node: node.id, type: node.type }, 'node submitted');

    const outcome = deepFreeze(await this.worker.execute(command, state.context.view()));

    state.tracker.transition(node.id, outcome.status);
    state.outcomes.set(node.id, outcome);
    state.executed.add(node.id);
    if (outcome.status === 'SUCCESS') {
      state.context.set(node.id, outcome.result);
    }

    await this.persistence.recordNodeRun({
      run_id: state.runId,
      node_id: node.id,
      type: node.type,
      status: outcome.status,
      started_at: outcome.started_at,
      finished_at: outcome.finished_at,
      result: outcome.status === 'SUCCESS' ? outcome.result : { error: outcome.error },
    });

    if (outcome.status === 'SUCCESS') {
      state.logger.info({ node: node.id }, 'node succeeded');
    } else {
      state.logger.warn({ node: node.id, error: outcome.error }, 'node failed');
    }
    return outcome;
  }

  /**
   * Every transitive dependent still pending is SKIPPED and never reaches the worker
   */
  private skipDependents(failedId: string, state: RunState): void {
    const at = this.now();

    for (const dependentId of collectDependents(state.dag, failedId)) {
      if (!state.pending.delete(dependentId)) {
        continue;
      }
      const outcome: SkippedOutcome = Object.freeze({
        status: 'SKIPPED',
        reason: `Dependency "${failedId}" failed`,
        skipped_due_to: failedId,
        started_at: at,
        finished_at: at,
      });
      state.tracker.transition(dependentId, 'SKIPPED');
      state.outcomes.set(dependentId, outcome);
      state.logger.warn({ node: dependentId, failed: failedId }, 'node skipped');
    }
  }

  private async abort(workflow: WorkflowDefinition, state: RunState): Promise<never> {
    const pending = Array.from(state.pending.keys());
    const issues = validateDAG(workflow).filter(
      (issue) => issue.node_id === undefined || state.pending.has(issue.node_id)
    );

    state.logger.error({ pending, issues }, 'workflow cannot make progress');
    await this.persistence.updateRun({
      run_id: state.runId,
      status: 'FAILED',
      results: collectResults(workflow, state.outcomes),
      finished_at: this.now(),
    });
    throw new OrchestrationError(workflow.name, pending, issues);
  }
}

function collectResults(
  workflow: WorkflowDefinition,
  outcomes: Map<string, StepOutcome>
): Record<string, StepOutcome> {
  const results: Record<string, StepOutcome> = {};
  for (const node of workflow.nodes) {
    const outcome = outcomes.get(node.id);
    if (outcome) {
      results[node.id] = outcome;
    }
  }
  return results;
}
