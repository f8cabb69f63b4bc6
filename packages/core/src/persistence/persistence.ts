import type {
  NodeRunRecord,
  RecordNodeRunInput,
  StepOutcomeStatus,
  UpdateRunInput,
  WorkflowRunRecord,
} from '@stepweave/types';

/**
 * Durable record of workflow runs. Implementations serialize their own
 * writes; any rejection is fatal to the run that issued it.
 */
export interface WorkflowPersistence {
  createRun(name: string): Promise<string>;
  updateRun(input: UpdateRunInput): Promise<void>;
  recordNodeRun(input: RecordNodeRunInput): Promise<void>;
}

export class InMemoryWorkflowPersistence implements WorkflowPersistence {
  private readonly runs = new Map<string, WorkflowRunRecord>();
  private readonly nodeRuns = new Map<string, NodeRunRecord[]>();
  private sequence = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createRun(name: string): Promise<string> {
    this.sequence += 1;
    const id = `run_${this.sequence}`;
    this.runs.set(id, {
      id,
      name,
      status: 'RUNNING',
      started_at: this.now(),
      finished_at: null,
      duration_ms: null,
      result_summary: {},
    });
    this.nodeRuns.set(id, []);
    return id;
  }

  async updateRun(input: UpdateRunInput): Promise<void> {
    const run = this.runs.get(input.run_id);
    if (!run) {
      throw new Error(`Workflow run ${input.run_id} was not found`);
    }

    const summary: Record<string, StepOutcomeStatus> = {};
    for (const [nodeId, outcome] of Object.entries(input.results)) {
      summary[nodeId] = outcome.status;
    }

    this.runs.set(input.run_id, {
      ...run,
      status: input.status,
      finished_at: input.finished_at,
      duration_ms: input.finished_at.getTime() - run.started_at.getTime(),
      result_summary: summary,
    });
  }

  async recordNodeRun(input: RecordNodeRunInput): Promise<void> {
    const runs = this.nodeRuns.get(input.run_id);
    if (!runs) {
      throw new Error(`Workflow run ${input.run_id} was not found`);
    }
    runs.push({
      ...input,
      duration_ms: input.finished_at.getTime() - input.started_at.getTime(),
    });
  }

  async getRun(runId: string): Promise<WorkflowRunRecord | undefined> {
    return this.runs.get(runId);
  }

  async listRuns(): Promise<WorkflowRunRecord[]> {
    return Array.from(this.runs.values());
  }

  async listNodeRuns(runId: string): Promise<NodeRunRecord[]> {
    return [...(this.nodeRuns.get(runId) ?? [])];
  }
}
