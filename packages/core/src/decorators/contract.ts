import type { TaskCommand } from '@stepweave/types';
import { contextFrom } from '../engine/context';
import { silentLogger } from '../logger';
import type { Runnable } from '../tasks/task';
import type { DecoratorFactory } from './chain';

export type DecoratorContractReport =
  | { ok: true }
  | { ok: false; reason: string };

const PROBE_COMMAND: TaskCommand = {
  run_id: 'contract-probe',
  node_key: 'probe',
  type: 'probe',
  params: {},
  metadata: { workflow_name: 'contract-probe', depends_on: [] },
};

class ProbeFailure extends Error {
  constructor() {
    super('probe failure');
    this.name = 'ProbeFailure';
  }
}

/**
 * Wrap a throwing probe with the decorator and check that it delegated once
 * and re-threw the very same error
 */
export async function checkDecoratorContract(factory: DecoratorFactory): Promise<DecoratorContractReport> {
  const failure = new ProbeFailure();
  let calls = 0;
  const probe: Runnable = {
    run: async () => {
      calls += 1;
      throw failure;
    },
  };

  const decorated = factory(probe, { command: PROBE_COMMAND, logger: silentLogger() });

  let outcome: { threw: false } | { threw: true; error: unknown };
  try {
    await decorated.run(contextFrom(), PROBE_COMMAND.params);
    outcome = { threw: false };
  } catch (error) {
    outcome = { threw: true, error };
  }

  if (calls === 0) {
    return { ok: false, reason: 'decorator never delegated to the inner runnable' };
  }
  if (!outcome.threw) {
    return { ok: false, reason: 'decorator swallowed the inner error' };
  }
  if (outcome.error !== failure) {
    return { ok: false, reason: 'decorator replaced the inner error' };
  }
  return { ok: true };
}
