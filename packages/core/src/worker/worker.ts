/**
 * Command executor
 * Resolves a strategy, wraps it in its decorators and turns the call into a StepOutcome
 */

import type { FailedOutcome, SuccessOutcome, TaskCommand } from '@stepweave/types';
import { composeDecorators, decoratorsFor, type DecoratorConfig } from '../decorators/chain';
import type { ContextView } from '../engine/context';
import { toErrorMessage } from '../errors';
import { silentLogger, type Logger } from '../logger';
import type { TaskRegistry } from '../tasks/registry';
import { asRunnable } from '../tasks/task';

export type WorkerOutcome = SuccessOutcome | FailedOutcome;

export interface WorkerOptions {
  registry: TaskRegistry;
  decorators?: DecoratorConfig;
  logger?: Logger;
  now?: () => Date;
}

export class Worker {
  private readonly registry: TaskRegistry;
  private readonly decorators: DecoratorConfig;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: WorkerOptions) {
    this.registry = options.registry;
    this.decorators = options.decorators ?? {};
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Never throws: every failure inside resolution or the chain becomes FAILED
   */
  async execute(command: TaskCommand, context: ContextView): Promise<WorkerOutcome> {
    const logger = this.logger.child({
      run_id: command.run_id,
      node: command.node_key,
      type: command.type,
    });
    const started_at = this.now();

    try {
      const strategy = asRunnable(this.registry.create(command.type), {
        onHookError: (hookError) => logger.warn({ err: hookError }, 'onError hook failed'),
      });
      const chain = composeDecorators(
        strategy,
        decoratorsFor(this.decorators, command.type),
        { command, logger }
      );
      const result = await chain.run(context, command.params);

      logger.debug('task succeeded');
      return { status: 'SUCCESS', result, started_at, finished_at: this.now() };
    } catch (error) {
      const message = toErrorMessage(error);
      logger.error({ err: error }, 'task failed');
      return { status: 'FAILED', error: message, started_at, finished_at: this.now() };
    }
  }
}
