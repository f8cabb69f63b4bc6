import type { WorkflowResult } from '@stepweave/types';
import { loadConfig, type StepweaveConfig } from './config';
import type { DecoratorConfig } from './decorators/chain';
import { WorkflowEngine } from './engine/engine';
import { createLogger, type Logger } from './logger';
import { InMemoryWorkflowPersistence, type WorkflowPersistence } from './persistence/persistence';
import { TaskRegistry } from './tasks/registry';
import { Worker } from './worker/worker';
import { normalizeWorkflow } from './workflow/normalize';

export interface RuntimeOptions {
  config?: StepweaveConfig;
  logger?: Logger;
  persistence?: WorkflowPersistence;
  decorators?: DecoratorConfig | ((config: StepweaveConfig) => DecoratorConfig);
  /** Registers the available step types before any run */
  bootstrap?: (registry: TaskRegistry, config: StepweaveConfig) => void;
}

export interface Runtime {
  config: StepweaveConfig;
  logger: Logger;
  registry: TaskRegistry;
  worker: Worker;
  engine: WorkflowEngine;
  persistence: WorkflowPersistence;
  /** Normalize a declarative source and run it */
  runSource(source: unknown): Promise<WorkflowResult>;
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const persistence = options.persistence ?? new InMemoryWorkflowPersistence();
  const decorators = typeof options.decorators === 'function'
    ? options.decorators(config)
    : options.decorators ?? {};

  const registry = new TaskRegistry({ logger: logger.child({ component: 'registry' }) });
  options.bootstrap?.(registry, config);

  const worker = new Worker({
    registry,
    decorators,
    logger: logger.child({ component: 'worker' }),
  });
  const engine = new WorkflowEngine({
    worker,
    persistence,
    logger: logger.child({ component: 'engine' }),
  });

  return {
    config,
    logger,
    registry,
    worker,
    engine,
    persistence,
    runSource: (source) => engine.run(normalizeWorkflow(source)),
  };
}
