/**
 * @stepweave/core
 * Dependency-aware workflow orchestration: engine, worker, registry and decorators
 */

// Ambient
export * from './errors';
export * from './logger';
export * from './config';

// Workflow
export * from './workflow/normalize';

// DAG
export * from './dag/build';
export * from './dag/validate';

// Tasks
export * from './tasks/task';
export * from './tasks/params';
export * from './tasks/registry';

// Decorators
export * from './decorators/chain';
export * from './decorators/timing';
export * from './decorators/logging';
export * from './decorators/contract';

// Execution
export * from './engine/context';
export * from './engine/state';
export * from './engine/engine';
export * from './worker/command';
export * from './worker/worker';
export * from './persistence/persistence';
export * from './runtime';
