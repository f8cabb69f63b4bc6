/**
 * Step strategy contract and the fixed run template around it
 */

import type { ContextView } from '../engine/context';

export type TaskParams = Readonly<Record<string, unknown>>;

/**
 * One step type's unit of work. Hooks are optional and observe only:
 * onError's return value is ignored and the error is always re-raised.
 */
export interface Task<TResult = unknown> {
  validateParams(params: TaskParams): void;
  execute(context: ContextView, params: TaskParams): TResult | Promise<TResult>;
  before?(params: TaskParams): void | Promise<void>;
  after?(result: TResult): void | Promise<void>;
  onError?(error: unknown): unknown;
}

/**
 * The call boundary shared by strategies and decorators
 */
export interface Runnable<TResult = unknown> {
  run(context: ContextView, params: TaskParams): Promise<TResult>;
}

export interface RunTaskOptions {
  /** Receives a failure raised by onError itself */
  onHookError?: (hookError: unknown, original: unknown) => void;
}

/**
 * before → validateParams → execute → after. Any failure goes to onError
 * and is then re-thrown unchanged, even when onError itself fails.
 */
export async function runTask<TResult>(
  task: Task<TResult>,
  context: ContextView,
  params: TaskParams,
  options: RunTaskOptions = {}
): Promise<TResult> {
  try {
    await task.before?.(params);
    task.validateParams(params);
    const result = await task.execute(context, params);
    await task.after?.(result);
    return result;
  } catch (error) {
    try {
      await task.onError?.(error);
    } catch (hookError) {
      options.onHookError?.(hookError, error);
    }
    throw error;
  }
}

export function asRunnable<TResult>(
  task: Task<TResult>,
  options: RunTaskOptions = {}
): Runnable<TResult> {
  return {
    run: (context, params) => runTask(task, context, params, options),
  };
}
