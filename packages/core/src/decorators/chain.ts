/**
 * Decorator chain
 * Folds an ordered list of wrappers around a strategy; the last entry ends up outermost
 */

import type { TaskCommand } from '@stepweave/types';
import type { Logger } from '../logger';
import type { Runnable } from '../tasks/task';

export interface DecoratorScope {
  command: TaskCommand;
  logger: Logger;
}

/**
 * Wraps exactly one inner runnable. Implementations must delegate to it and
 * re-throw anything it throws.
 */
export type DecoratorFactory = (inner: Runnable, scope: DecoratorScope) => Runnable;

/** Step type -> ordered decorators. Missing entries mean no decoration. */
export type DecoratorConfig = Readonly<Record<string, readonly DecoratorFactory[]>>;

export function composeDecorators(
  base: Runnable,
  factories: readonly DecoratorFactory[],
  scope: DecoratorScope
): Runnable {
  return factories.reduce<Runnable>((inner, factory) => factory(inner, scope), base);
}

export function decoratorsFor(config: DecoratorConfig, type: string): readonly DecoratorFactory[] {
  return Object.prototype.hasOwnProperty.call(config, type) ? config[type] ?? [] : [];
}
