/**
 * @stepweave/tasks
 * Example step strategies and the bootstrap that registers them
 */

import {
  logging,
  timing,
  type DecoratorConfig,
  type LoggingOptions,
  type Logger,
  type TaskRegistry,
  type TimingOptions,
} from '@stepweave/core';
import { httpGetTaskType, type HttpGetOptions } from './httpGet';
import { notifyMockTaskType } from './notifyMock';
import { transformSimpleTaskType } from './transformSimple';

export * from './httpGet';
export * from './notifyMock';
export * from './transformSimple';

export interface BuiltinTaskOptions {
  http?: HttpGetOptions;
  logger?: Logger;
}

export function registerBuiltinTasks(registry: TaskRegistry, options: BuiltinTaskOptions = {}): void {
  registry.register(httpGetTaskType(options.http));
  registry.register(notifyMockTaskType({ logger: options.logger }));
  registry.register(transformSimpleTaskType());
}

export interface BuiltinDecoratorOptions {
  timing?: TimingOptions;
  logging?: LoggingOptions;
}

/**
 * Decorators per built-in type, innermost first
 */
export function builtinDecoratorConfig(options: BuiltinDecoratorOptions = {}): DecoratorConfig {
  const timed = timing(options.timing);
  const logged = logging(options.logging);
  return {
    http_get: [timed, logged],
    notify_mock: [timed],
    transform_simple: [timed, logged],
  };
}
