import { DEFAULT_REDACT_KEYS } from '../config';
import type { ContextView } from '../engine/context';
import type { Runnable, TaskParams } from '../tasks/task';
import type { DecoratorFactory, DecoratorScope } from './chain';

export const REDACTED = '***HIDDEN***';

export interface LoggingOptions {
  redactKeys?: readonly string[];
  truncateLength?: number;
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);

/**
 * Replace values whose key contains any of the sensitive fragments (case-insensitive)
 */
export function redactParams(value: unknown, redactKeys: readonly string[]): unknown {
  if (Array.isArray(value)) {
    return value.map((entry) => redactParams(entry, redactKeys));
  }
  if (!isPlainObject(value)) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const lowered = key.toLowerCase();
    result[key] = redactKeys.some((fragment) => lowered.includes(fragment))
      ? REDACTED
      : redactParams(entry, redactKeys);
  }
  return result;
}

/**
 * Cut strings longer than maxLength and mark them with "..."
 */
export function truncateForLog(value: unknown, maxLength: number): unknown {
  if (typeof value === 'string') {
    return value.length > maxLength ? `${value.slice(0, maxLength)}...` : value;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => truncateForLog(entry, maxLength));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, truncateForLog(entry, maxLength)])
    );
  }
  return value;
}

/**
 * Logs sanitized input params and the output or error of the inner call
 */
export class LoggingDecorator implements Runnable {
  private readonly redactKeys: readonly string[];
  private readonly truncateLength: number;

  constructor(
    private readonly inner: Runnable,
    private readonly scope: DecoratorScope,
    options: LoggingOptions = {}
  ) {
    this.redactKeys = (options.redactKeys ?? DEFAULT_REDACT_KEYS).map((key) => key.toLowerCase());
    this.truncateLength = options.truncateLength ?? 200;
  }

  async run(context: ContextView, params: TaskParams): Promise<unknown> {
    const { logger } = this.scope;
    logger.info({ params: redactParams(params, this.redactKeys) }, 'step params');

    try {
      const result = await this.inner.run(context, params);
      logger.info({ result: truncateForLog(result, this.truncateLength) }, 'step result');
      return result;
    } catch (error) {
      logger.error(
        {
          error_type: error instanceof Error ? error.name : typeof error,
          error_message: error instanceof Error ? error.message : String(error),
        },
        'step error'
      );
      throw error;
    }
  }
}

export const logging = (options: LoggingOptions = {}): DecoratorFactory =>
  (inner, scope) => new LoggingDecorator(inner, scope, options);
