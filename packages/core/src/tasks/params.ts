import type { z } from 'zod';
import { TaskValidationError } from '../errors';
import type { TaskParams } from './task';

/**
 * Parse step params against a zod schema, failing with the first offending field
 */
export function parseParams<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  params: TaskParams
): z.output<TSchema> {
  const parsed = schema.safeParse(params);
  if (parsed.success) {
    return parsed.data;
  }

  const [issue] = parsed.error.issues;
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'params';
  const message = issue ? issue.message : 'Invalid params';
  throw new TaskValidationError(field, `Invalid parameter '${field}': ${message}`);
}

/**
 * Fail unless every listed field is present
 */
export function requireParams(params: TaskParams, fields: readonly string[]): void {
  for (const field of fields) {
    if (params[field] === undefined || params[field] === null) {
      throw new TaskValidationError(field, `Parameter '${field}' is required`);
    }
  }
}
