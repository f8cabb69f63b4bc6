import { z } from 'zod';
import {
  TaskValidationError,
  parseParams,
  type ContextView,
  type Task,
  type TaskParams,
  type TaskTypeDefinition,
} from '@stepweave/core';

const transformParamsSchema = z.object({
  source: z.string().min(1, 'must name an upstream node'),
  field: z.string().min(1).optional(),
  uppercase: z.boolean().default(false),
});

export interface TransformResult {
  source: string;
  value: unknown;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Picks a value out of an upstream node's result
 */
export class TransformSimpleTask implements Task<TransformResult> {
  validateParams(params: TaskParams): void {
    parseParams(transformParamsSchema, params);
  }

  execute(context: ContextView, params: TaskParams): TransformResult {
    const { source, field, uppercase } = parseParams(transformParamsSchema, params);
    if (!context.has(source)) {
      throw new TaskValidationError('source', `No result available for node '${source}'`);
    }

    const upstream = context.get(source);
    let value: unknown = upstream;
    if (field !== undefined) {
      if (!isRecord(upstream) || !(field in upstream)) {
        throw new Error(`Result of '${source}' has no field '${field}'`);
      }
      value = upstream[field];
    }

    if (uppercase && typeof value === 'string') {
      value = value.toUpperCase();
    }
    return { source, value };
  }
}

export const transformSimpleTaskType = (): TaskTypeDefinition<TransformResult> => ({
  type: 'transform_simple',
  display_name: 'Simple Transform',
  description: 'Extracts a field from an upstream result',
  category: 'transform',
  icon: 'shuffle',
  params_schema: {
    type: 'object',
    properties: {
      source: { type: 'string', title: 'Upstream node' },
      field: { type: 'string', title: 'Field' },
      uppercase: { type: 'boolean', default: false },
    },
    required: ['source'],
  },
  create: () => new TransformSimpleTask(),
});
