import { describe, it, expect } from 'vitest';
import { contextFrom } from '../engine/context';
import { TaskValidationError } from '../errors';
import { parseParams, requireParams } from './params';
import { asRunnable, runTask, type Task, type TaskParams } from './task';
import { z } from 'zod';

function recordingTask(calls: string[], overrides: Partial<Task<string>> = {}): Task<string> {
  return {
    before: () => {
      calls.push('before');
    },
    validateParams: (params: TaskParams) => {
      calls.push('validate');
      requireParams(params, ['name']);
    },
    execute: (_context, params) => {
      calls.push('execute');
      return `hello ${String(params.name)}`;
    },
    after: (result) => {
      calls.push(`after:${result}`);
    },
    onError: (error) => {
      calls.push(`onError:${error instanceof Error ? error.message : 'unknown'}`);
      return { recovered: true };
    },
    ...overrides,
  };
}

const toMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

describe('runTask', () => {
  it('runs hooks in template order', async () => {
    const calls: string[] = [];
    const result = await runTask(recordingTask(calls), contextFrom(), { name: 'ada' });

    expect(result).toBe('hello ada');
    expect(calls).toEqual(['before', 'validate', 'execute', 'after:hello ada']);
  });

  it('short-circuits to onError and re-raises validation errors', async () => {
    const calls: string[] = [];
    const promise = runTask(recordingTask(calls), contextFrom(), {});

    await expect(promise).rejects.toThrow(TaskValidationError);
    expect(calls).toEqual(['before', 'validate', "onError:Parameter 'name' is required"]);
  });

  it('ignores the onError return value', async () => {
    const failure = new Error('disk on fire');
    const task = recordingTask([], {
      execute: () => {
        throw failure;
      },
    });

    await expect(runTask(task, contextFrom(), { name: 'x' })).rejects.toBe(failure);
  });

  it('re-raises the original error when onError itself fails', async () => {
    const failure = new Error('original');
    const hookFailures: string[] = [];
    const task = recordingTask([], {
      execute: () => {
        throw failure;
      },
      onError: async () => {
        throw new Error('hook broke');
      },
    });

    const promise = runTask(task, contextFrom(), { name: 'x' }, {
      onHookError: (hookError, original) => {
        hookFailures.push(`${toMessage(hookError)} <- ${toMessage(original)}`);
      },
    });

    await expect(promise).rejects.toBe(failure);
    expect(hookFailures).toEqual(['hook broke <- original']);
  });

  it('routes failures from before and after hooks through onError', async () => {
    const calls: string[] = [];
    const task = recordingTask(calls, {
      after: () => {
        throw new Error('after broke');
      },
    });

    await expect(runTask(task, contextFrom(), { name: 'x' })).rejects.toThrow('after broke');
    expect(calls).toEqual(['before', 'validate', 'execute', 'onError:after broke']);
  });

  it('works without optional hooks', async () => {
    const task: Task<number> = {
      validateParams: () => undefined,
      execute: async (context) => context.keys().length,
    };

    await expect(asRunnable(task).run(contextFrom({ a: 1, b: 2 }), {})).resolves.toBe(2);
  });
});

describe('params helpers', () => {
  const schema = z.object({ url: z.string().url(), retries: z.number().int().default(1) });

  it('returns parsed params with defaults', () => {
    expect(parseParams(schema, { url: 'http://example.test' })).toEqual({
      url: 'http://example.test',
      retries: 1,
    });
  });

  it('names the offending field', () => {
    try {
      parseParams(schema, { url: 'not a url' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(TaskValidationError);
      expect(error).toMatchObject({ field: 'url', code: 'TASK_PARAMS_INVALID' });
    }
  });

  it('rejects null required params', () => {
    expect(() => requireParams({ path: null }, ['path'])).toThrow("Parameter 'path' is required");
  });
});
