import { describe, it, expect, beforeEach } from 'vitest';
import { TaskRegistrationError, UnknownTaskTypeError } from '../errors';
import { TaskRegistry, type TaskTypeDefinition } from './registry';

const definition = (type: string, extra: Partial<TaskTypeDefinition> = {}): TaskTypeDefinition => ({
  type,
  create: () => ({
    validateParams: () => undefined,
    execute: () => type,
  }),
  ...extra,
});

describe('TaskRegistry', () => {
  let registry: TaskRegistry;

  beforeEach(() => {
    registry = new TaskRegistry();
  });

  it('creates a fresh instance per call', () => {
    registry.register(definition('echo'));

    const first = registry.create('echo');
    const second = registry.create('echo');
    expect(first).not.toBe(second);
    expect(registry.has('echo')).toBe(true);
  });

  it('rejects a second registration under the same type', () => {
    registry.register(definition('echo'));

    expect(() => registry.register(definition('echo'))).toThrow(
      new TaskRegistrationError("Task type 'echo' is already registered", 'TASK_TYPE_DUPLICATE')
    );
  });

  it('rejects definitions without a type', () => {
    expect(() => registry.register(definition('  '))).toThrow(TaskRegistrationError);
    expect(() => registry.register(definition('  '))).toThrow('must declare a non-empty type');
  });

  it('fails to create unregistered types', () => {
    expect(() => registry.create('missing')).toThrow(UnknownTaskTypeError);
    expect(() => registry.create('missing')).toThrow('Unknown task type: missing');
  });

  it('accepts a re-registration after clear', () => {
    registry.register(definition('echo'));
    registry.clear();

    expect(registry.list()).toEqual([]);
    expect(() => registry.register(definition('echo'))).not.toThrow();
    expect(registry.has('echo')).toBe(true);
  });

  it('lists descriptors in registration order without factories', () => {
    registry.register(
      definition('http_get', {
        display_name: 'HTTP GET',
        category: 'input',
        params_schema: { type: 'object', required: ['url'] },
      })
    );
    registry.register(definition('notify'));

    expect(registry.list()).toEqual([
      {
        type: 'http_get',
        display_name: 'HTTP GET',
        category: 'input',
        params_schema: { type: 'object', required: ['url'] },
      },
      { type: 'notify', display_name: 'notify' },
    ]);
  });

  it('returns identical listings on repeated calls', () => {
    registry.register(definition('a'));
    registry.register(definition('b'));

    expect(registry.list()).toEqual(registry.list());
  });

  it('does not let callers mutate registered descriptors', () => {
    registry.register(definition('a', { display_name: 'A' }));
    const [descriptor] = registry.list();
    descriptor.display_name = 'changed';

    expect(registry.list()[0].display_name).toBe('A');
  });

  it('does not share parameter schemas with callers', () => {
    registry.register(definition('a', { params_schema: { type: 'object', required: ['url'] } }));
    const [descriptor] = registry.list();
    descriptor.params_schema?.required?.push('extra');

    expect(registry.list()[0].params_schema).toEqual({ type: 'object', required: ['url'] });
  });
});
