/**
 * Task registry
 * Maps a step type discriminator to a factory for its strategy
 */

import type { TaskDescriptor } from '@stepweave/types';
import { TaskRegistrationError, UnknownTaskTypeError } from '../errors';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import type { Task } from './task';

export interface TaskTypeDefinition<TResult = unknown>
  extends Omit<TaskDescriptor, 'display_name'> {
  display_name?: string;
  create: () => Task<TResult>;
}

interface RegisteredType {
  descriptor: TaskDescriptor;
  create: () => Task;
}

export interface TaskRegistryOptions {
  logger?: Logger;
}

export class TaskRegistry {
  private readonly types = new Map<string, RegisteredType>();
  private readonly logger: Logger;

  constructor(options: TaskRegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger();
  }

  register<TResult>(definition: TaskTypeDefinition<TResult>): void {
    const type: unknown = definition.type;
    if (typeof type !== 'string' || type.trim() === '') {
      throw new TaskRegistrationError('Task type definition must declare a non-empty type');
    }
    if (typeof definition.create !== 'function') {
      throw new TaskRegistrationError(`Task type '${type}' must provide a create function`);
    }
    if (this.types.has(type)) {
      throw new TaskRegistrationError(`Task type '${type}' is already registered`, 'TASK_TYPE_DUPLICATE');
    }

    const { create, display_name, ...rest } = definition;
    this.types.set(type, {
      descriptor: { ...rest, type, display_name: display_name ?? type },
      create,
    });
    this.logger.debug({ type }, 'task type registered');
  }

  /**
   * Fresh strategy instance per call
   */
  create(type: string): Task {
    const entry = this.types.get(type);
    if (!entry) {
      throw new UnknownTaskTypeError(type);
    }
    return entry.create();
  }

  has(type: string): boolean {
    return this.types.has(type);
  }

  list(): TaskDescriptor[] {
    return Array.from(this.types.values(), ({ descriptor }) => structuredClone(descriptor));
  }

  clear(): void {
    this.types.clear();
    this.logger.debug('task registry cleared');
  }
}
