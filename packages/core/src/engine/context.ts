import { ContextWriteError } from '../errors';

/**
 * Read-only view of upstream results handed to executing steps
 */
export interface ContextView {
  get(nodeId: string): unknown;
  has(nodeId: string): boolean;
  keys(): string[];
  toJSON(): Record<string, unknown>;
}

/**
 * Results of completed nodes for a single run. Owned by the engine,
 * extended once per completed node and never rewritten.
 */
export class ExecutionContext {
  private readonly results = new Map<string, unknown>();
  private readonly readOnly: ContextView;

  constructor() {
    const results = this.results;
    this.readOnly = Object.freeze({
      get: (nodeId: string) => results.get(nodeId),
      has: (nodeId: string) => results.has(nodeId),
      keys: () => [...results.keys()],
      toJSON: () => Object.fromEntries(results),
    });
  }

  /** Stores the result deep-frozen, so readers share it without being able to change it */
  set(nodeId: string, result: unknown): void {
    if (this.results.has(nodeId)) {
      throw new ContextWriteError(nodeId);
    }
    this.results.set(nodeId, deepFreeze(result));
  }

  get size(): number {
    return this.results.size;
  }

  view(): ContextView {
    return this.readOnly;
  }
}

/** A view over a fixed set of results, for running a task outside the engine. */
export function contextFrom(results: Record<string, unknown> = {}): ContextView {
  const context = new ExecutionContext();
  for (const [nodeId, result] of Object.entries(results)) {
    context.set(nodeId, result);
  }
  return context.view();
}

/**
 * Freezes plain objects and arrays in place, all the way down.
 * Class instances (dates, buffers) are left as they are.
 */
export function deepFreeze<T>(value: T): T {
  if (isFreezable(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function isFreezable(value: unknown): value is object {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return false;
  }
  if (Array.isArray(value)) {
    return true;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
