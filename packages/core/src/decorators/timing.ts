import { performance } from 'node:perf_hooks';
import type { ContextView } from '../engine/context';
import type { Runnable, TaskParams } from '../tasks/task';
import type { DecoratorFactory, DecoratorScope } from './chain';

export interface StepTimingEvent {
  type: string;
  node_key: string;
  run_id: string;
  duration_ms: number;
  outcome: 'success' | 'error';
}

export interface TimingOptions {
  onTiming?: (event: StepTimingEvent) => void;
}

/**
 * Measures wall-clock time around the inner call
 */
export class TimingDecorator implements Runnable {
  constructor(
    private readonly inner: Runnable,
    private readonly scope: DecoratorScope,
    private readonly options: TimingOptions = {}
  ) {}

  async run(context: ContextView, params: TaskParams): Promise<unknown> {
    const startedAt = performance.now();
    try {
      const result = await this.inner.run(context, params);
      this.emit(startedAt, 'success');
      return result;
    } catch (error) {
      this.emit(startedAt, 'error');
      throw error;
    }
  }

  private emit(startedAt: number, outcome: StepTimingEvent['outcome']): void {
    const { command, logger } = this.scope;
    const event: StepTimingEvent = {
      type: command.type,
      node_key: command.node_key,
      run_id: command.run_id,
      duration_ms: Math.round((performance.now() - startedAt) * 1000) / 1000,
      outcome,
    };

    if (outcome === 'success') {
      logger.info({ duration_ms: event.duration_ms }, 'step completed');
    } else {
      logger.warn({ duration_ms: event.duration_ms }, 'step failed');
    }
    this.options.onTiming?.(event);
  }
}

export const timing = (options: TimingOptions = {}): DecoratorFactory =>
  (inner, scope) => new TimingDecorator(inner, scope, options);
