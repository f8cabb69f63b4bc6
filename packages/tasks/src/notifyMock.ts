import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import {
  parseParams,
  silentLogger,
  type ContextView,
  type Logger,
  type Task,
  type TaskParams,
  type TaskTypeDefinition,
} from '@stepweave/core';

export const NOTIFY_CHANNELS = ['email', 'slack', 'console', 'webhook'] as const;

const notifyParamsSchema = z.object({
  channel: z.enum(NOTIFY_CHANNELS, {
    errorMap: () => ({ message: `must be one of: ${NOTIFY_CHANNELS.join(', ')}` }),
  }),
  message: z.string().min(1, 'must be a non-empty string').max(500),
  delay: z.number().min(0).max(10).default(0),
});

export interface NotifyResult {
  sent: true;
  channel: (typeof NOTIFY_CHANNELS)[number];
  message: string;
  timestamp: string;
}

export interface NotifyMockOptions {
  logger?: Logger;
  now?: () => Date;
}

/**
 * Pretends to deliver a notification after an optional delay (seconds)
 */
export class NotifyMockTask implements Task<NotifyResult> {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: NotifyMockOptions = {}) {
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? (() => new Date());
  }

  validateParams(params: TaskParams): void {
    parseParams(notifyParamsSchema, params);
  }

  before(params: TaskParams): void {
    this.logger.info({ channel: params.channel }, 'sending notification');
  }

  async execute(_context: ContextView, params: TaskParams): Promise<NotifyResult> {
    const { channel, message, delay } = parseParams(notifyParamsSchema, params);
    if (delay > 0) {
      await sleep(delay * 1000);
    }
    return { sent: true, channel, message, timestamp: this.now().toISOString() };
  }

  after(result: NotifyResult): void {
    this.logger.info({ channel: result.channel }, 'notification sent');
  }

  onError(error: unknown): void {
    this.logger.error({ err: error }, 'notification failed');
  }
}

export const notifyMockTaskType = (options: NotifyMockOptions = {}): TaskTypeDefinition<NotifyResult> => ({
  type: 'notify_mock',
  display_name: 'Mock Notification',
  description: 'Simulates sending a notification to a channel',
  category: 'notification',
  icon: 'bell',
  params_schema: {
    type: 'object',
    properties: {
      channel: { type: 'string', enum: [...NOTIFY_CHANNELS] },
      message: { type: 'string', minLength: 1, maxLength: 500 },
      delay: { type: 'number', default: 0, minimum: 0, maximum: 10 },
    },
    required: ['channel', 'message'],
  },
  create: () => new NotifyMockTask(options),
});
