import { z } from 'zod';
import { fetch, type Dispatcher } from 'undici';
import { parseParams, type ContextView, type Task, type TaskParams, type TaskTypeDefinition } from '@stepweave/core';

const BODY_PREVIEW_LENGTH = 500;

const httpGetParamsSchema = z.object({
  url: z
    .string({ required_error: 'url is required' })
    .url('must be a valid URL')
    .refine((value) => /^https?:\/\//i.test(value), 'must use http or https'),
  headers: z.record(z.string()).optional(),
});

export interface HttpGetResult {
  status_code: number;
  body: string;
}

export interface HttpGetOptions {
  dispatcher?: Dispatcher;
}

export class HttpGetTask implements Task<HttpGetResult> {
  constructor(private readonly options: HttpGetOptions = {}) {}

  validateParams(params: TaskParams): void {
    parseParams(httpGetParamsSchema, params);
  }

  async execute(_context: ContextView, params: TaskParams): Promise<HttpGetResult> {
    const { url, headers } = parseParams(httpGetParamsSchema, params);
    const response = await fetch(url, {
      method: 'GET',
      headers,
      ...(this.options.dispatcher ? { dispatcher: this.options.dispatcher } : {}),
    });
    const body = await response.text();
    return { status_code: response.status, body: body.slice(0, BODY_PREVIEW_LENGTH) };
  }
}

export const httpGetTaskType = (options: HttpGetOptions = {}): TaskTypeDefinition<HttpGetResult> => ({
  type: 'http_get',
  display_name: 'HTTP GET Request',
  description: 'Performs an HTTP GET request against a URL',
  category: 'input',
  icon: 'globe',
  params_schema: {
    type: 'object',
    properties: {
      url: { type: 'string', title: 'URL', format: 'uri' },
      headers: { type: 'object', title: 'Headers', additionalProperties: { type: 'string' } },
    },
    required: ['url'],
  },
  create: () => new HttpGetTask(options),
});
