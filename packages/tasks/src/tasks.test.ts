import { describe, it, expect, afterEach } from 'vitest';
import { MockAgent } from 'undici';
import {
  InMemoryWorkflowPersistence,
  TaskRegistry,
  TaskValidationError,
  contextFrom,
  createRuntime,
  loadConfig,
  runTask,
  silentLogger,
  type StepTimingEvent,
} from '@stepweave/core';
import {
  HttpGetTask,
  NotifyMockTask,
  TransformSimpleTask,
  builtinDecoratorConfig,
  registerBuiltinTasks,
} from './index';

const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

function mockAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return agent;
}

describe('HttpGetTask', () => {
  let agent: MockAgent | undefined;

  afterEach(async () => {
    await agent?.close();
    agent = undefined;
  });

  it('returns the status code and a body preview', async () => {
    agent = mockAgent();
    agent
      .get('http://api.test')
      .intercept({ path: '/items', method: 'GET' })
      .reply(200, 'y'.repeat(600));

    const task = new HttpGetTask({ dispatcher: agent });
    const result = await runTask(task, contextFrom(), { url: 'http://api.test/items' });

    expect(result.status_code).toBe(200);
    expect(result.body).toBe('y'.repeat(500));
  });

  it('does not treat HTTP errors as task failures', async () => {
    agent = mockAgent();
    agent.get('http://api.test').intercept({ path: '/missing', method: 'GET' }).reply(404, 'not found');

    const result = await runTask(new HttpGetTask({ dispatcher: agent }), contextFrom(), {
      url: 'http://api.test/missing',
    });

    expect(result).toEqual({ status_code: 404, body: 'not found' });
  });

  it('requires a url', () => {
    expect(() => new HttpGetTask().validateParams({})).toThrow(TaskValidationError);
    expect(() => new HttpGetTask().validateParams({})).toThrow("Invalid parameter 'url': url is required");
  });

  it('rejects non-http schemes', () => {
    expect(() => new HttpGetTask().validateParams({ url: 'ftp://files.test/a' })).toThrow(
      "Invalid parameter 'url': must use http or https"
    );
  });
});

describe('NotifyMockTask', () => {
  it('reports the sent notification', async () => {
    const task = new NotifyMockTask({ now: () => FIXED_NOW });

    const result = await runTask(task, contextFrom(), { channel: 'slack', message: 'deploy finished' });

    expect(result).toEqual({
      sent: true,
      channel: 'slack',
      message: 'deploy finished',
      timestamp: '2026-03-01T12:00:00.000Z',
    });
  });

  it('rejects unknown channels', () => {
    expect(() => new NotifyMockTask().validateParams({ channel: 'pager', message: 'x' })).toThrow(
      "Invalid parameter 'channel': must be one of: email, slack, console, webhook"
    );
  });

  it('rejects empty messages', () => {
    expect(() => new NotifyMockTask().validateParams({ channel: 'email', message: '' })).toThrow(
      "Invalid parameter 'message': must be a non-empty string"
    );
  });
});

describe('TransformSimpleTask', () => {
  const task = new TransformSimpleTask();

  it('extracts a field from an upstream result', () => {
    const context = contextFrom({ fetch: { status_code: 200, body: 'ok' } });
    expect(task.execute(context, { source: 'fetch', field: 'body', uppercase: true })).toEqual({
      source: 'fetch',
      value: 'OK',
    });
  });

  it('returns the whole upstream result without a field', () => {
    expect(task.execute(contextFrom({ a: [1, 2] }), { source: 'a' })).toEqual({ source: 'a', value: [1, 2] });
  });

  it('fails when the upstream node has no result', () => {
    expect(() => task.execute(contextFrom(), { source: 'fetch' })).toThrow("No result available for node 'fetch'");
  });

  it('fails when the field is missing', () => {
    expect(() => task.execute(contextFrom({ a: { x: 1 } }), { source: 'a', field: 'y' })).toThrow(
      "Result of 'a' has no field 'y'"
    );
  });
});

describe('registerBuiltinTasks', () => {
  it('registers the example types', () => {
    const registry = new TaskRegistry();
    registerBuiltinTasks(registry);

    expect(registry.list().map((descriptor) => descriptor.type)).toEqual([
      'http_get',
      'notify_mock',
      'transform_simple',
    ]);
    expect(registry.list()[0]).toMatchObject({ display_name: 'HTTP GET Request', icon: 'globe' });
  });

  it('configures decorators innermost first', () => {
    const config = builtinDecoratorConfig();

    expect(config.http_get).toHaveLength(2);
    expect(config.notify_mock).toHaveLength(1);
    expect(config.transform_simple).toHaveLength(2);
  });
});

describe('runtime with built-in tasks', () => {
  let agent: MockAgent | undefined;

  afterEach(async () => {
    await agent?.close();
    agent = undefined;
  });

  it('runs a fetch → transform → notify workflow end to end', async () => {
    agent = mockAgent();
    agent
      .get('http://status.test')
      .intercept({ path: '/health', method: 'GET' })
      .reply(200, 'green');

    const timings: StepTimingEvent[] = [];
    const persistence = new InMemoryWorkflowPersistence();
    const runtime = createRuntime({
      config: loadConfig({ STEPWEAVE_LOG_LEVEL: 'silent' }),
      logger: silentLogger(),
      persistence,
      decorators: (config) =>
        builtinDecoratorConfig({
          timing: { onTiming: (event) => timings.push(event) },
          logging: { redactKeys: config.redactKeys, truncateLength: config.logTruncateLength },
        }),
      bootstrap: (registry) => registerBuiltinTasks(registry, { http: { dispatcher: agent } }),
    });

    const result = await runtime.runSource({
      name: 'health-check',
      nodes: [
        { id: 'fetch', type: 'http_get', params: { url: 'http://status.test/health' } },
        {
          id: 'extract',
          type: 'transform_simple',
          depends_on: 'fetch',
          params: { source: 'fetch', field: 'body', uppercase: true },
        },
        {
          id: 'notify',
          type: 'notify_mock',
          depends_on: ['extract'],
          params: { channel: 'console', message: 'health checked' },
        },
      ],
    });

    expect(result.status).toBe('SUCCESS');
    expect(result.results.extract).toMatchObject({
      status: 'SUCCESS',
      result: { source: 'fetch', value: 'GREEN' },
    });
    expect(timings.map((event) => `${event.node_key}:${event.outcome}`)).toEqual([
      'fetch:success',
      'extract:success',
      'notify:success',
    ]);
    expect((await persistence.getRun(result.run_id))?.status).toBe('SUCCESS');
  });

  it('skips the rest of the chain when the fetch params are invalid', async () => {
    const runtime = createRuntime({
      config: loadConfig({}),
      logger: silentLogger(),
      decorators: builtinDecoratorConfig(),
      bootstrap: (registry) => registerBuiltinTasks(registry),
    });

    const result = await runtime.runSource({
      name: 'broken',
      nodes: [
        { id: 'fetch', type: 'http_get', params: {} },
        { id: 'notify', type: 'notify_mock', depends_on: 'fetch', params: { channel: 'email', message: 'x' } },
      ],
    });

    expect(result.status).toBe('FAILED');
    expect(result.results.fetch).toMatchObject({
      status: 'FAILED',
      error: "Invalid parameter 'url': url is required",
    });
    expect(result.results.notify).toMatchObject({ status: 'SKIPPED', skipped_due_to: 'fetch' });
  });
});
