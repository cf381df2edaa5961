import { describe, expect, it, vi } from 'vitest';

import type { McpLogFn } from '../../mcp/session.js';
import type { PresentationMode, ToolCallRequest, ToolExecutionEvent } from '../../types.js';

import { McpConnectionManager } from '../../mcp/connection-manager.js';
import { parsePromptToolCalls, ToolExecutor } from '../../mcp/tool-executor.js';
import { ToolManager } from '../../mcp/tool-manager.js';
import { createFakeSessionFarm, makeRegistry, textResult, type FakeServerBehavior } from '../fixtures/fake-sessions.js';

const weatherSchema = {
  type: 'object',
  properties: { city: { type: 'string' } },
  required: ['city'],
};

const defaultBehaviors: Record<string, FakeServerBehavior> = {
  time: {
    tools: [{ name: 'get_time', description: 'Current time' }],
    call: () => textResult('12:00 UTC'),
  },
  weather: {
    tools: [{ name: 'get_weather', description: 'Weather by city', inputSchema: weatherSchema }],
    call: (_name, args) => textResult(`Sunny in ${String(args.city)}`),
  },
};

async function setup(behaviors: Record<string, FakeServerBehavior> = defaultBehaviors, validateArguments = true) {
  const registry = makeRegistry(Object.fromEntries(Object.keys(behaviors).map((name) => [name, {}])));
  const farm = createFakeSessionFarm(behaviors);
  const log = vi.fn<McpLogFn>();
  const connections = new McpConnectionManager(registry, { sessionFactory: farm.factory });
  const tools = new ToolManager(registry, connections);
  await tools.build();
  const executor = new ToolExecutor(tools, connections, { log, validateArguments });
  return { executor, farm, log };
}

async function collect(
  stream: AsyncGenerator<ToolExecutionEvent, void, undefined>,
  onEvent?: (event: ToolExecutionEvent) => void,
): Promise<ToolExecutionEvent[]> {
  const events: ToolExecutionEvent[] = [];
  // eslint-disable-next-line functional/no-loop-statements
  for await (const event of stream) {
    events.push(event);
    onEvent?.(event);
  }
  return events;
}

const call = (id: string, name: string, args: Record<string, unknown> = {}): ToolCallRequest => ({ id, name, arguments: args });

describe('ToolExecutor.executeTools', () => {
  it('runs a mixed batch in order and reports every outcome', async () => {
    const { executor } = await setup();

    const events = await collect(executor.executeTools([
      call('c1', 'get_time'),
      call('c2', 'get_weather', { city: 'Athens' }),
      call('c3', 'teleport'),
    ], 'prompt'));

    expect(events.map((e) => (e.type === 'batch_complete' ? e.type : `${e.callId}:${e.status}`))).toEqual([
      'c1:running',
      'c1:completed',
      'c2:running',
      'c2:completed',
      'c3:running',
      'c3:error',
      'batch_complete',
    ]);

    const last = events[events.length - 1];
    if (last?.type !== 'batch_complete') throw new Error('expected batch_complete last');
    expect(last.results.map((r) => [r.callId, r.serverName, r.isError, r.summary])).toEqual([
      ['c1', 'time', false, '12:00 UTC'],
      ['c2', 'weather', false, 'Sunny in Athens'],
      ['c3', undefined, true, "unknown tool 'teleport'"],
    ]);
    expect(last.results[2]?.errorKind).toBe('unknown_tool');
  });

  it('rejects arguments that fail the input schema without calling the server', async () => {
    const { executor, farm } = await setup();

    const events = await collect(executor.executeTools([call('c1', 'get_weather', { city: 7 })], 'openai'));

    const done = events[1];
    if (done?.type !== 'tool_call_status' || done.status === 'running') throw new Error('expected a finished status');
    expect(done.status).toBe('error');
    expect(done.result.errorKind).toBe('invalid_arguments');
    expect(done.result.summary).toBe("invalid arguments for 'get_weather': /city must be string");
    expect(done.result.metadata).toEqual({ executed: false, problems: ['/city must be string'] });
    expect(farm.sessions('weather')[0]?.calls).toEqual([]);
  });

  it('reports a missing required property at the root path', async () => {
    const { executor } = await setup();

    const events = await collect(executor.executeTools([call('c1', 'get_weather', {})], 'prompt'));

    const done = events[1];
    if (done?.type !== 'tool_call_status' || done.status === 'running') throw new Error('expected a finished status');
    expect(done.result.summary).toBe("invalid arguments for 'get_weather': / must have required property 'city'");
  });

  it('skips validation when it is turned off', async () => {
    const { executor } = await setup(defaultBehaviors, false);

    const events = await collect(executor.executeTools([call('c1', 'get_weather', { city: 7 })], 'prompt'));

    const done = events[1];
    if (done?.type !== 'tool_call_status' || done.status === 'running') throw new Error('expected a finished status');
    expect(done.status).toBe('completed');
    expect(done.result.summary).toBe('Sunny in 7');
  });

  it('continues the batch after a tool error', async () => {
    const { executor } = await setup({
      ...defaultBehaviors,
      time: { tools: [{ name: 'get_time' }], call: () => ({ isError: true, content: [{ type: 'text', text: 'clock stopped' }] }) },
    });

    const events = await collect(executor.executeTools([call('c1', 'get_time'), call('c2', 'get_weather', { city: 'Oslo' })], 'prompt'));

    const last = events[events.length - 1];
    if (last?.type !== 'batch_complete') throw new Error('expected batch_complete last');
    expect(last.results.map((r) => [r.isError, r.errorKind, r.summary])).toEqual([
      [true, 'tool_error', 'clock stopped'],
      [false, undefined, 'Sunny in Oslo'],
    ]);
  });

  it('stops quietly once the signal aborts mid-batch', async () => {
    const { executor, farm } = await setup();
    const controller = new AbortController();

    const events = await collect(
      executor.executeTools([call('c1', 'get_time'), call('c2', 'get_weather', { city: 'Rome' })], 'prompt', { signal: controller.signal }),
      (event) => { if (event.type === 'tool_call_status' && event.status === 'running') controller.abort(); },
    );

    expect(events).toEqual([{ type: 'tool_call_status', callId: 'c1', toolName: 'get_time', status: 'running' }]);
    expect(farm.sessions('weather')[0]?.calls ?? []).toEqual([]);
  });

  it('emits nothing for an already aborted signal', async () => {
    const { executor } = await setup();
    const controller = new AbortController();
    controller.abort();

    const events = await collect(executor.executeTools([call('c1', 'get_time')], 'prompt', { signal: controller.signal }));

    expect(events).toEqual([]);
  });

  it('completes an empty batch with no results', async () => {
    const { executor } = await setup();

    expect(await collect(executor.executeTools([], 'claude'))).toEqual([{ type: 'batch_complete', results: [] }]);
  });

  it.each<PresentationMode>(['claude', 'openai', 'prompt'])('passes text through unchanged in %s mode', async (mode) => {
    const { executor } = await setup();

    const events = await collect(executor.executeTools([call('c1', 'get_time')], mode));

    const last = events[events.length - 1];
    if (last?.type !== 'batch_complete') throw new Error('expected batch_complete last');
    expect(last.results[0]?.blocks).toEqual([{ type: 'text', text: '12:00 UTC' }]);
    expect(last.results[0]?.display).toEqual([{ type: 'text', data: '12:00 UTC' }]);
  });

  it('hands images to Claude as base64 blocks and describes them to other modes', async () => {
    const behaviors: Record<string, FakeServerBehavior> = {
      chart: {
        tools: [{ name: 'plot' }],
        call: () => ({ content: [{ type: 'image', mimeType: 'image/png', data: 'iVBORw0=' }] }),
      },
    };
    const { executor } = await setup(behaviors);

    const claude = await collect(executor.executeTools([call('c1', 'plot')], 'claude'));
    const prompt = await collect(executor.executeTools([call('c2', 'plot')], 'prompt'));

    const claudeLast = claude[claude.length - 1];
    const promptLast = prompt[prompt.length - 1];
    if (claudeLast?.type !== 'batch_complete' || promptLast?.type !== 'batch_complete') throw new Error('expected batch_complete last');
    expect(claudeLast.results[0]?.blocks).toEqual([
      { type: 'image', source: { type: 'base64', media_type: 'image/png', data: 'iVBORw0=' } },
    ]);
    expect(promptLast.results[0]?.blocks).toEqual([{ type: 'text', text: '[image image/png]' }]);
    expect(promptLast.results[0]?.display).toEqual([{ type: 'image', data: 'data:image/png;base64,iVBORw0=' }]);
  });
});

describe('parsePromptToolCalls', () => {
  it('reads a single call object', () => {
    const calls = parsePromptToolCalls('{"tool": "get_weather", "arguments": {"city": "Lima"}}');

    expect(calls).toHaveLength(1);
    expect(calls[0]?.name).toBe('get_weather');
    expect(calls[0]?.arguments).toEqual({ city: 'Lima' });
    expect(calls[0]?.id).toMatch(/^call_[0-9a-f-]{36}$/);
  });

  it('reads an array and a tool_calls wrapper', () => {
    expect(parsePromptToolCalls('[{"tool": "a"}, {"name": "b", "args": {"x": 1}}]').map((c) => [c.name, c.arguments])).toEqual([
      ['a', {}],
      ['b', { x: 1 }],
    ]);
    expect(parsePromptToolCalls('{"tool_calls": [{"tool": "c"}]}').map((c) => c.name)).toEqual(['c']);
  });

  it('reads a call wrapped in a code fence', () => {
    const text = '```json\n{"tool": "get_time", "arguments": {}}\n```';

    expect(parsePromptToolCalls(text).map((c) => c.name)).toEqual(['get_time']);
  });

  it('parses string-encoded arguments', () => {
    expect(parsePromptToolCalls('{"tool": "get_weather", "arguments": "{\\"city\\": \\"Quito\\"}"}')[0]?.arguments).toEqual({ city: 'Quito' });
  });

  it('returns nothing when the text holds no call', () => {
    expect(parsePromptToolCalls('The weather is nice today.')).toEqual([]);
    expect(parsePromptToolCalls('{"answer": 42}')).toEqual([]);
    expect(parsePromptToolCalls('')).toEqual([]);
  });
});
