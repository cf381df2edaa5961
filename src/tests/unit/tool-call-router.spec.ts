import { describe, expect, it } from 'vitest';

import { ToolCallRouter } from '../../headends/tool-call-router.js';
import { McpConnectionManager } from '../../mcp/connection-manager.js';
import { ToolExecutor } from '../../mcp/tool-executor.js';
import { ToolManager } from '../../mcp/tool-manager.js';
import { createFakeSessionFarm, makeRegistry, textResult, type FakeServerBehavior } from '../fixtures/fake-sessions.js';

const behaviors: Record<string, FakeServerBehavior> = {
  time: { tools: [{ name: 'get_time' }], call: () => textResult('12:00 UTC') },
  weather: {
    tools: [{ name: 'get_weather', inputSchema: { type: 'object', properties: { city: { type: 'string' } }, required: ['city'] } }],
    call: (_name, args) => {
      if (args.city === 'Atlantis') return { isError: true, content: [{ type: 'text', text: 'city not found' }] };
      return { content: [{ type: 'text', text: `Rain in ${String(args.city)}` }, { type: 'image', mimeType: 'image/png', data: 'iVBO' }] };
    },
  },
};

async function setup() {
  const registry = makeRegistry({ time: {}, weather: {} });
  const farm = createFakeSessionFarm(behaviors);
  const connections = new McpConnectionManager(registry, { sessionFactory: farm.factory });
  const tools = new ToolManager(registry, connections);
  await tools.build();
  const router = new ToolCallRouter(new ToolExecutor(tools, connections));
  return { router, farm };
}

describe('ToolCallRouter', () => {
  it('runs the call and returns display content', async () => {
    const { router } = await setup();

    const response = await router.handle({ type: 'mcp-tool-call', tool_name: 'get_weather', arguments: { city: 'Bergen' } });

    expect(response).toEqual({
      type: 'mcp-tool-response',
      tool_name: 'get_weather',
      result: {
        content: [
          { type: 'text', data: 'Rain in Bergen' },
          { type: 'image', data: 'data:image/png;base64,iVBO' },
        ],
      },
    });
  });

  it('treats missing arguments as an empty object', async () => {
    const { router, farm } = await setup();

    const response = await router.handle({ type: 'mcp-tool-call', tool_name: 'get_time' });

    expect(response).toEqual({ type: 'mcp-tool-response', tool_name: 'get_time', result: { content: [{ type: 'text', data: '12:00 UTC' }] } });
    expect(farm.sessions('time')[0]?.calls).toEqual([{ name: 'get_time', args: {} }]);
  });

  it('answers a missing tool name without running anything', async () => {
    const { router } = await setup();

    expect(await router.handle({ type: 'mcp-tool-call', arguments: {} })).toEqual({
      type: 'mcp-tool-response',
      tool_name: null,
      error: 'Missing tool_name',
    });
    expect(await router.handle({ type: 'mcp-tool-call', tool_name: '   ' })).toEqual({
      type: 'mcp-tool-response',
      tool_name: null,
      error: 'Missing tool_name',
    });
  });

  it('rejects arguments that are not an object', async () => {
    const { router } = await setup();

    const response = await router.handle({ type: 'mcp-tool-call', tool_name: 'get_time', arguments: ['a'] });

    expect(response).toMatchObject({ type: 'mcp-tool-response', tool_name: 'get_time' });
    expect(response !== undefined && 'error' in response ? response.error : '').toMatch(/^Invalid tool call: arguments: /);
  });

  it('returns the error text of a failed call as content', async () => {
    const { router } = await setup();

    expect(await router.handle({ type: 'mcp-tool-call', tool_name: 'get_weather', arguments: { city: 'Atlantis' } })).toEqual({
      type: 'mcp-tool-response',
      tool_name: 'get_weather',
      result: { content: [{ type: 'text', data: 'city not found' }] },
    });
    expect(await router.handle({ type: 'mcp-tool-call', tool_name: 'teleport' })).toEqual({
      type: 'mcp-tool-response',
      tool_name: 'teleport',
      result: { content: [{ type: 'text', data: "unknown tool 'teleport'" }] },
    });
  });

  it('stays silent when the client is gone', async () => {
    const { router } = await setup();
    const controller = new AbortController();
    controller.abort();

    expect(await router.handle({ type: 'mcp-tool-call', tool_name: 'get_time' }, { signal: controller.signal })).toBeUndefined();
  });
});
