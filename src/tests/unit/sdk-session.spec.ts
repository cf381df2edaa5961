import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ErrorCode, ListToolsRequestSchema, McpError } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, describe, expect, it, vi, type Mock } from 'vitest';

import type { McpLogFn, McpSession } from '../../mcp/session.js';
import type { ServerConfig } from '../../types.js';

import { connectSdkSession, formatServerConfigForLog } from '../../mcp/sdk-session.js';

const config: ServerConfig = { name: 'clock', type: 'stdio', command: 'clock-server' };

function createClockServer(): Server {
  const server = new Server({ name: 'clock', version: '0.0.1' }, { capabilities: { tools: {} } });
  server.setRequestHandler(ListToolsRequestSchema, () => ({
    tools: [
      {
        name: 'get_time',
        description: 'Current time in a zone',
        inputSchema: { type: 'object', properties: { zone: { type: 'string' } } },
      },
    ],
  }));
  server.setRequestHandler(CallToolRequestSchema, (request) => {
    if (request.params.name !== 'get_time') {
      throw new McpError(ErrorCode.InvalidParams, `no tool ${request.params.name}`);
    }
    const zone = typeof request.params.arguments?.zone === 'string' ? request.params.arguments.zone : 'UTC';
    return { content: [{ type: 'text', text: `12:00 ${zone}` }] };
  });
  return server;
}

describe('connectSdkSession', () => {
  const opened: McpSession[] = [];

  afterEach(async () => {
    await Promise.all(opened.splice(0).map(async (session) => { await session.close(); }));
  });

  async function connect(): Promise<{ session: McpSession; server: Server; log: Mock<McpLogFn> }> {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    const server = createClockServer();
    await server.connect(serverTransport);
    const log = vi.fn<McpLogFn>();
    const session = await connectSdkSession(config, clientTransport, { startupTimeoutMs: 2000, requestTimeoutMs: 2000, log });
    opened.push(session);
    return { session, server, log };
  }

  it('lists tools as descriptors owned by the server', async () => {
    const { session } = await connect();

    expect(await session.listTools()).toEqual([
      {
        name: 'get_time',
        serverName: 'clock',
        description: 'Current time in a zone',
        inputSchema: { type: 'object', properties: { zone: { type: 'string' } } },
      },
    ]);
  });

  it('calls a tool and returns the raw result', async () => {
    const { session } = await connect();

    const raw = await session.callTool('get_time', { zone: 'CET' });

    expect(raw).toMatchObject({ content: [{ type: 'text', text: '12:00 CET' }] });
  });

  it('rejects with the protocol error for a JSON-RPC error reply', async () => {
    const { session } = await connect();

    await expect(session.callTool('set_time', {})).rejects.toMatchObject({ code: ErrorCode.InvalidParams });
  });

  it('fires onclose once when the server side goes away', async () => {
    const { session, server } = await connect();
    const onclose = vi.fn();
    session.onclose = onclose;

    await server.close();
    await vi.waitFor(() => { expect(onclose).toHaveBeenCalledTimes(1); });

    await session.close();
    expect(onclose).toHaveBeenCalledTimes(1);
  });

  it('logs a trace line once connected', async () => {
    const { log } = await connect();

    expect(log).toHaveBeenCalledWith('TRC', "connected to 'clock'", 'mcp:clock');
  });
});

describe('formatServerConfigForLog', () => {
  it('shows env and header keys but never their values', () => {
    expect(formatServerConfigForLog({
      name: 'local',
      type: 'stdio',
      command: 'tool-server',
      args: ['--fast'],
      env: { API_TOKEN: 'test-secret' },
    })).toBe("server='local', type=stdio, command='tool-server', args=['--fast'], env_keys=[API_TOKEN]");
    expect(formatServerConfigForLog({
      name: 'remote',
      type: 'http',
      url: 'https://tools.test/mcp',
      headers: { Authorization: 'Bearer test-secret' },
      requestTimeoutMs: 5000,
    })).toBe("server='remote', type=http, url='https://tools.test/mcp', header_keys=[Authorization], requestTimeoutMs=5000");
  });
});
