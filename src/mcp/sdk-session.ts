import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';

import type { ServerConfig, ToolDescriptor } from '../types.js';
import type { McpLogFn, McpSession, SessionCallOptions, SessionFactory, SessionFactoryOptions } from './session.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

import { toErrorMessage, warn, withTimeout } from '../utils.js';
import { VERSION } from '../version.js';

const CLIENT_INFO = { name: 'mcp-tool-bridge', version: VERSION } as const;

/**
 * Format a server config for logs. Env and header values are never printed, only their keys.
 */
export function formatServerConfigForLog(config: ServerConfig): string {
  const parts: string[] = [`server='${config.name}'`, `type=${config.type}`];
  switch (config.type) {
    case 'stdio':
      parts.push(`command='${config.command ?? '<missing>'}'`);
      if (config.args !== undefined && config.args.length > 0) {
        parts.push(`args=[${config.args.map((a) => `'${a}'`).join(', ')}]`);
      }
      if (config.env !== undefined) {
        const envKeys = Object.keys(config.env);
        if (envKeys.length > 0) parts.push(`env_keys=[${envKeys.join(', ')}]`);
      }
      break;
    case 'http':
    case 'sse':
      parts.push(`url='${config.url ?? '<missing>'}'`);
      if (config.headers !== undefined) {
        const headerKeys = Object.keys(config.headers);
        if (headerKeys.length > 0) parts.push(`header_keys=[${headerKeys.join(', ')}]`);
      }
      break;
  }
  if (config.requestTimeoutMs !== undefined) {
    parts.push(`requestTimeoutMs=${String(config.requestTimeoutMs)}`);
  }
  return parts.join(', ');
}

function createStdioTransport(config: ServerConfig, log: McpLogFn): StdioClientTransport {
  if (typeof config.command !== 'string' || config.command.length === 0) {
    throw new Error(`Stdio MCP server '${config.name}' requires a string 'command'`);
  }
  const env: Record<string, string> = { ...getDefaultEnvironment(), ...(config.env ?? {}) };
  const transport = new StdioClientTransport({ command: config.command, args: [...(config.args ?? [])], env, stderr: 'pipe' });
  const stderr = transport.stderr;
  if (stderr !== null) {
    stderr.on('data', (chunk: Buffer) => {
      try {
        const text = chunk.toString('utf8').trim();
        if (text.length > 0) log('WRN', `stderr '${config.name}': ${text}`, `mcp:${config.name}`);
      } catch (e) { warn(`mcp stdio stderr relay failed: ${toErrorMessage(e)}`); }
    });
  }
  return transport;
}

function createTransport(config: ServerConfig, log: McpLogFn): Transport {
  switch (config.type) {
    case 'stdio':
      return createStdioTransport(config, log);
    case 'http': {
      if (config.url === undefined || config.url.length === 0) {
        throw new Error(`HTTP MCP server '${config.name}' requires a 'url'`);
      }
      return new StreamableHTTPClientTransport(new URL(config.url), { requestInit: { headers: { ...(config.headers ?? {}) } } });
    }
    case 'sse': {
      if (config.url === undefined || config.url.length === 0) {
        throw new Error(`SSE MCP server '${config.name}' requires a 'url'`);
      }
      const resolvedHeaders = config.headers ?? {};
      const customFetch: typeof fetch = async (input, init) => {
        const headers = new Headers(init?.headers);
        Object.entries(resolvedHeaders).forEach(([k, v]) => { headers.set(k, v); });
        return fetch(input, { ...init, headers });
      };
      // eslint-disable-next-line @typescript-eslint/no-deprecated -- legacy SSE servers are still configured in the wild
      return new SSEClientTransport(new URL(config.url), {
        eventSourceInit: { fetch: customFetch },
        requestInit: { headers: { ...resolvedHeaders } },
        fetch: customFetch,
      });
    }
  }
}

class SdkSession implements McpSession {
  readonly serverName: string;
  readonly createdAt = Date.now();
  readonly supportsConcurrentCalls: boolean;
  onclose?: () => void;
  private closed = false;

  constructor(private readonly client: Client, config: ServerConfig, private readonly requestTimeoutMs: number) {
    this.serverName = config.name;
    this.supportsConcurrentCalls = config.serializeCalls !== true;
    client.onclose = () => {
      if (this.closed) return;
      this.closed = true;
      this.onclose?.();
    };
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const response = await this.client.listTools(undefined, { timeout: this.requestTimeoutMs });
    return response.tools.map((tool) => ({
      name: tool.name,
      serverName: this.serverName,
      description: tool.description ?? '',
      inputSchema: { ...tool.inputSchema },
    }));
  }

  async callTool(name: string, args: Record<string, unknown>, options?: SessionCallOptions): Promise<unknown> {
    return await this.client.callTool(
      { name, arguments: args },
      undefined,
      { timeout: options?.timeoutMs ?? this.requestTimeoutMs },
    );
  }

  async close(): Promise<void> {
    await this.client.close();
    if (!this.closed) {
      this.closed = true;
      this.onclose?.();
    }
  }
}

/**
 * Run the MCP handshake over an already-built transport. The handshake must
 * finish within the startup timeout or the half-open client is torn down and
 * the error rethrown.
 */
export async function connectSdkSession(config: ServerConfig, transport: Transport, opts: SessionFactoryOptions): Promise<McpSession> {
  const client = new Client(CLIENT_INFO, { capabilities: {} });
  const startupTimeoutMs = config.startupTimeoutMs ?? opts.startupTimeoutMs;
  try {
    await withTimeout(client.connect(transport, { timeout: startupTimeoutMs }), startupTimeoutMs, `connect to '${config.name}'`);
  } catch (error) {
    opts.log('ERR', `MCP server connect failed: ${toErrorMessage(error)} [${formatServerConfigForLog(config)}]`, `mcp:${config.name}`);
    await client.close().catch((closeError: unknown) => {
      warn(`closing half-open client '${config.name}' failed: ${toErrorMessage(closeError)}`);
    });
    throw error;
  }
  opts.log('TRC', `connected to '${config.name}'`, `mcp:${config.name}`);
  return new SdkSession(client, config, config.requestTimeoutMs ?? opts.requestTimeoutMs);
}

/** Default session factory: stdio, streamable HTTP or SSE per the server's `type`. */
export const createSdkSession: SessionFactory = async (config: ServerConfig, opts: SessionFactoryOptions): Promise<McpSession> =>
  await connectSdkSession(config, createTransport(config, opts.log), opts);
