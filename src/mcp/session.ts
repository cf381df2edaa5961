import type { ServerConfig, ToolDescriptor } from '../types.js';

export type McpLogSeverity = 'VRB' | 'WRN' | 'ERR' | 'TRC';

export type McpLogFn = (severity: McpLogSeverity, message: string, remoteIdentifier: string, fatal?: boolean) => void;

export interface SessionCallOptions {
  timeoutMs?: number;
}

/**
 * One live client connection to one tool server.
 *
 * `callTool` resolves with the raw result payload. Transport failures reject;
 * a JSON-RPC error reply rejects with the protocol error as-is so callers can
 * tell the two apart.
 */
export interface McpSession {
  readonly serverName: string;
  readonly createdAt: number;
  readonly supportsConcurrentCalls: boolean;
  listTools: () => Promise<ToolDescriptor[]>;
  callTool: (name: string, args: Record<string, unknown>, options?: SessionCallOptions) => Promise<unknown>;
  close: () => Promise<void>;
  // Fired once when the peer goes away, including after close().
  onclose?: () => void;
}

export interface SessionFactoryOptions {
  startupTimeoutMs: number;
  requestTimeoutMs: number;
  log: McpLogFn;
}

export type SessionFactory = (config: ServerConfig, opts: SessionFactoryOptions) => Promise<McpSession>;
