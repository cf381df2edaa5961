import type { LogEntry, LogFn } from '../types.js';
import type { McpLogFn } from '../mcp/session.js';

import { parseRemoteIdentifier } from './structured-log-event.js';

/**
 * Adapts the short `(severity, message, remote)` callback used inside the MCP
 * layer to full LogEntry records. Entries naming a tool are typed `tool`, the
 * rest `server`.
 */
export function createMcpLogAdapter(sink: LogFn, base: Partial<Pick<LogEntry, 'headendId' | 'clientId'>> = {}): McpLogFn {
  return (severity, message, remoteIdentifier, fatal = false) => {
    const { tool } = parseRemoteIdentifier(remoteIdentifier);
    sink({
      timestamp: Date.now(),
      severity,
      direction: 'response',
      type: tool !== undefined ? 'tool' : 'server',
      remoteIdentifier,
      fatal,
      message,
      ...base,
    });
  };
}
