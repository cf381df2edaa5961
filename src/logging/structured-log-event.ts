import type { LogEntry } from '../types.js';

export interface StructuredLogEvent {
  timestamp: number;
  isoTimestamp: string;
  severity: LogEntry['severity'];
  priority: number;
  message: string;
  type: LogEntry['type'];
  direction: LogEntry['direction'];
  server?: string;
  tool?: string;
  headendId?: string;
  clientId?: string;
  callId?: string;
  remoteIdentifier?: string;
  labels: Record<string, string>;
  stack?: string;
}

// syslog priorities
const PRIORITY_BY_SEVERITY: Record<LogEntry['severity'], number> = {
  ERR: 3,
  WRN: 4,
  VRB: 6,
  TRC: 7,
};

const RESERVED_LABEL_KEYS = new Set([
  'severity',
  'type',
  'direction',
  'remote',
  'server',
  'tool',
  'headend',
  'client',
  'call_id',
]);

export interface BuildStructuredEventOptions {
  labels?: Record<string, string>;
}

export function buildStructuredLogEvent(
  entry: LogEntry,
  options: BuildStructuredEventOptions = {}
): StructuredLogEvent {
  const labels: Record<string, string> = {};
  Object.entries(options.labels ?? {}).forEach(([key, value]) => {
    if (value.length > 0 && !RESERVED_LABEL_KEYS.has(key)) labels[key] = value;
  });
  if (entry.details !== undefined) {
    Object.entries(entry.details).forEach(([key, value]) => {
      if (RESERVED_LABEL_KEYS.has(key) || Object.prototype.hasOwnProperty.call(labels, key)) return;
      if (typeof value === 'string') {
        if (value.length > 0) labels[key] = value;
        return;
      }
      if (typeof value === 'number') {
        if (Number.isFinite(value)) labels[key] = String(value);
        return;
      }
      labels[key] = value ? 'true' : 'false';
    });
  }

  const remote = entry.remoteIdentifier.length > 0 ? entry.remoteIdentifier : undefined;
  const parsed = remote !== undefined ? parseRemoteIdentifier(remote) : {};

  return {
    timestamp: entry.timestamp,
    isoTimestamp: new Date(entry.timestamp).toISOString(),
    severity: entry.severity,
    priority: PRIORITY_BY_SEVERITY[entry.severity],
    message: entry.message,
    type: entry.type,
    direction: entry.direction,
    server: parsed.server,
    tool: parsed.tool,
    headendId: entry.headendId,
    clientId: entry.clientId,
    callId: entry.callId,
    remoteIdentifier: remote,
    labels,
    stack: entry.stack,
  };
}

/** `mcp:<server>` or `mcp:<server>:<tool>`; `*` and `?` stand for "no specific server". */
export function parseRemoteIdentifier(identifier: string): { server?: string; tool?: string } {
  const parts = identifier.split(':');
  if (parts[0] !== 'mcp' || parts.length < 2) return {};
  const server = parts[1];
  const tool = parts.length >= 3 ? parts.slice(2).join(':') : undefined;
  return {
    server: server !== undefined && server.length > 0 && server !== '*' && server !== '?' ? server : undefined,
    tool: tool !== undefined && tool.length > 0 ? tool : undefined,
  };
}
