import type { StructuredLogEvent } from './structured-log-event.js';

interface FormatOptions {
  color?: boolean;
}

export const ANSI_RESET = '\u001B[0m';
const ANSI_RED = '\u001B[31m';
const ANSI_YELLOW = '\u001B[33m';
const ANSI_GRAY = '\u001B[90m';

export const COLOR_BY_SEVERITY: Record<StructuredLogEvent['severity'], string> = {
  ERR: ANSI_RED,
  WRN: ANSI_YELLOW,
  VRB: ANSI_GRAY,
  TRC: ANSI_GRAY,
};

function encodeValue(value: string): string {
  if (value === '') return '""';
  const needsQuotes = /\s|=|"/.test(value);
  const escaped = value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n').replace(/\r/g, '\\r');
  return needsQuotes ? `"${escaped}"` : escaped;
}

export function formatLogfmt(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const pairs: [string, string][] = [];
  const seen = new Set<string>();
  const push = (key: string, value: string | undefined): void => {
    if (value === undefined || value.length === 0) return;
    if (seen.has(key)) return;
    pairs.push([key, value]);
    seen.add(key);
  };

  push('ts', event.isoTimestamp);
  push('level', event.severity.toLowerCase());
  push('priority', String(event.priority));
  push('type', event.type);
  push('direction', event.direction);
  push('remote', event.remoteIdentifier);
  push('server', event.server);
  push('tool', event.tool);
  push('headend', event.headendId);
  push('client', event.clientId);
  push('call_id', event.callId);

  Object.entries(event.labels).forEach(([key, value]) => {
    push(key, value);
  });

  // Render the free-form message last for readability.
  push('message', event.message);

  let line = pairs.map(([key, value]) => `${key}=${encodeValue(value)}`).join(' ');
  if (options.color === true) {
    line = `${COLOR_BY_SEVERITY[event.severity]}${line}${ANSI_RESET}`;
  }
  return line;
}
