import type { LogEntry, LogFormatName } from '../types.js';

import { formatConsole } from './console-format.js';
import { formatLogfmt } from './logfmt.js';
import { buildStructuredLogEvent, type StructuredLogEvent } from './structured-log-event.js';

export type LogFormat = LogFormatName;

export interface StructuredLoggerOptions {
  format?: LogFormat;
  labels?: Record<string, string>;
  color?: boolean;
  verbose?: boolean;
  writer?: (line: string) => void;
}

/**
 * Renders LogEntry records in one of the supported line formats.
 * Output goes to stderr unless a writer is supplied; stdout stays free for command output.
 */
export class StructuredLogger {
  readonly format: LogFormat;
  private readonly labels: Record<string, string>;
  private readonly color: boolean;
  private readonly verbose: boolean;
  private readonly writer: (line: string) => void;

  constructor(options: StructuredLoggerOptions = {}) {
    this.format = options.format ?? 'logfmt';
    this.labels = options.labels ?? {};
    this.color = options.color ?? false;
    this.verbose = options.verbose ?? false;
    this.writer = options.writer ?? defaultWriter;
  }

  emit(entry: LogEntry): void {
    const event = buildStructuredLogEvent(entry, { labels: this.labels });
    this.writer(`${this.render(event)}\n`);
  }

  private render(event: StructuredLogEvent): string {
    switch (this.format) {
      case 'json':
        return JSON.stringify(buildJsonPayload(event));
      case 'console':
        return formatConsole(event, { color: this.color, verbose: this.verbose });
      case 'logfmt':
        return formatLogfmt(event, { color: this.color });
    }
  }
}

export function createStructuredLogger(options: StructuredLoggerOptions): StructuredLogger {
  return new StructuredLogger(options);
}

function defaultWriter(line: string): void {
  try {
    process.stderr.write(line);
  } catch {
    // stderr closed under us; nothing left to report to
  }
}

function buildJsonPayload(event: StructuredLogEvent): Record<string, unknown> {
  const entries: [string, unknown][] = [];
  const push = (key: string, value: unknown): void => {
    if (value === undefined) return;
    entries.push([key, value]);
  };

  push('ts', event.isoTimestamp);
  push('timestamp', event.timestamp);
  push('severity', event.severity);
  push('level', event.severity.toLowerCase());
  push('priority', event.priority);
  push('type', event.type);
  push('direction', event.direction);
  push('remote', event.remoteIdentifier);
  push('server', event.server);
  push('tool', event.tool);
  push('headend', event.headendId);
  push('client', event.clientId);
  push('call_id', event.callId);
  if (Object.keys(event.labels).length > 0) push('labels', event.labels);
  push('stack', event.stack);

  entries.push(['message', event.message]);

  return Object.fromEntries(entries);
}
