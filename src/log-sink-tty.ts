import type { LogEntry, LogFn } from './types.js';

import { createStructuredLogger, type LogFormat } from './logging/structured-logger.js';

export function makeTTYLogCallbacks(
  opts: {
    color?: boolean;
    verbose?: boolean;
    trace?: boolean;
    serverMode?: boolean;
    explicitFormat?: LogFormat;
    labels?: Record<string, string>;
  },
  write?: (s: string) => void
): { onLog: LogFn } {
  const writer = typeof write === 'function'
    ? write
    : (s: string) => {
        try {
          process.stderr.write(s);
        } catch {
          // stderr is gone; drop the line
        }
      };

  let format: LogFormat;
  if (opts.explicitFormat !== undefined) {
    format = opts.explicitFormat;
  } else if (process.stderr.isTTY && opts.serverMode !== true) {
    // Interactive console mode - use simplified format
    format = 'console';
  } else {
    format = 'logfmt';
  }

  const logger = createStructuredLogger({
    format,
    color: opts.color ?? (process.stderr.isTTY && format !== 'json'),
    verbose: opts.verbose === true,
    writer,
    labels: opts.labels,
  });

  return {
    onLog: (entry: LogEntry) => {
      if (entry.severity === 'VRB' && opts.verbose !== true) return;
      if (entry.severity === 'TRC' && opts.trace !== true) return;
      logger.emit(entry);
    },
  };
}
