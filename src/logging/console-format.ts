import type { StructuredLogEvent } from './structured-log-event.js';

import { ANSI_RESET, COLOR_BY_SEVERITY } from './logfmt.js';

interface FormatOptions {
  color?: boolean;
  verbose?: boolean;
}

const clock = (iso: string): string => iso.slice(11, 23);

export function formatConsole(event: StructuredLogEvent, options: FormatOptions = {}): string {
  const where = event.remoteIdentifier !== undefined ? ` [${event.remoteIdentifier}]` : '';
  const prefix = options.verbose === true ? `${clock(event.isoTimestamp)} ` : '';
  const callSuffix = options.verbose === true && event.callId !== undefined ? ` (call ${event.callId})` : '';
  let output = `${prefix}${event.severity}${where} ${event.message}${callSuffix}`;
  if (options.color === true) {
    output = `${COLOR_BY_SEVERITY[event.severity]}${output}${ANSI_RESET}`;
  }

  if (event.severity === 'ERR' && typeof event.stack === 'string' && event.stack.length > 0) {
    const stackLines = event.stack.split('\n').map((line) => `    ${line}`).join('\n');
    output += `\n${stackLines}`;
  }

  return output;
}
