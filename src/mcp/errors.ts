import type { ToolErrorKind } from '../types.js';

import { toErrorMessage } from '../utils.js';

export interface ToolErrorMeaning {
  executed: boolean;
  summary: string;
}

export const TOOL_ERROR_KIND_MEANINGS: Record<ToolErrorKind, ToolErrorMeaning> = {
  unknown_server: {
    executed: false,
    summary: 'Server name is not present in the server registry.',
  },
  unknown_tool: {
    executed: false,
    summary: 'Tool name does not exist in the current tool catalog.',
  },
  invalid_arguments: {
    executed: false,
    summary: 'Tool arguments failed schema validation before execution.',
  },
  connection_error: {
    executed: true,
    summary: 'Transport failure while connecting to or calling the tool server.',
  },
  tool_error: {
    executed: true,
    summary: 'The tool server reported an error result.',
  },
  shutdown_error: {
    executed: false,
    summary: 'A session failed to close during teardown.',
  },
  internal_error: {
    executed: true,
    summary: 'Unexpected error during tool execution.',
  },
};

export class ToolBridgeError extends Error {
  readonly kind: ToolErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ToolErrorKind, message: string, opts?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'ToolBridgeError';
    this.kind = kind;
    if (opts?.details !== undefined) {
      this.details = opts.details;
    }
  }
}

export class UnknownServerError extends ToolBridgeError {
  readonly serverName: string;

  constructor(serverName: string) {
    super('unknown_server', `unknown MCP server '${serverName}'`);
    this.name = 'UnknownServerError';
    this.serverName = serverName;
  }
}

export class UnknownToolError extends ToolBridgeError {
  readonly toolName: string;

  constructor(toolName: string) {
    super('unknown_tool', `unknown tool '${toolName}'`);
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

export class InvalidArgumentsError extends ToolBridgeError {
  readonly toolName: string;

  constructor(toolName: string, problems: string[]) {
    super('invalid_arguments', `invalid arguments for '${toolName}': ${problems.join('; ')}`, { details: { problems } });
    this.name = 'InvalidArgumentsError';
    this.toolName = toolName;
  }
}

export class ConnectionError extends ToolBridgeError {
  readonly serverName: string;

  constructor(serverName: string, message: string, cause?: unknown) {
    super('connection_error', `mcp:${serverName}: ${message}`, { cause });
    this.name = 'ConnectionError';
    this.serverName = serverName;
  }
}

export class ToolInvocationError extends ToolBridgeError {
  readonly serverName: string;
  readonly toolName: string;

  constructor(serverName: string, toolName: string, message: string) {
    super('tool_error', message);
    this.name = 'ToolInvocationError';
    this.serverName = serverName;
    this.toolName = toolName;
  }
}

export class ShutdownError extends ToolBridgeError {
  readonly serverName: string;

  constructor(serverName: string, cause: unknown) {
    super('shutdown_error', `failed to close session '${serverName}': ${toErrorMessage(cause)}`, { cause });
    this.name = 'ShutdownError';
    this.serverName = serverName;
  }
}

export const isToolBridgeError = (value: unknown): value is ToolBridgeError =>
  value instanceof ToolBridgeError;

export const toToolBridgeError = (
  value: unknown,
  fallbackKind: ToolErrorKind = 'internal_error'
): ToolBridgeError => {
  if (isToolBridgeError(value)) return value;
  return new ToolBridgeError(fallbackKind, toErrorMessage(value), { cause: value });
};
