import { randomUUID } from 'node:crypto';

import Ajv from 'ajv';

import type {
  PresentationMode,
  PresentedToolResult,
  ToolCallRequest,
  ToolCallResult,
  ToolDescriptor,
  ToolExecutionEvent,
} from '../types.js';
import type { McpConnectionManager } from './connection-manager.js';
import type { McpLogFn } from './session.js';
import type { ToolManager } from './tool-manager.js';
import type { Ajv as AjvClass, ErrorObject, Options as AjvOptions, ValidateFunction } from 'ajv';

type AjvConstructor = new (options?: AjvOptions) => AjvClass;
const AjvCtor: AjvConstructor = Ajv as unknown as AjvConstructor;

import { isPlainObject, parseJsonRecord, parseJsonValueDetailed, toErrorMessage } from '../utils.js';

import { InvalidArgumentsError, toToolBridgeError } from './errors.js';
import { presentResult } from './presentation.js';
import { errorResult } from './tool-result.js';

export interface ToolExecutorOptions {
  validateArguments?: boolean;
  log?: McpLogFn;
}

export interface ExecuteToolsOptions {
  signal?: AbortSignal;
}

const formatAjvErrors = (errors: readonly ErrorObject[] | null | undefined): string[] => (errors ?? [])
  .map((error) => {
    const path = error.instancePath.length > 0 ? error.instancePath : '/';
    return `${path} ${error.message ?? 'is invalid'}`.trim();
  });

/**
 * Runs a batch of tool calls one after another and reports progress as an
 * ordered event stream ending in a single `batch_complete`.
 */
export class ToolExecutor {
  private readonly ajv: AjvClass = new AjvCtor({ allErrors: true, strict: false });
  // `null` marks a schema Ajv could not compile; those tools skip validation.
  private readonly validators = new WeakMap<ToolDescriptor, ValidateFunction | null>();
  private readonly validateArguments: boolean;
  private readonly log: McpLogFn;

  constructor(
    private readonly tools: ToolManager,
    private readonly connections: McpConnectionManager,
    opts: ToolExecutorOptions = {},
  ) {
    this.validateArguments = opts.validateArguments ?? true;
    this.log = opts.log ?? (() => undefined);
  }

  async *executeTools(
    calls: readonly ToolCallRequest[],
    mode: PresentationMode,
    opts: ExecuteToolsOptions = {},
  ): AsyncGenerator<ToolExecutionEvent, void, undefined> {
    const { signal } = opts;
    const results: PresentedToolResult[] = [];
    // eslint-disable-next-line functional/no-loop-statements
    for (const call of calls) {
      if (signal?.aborted === true) return;
      yield { type: 'tool_call_status', callId: call.id, toolName: call.name, status: 'running' };

      const { result, serverName } = await this.runOne(call);
      // Client went away while the call ran; the outcome has nowhere to go.
      if (signal?.aborted === true) {
        this.log('VRB', `batch abandoned after '${call.name}' (${String(calls.length - results.length - 1)} call(s) skipped)`, `mcp:*:${call.name}`);
        return;
      }

      const presented = presentResult(call, result, mode, serverName);
      results.push(presented);
      yield {
        type: 'tool_call_status',
        callId: call.id,
        toolName: call.name,
        status: presented.isError ? 'error' : 'completed',
        result: presented,
      };
    }
    yield { type: 'batch_complete', results };
  }

  private async runOne(call: ToolCallRequest): Promise<{ result: ToolCallResult; serverName?: string }> {
    let serverName: string;
    try {
      serverName = this.tools.resolve(call.name);
    } catch (error) {
      return { result: errorResult(call.id, toToolBridgeError(error)) };
    }
    const remote = `mcp:${serverName}:${call.name}`;

    const problems = this.validate(call);
    if (problems.length > 0) {
      const failure = new InvalidArgumentsError(call.name, problems);
      this.log('WRN', failure.message, remote);
      return { result: errorResult(call.id, failure), serverName };
    }

    try {
      this.log('VRB', `calling with ${String(Object.keys(call.arguments).length)} argument(s)`, remote);
      const result = await this.connections.callTool(serverName, call.name, call.arguments, { callId: call.id });
      return { result, serverName };
    } catch (error) {
      this.log('ERR', `unexpected failure: ${toErrorMessage(error)}`, remote);
      return { result: errorResult(call.id, toToolBridgeError(error)), serverName };
    }
  }

  private validate(call: ToolCallRequest): string[] {
    if (!this.validateArguments) return [];
    const descriptor = this.tools.describe(call.name);
    if (descriptor === undefined) return [];
    let validator = this.validators.get(descriptor);
    if (validator === undefined) {
      try {
        validator = this.ajv.compile(descriptor.inputSchema);
      } catch (error) {
        this.log('WRN', `input schema does not compile, arguments not validated: ${toErrorMessage(error)}`, `mcp:${descriptor.serverName}:${descriptor.name}`);
        validator = null;
      }
      this.validators.set(descriptor, validator);
    }
    if (validator === null) return [];
    if (validator(call.arguments)) return [];
    return formatAjvErrors(validator.errors);
  }
}

const readCallName = (item: Record<string, unknown>): string | undefined => {
  const name = typeof item.tool === 'string' ? item.tool : item.name;
  return typeof name === 'string' && name.trim().length > 0 ? name.trim() : undefined;
};

const readCallArguments = (item: Record<string, unknown>): Record<string, unknown> => {
  const raw = item.arguments ?? item.args;
  if (typeof raw === 'string') return parseJsonRecord(raw) ?? {};
  return isPlainObject(raw) ? raw : {};
};

/**
 * Extract tool calls a prompt-mode model wrote as JSON. Accepts a single
 * `{"tool", "arguments"}` object, an array of them or `{"tool_calls": [...]}`.
 * Returns an empty list when the text holds no call.
 */
export function parsePromptToolCalls(text: string): ToolCallRequest[] {
  const { value } = parseJsonValueDetailed(text);
  if (value === undefined) return [];
  let items: unknown[];
  if (Array.isArray(value)) {
    items = value;
  } else if (isPlainObject(value) && Array.isArray(value.tool_calls)) {
    items = value.tool_calls;
  } else {
    items = [value];
  }
  return items.flatMap((item): ToolCallRequest[] => {
    if (!isPlainObject(item)) return [];
    const name = readCallName(item);
    if (name === undefined) return [];
    return [{ id: `call_${randomUUID()}`, name, arguments: readCallArguments(item) }];
  });
}
