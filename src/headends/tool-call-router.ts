import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import type { DisplayContent, ToolCallRequest } from '../types.js';
import type { ToolExecutor } from '../mcp/tool-executor.js';
import type { McpLogFn } from '../mcp/session.js';

import { toErrorMessage } from '../utils.js';

const ToolCallMessageSchema = z.object({
  type: z.literal('mcp-tool-call').optional(),
  tool_name: z.string().trim().min(1),
  arguments: z.record(z.string(), z.unknown()).optional(),
});

export type McpToolResponse =
  | { type: 'mcp-tool-response'; tool_name: string | null; result: { content: DisplayContent[] } }
  | { type: 'mcp-tool-response'; tool_name: string | null; error: string };

const errorResponse = (toolName: string | null, error: string): McpToolResponse => ({
  type: 'mcp-tool-response',
  tool_name: toolName,
  error,
});

const peekToolName = (message: unknown): string | null => {
  if (message === null || typeof message !== 'object' || !('tool_name' in message)) return null;
  const value = message.tool_name;
  return typeof value === 'string' && value.trim().length > 0 ? value : null;
};

/**
 * Turns a user-initiated `mcp-tool-call` into a one-call prompt-mode batch
 * and folds the batch outcome into a single `mcp-tool-response`.
 */
export class ToolCallRouter {
  private readonly log: McpLogFn;

  constructor(private readonly executor: ToolExecutor, opts: { log?: McpLogFn } = {}) {
    this.log = opts.log ?? (() => undefined);
  }

  /** Resolves to `undefined` when the signal aborted before the batch finished. */
  async handle(message: unknown, opts: { signal?: AbortSignal } = {}): Promise<McpToolResponse | undefined> {
    const parsed = ToolCallMessageSchema.safeParse(message);
    if (!parsed.success) {
      const toolName = peekToolName(message);
      if (toolName === null) return errorResponse(null, 'Missing tool_name');
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return errorResponse(toolName, `Invalid tool call: ${issues}`);
    }

    const toolName = parsed.data.tool_name;
    const request: ToolCallRequest = {
      id: `ws_${toolName}_${randomUUID()}`,
      name: toolName,
      arguments: parsed.data.arguments ?? {},
    };

    try {
      // eslint-disable-next-line functional/no-loop-statements
      for await (const event of this.executor.executeTools([request], 'prompt', { signal: opts.signal })) {
        if (event.type !== 'batch_complete') continue;
        const result = event.results[0];
        if (result === undefined) return errorResponse(toolName, 'Tool produced no result');
        this.log(result.isError ? 'WRN' : 'VRB', `websocket tool call finished (${result.isError ? 'error' : 'ok'})`, `mcp:${result.serverName ?? '?'}:${toolName}`);
        return { type: 'mcp-tool-response', tool_name: toolName, result: { content: result.display } };
      }
    } catch (error) {
      this.log('ERR', `websocket tool call failed: ${toErrorMessage(error)}`, `mcp:?:${toolName}`);
      return errorResponse(toolName, `Tool execution failed: ${toErrorMessage(error)}`);
    }
    return undefined;
  }
}
