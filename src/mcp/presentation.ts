import type {
  ContentItem,
  DisplayContent,
  LlmContentBlock,
  PresentationMode,
  PresentedToolResult,
  ToolCallRequest,
  ToolCallResult,
  ToolCallStatusEvent,
} from '../types.js';

export const PRESENTATION_MODES: readonly PresentationMode[] = ['claude', 'openai', 'prompt'];

export const isPresentationMode = (value: unknown): value is PresentationMode =>
  value === 'claude' || value === 'openai' || value === 'prompt';

/** Bracketed stand-in for content a text-only model cannot see. */
export function describeNonText(item: Exclude<ContentItem, { type: 'text' }>): string {
  switch (item.type) {
    case 'image':
      return item.altText !== undefined && item.altText.length > 0
        ? `[image ${item.mimeType}: ${item.altText}]`
        : `[image ${item.mimeType}]`;
    case 'video':
      return item.url !== undefined ? `[video ${item.mimeType} at ${item.url}]` : `[video ${item.mimeType}]`;
    case 'audio':
      return `[audio ${item.mimeType}]`;
    case 'resource': {
      const header = item.mimeType !== undefined ? `[resource ${item.uri} (${item.mimeType})]` : `[resource ${item.uri}]`;
      return item.text !== undefined && item.text.length > 0 ? `${header}\n${item.text}` : header;
    }
  }
}

export function toLlmBlocks(content: readonly ContentItem[], mode: PresentationMode): LlmContentBlock[] {
  return content.map((item): LlmContentBlock => {
    if (item.type === 'text') return { type: 'text', text: item.text };
    if (item.type === 'image' && mode === 'claude') {
      return { type: 'image', source: { type: 'base64', media_type: item.mimeType, data: item.data } };
    }
    return { type: 'text', text: describeNonText(item) };
  });
}

export function toDisplayContent(content: readonly ContentItem[]): DisplayContent[] {
  return content.map((item): DisplayContent => {
    switch (item.type) {
      case 'text':
        return { type: 'text', data: item.text };
      case 'image':
        return { type: 'image', data: `data:${item.mimeType};base64,${item.data}` };
      case 'video':
        if (item.url !== undefined) return { type: 'video', data: item.url };
        if (item.data !== undefined) return { type: 'video', data: `data:${item.mimeType};base64,${item.data}` };
        return { type: 'text', data: describeNonText(item) };
      default:
        return { type: 'text', data: describeNonText(item) };
    }
  });
}

export function presentResult(
  request: ToolCallRequest,
  result: ToolCallResult,
  mode: PresentationMode,
  serverName?: string,
): PresentedToolResult {
  return {
    callId: request.id,
    toolName: request.name,
    ...(serverName !== undefined ? { serverName } : {}),
    isError: result.isError,
    ...(result.errorKind !== undefined ? { errorKind: result.errorKind } : {}),
    summary: result.summary,
    blocks: toLlmBlocks(result.content, mode),
    display: toDisplayContent(result.content),
    metadata: result.metadata,
  };
}

const blocksToText = (blocks: readonly LlmContentBlock[]): string => blocks
  .map((block) => (block.type === 'text' ? block.text : `[image ${block.source.media_type}]`))
  .join('\n');

export interface ClaudeToolResultBlock {
  type: 'tool_result';
  tool_use_id: string;
  content: LlmContentBlock[];
  is_error: boolean;
}

export type LlmToolMessage =
  | { role: 'user'; content: ClaudeToolResultBlock[] }
  | { role: 'tool'; tool_call_id: string; content: string }
  | { role: 'user'; content: string };

/**
 * Continuation messages for the next LLM turn, shaped for the provider's
 * tool-calling convention.
 */
export function toLlmToolMessages(results: readonly PresentedToolResult[], mode: PresentationMode): LlmToolMessage[] {
  if (results.length === 0) return [];
  switch (mode) {
    case 'claude':
      return [{
        role: 'user',
        content: results.map((result): ClaudeToolResultBlock => ({
          type: 'tool_result',
          tool_use_id: result.callId,
          content: result.blocks,
          is_error: result.isError,
        })),
      }];
    case 'openai':
      return results.map((result): LlmToolMessage => ({ role: 'tool', tool_call_id: result.callId, content: blocksToText(result.blocks) }));
    case 'prompt': {
      const sections = results.map((result) => {
        const status = result.isError ? 'error' : 'ok';
        return `[${result.toolName}] (${status})\n${blocksToText(result.blocks)}`;
      });
      return [{ role: 'user', content: `Tool results:\n\n${sections.join('\n\n')}` }];
    }
  }
}

export interface ToolCallStatusMessage {
  type: 'tool_call_status';
  call_id: string;
  tool_name: string;
  status: ToolCallStatusEvent['status'];
  result?: {
    is_error: boolean;
    error_kind?: string;
    summary: string;
    content: DisplayContent[];
  };
}

export function toStatusMessage(event: ToolCallStatusEvent): ToolCallStatusMessage {
  const base = { type: 'tool_call_status' as const, call_id: event.callId, tool_name: event.toolName };
  if (event.status === 'running') return { ...base, status: 'running' };
  const { result } = event;
  return {
    ...base,
    status: event.status,
    result: {
      is_error: result.isError,
      ...(result.errorKind !== undefined ? { error_kind: result.errorKind } : {}),
      summary: result.summary,
      content: result.display,
    },
  };
}
