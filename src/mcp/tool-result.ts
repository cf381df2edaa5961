import type { ContentItem, ToolCallResult } from '../types.js';
import type { ToolBridgeError } from './errors.js';

import { isPlainObject } from '../utils.js';

import { TOOL_ERROR_KIND_MEANINGS } from './errors.js';

const readString = (record: Record<string, unknown>, key: string): string | undefined => {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
};

const isVideoMime = (mimeType: string | undefined): boolean =>
  typeof mimeType === 'string' && mimeType.toLowerCase().startsWith('video/');

const stringify = (value: unknown): string => {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
};

function resourceItem(resource: Record<string, unknown>): ContentItem {
  const uri = readString(resource, 'uri') ?? '';
  const mimeType = readString(resource, 'mimeType');
  if (isVideoMime(mimeType)) {
    const blob = readString(resource, 'blob');
    return {
      type: 'video',
      mimeType: mimeType ?? 'video/mp4',
      ...(uri.length > 0 ? { url: uri } : {}),
      ...(blob !== undefined ? { data: blob } : {}),
    };
  }
  const text = readString(resource, 'text');
  return {
    type: 'resource',
    uri,
    ...(mimeType !== undefined ? { mimeType } : {}),
    ...(text !== undefined ? { text } : {}),
  };
}

function toContentItem(part: unknown): ContentItem {
  if (!isPlainObject(part)) return { type: 'text', text: typeof part === 'string' ? part : stringify(part) };
  switch (part.type) {
    case 'text':
      return { type: 'text', text: readString(part, 'text') ?? '' };
    case 'image': {
      const altText = readString(part, 'altText') ?? readString(part, 'alt');
      return {
        type: 'image',
        mimeType: readString(part, 'mimeType') ?? 'image/png',
        data: readString(part, 'data') ?? '',
        ...(altText !== undefined ? { altText } : {}),
      };
    }
    case 'audio':
      return { type: 'audio', mimeType: readString(part, 'mimeType') ?? 'audio/wav', data: readString(part, 'data') ?? '' };
    case 'video': {
      const url = readString(part, 'url') ?? readString(part, 'uri');
      const data = readString(part, 'data');
      return {
        type: 'video',
        mimeType: readString(part, 'mimeType') ?? 'video/mp4',
        ...(url !== undefined ? { url } : {}),
        ...(data !== undefined ? { data } : {}),
      };
    }
    case 'resource':
      return isPlainObject(part.resource) ? resourceItem(part.resource) : resourceItem(part);
    case 'resource_link':
      return resourceItem(part);
    default:
      return { type: 'text', text: stringify(part) };
  }
}

export const summarizeContent = (content: readonly ContentItem[]): string => content
  .map((item) => (item.type === 'text' ? item.text : item.type === 'resource' ? item.text : undefined))
  .filter((text): text is string => typeof text === 'string' && text.length > 0)
  .join('\n');

/**
 * Turn a raw `tools/call` payload into a ToolCallResult. Unknown content parts
 * are kept as their JSON text; an empty content list becomes one empty text item.
 */
export function normalizeToolResult(callId: string, raw: unknown): ToolCallResult {
  if (!isPlainObject(raw)) {
    const text = typeof raw === 'string' ? raw : stringify(raw);
    return { callId, isError: false, summary: text, metadata: {}, content: [{ type: 'text', text }] };
  }
  let content: ContentItem[];
  if (Array.isArray(raw.content)) {
    content = raw.content.map((part) => toContentItem(part));
  } else if (typeof raw.content === 'string') {
    content = [{ type: 'text', text: raw.content }];
  } else if ('toolResult' in raw) {
    // pre-2024-11 servers reply with a bare toolResult
    content = [{ type: 'text', text: typeof raw.toolResult === 'string' ? raw.toolResult : stringify(raw.toolResult) }];
  } else {
    content = [];
  }
  if (content.length === 0) content = [{ type: 'text', text: '' }];

  const metadata: Record<string, unknown> = isPlainObject(raw._meta) ? { ...raw._meta } : {};
  if (raw.structuredContent !== undefined) metadata.structuredContent = raw.structuredContent;

  const isError = raw.isError === true;
  return {
    callId,
    isError,
    ...(isError ? { errorKind: 'tool_error' as const } : {}),
    summary: summarizeContent(content),
    metadata,
    content,
  };
}

export function errorResult(callId: string, error: ToolBridgeError): ToolCallResult {
  return {
    callId,
    isError: true,
    errorKind: error.kind,
    summary: error.message,
    // `executed: true` means the server may have run the tool before failing.
    metadata: { executed: TOOL_ERROR_KIND_MEANINGS[error.kind].executed, ...error.details },
    content: [{ type: 'text', text: error.message }],
  };
}
