import { describe, expect, it } from 'vitest';

import { ConnectionError, InvalidArgumentsError, UnknownToolError } from '../../mcp/errors.js';
import { errorResult, normalizeToolResult } from '../../mcp/tool-result.js';

describe('normalizeToolResult', () => {
  it('keeps text content and builds the summary from it', () => {
    const result = normalizeToolResult('c1', {
      content: [{ type: 'text', text: '12:00 UTC' }, { type: 'text', text: 'Tuesday' }],
    });

    expect(result).toEqual({
      callId: 'c1',
      isError: false,
      summary: '12:00 UTC\nTuesday',
      metadata: {},
      content: [{ type: 'text', text: '12:00 UTC' }, { type: 'text', text: 'Tuesday' }],
    });
  });

  it('maps image, audio and video parts', () => {
    const result = normalizeToolResult('c2', {
      content: [
        { type: 'image', data: 'aGk=', alt: 'a chart' },
        { type: 'audio', mimeType: 'audio/mpeg', data: 'bXAz' },
        { type: 'video', mimeType: 'video/webm', uri: 'https://cdn.test/clip.webm' },
      ],
    });

    expect(result.content).toEqual([
      { type: 'image', mimeType: 'image/png', data: 'aGk=', altText: 'a chart' },
      { type: 'audio', mimeType: 'audio/mpeg', data: 'bXAz' },
      { type: 'video', mimeType: 'video/webm', url: 'https://cdn.test/clip.webm' },
    ]);
    expect(result.summary).toBe('');
  });

  it('turns embedded video resources into video items and keeps other resources', () => {
    const result = normalizeToolResult('c3', {
      content: [
        { type: 'resource', resource: { uri: 'file:///tmp/clip.mp4', mimeType: 'video/mp4', blob: 'AAAA' } },
        { type: 'resource', resource: { uri: 'file:///tmp/notes.md', mimeType: 'text/markdown', text: '# notes' } },
        { type: 'resource_link', uri: 'https://cdn.test/talk.mp4', mimeType: 'video/mp4' },
      ],
    });

    expect(result.content).toEqual([
      { type: 'video', mimeType: 'video/mp4', url: 'file:///tmp/clip.mp4', data: 'AAAA' },
      { type: 'resource', uri: 'file:///tmp/notes.md', mimeType: 'text/markdown', text: '# notes' },
      { type: 'video', mimeType: 'video/mp4', url: 'https://cdn.test/talk.mp4' },
    ]);
    expect(result.summary).toBe('# notes');
  });

  it('keeps unknown parts as their JSON text', () => {
    const result = normalizeToolResult('c4', { content: [{ type: 'hologram', frames: 3 }] });

    expect(result.content).toEqual([{ type: 'text', text: '{"type":"hologram","frames":3}' }]);
  });

  it('gives an empty result one empty text item', () => {
    expect(normalizeToolResult('c5', { content: [] }).content).toEqual([{ type: 'text', text: '' }]);
    expect(normalizeToolResult('c6', {}).content).toEqual([{ type: 'text', text: '' }]);
  });

  it('accepts a legacy toolResult payload', () => {
    const result = normalizeToolResult('c7', { toolResult: { temperature: 21 } });

    expect(result.content).toEqual([{ type: 'text', text: '{"temperature":21}' }]);
  });

  it('carries _meta and structuredContent into metadata', () => {
    const result = normalizeToolResult('c8', {
      content: [{ type: 'text', text: 'ok' }],
      structuredContent: { celsius: 21 },
      _meta: { trace: 'abc' },
    });

    expect(result.metadata).toEqual({ trace: 'abc', structuredContent: { celsius: 21 } });
  });

  it('flags tool-reported errors', () => {
    const result = normalizeToolResult('c9', { isError: true, content: [{ type: 'text', text: 'no such city' }] });

    expect(result.isError).toBe(true);
    expect(result.errorKind).toBe('tool_error');
    expect(result.summary).toBe('no such city');
  });

  it('wraps a non-object payload as text', () => {
    expect(normalizeToolResult('c10', 'plain').content).toEqual([{ type: 'text', text: 'plain' }]);
    expect(normalizeToolResult('c11', 42).summary).toBe('42');
  });
});

describe('errorResult', () => {
  it('renders the error as the only text item', () => {
    expect(errorResult('c1', new UnknownToolError('teleport'))).toEqual({
      callId: 'c1',
      isError: true,
      errorKind: 'unknown_tool',
      summary: "unknown tool 'teleport'",
      metadata: { executed: false },
      content: [{ type: 'text', text: "unknown tool 'teleport'" }],
    });
  });

  it('copies error details into metadata', () => {
    const result = errorResult('c2', new InvalidArgumentsError('weather', ['/ must have required property \'city\'']));

    expect(result.metadata).toEqual({ executed: false, problems: ["/ must have required property 'city'"] });
    expect(result.summary).toBe("invalid arguments for 'weather': / must have required property 'city'");
  });

  it('flags failures that may have reached the server', () => {
    const result = errorResult('c3', new ConnectionError('weather', 'socket hang up'));

    expect(result.metadata).toEqual({ executed: true });
    expect(result.summary).toBe('mcp:weather: socket hang up');
  });
});
