import type { ToolDescriptor } from '../types.js';

const DESCRIPTION_LIMIT = 512;

const EMPTY_OBJECT_SCHEMA: Record<string, unknown> = { type: 'object', properties: {} };

const cloneSchema = (schema: Record<string, unknown>): Record<string, unknown> => {
  if (Object.keys(schema).length === 0) return structuredClone(EMPTY_OBJECT_SCHEMA);
  return structuredClone(schema);
};

const buildDescription = (tool: ToolDescriptor): string => {
  const trimmed = tool.description.trim();
  return trimmed.length > DESCRIPTION_LIMIT ? `${trimmed.slice(0, DESCRIPTION_LIMIT - 4)}...` : trimmed;
};

export interface OpenAIToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export const toOpenAIToolDefinition = (tool: ToolDescriptor): OpenAIToolDefinition => ({
  type: 'function',
  function: {
    name: tool.name,
    description: buildDescription(tool),
    parameters: cloneSchema(tool.inputSchema),
  },
});

export interface ClaudeToolDefinition {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export const toClaudeToolDefinition = (tool: ToolDescriptor): ClaudeToolDefinition => ({
  name: tool.name,
  description: buildDescription(tool),
  input_schema: cloneSchema(tool.inputSchema),
});

const describeProperties = (schema: Record<string, unknown>): string[] => {
  const properties = schema.properties;
  if (properties === null || typeof properties !== 'object' || Array.isArray(properties)) return [];
  const required = Array.isArray(schema.required)
    ? new Set(schema.required.filter((value): value is string => typeof value === 'string'))
    : new Set<string>();
  return Object.entries(properties).map(([key, value]) => {
    const prop = value !== null && typeof value === 'object' && !Array.isArray(value) ? value : {};
    const type = 'type' in prop && typeof prop.type === 'string' ? prop.type : 'any';
    const description = 'description' in prop && typeof prop.description === 'string' && prop.description.length > 0
      ? ` - ${prop.description}`
      : '';
    const flag = required.has(key) ? 'required' : 'optional';
    return `    - ${key} (${type}, ${flag})${description}`;
  });
};

/**
 * Plain-text tool catalog for models that are told about tools in the
 * system prompt and answer with a JSON call block.
 */
export const renderPromptFragment = (tools: readonly ToolDescriptor[]): string => {
  if (tools.length === 0) return '';
  const lines: string[] = ['## Available tools', ''];
  tools.forEach((tool) => {
    lines.push(`- ${tool.name}: ${buildDescription(tool)}`);
    const props = describeProperties(tool.inputSchema);
    if (props.length > 0) {
      lines.push('  arguments:');
      lines.push(...props);
    }
  });
  lines.push('');
  lines.push('To call a tool, reply with a single JSON object and nothing else:');
  lines.push('{"tool": "<tool name>", "arguments": { ... }}');
  lines.push('To call several tools, reply with a JSON array of such objects.');
  return lines.join('\n');
};
