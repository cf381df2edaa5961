// Structured logging interface
export interface LogEntry {
  timestamp: number;                    // Unix timestamp (ms)
  severity: 'VRB' | 'WRN' | 'ERR' | 'TRC';
  direction: 'request' | 'response';
  type: 'tool' | 'server' | 'headend';  // tool = a tool call, server = MCP session lifecycle
  remoteIdentifier: string;             // 'mcp:<server>' or 'mcp:<server>:<tool>'
  fatal: boolean;
  message: string;
  // Optional headend identifier (e.g., "ws:8765")
  headendId?: string;
  // Optional client connection id for headend logs
  clientId?: string;
  callId?: string;
  details?: Record<string, LogDetailValue>;
  stack?: string;
}

export type LogDetailValue = string | number | boolean;

export type LogFn = (entry: LogEntry) => void;

export type McpTransportType = 'stdio' | 'http' | 'sse';

export interface MCPServerConfig {
  type: McpTransportType;
  command?: string;
  args?: string[];
  env?: Record<string, string>;
  url?: string;
  headers?: Record<string, string>;
  enabled?: boolean;
  requestTimeoutMs?: number;
  startupTimeoutMs?: number;
  // Force one call at a time on this server's session
  serializeCalls?: boolean;
  toolsAllowed?: string[];
  toolsDenied?: string[];
}

// Registry view of a server: named and deep-frozen.
export interface ServerConfig extends Omit<MCPServerConfig, 'args' | 'toolsAllowed' | 'toolsDenied'> {
  readonly name: string;
  readonly args?: readonly string[];
  readonly toolsAllowed?: readonly string[];
  readonly toolsDenied?: readonly string[];
}

export interface ToolDescriptor {
  name: string;
  serverName: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ContentItem =
  | { type: 'text'; text: string }
  | { type: 'image'; mimeType: string; data: string; altText?: string }
  | { type: 'video'; mimeType: string; url?: string; data?: string }
  | { type: 'audio'; mimeType: string; data: string }
  | { type: 'resource'; uri: string; mimeType?: string; text?: string };

export type ToolErrorKind =
  | 'unknown_server'
  | 'unknown_tool'
  | 'invalid_arguments'
  | 'connection_error'
  | 'tool_error'
  | 'shutdown_error'
  | 'internal_error';

export interface ToolCallResult {
  callId: string;
  isError: boolean;
  errorKind?: ToolErrorKind;
  summary: string;
  metadata: Record<string, unknown>;
  content: ContentItem[];
}

// Target LLM calling convention; decides how non-text content reaches the model.
export type PresentationMode = 'claude' | 'openai' | 'prompt';

export type LlmContentBlock =
  | { type: 'text'; text: string }
  | { type: 'image'; source: { type: 'base64'; media_type: string; data: string } };

export interface DisplayContent {
  type: 'text' | 'image' | 'video';
  data: string;
}

export interface PresentedToolResult {
  callId: string;
  toolName: string;
  serverName?: string;
  isError: boolean;
  errorKind?: ToolErrorKind;
  summary: string;
  blocks: LlmContentBlock[];
  display: DisplayContent[];
  metadata: Record<string, unknown>;
}

export type ToolCallStatus = 'running' | 'completed' | 'error';

export type ToolCallStatusEvent =
  | { type: 'tool_call_status'; callId: string; toolName: string; status: 'running' }
  | { type: 'tool_call_status'; callId: string; toolName: string; status: 'completed' | 'error'; result: PresentedToolResult };

export interface BatchCompleteEvent {
  type: 'batch_complete';
  results: PresentedToolResult[];
}

export type ToolExecutionEvent = ToolCallStatusEvent | BatchCompleteEvent;

export interface WebSocketConfig {
  host?: string;
  port: number;
  path?: string;
  heartbeatTimeoutMs?: number;
  maxConnections?: number;
}

export type LogFormatName = 'logfmt' | 'json' | 'console';

export interface Configuration {
  mcpServers: Record<string, MCPServerConfig>;
  enabledServers?: string[];
  defaults?: {
    requestTimeoutMs?: number;
    startupTimeoutMs?: number;
    validateArguments?: boolean;
  };
  websocket?: WebSocketConfig;
  logging?: {
    format?: LogFormatName;
    verbose?: boolean;
  };
}
