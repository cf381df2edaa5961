// Main library exports for programmatic use
export { ToolBridge } from './tool-bridge.js';
export type { ToolBridgeOptions } from './tool-bridge.js';
export { loadConfiguration, parseConfiguration, selectMCPServers, validateMCPServers } from './config.js';

export { ServerRegistry } from './mcp/server-registry.js';
export {
  McpConnectionManager,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_STARTUP_TIMEOUT_MS,
} from './mcp/connection-manager.js';
export type { CallToolOptions, ConnectionManagerOptions, ShutdownReport } from './mcp/connection-manager.js';
export { ToolManager } from './mcp/tool-manager.js';
export type { ToolCatalogSummary } from './mcp/tool-manager.js';
export { ToolExecutor, parsePromptToolCalls } from './mcp/tool-executor.js';
export type { ExecuteToolsOptions, ToolExecutorOptions } from './mcp/tool-executor.js';
export { createSdkSession } from './mcp/sdk-session.js';
export type { McpLogFn, McpSession, SessionFactory, SessionFactoryOptions } from './mcp/session.js';
export { normalizeToolResult } from './mcp/tool-result.js';
export { toClaudeToolDefinition, toOpenAIToolDefinition, renderPromptFragment } from './mcp/schema-adapters.js';
export type { ClaudeToolDefinition, OpenAIToolDefinition } from './mcp/schema-adapters.js';
export { presentResult, toLlmToolMessages, toStatusMessage } from './mcp/presentation.js';
export type { LlmToolMessage, ToolCallStatusMessage } from './mcp/presentation.js';
export {
  ToolBridgeError,
  UnknownServerError,
  UnknownToolError,
  InvalidArgumentsError,
  ConnectionError,
  ToolInvocationError,
  ShutdownError,
  TOOL_ERROR_KIND_MEANINGS,
} from './mcp/errors.js';

export { ToolCallRouter } from './headends/tool-call-router.js';
export type { McpToolResponse } from './headends/tool-call-router.js';
export { WebSocketHeadend } from './headends/websocket-headend.js';
export type { OutboundMessage, ToolBatchSource, WebSocketHeadendOptions } from './headends/websocket-headend.js';
export { createStructuredLogger } from './logging/structured-logger.js';

// Type exports
export type {
  Configuration,
  MCPServerConfig,
  ServerConfig,
  ToolDescriptor,
  ToolCallRequest,
  ToolCallResult,
  ContentItem,
  ToolErrorKind,
  PresentationMode,
  PresentedToolResult,
  ToolExecutionEvent,
  ToolCallStatusEvent,
  BatchCompleteEvent,
  DisplayContent,
  LogEntry,
  LogFn,
} from './types.js';
