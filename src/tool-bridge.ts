import type { Configuration, LogFn, PresentationMode, ToolCallRequest, ToolExecutionEvent } from './types.js';
import type { ShutdownReport } from './mcp/connection-manager.js';
import type { SessionFactory } from './mcp/session.js';
import type { ToolCatalogSummary } from './mcp/tool-manager.js';

import { ToolCallRouter } from './headends/tool-call-router.js';
import { WebSocketHeadend } from './headends/websocket-headend.js';
import { createMcpLogAdapter } from './logging/mcp-log.js';
import { McpConnectionManager } from './mcp/connection-manager.js';
import { ServerRegistry } from './mcp/server-registry.js';
import { ToolExecutor } from './mcp/tool-executor.js';
import { ToolManager } from './mcp/tool-manager.js';

export interface ToolBridgeOptions {
  log?: LogFn;
  sessionFactory?: SessionFactory;
}

/**
 * Wires the registry, connection manager, tool catalog, executor and router
 * for one configuration.
 */
export class ToolBridge {
  readonly registry: ServerRegistry;
  readonly connections: McpConnectionManager;
  readonly tools: ToolManager;
  readonly executor: ToolExecutor;
  readonly router: ToolCallRouter;
  private readonly configuration: Configuration;

  constructor(configuration: Configuration, opts: ToolBridgeOptions = {}) {
    this.configuration = configuration;
    const log = createMcpLogAdapter(opts.log ?? (() => undefined));
    this.registry = ServerRegistry.fromConfiguration(configuration);
    this.connections = new McpConnectionManager(this.registry, {
      sessionFactory: opts.sessionFactory,
      log,
      requestTimeoutMs: configuration.defaults?.requestTimeoutMs,
      startupTimeoutMs: configuration.defaults?.startupTimeoutMs,
    });
    this.tools = new ToolManager(this.registry, this.connections, { log });
    this.executor = new ToolExecutor(this.tools, this.connections, {
      log,
      validateArguments: configuration.defaults?.validateArguments,
    });
    this.router = new ToolCallRouter(this.executor, { log });
  }

  /** Connects every enabled server and builds the tool catalog. */
  async start(): Promise<ToolCatalogSummary> {
    return await this.tools.build();
  }

  async refreshTools(): Promise<ToolCatalogSummary> {
    return await this.tools.refresh();
  }

  executeTools(calls: readonly ToolCallRequest[], mode: PresentationMode, signal?: AbortSignal): AsyncGenerator<ToolExecutionEvent, void, undefined> {
    return this.executor.executeTools(calls, mode, { signal });
  }

  /**
   * `onClientConnected` hands out the id an LLM-turn driver passes to
   * `runBatchForClient` so that client sees the batch's status messages.
   */
  createWebSocketHeadend(opts: { onClientConnected?: (clientId: string) => void } = {}): WebSocketHeadend | undefined {
    const ws = this.configuration.websocket;
    if (ws === undefined) return undefined;
    return new WebSocketHeadend({
      config: ws,
      router: this.router,
      catalog: this.tools,
      executor: this.executor,
      onClientConnected: opts.onClientConnected,
    });
  }

  async shutdown(): Promise<ShutdownReport> {
    return await this.connections.close();
  }
}
