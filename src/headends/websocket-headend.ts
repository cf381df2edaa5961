import { randomUUID } from 'node:crypto';

import { WebSocket, WebSocketServer, type RawData } from 'ws';

import type { LogEntry, PresentationMode, PresentedToolResult, ToolCallRequest, ToolDescriptor, ToolExecutionEvent, WebSocketConfig } from '../types.js';
import type { ToolCallStatusMessage } from '../mcp/presentation.js';
import type { McpToolResponse, ToolCallRouter } from './tool-call-router.js';
import type { Headend, HeadendClosedEvent, HeadendContext, HeadendDescription } from './types.js';

import { toStatusMessage } from '../mcp/presentation.js';
import { isPlainObject, toErrorMessage } from '../utils.js';

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

const createDeferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
};

export const DEFAULT_WS_PATH = '/client-ws';
export const DEFAULT_HEARTBEAT_TIMEOUT_MS = 60_000;

export type OutboundMessage =
  | McpToolResponse
  | ToolCallStatusMessage
  | { type: 'heartbeat-ack'; timestamp: number }
  | { type: 'tools-list'; tools: { name: string; server: string; description: string; input_schema: Record<string, unknown> }[] }
  | { type: 'error'; message: string };

export interface ToolCatalogSource {
  list: () => readonly ToolDescriptor[];
}

export interface ToolBatchSource {
  executeTools: (
    calls: readonly ToolCallRequest[],
    mode: PresentationMode,
    opts?: { signal?: AbortSignal },
  ) => AsyncGenerator<ToolExecutionEvent, void, undefined>;
}

interface ClientContext {
  clientId: string;
  socket: WebSocket;
  abort: AbortController;
  lastSeen: number;
}

export interface WebSocketHeadendOptions {
  config: WebSocketConfig;
  router: ToolCallRouter;
  catalog: ToolCatalogSource;
  executor: ToolBatchSource;
  onClientConnected?: (clientId: string) => void;
}

/**
 * Per-client WebSocket endpoint for the chat front end. Each connection gets
 * its own abort signal; closing the socket abandons the rest of its tool batch.
 */
export class WebSocketHeadend implements Headend {
  public readonly kind = 'websocket' as const;
  public readonly id: string;
  public readonly closed: Promise<HeadendClosedEvent>;

  private readonly config: WebSocketConfig;
  private readonly router: ToolCallRouter;
  private readonly catalog: ToolCatalogSource;
  private readonly executor: ToolBatchSource;
  private readonly onClientConnected?: (clientId: string) => void;
  private readonly closeDeferred = createDeferred<HeadendClosedEvent>();
  private readonly clients = new Map<string, ClientContext>();
  private readonly heartbeatTimeoutMs: number;
  private wsServer?: WebSocketServer;
  private sweepTimer?: NodeJS.Timeout;
  private context?: HeadendContext;
  private stopping = false;
  private closedSignaled = false;

  public constructor(options: WebSocketHeadendOptions) {
    this.config = options.config;
    this.router = options.router;
    this.catalog = options.catalog;
    this.executor = options.executor;
    this.onClientConnected = options.onClientConnected;
    this.heartbeatTimeoutMs = options.config.heartbeatTimeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
    this.id = `ws:${String(options.config.port)}`;
    this.closed = this.closeDeferred.promise;
  }

  public describe(): HeadendDescription {
    return {
      id: this.id,
      kind: this.kind,
      label: `WebSocket tool calls on ${this.config.host ?? '0.0.0.0'}:${String(this.config.port)}${this.path()}`,
      details: { clients: this.clients.size, heartbeatTimeoutMs: this.heartbeatTimeoutMs },
    };
  }

  public async start(context: HeadendContext): Promise<void> {
    if (this.context !== undefined) return;
    this.context = context;
    const server = new WebSocketServer({ host: this.config.host, port: this.config.port, path: this.path() });
    this.wsServer = server;

    try {
      await new Promise<void>((resolve, reject) => {
        server.once('listening', () => { resolve(); });
        server.once('error', (err) => { reject(err); });
      });
    } catch (err) {
      this.log(`listen failed: ${toErrorMessage(err)}`, 'ERR', true);
      this.wsServer = undefined;
      this.context = undefined;
      server.close();
      throw err;
    }

    server.on('error', (err) => {
      this.log(`ws server error: ${err.message}`, 'ERR', true);
      this.signalClosed({ reason: 'error', error: err });
    });
    server.on('connection', (socket) => { this.accept(socket); });

    this.sweepTimer = setInterval(() => { this.sweepStaleClients(); }, Math.max(1000, Math.floor(this.heartbeatTimeoutMs / 2)));
    this.sweepTimer.unref();

    context.shutdownSignal.addEventListener('abort', () => {
      this.stop().catch((err: unknown) => { this.log(`stop after shutdown signal failed: ${toErrorMessage(err)}`, 'ERR'); });
    }, { once: true });
    this.log('started');
  }

  /** Port actually bound; differs from the configured one when that is 0. */
  public port(): number | undefined {
    const address = this.wsServer?.address();
    return address !== undefined && typeof address === 'object' ? address.port : undefined;
  }

  public async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    if (this.sweepTimer !== undefined) clearInterval(this.sweepTimer);
    Array.from(this.clients.values()).forEach((client) => { this.dropClient(client, 1001, 'server shutting down'); });
    const server = this.wsServer;
    if (server !== undefined) {
      await new Promise<void>((resolve) => {
        server.close(() => { resolve(); });
      });
      this.wsServer = undefined;
    }
    this.log('stopped');
    this.signalClosed({ reason: 'stopped', graceful: true });
  }

  /**
   * Handle one inbound text frame. Resolves to the reply, or `undefined` when
   * nothing should be sent (the client went away mid-call).
   */
  public async processMessage(raw: string, signal: AbortSignal): Promise<OutboundMessage | undefined> {
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      return { type: 'error', message: 'Malformed JSON message' };
    }
    if (!isPlainObject(message) || typeof message.type !== 'string') {
      return { type: 'error', message: 'Message must be a JSON object with a string "type"' };
    }
    switch (message.type) {
      case 'mcp-tool-call':
        return await this.router.handle(message, { signal });
      case 'heartbeat':
        return { type: 'heartbeat-ack', timestamp: Date.now() };
      case 'fetch-tools':
        return {
          type: 'tools-list',
          tools: this.catalog.list().map((tool) => ({
            name: tool.name,
            server: tool.serverName,
            description: tool.description,
            input_schema: tool.inputSchema,
          })),
        };
      default:
        return { type: 'error', message: `Unknown message type '${message.type}'` };
    }
  }

  /**
   * Run an LLM-turn batch on behalf of a connected client. Status events go to
   * that client as `tool_call_status` messages while the batch runs; the
   * returned results feed the LLM continuation. Resolves to `undefined` when
   * the client is unknown or disconnects before the batch finishes.
   */
  public async runBatchForClient(
    clientId: string,
    calls: readonly ToolCallRequest[],
    mode: PresentationMode,
  ): Promise<PresentedToolResult[] | undefined> {
    const client = this.clients.get(clientId);
    if (client === undefined) return undefined;
    // eslint-disable-next-line functional/no-loop-statements
    for await (const event of this.executor.executeTools(calls, mode, { signal: client.abort.signal })) {
      if (event.type === 'batch_complete') return event.results;
      this.send(client, toStatusMessage(event));
    }
    return undefined;
  }

  private path(): string {
    return this.config.path ?? DEFAULT_WS_PATH;
  }

  private accept(socket: WebSocket): void {
    const max = this.config.maxConnections;
    if (this.stopping || (max !== undefined && this.clients.size >= max)) {
      this.log(`rejecting connection (${this.stopping ? 'stopping' : 'connection limit reached'})`, 'WRN');
      socket.close(1013, 'server busy');
      return;
    }
    const client: ClientContext = { clientId: randomUUID(), socket, abort: new AbortController(), lastSeen: Date.now() };
    this.clients.set(client.clientId, client);
    this.log('client connected', 'VRB', false, 'request', client.clientId);
    this.onClientConnected?.(client.clientId);

    socket.on('message', (data: RawData, isBinary: boolean) => {
      client.lastSeen = Date.now();
      if (isBinary) {
        this.send(client, { type: 'error', message: 'Binary frames are not supported' });
        return;
      }
      void this.dispatch(client, rawToString(data));
    });
    socket.on('close', () => {
      this.dropClient(client);
      this.log('client disconnected', 'VRB', false, 'request', client.clientId);
    });
    socket.on('error', (err) => {
      this.log(`client socket error: ${err.message}`, 'WRN', false, 'request', client.clientId);
    });
  }

  private async dispatch(client: ClientContext, raw: string): Promise<void> {
    try {
      const reply = await this.processMessage(raw, client.abort.signal);
      if (reply !== undefined) this.send(client, reply);
    } catch (err) {
      this.log(`message handling failed: ${toErrorMessage(err)}`, 'ERR', false, 'request', client.clientId);
      this.send(client, { type: 'error', message: 'Internal error while handling message' });
    }
  }

  private send(client: ClientContext, message: OutboundMessage): void {
    if (client.abort.signal.aborted || client.socket.readyState !== WebSocket.OPEN) return;
    client.socket.send(JSON.stringify(message), (err) => {
      if (err instanceof Error) {
        this.log(`send failed: ${err.message}`, 'WRN', false, 'response', client.clientId);
      }
    });
  }

  private dropClient(client: ClientContext, code?: number, reason?: string): void {
    if (!this.clients.delete(client.clientId)) return;
    client.abort.abort();
    if (code !== undefined && client.socket.readyState === WebSocket.OPEN) {
      client.socket.close(code, reason);
    }
  }

  private sweepStaleClients(): void {
    const cutoff = Date.now() - this.heartbeatTimeoutMs;
    Array.from(this.clients.values())
      .filter((client) => client.lastSeen < cutoff)
      .forEach((client) => {
        this.log('closing stale connection (no heartbeat)', 'WRN', false, 'request', client.clientId);
        this.dropClient(client, 4000, 'heartbeat timeout');
      });
  }

  private signalClosed(event: HeadendClosedEvent): void {
    if (this.closedSignaled) return;
    this.closedSignaled = true;
    this.closeDeferred.resolve(event);
  }

  private log(
    message: string,
    severity: LogEntry['severity'] = 'VRB',
    fatal = false,
    direction: LogEntry['direction'] = 'response',
    clientId?: string,
  ): void {
    if (this.context === undefined) return;
    this.context.log({
      timestamp: Date.now(),
      severity,
      direction,
      type: 'headend',
      remoteIdentifier: `headend:${this.id}`,
      fatal,
      message,
      headendId: this.id,
      ...(clientId !== undefined ? { clientId } : {}),
    });
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}
