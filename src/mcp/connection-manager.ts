import { randomUUID } from 'node:crypto';

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { Mutex } from 'async-mutex';

import type { ServerConfig, ToolCallResult, ToolDescriptor } from '../types.js';
import type { ServerRegistry } from './server-registry.js';
import type { McpLogFn, McpSession, SessionFactory } from './session.js';

import { toErrorMessage } from '../utils.js';

import { ConnectionError, ShutdownError, ToolInvocationError, UnknownServerError } from './errors.js';
import { createSdkSession } from './sdk-session.js';
import { errorResult, normalizeToolResult } from './tool-result.js';

export const DEFAULT_STARTUP_TIMEOUT_MS = 10_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

// One retry with a fresh session after a transport failure.
const MAX_ATTEMPTS = 2;

export interface ShutdownReport {
  closed: string[];
  failures: ShutdownError[];
}

export interface ConnectionManagerOptions {
  sessionFactory?: SessionFactory;
  log?: McpLogFn;
  startupTimeoutMs?: number;
  requestTimeoutMs?: number;
}

export interface CallToolOptions {
  callId?: string;
  timeoutMs?: number;
}

interface SessionEntry {
  session: McpSession;
  generation: number;
  tools?: ToolDescriptor[];
}

const isTransportFailure = (error: unknown): boolean => {
  if (error instanceof McpError) {
    return error.code === ErrorCode.ConnectionClosed || error.code === ErrorCode.RequestTimeout;
  }
  return true;
};

function filterToolsForServer(config: ServerConfig, tools: ToolDescriptor[], log: McpLogFn): ToolDescriptor[] {
  const normalize = (values: readonly string[] | undefined): { entries: Set<string>; wildcard: boolean } => {
    let wildcard = false;
    const entries = new Set<string>();
    (values ?? []).forEach((item) => {
      const lower = item.trim().toLowerCase();
      if (lower.length === 0) return;
      if (lower === '*' || lower === 'any') {
        wildcard = true;
        return;
      }
      entries.add(lower);
    });
    return { entries, wildcard };
  };
  const allowed = config.toolsAllowed !== undefined && config.toolsAllowed.length > 0
    ? normalize(config.toolsAllowed)
    : { entries: new Set<string>(), wildcard: true };
  const denied = normalize(config.toolsDenied);
  const filtered = tools.filter((tool) => {
    const key = tool.name.toLowerCase();
    if (!allowed.wildcard && !allowed.entries.has(key)) return false;
    return !denied.wildcard && !denied.entries.has(key);
  });
  if (filtered.length !== tools.length) {
    const removed = tools.filter((tool) => !filtered.includes(tool)).map((tool) => tool.name).join(', ');
    log('VRB', `filtered tools for '${config.name}': removed [${removed}]`, `mcp:${config.name}`);
  }
  return filtered;
}

/**
 * Owns at most one live MCP session per server name. Sessions are opened on
 * first use, reused afterwards and replaced once when the transport fails.
 */
export class McpConnectionManager {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly pending = new Map<string, Promise<SessionEntry>>();
  private readonly listings = new Map<string, Promise<ToolDescriptor[]>>();
  private readonly callLocks = new Map<string, Mutex>();
  private readonly sessionFactory: SessionFactory;
  private readonly log: McpLogFn;
  private readonly startupTimeoutMs: number;
  private readonly requestTimeoutMs: number;
  // Bumped by every teardown; sessions opened under an older generation are discarded.
  private generation = 0;
  private closing?: Promise<ShutdownReport>;

  constructor(private readonly registry: ServerRegistry, opts: ConnectionManagerOptions = {}) {
    this.sessionFactory = opts.sessionFactory ?? createSdkSession;
    this.log = opts.log ?? (() => undefined);
    this.startupTimeoutMs = opts.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  activeServers(): string[] {
    return Array.from(this.sessions.keys());
  }

  hasSession(serverName: string): boolean {
    return this.sessions.has(serverName);
  }

  invalidate(serverName?: string): void {
    if (serverName !== undefined) {
      const entry = this.sessions.get(serverName);
      if (entry !== undefined) entry.tools = undefined;
      return;
    }
    this.sessions.forEach((entry) => { entry.tools = undefined; });
  }

  async listTools(serverName: string, opts: { refresh?: boolean } = {}): Promise<ToolDescriptor[]> {
    const config = this.registry.get(serverName);
    const cached = this.sessions.get(serverName)?.tools;
    if (opts.refresh !== true && cached !== undefined) return cached;

    const inflight = this.listings.get(serverName);
    if (inflight !== undefined) return await inflight;

    const listing = this.fetchTools(config);
    this.listings.set(serverName, listing);
    try {
      return await listing;
    } finally {
      if (this.listings.get(serverName) === listing) this.listings.delete(serverName);
    }
  }

  /**
   * Invoke one tool. Call-level failures come back as error results; this
   * method only rejects on programmer errors.
   */
  async callTool(serverName: string, toolName: string, args: Record<string, unknown>, opts: CallToolOptions = {}): Promise<ToolCallResult> {
    const callId = opts.callId ?? randomUUID();
    if (!this.registry.has(serverName)) return errorResult(callId, new UnknownServerError(serverName));
    const config = this.registry.get(serverName);
    const remote = `mcp:${serverName}:${toolName}`;
    const startGeneration = this.generation;

    let lastError: unknown;
    // eslint-disable-next-line functional/no-loop-statements
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt += 1) {
      let entry: SessionEntry;
      try {
        entry = await this.acquire(config);
      } catch (error) {
        lastError = error;
        if (this.closing !== undefined || this.generation !== startGeneration) break;
        continue;
      }
      try {
        const raw = await this.invoke(config, entry, toolName, args, opts.timeoutMs);
        return normalizeToolResult(callId, raw);
      } catch (error) {
        if (!isTransportFailure(error)) {
          return errorResult(callId, new ToolInvocationError(serverName, toolName, toErrorMessage(error)));
        }
        lastError = error;
        await this.discard(serverName, entry);
        // A teardown ran while the call was in flight; do not reopen behind it.
        if (this.generation !== startGeneration) break;
        if (attempt < MAX_ATTEMPTS) {
          this.log('WRN', `transport failure, retrying with a fresh session: ${toErrorMessage(error)}`, remote);
        }
      }
    }
    const failure = lastError instanceof ConnectionError
      ? lastError
      : new ConnectionError(serverName, `call to '${toolName}' failed: ${toErrorMessage(lastError)}`, lastError);
    this.log('ERR', failure.message, remote);
    return errorResult(callId, failure);
  }

  /**
   * Close every live session once. Concurrent callers share the same teardown.
   * Never rejects; close failures are logged and reported.
   */
  async close(): Promise<ShutdownReport> {
    if (this.closing !== undefined) return await this.closing;
    if (this.sessions.size === 0 && this.pending.size === 0) return { closed: [], failures: [] };
    const teardown = this.teardown();
    this.closing = teardown;
    try {
      return await teardown;
    } finally {
      this.closing = undefined;
    }
  }

  private async teardown(): Promise<ShutdownReport> {
    this.generation += 1;
    const entries = Array.from(this.sessions.entries());
    this.sessions.clear();
    const pendingInits = Array.from(this.pending.values());

    const outcomes = await Promise.allSettled(entries.map(async ([, entry]) => { await entry.session.close(); }));
    // Sessions still connecting close themselves once they see the new generation.
    await Promise.allSettled(pendingInits);

    const report: ShutdownReport = { closed: [], failures: [] };
    outcomes.forEach((outcome, index) => {
      const name = entries[index]?.[0] ?? '<unknown>';
      if (outcome.status === 'fulfilled') {
        report.closed.push(name);
        return;
      }
      const failure = new ShutdownError(name, outcome.reason);
      report.failures.push(failure);
      this.log('WRN', failure.message, `mcp:${name}`);
    });
    this.log('VRB', `closed ${String(report.closed.length)} MCP session(s), ${String(report.failures.length)} failure(s)`, 'mcp:*');
    return report;
  }

  private async fetchTools(config: ServerConfig): Promise<ToolDescriptor[]> {
    const serverName = config.name;
    const startGeneration = this.generation;
    let lastError: unknown;
    // eslint-disable-next-line functional/no-loop-statements
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt += 1) {
      let entry: SessionEntry;
      try {
        entry = await this.acquire(config);
      } catch (error) {
        lastError = error;
        if (this.closing !== undefined || this.generation !== startGeneration) break;
        continue;
      }
      try {
        const tools = filterToolsForServer(config, await entry.session.listTools(), this.log);
        if (this.sessions.get(serverName) === entry) entry.tools = tools;
        this.log('TRC', `listTools('${serverName}') -> ${String(tools.length)} tools [${tools.map((t) => t.name).join(', ')}]`, `mcp:${serverName}`);
        return tools;
      } catch (error) {
        lastError = error;
        await this.discard(serverName, entry);
        if (this.generation !== startGeneration) break;
      }
    }
    if (lastError instanceof ConnectionError) throw lastError;
    throw new ConnectionError(serverName, `listTools failed: ${toErrorMessage(lastError)}`, lastError);
  }

  private async acquire(config: ServerConfig): Promise<SessionEntry> {
    const serverName = config.name;
    if (this.closing !== undefined) {
      throw new ConnectionError(serverName, 'connection manager is shutting down');
    }
    const existing = this.sessions.get(serverName);
    if (existing !== undefined) return existing;
    const inflight = this.pending.get(serverName);
    if (inflight !== undefined) return await inflight;

    const init = this.openSession(config, this.generation);
    this.pending.set(serverName, init);
    try {
      return await init;
    } finally {
      if (this.pending.get(serverName) === init) this.pending.delete(serverName);
    }
  }

  private async openSession(config: ServerConfig, generation: number): Promise<SessionEntry> {
    const serverName = config.name;
    let session: McpSession;
    try {
      session = await this.sessionFactory(config, {
        startupTimeoutMs: this.startupTimeoutMs,
        requestTimeoutMs: this.requestTimeoutMs,
        log: this.log,
      });
    } catch (error) {
      throw new ConnectionError(serverName, `failed to open session: ${toErrorMessage(error)}`, error);
    }
    if (generation !== this.generation) {
      await this.closeQuietly(session);
      throw new ConnectionError(serverName, 'session opened during shutdown was discarded');
    }
    const entry: SessionEntry = { session, generation };
    session.onclose = () => {
      if (this.sessions.get(serverName) !== entry) return;
      this.sessions.delete(serverName);
      this.log('VRB', 'session closed by peer; evicted with its tool cache', `mcp:${serverName}`);
    };
    this.sessions.set(serverName, entry);
    this.log('VRB', 'session opened', `mcp:${serverName}`);
    return entry;
  }

  private async invoke(
    config: ServerConfig,
    entry: SessionEntry,
    toolName: string,
    args: Record<string, unknown>,
    timeoutMs: number | undefined,
  ): Promise<unknown> {
    const run = async (): Promise<unknown> => await entry.session.callTool(toolName, args, { timeoutMs: timeoutMs ?? config.requestTimeoutMs });
    if (config.serializeCalls !== true && entry.session.supportsConcurrentCalls) return await run();
    let lock = this.callLocks.get(config.name);
    if (lock === undefined) {
      lock = new Mutex();
      this.callLocks.set(config.name, lock);
    }
    return await lock.runExclusive(run);
  }

  private async discard(serverName: string, entry: SessionEntry): Promise<void> {
    if (this.sessions.get(serverName) === entry) this.sessions.delete(serverName);
    // Sessions from an older generation belong to the teardown that retired them.
    if (entry.generation !== this.generation) return;
    await this.closeQuietly(entry.session);
  }

  private async closeQuietly(session: McpSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.log('WRN', `closing session failed: ${toErrorMessage(error)}`, `mcp:${session.serverName}`);
    }
  }
}
