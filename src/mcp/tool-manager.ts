import { Mutex } from 'async-mutex';

import type { ToolDescriptor } from '../types.js';
import type { McpConnectionManager } from './connection-manager.js';
import type { ClaudeToolDefinition, OpenAIToolDefinition } from './schema-adapters.js';
import type { ServerRegistry } from './server-registry.js';
import type { McpLogFn } from './session.js';

import { toErrorMessage } from '../utils.js';

import { UnknownToolError } from './errors.js';
import { renderPromptFragment, toClaudeToolDefinition, toOpenAIToolDefinition } from './schema-adapters.js';

interface ToolCatalogSnapshot {
  readonly index: ReadonlyMap<string, ToolDescriptor>;
  readonly tools: readonly ToolDescriptor[];
  readonly openai: readonly OpenAIToolDefinition[];
  readonly claude: readonly ClaudeToolDefinition[];
  readonly promptFragment: string;
}

const EMPTY_SNAPSHOT: ToolCatalogSnapshot = {
  index: new Map(),
  tools: [],
  openai: [],
  claude: [],
  promptFragment: '',
};

export interface ToolCatalogSummary {
  tools: number;
  servers: number;
  failedServers: string[];
}

/**
 * Tool name -> owning server index plus the catalogs handed to the LLM.
 * Every rebuild produces a fresh snapshot; readers never see a half-built one.
 */
export class ToolManager {
  private snapshot: ToolCatalogSnapshot = EMPTY_SNAPSHOT;
  private readonly rebuildLock = new Mutex();
  private readonly log: McpLogFn;

  constructor(
    private readonly registry: ServerRegistry,
    private readonly connections: McpConnectionManager,
    opts: { log?: McpLogFn } = {},
  ) {
    this.log = opts.log ?? (() => undefined);
  }

  async build(): Promise<ToolCatalogSummary> {
    return await this.rebuildLock.runExclusive(async () => await this.rebuild(false));
  }

  async refresh(): Promise<ToolCatalogSummary> {
    return await this.rebuildLock.runExclusive(async () => {
      this.connections.invalidate();
      return await this.rebuild(true);
    });
  }

  resolve(toolName: string): string {
    const tool = this.snapshot.index.get(toolName);
    if (tool === undefined) throw new UnknownToolError(toolName);
    return tool.serverName;
  }

  describe(toolName: string): ToolDescriptor | undefined {
    return this.snapshot.index.get(toolName);
  }

  has(toolName: string): boolean {
    return this.snapshot.index.has(toolName);
  }

  list(): readonly ToolDescriptor[] {
    return this.snapshot.tools;
  }

  getOpenAITools(): readonly OpenAIToolDefinition[] {
    return this.snapshot.openai;
  }

  getClaudeTools(): readonly ClaudeToolDefinition[] {
    return this.snapshot.claude;
  }

  getPromptFragment(): string {
    return this.snapshot.promptFragment;
  }

  private async rebuild(refresh: boolean): Promise<ToolCatalogSummary> {
    const servers = this.registry.names();
    // Listing in parallel; merge below walks the results in configuration order.
    const listings = await Promise.allSettled(
      servers.map(async (serverName) => await this.connections.listTools(serverName, { refresh })),
    );

    const index = new Map<string, ToolDescriptor>();
    const tools: ToolDescriptor[] = [];
    const failedServers: string[] = [];
    listings.forEach((outcome, position) => {
      const serverName = servers[position] ?? '<unknown>';
      if (outcome.status === 'rejected') {
        failedServers.push(serverName);
        this.log('ERR', `tool listing failed, server left out of the catalog: ${toErrorMessage(outcome.reason)}`, `mcp:${serverName}`);
        return;
      }
      outcome.value.forEach((tool) => {
        const owner = index.get(tool.name);
        if (owner !== undefined) {
          this.log('WRN', `duplicate tool '${tool.name}' ignored; already provided by '${owner.serverName}'`, `mcp:${serverName}:${tool.name}`);
          return;
        }
        index.set(tool.name, tool);
        tools.push(tool);
      });
    });

    this.snapshot = {
      index,
      tools,
      openai: tools.map((tool) => toOpenAIToolDefinition(tool)),
      claude: tools.map((tool) => toClaudeToolDefinition(tool)),
      promptFragment: renderPromptFragment(tools),
    };
    this.log('VRB', `tool catalog built: ${String(tools.length)} tools from ${String(servers.length - failedServers.length)} server(s)`, 'mcp:*');
    return { tools: tools.length, servers: servers.length - failedServers.length, failedServers };
  }
}
