import type { Configuration, ServerConfig } from '../types.js';

import { UnknownServerError } from './errors.js';

const SERVER_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

function sanitizeServerName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new Error('MCP server names must be non-empty strings.');
  }
  if (!SERVER_NAME_PATTERN.test(trimmed)) {
    throw new Error(`MCP server names may only contain letters, digits, '-' or '_': ${name}`);
  }
  return trimmed;
}

const freezeList = (values: readonly string[] | undefined): readonly string[] | undefined =>
  values !== undefined ? Object.freeze([...values]) : undefined;

function freezeConfig(name: string, config: ServerConfig): ServerConfig {
  const frozen: ServerConfig = {
    ...config,
    name,
    args: freezeList(config.args),
    toolsAllowed: freezeList(config.toolsAllowed),
    toolsDenied: freezeList(config.toolsDenied),
    env: config.env !== undefined ? Object.freeze({ ...config.env }) : undefined,
    headers: config.headers !== undefined ? Object.freeze({ ...config.headers }) : undefined,
  };
  return Object.freeze(frozen);
}

/**
 * Static table of tool-server launch configurations, keyed by server name.
 */
export class ServerRegistry {
  private readonly servers = new Map<string, ServerConfig>();

  static fromConfiguration(configuration: Configuration): ServerRegistry {
    const registry = new ServerRegistry();
    const enabled = configuration.enabledServers !== undefined && configuration.enabledServers.length > 0
      ? new Set(configuration.enabledServers)
      : undefined;
    Object.entries(configuration.mcpServers).forEach(([name, config]) => {
      if (config.enabled === false) return;
      if (enabled !== undefined && !enabled.has(name)) return;
      registry.register({ ...config, name });
    });
    return registry;
  }

  register(config: ServerConfig): ServerConfig {
    const key = sanitizeServerName(config.name);
    const frozen = freezeConfig(key, config);
    this.servers.set(key, frozen);
    return frozen;
  }

  get(name: string): ServerConfig {
    const config = this.servers.get(name);
    if (config === undefined) throw new UnknownServerError(name);
    return config;
  }

  has(name: string): boolean {
    return this.servers.has(name);
  }

  names(): string[] {
    return Array.from(this.servers.keys());
  }

  list(): ServerConfig[] {
    return Array.from(this.servers.values());
  }
}
