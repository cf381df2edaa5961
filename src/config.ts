import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { load as loadYaml } from 'js-yaml';
import { z } from 'zod';

import type { Configuration } from './types.js';

import { isPlainObject, toErrorMessage } from './utils.js';

export const CONFIG_FILE_NAMES = ['.tool-bridge.json', '.tool-bridge.yaml', '.tool-bridge.yml'] as const;

const MCPServerConfigSchema = z.object({
  type: z.enum(['stdio', 'http', 'sse']),
  command: z.string().optional(),
  args: z.array(z.string()).optional(),
  url: z.string().optional(),
  headers: z.record(z.string(), z.string()).optional(),
  env: z.record(z.string(), z.string()).optional(),
  enabled: z.boolean().optional(),
  requestTimeoutMs: z.number().int().positive().optional(),
  startupTimeoutMs: z.number().int().positive().optional(),
  serializeCalls: z.boolean().optional(),
  toolsAllowed: z.array(z.string()).optional(),
  toolsDenied: z.array(z.string()).optional(),
}).superRefine((server, ctx) => {
  if (server.type === 'stdio' && (server.command === undefined || server.command.length === 0)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['command'], message: 'stdio servers require a command' });
  }
  if (server.type !== 'stdio' && (server.url === undefined || server.url.length === 0)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: `${server.type} servers require a url` });
  }
});

const WebSocketConfigSchema = z.object({
  host: z.string().optional(),
  port: z.number().int().min(0).max(65535),
  path: z.string().optional(),
  heartbeatTimeoutMs: z.number().int().positive().optional(),
  maxConnections: z.number().int().positive().optional(),
});

const ConfigurationSchema = z.object({
  mcpServers: z.record(z.string(), MCPServerConfigSchema),
  enabledServers: z.array(z.string()).optional(),
  defaults: z
    .object({
      requestTimeoutMs: z.number().int().positive().optional(),
      startupTimeoutMs: z.number().int().positive().optional(),
      validateArguments: z.boolean().optional(),
    })
    .optional(),
  websocket: WebSocketConfigSchema.optional(),
  logging: z
    .object({
      format: z.enum(['logfmt', 'json', 'console']).optional(),
      verbose: z.boolean().optional(),
    })
    .optional(),
});

export function expandEnv(str: string, env: NodeJS.ProcessEnv = process.env): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => (env[name] ?? ''));
}

// mcpServers.*.env and mcpServers.*.headers are left for resolveServerSecrets.
export function expandDeep(obj: unknown, env: NodeJS.ProcessEnv = process.env, chain: string[] = []): unknown {
  if (typeof obj === 'string') {
    if (chain.includes('mcpServers') && (chain.includes('env') || chain.includes('environment') || chain.includes('headers'))) return obj;
    return expandEnv(obj, env);
  }
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v, env, chain));
  if (isPlainObject(obj)) {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v, env, [...chain, k]);
      return acc;
    }, {});
  }
  return obj;
}

export function resolveConfigPath(configPath?: string, cwd: string = process.cwd()): string {
  if (typeof configPath === 'string' && configPath.length > 0) {
    if (!fs.existsSync(configPath)) throw new Error(`Configuration file not found: ${configPath}`);
    return configPath;
  }
  const local = CONFIG_FILE_NAMES.map((name) => path.join(cwd, name)).find((candidate) => fs.existsSync(candidate));
  if (local !== undefined) return local;
  const home = path.join(os.homedir(), '.tool-bridge.json');
  if (fs.existsSync(home)) return home;
  throw new Error('Configuration file not found. Create .tool-bridge.json or pass --config');
}

function normalizeServer(srv: unknown): unknown {
  if (!isPlainObject(srv)) return srv;
  const out: Record<string, unknown> = { ...srv };
  if (out.type === undefined) {
    const url = srv.url;
    if (typeof url === 'string' && url.length > 0) {
      out.type = url.includes('/sse') ? 'sse' : 'http';
    } else {
      out.type = 'stdio';
    }
  }
  // ["node", "server.js"] style commands
  const cmd = srv.command;
  if (Array.isArray(cmd) && cmd.length > 0) {
    const existingArgs = Array.isArray(srv.args) ? srv.args.map((a) => String(a)) : [];
    out.command = String(cmd[0]);
    out.args = [...cmd.slice(1).map((a) => String(a)), ...existingArgs];
  }
  if (srv.environment !== undefined && srv.env === undefined) {
    out.env = srv.environment;
    delete out.environment;
  }
  return out;
}

function normalizeServers(expanded: unknown): unknown {
  if (!isPlainObject(expanded) || !isPlainObject(expanded.mcpServers)) return expanded;
  const normalizedServers = Object.fromEntries(
    Object.entries(expanded.mcpServers).map(([name, srv]) => [name, normalizeServer(srv)]),
  );
  return { ...expanded, mcpServers: normalizedServers };
}

function expandStrict(value: string, env: NodeJS.ProcessEnv, serverName: string): string {
  return value.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => {
    const resolved = env[name];
    if (resolved === undefined) {
      throw new Error(`Unresolved variable \${${name}} for mcp '${serverName}'. Define it in the environment.`);
    }
    return resolved;
  });
}

// Server env and header values must resolve completely; an empty credential is never sent.
function resolveServerSecrets(normalized: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isPlainObject(normalized) || !isPlainObject(normalized.mcpServers)) return normalized;
  const servers = Object.fromEntries(Object.entries(normalized.mcpServers).map(([name, srv]) => {
    if (!isPlainObject(srv) || srv.enabled === false) return [name, srv];
    const out: Record<string, unknown> = { ...srv };
    (['env', 'headers'] as const).forEach((key) => {
      const table = srv[key];
      if (!isPlainObject(table)) return;
      out[key] = Object.fromEntries(
        Object.entries(table).map(([k, v]) => [k, typeof v === 'string' ? expandStrict(v, env, name) : v]),
      );
    });
    return [name, out];
  }));
  return { ...normalized, mcpServers: servers };
}

function parseDocument(raw: string, source: string): unknown {
  const ext = path.extname(source).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') {
    try {
      return loadYaml(raw);
    } catch (e) {
      throw new Error(`Invalid YAML in configuration file ${source}: ${toErrorMessage(e)}`);
    }
  }
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new Error(`Invalid JSON in configuration file ${source}: ${toErrorMessage(e)}`);
  }
}

/** Validate an already-parsed document (file contents, or an object built in code). */
export function parseConfiguration(document: unknown, source = '<inline>', env: NodeJS.ProcessEnv = process.env): Configuration {
  const normalized = resolveServerSecrets(normalizeServers(expandDeep(document, env)), env);
  const parsed = ConfigurationSchema.safeParse(normalized);
  if (!parsed.success) {
    const msgs = parsed.error.issues
      .map((issue) => `  ${issue.path.map((p) => String(p)).join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Configuration validation failed in ${source}:\n${msgs}`);
  }
  const configuration: Configuration = parsed.data;
  return configuration;
}

export function loadConfiguration(configPath?: string): Configuration {
  const resolved = resolveConfigPath(configPath);
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (e) {
    throw new Error(`Failed to read configuration file ${resolved}: ${toErrorMessage(e)}`);
  }
  return parseConfiguration(parseDocument(raw, resolved), resolved);
}

export function validateMCPServers(config: Configuration, mcpServers: string[]): void {
  const missing = mcpServers.filter((s) => !(s in config.mcpServers));
  if (missing.length > 0) throw new Error(`Unknown MCP servers: ${missing.join(', ')}`);
}

/** Restrict the configuration to the named servers, replacing `enabledServers`. */
export function selectMCPServers(config: Configuration, mcpServers: string[]): Configuration {
  validateMCPServers(config, mcpServers);
  return { ...config, enabledServers: [...mcpServers] };
}
