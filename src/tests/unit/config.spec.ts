import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { expandEnv, loadConfiguration, parseConfiguration, resolveConfigPath, selectMCPServers, validateMCPServers } from '../../config.js';
import { ServerRegistry } from '../../mcp/server-registry.js';

describe('parseConfiguration', () => {
  it('infers transport types and splits array commands', () => {
    const configuration = parseConfiguration({
      mcpServers: {
        local: { command: ['node', 'server.js'], args: ['--quiet'] },
        remote: { url: 'https://tools.test/mcp' },
        legacy: { url: 'https://tools.test/sse' },
      },
    });

    expect(configuration.mcpServers.local).toEqual({ type: 'stdio', command: 'node', args: ['server.js', '--quiet'] });
    expect(configuration.mcpServers.remote?.type).toBe('http');
    expect(configuration.mcpServers.legacy?.type).toBe('sse');
  });

  it('expands ${VAR} everywhere, strictly in server env and headers', () => {
    const env = { TOOLS_HOST: 'tools.test', API_TOKEN: 'test-secret' };
    const configuration = parseConfiguration({
      mcpServers: {
        remote: {
          type: 'http',
          url: 'https://${TOOLS_HOST}/mcp',
          headers: { Authorization: 'Bearer ${API_TOKEN}' },
        },
        local: { command: 'tool-server', environment: { TOKEN: '${API_TOKEN}' } },
      },
    }, '<test>', env);

    expect(configuration.mcpServers.remote?.url).toBe('https://tools.test/mcp');
    expect(configuration.mcpServers.remote?.headers).toEqual({ Authorization: 'Bearer test-secret' });
    expect(configuration.mcpServers.local?.env).toEqual({ TOKEN: 'test-secret' });
  });

  it('fails on an unresolved server secret but not on other unset variables', () => {
    expect(() => parseConfiguration({
      mcpServers: { remote: { type: 'http', url: 'https://tools.test/mcp', headers: { Authorization: 'Bearer ${MISSING_TOKEN}' } } },
    }, '<test>', {})).toThrow("Unresolved variable ${MISSING_TOKEN} for mcp 'remote'. Define it in the environment.");

    const lenient = parseConfiguration({ mcpServers: { local: { command: 'tool-server${SUFFIX}' } } }, '<test>', {});
    expect(lenient.mcpServers.local?.command).toBe('tool-server');
  });

  it('lists every validation problem with its path', () => {
    expect(() => parseConfiguration({
      mcpServers: { broken: { type: 'stdio' }, remote: { type: 'http' } },
      websocket: { port: 70000 },
    }, 'tools.json')).toThrow([
      'Configuration validation failed in tools.json:',
      '  mcpServers.broken.command: stdio servers require a command',
      '  mcpServers.remote.url: http servers require a url',
      '  websocket.port: Number must be less than or equal to 65535',
    ].join('\n'));
  });

  it('accepts the websocket, defaults and logging sections', () => {
    const configuration = parseConfiguration({
      mcpServers: {},
      defaults: { requestTimeoutMs: 5000, validateArguments: false },
      websocket: { port: 8765, path: '/tools', maxConnections: 4 },
      logging: { format: 'json' },
    });

    expect(configuration.websocket).toEqual({ port: 8765, path: '/tools', maxConnections: 4 });
    expect(configuration.defaults?.validateArguments).toBe(false);
    expect(configuration.logging?.format).toBe('json');
  });
});

describe('expandEnv', () => {
  it('replaces unset variables with an empty string', () => {
    expect(expandEnv('${A}-${B}', { A: 'x' })).toBe('x-');
  });
});

describe('validateMCPServers', () => {
  it('names the servers missing from the configuration', () => {
    const configuration = parseConfiguration({ mcpServers: { time: { command: 'time-server' } } });

    expect(() => { validateMCPServers(configuration, ['time']); }).not.toThrow();
    expect(() => { validateMCPServers(configuration, ['time', 'weather', 'maps']); }).toThrow('Unknown MCP servers: weather, maps');
  });
});

describe('selectMCPServers', () => {
  it('narrows the enabled servers to the selection', () => {
    const configuration = parseConfiguration({
      mcpServers: { time: { command: 'time-server' }, weather: { command: 'weather-server' } },
      enabledServers: ['time', 'weather'],
    });

    const selected = selectMCPServers(configuration, ['weather']);

    expect(selected.enabledServers).toEqual(['weather']);
    expect(ServerRegistry.fromConfiguration(selected).names()).toEqual(['weather']);
    expect(configuration.enabledServers).toEqual(['time', 'weather']);
  });

  it('refuses a selection naming an unconfigured server', () => {
    const configuration = parseConfiguration({ mcpServers: { time: { command: 'time-server' } } });

    expect(() => selectMCPServers(configuration, ['time', 'maps'])).toThrow('Unknown MCP servers: maps');
  });
});

describe('loadConfiguration', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tool-bridge-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a JSON file', () => {
    const file = path.join(dir, 'tools.json');
    fs.writeFileSync(file, JSON.stringify({ mcpServers: { time: { command: 'time-server' } } }));

    expect(loadConfiguration(file).mcpServers.time).toEqual({ type: 'stdio', command: 'time-server' });
  });

  it('reads a YAML file', () => {
    const file = path.join(dir, 'tools.yaml');
    fs.writeFileSync(file, [
      'mcpServers:',
      '  weather:',
      '    url: https://tools.test/mcp',
      'websocket:',
      '  port: 9000',
      '',
    ].join('\n'));

    const configuration = loadConfiguration(file);

    expect(configuration.mcpServers.weather).toEqual({ type: 'http', url: 'https://tools.test/mcp' });
    expect(configuration.websocket?.port).toBe(9000);
  });

  it('reports invalid JSON with the file name', () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{"mcpServers": ');

    expect(() => loadConfiguration(file)).toThrow(`Invalid JSON in configuration file ${file}`);
  });

  it('finds the default file name in the working directory', () => {
    const file = path.join(dir, '.tool-bridge.yaml');
    fs.writeFileSync(file, 'mcpServers: {}\n');

    expect(resolveConfigPath(undefined, dir)).toBe(file);
  });

  it('rejects an explicit path that does not exist', () => {
    const missing = path.join(dir, 'nope.json');

    expect(() => resolveConfigPath(missing)).toThrow(`Configuration file not found: ${missing}`);
  });
});
