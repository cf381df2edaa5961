#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';

import type { HeadendLogSink } from './headends/types.js';
import type { LogEntry, LogFormatName, PresentationMode } from './types.js';
import type { CommanderError } from 'commander';

import { loadConfiguration, selectMCPServers } from './config.js';
import { makeTTYLogCallbacks } from './log-sink-tty.js';
import { isPresentationMode, PRESENTATION_MODES, toLlmToolMessages, toStatusMessage } from './mcp/presentation.js';
import { ShutdownController } from './shutdown-controller.js';
import { ToolBridge } from './tool-bridge.js';
import { parseJsonValueDetailed, isPlainObject, setWarningSink, toErrorMessage } from './utils.js';
import { VERSION } from './version.js';

interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  trace?: boolean;
  logFormat?: LogFormatName;
  servers?: string[];
}

const LIST_FORMATS = ['names', 'openai', 'claude', 'prompt'] as const;
type ListFormat = typeof LIST_FORMATS[number];

let hasExited = false;
function exitWith(code: number, reason: string): never {
  try {
    process.stderr.write(`[${code === 0 ? 'VRB' : 'ERR'}] tool-bridge exit: ${reason}\n`);
  } catch { /* stderr gone */ }
  if (!hasExited) {
    hasExited = true;
    process.exit(code);
  }
  throw new Error('unreachable');
}

const defaultWarningSink = (message: string): void => {
  const prefix = '[warn] ';
  const colored = process.stderr.isTTY ? `\x1b[33m${prefix}${message}\x1b[0m` : `${prefix}${message}`;
  try { process.stderr.write(`${colored}\n`); } catch { /* stderr gone */ }
};

setWarningSink(defaultWarningSink);

const writeLine = (value: unknown): void => {
  process.stdout.write(`${typeof value === 'string' ? value : JSON.stringify(value)}\n`);
};

const shutdownController = new ShutdownController();

function makeLogSink(opts: GlobalOptions, serverMode: boolean, verboseDefault = false): HeadendLogSink {
  const tty = makeTTYLogCallbacks({
    verbose: opts.verbose ?? verboseDefault,
    trace: opts.trace === true,
    serverMode,
    explicitFormat: opts.logFormat,
  });
  return (entry) => { tty.onLog(entry); };
}

function cliEntry(message: string, severity: LogEntry['severity'] = 'VRB'): LogEntry {
  return {
    timestamp: Date.now(),
    severity,
    direction: 'response',
    type: 'headend',
    remoteIdentifier: 'headend:cli',
    fatal: severity === 'ERR',
    message,
    headendId: 'cli',
  };
}

function openBridge(opts: GlobalOptions, serverMode: boolean): { bridge: ToolBridge; log: HeadendLogSink } {
  const loaded = loadConfiguration(opts.config);
  const configuration = opts.servers !== undefined ? selectMCPServers(loaded, opts.servers) : loaded;
  const log = makeLogSink(
    { ...opts, logFormat: opts.logFormat ?? configuration.logging?.format },
    serverMode,
    configuration.logging?.verbose === true,
  );
  const bridge = new ToolBridge(configuration, { log });
  shutdownController.register('mcp-sessions', async () => {
    const report = await bridge.shutdown();
    if (report.failures.length > 0) {
      log(cliEntry(`${String(report.failures.length)} MCP session(s) failed to close`, 'WRN'));
    }
  });
  installSignalHandlers(log);
  return { bridge, log };
}

let shutdownWatchdog: NodeJS.Timeout | undefined;

function installSignalHandlers(log: HeadendLogSink): void {
  const handler = (signal: NodeJS.Signals): void => {
    if (shutdownController.isStopping()) {
      log(cliEntry(`received ${signal} during shutdown; forcing exit`, 'ERR'));
      exitWith(1, `forced exit after ${signal}`);
    }
    log(cliEntry(`received ${signal}, shutting down`, 'WRN'));
    shutdownWatchdog ??= setTimeout(() => {
      log(cliEntry('shutdown watchdog expired; forcing exit', 'ERR'));
      exitWith(1, 'shutdown watchdog expired');
    }, 30_000).unref();
    shutdownController.shutdown({ logger: log }).catch((err: unknown) => {
      exitWith(1, `shutdown failed: ${toErrorMessage(err)}`);
    });
    // a second signal lands here and forces the exit above
    process.once(signal, handler);
  };
  (['SIGINT', 'SIGTERM'] as const).forEach((sig) => {
    process.once(sig, handler);
  });
}

function parseArgumentsJson(raw: string | undefined): Record<string, unknown> {
  if (raw === undefined || raw.trim().length === 0) return {};
  const { value, error } = parseJsonValueDetailed(raw);
  if (!isPlainObject(value)) {
    throw new InvalidArgumentError(`tool arguments must be a JSON object${error !== undefined ? ` (${error})` : ''}`);
  }
  return value;
}

function parseServerList(value: string): string[] {
  const names = value.split(',').map((name) => name.trim()).filter((name) => name.length > 0);
  if (names.length === 0) throw new InvalidArgumentError('expected a comma-separated list of server names');
  return names;
}

function parseMode(value: string): PresentationMode {
  if (!isPresentationMode(value)) throw new InvalidArgumentError(`mode must be one of ${PRESENTATION_MODES.join(', ')}`);
  return value;
}

async function runServe(opts: GlobalOptions): Promise<void> {
  const { bridge, log } = openBridge(opts, true);
  const headend = bridge.createWebSocketHeadend();
  if (headend === undefined) {
    await shutdownController.shutdown({ logger: log });
    exitWith(1, 'configuration has no "websocket" section; nothing to serve');
  }
  const summary = await bridge.start();
  log(cliEntry(`tool catalog ready: ${String(summary.tools)} tool(s) from ${String(summary.servers)} server(s)`));
  if (summary.failedServers.length > 0) {
    log(cliEntry(`servers left out of the catalog: ${summary.failedServers.join(', ')}`, 'WRN'));
  }

  shutdownController.register('websocket-headend', async () => { await headend.stop(); });

  try {
    await headend.start({ log, shutdownSignal: shutdownController.signal });
  } catch (err) {
    await shutdownController.shutdown({ logger: log });
    exitWith(1, `failed to start ${headend.describe().label}: ${toErrorMessage(err)}`);
  }
  log(cliEntry(`listening: ${headend.describe().label}`));

  const closed = await headend.closed;
  await shutdownController.shutdown({ logger: log });
  if (closed.reason === 'error') exitWith(1, `headend failed: ${closed.error.message}`);
  exitWith(0, 'shutdown completed');
}

async function runListTools(opts: GlobalOptions, format: ListFormat): Promise<void> {
  const { bridge, log } = openBridge(opts, false);
  try {
    await bridge.start();
    switch (format) {
      case 'names':
        bridge.tools.list().forEach((tool) => { writeLine(`${tool.serverName}\t${tool.name}`); });
        break;
      case 'openai':
        writeLine(JSON.stringify(bridge.tools.getOpenAITools(), null, 2));
        break;
      case 'claude':
        writeLine(JSON.stringify(bridge.tools.getClaudeTools(), null, 2));
        break;
      case 'prompt':
        writeLine(bridge.tools.getPromptFragment());
        break;
    }
  } finally {
    await shutdownController.shutdown({ logger: log });
  }
}

async function runCall(opts: GlobalOptions, toolName: string, args: Record<string, unknown>, mode: PresentationMode): Promise<void> {
  const { bridge, log } = openBridge(opts, false);
  let failed = false;
  try {
    await bridge.start();
    const request = { id: `cli_${toolName}_${String(Date.now())}`, name: toolName, arguments: args };
    // eslint-disable-next-line functional/no-loop-statements
    for await (const event of bridge.executeTools([request], mode, shutdownController.signal)) {
      if (event.type === 'batch_complete') {
        failed = event.results.some((result) => result.isError);
        writeLine({ type: 'batch_complete', results: event.results, messages: toLlmToolMessages(event.results, mode) });
      } else {
        writeLine(toStatusMessage(event));
      }
    }
  } finally {
    await shutdownController.shutdown({ logger: log });
  }
  if (failed) exitWith(1, `tool '${toolName}' returned an error`);
}

const program = new Command();

program
  .name('tool-bridge')
  .description('Bridge chat clients and LLM turns to MCP tool servers')
  .version(VERSION)
  .option('-c, --config <path>', 'configuration file (.json, .yaml)')
  .option('-v, --verbose', 'log session lifecycle and tool calls')
  .option('--trace', 'log MCP protocol traces')
  .option('-s, --servers <names>', 'only use these MCP servers (comma-separated)', parseServerList)
  .addOption(new Option('--log-format <format>', 'log line format').choices(['logfmt', 'json', 'console']));

program.exitOverride((err: CommanderError) => {
  if (err.exitCode === 0) exitWith(0, err.code);
  exitWith(err.exitCode, `commander: ${err.message}`);
});

program
  .command('serve')
  .description('start the WebSocket tool-call endpoint')
  .action(async () => {
    await runServe(program.opts<GlobalOptions>());
  });

program
  .command('list-tools')
  .description('connect to every enabled server and print the tool catalog')
  .addOption(new Option('-f, --format <format>', 'output format').choices(LIST_FORMATS).default('names'))
  .action(async (cmdOpts: { format: ListFormat }) => {
    await runListTools(program.opts<GlobalOptions>(), cmdOpts.format);
  });

program
  .command('call')
  .description('run a single tool call and print every execution event as a JSON line')
  .argument('<tool>', 'tool name')
  .argument('[json-args]', 'tool arguments as a JSON object', parseArgumentsJson)
  .addOption(new Option('-m, --mode <mode>', 'presentation mode').argParser(parseMode).default('prompt'))
  .action(async (tool: string, args: Record<string, unknown> | undefined, cmdOpts: { mode: PresentationMode }) => {
    await runCall(program.opts<GlobalOptions>(), tool, args ?? {}, cmdOpts.mode);
  });

program.parseAsync().catch((err: unknown) => {
  exitWith(1, toErrorMessage(err));
});
