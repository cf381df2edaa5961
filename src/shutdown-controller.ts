import type { LogEntry } from './types.js';

import { toErrorMessage, withTimeout } from './utils.js';

export type ShutdownTask = () => Promise<void> | void;

const DEFAULT_TASK_TIMEOUT_MS = 10_000;

/**
 * Ordered teardown for the process. Tasks run once, newest first, each bounded
 * by a timeout; a failing task is logged and the rest still run.
 */
export class ShutdownController {
  private readonly abortController = new AbortController();
  private readonly tasks = new Map<string, ShutdownTask>();
  private stopping = false;
  private shutdownPromise?: Promise<void>;

  public constructor(private readonly taskTimeoutMs: number = DEFAULT_TASK_TIMEOUT_MS) {}

  public get signal(): AbortSignal {
    return this.abortController.signal;
  }

  public isStopping(): boolean {
    return this.stopping;
  }

  public register(name: string, task: ShutdownTask): () => void {
    this.tasks.set(name, task);
    return () => {
      this.tasks.delete(name);
    };
  }

  public async shutdown(opts: { logger?: (entry: LogEntry) => void } = {}): Promise<void> {
    if (this.shutdownPromise !== undefined) {
      await this.shutdownPromise;
      return;
    }
    this.shutdownPromise = this.performShutdown(opts);
    await this.shutdownPromise;
  }

  private async performShutdown(opts: { logger?: (entry: LogEntry) => void }): Promise<void> {
    this.stopping = true;
    this.abortController.abort();
    const logger = opts.logger;
    const entries = Array.from(this.tasks.entries()).reverse();
    // eslint-disable-next-line functional/no-loop-statements -- ordered cleanup matters
    for (const [name, task] of entries) {
      try {
        await withTimeout(Promise.resolve().then(task), this.taskTimeoutMs, `shutdown task '${name}'`);
      } catch (error) {
        logger?.({
          timestamp: Date.now(),
          severity: 'WRN',
          direction: 'response',
          type: 'server',
          remoteIdentifier: 'shutdown',
          fatal: false,
          message: `shutdown task '${name}' failed: ${toErrorMessage(error)}`,
        });
      }
    }
  }
}
