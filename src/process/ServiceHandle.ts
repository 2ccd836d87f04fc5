import type { ChildProcess } from 'node:child_process';
import { getLoggerFor } from 'global-logger-factory';
import type { ExitStatus } from './types';
import { describeExit } from './types';

export type KillTree = (pid: number, signal: NodeJS.Signals, callback: (error?: Error) => void) => void;

export const DEFAULT_SHUTDOWN_GRACE_MS = 5_000;

/**
 * Owning reference to a background child process.
 *
 * Whoever holds the handle is responsible for calling {@link ServiceHandle.stop};
 * stopping signals the whole process tree, not just the direct child.
 */
export class ServiceHandle {
  private readonly logger = getLoggerFor(this);
  private readonly exitListeners = new Set<(status: ExitStatus) => void>();
  private status?: ExitStatus;
  private stopping?: Promise<ExitStatus>;

  public readonly exited: Promise<ExitStatus>;

  public constructor(
    public readonly name: string,
    public readonly pid: number,
    child: ChildProcess,
    private readonly killTree: KillTree,
  ) {
    child.on('error', (error) => {
      this.logger.warn(`${name} (pid ${pid}) reported an error: ${error.message}`);
    });
    this.exited = new Promise((resolve) => {
      child.once('exit', (code, signal) => {
        const status: ExitStatus = { code, signal };
        this.status = status;
        this.logger.info(`${name} exited (${describeExit(status)})`);
        for (const listener of this.exitListeners) {
          listener(status);
        }
        this.exitListeners.clear();
        resolve(status);
      });
    });
  }

  public isRunning(): boolean {
    return this.status === undefined;
  }

  public getExitStatus(): ExitStatus | undefined {
    return this.status;
  }

  /**
   * Registers a listener for the child's exit and returns a function that removes it.
   * Fires immediately when the child is already gone.
   */
  public onExit(listener: (status: ExitStatus) => void): () => void {
    if (this.status) {
      listener(this.status);
      return () => undefined;
    }
    this.exitListeners.add(listener);
    return () => {
      this.exitListeners.delete(listener);
    };
  }

  /**
   * Sends SIGTERM to the process tree and escalates to SIGKILL after `graceMs`.
   */
  public stop(graceMs = DEFAULT_SHUTDOWN_GRACE_MS): Promise<ExitStatus> {
    if (this.status) {
      return Promise.resolve(this.status);
    }
    if (!this.stopping) {
      this.stopping = this.terminate(graceMs);
    }
    return this.stopping;
  }

  private async terminate(graceMs: number): Promise<ExitStatus> {
    this.logger.info(`Stopping ${this.name} (pid ${this.pid})...`);
    await this.signalTree('SIGTERM');
    const status = await this.waitForExit(graceMs);
    if (status) {
      return status;
    }
    this.logger.warn(`${this.name} did not exit within ${graceMs}ms, sending SIGKILL`);
    await this.signalTree('SIGKILL');
    return this.exited;
  }

  private signalTree(signal: NodeJS.Signals): Promise<void> {
    return new Promise((resolve) => {
      this.killTree(this.pid, signal, (error) => {
        if (error) {
          this.logger.warn(`Failed to send ${signal} to ${this.name}: ${error.message}`);
        }
        resolve();
      });
    });
  }

  private waitForExit(ms: number): Promise<ExitStatus | undefined> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        unsubscribe();
        resolve(undefined);
      }, ms);
      const unsubscribe = this.onExit((status) => {
        clearTimeout(timer);
        resolve(status);
      });
    });
  }
}
