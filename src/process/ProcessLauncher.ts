import { spawn } from 'node:child_process';
import type { ChildProcess, SpawnOptions } from 'node:child_process';
import kill from 'tree-kill';
import { getLoggerFor } from 'global-logger-factory';
import { LaunchFailedError } from './errors';
import { ServiceHandle } from './ServiceHandle';
import type { KillTree } from './ServiceHandle';
import { describeExit, isSignalName } from './types';
import type { ExitStatus, ServiceSpec } from './types';

export type ProcessFactory = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface ProcessLauncherOptions {
  processFactory?: ProcessFactory;
  killTree?: KillTree;
}

export interface ForegroundLaunchOptions {
  /** Aborting forwards a signal to the child: `signal.reason` when it names one, SIGTERM otherwise. */
  signal?: AbortSignal;
  /** Called once the child has actually spawned. */
  onStarted?: (pid: number) => void;
}

interface SpawnedChild {
  child: ChildProcess;
  pid: number;
}

/**
 * Starts services either in the background, returning an owning {@link ServiceHandle},
 * or in the foreground, resolving with the child's {@link ExitStatus} once it terminates.
 *
 * A launch only succeeds once Node reports the child as spawned; anything that stops it
 * from starting is a {@link LaunchFailedError}.
 */
export class ProcessLauncher {
  private readonly logger = getLoggerFor(this);
  private readonly processFactory: ProcessFactory;
  private readonly killTree: KillTree;

  public constructor(options: ProcessLauncherOptions = {}) {
    this.processFactory = options.processFactory ?? spawn;
    this.killTree = options.killTree ?? kill;
  }

  public launch(spec: ServiceSpec<'background'>): Promise<ServiceHandle>;
  public launch(spec: ServiceSpec<'foreground'>, options?: ForegroundLaunchOptions): Promise<ExitStatus>;
  public async launch(spec: ServiceSpec, options: ForegroundLaunchOptions = {}): Promise<ServiceHandle | ExitStatus> {
    if (spec.mode === 'background') {
      const { child, pid } = await this.spawnChild(spec);
      this.logger.info(`Started ${spec.name} in the background (pid ${pid})`);
      return new ServiceHandle(spec.name, pid, child, this.killTree);
    }
    return this.runForeground(spec, options);
  }

  private async runForeground(spec: ServiceSpec, options: ForegroundLaunchOptions): Promise<ExitStatus> {
    const { child, pid } = await this.spawnChild(spec);
    this.logger.info(`Started ${spec.name} in the foreground (pid ${pid})`);
    const { signal } = options;

    const exited = new Promise<ExitStatus>((resolve) => {
      const forward = (): void => {
        const reason: unknown = signal?.reason;
        const forwarded = isSignalName(reason) ? reason : 'SIGTERM';
        this.logger.info(`Forwarding ${forwarded} to ${spec.name}`);
        child.kill(forwarded);
      };
      child.on('error', (error) => {
        this.logger.warn(`${spec.name} (pid ${pid}) reported an error: ${error.message}`);
      });
      child.once('exit', (code, exitSignal) => {
        signal?.removeEventListener('abort', forward);
        const status: ExitStatus = { code, signal: exitSignal };
        this.logger.info(`${spec.name} exited (${describeExit(status)})`);
        resolve(status);
      });
      if (signal?.aborted) {
        forward();
      } else {
        signal?.addEventListener('abort', forward, { once: true });
      }
    });

    options.onStarted?.(pid);
    return exited;
  }

  private spawnChild(spec: ServiceSpec): Promise<SpawnedChild> {
    const commandLine = [ spec.command, ...spec.args ].join(' ');
    this.logger.info(`Starting ${spec.name}: ${commandLine}`);
    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = this.processFactory(spec.command, spec.args, {
          cwd: spec.cwd,
          env: { ...process.env, ...spec.env },
          stdio: 'inherit',
        });
      } catch (error: unknown) {
        reject(new LaunchFailedError(spec.name, commandLine, error));
        return;
      }

      const onSpawn = (): void => {
        child.off('error', onError);
        if (child.pid === undefined) {
          reject(new LaunchFailedError(spec.name, commandLine, 'no pid assigned'));
          return;
        }
        resolve({ child, pid: child.pid });
      };
      const onError = (error: Error): void => {
        child.off('spawn', onSpawn);
        reject(new LaunchFailedError(spec.name, commandLine, error));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
  }
}
