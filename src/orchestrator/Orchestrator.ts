import { randomUUID } from 'node:crypto';
import { getLoggerFor } from 'global-logger-factory';
import { logContext } from '../logging/LogContext';
import { NetworkHealthProbe } from '../probe/HealthProbe';
import { ReadinessWaiter } from '../probe/ReadinessWaiter';
import { describeTarget } from '../probe/types';
import type { ProbeTarget, WaitPolicy, WaitResult } from '../probe/types';
import { LaunchFailedError } from '../process/errors';
import { ProcessLauncher } from '../process/ProcessLauncher';
import { DEFAULT_SHUTDOWN_GRACE_MS } from '../process/ServiceHandle';
import type { ServiceHandle } from '../process/ServiceHandle';
import { describeExit, exitCodeOf } from '../process/types';
import type { ExitStatus, ServiceSpec } from '../process/types';
import {
  EXIT_LAUNCH_FAILED,
  EXIT_PRIMARY_EXITED,
  EXIT_WAIT_TIMED_OUT,
  interruptedExitCode,
} from './exitCodes';
import type { AbortReason, RunReport, RunState, StateChangeHandler } from './types';

export interface OrchestratorOptions {
  primary: ServiceSpec<'background'>;
  dependent: ServiceSpec<'foreground'>;
  target: ProbeTarget;
  policy: WaitPolicy;
  /** How long the primary gets to exit after SIGTERM before it is killed. */
  shutdownGraceMs?: number;
  /** Also stop the primary after the dependent finished normally. Off by default: the primary outlives the run. */
  stopPrimaryOnExit?: boolean;
  launcher?: ProcessLauncher;
  waiter?: ReadinessWaiter;
  onStateChange?: StateChangeHandler;
  runId?: string;
}

interface PrimaryWait {
  result: WaitResult;
  primaryExit?: ExitStatus;
}

/**
 * Runs one boot cycle: start the primary in the background, wait until its
 * health probe reports ready, then run the dependent in the foreground and
 * report its exit status as the run's own.
 *
 * The orchestrator owns the primary's {@link ServiceHandle} for the whole run.
 * Every way out of {@link Orchestrator.run} releases it. Aborted or interrupted runs
 * stop the primary; a finished one leaves it running unless `stopPrimaryOnExit` is set.
 */
export class Orchestrator {
  private readonly logger = getLoggerFor(this);
  private readonly primarySpec: ServiceSpec<'background'>;
  private readonly dependentSpec: ServiceSpec<'foreground'>;
  private readonly target: ProbeTarget;
  private readonly policy: WaitPolicy;
  private readonly shutdownGraceMs: number;
  private readonly stopPrimaryOnExit: boolean;
  private readonly launcher: ProcessLauncher;
  private readonly waiter: ReadinessWaiter;
  private readonly onStateChange?: StateChangeHandler;
  private readonly runId: string;

  private state: RunState = 'init';
  private primary?: ServiceHandle;
  private attempts = 0;
  private started = false;

  public constructor(options: OrchestratorOptions) {
    this.primarySpec = options.primary;
    this.dependentSpec = options.dependent;
    this.target = options.target;
    this.policy = options.policy;
    this.shutdownGraceMs = options.shutdownGraceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
    this.stopPrimaryOnExit = options.stopPrimaryOnExit ?? false;
    this.launcher = options.launcher ?? new ProcessLauncher();
    this.waiter = options.waiter ?? new ReadinessWaiter({ probe: new NetworkHealthProbe() });
    this.onStateChange = options.onStateChange;
    this.runId = options.runId ?? randomUUID().slice(0, 8);
  }

  public getState(): RunState {
    return this.state;
  }

  /**
   * Executes the run. Aborting `signal` stops the readiness wait, or is forwarded
   * to the dependent when it is already running.
   */
  public async run(signal?: AbortSignal): Promise<RunReport> {
    if (this.started) {
      throw new Error('An orchestration run can only be executed once');
    }
    this.started = true;

    return logContext.run({ runId: this.runId }, async() => {
      try {
        return await this.execute(signal);
      } finally {
        await this.releasePrimary(signal);
      }
    });
  }

  private async execute(signal?: AbortSignal): Promise<RunReport> {
    if (signal?.aborted) {
      return this.abort('interrupted', interruptedExitCode(signal.reason), 'interrupted before anything was started');
    }

    this.transition('primary-starting');
    let primary: ServiceHandle;
    try {
      primary = await this.launcher.launch(this.primarySpec);
    } catch (error: unknown) {
      if (error instanceof LaunchFailedError) {
        return this.abort('primary-launch-failed', EXIT_LAUNCH_FAILED, error.message);
      }
      throw error;
    }
    this.primary = primary;

    this.transition('waiting-for-ready');
    this.logger.info(`Waiting for ${this.primarySpec.name} to be ready at ${describeTarget(this.target)}...`);
    const { result, primaryExit } = await this.waitForPrimary(primary, signal);
    this.attempts = result.attempts;

    if (primaryExit) {
      return this.abort(
        'primary-exited',
        EXIT_PRIMARY_EXITED,
        `${this.primarySpec.name} exited before becoming ready (${describeExit(primaryExit)})`,
      );
    }
    if (signal?.aborted) {
      return this.abort('interrupted', interruptedExitCode(signal.reason), `interrupted after ${result.attempts} probe attempt(s)`);
    }
    if (result.outcome !== 'ready') {
      return this.abort(
        'wait-timed-out',
        EXIT_WAIT_TIMED_OUT,
        `${this.primarySpec.name} not ready after ${result.attempts} attempt(s) in ${result.elapsedMs}ms`,
      );
    }

    let status: ExitStatus;
    try {
      status = await this.launcher.launch(this.dependentSpec, {
        signal,
        onStarted: () => this.transition('dependent-running'),
      });
    } catch (error: unknown) {
      if (error instanceof LaunchFailedError) {
        return this.abort('dependent-launch-failed', EXIT_LAUNCH_FAILED, error.message);
      }
      throw error;
    }

    this.transition('done');
    const exitCode = exitCodeOf(status);
    this.logger.info(`${this.dependentSpec.name} finished, exiting with ${exitCode}`);
    return { state: 'done', exitCode, attempts: this.attempts, dependentStatus: status };
  }

  private async waitForPrimary(primary: ServiceHandle, signal?: AbortSignal): Promise<PrimaryWait> {
    const controller = new AbortController();
    let primaryExit: ExitStatus | undefined;

    const onAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });
    // The interrupt may have arrived while the primary was spawning
    if (signal?.aborted) {
      onAbort();
    }
    const unsubscribe = primary.onExit((status) => {
      primaryExit = status;
      controller.abort('primary-exited');
    });

    try {
      const result = await this.waiter.waitUntilReady(this.target, this.policy, controller.signal);
      return { result, primaryExit };
    } finally {
      unsubscribe();
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private async releasePrimary(signal?: AbortSignal): Promise<void> {
    const primary = this.primary;
    this.primary = undefined;
    if (!primary?.isRunning()) {
      return;
    }
    if (this.state === 'done' && !signal?.aborted && !this.stopPrimaryOnExit) {
      this.logger.info(`Leaving ${primary.name} (pid ${primary.pid}) running`);
      return;
    }
    await primary.stop(this.shutdownGraceMs);
  }

  private abort(reason: AbortReason, exitCode: number, message: string): RunReport {
    this.logger.error(`Run aborted (${reason}): ${message}`);
    this.transition('aborted');
    return { state: 'aborted', exitCode, attempts: this.attempts, reason };
  }

  private transition(next: RunState): void {
    const previous = this.state;
    this.state = next;
    this.logger.debug(`State ${previous} -> ${next}`);
    this.onStateChange?.(next, previous);
  }
}
