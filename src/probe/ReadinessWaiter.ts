import { getLoggerFor } from 'global-logger-factory';
import { sleep as defaultSleep } from '../util/sleep';
import type { HealthProbe } from './HealthProbe';
import { describeTarget } from './types';
import type { ProbeResult, ProbeTarget, WaitPolicy, WaitResult } from './types';

export interface ReadinessWaiterOptions {
  probe: HealthProbe;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
  onAttempt?: (attempt: number, result: ProbeResult) => void;
}

/**
 * Polls a {@link HealthProbe} until it reports ready or the {@link WaitPolicy} runs out.
 *
 * The first probe runs immediately; the loop only sleeps after a `not-ready` result.
 * Probes never overlap.
 */
export class ReadinessWaiter {
  private readonly logger = getLoggerFor(this);
  private readonly probe: HealthProbe;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => number;
  private readonly onAttempt?: (attempt: number, result: ProbeResult) => void;

  public constructor(options: ReadinessWaiterOptions) {
    this.probe = options.probe;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.onAttempt = options.onAttempt;
  }

  public async waitUntilReady(target: ProbeTarget, policy: WaitPolicy, signal?: AbortSignal): Promise<WaitResult> {
    const started = this.now();
    const address = describeTarget(target);
    const result = (outcome: WaitResult['outcome'], attempts: number): WaitResult =>
      ({ outcome, attempts, elapsedMs: this.now() - started });

    let attempts = 0;
    while (true) {
      if (signal?.aborted) {
        this.logger.info(`Stopped waiting for ${address} after ${attempts} attempt(s)`);
        return result('cancelled', attempts);
      }

      attempts += 1;
      const probeResult = await this.runProbe(target, signal);
      this.onAttempt?.(attempts, probeResult);

      if (probeResult === 'ready') {
        this.logger.info(`${address} is ready (attempt ${attempts})`);
        return result('ready', attempts);
      }
      if (signal?.aborted) {
        continue;
      }

      if (policy.maxAttempts !== undefined && attempts >= policy.maxAttempts) {
        this.logger.warn(`${address} still not ready after ${attempts} attempt(s), giving up`);
        return result('timed-out', attempts);
      }
      const elapsed = this.now() - started;
      if (policy.deadlineMs !== undefined && elapsed + policy.intervalMs > policy.deadlineMs) {
        this.logger.warn(`${address} still not ready after ${elapsed}ms, giving up`);
        return result('timed-out', attempts);
      }

      this.logger.info(`${address} not ready, waiting ${policy.intervalMs}ms...`);
      await this.sleep(policy.intervalMs, signal);
    }
  }

  private async runProbe(target: ProbeTarget, signal?: AbortSignal): Promise<ProbeResult> {
    try {
      return await this.probe.check(target, signal);
    } catch (error: unknown) {
      this.logger.debug(`Probe failed: ${error instanceof Error ? error.message : String(error)}`);
      return 'not-ready';
    }
  }
}
