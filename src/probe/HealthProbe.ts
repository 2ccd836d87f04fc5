import { connect } from 'node:net';
import { getLoggerFor } from 'global-logger-factory';
import type { HttpProbeTarget, ProbeResult, ProbeTarget, ResponseExpectation, TcpProbeTarget } from './types';

/**
 * A single readiness check. Implementations never throw and never retry:
 * every failure, whatever its cause, is reported as `not-ready`.
 */
export interface HealthProbe {
  check(target: ProbeTarget, signal?: AbortSignal): Promise<ProbeResult>;
}

export function matchesStatus(status: number, expect: Readonly<ResponseExpectation>): boolean {
  return status >= expect.statusMin && status <= expect.statusMax;
}

/**
 * Probes HTTP targets with one `GET` and TCP targets with one connect,
 * both bounded by the target's timeout.
 */
export class NetworkHealthProbe implements HealthProbe {
  private readonly logger = getLoggerFor(this);

  public async check(target: ProbeTarget, signal?: AbortSignal): Promise<ProbeResult> {
    if (signal?.aborted) {
      return 'not-ready';
    }
    return target.kind === 'http' ? this.checkHttp(target, signal) : this.checkTcp(target, signal);
  }

  private async checkHttp(target: HttpProbeTarget, signal?: AbortSignal): Promise<ProbeResult> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), target.timeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      const response = await fetch(target.url, {
        method: 'GET',
        signal: controller.signal,
        headers: { accept: '*/*' },
      });
      if (!matchesStatus(response.status, target.expect)) {
        this.logger.debug(`${target.url} answered status ${response.status}`);
        await response.body?.cancel();
        return 'not-ready';
      }
      const needle = target.expect.bodyIncludes;
      if (needle === undefined) {
        await response.body?.cancel();
        return 'ready';
      }
      const body = await response.text();
      if (!body.includes(needle)) {
        this.logger.debug(`${target.url} body does not contain "${needle}"`);
        return 'not-ready';
      }
      return 'ready';
    } catch (error: unknown) {
      this.logger.debug(`${target.url} unreachable: ${error instanceof Error ? error.message : String(error)}`);
      return 'not-ready';
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private checkTcp(target: TcpProbeTarget, signal?: AbortSignal): Promise<ProbeResult> {
    const address = `${target.host}:${target.port}`;
    return new Promise((resolve) => {
      const socket = connect({ host: target.host, port: target.port });
      let settled = false;

      const finish = (result: ProbeResult, reason?: string): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        socket.destroy();
        if (reason) {
          this.logger.debug(`${address} unreachable: ${reason}`);
        }
        resolve(result);
      };

      const timer = setTimeout(() => finish('not-ready', `no connection after ${target.timeoutMs}ms`), target.timeoutMs);
      const onAbort = (): void => finish('not-ready', 'aborted');
      signal?.addEventListener('abort', onAbort, { once: true });

      socket.once('connect', () => finish('ready'));
      socket.once('error', (error) => finish('not-ready', error.message));
    });
  }
}
