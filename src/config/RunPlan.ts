import type { ProbeTarget, ResponseExpectation, WaitPolicy } from '../probe/types';
import type { ExecutionMode, ServiceSpec } from '../process/types';
import { ConfigError } from './ConfigError';
import type { ReadinessConfig, ServiceConfig } from './ConfigLoader';

/**
 * Turns an `expect` shorthand into a status range:
 * `any`, `2xx`, `204`, or `200-399`.
 */
export function parseExpectation(expect: string, bodyIncludes?: string): ResponseExpectation {
  const value = expect.trim().toLowerCase();
  let statusMin: number;
  let statusMax: number;

  const classMatch = /^([1-5])xx$/u.exec(value);
  const rangeMatch = /^(\d{3})\s*-\s*(\d{3})$/u.exec(value);
  if (value === 'any') {
    statusMin = 100;
    statusMax = 599;
  } else if (classMatch) {
    statusMin = Number(classMatch[1]) * 100;
    statusMax = statusMin + 99;
  } else if (/^\d{3}$/u.test(value)) {
    statusMin = Number(value);
    statusMax = statusMin;
  } else if (rangeMatch) {
    statusMin = Number(rangeMatch[1]);
    statusMax = Number(rangeMatch[2]);
  } else {
    throw new ConfigError(`Unsupported readiness expectation "${expect}" (use any, 2xx, 200 or 200-399)`);
  }

  if (statusMin < 100 || statusMax > 599 || statusMin > statusMax) {
    throw new ConfigError(`Readiness expectation "${expect}" is not a valid HTTP status range`);
  }
  return bodyIncludes === undefined ? { statusMin, statusMax } : { statusMin, statusMax, bodyIncludes };
}

export function toProbeTarget(readiness: ReadinessConfig): ProbeTarget {
  let url: URL;
  try {
    url = new URL(readiness.url);
  } catch {
    throw new ConfigError(`Readiness URL "${readiness.url}" is not a valid URL`);
  }

  if (url.protocol === 'http:' || url.protocol === 'https:') {
    return {
      kind: 'http',
      url: url.toString(),
      expect: parseExpectation(readiness.expect, readiness.bodyIncludes),
      timeoutMs: readiness.timeoutMs,
    };
  }
  if (url.protocol === 'tcp:') {
    const port = Number(url.port);
    if (!url.hostname || !Number.isInteger(port) || port <= 0) {
      throw new ConfigError(`TCP readiness target "${readiness.url}" needs a host and a port`);
    }
    return {
      kind: 'tcp',
      host: url.hostname.replace(/^\[(.*)\]$/u, '$1'),
      port,
      timeoutMs: readiness.timeoutMs,
    };
  }
  throw new ConfigError(`Unsupported readiness URL scheme "${url.protocol}" (use http, https or tcp)`);
}

export function toWaitPolicy(readiness: ReadinessConfig): WaitPolicy {
  return {
    intervalMs: readiness.intervalMs,
    maxAttempts: readiness.maxAttempts,
    deadlineMs: readiness.deadlineMs,
  };
}

export function toServiceSpec<M extends ExecutionMode>(service: ServiceConfig, mode: M): ServiceSpec<M> {
  return {
    name: service.name,
    command: service.command,
    args: [ ...service.args ],
    cwd: service.cwd,
    env: { ...service.env },
    mode,
  };
}
