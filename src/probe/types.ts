export interface ResponseExpectation {
  /** Lowest accepted HTTP status, inclusive. */
  statusMin: number;
  /** Highest accepted HTTP status, inclusive. */
  statusMax: number;
  /** When set, the response body must contain this text. */
  bodyIncludes?: string;
}

export interface HttpProbeTarget {
  readonly kind: 'http';
  readonly url: string;
  readonly expect: Readonly<ResponseExpectation>;
  readonly timeoutMs: number;
}

export interface TcpProbeTarget {
  readonly kind: 'tcp';
  readonly host: string;
  readonly port: number;
  readonly timeoutMs: number;
}

export type ProbeTarget = HttpProbeTarget | TcpProbeTarget;

export type ProbeResult = 'ready' | 'not-ready';

export interface WaitPolicy {
  readonly intervalMs: number;
  readonly maxAttempts?: number;
  /** Total budget measured from the first attempt; no attempt starts after it. */
  readonly deadlineMs?: number;
}

export type WaitOutcome = 'ready' | 'timed-out' | 'cancelled';

export interface WaitResult {
  outcome: WaitOutcome;
  attempts: number;
  elapsedMs: number;
}

export function describeTarget(target: ProbeTarget): string {
  return target.kind === 'http' ? target.url : `tcp://${target.host}:${target.port}`;
}
