import { constants } from 'node:os';

export type ExecutionMode = 'background' | 'foreground';

export interface ServiceSpec<M extends ExecutionMode = ExecutionMode> {
  /** Label used in logs. */
  readonly name: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd?: string;
  /** Merged over the launcher's own environment. */
  readonly env?: Readonly<Record<string, string>>;
  readonly mode: M;
}

export interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export function isSignalName(value: unknown): value is NodeJS.Signals {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(constants.signals, value);
}

/**
 * Shell convention: the exit code itself, or `128 + n` for a child killed by signal `n`.
 */
export function exitCodeOf(status: ExitStatus): number {
  if (status.code !== null) {
    return status.code;
  }
  if (status.signal !== null) {
    const signalNumber = constants.signals[status.signal];
    if (typeof signalNumber === 'number') {
      return 128 + signalNumber;
    }
  }
  return 1;
}

export function describeExit(status: ExitStatus): string {
  return `code=${status.code ?? 'null'} signal=${status.signal ?? 'none'}`;
}
