import type { ExitStatus } from '../process/types';

export type RunState =
  | 'init'
  | 'primary-starting'
  | 'waiting-for-ready'
  | 'dependent-running'
  | 'done'
  | 'aborted';

export type AbortReason =
  | 'primary-launch-failed'
  | 'wait-timed-out'
  | 'primary-exited'
  | 'interrupted'
  | 'dependent-launch-failed';

export interface RunReport {
  state: 'done' | 'aborted';
  exitCode: number;
  /** Probe attempts made by the readiness waiter. */
  attempts: number;
  reason?: AbortReason;
  dependentStatus?: ExitStatus;
}

export type StateChangeHandler = (state: RunState, previous: RunState) => void;
