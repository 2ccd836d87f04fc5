import { constants } from 'node:os';
import { isSignalName } from '../process/types';

export const EXIT_OK = 0;
export const EXIT_NOT_READY = 10;
export const EXIT_CONFIG_ERROR = 20;
export const EXIT_INTERNAL_ERROR = 50;
export const EXIT_LAUNCH_FAILED = 70;
export const EXIT_WAIT_TIMED_OUT = 71;
export const EXIT_PRIMARY_EXITED = 72;
/** Used when an interruption carries no recognisable signal name. */
export const EXIT_INTERRUPTED = 130;

/**
 * `128 + n` for an interruption by signal `n`, following the shell convention.
 */
export function interruptedExitCode(reason: unknown): number {
  if (isSignalName(reason)) {
    const signalNumber = constants.signals[reason];
    if (typeof signalNumber === 'number') {
      return 128 + signalNumber;
    }
  }
  return EXIT_INTERRUPTED;
}
