import path from 'node:path';
import dotenv from 'dotenv';
import { setGlobalLoggerFactory } from 'global-logger-factory';
import { ConfigError } from '../../config/ConfigError';
import { ConfigurableLoggerFactory } from '../../logging/ConfigurableLoggerFactory';
import { EXIT_CONFIG_ERROR, EXIT_INTERNAL_ERROR } from '../../orchestrator/exitCodes';

export function initLogger(level: string, fileName?: string): void {
  setGlobalLoggerFactory(new ConfigurableLoggerFactory(level, { fileName }));
}

/**
 * Loads a dotenv file into `process.env` without replacing variables that are already set.
 */
export function loadEnvFile(envPath: string): void {
  const resolved = path.resolve(envPath);
  const result = dotenv.config({ path: resolved });
  if (result.error) {
    throw new ConfigError(`Env file not found: ${resolved}`);
  }
}

export function outputJson(payload: unknown): void {
  process.stdout.write(`${JSON.stringify(payload)}\n`);
}

export function exitForCliError(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`startgate: ${message}`);
  process.exit(error instanceof ConfigError ? EXIT_CONFIG_ERROR : EXIT_INTERNAL_ERROR);
}

/**
 * Aborts the returned controller on SIGINT/SIGTERM with the signal name as reason.
 */
export function abortOnSignals(onSignal?: (signal: NodeJS.Signals) => void): AbortController {
  const controller = new AbortController();
  for (const signal of [ 'SIGINT', 'SIGTERM' ] as const) {
    process.on(signal, () => {
      onSignal?.(signal);
      if (!controller.signal.aborted) {
        controller.abort(signal);
      }
    });
  }
  return controller;
}
