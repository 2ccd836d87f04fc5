import fs from 'node:fs/promises';
import path from 'node:path';
import { getLoggerFor } from 'global-logger-factory';
import type { ZodError } from 'zod';
import { splitCommandLine } from '../util/CommandLine';
import { ConfigError } from './ConfigError';
import { toProbeTarget } from './RunPlan';
import { StartgateConfigSchema } from './schema';
import type { LogLevel } from './schema';

const logger = getLoggerFor('ConfigLoader');

export interface ServiceConfig {
  name: string;
  command: string;
  args: string[];
  cwd?: string;
  env: Record<string, string>;
}

export interface ReadinessConfig {
  url: string;
  expect: string;
  bodyIncludes?: string;
  intervalMs: number;
  timeoutMs: number;
  maxAttempts?: number;
  deadlineMs?: number;
}

export interface StartgateConfig {
  primary: ServiceConfig;
  dependent: ServiceConfig;
  readiness: ReadinessConfig;
  shutdownGraceMs: number;
  stopPrimaryOnExit: boolean;
  logging: {
    level: LogLevel;
    file?: string;
  };
}

/**
 * Values that replace what the config file says. Command lines are split
 * shell-style; `maxAttempts` or `deadlineMs` of 0 removes the bound.
 */
export interface ConfigOverrides {
  primary?: string;
  dependent?: string;
  readyUrl?: string;
  expect?: string;
  bodyIncludes?: string;
  intervalMs?: number;
  timeoutMs?: number;
  maxAttempts?: number;
  deadlineMs?: number;
  shutdownGraceMs?: number;
  stopPrimaryOnExit?: boolean;
  logLevel?: string;
  logFile?: string;
}

export interface LoadConfigOptions {
  /** JSON config file; falls back to `STARTGATE_CONFIG`. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest precedence, usually the CLI flags. */
  overrides?: ConfigOverrides;
  cwd?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Recursively resolve `${VAR_NAME}` patterns in config values.
 */
function resolveEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{(\w+)\}/gu, (_, key: string) => env[key] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item, env));
  }
  if (isRecord(value)) {
    return Object.fromEntries(
      Object.entries(value).map(([ key, item ]) => [ key, resolveEnvVars(item, env) ]),
    );
  }
  return value;
}

async function readConfigFile(filePath: string, env: NodeJS.ProcessEnv): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error: unknown) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const resolved = resolveEnvVars(parsed, env);
  if (!isRecord(resolved)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  return resolved;
}

function nonEmpty(value?: string): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function integerFromEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const value = nonEmpty(env[key]);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${key} must be an integer, got "${value}"`);
  }
  return parsed;
}

export function overridesFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  return {
    primary: nonEmpty(env.STARTGATE_PRIMARY),
    dependent: nonEmpty(env.STARTGATE_DEPENDENT),
    readyUrl: nonEmpty(env.STARTGATE_READY_URL),
    expect: nonEmpty(env.STARTGATE_READY_EXPECT),
    bodyIncludes: nonEmpty(env.STARTGATE_READY_BODY_INCLUDES),
    intervalMs: integerFromEnv(env, 'STARTGATE_READY_INTERVAL_MS'),
    timeoutMs: integerFromEnv(env, 'STARTGATE_READY_TIMEOUT_MS'),
    maxAttempts: integerFromEnv(env, 'STARTGATE_READY_MAX_ATTEMPTS'),
    deadlineMs: integerFromEnv(env, 'STARTGATE_READY_DEADLINE_MS'),
    shutdownGraceMs: integerFromEnv(env, 'STARTGATE_SHUTDOWN_GRACE_MS'),
    logLevel: nonEmpty(env.STARTGATE_LOG_LEVEL),
    logFile: nonEmpty(env.STARTGATE_LOG_FILE),
  };
}

function withCommandLine(base: unknown, commandLine: string, role: string): Record<string, unknown> {
  let words: string[];
  try {
    words = splitCommandLine(commandLine);
  } catch (error: unknown) {
    throw new ConfigError(`Invalid ${role} command: ${error instanceof Error ? error.message : String(error)}`);
  }
  const [ command, ...args ] = words;
  if (!command) {
    throw new ConfigError(`The ${role} command line is empty`);
  }
  return { ...(isRecord(base) ? base : {}), command, args };
}

function withDefined(base: unknown, values: Record<string, unknown>): unknown {
  const defined = Object.entries(values).filter(([ , value ]) => value !== undefined);
  if (defined.length === 0) {
    return base;
  }
  return { ...(isRecord(base) ? base : {}), ...Object.fromEntries(defined) };
}

function unbounded(value?: number): number | null | undefined {
  return value === 0 ? null : value;
}

function applyOverrides(raw: Record<string, unknown>, overrides: ConfigOverrides): Record<string, unknown> {
  const next: Record<string, unknown> = { ...raw };
  if (overrides.primary !== undefined) {
    next.primary = withCommandLine(raw.primary, overrides.primary, 'primary');
  }
  if (overrides.dependent !== undefined) {
    next.dependent = withCommandLine(raw.dependent, overrides.dependent, 'dependent');
  }
  next.readiness = withDefined(raw.readiness, {
    url: overrides.readyUrl,
    expect: overrides.expect,
    bodyIncludes: overrides.bodyIncludes,
    intervalMs: overrides.intervalMs,
    timeoutMs: overrides.timeoutMs,
    maxAttempts: unbounded(overrides.maxAttempts),
    deadlineMs: unbounded(overrides.deadlineMs),
  });
  if (overrides.shutdownGraceMs !== undefined) {
    next.shutdownGraceMs = overrides.shutdownGraceMs;
  }
  if (overrides.stopPrimaryOnExit !== undefined) {
    next.stopPrimaryOnExit = overrides.stopPrimaryOnExit;
  }
  next.logging = withDefined(raw.logging, { level: overrides.logLevel, file: overrides.logFile });
  return next;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Resolves the configuration with precedence defaults < config file < environment < overrides.
 * @throws ConfigError when the file cannot be read or the merged result is invalid.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<StartgateConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath ?? nonEmpty(env.STARTGATE_CONFIG);

  let raw: Record<string, unknown> = {};
  let baseDir = cwd;
  if (configPath) {
    const resolved = path.resolve(cwd, configPath);
    raw = await readConfigFile(resolved, env);
    baseDir = path.dirname(resolved);
    logger.info(`Loaded config from ${resolved}`);
  }

  raw = applyOverrides(raw, overridesFromEnv(env));
  raw = applyOverrides(raw, options.overrides ?? {});

  const result = StartgateConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  const parsed = result.data;

  const toService = (service: typeof parsed.primary, role: string): ServiceConfig => ({
    name: service.name ?? role,
    command: service.command,
    args: service.args,
    cwd: service.cwd === undefined ? undefined : path.resolve(baseDir, service.cwd),
    env: service.env,
  });

  const config: StartgateConfig = {
    primary: toService(parsed.primary, 'primary'),
    dependent: toService(parsed.dependent, 'dependent'),
    readiness: {
      url: parsed.readiness.url,
      expect: parsed.readiness.expect,
      bodyIncludes: parsed.readiness.bodyIncludes,
      intervalMs: parsed.readiness.intervalMs,
      timeoutMs: parsed.readiness.timeoutMs,
      maxAttempts: parsed.readiness.maxAttempts ?? undefined,
      deadlineMs: parsed.readiness.deadlineMs ?? undefined,
    },
    shutdownGraceMs: parsed.shutdownGraceMs,
    stopPrimaryOnExit: parsed.stopPrimaryOnExit,
    logging: parsed.logging,
  };

  // Surfaces URL and expectation mistakes before anything is started
  toProbeTarget(config.readiness);
  return config;
}
