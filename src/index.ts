export { ConfigError } from './config/ConfigError';
export { loadConfig, overridesFromEnv } from './config/ConfigLoader';
export type { ConfigOverrides, LoadConfigOptions, ReadinessConfig, ServiceConfig, StartgateConfig } from './config/ConfigLoader';
export { parseExpectation, toProbeTarget, toServiceSpec, toWaitPolicy } from './config/RunPlan';
export { DEFAULT_READY_URL, StartgateConfigSchema } from './config/schema';
export type { LogLevel, StartgateConfigInput } from './config/schema';
export { ConfigurableLoggerFactory } from './logging/ConfigurableLoggerFactory';
export type { ConfigurableLoggerOptions } from './logging/ConfigurableLoggerFactory';
export { logContext } from './logging/LogContext';
export * from './orchestrator/exitCodes';
export { Orchestrator } from './orchestrator/Orchestrator';
export type { OrchestratorOptions } from './orchestrator/Orchestrator';
export type { AbortReason, RunReport, RunState, StateChangeHandler } from './orchestrator/types';
export { matchesStatus, NetworkHealthProbe } from './probe/HealthProbe';
export type { HealthProbe } from './probe/HealthProbe';
export { ReadinessWaiter } from './probe/ReadinessWaiter';
export type { ReadinessWaiterOptions } from './probe/ReadinessWaiter';
export * from './probe/types';
export { LaunchFailedError } from './process/errors';
export { ProcessLauncher } from './process/ProcessLauncher';
export type { ForegroundLaunchOptions, ProcessFactory, ProcessLauncherOptions } from './process/ProcessLauncher';
export { DEFAULT_SHUTDOWN_GRACE_MS, ServiceHandle } from './process/ServiceHandle';
export type { KillTree } from './process/ServiceHandle';
export * from './process/types';
export { splitCommandLine } from './util/CommandLine';
