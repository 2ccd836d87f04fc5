import type { CommandModule } from 'yargs';
import { getLoggerFor } from 'global-logger-factory';
import { loadConfig } from '../../config/ConfigLoader';
import type { StartgateConfig } from '../../config/ConfigLoader';
import { toProbeTarget, toServiceSpec, toWaitPolicy } from '../../config/RunPlan';
import { EXIT_INTERNAL_ERROR } from '../../orchestrator/exitCodes';
import { Orchestrator } from '../../orchestrator/Orchestrator';
import { abortOnSignals, exitForCliError, initLogger, loadEnvFile, outputJson } from '../lib/bootstrap';

interface RunArgs {
  config?: string;
  env?: string;
  primary?: string;
  dependent?: string;
  url?: string;
  expect?: string;
  body?: string;
  interval?: number;
  timeout?: number;
  attempts?: number;
  deadline?: number;
  grace?: number;
  stopprimary?: boolean;
  verbose: boolean;
  logfile?: string;
  json: boolean;
}

export const runCommand: CommandModule<object, RunArgs> = {
  command: 'run',
  describe: 'Start the primary, wait for it to be ready, then run the dependent',
  builder: (yargs) =>
    yargs
      .option('config', { alias: 'c', type: 'string', description: 'Path to a JSON config file' })
      .option('env', { alias: 'e', type: 'string', description: 'Path to a .env file' })
      .option('primary', { type: 'string', description: 'Primary (background) command line' })
      .option('dependent', { type: 'string', description: 'Dependent (foreground) command line' })
      .option('url', { type: 'string', description: 'Readiness URL (http://, https:// or tcp://host:port)' })
      .option('expect', { type: 'string', description: 'Accepted status: any, 2xx, 200 or 200-399' })
      .option('body', { type: 'string', description: 'Text the readiness response body must contain' })
      .option('interval', { type: 'number', description: 'Milliseconds between probe attempts' })
      .option('timeout', { type: 'number', description: 'Milliseconds before a single probe gives up' })
      .option('attempts', { type: 'number', description: 'Maximum probe attempts (0 = unlimited)' })
      .option('deadline', { type: 'number', description: 'Maximum milliseconds to wait (0 = unlimited)' })
      .option('grace', { type: 'number', description: 'Milliseconds the primary gets to stop before SIGKILL' })
      .option('stopprimary', { type: 'boolean', description: 'Also stop the primary after the dependent finished' })
      .option('verbose', { alias: 'v', type: 'boolean', default: false, description: 'Debug logging' })
      .option('logfile', { type: 'string', description: 'Rotated log file pattern, e.g. logs/startgate-%DATE%.log' })
      .option('json', { type: 'boolean', default: false, description: 'Print the run report as JSON on exit' }),
  handler: async(argv) => {
    let config: StartgateConfig;
    try {
      if (argv.env) {
        loadEnvFile(argv.env);
      }
      config = await loadConfig({
        configPath: argv.config,
        overrides: {
          primary: argv.primary,
          dependent: argv.dependent,
          readyUrl: argv.url,
          expect: argv.expect,
          bodyIncludes: argv.body,
          intervalMs: argv.interval,
          timeoutMs: argv.timeout,
          maxAttempts: argv.attempts,
          deadlineMs: argv.deadline,
          shutdownGraceMs: argv.grace,
          stopPrimaryOnExit: argv.stopprimary,
          logLevel: argv.verbose ? 'debug' : undefined,
          logFile: argv.logfile,
        },
      });
    } catch (error: unknown) {
      exitForCliError(error);
    }

    initLogger(config.logging.level, config.logging.file);
    const logger = getLoggerFor('Run');

    const orchestrator = new Orchestrator({
      primary: toServiceSpec(config.primary, 'background'),
      dependent: toServiceSpec(config.dependent, 'foreground'),
      target: toProbeTarget(config.readiness),
      policy: toWaitPolicy(config.readiness),
      shutdownGraceMs: config.shutdownGraceMs,
      stopPrimaryOnExit: config.stopPrimaryOnExit,
    });
    const controller = abortOnSignals((signal) => {
      logger.info(`Received ${signal} in state ${orchestrator.getState()}`);
    });

    try {
      const report = await orchestrator.run(controller.signal);
      if (argv.json) {
        outputJson(report);
      }
      process.exit(report.exitCode);
    } catch (error: unknown) {
      logger.error(`Run failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(EXIT_INTERNAL_ERROR);
    }
  },
};
