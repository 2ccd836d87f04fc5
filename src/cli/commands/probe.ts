import type { CommandModule } from 'yargs';
import { DEFAULT_READY_URL } from '../../config/schema';
import type { ReadinessConfig } from '../../config/ConfigLoader';
import { toProbeTarget, toWaitPolicy } from '../../config/RunPlan';
import { EXIT_NOT_READY, EXIT_OK } from '../../orchestrator/exitCodes';
import { NetworkHealthProbe } from '../../probe/HealthProbe';
import { ReadinessWaiter } from '../../probe/ReadinessWaiter';
import { describeTarget } from '../../probe/types';
import type { ProbeTarget } from '../../probe/types';
import { abortOnSignals, exitForCliError, initLogger, outputJson } from '../lib/bootstrap';

interface ProbeArgs {
  url: string;
  expect: string;
  body?: string;
  timeout: number;
  wait: boolean;
  interval: number;
  attempts: number;
  deadline: number;
  verbose: boolean;
  json: boolean;
}

interface ProbeSummary {
  ready: boolean;
  attempts: number;
  elapsedMs: number;
}

export const probeCommand: CommandModule<object, ProbeArgs> = {
  command: 'probe',
  describe: 'Check a readiness endpoint once, or until it is ready with --wait',
  builder: (yargs) =>
    yargs
      .option('url', {
        alias: 'u',
        type: 'string',
        default: process.env.STARTGATE_READY_URL ?? DEFAULT_READY_URL,
        description: 'Readiness URL (http://, https:// or tcp://host:port)',
      })
      .option('expect', { type: 'string', default: '2xx', description: 'Accepted status: any, 2xx, 200 or 200-399' })
      .option('body', { type: 'string', description: 'Text the response body must contain' })
      .option('timeout', { type: 'number', default: 2_000, description: 'Milliseconds before a single probe gives up' })
      .option('wait', { alias: 'w', type: 'boolean', default: false, description: 'Keep probing until ready' })
      .option('interval', { type: 'number', default: 2_000, description: 'Milliseconds between attempts with --wait' })
      .option('attempts', { type: 'number', default: 0, description: 'Maximum attempts with --wait (0 = unlimited)' })
      .option('deadline', { type: 'number', default: 0, description: 'Maximum milliseconds with --wait (0 = unlimited)' })
      .option('verbose', { alias: 'v', type: 'boolean', default: false, description: 'Debug logging' })
      .option('json', { type: 'boolean', default: false, description: 'Output JSON' }),
  handler: async(argv) => {
    initLogger(argv.verbose ? 'debug' : 'info');

    const readiness: ReadinessConfig = {
      url: argv.url,
      expect: argv.expect,
      bodyIncludes: argv.body,
      intervalMs: argv.interval,
      timeoutMs: argv.timeout,
      maxAttempts: argv.attempts > 0 ? argv.attempts : undefined,
      deadlineMs: argv.deadline > 0 ? argv.deadline : undefined,
    };
    let target: ProbeTarget;
    try {
      target = toProbeTarget(readiness);
    } catch (error: unknown) {
      exitForCliError(error);
    }

    const probe = new NetworkHealthProbe();
    let result: ProbeSummary;
    if (argv.wait) {
      const controller = abortOnSignals();
      const waited = await new ReadinessWaiter({ probe }).waitUntilReady(target, toWaitPolicy(readiness), controller.signal);
      result = { ready: waited.outcome === 'ready', attempts: waited.attempts, elapsedMs: waited.elapsedMs };
    } else {
      const started = Date.now();
      const outcome = await probe.check(target);
      result = { ready: outcome === 'ready', attempts: 1, elapsedMs: Date.now() - started };
    }

    if (argv.json) {
      outputJson({ target: describeTarget(target), ...result });
    } else {
      console.log(`${describeTarget(target)}: ${result.ready ? 'ready' : 'not ready'} (${result.attempts} attempt(s), ${result.elapsedMs}ms)`);
    }
    process.exit(result.ready ? EXIT_OK : EXIT_NOT_READY);
  },
};
