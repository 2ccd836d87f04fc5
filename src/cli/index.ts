#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { probeCommand } from './commands/probe';
import { runCommand } from './commands/run';
import { exitForCliError } from './lib/bootstrap';

yargs(hideBin(process.argv))
  .scriptName('startgate')
  .usage('$0 <command> [options]')
  .command(runCommand)
  .command(probeCommand)
  .demandCommand(1, 'Please specify a command')
  .strict()
  .help()
  .parseAsync()
  .catch(exitForCliError);
