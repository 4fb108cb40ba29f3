#!/usr/bin/env tsx

import { Command } from 'commander';
import chalk from 'chalk';
import { HOSTPULSE_VERSION, errorMessage } from '@hostpulse/shared';
import { runCommand } from './commands/run.js';
import { sampleCommand } from './commands/sample.js';

const program = new Command();

program
  .name('hostpulse')
  .version(HOSTPULSE_VERSION, '-v, --version')
  .description(chalk.bold('hostpulse') + ': samples host resources and posts them as JSON')
  .addCommand(runCommand, { isDefault: true })
  .addCommand(sampleCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(errorMessage(err)));
  process.exitCode = 1;
});
