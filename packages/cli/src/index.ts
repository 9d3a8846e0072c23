#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { HOSTPULSE_VERSION } from '@hostpulse/shared';
import { startCommand } from './commands/start.js';
import { onceCommand } from './commands/once.js';
import { doctorCommand } from './commands/doctor.js';
import { initCommand } from './commands/init.js';
import { receiveCommand } from './commands/receive.js';

const program = new Command();

program
  .name('hostpulse')
  .version(HOSTPULSE_VERSION, '-v, --version')
  .description(chalk.bold('HostPulse') + ' - host telemetry agent')
  .addCommand(startCommand)
  .addCommand(onceCommand)
  .addCommand(doctorCommand)
  .addCommand(initCommand)
  .addCommand(receiveCommand);

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
