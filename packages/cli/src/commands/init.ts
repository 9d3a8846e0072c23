import { Command } from 'commander';
import chalk from 'chalk';
import { writeFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { AgentConfig } from '@hostpulse/shared';
import {
  DEFAULT_BACKEND_URL,
  DEFAULT_LOOPBACK_PREFIX,
  DEFAULT_PUBLISH_TIMEOUT,
  DEFAULT_SAMPLE_INTERVAL_SECONDS,
  DEFAULT_TOP_PROCESS_LIMIT,
  HOSTPULSE_CONFIG_FILES,
} from '@hostpulse/shared';

export function defaultConfig(backendUrl: string = DEFAULT_BACKEND_URL): Required<AgentConfig> {
  return {
    backend_url: backendUrl,
    interval: DEFAULT_SAMPLE_INTERVAL_SECONDS,
    timeout: DEFAULT_PUBLISH_TIMEOUT,
    top_processes: DEFAULT_TOP_PROCESS_LIMIT,
    loopback_prefix: DEFAULT_LOOPBACK_PREFIX,
    log_level: 'info',
  };
}

export const initCommand = new Command('init')
  .option('-u, --url <url>', 'Backend URL to write into the config', DEFAULT_BACKEND_URL)
  .option('-f, --force', 'Overwrite an existing config file')
  .description(`Generate a ${HOSTPULSE_CONFIG_FILES[0]} file`)
  .action(async (flags: { url: string; force?: boolean }) => {
    const configPath = resolve(HOSTPULSE_CONFIG_FILES[0] ?? 'hostpulse.config.json');

    if (existsSync(configPath) && !flags.force) {
      console.log(chalk.yellow(`\n  Config file already exists: ${configPath}\n`));
      return;
    }

    writeFileSync(configPath, `${JSON.stringify(defaultConfig(flags.url), null, 2)}\n`);

    console.log(chalk.green(`\n  Created ${configPath}`));
    console.log(chalk.gray(`  Edit it and run: hostpulse start\n`));
  });
