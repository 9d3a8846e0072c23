import type { Command } from 'commander';
import chalk from 'chalk';
import type { AgentConfig } from '@hostpulse/shared';
import { ConfigValidationError, isLogLevel } from '@hostpulse/shared';
import type { ResolvedAgentConfig } from '@hostpulse/agent';
import { loadAgentConfig } from '@hostpulse/agent';

export interface AgentFlags {
  config?: string;
  url?: string;
  interval?: string;
  timeout?: string;
  top?: string;
  loopbackPrefix?: string;
  logLevel?: string;
}

export function addAgentOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Path to a hostpulse.config.json')
    .option('-u, --url <url>', 'Backend URL samples are posted to')
    .option('-i, --interval <seconds>', 'Sampling interval in seconds')
    .option('-t, --timeout <duration>', 'Per-request timeout (e.g., 10s)')
    .option('--top <n>', 'Number of top processes to report')
    .option('--loopback-prefix <prefix>', 'Interface name prefix to exclude')
    .option('--log-level <level>', 'Log level (trace, debug, info, warn, error, fatal)');
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

export function toConfigOverrides(flags: AgentFlags): AgentConfig {
  const logLevel = flags.logLevel;
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    throw new ConfigValidationError([`log_level: Unknown level "${logLevel}"`]);
  }

  return {
    backend_url: flags.url,
    interval: toNumber(flags.interval),
    timeout: flags.timeout,
    top_processes: toNumber(flags.top),
    loopback_prefix: flags.loopbackPrefix,
    log_level: logLevel,
  };
}

/**
 * Load the agent configuration for a command. Prints every validation issue
 * and sets a failing exit code when the configuration is invalid.
 */
export function loadConfigOrReport(flags: AgentFlags): ResolvedAgentConfig | null {
  try {
    return loadAgentConfig({ configPath: flags.config, overrides: toConfigOverrides(flags) });
  } catch (err) {
    if (err instanceof ConfigValidationError) {
      console.error(chalk.red('\n  Invalid configuration:'));
      for (const issue of err.errors) {
        console.error(chalk.red(`    - ${issue}`));
      }
      console.error('');
      process.exitCode = 1;
      return null;
    }
    throw err;
  }
}
