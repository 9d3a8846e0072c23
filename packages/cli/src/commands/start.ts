import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { formatDuration, getLogger, setLogLevel } from '@hostpulse/shared';
import { Agent } from '@hostpulse/agent';
import { addAgentOptions, loadConfigOrReport } from '../utils/options.js';
import type { AgentFlags } from '../utils/options.js';

const logger = getLogger();

interface Stoppable {
  stop(): Promise<void>;
}

/**
 * Signal handler that stops the agent once, then exits. Repeated signals
 * while stopping are ignored.
 */
export function createShutdownHandler(
  agent: Stoppable,
  exit: (code: number) => void,
): (signal: NodeJS.Signals) => void {
  let stopping = false;

  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    await agent.stop();
    exit(0);
  };

  return (signal) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      exit(1);
    });
  };
}

export const startCommand = addAgentOptions(new Command('start'))
  .description('Start sampling this host and publishing to the backend')
  .action(async (flags: AgentFlags) => {
    const config = loadConfigOrReport(flags);
    if (!config) return;

    setLogLevel(config.logLevel);

    const agent = new Agent({
      backendUrl: config.backendUrl,
      intervalSeconds: config.intervalSeconds,
      timeoutMs: config.timeoutMs,
      topProcessLimit: config.topProcessLimit,
      loopbackPrefix: config.loopbackPrefix,
    });

    const spinner = ora('Reading startup baseline...').start();
    try {
      await agent.start();
    } catch (err) {
      spinner.fail(`Failed to start agent: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
      return;
    }
    spinner.succeed(
      `Sampling every ${formatDuration(config.intervalSeconds * 1000)}, publishing to ${chalk.cyan(config.backendUrl)}`,
    );
    if (config.source) {
      console.log(chalk.gray(`  Config: ${config.source}`));
    }

    const onSignal = createShutdownHandler(agent, (code) => process.exit(code));
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
