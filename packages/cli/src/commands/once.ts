import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { serializeSample, setLogLevel } from '@hostpulse/shared';
import { Agent, Publisher } from '@hostpulse/agent';
import { renderInterfaceTable, renderProcessTable, renderSampleSummary } from '../ui/Table.js';
import { addAgentOptions, loadConfigOrReport } from '../utils/options.js';
import type { AgentFlags } from '../utils/options.js';

interface OnceFlags extends AgentFlags {
  json?: boolean;
  publish?: boolean;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const onceCommand = addAgentOptions(new Command('once'))
  .option('--json', 'Print the sample as the JSON payload the backend receives')
  .option('--publish', 'Also post the sample to the backend')
  .description('Take a single sample over one interval and print it')
  .action(async (flags: OnceFlags) => {
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

    // JSON output stays machine-readable: no spinner on stdout.
    const spinner = flags.json ? null : ora(`Sampling for ${config.intervalSeconds}s...`).start();

    await agent.prime();
    await sleep(config.intervalSeconds * 1000);
    const { sample, degraded } = await agent.collect();
    spinner?.stop();

    if (flags.json) {
      console.log(serializeSample(sample));
    } else {
      console.log(renderSampleSummary(sample));
      if (sample.top_processes.length > 0) {
        console.log(renderProcessTable(sample.top_processes));
      }
      if (sample.network_interfaces.length > 0) {
        console.log(renderInterfaceTable(sample.network_interfaces));
      }
      if (degraded.length > 0) {
        console.log(chalk.yellow(`\n  Defaults used for: ${degraded.join(', ')}`));
      }
    }

    if (flags.publish) {
      const publisher = new Publisher({ url: config.backendUrl, timeoutMs: config.timeoutMs });
      const result = await publisher.publish(sample);
      if (result.ok) {
        console.error(chalk.green(`\n  Published to ${config.backendUrl} (${result.ack.status})\n`));
      } else {
        console.error(chalk.red(`\n  Publish failed: ${result.error.message}\n`));
        process.exitCode = 1;
      }
    }
  });
