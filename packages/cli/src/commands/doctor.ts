import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigValidationError, PROC_ROOT } from '@hostpulse/shared';
import { LinuxHostProbe, loadAgentConfig } from '@hostpulse/agent';
import type { ResolvedAgentConfig } from '@hostpulse/agent';

async function probeBackend(url: string, timeoutMs: number): Promise<number> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { method: 'GET', signal: controller.signal });
    await response.text();
    return response.status;
  } finally {
    clearTimeout(timer);
  }
}

export const doctorCommand = new Command('doctor')
  .option('-c, --config <file>', 'Path to a hostpulse.config.json')
  .description('Diagnose the agent environment')
  .action(async (flags: { config?: string }) => {
    console.log(chalk.bold('\n  HostPulse Doctor\n'));

    let issues = 0;

    // Check Node.js version
    const nodeVersion = process.versions.node;
    const major = parseInt(nodeVersion.split('.')[0] ?? '0', 10);
    if (major >= 20) {
      console.log(chalk.green(`  ✓ Node.js version: ${nodeVersion}`));
    } else {
      console.log(chalk.red(`  ✗ Node.js version: ${nodeVersion} (requires >= 20)`));
      issues++;
    }

    // Check configuration
    let config: ResolvedAgentConfig | null = null;
    try {
      config = loadAgentConfig({ configPath: flags.config });
      console.log(
        chalk.green(`  ✓ Configuration: ${config.source ?? 'defaults (no config file found)'}`),
      );
    } catch (err) {
      issues++;
      if (err instanceof ConfigValidationError) {
        console.log(chalk.red('  ✗ Configuration is invalid:'));
        for (const issue of err.errors) {
          console.log(chalk.red(`      ${issue}`));
        }
      } else {
        console.log(chalk.red(`  ✗ Configuration: ${err instanceof Error ? err.message : String(err)}`));
      }
    }

    // Check procfs
    if (existsSync(join(PROC_ROOT, 'stat'))) {
      console.log(chalk.green(`  ✓ procfs: ${PROC_ROOT}`));
    } else {
      console.log(chalk.yellow(`  ⚠ procfs not found at ${PROC_ROOT}, using portable fallbacks`));
    }

    // Check that counters can be read
    try {
      const snapshot = await new LinuxHostProbe().readCounterSnapshot();
      console.log(
        chalk.green(
          `  ✓ Counters readable (${snapshot.cpuTicks.length} cpu states, ${snapshot.netInterfaces.size} interfaces)`,
        ),
      );
    } catch (err) {
      console.log(
        chalk.red(`  ✗ Counters unreadable: ${err instanceof Error ? err.message : String(err)}`),
      );
      issues++;
    }

    // Check backend reachability
    if (config) {
      try {
        const status = await probeBackend(config.backendUrl, config.timeoutMs);
        console.log(chalk.green(`  ✓ Backend reachable: ${config.backendUrl} (HTTP ${status})`));
      } catch (err) {
        console.log(
          chalk.yellow(
            `  ⚠ Backend unreachable: ${config.backendUrl} (${err instanceof Error ? err.message : String(err)})`,
          ),
        );
      }
    } else {
      console.log(chalk.gray('  - Backend: skipped (no valid configuration)'));
    }

    console.log('');

    if (issues > 0) {
      console.log(chalk.red(`  Found ${issues} issue(s) to fix.\n`));
      process.exitCode = 1;
    } else {
      console.log(chalk.green(`  No issues found! The agent is ready to run.\n`));
    }
  });
