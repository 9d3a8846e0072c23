import chalk from 'chalk';
import { formatBytes, formatCpu, formatRate } from '@hostpulse/shared';

export { formatBytes, formatCpu, formatRate };

export function formatCpuDisplay(cpu: number | undefined): string {
  if (cpu === undefined) return chalk.gray('-');
  const str = formatCpu(cpu);
  if (cpu > 80) return chalk.red(str);
  if (cpu > 50) return chalk.yellow(str);
  return chalk.green(str);
}

export function formatGb(gb: number): string {
  return `${gb.toFixed(2)} GB`;
}

export function formatMemory(bytes: number | undefined): string {
  if (!bytes) return chalk.gray('-');
  return formatBytes(bytes);
}

/**
 * Single-letter process states from /proc/<pid>/stat.
 */
export function stateIcon(state: string): string {
  switch (state) {
    case 'R':
      return chalk.green('●');
    case 'S':
    case 'I':
      return chalk.gray('●');
    case 'D':
      return chalk.yellow('●');
    case 'Z':
    case 'X':
      return chalk.red('●');
    case 'T':
    case 't':
      return chalk.cyan('●');
    default:
      return chalk.gray('●');
  }
}
