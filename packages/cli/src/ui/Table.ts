import Table from 'cli-table3';
import chalk from 'chalk';
import type { MetricsSample, NetworkInterfaceRecord, TopProcessRecord } from '@hostpulse/shared';
import {
  formatBytes,
  formatCpuDisplay,
  formatGb,
  formatMemory,
  formatRate,
  stateIcon,
} from '../utils/format.js';

export function renderProcessTable(processes: readonly TopProcessRecord[]): string {
  const table = new Table({
    head: [
      chalk.bold('pid'),
      chalk.bold('name'),
      chalk.bold(''),
      chalk.bold('cpu'),
      chalk.bold('memory'),
    ],
    style: {
      head: [],
      border: ['gray'],
    },
    colWidths: [10, 28, 3, 10, 12],
  });

  for (const proc of processes) {
    table.push([
      String(proc.pid),
      proc.name,
      stateIcon(proc.state),
      formatCpuDisplay(proc.cpu_percent),
      formatMemory(proc.memory_bytes),
    ]);
  }

  return table.toString();
}

export function renderInterfaceTable(interfaces: readonly NetworkInterfaceRecord[]): string {
  const table = new Table({
    head: [
      chalk.bold('interface'),
      chalk.bold('sent'),
      chalk.bold('received'),
      chalk.bold('pkts out'),
      chalk.bold('pkts in'),
    ],
    style: {
      head: [],
      border: ['gray'],
    },
  });

  for (const iface of interfaces) {
    table.push([
      iface.display_name,
      formatBytes(iface.bytes_sent),
      formatBytes(iface.bytes_recv),
      String(iface.packets_sent),
      String(iface.packets_recv),
    ]);
  }

  return table.toString();
}

export function renderSampleSummary(sample: MetricsSample): string {
  const lines: string[] = [];

  lines.push(chalk.bold(`\n  ${sample.os_name} ${sample.os_version}`));
  lines.push(`  Manufacturer: ${sample.os_manufacturer}`);
  lines.push(`  CPU Model:    ${sample.cpu_model}`);
  lines.push(
    `  Cores:        ${sample.cpu_cores_physical} physical / ${sample.cpu_cores_logical} logical @ ${sample.cpu_frequency_mhz} MHz`,
  );
  lines.push('');
  lines.push(`  CPU:          ${formatCpuDisplay(sample.cpu_percent)}`);
  lines.push(
    `  Memory:       ${formatGb(sample.memory_used_gb)} / ${formatGb(sample.memory_total_gb)} (${formatCpuDisplay(sample.memory_percent)})`,
  );
  lines.push(`  Available:    ${formatGb(sample.memory_available_gb)}`);
  lines.push(
    `  Disk I/O:     ${formatRate(sample.disk_read_mbps)} read, ${formatRate(sample.disk_write_mbps)} write, ${formatRate(sample.disk_io_total_mbps)} total`,
  );
  lines.push(`  Processes:    ${sample.process_count} (${sample.thread_count} threads)`);
  lines.push(`  Sampled At:   ${new Date(sample.timestamp).toISOString()}`);
  lines.push('');

  return lines.join('\n');
}
