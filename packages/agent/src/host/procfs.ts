import type { InterfaceCounters, MemoryGauges } from '@hostpulse/shared';
import { CPU_TICK_STATES } from '@hostpulse/shared';

export const SECTOR_BYTES = 512;
/** USER_HZ; fixed at 100 on every mainstream Linux build. */
export const CLOCK_TICKS_PER_SECOND = 100;

function toCounter(value: string | undefined): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : 0;
}

/**
 * Aggregate tick vector from the first `cpu ` line of /proc/stat, padded or
 * truncated to the eight known states.
 */
export function parseCpuTicks(stat: string): number[] {
  const line = stat.split('\n').find((l) => l.startsWith('cpu '));
  if (!line) {
    throw new Error('No aggregate cpu line in /proc/stat');
  }

  const fields = line.trim().split(/\s+/).slice(1);
  return CPU_TICK_STATES.map((_state, index) => toCounter(fields[index]));
}

/**
 * Whole physical disks only: partitions, loop/ram devices and device-mapper
 * volumes would count the same bytes twice.
 */
export function isPhysicalDisk(name: string): boolean {
  if (/^(loop|ram|zram|fd|sr|dm-)/.test(name)) return false;
  if (/^(sd|hd|vd|xvd)[a-z]+\d+$/.test(name)) return false;
  if (/^(nvme\d+n\d+|mmcblk\d+)p\d+$/.test(name)) return false;
  return true;
}

export function parseDiskStats(diskstats: string): { readBytes: number; writeBytes: number } {
  let readBytes = 0;
  let writeBytes = 0;

  for (const line of diskstats.split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 10) continue;

    const name = fields[2] ?? '';
    if (!isPhysicalDisk(name)) continue;

    readBytes += toCounter(fields[5]) * SECTOR_BYTES;
    writeBytes += toCounter(fields[9]) * SECTOR_BYTES;
  }

  return { readBytes, writeBytes };
}

export function parseNetDev(netDev: string): Map<string, InterfaceCounters> {
  const interfaces = new Map<string, InterfaceCounters>();

  for (const line of netDev.split('\n')) {
    const separator = line.indexOf(':');
    if (separator === -1) continue;

    const name = line.slice(0, separator).trim();
    if (!name || name.includes('|')) continue;

    const values = line
      .slice(separator + 1)
      .trim()
      .split(/\s+/);
    if (values.length < 10) continue;

    interfaces.set(name, {
      displayName: name,
      bytesRecv: toCounter(values[0]),
      packetsRecv: toCounter(values[1]),
      bytesSent: toCounter(values[8]),
      packetsSent: toCounter(values[9]),
    });
  }

  return interfaces;
}

export function parseMemInfo(meminfo: string): MemoryGauges {
  const kb = new Map<string, number>();
  for (const line of meminfo.split('\n')) {
    const match = /^(\w+):\s+(\d+)/.exec(line);
    if (match?.[1] && match[2]) {
      kb.set(match[1], Number(match[2]));
    }
  }

  const total = kb.get('MemTotal');
  if (total === undefined) {
    throw new Error('MemTotal missing from /proc/meminfo');
  }

  // Kernels before 3.14 have no MemAvailable.
  const available =
    kb.get('MemAvailable') ??
    (kb.get('MemFree') ?? 0) + (kb.get('Buffers') ?? 0) + (kb.get('Cached') ?? 0);

  return { totalBytes: total * 1024, availableBytes: available * 1024 };
}

export interface ProcStat {
  pid: number;
  name: string;
  state: string;
  utimeTicks: number;
  stimeTicks: number;
  threads: number;
  startTimeTicks: number;
}

/**
 * Parse /proc/<pid>/stat. The command name sits in parentheses and may itself
 * contain spaces or parentheses, so fields are counted from the last ')'.
 */
export function parseProcStat(stat: string): ProcStat {
  const open = stat.indexOf('(');
  const close = stat.lastIndexOf(')');
  if (open === -1 || close < open) {
    throw new Error('Malformed /proc/<pid>/stat');
  }

  const pid = Number(stat.slice(0, open).trim());
  const rest = stat
    .slice(close + 1)
    .trim()
    .split(/\s+/);

  // rest[0] is field 3 (state); field n is rest[n - 3].
  return {
    pid,
    name: stat.slice(open + 1, close),
    state: rest[0] ?? '?',
    utimeTicks: toCounter(rest[11]),
    stimeTicks: toCounter(rest[12]),
    threads: toCounter(rest[17]),
    startTimeTicks: toCounter(rest[19]),
  };
}

export function parseUptimeSeconds(uptime: string): number {
  return toCounter(uptime.trim().split(/\s+/)[0]);
}

/**
 * Lifetime CPU share of a process, the ranking used before details are read.
 */
export function lifetimeCpuPercent(stat: ProcStat, uptimeSeconds: number): number {
  const cpuSeconds = (stat.utimeTicks + stat.stimeTicks) / CLOCK_TICKS_PER_SECOND;
  const elapsed = uptimeSeconds - stat.startTimeTicks / CLOCK_TICKS_PER_SECOND;
  return elapsed > 0 ? (cpuSeconds / elapsed) * 100 : 0;
}

export function parseOsRelease(osRelease: string): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const line of osRelease.split('\n')) {
    const match = /^([A-Z0-9_]+)=(.*)$/.exec(line.trim());
    if (match?.[1] && match[2] !== undefined) {
      entries[match[1]] = match[2].replace(/^["']|["']$/g, '');
    }
  }
  return entries;
}

export function formatOsVersion(release: Record<string, string>, kernel: string): string {
  const version = release.VERSION_ID;
  if (!version) return kernel;

  const codename = release.VERSION_CODENAME;
  const label = codename ? ` (${codename.charAt(0).toUpperCase()}${codename.slice(1)})` : '';
  return `${version}${label} build ${kernel}`;
}

/**
 * Distinct (physical id, core id) pairs in /proc/cpuinfo; 0 when the file
 * carries no topology (some VMs and ARM boards).
 */
export function countPhysicalCores(cpuinfo: string): number {
  const cores = new Set<string>();

  for (const block of cpuinfo.split(/\n\s*\n/)) {
    const physical = /^physical id\s*:\s*(\d+)/m.exec(block)?.[1];
    const core = /^core id\s*:\s*(\d+)/m.exec(block)?.[1];
    if (physical !== undefined && core !== undefined) {
      cores.add(`${physical}:${core}`);
    }
  }

  return cores.size;
}
