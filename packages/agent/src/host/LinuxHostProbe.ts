import { readFile, readdir } from 'node:fs/promises';
import os from 'node:os';
import { join } from 'node:path';
import pidusage from 'pidusage';
import type {
  CounterSnapshot,
  InterfaceCounters,
  MemoryGauges,
  ProcessDetails,
  ProcessRef,
  ProcessTotals,
  StaticHostFacts,
} from '@hostpulse/shared';
import { PROC_ROOT, ProcessGoneError, SYS_ROOT } from '@hostpulse/shared';
import type { HostProbe, ListProcessesOptions } from './HostProbe.js';
import { createCounterSnapshot } from './HostProbe.js';
import {
  countPhysicalCores,
  formatOsVersion,
  lifetimeCpuPercent,
  parseCpuTicks,
  parseDiskStats,
  parseMemInfo,
  parseNetDev,
  parseOsRelease,
  parseProcStat,
  parseUptimeSeconds,
} from './procfs.js';
import type { ProcStat } from './procfs.js';

export interface LinuxHostProbeOptions {
  procRoot?: string;
  sysRoot?: string;
  osReleasePath?: string;
  /** Stamps each counter snapshot; defaults to Date.now. */
  now?: () => number;
}

const OS_NAMES: Record<string, string> = {
  linux: 'Linux',
  darwin: 'macOS',
  win32: 'Windows',
  freebsd: 'FreeBSD',
};

const OS_MANUFACTURERS: Record<string, string> = {
  linux: 'GNU/Linux',
  darwin: 'Apple',
  win32: 'Microsoft',
  freebsd: 'The FreeBSD Project',
};

function isMissing(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    (err.code === 'ENOENT' || err.code === 'ENOTDIR' || err.code === 'EACCES')
  );
}

/**
 * Reads counters from procfs. Where procfs is absent (macOS, containers with a
 * masked /proc) counters fall back to what node:os exposes.
 */
export class LinuxHostProbe implements HostProbe {
  private procRoot: string;
  private sysRoot: string;
  private osReleasePath: string;
  private now: () => number;
  private pendingScan: Promise<ProcStat[]> | null = null;

  constructor(options: LinuxHostProbeOptions = {}) {
    this.procRoot = options.procRoot ?? PROC_ROOT;
    this.sysRoot = options.sysRoot ?? SYS_ROOT;
    this.osReleasePath = options.osReleasePath ?? '/etc/os-release';
    this.now = options.now ?? Date.now;
  }

  async readStaticHostFacts(): Promise<StaticHostFacts> {
    const platform = os.platform();
    const cpus = os.cpus();
    const logical = cpus.length;

    const [osRelease, cpuinfo, maxFreqKhz] = await Promise.all([
      this.readOptional(this.osReleasePath),
      this.readOptional(join(this.procRoot, 'cpuinfo')),
      this.readOptional(join(this.sysRoot, 'devices/system/cpu/cpu0/cpufreq/cpuinfo_max_freq')),
    ]);

    const physical = cpuinfo ? countPhysicalCores(cpuinfo) : 0;
    const frequencyFromSys = maxFreqKhz ? Math.floor(Number(maxFreqKhz.trim()) / 1000) : 0;
    const frequency =
      Number.isFinite(frequencyFromSys) && frequencyFromSys > 0
        ? frequencyFromSys
        : Math.max(0, ...cpus.map((cpu) => cpu.speed));

    return {
      osName: OS_NAMES[platform] ?? os.type(),
      osVersion: osRelease ? formatOsVersion(parseOsRelease(osRelease), os.release()) : os.release(),
      osManufacturer: OS_MANUFACTURERS[platform] ?? 'unknown',
      cpuModel: cpus[0]?.model.trim() || 'unknown',
      cpuCoresPhysical: physical > 0 ? physical : logical,
      cpuCoresLogical: logical,
      cpuFrequencyMhz: frequency,
    };
  }

  async readCounterSnapshot(): Promise<CounterSnapshot> {
    const capturedAt = this.now();
    const [stat, diskstats, netDev] = await Promise.all([
      this.readOptional(join(this.procRoot, 'stat')),
      this.readOptional(join(this.procRoot, 'diskstats')),
      this.readOptional(join(this.procRoot, 'net/dev')),
    ]);

    const disk = diskstats ? parseDiskStats(diskstats) : { readBytes: 0, writeBytes: 0 };

    return createCounterSnapshot({
      cpuTicks: stat ? parseCpuTicks(stat) : this.cpuTicksFromOs(),
      diskReadBytesTotal: disk.readBytes,
      diskWriteBytesTotal: disk.writeBytes,
      netInterfaces: netDev ? parseNetDev(netDev) : this.interfacesFromOs(),
      capturedAt,
    });
  }

  async readMemoryGauges(): Promise<MemoryGauges> {
    const meminfo = await this.readOptional(join(this.procRoot, 'meminfo'));
    if (meminfo) {
      return parseMemInfo(meminfo);
    }
    return { totalBytes: os.totalmem(), availableBytes: os.freemem() };
  }

  async readProcessTotals(): Promise<ProcessTotals> {
    const stats = await this.scanProcesses();
    return {
      processCount: stats.length,
      threadCount: stats.reduce((sum, stat) => sum + stat.threads, 0),
    };
  }

  async listProcesses(options: ListProcessesOptions): Promise<ProcessRef[]> {
    const [stats, uptime] = await Promise.all([
      this.scanProcesses(),
      readFile(join(this.procRoot, 'uptime'), 'utf-8'),
    ]);
    const uptimeSeconds = parseUptimeSeconds(uptime);

    return stats
      .map((stat) => ({ pid: stat.pid, cpuPercent: lifetimeCpuPercent(stat, uptimeSeconds) }))
      .sort((a, b) => b.cpuPercent - a.cpuPercent)
      .slice(0, options.limit);
  }

  async readProcess(pid: number): Promise<ProcessDetails> {
    try {
      const [usage, rawStat] = await Promise.all([
        pidusage(pid),
        readFile(join(this.procRoot, String(pid), 'stat'), 'utf-8'),
      ]);
      const stat = parseProcStat(rawStat);

      return {
        pid,
        name: stat.name,
        cpuPercent: usage.cpu,
        memoryBytes: usage.memory,
        state: stat.state,
      };
    } catch (err) {
      throw new ProcessGoneError(pid, err);
    }
  }

  /**
   * Walk /proc once for every caller that asks while a walk is in flight, so
   * the totals and the ranking in one cycle come from the same scan.
   */
  private scanProcesses(): Promise<ProcStat[]> {
    if (!this.pendingScan) {
      this.pendingScan = this.readAllProcStats().finally(() => {
        this.pendingScan = null;
      });
    }
    return this.pendingScan;
  }

  private async readAllProcStats(): Promise<ProcStat[]> {
    const entries = await readdir(this.procRoot);
    const pids = entries.filter((entry) => /^\d+$/.test(entry));

    const results = await Promise.allSettled(
      pids.map(async (pid) =>
        parseProcStat(await readFile(join(this.procRoot, pid, 'stat'), 'utf-8')),
      ),
    );

    // Entries that vanished during the walk are simply not counted.
    const stats: ProcStat[] = [];
    for (const result of results) {
      if (result.status === 'fulfilled') stats.push(result.value);
    }
    return stats;
  }

  private async readOptional(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf-8');
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  private cpuTicksFromOs(): number[] {
    const ticks = [0, 0, 0, 0, 0, 0, 0, 0];
    for (const cpu of os.cpus()) {
      // os.cpus() reports milliseconds; convert to USER_HZ ticks.
      ticks[0] += Math.round(cpu.times.user / 10);
      ticks[1] += Math.round(cpu.times.nice / 10);
      ticks[2] += Math.round(cpu.times.sys / 10);
      ticks[3] += Math.round(cpu.times.idle / 10);
      ticks[5] += Math.round(cpu.times.irq / 10);
    }
    return ticks;
  }

  private interfacesFromOs(): Map<string, InterfaceCounters> {
    const interfaces = new Map<string, InterfaceCounters>();
    for (const name of Object.keys(os.networkInterfaces())) {
      interfaces.set(name, {
        displayName: name,
        bytesSent: 0,
        bytesRecv: 0,
        packetsSent: 0,
        packetsRecv: 0,
      });
    }
    return interfaces;
  }
}
