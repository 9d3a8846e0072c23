import type {
  CounterSnapshot,
  DiskRates,
  MemoryGauges,
  MetricsSample,
  NetworkInterfaceRecord,
  ProcessDetails,
  ProcessRef,
  ProcessTotals,
  StaticHostFacts,
  TopProcessRecord,
} from '@hostpulse/shared';
import {
  BYTES_PER_GIBIBYTE,
  CollectionError,
  DEFAULT_LOOPBACK_PREFIX,
  DEFAULT_SAMPLE_INTERVAL_SECONDS,
  DEFAULT_TOP_PROCESS_LIMIT,
  InconsistentCounterShapeError,
  getLogger,
} from '@hostpulse/shared';
import { calculateCpuPercent, calculateDiskRates, roundHalfUp } from './DeltaCalculator.js';
import type { HostProbe } from './host/HostProbe.js';

const logger = getLogger();

export interface MetricsCollectorOptions {
  intervalSeconds?: number;
  topProcessLimit?: number;
  loopbackPrefix?: string;
  now?: () => number;
}

export interface CollectionResult {
  sample: MetricsSample;
  /** Baseline for the next cycle; null when the counters could not be read. */
  snapshot: CounterSnapshot | null;
  /** Sub-metrics that fell back to a default in this cycle. */
  degraded: string[];
}

const UNKNOWN_FACTS: StaticHostFacts = {
  osName: 'unknown',
  osVersion: 'unknown',
  osManufacturer: 'unknown',
  cpuModel: 'unknown',
  cpuCoresPhysical: 0,
  cpuCoresLogical: 0,
  cpuFrequencyMhz: 0,
};

const ZERO_RATES: DiskRates = { readMbps: 0, writeMbps: 0, totalMbps: 0 };

/**
 * Runs one sampling cycle against a HostProbe. The collector holds no baseline
 * of its own: the caller passes the previous snapshot in and keeps the one
 * returned for the next cycle.
 */
export class MetricsCollector {
  private probe: HostProbe;
  private intervalSeconds: number;
  private topProcessLimit: number;
  private loopbackPrefix: string;
  private now: () => number;

  constructor(probe: HostProbe, options: MetricsCollectorOptions = {}) {
    this.probe = probe;
    this.intervalSeconds = options.intervalSeconds ?? DEFAULT_SAMPLE_INTERVAL_SECONDS;
    this.topProcessLimit = options.topProcessLimit ?? DEFAULT_TOP_PROCESS_LIMIT;
    this.loopbackPrefix = options.loopbackPrefix ?? DEFAULT_LOOPBACK_PREFIX;
    this.now = options.now ?? Date.now;
  }

  /**
   * Read the counters once, outside any cycle. Used to seed the first baseline.
   */
  async readBaseline(): Promise<CounterSnapshot | null> {
    const degraded: string[] = [];
    return this.attempt<CounterSnapshot | null>(
      'counters',
      degraded,
      () => this.probe.readCounterSnapshot(),
      null,
    );
  }

  async collect(baseline: CounterSnapshot | null): Promise<CollectionResult> {
    const degraded: string[] = [];

    const [facts, snapshot, memory, totals, processes] = await Promise.all([
      this.attempt('static facts', degraded, () => this.probe.readStaticHostFacts(), UNKNOWN_FACTS),
      this.attempt<CounterSnapshot | null>(
        'counters',
        degraded,
        () => this.probe.readCounterSnapshot(),
        null,
      ),
      this.attempt('memory', degraded, () => this.probe.readMemoryGauges(), {
        totalBytes: 0,
        availableBytes: 0,
      }),
      this.attempt('process totals', degraded, () => this.probe.readProcessTotals(), {
        processCount: 0,
        threadCount: 0,
      }),
      this.readTopProcesses(degraded),
    ]);

    const cpuPercent = this.computeCpuPercent(baseline, snapshot, degraded);
    const diskRates =
      baseline && snapshot
        ? calculateDiskRates(baseline, snapshot, this.intervalSeconds)
        : ZERO_RATES;

    const sample = this.assemble({
      facts,
      cpuPercent,
      diskRates,
      memory,
      totals,
      interfaces: snapshot ? this.networkRecords(snapshot) : [],
      processes,
    });

    return { sample, snapshot, degraded };
  }

  private computeCpuPercent(
    baseline: CounterSnapshot | null,
    snapshot: CounterSnapshot | null,
    degraded: string[],
  ): number {
    if (!baseline || !snapshot) return 0;

    try {
      return calculateCpuPercent(baseline.cpuTicks, snapshot.cpuTicks);
    } catch (err) {
      if (err instanceof InconsistentCounterShapeError) {
        degraded.push('cpu');
        logger.warn(
          { previous: err.previousLength, current: err.currentLength },
          'CPU tick vector changed shape, reporting 0% for this cycle',
        );
        return 0;
      }
      throw err;
    }
  }

  private networkRecords(snapshot: CounterSnapshot): NetworkInterfaceRecord[] {
    const records: NetworkInterfaceRecord[] = [];
    for (const [name, counters] of snapshot.netInterfaces) {
      if (this.loopbackPrefix && name.startsWith(this.loopbackPrefix)) continue;
      records.push({
        name,
        display_name: counters.displayName,
        bytes_sent: counters.bytesSent,
        bytes_recv: counters.bytesRecv,
        packets_sent: counters.packetsSent,
        packets_recv: counters.packetsRecv,
      });
    }
    return records;
  }

  /**
   * Processes can exit between enumeration and the detail read. Those are
   * omitted; the rest are re-ranked by the CPU values actually read.
   */
  private async readTopProcesses(degraded: string[]): Promise<ProcessDetails[]> {
    const refs = await this.attempt<ProcessRef[]>(
      'process list',
      degraded,
      () => this.probe.listProcesses({ sortBy: 'cpu-desc', limit: this.topProcessLimit }),
      [],
    );

    const results = await Promise.allSettled(
      refs.slice(0, this.topProcessLimit).map((ref) => this.probe.readProcess(ref.pid)),
    );

    const details: ProcessDetails[] = [];
    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        details.push(result.value);
      } else {
        logger.debug({ pid: refs[index]?.pid, err: result.reason }, 'Process vanished, omitted');
      }
    });

    return details.sort((a, b) => b.cpuPercent - a.cpuPercent);
  }

  private assemble(parts: {
    facts: StaticHostFacts;
    cpuPercent: number;
    diskRates: DiskRates;
    memory: MemoryGauges;
    totals: ProcessTotals;
    interfaces: NetworkInterfaceRecord[];
    processes: ProcessDetails[];
  }): MetricsSample {
    const { facts, memory } = parts;
    const total = Math.max(0, memory.totalBytes);
    const available = Math.min(total, Math.max(0, memory.availableBytes));
    const used = total - available;
    const memoryPercent = total > 0 ? roundHalfUp((used / total) * 100) : 0;

    const topProcesses: TopProcessRecord[] = parts.processes.map((proc) =>
      Object.freeze({
        pid: proc.pid,
        name: proc.name,
        cpu_percent: roundHalfUp(Math.max(0, proc.cpuPercent)),
        memory_bytes: proc.memoryBytes,
        state: proc.state,
      }),
    );

    return Object.freeze({
      os_name: facts.osName,
      os_version: facts.osVersion,
      os_manufacturer: facts.osManufacturer,
      cpu_model: facts.cpuModel,
      cpu_cores_physical: facts.cpuCoresPhysical,
      cpu_cores_logical: facts.cpuCoresLogical,
      cpu_percent: parts.cpuPercent,
      cpu_frequency_mhz: facts.cpuFrequencyMhz,
      memory_total_gb: roundHalfUp(total / BYTES_PER_GIBIBYTE),
      memory_available_gb: roundHalfUp(available / BYTES_PER_GIBIBYTE),
      memory_used_gb: roundHalfUp(used / BYTES_PER_GIBIBYTE),
      memory_percent: memoryPercent,
      disk_read_mbps: parts.diskRates.readMbps,
      disk_write_mbps: parts.diskRates.writeMbps,
      disk_io_total_mbps: parts.diskRates.totalMbps,
      network_interfaces: Object.freeze(parts.interfaces.map((iface) => Object.freeze(iface))),
      process_count: parts.totals.processCount,
      thread_count: parts.totals.threadCount,
      top_processes: Object.freeze(topProcesses),
      timestamp: this.now(),
    });
  }

  private async attempt<T>(
    metric: string,
    degraded: string[],
    read: () => Promise<T>,
    fallback: T,
  ): Promise<T> {
    try {
      return await read();
    } catch (err) {
      const error = new CollectionError(metric, err);
      degraded.push(metric);
      logger.warn({ err: error, metric }, 'Host read failed, using default');
      return fallback;
    }
  }
}
