/**
 * Slots of the CPU tick vector, in the order the kernel reports them.
 */
export const CPU_TICK_STATES = [
  'user',
  'nice',
  'system',
  'idle',
  'iowait',
  'irq',
  'softirq',
  'steal',
] as const;

export type CpuTickState = (typeof CPU_TICK_STATES)[number];

export interface InterfaceCounters {
  displayName: string;
  bytesSent: number;
  bytesRecv: number;
  packetsSent: number;
  packetsRecv: number;
}

/**
 * Every raw cumulative counter read from the host at one instant.
 */
export interface CounterSnapshot {
  readonly cpuTicks: readonly number[];
  readonly diskReadBytesTotal: number;
  readonly diskWriteBytesTotal: number;
  readonly netInterfaces: ReadonlyMap<string, Readonly<InterfaceCounters>>;
  /** Epoch ms of the read; 0 when unknown. */
  readonly capturedAt: number;
}

export interface StaticHostFacts {
  osName: string;
  osVersion: string;
  osManufacturer: string;
  cpuModel: string;
  cpuCoresPhysical: number;
  cpuCoresLogical: number;
  cpuFrequencyMhz: number;
}

export interface MemoryGauges {
  totalBytes: number;
  availableBytes: number;
}

export interface ProcessTotals {
  processCount: number;
  threadCount: number;
}

export interface ProcessRef {
  pid: number;
  cpuPercent: number;
}

export interface ProcessDetails {
  pid: number;
  name: string;
  cpuPercent: number;
  memoryBytes: number;
  state: string;
}

export interface DiskRates {
  readMbps: number;
  writeMbps: number;
  totalMbps: number;
}

export interface NetworkInterfaceRecord {
  name: string;
  display_name: string;
  bytes_sent: number;
  bytes_recv: number;
  packets_sent: number;
  packets_recv: number;
}

export interface TopProcessRecord {
  pid: number;
  name: string;
  cpu_percent: number;
  memory_bytes: number;
  state: string;
}

/**
 * Point-in-time report posted to the collector. Keys are the wire keys.
 */
export interface MetricsSample {
  readonly os_name: string;
  readonly os_version: string;
  readonly os_manufacturer: string;
  readonly cpu_model: string;
  readonly cpu_cores_physical: number;
  readonly cpu_cores_logical: number;
  readonly cpu_percent: number;
  readonly cpu_frequency_mhz: number;
  readonly memory_total_gb: number;
  readonly memory_available_gb: number;
  readonly memory_used_gb: number;
  readonly memory_percent: number;
  readonly disk_read_mbps: number;
  readonly disk_write_mbps: number;
  readonly disk_io_total_mbps: number;
  readonly network_interfaces: readonly NetworkInterfaceRecord[];
  readonly process_count: number;
  readonly thread_count: number;
  readonly top_processes: readonly TopProcessRecord[];
  readonly timestamp: number;
}
