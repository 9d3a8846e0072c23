import type {
  CounterSnapshot,
  InterfaceCounters,
  MemoryGauges,
  ProcessDetails,
  ProcessRef,
  ProcessTotals,
  StaticHostFacts,
} from '@hostpulse/shared';

export interface ListProcessesOptions {
  sortBy: 'cpu-desc';
  limit: number;
}

/**
 * Host introspection layer consumed by the collector. Every method may be slow
 * or reject; callers degrade rather than abort.
 */
export interface HostProbe {
  readStaticHostFacts(): Promise<StaticHostFacts>;
  readCounterSnapshot(): Promise<CounterSnapshot>;
  readMemoryGauges(): Promise<MemoryGauges>;
  readProcessTotals(): Promise<ProcessTotals>;
  listProcesses(options: ListProcessesOptions): Promise<ProcessRef[]>;
  /** Rejects with ProcessGoneError when the process exited after enumeration. */
  readProcess(pid: number): Promise<ProcessDetails>;
}

export interface CounterSnapshotInit {
  cpuTicks: readonly number[];
  diskReadBytesTotal: number;
  diskWriteBytesTotal: number;
  netInterfaces?: Iterable<readonly [string, InterfaceCounters]>;
  capturedAt?: number;
}

export function createCounterSnapshot(init: CounterSnapshotInit): CounterSnapshot {
  const netInterfaces = new Map<string, Readonly<InterfaceCounters>>();
  for (const [name, counters] of init.netInterfaces ?? []) {
    netInterfaces.set(name, Object.freeze({ ...counters }));
  }

  return Object.freeze({
    cpuTicks: Object.freeze([...init.cpuTicks]),
    diskReadBytesTotal: init.diskReadBytesTotal,
    diskWriteBytesTotal: init.diskWriteBytesTotal,
    netInterfaces,
    capturedAt: init.capturedAt ?? 0,
  });
}
