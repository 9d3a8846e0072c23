export type {
  CpuTickState,
  InterfaceCounters,
  CounterSnapshot,
  StaticHostFacts,
  MemoryGauges,
  ProcessTotals,
  ProcessRef,
  ProcessDetails,
  DiskRates,
  NetworkInterfaceRecord,
  TopProcessRecord,
  MetricsSample,
} from './metrics.js';

export { CPU_TICK_STATES } from './metrics.js';

export type { AgentConfig, ReceiverConfig } from './config.js';
