export { Agent } from './Agent.js';
export { MetricsCollector } from './MetricsCollector.js';
export { Scheduler, systemClock } from './Scheduler.js';
export { Publisher } from './Publisher.js';
export {
  roundHalfUp,
  calculateCpuPercent,
  calculateByteRate,
  calculateDiskRates,
  measuredWindowSeconds,
} from './DeltaCalculator.js';
export { createCounterSnapshot } from './host/HostProbe.js';
export { LinuxHostProbe } from './host/LinuxHostProbe.js';
export { loadAgentConfig, findConfigFile, readEnvConfig } from './config.js';

export type { AgentOptions } from './types.js';
export type { MetricsCollectorOptions, CollectionResult } from './MetricsCollector.js';
export type { Clock, TimerHandle, CycleTask, SchedulerOptions, CycleReport } from './Scheduler.js';
export type { PublisherOptions, PublishAck, PublishResult } from './Publisher.js';
export type { HostProbe, ListProcessesOptions, CounterSnapshotInit } from './host/HostProbe.js';
export type { LinuxHostProbeOptions } from './host/LinuxHostProbe.js';
export type { ResolvedAgentConfig, LoadAgentConfigOptions } from './config.js';
