import type { HostProbe } from './host/HostProbe.js';
import type { Clock } from './Scheduler.js';

export interface AgentOptions {
  backendUrl: string;
  intervalSeconds: number;
  timeoutMs: number;
  topProcessLimit?: number;
  loopbackPrefix?: string;
  probe?: HostProbe;
  clock?: Clock;
}
