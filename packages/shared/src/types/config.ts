import type { LogLevel } from '../utils/logger.js';

/**
 * Agent configuration as written in hostpulse.config.json.
 */
export interface AgentConfig {
  backend_url?: string;
  interval?: number;
  timeout?: string | number;
  top_processes?: number;
  loopback_prefix?: string;
  log_level?: LogLevel;
}

export interface ReceiverConfig {
  host?: string;
  port?: number;
}
