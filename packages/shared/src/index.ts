// Types
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
  AgentConfig,
  ReceiverConfig,
} from './types/index.js';

export { CPU_TICK_STATES } from './types/index.js';

// Constants
export {
  HOSTPULSE_VERSION,
  HOSTPULSE_CONFIG_FILES,
  HOSTPULSE_ENV_PREFIX,
  DEFAULT_BACKEND_URL,
  DEFAULT_SAMPLE_INTERVAL_SECONDS,
  DEFAULT_PUBLISH_TIMEOUT,
  DEFAULT_TOP_PROCESS_LIMIT,
  DEFAULT_LOOPBACK_PREFIX,
  DEFAULT_RECEIVER_PORT,
  DEFAULT_RECEIVER_HOST,
  BYTES_PER_MEBIBYTE,
  BYTES_PER_GIBIBYTE,
  RATE_DECIMALS,
  PROC_ROOT,
  SYS_ROOT,
} from './constants.js';

// Schemas
export {
  agentConfigSchema,
  receiverConfigSchema,
  logLevelSchema,
} from './schemas/config.schema.js';

export type { ValidatedAgentConfig, ValidatedReceiverConfig } from './schemas/config.schema.js';

export {
  metricsSampleSchema,
  networkInterfaceSchema,
  topProcessSchema,
} from './schemas/sample.schema.js';

export type { ValidatedMetricsSample } from './schemas/sample.schema.js';

// Utilities
export { parseDuration, formatDuration, formatBytes, formatCpu, formatRate } from './utils/parser.js';

export { toWirePayload, serializeSample } from './utils/serialize.js';

export {
  createLogger,
  getLogger,
  setLogLevel,
  isLogLevel,
} from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  HostPulseError,
  ConfigValidationError,
  CollectionError,
  InconsistentCounterShapeError,
  ProcessGoneError,
  PublishError,
  BadStatusError,
  TransportError,
} from './utils/errors.js';
