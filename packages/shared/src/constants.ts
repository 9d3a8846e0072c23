export const HOSTPULSE_VERSION = '0.3.0';

export const HOSTPULSE_CONFIG_FILES = ['hostpulse.config.json', '.hostpulserc.json'];
export const HOSTPULSE_ENV_PREFIX = 'HOSTPULSE_';

export const DEFAULT_BACKEND_URL = 'http://localhost:8000/api/system-update';
export const DEFAULT_SAMPLE_INTERVAL_SECONDS = 5;
export const DEFAULT_PUBLISH_TIMEOUT = '10s';
export const DEFAULT_TOP_PROCESS_LIMIT = 10;
export const DEFAULT_LOOPBACK_PREFIX = 'lo';
export const DEFAULT_RECEIVER_PORT = 8000;
export const DEFAULT_RECEIVER_HOST = '127.0.0.1';

export const BYTES_PER_MEBIBYTE = 1024 * 1024;
export const BYTES_PER_GIBIBYTE = 1024 * 1024 * 1024;
export const RATE_DECIMALS = 2;

export const PROC_ROOT = process.env.HOSTPULSE_PROC_ROOT || '/proc';
export const SYS_ROOT = process.env.HOSTPULSE_SYS_ROOT || '/sys';
