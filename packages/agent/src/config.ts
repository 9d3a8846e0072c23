import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { AgentConfig, LogLevel } from '@hostpulse/shared';
import {
  ConfigValidationError,
  HOSTPULSE_CONFIG_FILES,
  HOSTPULSE_ENV_PREFIX,
  agentConfigSchema,
  parseDuration,
} from '@hostpulse/shared';

export interface ResolvedAgentConfig {
  backendUrl: string;
  intervalSeconds: number;
  timeoutMs: number;
  topProcessLimit: number;
  loopbackPrefix: string;
  logLevel: LogLevel;
  /** File the settings were read from, if any. */
  source: string | null;
}

export interface LoadAgentConfigOptions {
  cwd?: string;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: AgentConfig;
}

export function findConfigFile(cwd: string = process.cwd()): string | null {
  for (const file of HOSTPULSE_CONFIG_FILES) {
    const fullPath = resolve(cwd, file);
    if (existsSync(fullPath)) {
      return fullPath;
    }
  }
  return null;
}

function numberOrRaw(value: string): number | string {
  const parsed = Number(value);
  return value.trim() !== '' && Number.isFinite(parsed) ? parsed : value;
}

/**
 * HOSTPULSE_BACKEND_URL, HOSTPULSE_INTERVAL, HOSTPULSE_TIMEOUT,
 * HOSTPULSE_TOP_PROCESSES, HOSTPULSE_LOOPBACK_PREFIX, HOSTPULSE_LOG_LEVEL.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};
  const read = (key: string): string | undefined => env[`${HOSTPULSE_ENV_PREFIX}${key}`];

  const backendUrl = read('BACKEND_URL');
  if (backendUrl !== undefined) config.backend_url = backendUrl;

  const interval = read('INTERVAL');
  if (interval !== undefined) config.interval = numberOrRaw(interval);

  const timeout = read('TIMEOUT');
  if (timeout !== undefined) config.timeout = numberOrRaw(timeout);

  const topProcesses = read('TOP_PROCESSES');
  if (topProcesses !== undefined) config.top_processes = numberOrRaw(topProcesses);

  const loopbackPrefix = read('LOOPBACK_PREFIX');
  if (loopbackPrefix !== undefined) config.loopback_prefix = loopbackPrefix;

  const logLevel = read('LOG_LEVEL');
  if (logLevel !== undefined) config.log_level = logLevel;

  return config;
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError([`${path}: ${reason}`]);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigValidationError([`${path}: expected a JSON object`]);
  }
  return { ...parsed };
}

function definedEntries(config: AgentConfig): Record<string, unknown> {
  return Object.fromEntries(Object.entries(config).filter(([, value]) => value !== undefined));
}

/**
 * Merge config file, environment and explicit overrides (later wins) and
 * validate the result.
 */
export function loadAgentConfig(options: LoadAgentConfigOptions = {}): ResolvedAgentConfig {
  const { cwd = process.cwd(), env = process.env, overrides = {} } = options;

  let source: string | null = null;
  if (options.configPath) {
    source = resolve(cwd, options.configPath);
    if (!existsSync(source)) {
      throw new ConfigValidationError([`Config file not found: ${source}`]);
    }
  } else {
    source = findConfigFile(cwd);
  }

  const merged = {
    ...(source ? readConfigFile(source) : {}),
    ...readEnvConfig(env),
    ...definedEntries(overrides),
  };

  const result = agentConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  const config = result.data;
  return {
    backendUrl: config.backend_url,
    intervalSeconds: config.interval,
    timeoutMs: parseDuration(config.timeout),
    topProcessLimit: config.top_processes,
    loopbackPrefix: config.loopback_prefix,
    logLevel: config.log_level,
    source,
  };
}
