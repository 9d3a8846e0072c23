import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface CreateLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  destination?: string;
}

export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { name = 'hostpulse', level = 'info', pretty = false, destination } = options;

  const transport = pretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      }
    : undefined;

  const dest = destination ? pino.destination(destination) : undefined;

  return pino(
    {
      name,
      level,
      transport: dest ? undefined : transport,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level(label) {
          return { level: label };
        },
      },
    },
    dest,
  );
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

let defaultLogger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!defaultLogger) {
    const envLevel = process.env.HOSTPULSE_LOG_LEVEL;
    defaultLogger = createLogger({
      level: isLogLevel(envLevel) ? envLevel : 'info',
      pretty: process.env.NODE_ENV !== 'production' && process.env.HOSTPULSE_LOG_FORMAT !== 'json',
    });
  }
  return defaultLogger;
}

/**
 * Modules capture the default logger at import time, so the level is changed
 * in place rather than by swapping the instance.
 */
export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
}
