import pino from 'pino';

export type Logger = pino.Logger;

export function generateCorrelationId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Unknown or missing values resolve to `info`. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const wanted = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted) ?? 'info';
}

function buildOptions(level: LogLevel): pino.LoggerOptions {
  if (process.env.NODE_ENV === 'development') {
    return {
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    };
  }
  return { level };
}

const requestedLevel = process.env.LOG_LEVEL;
const baseLogger = pino(buildOptions(resolveLogLevel(requestedLevel)));

if (requestedLevel && resolveLogLevel(requestedLevel) !== requestedLevel.trim().toLowerCase()) {
  baseLogger.warn({ value: requestedLevel }, 'Unknown LOG_LEVEL, logging at info');
}

// Callers bind a correlation id per message.
export function createLogger(context?: Record<string, unknown>): Logger {
  return baseLogger.child({ ...context });
}

