/**
 * Structured Logging Module
 *
 * pino-based logging with scoped child loggers. Output goes to stderr so
 * log lines never interleave with the interactive menu on stdout.
 */

import pino, { Logger } from 'pino';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
}

let rootLogger: Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Initialize the root logger. Call once at startup; calling again replaces it.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = config.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  const pretty = config.pretty ?? process.env.NODE_ENV !== 'production';

  if (pretty) {
    rootLogger = pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          messageFormat: '[{module}] {msg}',
        },
      },
    });
  } else {
    rootLogger = pino({ level }, pino.destination(2));
  }
  return rootLogger;
}

/**
 * Get the root logger instance.
 * Auto-initializes if not already initialized.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 */
export function getLogger(module: string): Logger {
  return getRootLogger().child({ module });
}
