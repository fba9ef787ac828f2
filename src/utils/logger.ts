/**
 * Logger utility
 */

import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  pretty: boolean;
  destination?: string;
}

let logger: pino.Logger | null = null;

/**
 * Initialize the shared logger. Modules look it up through getLogger() on
 * every call, so a logger installed here replaces the default everywhere.
 */
export function initLogger(config: LoggerConfig): pino.Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: { name: 'lectern' },
  };

  if (config.destination) {
    logger = pino(options, pino.destination(config.destination));
  } else if (config.pretty) {
    logger = pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  } else {
    logger = pino(options);
  }

  return logger;
}

/**
 * Get the logger instance
 */
export function getLogger(): pino.Logger {
  if (!logger) {
    // Quiet unless asked otherwise; the CLI installs its own logger
    logger = pino({
      level: process.env.LECTERN_LOG_LEVEL ?? 'warn',
      base: { name: 'lectern' },
    });
  }
  return logger;
}
