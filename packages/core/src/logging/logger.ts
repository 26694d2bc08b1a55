/**
 * Centralized logging for Taskboard
 *
 * Uses pino for structured logging with:
 * - Configurable log levels
 * - JSON output for production
 * - Pretty printing for development
 * - Component-scoped child loggers
 */

import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type Logger = pino.Logger;

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
  /** Write JSON lines to this stream instead of stdout; cannot be combined with `pretty: true` */
  destination?: pino.DestinationStream;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Create a configured pino logger instance
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env['LOG_LEVEL']?.toLowerCase();
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
  // pino-pretty runs as a worker transport and writes to stdout, so a custom stream rules it out
  if (options.pretty === true && options.destination) {
    throw new Error('createLogger: a custom destination cannot be combined with pretty output');
  }
  const pretty = options.pretty ?? (!options.destination && process.env['NODE_ENV'] === 'development');

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? 'taskboard',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => ({
        pid: bindings['pid'],
        host: bindings['hostname'],
        name: bindings['name'],
      }),
    },
  };

  if (pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,host',
        },
      },
    });
  }

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

/** A logger that discards everything. For tests and library defaults */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
