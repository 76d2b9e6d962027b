/**
 * Structured logging module using pino
 *
 * In development, logs are pretty-printed; in production and under test,
 * they're plain JSON on stdout.
 */

import pino from 'pino';

/** Log levels supported by the logger */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** Context that can be attached to log messages */
export interface LogContext {
  [key: string]: unknown;
}

/** Configuration options for creating a logger */
export interface LoggerOptions {
  /** Name of the component, e.g. `preview-sync:github` */
  name: string;
  /** Minimum log level to output */
  level?: LogLevel;
  /** Additional base context to include in all logs */
  base?: LogContext;
}

function isProduction(): boolean {
  return process.env['NODE_ENV'] === 'production';
}

function isTest(): boolean {
  return process.env['NODE_ENV'] === 'test' || process.env['VITEST'] !== undefined;
}

/** Get the log level from environment or default */
function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  if (
    envLevel === 'fatal' ||
    envLevel === 'error' ||
    envLevel === 'warn' ||
    envLevel === 'info' ||
    envLevel === 'debug' ||
    envLevel === 'trace' ||
    envLevel === 'silent'
  ) {
    return envLevel;
  }
  return isProduction() ? 'info' : 'debug';
}

/**
 * Create a configured pino logger instance
 */
export function createLogger(options: LoggerOptions): pino.Logger {
  const level = options.level ?? getLogLevel();

  // pino-pretty runs in a worker thread; keep test runs on the synchronous path
  const transport = !isProduction() && !isTest()
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined;

  return pino({
    name: options.name,
    level,
    base: {
      ...options.base,
      env: process.env['NODE_ENV'] ?? 'development',
    },
    transport,
  });
}

/**
 * Create a child logger with additional context
 */
export function childLogger(
  parent: pino.Logger,
  context: LogContext
): pino.Logger {
  return parent.child(context);
}

export type { Logger } from 'pino';
