/**
 * Structured logging for the memory engine and the chat server.
 *
 * Loggers created without an explicit level follow the process-wide level set
 * by `configureLogging()`, so module-level loggers pick up LOG_LEVEL even
 * though they are created at import time.
 */

import { appendFileSync } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext | undefined;
}

export type LogHandler = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Minimum level for this logger (default: the process-wide level) */
  level?: LogLevel | undefined;
  /** Logger name, rendered as a `[name]` prefix */
  name?: string | undefined;
  /** Custom log handler */
  handler?: LogHandler | undefined;
}

export interface ConfigureLoggingOptions {
  /** Process-wide minimum level */
  level?: LogLevel | undefined;
  /** Custom handler for every logger that uses the default handler */
  handler?: LogHandler | undefined;
  /** Append log lines to this file instead of writing to the console */
  file?: string | undefined;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Create a child logger; names are joined with `:` */
  child(childOptions: LoggerOptions): Logger;
}

/**
 * Render an entry as a single line.
 */
export function formatEntry(entry: LogEntry): string {
  const prefix = `[${entry.timestamp}] ${entry.level.toUpperCase()}`;
  return entry.context
    ? `${prefix}: ${entry.message} ${JSON.stringify(entry.context)}`
    : `${prefix}: ${entry.message}`;
}

function consoleHandler(entry: LogEntry): void {
  const line = formatEntry(entry);
  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

let activeHandler: LogHandler = consoleHandler;
let activeLevel: LogLevel = 'info';

function defaultHandler(entry: LogEntry): void {
  activeHandler(entry);
}

/**
 * Configure every logger that relies on the defaults.
 *
 * @example
 * ```typescript
 * configureLogging({ level: 'debug', file: 'memory.log' });
 * ```
 */
export function configureLogging(options: ConfigureLoggingOptions): void {
  if (options.level) {
    activeLevel = options.level;
  }
  if (options.handler) {
    activeHandler = options.handler;
  } else if (options.file) {
    const filePath = options.file;
    activeHandler = (entry: LogEntry) => {
      appendFileSync(filePath, `${formatEntry(entry)}\n`);
    };
  }
}

/**
 * Restore console output at level `info`.
 */
export function resetLogging(): void {
  activeHandler = consoleHandler;
  activeLevel = 'info';
}

/**
 * Create a logger instance.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: 'hybrid-memory' });
 * logger.warn('Summarizer failed', { error: String(err) });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level, name, handler = defaultHandler } = options;

  function log(logLevel: LogLevel, message: string, context?: LogContext): void {
    const minLevel = level ?? activeLevel;
    if (LOG_LEVELS[logLevel] < LOG_LEVELS[minLevel]) {
      return;
    }

    handler({
      level: logLevel,
      message: name ? `[${name}] ${message}` : message,
      timestamp: new Date().toISOString(),
      context,
    });
  }

  return {
    debug: (message: string, context?: LogContext) => {
      log('debug', message, context);
    },
    info: (message: string, context?: LogContext) => {
      log('info', message, context);
    },
    warn: (message: string, context?: LogContext) => {
      log('warn', message, context);
    },
    error: (message: string, context?: LogContext) => {
      log('error', message, context);
    },

    child: (childOptions: LoggerOptions) => {
      const childName =
        name && childOptions.name ? `${name}:${childOptions.name}` : (childOptions.name ?? name);
      return createLogger({
        level,
        handler,
        ...childOptions,
        name: childName,
      });
    },
  };
}
