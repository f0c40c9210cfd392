/**
 * Structured Logger
 *
 * Scoped loggers with contextual fields. Everything is written to
 * stderr through console.error so stdout stays free for command output.
 */

import { getLogLevel } from '../config/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  /** Service or module name */
  service?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
  data?: unknown;
}

/**
 * Log level priority for filtering
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function shouldLog(level: LogEntry['level']): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getLogLevel()];
}

/**
 * Format error for logging
 * Keeps the `code` carried by grammar and magnet errors
 */
function formatError(error: unknown): LogEntry['error'] | undefined {
  if (error === undefined || error === null) return undefined;

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return {
      name: error.name,
      message: error.message,
      code,
      stack: error.stack,
    };
  }

  return {
    name: 'UnknownError',
    message: typeof error === 'object' ? JSON.stringify(error) : String(error),
  };
}

function outputLog(entry: LogEntry): void {
  const serviceStr = entry.context?.service ? `[${entry.context.service}]` : '';
  const logArgs: unknown[] = [`[${entry.level.toUpperCase()}]${serviceStr} ${entry.message}`];

  if (entry.data !== undefined) {
    logArgs.push('\nData:', entry.data);
  }

  if (entry.error) {
    logArgs.push('\nError:', entry.error);
  }

  if (entry.context) {
    const { service: _service, ...restContext } = entry.context;
    if (Object.keys(restContext).length > 0) {
      logArgs.push('\nContext:', restContext);
    }
  }

  console.error(...logArgs);
}

/**
 * Logger class for creating scoped loggers
 */
export class Logger {
  private readonly context: LogContext;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({
      ...this.context,
      ...additionalContext,
    });
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, undefined, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, undefined, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, undefined, data);
  }

  error(message: string, error?: unknown, data?: unknown): void {
    this.write('error', message, error, data);
  }

  private write(level: LogEntry['level'], message: string, error: unknown, data: unknown): void {
    if (!shouldLog(level)) return;
    outputLog({
      timestamp: new Date().toISOString(),
      level,
      message,
      context: this.context,
      error: formatError(error),
      data,
    });
  }
}

/**
 * Create a logger for a specific service
 */
export function createLogger(service: string): Logger {
  return new Logger({ service });
}
