/**
 * Logger Module
 *
 * Centralized logging for the magnet tools.
 */

export {
  Logger,
  createLogger,
  type LogLevel,
  type LogContext,
  type LogEntry,
} from './logger';
