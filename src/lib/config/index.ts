/**
 * Configuration Module
 *
 * Exports all configuration utilities and constants.
 */

export {
  getLogLevel,
  getOutputFormat,
  loadEnvFiles,
  DEFAULT_LOG_LEVEL,
  DEFAULT_OUTPUT_FORMAT,
} from './config';

export type { OutputFormat } from './config';
