/**
 * Runtime Configuration
 *
 * Settings come from the environment:
 * - LOG_LEVEL: debug | info | warn | error | silent (default: warn)
 * - MAGNET_OUTPUT: text | json, CLI output format (default: text)
 *
 * Entry points call loadEnvFiles() first so .env.local and .env can
 * supply them.
 */

import dotenv from 'dotenv';
import path from 'node:path';
import type { LogLevel } from '../logger/logger';

export type OutputFormat = 'text' | 'json';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';
export const DEFAULT_OUTPUT_FORMAT: OutputFormat = 'text';

function pick<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T): T {
  const value = raw?.trim().toLowerCase();
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

/**
 * Current log level; unknown values fall back to the default
 */
export function getLogLevel(): LogLevel {
  return pick(process.env.LOG_LEVEL, LOG_LEVELS, DEFAULT_LOG_LEVEL);
}

export function getOutputFormat(): OutputFormat {
  return pick(process.env.MAGNET_OUTPUT, OUTPUT_FORMATS, DEFAULT_OUTPUT_FORMAT);
}

/**
 * Load .env.local then .env from a directory. Variables already set in
 * the environment win, and earlier files win over later ones.
 *
 * @returns the files that were found and loaded
 */
export function loadEnvFiles(dir: string = process.cwd()): string[] {
  const loaded: string[] = [];
  for (const file of ['.env.local', '.env']) {
    const envPath = path.resolve(dir, file);
    const result = dotenv.config({ path: envPath });
    if (!result.error) {
      loaded.push(envPath);
    }
  }
  return loaded;
}
