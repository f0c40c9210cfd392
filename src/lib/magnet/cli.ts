/**
 * Magnet Link CLI
 *
 * Parses one magnet link and prints its fields, as text lines or JSON.
 */

import { getOutputFormat, type OutputFormat } from '../config';
import { createLogger } from '../logger';
import { parseMagnetLink } from './magnet-link-rule';
import { formatMagnetLink, summarizeMagnetLink } from './summary';

const logger = createLogger('MagnetCli');

export const EXAMPLE_LINK =
  'magnet:?xt=urn:btih:d2474e86c95b19b8bcfdb92bc12c9d44667cfa36' +
  '&dn=Leaves+of+Grass+by+Walt+Whitman.epub' +
  '&tr=udp%3A%2F%2Ftracker.example4.com%3A80' +
  '&tr=udp%3A%2F%2Ftracker.example5.com%3A80' +
  '&tr=udp%3A%2F%2Ftracker.example3.com%3A6969' +
  '&tr=udp%3A%2F%2Ftracker.example2.com%3A80' +
  '&tr=udp%3A%2F%2Ftracker.example1.com%3A1337';

export const USAGE = ['usage: magnet [--json] <link>', `example: magnet ${EXAMPLE_LINK}`];

export interface CliOutput {
  write(line: string): void;
}

const consoleOutput: CliOutput = {
  write: (line) => console.log(line),
};

/**
 * @param args - command line arguments, without the node and script paths
 * @returns the process exit code
 */
export function runMagnetCli(args: string[], output: CliOutput = consoleOutput): number {
  const positional = args.filter((arg) => arg !== '--json');
  const format: OutputFormat = args.includes('--json') ? 'json' : getOutputFormat();

  if (positional.length !== 1) {
    USAGE.forEach((line) => output.write(line));
    return 1;
  }

  const result = parseMagnetLink(positional[0]);
  if (!result.ok) {
    logger.error('Failed to parse magnet link', result.error, { link: positional[0] });
    return 1;
  }

  const summary = summarizeMagnetLink(result.value);
  if (format === 'json') {
    output.write(JSON.stringify(summary, null, 2));
  } else {
    formatMagnetLink(summary).forEach((line) => output.write(line));
  }
  return 0;
}
