#!/usr/bin/env npx tsx
/**
 * Magnet link inspector
 * Usage: npx tsx scripts/magnet.ts [--json] <link>
 */

import { loadEnvFiles } from '../src/lib/config';
import { runMagnetCli } from '../src/lib/magnet';

loadEnvFiles();
process.exitCode = runMagnetCli(process.argv.slice(2));
