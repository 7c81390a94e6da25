#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   neowatch inspect --pdes 433
 *   neowatch query --start-date 2020-01-01 --max-distance 0.05 --limit 10
 */

import { Logger } from '@neowatch/core';
import { runCli } from './run.js';

try {
  process.exitCode = await runCli(process.argv.slice(2));
} catch (error) {
  new Logger().error('Unexpected failure', { error });
  process.exitCode = 1;
}
