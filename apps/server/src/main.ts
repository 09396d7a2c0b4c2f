#!/usr/bin/env node
import { CommanderError } from 'commander';
import { parseCli, run } from './cli.js';
import { logger, toError } from './logger.js';

try {
  await run(parseCli(process.argv.slice(2)));
} catch (error) {
  // help and version output exit through commander
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  logger.error('Failed to start DNS server', { error: toError(error) });
  process.exit(1);
}
