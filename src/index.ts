#!/usr/bin/env node

/**
 * CLI entry point
 *
 * Why: Reads env vars, wires shutdown signals, maps failures to exit codes.
 */

import 'dotenv/config';
import { runCli } from './cli.js';
import { createLogger } from './logger.js';

async function main() {
  const logger = createLogger();
  const controller = new AbortController();

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, stopping...`);
    controller.abort();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  const exitCode = await runCli(process.argv.slice(2), { logger, signal: controller.signal });
  process.exit(exitCode);
}

main().catch(error => {
  console.error('Fatal error', error);
  process.exit(1);
});
