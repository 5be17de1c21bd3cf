#!/usr/bin/env node
/**
 * countme-trim-raw entry point
 *
 * SIGINT/SIGTERM abort the current run; during the warning countdown that
 * cancels the delete and the process exits with status 3.
 */

import { runCli } from './cli';
import { logger } from './config/logger';

async function main(): Promise<void> {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info('CLI: Signal received, aborting run', { signal });
    controller.abort();
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    process.exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

main().catch((error: unknown) => {
  logger.error('CLI: Unexpected failure', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exitCode = 1;
});
