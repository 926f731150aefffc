#!/usr/bin/env node
/**
 * ide-warmup CLI
 *
 * Signs into the cloud IDE, waits for the workspace preview to start
 * booting, and exits. Configuration comes from the environment, see
 * src/config.ts. The process always exits normally; the last log line
 * carries the outcome.
 */

import { logger } from './logger';
import { errorMessage } from './result';
import { runFromEnv } from './runner';

async function main(): Promise<void> {
  try {
    const outcome = await runFromEnv();
    logger.info(`Warm-up ${outcome.status}`, outcome);
  } catch (error) {
    logger.error('Warm-up could not run', {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined
    });
  }
}

void main();
