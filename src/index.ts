#!/usr/bin/env node

import { createProgram } from './cli/program.js';
import { log } from './utils/logger.js';

async function main(): Promise<void> {
  const controller = new AbortController();

  // The first signal lets the current pass finish; a second one exits at once
  const shutdown = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      log.warn(`Received ${signal} again, exiting immediately`);
      process.exit(1);
    }
    log.info(`Received ${signal}, stopping after the current pass...`);
    controller.abort();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    await createProgram({ signal: controller.signal }).parseAsync(process.argv);
  } finally {
    process.off('SIGINT', shutdown);
    process.off('SIGTERM', shutdown);
  }
}

main().catch((error: unknown) => {
  log.error('Fatal error:', error);
  process.exit(1);
});
