#!/usr/bin/env node
import { pipeRecords } from './application/ndjson-intake.js';
import { createObjectsClient } from './client.js';
import { loadClientConfig } from './infrastructure/config.js';
import { createLogger } from './infrastructure/logger.js';

const log = createLogger();

/**
 * Standalone process: stdin → dispatcher → Objects API.
 * Configuration comes from OBJECTS_* environment variables.
 */
async function main(): Promise<void> {
  const config = loadClientConfig();
  const client = createObjectsClient({ ...config, logger: log });

  // Abort controller for graceful shutdown
  const ac = new AbortController();
  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down, draining buffers...');
    ac.abort();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  const submitted = await pipeRecords(process.stdin, client, log, ac.signal);
  log.info({ submitted }, 'Input finished');
  await client.close();
  process.stdin.destroy();
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'objects-batcher crashed');
  process.exit(1);
});
