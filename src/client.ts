import type { Logger } from 'pino';
import { Dispatcher } from './application/dispatcher.js';
import { resolveClientConfig } from './infrastructure/config.js';
import type { ClientConfigInput } from './infrastructure/config.js';
import { HttpSender } from './infrastructure/http/sender.js';
import type { FetchLike } from './infrastructure/http/sender.js';
import { createLogger } from './infrastructure/logger.js';

export interface CreateClientOptions extends ClientConfigInput {
  logger?: Logger;
  fetch?: FetchLike;
}

/**
 * Builds a ready-to-use dispatcher posting to the Objects API.
 *
 * ```ts
 * const client = createObjectsClient({ writeKey: 'test-key' });
 * client.set({ collection: 'users', id: 'u-1', properties: { plan: 'pro' } });
 * await client.close();
 * ```
 */
export function createObjectsClient(options: CreateClientOptions): Dispatcher {
  const { logger, fetch, ...input } = options;
  const config = resolveClientConfig(input);
  const log = logger ?? createLogger();

  const sender = new HttpSender({
    baseEndpoint: config.baseEndpoint,
    retryMaxElapsed: config.retryMaxElapsed,
    log,
    fetch,
  });

  return new Dispatcher(config, sender, log);
}
