export {
  VERSION,
  DEFAULT_BASE_ENDPOINT,
  clientConfigSchema,
  resolveClientConfig,
  loadClientConfig,
} from './config.js';
export type { ClientConfig, ClientConfigInput } from './config.js';
export { createLogger } from './logger.js';
export { HttpSender, SendError, encodeBatch } from './http/sender.js';
export type { Sender, FetchLike, FetchResponse, HttpSenderOptions } from './http/sender.js';
export { ExponentialBackoff, DEFAULT_BACKOFF } from './http/backoff.js';
export type { BackoffOptions } from './http/backoff.js';
