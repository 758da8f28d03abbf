export type { ObjectRecord, ObjectProperties, NormalizedRecord, Batch } from './domain/index.js';
export { createObjectsClient } from './client.js';
export type { CreateClientOptions } from './client.js';
export { Dispatcher } from './application/index.js';
export type { DispatcherOptions, DispatcherStats } from './application/index.js';
export { flattenProperties, objectSchema } from './application/index.js';
export {
  VERSION,
  DEFAULT_BASE_ENDPOINT,
  clientConfigSchema,
  resolveClientConfig,
  loadClientConfig,
  HttpSender,
  SendError,
  createLogger,
} from './infrastructure/index.js';
export type { ClientConfig, ClientConfigInput, Sender, FetchLike } from './infrastructure/index.js';
