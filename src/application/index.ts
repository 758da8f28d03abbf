export { objectSchema } from './object-schema.js';
export type { ObjectInput } from './object-schema.js';
export { flattenProperties } from './flatten.js';
export { Channel } from './channel.js';
export { KeyedBuffer } from './keyed-buffer.js';
export { BufferRegistry } from './buffer-registry.js';
export { AdmissionPool } from './admission-pool.js';
export { FlushWorker, serializeRecord } from './flush-worker.js';
export type { FlushWorkerOptions, FlushFn, WorkerState } from './flush-worker.js';
export { Dispatcher } from './dispatcher.js';
export type { DispatcherOptions, DispatcherStats } from './dispatcher.js';
export { pipeRecords } from './ndjson-intake.js';
