import type { Logger } from 'pino';
import type { Batch, ObjectRecord } from '../domain/index.js';
import type { Sender } from '../infrastructure/http/sender.js';
import { AdmissionPool } from './admission-pool.js';
import { BufferRegistry } from './buffer-registry.js';
import { FlushWorker } from './flush-worker.js';
import { KeyedBuffer } from './keyed-buffer.js';

export interface DispatcherOptions {
  writeKey: string;
  maxBatchBytes: number;
  maxBatchCount: number;
  maxBatchInterval: number;
  concurrency: number;
}

export interface DispatcherStats {
  collections: number;
  inFlight: number;
  pending: number;
  closed: boolean;
}

interface BufferEntry {
  buffer: KeyedBuffer;
  worker: FlushWorker;
}

/**
 * Routes records to per-collection buffers and turns flushed buffers
 * into batches for the sender.
 *
 * `set` is fire-and-forget: nothing is ever reported back to the caller,
 * failures only show up in the log. Delivery is at-most-once.
 */
export class Dispatcher {
  private readonly registry = new BufferRegistry<BufferEntry>();
  private readonly pool: AdmissionPool;
  private closed = false;
  private closing: Promise<void> | null = null;

  constructor(
    private readonly options: DispatcherOptions,
    private readonly sender: Sender,
    private readonly log: Logger,
  ) {
    this.pool = new AdmissionPool(options.concurrency, log);
  }

  /** Queues a record on its collection's buffer. Ignored once closed. */
  set(record: ObjectRecord): void {
    if (this.closed) {
      this.log.debug({ collection: record.collection, id: record.id }, 'Dispatcher closed, object ignored');
      return;
    }

    const { buffer } = this.registry.getOrCreate(record.collection, (key) => this.spawn(key));
    if (!buffer.intake.send(record)) {
      this.log.debug({ collection: record.collection, id: record.id }, 'Buffer closed, object dropped');
    }
  }

  /**
   * Turns the buffer's contents into a batch and waits for an admission
   * slot; the send itself continues in the background.
   */
  async flush(buffer: KeyedBuffer): Promise<void> {
    if (buffer.count() === 0) return;

    const items = buffer.take();
    const batch: Batch = {
      collection: buffer.collection,
      writeKey: this.options.writeKey,
      objects: `[${items.join(',')}]`,
    };

    this.log.debug({ collection: batch.collection, count: items.length }, 'Flushing batch');
    await this.pool.run(() => this.sender.send(batch));
  }

  /**
   * Drains every buffer, waits for each worker's final flush, then for
   * all in-flight sends. Calling it again returns the same promise.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closed = true;
      this.closing = this.drain();
    }
    return this.closing;
  }

  stats(): DispatcherStats {
    return {
      collections: this.registry.size,
      inFlight: this.pool.inFlight,
      pending: this.pool.pending,
      closed: this.closed,
    };
  }

  private spawn(collection: string): BufferEntry {
    const buffer = new KeyedBuffer(collection);
    const worker = new FlushWorker(buffer, this.options, (b) => this.flush(b), this.log);
    this.log.debug({ collection }, 'Buffer created');
    return { buffer, worker };
  }

  private async drain(): Promise<void> {
    const entries = this.registry.snapshot();
    this.log.info({ collections: entries.length }, 'Closing dispatcher');

    for (const [, entry] of entries) {
      entry.buffer.shutdown();
    }
    await Promise.all(entries.map(([, entry]) => entry.worker.done));
    await this.pool.idle();

    this.log.info('Dispatcher closed');
  }
}
