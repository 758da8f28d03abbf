import type { ObjectRecord, SerializedItem } from '../domain/index.js';
import { Channel } from './channel.js';

/**
 * Pending serialized items for one collection.
 *
 * Only the collection's FlushWorker mutates the items; everyone else
 * reaches the buffer through `intake` or `shutdown()`.
 */
export class KeyedBuffer {
  readonly intake = new Channel<ObjectRecord>();

  private items: string[] = [];
  private bytes = 0;
  private readonly exitController = new AbortController();

  constructor(readonly collection: string) {}

  /** Fires once, when the owning dispatcher starts closing. */
  get exit(): AbortSignal {
    return this.exitController.signal;
  }

  append(item: SerializedItem): void {
    this.items.push(item.json);
    this.bytes += item.bytes;
  }

  /** Accumulated UTF-8 bytes of the held items. */
  size(): number {
    return this.bytes;
  }

  count(): number {
    return this.items.length;
  }

  reset(): void {
    this.items = [];
    this.bytes = 0;
  }

  /**
   * Returns the held items and resets the buffer in the same synchronous
   * step, so nothing can be appended between the read and the reset.
   */
  take(): readonly string[] {
    const out = this.items;
    this.reset();
    return out;
  }

  /** Closes the intake and raises the exit signal. Safe to call twice. */
  shutdown(): void {
    this.intake.close();
    this.exitController.abort();
  }
}
