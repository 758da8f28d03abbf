import type { Logger } from 'pino';
import type { ObjectRecord, SerializedItem } from '../domain/index.js';
import type { KeyedBuffer } from './keyed-buffer.js';
import { objectSchema } from './object-schema.js';
import { flattenProperties } from './flatten.js';

export type WorkerState = 'running' | 'draining' | 'terminated';

export interface FlushWorkerOptions {
  maxBatchBytes: number;
  maxBatchCount: number;
  maxBatchInterval: number;
}

/** Called by the worker whenever its buffer should be turned into a batch. */
export type FlushFn = (buffer: KeyedBuffer) => Promise<void>;

/**
 * Validates, flattens and serializes one record.
 * Returns null (after logging) when the record has to be excluded.
 */
export function serializeRecord(record: ObjectRecord, log: Logger): SerializedItem | null {
  try {
    const parsed = objectSchema.parse(record);
    const json = JSON.stringify({ id: parsed.id, properties: flattenProperties(parsed.properties) });
    return { json, bytes: Buffer.byteLength(json, 'utf8') };
  } catch (err: unknown) {
    log.error(
      { err, id: record.id, collection: record.collection },
      `Object \`${record.id}\` excluded from batch`,
    );
    return null;
  }
}

/**
 * Control loop owning one collection's buffer.
 *
 * Reacts to three stimuli:
 * 1. a record on the intake: serialize, check thresholds, append;
 * 2. the interval tick: flush whatever is buffered;
 * 3. the exit signal: drain the intake, flush once, stop.
 *
 * A tick that fires while a record is being handled is served before
 * the next queued record, so a steady inflow cannot starve the timer.
 *
 * The only awaits are the flush callback (which may wait for an
 * admission slot) and parking on the intake when idle.
 */
export class FlushWorker {
  private state: WorkerState = 'running';
  private tickDue = false;
  readonly done: Promise<void>;

  constructor(
    private readonly buffer: KeyedBuffer,
    private readonly options: FlushWorkerOptions,
    private readonly flush: FlushFn,
    private readonly log: Logger,
  ) {
    this.done = this.loop();
  }

  get currentState(): WorkerState {
    return this.state;
  }

  private async loop(): Promise<void> {
    const { intake, exit } = this.buffer;

    const ticker = setInterval(() => {
      this.tickDue = true;
      intake.wake();
    }, this.options.maxBatchInterval);
    const onExit = (): void => intake.wake();
    exit.addEventListener('abort', onExit, { once: true });

    try {
      while (!exit.aborted) {
        if (this.tickDue) {
          this.tickDue = false;
          await this.flush(this.buffer);
          continue;
        }

        const record = intake.tryReceive();
        if (record !== undefined) {
          await this.accept(record);
          continue;
        }

        await intake.ready();
      }

      clearInterval(ticker);
      this.state = 'draining';
      this.log.debug({ collection: this.buffer.collection, queued: intake.length }, 'Draining buffer');

      for (let record = intake.tryReceive(); record !== undefined; record = intake.tryReceive()) {
        await this.accept(record);
      }
      await this.flush(this.buffer);
    } finally {
      clearInterval(ticker);
      exit.removeEventListener('abort', onExit);
      this.state = 'terminated';
    }
  }

  private async accept(record: ObjectRecord): Promise<void> {
    const item = serializeRecord(record, this.log);
    if (!item) return;

    // The item that crosses the byte limit starts the next batch
    if (this.buffer.size() + item.bytes >= this.options.maxBatchBytes) {
      await this.flush(this.buffer);
    }

    this.buffer.append(item);

    if (this.buffer.count() >= this.options.maxBatchCount) {
      await this.flush(this.buffer);
    }
  }
}
