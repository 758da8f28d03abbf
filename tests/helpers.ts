import { vi } from 'vitest';
import type { Batch, ObjectRecord } from '../src/domain/index.js';
import type { Sender } from '../src/infrastructure/http/sender.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').Logger;
}

let counter = 0;

/**
 * Factory for creating test records with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeRecord(overrides: Partial<ObjectRecord> = {}): ObjectRecord {
  counter++;
  return {
    collection: overrides.collection ?? 'users',
    id: overrides.id ?? `rec-${counter}`,
    properties: overrides.properties ?? { plan: 'free' },
  };
}

/** Sender stand-in that records every batch it is handed. */
export function recordingSender() {
  const batches: Batch[] = [];
  const send = vi.fn(async (batch: Batch) => {
    batches.push(batch);
    return true;
  });
  const sender: Sender = { send };
  return { sender, send, batches };
}

/** Ids of the objects carried by a batch, in payload order. */
export function batchIds(batch: Batch): string[] {
  const objects: unknown = JSON.parse(batch.objects);
  if (!Array.isArray(objects)) throw new TypeError('objects is not an array');
  return objects.map((o: { id: string }) => o.id);
}

/** Lets pending promise callbacks run. Uses the real setImmediate. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
