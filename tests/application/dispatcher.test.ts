import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Dispatcher } from '../../src/application/dispatcher.js';
import type { DispatcherOptions } from '../../src/application/dispatcher.js';
import { KeyedBuffer } from '../../src/application/keyed-buffer.js';
import type { Sender } from '../../src/infrastructure/http/sender.js';
import type { Batch } from '../../src/domain/index.js';
import { batchIds, fakeLogger, makeRecord, recordingSender, settle } from '../helpers.js';

const baseOptions: DispatcherOptions = {
  writeKey: 'test-key',
  maxBatchBytes: 512_000,
  maxBatchCount: 100,
  maxBatchInterval: 60_000,
  concurrency: 10,
};

describe('Dispatcher', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  it('builds a batch with collection, write key and flattened objects', async () => {
    const { sender, batches } = recordingSender();
    const dispatcher = new Dispatcher(baseOptions, sender, log);

    dispatcher.set({ collection: 'users', id: 'u1', properties: { plan: 'pro', address: { city: 'Oslo' } } });
    await dispatcher.close();

    expect(batches).toEqual([
      {
        collection: 'users',
        writeKey: 'test-key',
        objects: '[{"id":"u1","properties":{"plan":"pro","address.city":"Oslo"}}]',
      },
    ]);
  });

  it('splits 150 records into batches of 100 and 50, in order', async () => {
    const { sender, batches } = recordingSender();
    const dispatcher = new Dispatcher(baseOptions, sender, log);

    for (let i = 0; i < 150; i++) {
      dispatcher.set(makeRecord({ collection: 'events', id: `e-${i}` }));
    }
    await dispatcher.close();

    expect(batches.map((b) => batchIds(b).length)).toEqual([100, 50]);
    expect(batches.flatMap(batchIds)).toEqual(Array.from({ length: 150 }, (_, i) => `e-${i}`));
  });

  it('preserves per-collection order when collections interleave', async () => {
    const { sender, batches } = recordingSender();
    const dispatcher = new Dispatcher({ ...baseOptions, maxBatchCount: 4 }, sender, log);

    for (let i = 0; i < 10; i++) {
      dispatcher.set(makeRecord({ collection: i % 2 === 0 ? 'even' : 'odd', id: `r-${i}` }));
      dispatcher.set(makeRecord({ collection: 'third', id: `t-${i}` }));
    }
    await dispatcher.close();

    const idsFor = (collection: string) =>
      batches.filter((b) => b.collection === collection).flatMap(batchIds);

    expect(idsFor('even')).toEqual(['r-0', 'r-2', 'r-4', 'r-6', 'r-8']);
    expect(idsFor('odd')).toEqual(['r-1', 'r-3', 'r-5', 'r-7', 'r-9']);
    expect(idsFor('third')).toEqual(Array.from({ length: 10 }, (_, i) => `t-${i}`));
  });

  it('creates exactly one buffer for a burst of first-time submissions', async () => {
    const { sender, batches } = recordingSender();
    const dispatcher = new Dispatcher(baseOptions, sender, log);

    for (let i = 0; i < 50; i++) {
      dispatcher.set(makeRecord({ collection: 'burst', id: `b-${i}` }));
    }
    expect(dispatcher.stats().collections).toBe(1);
    expect(log.debug).toHaveBeenCalledWith({ collection: 'burst' }, 'Buffer created');
    expect(vi.mocked(log.debug).mock.calls.filter((call) => call[1] === 'Buffer created')).toHaveLength(1);

    await dispatcher.close();
    expect(batches).toHaveLength(1);
    expect(batches.map(batchIds)[0]).toHaveLength(50);
  });

  it('flushes every collection on close', async () => {
    const { sender, batches } = recordingSender();
    const dispatcher = new Dispatcher(baseOptions, sender, log);

    dispatcher.set(makeRecord({ collection: 'a', id: 'a1' }));
    dispatcher.set(makeRecord({ collection: 'b', id: 'b1' }));
    dispatcher.set(makeRecord({ collection: 'a', id: 'a2' }));
    await dispatcher.close();

    // Workers drain concurrently, so only per-collection content is fixed
    const byCollection = Object.fromEntries(batches.map((b) => [b.collection, batchIds(b)]));
    expect(batches).toHaveLength(2);
    expect(byCollection).toEqual({ a: ['a1', 'a2'], b: ['b1'] });
  });

  it('delivers a record with an empty id', async () => {
    const { sender, batches } = recordingSender();
    const dispatcher = new Dispatcher(baseOptions, sender, log);

    dispatcher.set({ collection: 'users', id: '', properties: { a: 1 } });
    await dispatcher.close();

    expect(batches).toHaveLength(1);
    expect(batches[0]?.objects).toBe('[{"id":"","properties":{"a":1}}]');
    expect(log.error).not.toHaveBeenCalled();
  });

  it('delivers records for a long collection key', async () => {
    const { sender, batches } = recordingSender();
    const dispatcher = new Dispatcher(baseOptions, sender, log);
    const collection = 'c'.repeat(300);

    dispatcher.set(makeRecord({ collection, id: 'long-1' }));
    await dispatcher.close();

    expect(dispatcher.stats().collections).toBe(1);
    expect(batches).toHaveLength(1);
    expect(batches[0]?.collection).toBe(collection);
    expect(batches.map(batchIds)).toEqual([['long-1']]);
  });

  it('close() is idempotent', async () => {
    const { sender, send } = recordingSender();
    const dispatcher = new Dispatcher(baseOptions, sender, log);
    dispatcher.set(makeRecord());

    const first = dispatcher.close();
    const second = dispatcher.close();
    expect(second).toBe(first);
    await first;

    expect(send).toHaveBeenCalledOnce();
    expect(log.info).toHaveBeenCalledWith({ collections: 1 }, 'Closing dispatcher');
  });

  it('ignores records submitted after close', async () => {
    const { sender, send } = recordingSender();
    const dispatcher = new Dispatcher(baseOptions, sender, log);
    await dispatcher.close();

    dispatcher.set(makeRecord({ collection: 'late', id: 'late-1' }));

    expect(send).not.toHaveBeenCalled();
    expect(dispatcher.stats()).toEqual({ collections: 0, inFlight: 0, pending: 0, closed: true });
    expect(log.debug).toHaveBeenCalledWith(
      { collection: 'late', id: 'late-1' },
      'Dispatcher closed, object ignored',
    );
  });

  it('flush() on an empty buffer sends nothing', async () => {
    const { sender, send } = recordingSender();
    const dispatcher = new Dispatcher(baseOptions, sender, log);

    await dispatcher.flush(new KeyedBuffer('empty'));

    expect(send).not.toHaveBeenCalled();
  });

  it('holds flushes back while the admission pool is saturated', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const collections: string[] = [];
    const send = vi.fn(async (batch: Batch) => {
      collections.push(`${batch.collection}:${batchIds(batch).join(',')}`);
      if (collections.length === 1) await gate;
      return true;
    });
    const sender: Sender = { send };
    const dispatcher = new Dispatcher({ ...baseOptions, maxBatchCount: 1, concurrency: 1 }, sender, log);

    dispatcher.set(makeRecord({ collection: 'a', id: 'a1' }));
    dispatcher.set(makeRecord({ collection: 'a', id: 'a2' }));
    dispatcher.set(makeRecord({ collection: 'b', id: 'b1' }));
    await settle();

    expect(collections).toEqual(['a:a1']);
    expect(dispatcher.stats()).toEqual({ collections: 2, inFlight: 1, pending: 2, closed: false });

    release();
    await dispatcher.close();

    // Waiters are admitted as slots free up; admission order across collections is not fixed
    expect(collections[0]).toBe('a:a1');
    expect([...collections].sort()).toEqual(['a:a1', 'a:a2', 'b:b1']);
    expect(dispatcher.stats().inFlight).toBe(0);
  });

  it('does not wait for close to deliver a full batch', async () => {
    const { sender, batches } = recordingSender();
    const dispatcher = new Dispatcher({ ...baseOptions, maxBatchCount: 2 }, sender, log);

    dispatcher.set(makeRecord({ id: 'x1' }));
    dispatcher.set(makeRecord({ id: 'x2' }));
    await settle();

    expect(batches.map(batchIds)).toEqual([['x1', 'x2']]);
    await dispatcher.close();
  });

  describe('interval flush', () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval', 'Date'] });
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('sends one batch of two records after the interval elapses', async () => {
      const { sender, batches } = recordingSender();
      const dispatcher = new Dispatcher({ ...baseOptions, maxBatchInterval: 10_000 }, sender, log);

      dispatcher.set(makeRecord({ collection: 'users', id: 'u1' }));
      dispatcher.set(makeRecord({ collection: 'users', id: 'u2' }));
      await settle();

      await vi.advanceTimersByTimeAsync(9_999);
      await settle();
      expect(batches).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(1);
      await settle();
      expect(batches.map(batchIds)).toEqual([['u1', 'u2']]);

      await vi.advanceTimersByTimeAsync(5_000);
      await settle();
      expect(batches).toHaveLength(1);

      await dispatcher.close();
      expect(batches).toHaveLength(1);
    });
  });
});
