import { describe, expect, it, vi } from 'vitest';

import { StoreRateLimitedError } from '@/lib/errors';
import { MemoryRecordStore } from '@/server/store/memory';
import type { RecordStore, SheetRow } from '@/server/store/types';
import { ReadCache } from './readCache';

const TTL = 60_000;

function seeded() {
  return new MemoryRecordStore({
    config: [['Office A', 'G1', 'pw1']],
    records: [['r1', '2026-10-12 09:00:00', '2026-10-12', 'Office A', 'G1', 'first', '']],
  });
}

function makeCache(store: RecordStore, clock: { t: number }) {
  return new ReadCache({ store, directoryTable: 'config', recordsTable: 'records', ttlMs: TTL, now: () => clock.t });
}

function deferred() {
  let release: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}

/** Store whose reads wait until the test releases the current gate. */
class GatedStore implements RecordStore {
  gate = deferred();
  reads = 0;

  constructor(private readonly inner: MemoryRecordStore) {}

  async readAll(table: string): Promise<SheetRow[]> {
    this.reads += 1;
    const gate = this.gate.promise;
    await gate;
    return this.inner.readAll(table);
  }

  appendRow(table: string, row: SheetRow): Promise<void> {
    return this.inner.appendRow(table, row);
  }
}

describe('ReadCache', () => {
  it('parses both tables into a snapshot', async () => {
    const clock = { t: 1_000 };
    const snap = await makeCache(seeded(), clock).get();

    expect(snap.directory).toEqual([{ department: 'Office A', group: 'G1', secret: 'pw1' }]);
    expect(snap.records).toEqual([
      {
        id: 'r1',
        submittedAt: '2026-10-12 09:00:00',
        meetingDate: '2026-10-12',
        department: 'Office A',
        group: 'G1',
        content: 'first',
        attachmentUrl: '',
      },
    ]);
    expect(snap.fetchedAt).toBe(1_000);
  });

  it('serves the same snapshot within the TTL without fetching again', async () => {
    const clock = { t: 0 };
    const store = seeded();
    const readAll = vi.spyOn(store, 'readAll');
    const cache = makeCache(store, clock);

    const a = await cache.get();
    clock.t = TTL - 1;
    const b = await cache.get();

    expect(b).toBe(a);
    expect(cache.fetchCount).toBe(1);
    expect(readAll).toHaveBeenCalledTimes(2); // directory + records, once each
  });

  it('fetches again once the TTL has elapsed', async () => {
    const clock = { t: 0 };
    const cache = makeCache(seeded(), clock);

    await cache.get();
    clock.t = TTL;
    await cache.get();

    expect(cache.fetchCount).toBe(2);
  });

  it('fetches after invalidate() even with TTL left, and sees new rows', async () => {
    const clock = { t: 0 };
    const store = seeded();
    const cache = makeCache(store, clock);

    expect((await cache.get()).records).toHaveLength(1);
    await store.appendRow('records', ['r2', '2026-10-19 09:00:00', '2026-10-19', 'Office A', 'G1', 'second']);
    expect((await cache.get()).records).toHaveLength(1);

    cache.invalidate();
    const fresh = await cache.get();

    expect(cache.fetchCount).toBe(2);
    expect(fresh.records.map((r) => r.id)).toEqual(['r1', 'r2']);
    expect(fresh.records[1].attachmentUrl).toBe('');
  });

  it('shares one in-flight fetch between concurrent callers', async () => {
    const clock = { t: 0 };
    const store = new GatedStore(seeded());
    const cache = makeCache(store, clock);

    const p1 = cache.get();
    const p2 = cache.get();
    const p3 = cache.get();
    store.gate.release();
    const [a, b, c] = await Promise.all([p1, p2, p3]);

    expect(cache.fetchCount).toBe(1);
    expect(store.reads).toBe(2);
    expect(b).toBe(a);
    expect(c).toBe(a);
  });

  it('does not keep a fetch that was running when invalidate() was called', async () => {
    const clock = { t: 0 };
    const inner = seeded();
    const store = new GatedStore(inner);
    const cache = makeCache(store, clock);

    const first = store.gate;
    const stale = cache.get();

    await inner.appendRow('records', ['r2', '2026-10-19 09:00:00', '2026-10-19', 'Office A', 'G1', 'second']);
    cache.invalidate();
    store.gate = deferred();
    const fresh = cache.get();

    store.gate.release();
    const freshSnap = await fresh;
    first.release();
    await stale;

    expect(cache.fetchCount).toBe(2);
    expect(freshSnap.records).toHaveLength(2);
    expect(cache.peek()).toBe(freshSnap);
  });

  it('propagates fetch failures and retries on the next call', async () => {
    const clock = { t: 0 };
    const store = seeded();
    const readAll = vi
      .spyOn(store, 'readAll')
      .mockRejectedValueOnce(new StoreRateLimitedError('read', 'Sheets read rate limited (429)'));
    const cache = makeCache(store, clock);

    await expect(cache.get()).rejects.toBeInstanceOf(StoreRateLimitedError);
    expect(cache.peek()).toBeNull();

    const snap = await cache.get();
    expect(snap.records).toHaveLength(1);
    expect(cache.fetchCount).toBe(2);
    expect(readAll).toHaveBeenCalledTimes(4);
  });

  it('never serves an expired snapshot when the refresh fails', async () => {
    const clock = { t: 0 };
    const store = seeded();
    const cache = makeCache(store, clock);
    await cache.get();

    vi.spyOn(store, 'readAll').mockRejectedValue(new Error('network down'));
    clock.t = TTL + 1;

    await expect(cache.get()).rejects.toThrow('network down');
  });
});
