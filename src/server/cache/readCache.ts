// src/server/cache/readCache.ts
import type { CacheSnapshot } from '@/types/data';
import type { RecordStore } from '@/server/store/types';
import { parseDirectoryRows } from '@/server/directory/directory';
import { parseRecordRows } from '@/server/records/rows';
import { logInfo, timed } from '@/lib/log';

export type ReadCacheOptions = {
  store: RecordStore;
  directoryTable: string;
  recordsTable: string;
  ttlMs: number;
  now?: () => number;
};

/**
 * Time-boxed snapshot of the directory and record tables.
 *
 * - `get()` serves the snapshot while it is younger than `ttlMs`, else fetches.
 * - Only one fetch runs at a time; concurrent callers share it.
 * - `invalidate()` makes the next `get()` fetch, and discards the result of a
 *   fetch that was already running (it may predate the write being observed).
 * - Fetch failures propagate; an expired snapshot is never served.
 */
export class ReadCache {
  private snapshot: CacheSnapshot | null = null;
  private inFlight: Promise<CacheSnapshot> | null = null;
  private epoch = 0;
  private fetches = 0;
  private readonly now: () => number;

  constructor(private readonly opts: ReadCacheOptions) {
    this.now = opts.now ?? Date.now;
  }

  /** Number of store fetches started so far. */
  get fetchCount(): number {
    return this.fetches;
  }

  async get(reqId = 'cache'): Promise<CacheSnapshot> {
    const snap = this.snapshot;
    if (snap && this.now() - snap.fetchedAt < this.opts.ttlMs) return snap;
    if (this.inFlight) return this.inFlight;

    const epoch = this.epoch;
    const pending = this.fetch(reqId).then(
      (fresh) => {
        if (this.epoch === epoch) {
          this.snapshot = fresh;
          this.inFlight = null;
        }
        return fresh;
      },
      (err: unknown) => {
        if (this.epoch === epoch) this.inFlight = null;
        throw err;
      }
    );
    this.inFlight = pending;
    return pending;
  }

  invalidate(): void {
    this.epoch += 1;
    this.snapshot = null;
    this.inFlight = null;
  }

  /** Current snapshot without fetching (may be expired). */
  peek(): CacheSnapshot | null {
    return this.snapshot;
  }

  private async fetch(reqId: string): Promise<CacheSnapshot> {
    this.fetches += 1;
    const { store, directoryTable, recordsTable } = this.opts;
    return timed('store.read_snapshot', reqId, async () => {
      const [dirRows, recRows] = await Promise.all([
        store.readAll(directoryTable),
        store.readAll(recordsTable),
      ]);
      const fresh: CacheSnapshot = {
        directory: parseDirectoryRows(dirRows),
        records: parseRecordRows(recRows),
        fetchedAt: this.now(),
      };
      logInfo('Snapshot refreshed', reqId, {
        directoryRows: fresh.directory.length,
        recordRows: fresh.records.length,
      });
      return fresh;
    });
  }
}
