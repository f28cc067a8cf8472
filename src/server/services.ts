// src/server/services.ts
import * as config from '@/config';
import { getSheetsAccessToken, resolveRelayEndpoint } from '@/lib/googleAuth';
import { ReadCache } from '@/server/cache/readCache';
import { Directory } from '@/server/directory/directory';
import { RelayClient } from '@/server/relay/client';
import { SessionRegistry } from '@/server/session/registry';
import { MemoryRecordStore } from '@/server/store/memory';
import { SheetsRecordStore } from '@/server/store/sheets';
import type { RecordStore } from '@/server/store/types';
import type { CommitDeps } from '@/server/commit/pipeline';

export type Services = {
  store: RecordStore;
  cache: ReadCache;
  relay: RelayClient;
  sessions: SessionRegistry;
  recordsTable: string;
};

// Make TypeScript happy with global memoization (survives dev hot reloads)
declare global {
  // eslint-disable-next-line no-var
  var __services__: Services | undefined;
}

function buildStore(): RecordStore {
  if (config.STORE_DRIVER === 'memory') return new MemoryRecordStore();
  return new SheetsRecordStore({
    spreadsheetId: config.SPREADSHEET_ID,
    apiBase: config.SHEETS_API_BASE,
    getAccessToken: getSheetsAccessToken,
  });
}

export function buildServices(overrides: Partial<Services> = {}): Services {
  const store = overrides.store ?? buildStore();
  return {
    store,
    cache:
      overrides.cache ??
      new ReadCache({
        store,
        directoryTable: config.DIRECTORY_TABLE,
        recordsTable: config.RECORDS_TABLE,
        ttlMs: config.CACHE_TTL_SECONDS * 1000,
      }),
    relay:
      overrides.relay ??
      new RelayClient({ endpoint: resolveRelayEndpoint, timeoutMs: config.RELAY_TIMEOUT_MS }),
    sessions:
      overrides.sessions ??
      new SessionRegistry({
        idleMs: config.SESSION_IDLE_MINUTES * 60_000,
        cartLimits: { allowedTypes: config.ATTACHMENT_TYPES, maxBytes: config.MAX_ATTACHMENT_BYTES },
      }),
    recordsTable: overrides.recordsTable ?? config.RECORDS_TABLE,
  };
}

export function getServices(): Services {
  let s = global.__services__;
  if (!s) {
    s = buildServices();
    global.__services__ = s;
  }
  return s;
}

/** Replace the process-wide services (tests, local fixtures). */
export function setServices(s: Services | undefined): void {
  global.__services__ = s;
}

export async function loadDirectory(s: Services, reqId: string): Promise<Directory> {
  const snap = await s.cache.get(reqId);
  return new Directory(snap.directory);
}

export function commitDeps(s: Services): CommitDeps {
  return { store: s.store, relay: s.relay, cache: s.cache, recordsTable: s.recordsTable };
}
