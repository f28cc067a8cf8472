// src/server/store/sheets.ts
import {
  StoreError,
  type StoreOp,
  StoreRateLimitedError,
  StoreReadError,
  StoreWriteError,
} from '@/lib/errors';
import { defaultFetch, type FetchLike } from '@/lib/http';
import type { RecordStore, SheetRow } from './types';

export type SheetsStoreOptions = {
  spreadsheetId: string;
  getAccessToken: () => Promise<string | null>;
  apiBase?: string;
  fetchImpl?: FetchLike;
};

const RATE_LIMIT_RE = /RESOURCE_EXHAUSTED|rateLimitExceeded|Quota exceeded/i;

// Sheets wants quoted sheet names inside A1 ranges; single quotes are escaped by doubling.
function a1Table(table: string): string {
  return encodeURIComponent(`'${table.replace(/'/g, "''")}'`);
}

function cell(v: unknown): string {
  if (v === null || v === undefined) return '';
  return typeof v === 'string' ? v : String(v);
}

/**
 * Google Sheets v4 over REST. One sheet (tab) per table, first row is the header.
 */
export class SheetsRecordStore implements RecordStore {
  private readonly base: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly opts: SheetsStoreOptions) {
    this.base = `${opts.apiBase ?? 'https://sheets.googleapis.com/v4/spreadsheets'}/${encodeURIComponent(opts.spreadsheetId)}`;
    this.fetchImpl = opts.fetchImpl ?? defaultFetch;
  }

  async readAll(table: string): Promise<SheetRow[]> {
    const url = `${this.base}/values/${a1Table(table)}`;
    const resp = await this.call('read', url, 'GET');

    let data: unknown;
    try {
      data = await resp.json();
    } catch (e) {
      throw new StoreReadError(`Sheets returned non-JSON for ${table}`, { status: resp.status, cause: e });
    }

    // no `values` key at all means the sheet is empty
    const values: unknown = typeof data === 'object' && data !== null ? Reflect.get(data, 'values') : undefined;
    if (!Array.isArray(values)) return [];
    return values.slice(1).map((row: unknown) => (Array.isArray(row) ? row.map(cell) : []));
  }

  async appendRow(table: string, row: SheetRow): Promise<void> {
    const url =
      `${this.base}/values/${a1Table(table)}:append` +
      '?valueInputOption=RAW&insertDataOption=INSERT_ROWS';
    await this.call('write', url, 'POST', JSON.stringify({ values: [row] }));
  }

  private async call(op: StoreOp, url: string, method: 'GET' | 'POST', body?: string): Promise<Response> {
    const token = await this.token(op);
    const headers: Record<string, string> = { Authorization: `Bearer ${token}` };
    if (body !== undefined) headers['Content-Type'] = 'application/json';

    let resp: Response;
    try {
      resp = await this.fetchImpl(url, { method, headers, body });
    } catch (e) {
      throw failure(op, `Sheets ${op} request failed: ${e instanceof Error ? e.message : String(e)}`, undefined, e);
    }

    if (!resp.ok) {
      const txt = await resp.text().catch(() => '');
      if (resp.status === 429 || RATE_LIMIT_RE.test(txt)) {
        throw new StoreRateLimitedError(op, `Sheets ${op} rate limited (${resp.status})`, { status: resp.status });
      }
      throw failure(op, `Sheets ${op} ${resp.status}: ${txt.slice(0, 300)}`, resp.status);
    }
    return resp;
  }

  private async token(op: StoreOp): Promise<string> {
    let token: string | null;
    try {
      token = await this.opts.getAccessToken();
    } catch (e) {
      throw failure(op, `Could not obtain Sheets access token: ${e instanceof Error ? e.message : String(e)}`, undefined, e);
    }
    if (!token) throw failure(op, 'Could not obtain Sheets access token');
    return token;
  }
}

function failure(op: StoreOp, message: string, status?: number, cause?: unknown): StoreError {
  return op === 'read'
    ? new StoreReadError(message, { status, cause })
    : new StoreWriteError(message, { status, cause });
}
